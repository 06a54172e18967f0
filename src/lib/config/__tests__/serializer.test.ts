import { describe, test, expect } from "vitest";
import {
  ConfigError,
  migrateConfig,
  parseConfig,
  serializeConfig,
  validateConfig,
} from "../serializer.js";
import { CONFIG_VERSION, DEFAULT_CONFIG } from "../types.js";

describe("validateConfig", () => {
  test("accepts an empty object", () => {
    expect(validateConfig({})).toBe(true);
  });

  test("accepts a full config", () => {
    expect(validateConfig(serializeConfig({ ...DEFAULT_CONFIG, backgroundSelect: 2 }))).toBe(true);
  });

  test("rejects non-objects", () => {
    expect(validateConfig(null)).toBe(false);
    expect(validateConfig([])).toBe(false);
    expect(validateConfig("sixel")).toBe(false);
  });

  test("rejects fields of the wrong type", () => {
    expect(validateConfig({ width: "240" })).toBe(false);
    expect(validateConfig({ title: 3 })).toBe(false);
    expect(validateConfig({ mode: "threaded" })).toBe(false);
    expect(validateConfig({ backgroundSelect: 3 })).toBe(false);
  });
});

describe("migrateConfig", () => {
  test("stamps unversioned files with version 1", () => {
    expect(migrateConfig({ width: 10 })).toEqual({ version: 1, width: 10 });
  });

  test("leaves current files alone", () => {
    const file = { version: CONFIG_VERSION, title: "CPU" };
    expect(migrateConfig(file)).toEqual(file);
  });
});

describe("parseConfig", () => {
  test("fills missing fields with defaults", () => {
    expect(parseConfig({ width: 120, mode: "background" })).toEqual({
      ...DEFAULT_CONFIG,
      width: 120,
      mode: "background",
    });
  });

  test("keeps the background select parameter", () => {
    expect(parseConfig({ backgroundSelect: 1 }).backgroundSelect).toBe(1);
  });

  test("throws ConfigError for a malformed file", () => {
    expect(() => parseConfig({ width: "wide" })).toThrow(ConfigError);
  });

  test("names the offending field", () => {
    expect(() => parseConfig({ rleThreshold: 0 })).toThrow(
      'Invalid config field "rleThreshold": expected a positive integer, got 0',
    );
  });

  test("rejects a palette cap above 256", () => {
    expect(() => parseConfig({ paletteCap: 300 })).toThrow(ConfigError);
  });

  test("rejects files from a newer version", () => {
    expect(() => parseConfig({ version: CONFIG_VERSION + 1 })).toThrow(ConfigError);
  });
});

describe("serializeConfig", () => {
  test("round-trips through parseConfig", () => {
    const config = { ...DEFAULT_CONFIG, title: "NET", rleThreshold: 4 };
    expect(parseConfig(JSON.parse(JSON.stringify(serializeConfig(config))))).toEqual(config);
  });

  test("omits an unset background select", () => {
    expect("backgroundSelect" in serializeConfig({ ...DEFAULT_CONFIG })).toBe(false);
  });
});
