import { describe, test, expect, beforeEach, afterEach, vi } from "vitest";
import fs from "fs";
import os from "os";
import path from "path";
import { loadConfig, resolveConfigPath, saveConfig } from "../storage.js";
import { CONFIG_FILE_NAME, DEFAULT_CONFIG } from "../types.js";

describe("config storage", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "sixel-config-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  test("a missing file loads the defaults", () => {
    expect(loadConfig(path.join(dir, CONFIG_FILE_NAME))).toEqual(DEFAULT_CONFIG);
  });

  test("save then load returns the same config", () => {
    const file = path.join(dir, CONFIG_FILE_NAME);
    const config = { ...DEFAULT_CONFIG, width: 64, height: 24, title: "DISK" };
    saveConfig(file, config);
    expect(loadConfig(file)).toEqual(config);
  });

  test("saving leaves no temp file behind", () => {
    saveConfig(path.join(dir, CONFIG_FILE_NAME), DEFAULT_CONFIG);
    expect(fs.readdirSync(dir)).toEqual([CONFIG_FILE_NAME]);
  });

  test("saving creates missing directories", () => {
    const file = path.join(dir, "nested", "deeper", CONFIG_FILE_NAME);
    saveConfig(file, DEFAULT_CONFIG);
    expect(fs.existsSync(file)).toBe(true);
  });

  test("an invalid file is reported and loads the defaults", () => {
    const file = path.join(dir, CONFIG_FILE_NAME);
    fs.writeFileSync(file, JSON.stringify({ paletteCap: 0 }), "utf-8");
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => undefined);

    expect(loadConfig(file)).toEqual(DEFAULT_CONFIG);
    expect(errorSpy).toHaveBeenCalledTimes(1);
  });

  test("unparseable JSON loads the defaults", () => {
    const file = path.join(dir, CONFIG_FILE_NAME);
    fs.writeFileSync(file, "{ not json", "utf-8");
    vi.spyOn(console, "error").mockImplementation(() => undefined);

    expect(loadConfig(file)).toEqual(DEFAULT_CONFIG);
  });

  test("resolveConfigPath looks inside directories", () => {
    expect(resolveConfigPath(dir)).toBe(path.join(dir, CONFIG_FILE_NAME));
  });

  test("resolveConfigPath keeps file paths", () => {
    const file = path.join(dir, "custom.json");
    expect(resolveConfigPath(file)).toBe(file);
  });
});
