import { SixelCanvasError } from "../sixel-canvas/errors.js";
import { MAX_PALETTE_SIZE } from "../sixel-canvas/palette.js";
import type { ConfigFile, RenderConfig } from "./types.js";
import { CONFIG_VERSION, DEFAULT_CONFIG } from "./types.js";

/**
 * A configuration file has the right shape but an unusable value.
 */
export class ConfigError extends SixelCanvasError {
  constructor(
    readonly field: string,
    message: string,
  ) {
    super(`Invalid config field "${field}": ${message}`);
  }
}

const BACKGROUND_SELECTS: readonly unknown[] = [0, 1, 2];
const MODES: readonly unknown[] = ["inline", "background"];

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isOptional(value: unknown, type: "number" | "string"): boolean {
  return value === undefined || typeof value === type;
}

/**
 * Validate a config file structure
 */
export function validateConfig(file: unknown): file is ConfigFile {
  if (!isObject(file)) return false;

  if (file.version !== undefined && typeof file.version !== "number") return false;
  if (!isOptional(file.width, "number")) return false;
  if (!isOptional(file.height, "number")) return false;
  if (!isOptional(file.paletteCap, "number")) return false;
  if (!isOptional(file.rleThreshold, "number")) return false;
  if (!isOptional(file.flushTimeoutMs, "number")) return false;
  if (!isOptional(file.frameIntervalMs, "number")) return false;
  if (!isOptional(file.title, "string")) return false;
  if (file.backgroundSelect !== undefined && !BACKGROUND_SELECTS.includes(file.backgroundSelect)) {
    return false;
  }
  if (file.mode !== undefined && !MODES.includes(file.mode)) return false;

  return true;
}

/**
 * Migrate older config formats to current version
 */
export function migrateConfig(file: ConfigFile): ConfigFile {
  const migrated = { ...file };

  // Unversioned files predate the version field and share its layout
  if (!migrated.version || migrated.version < 1) {
    migrated.version = 1;
  }

  return migrated;
}

function positiveInteger(field: string, value: number): number {
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigError(field, `expected a positive integer, got ${value}`);
  }
  return value;
}

/**
 * Turn parsed JSON into a runtime config, filling unset fields with defaults
 * @throws ConfigError on a malformed file or an out-of-range value
 */
export function parseConfig(json: unknown): RenderConfig {
  if (!validateConfig(json)) {
    throw new ConfigError("(root)", "not a config object");
  }

  const file = migrateConfig(json);
  const version = file.version ?? CONFIG_VERSION;
  if (version > CONFIG_VERSION) {
    throw new ConfigError(
      "version",
      `file version ${version} is newer than supported version ${CONFIG_VERSION}`,
    );
  }

  const paletteCap = positiveInteger("paletteCap", file.paletteCap ?? DEFAULT_CONFIG.paletteCap);
  if (paletteCap > MAX_PALETTE_SIZE) {
    throw new ConfigError("paletteCap", `must be at most ${MAX_PALETTE_SIZE}, got ${paletteCap}`);
  }

  return {
    width: positiveInteger("width", file.width ?? DEFAULT_CONFIG.width),
    height: positiveInteger("height", file.height ?? DEFAULT_CONFIG.height),
    paletteCap,
    rleThreshold: positiveInteger("rleThreshold", file.rleThreshold ?? DEFAULT_CONFIG.rleThreshold),
    backgroundSelect: file.backgroundSelect ?? DEFAULT_CONFIG.backgroundSelect,
    mode: file.mode ?? DEFAULT_CONFIG.mode,
    flushTimeoutMs: positiveInteger(
      "flushTimeoutMs",
      file.flushTimeoutMs ?? DEFAULT_CONFIG.flushTimeoutMs,
    ),
    frameIntervalMs: positiveInteger(
      "frameIntervalMs",
      file.frameIntervalMs ?? DEFAULT_CONFIG.frameIntervalMs,
    ),
    title: file.title ?? DEFAULT_CONFIG.title,
  };
}

/**
 * Serialize runtime config to config file format
 */
export function serializeConfig(config: RenderConfig): ConfigFile {
  const file: ConfigFile = {
    version: CONFIG_VERSION,
    width: config.width,
    height: config.height,
    paletteCap: config.paletteCap,
    rleThreshold: config.rleThreshold,
    mode: config.mode,
    flushTimeoutMs: config.flushTimeoutMs,
    frameIntervalMs: config.frameIntervalMs,
    title: config.title,
  };
  if (config.backgroundSelect !== undefined) {
    file.backgroundSelect = config.backgroundSelect;
  }
  return file;
}
