import type { RenderMode } from "../scheduler/RenderScheduler.js";

// Configuration as stored in sixel.json; every field is optional
export interface ConfigFile {
  version?: number;
  width?: number;
  height?: number;
  paletteCap?: number;
  rleThreshold?: number;
  backgroundSelect?: 0 | 1 | 2;
  mode?: RenderMode;
  flushTimeoutMs?: number;
  frameIntervalMs?: number;
  title?: string;
}

// Resolved configuration used at runtime
export interface RenderConfig {
  /** Graph size in pixels */
  width: number;
  height: number;
  paletteCap: number;
  rleThreshold: number;
  /** Omitted from the Sixel introducer when undefined */
  backgroundSelect: 0 | 1 | 2 | undefined;
  mode: RenderMode;
  flushTimeoutMs: number;
  /** Delay between demo frames */
  frameIntervalMs: number;
  title: string;
}

export const CONFIG_FILE_NAME = "sixel.json";

// Current config file version
export const CONFIG_VERSION = 1;

export const DEFAULT_CONFIG: Readonly<RenderConfig> = {
  width: 240,
  height: 60,
  paletteCap: 256,
  rleThreshold: 3,
  backgroundSelect: undefined,
  mode: "inline",
  flushTimeoutMs: 1000,
  frameIntervalMs: 100,
  title: "SIGNAL",
};
