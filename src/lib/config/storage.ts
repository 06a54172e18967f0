import fs from "fs";
import path from "path";
import type { RenderConfig } from "./types.js";
import { CONFIG_FILE_NAME, DEFAULT_CONFIG } from "./types.js";
import { parseConfig, serializeConfig } from "./serializer.js";

/**
 * Resolve the config file location. A directory argument means the
 * sixel.json inside it; no argument means the working directory.
 */
export function resolveConfigPath(target?: string): string {
  const resolved = path.resolve(target ?? ".");
  if (fs.existsSync(resolved) && fs.statSync(resolved).isDirectory()) {
    return path.join(resolved, CONFIG_FILE_NAME);
  }
  return resolved;
}

/**
 * Load a config from disk. A missing file yields the defaults; an invalid
 * one is reported and also yields the defaults.
 */
export function loadConfig(configPath: string): RenderConfig {
  if (!fs.existsSync(configPath)) {
    return { ...DEFAULT_CONFIG };
  }

  try {
    const content = fs.readFileSync(configPath, "utf-8");
    return parseConfig(JSON.parse(content));
  } catch (error) {
    console.error("Failed to load config:", error);
    return { ...DEFAULT_CONFIG };
  }
}

/**
 * Save a config to disk (atomic write)
 */
export function saveConfig(configPath: string, config: RenderConfig): void {
  const dir = path.dirname(configPath);
  const tempFile = path.join(dir, `.${path.basename(configPath)}.tmp`);

  try {
    // Ensure directory exists
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }

    // Write to temp file first
    const content = JSON.stringify(serializeConfig(config), null, 2);
    fs.writeFileSync(tempFile, content, "utf-8");

    // Atomic rename
    fs.renameSync(tempFile, configPath);
  } catch (error) {
    // Clean up temp file if it exists
    if (fs.existsSync(tempFile)) {
      fs.unlinkSync(tempFile);
    }
    throw error;
  }
}
