#!/usr/bin/env node
import { render } from "ink";
import App from "./src/App.js";
import { loadConfig, resolveConfigPath } from "./src/lib/config/storage.js";
import { Terminal, createTerminalOutput } from "./src/lib/sixel-canvas/terminal.js";

// Parse CLI arguments
const args = process.argv.slice(2);
const configArg = args[0];

// Resolve and load configuration (defaults when absent)
const configPath = resolveConfigPath(configArg);
const config = loadConfig(configPath);

if (!Terminal.isSixelSupported()) {
  console.warn(
    `Terminal (TERM=${process.env.TERM ?? "unset"}) may not support Sixel graphics`,
  );
}

// Use alternate screen buffer for fullscreen experience
process.stdout.write(Terminal.ENTER_ALT_SCREEN);
process.stdout.write(Terminal.HIDE_CURSOR);

const restoreScreen = () => {
  process.stdout.write(Terminal.SHOW_CURSOR);
  process.stdout.write(Terminal.EXIT_ALT_SCREEN);
};

const instance = render(<App config={config} output={createTerminalOutput("stdout")} />);

instance
  .waitUntilExit()
  .then(restoreScreen)
  .catch((error: unknown) => {
    restoreScreen();
    console.error("Exited with error:", error);
    process.exitCode = 1;
  });
