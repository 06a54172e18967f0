import { useState, useMemo, useCallback } from "react";
import { Box, Text, useInput, useApp } from "ink";
import { TitledBox } from "@mishieck/ink-titled-box";
import { createNamedPalette } from "./lib/sixel-canvas/palette.js";
import { positioned, synchronized, type TerminalOutput } from "./lib/sixel-canvas/terminal.js";
import type { RenderConfig } from "./lib/config/types.js";
import { useRenderScheduler } from "./hooks/useRenderScheduler.js";
import SixelGraph, { GRAPH_COLORS } from "./components/SixelGraph.js";
import StatusBar from "./components/StatusBar.js";

// Screen cell of the graph's top-left corner, just inside the titled border
const GRAPH_COLUMN = 1;
const GRAPH_ROW = 1;

interface AppProps {
  config: RenderConfig;
  output: TerminalOutput;
}

export default function App({ config, output }: AppProps) {
  const { exit } = useApp();
  const [paused, setPaused] = useState(false);

  const theme = useMemo(
    () => createNamedPalette(GRAPH_COLORS, config.paletteCap),
    [config.paletteCap],
  );

  const wrap = useCallback(
    (sixel: string) => synchronized(positioned(sixel, GRAPH_COLUMN, GRAPH_ROW)),
    [],
  );

  const handle = useRenderScheduler({
    width: config.width,
    height: config.height,
    output,
    fill: theme.color("background"),
    mode: config.mode,
    rleThreshold: config.rleThreshold,
    backgroundSelect: config.backgroundSelect,
    flushTimeoutMs: config.flushTimeoutMs,
    wrap,
  });

  // Global keybindings
  useInput((input) => {
    if (input === "q") {
      handle.scheduler.shutdown();
      exit();
      return;
    }

    // Space - Pause/Resume the signal; paused frames repeat and are skipped
    if (input === " ") {
      setPaused((prev) => !prev);
      return;
    }
  });

  return (
    <Box flexDirection="column">
      <TitledBox
        flexDirection="column"
        borderStyle="round"
        borderColor="cyan"
        titles={[config.title]}
      >
        <SixelGraph
          handle={handle}
          theme={theme}
          width={config.width}
          height={config.height}
          title={config.title}
          frameIntervalMs={config.frameIntervalMs}
          paused={paused}
        />
      </TitledBox>

      <StatusBar scheduler={handle.scheduler} mode={config.mode} paused={paused} />

      <Box paddingX={1}>
        <Text dimColor>Space:Pause | q:Quit</Text>
      </Box>
    </Box>
  );
}
