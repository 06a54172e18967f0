import { Box, Text } from "ink";
import { useSelector } from "@xstate/react";
import type { RenderMode, RenderScheduler } from "../lib/scheduler/RenderScheduler.js";
import { useInvalidateOnRender, useSchedulerStatus } from "../hooks/useSchedulerStatus.js";

interface StatusBarProps {
  scheduler: RenderScheduler;
  mode: RenderMode;
  paused: boolean;
  refreshMs?: number;
}

const STATE_COLORS = {
  idle: "gray",
  encoding: "yellow",
  flushing: "cyan",
  stopped: "red",
} as const;

function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KiB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)} MiB`;
}

export default function StatusBar({ scheduler, mode, paused, refreshMs }: StatusBarProps) {
  const { state, framesFlushed: flushed, framesSkipped: skipped, bytesWritten: bytes } =
    useSchedulerStatus(scheduler, refreshMs);
  // Failures are rare, show them right away
  const failures = useSelector(scheduler.actor, (snapshot) => snapshot.context.flushFailures);

  useInvalidateOnRender(scheduler);

  return (
    <Box paddingX={1} justifyContent="space-between">
      <Box gap={2}>
        {/* Play/Pause indicator */}
        <Text color={paused ? "gray" : "green"} bold>
          {paused ? "■ Paused" : "▶ Live"}
        </Text>
        <Text color={STATE_COLORS[state]}>[{state.toUpperCase()}]</Text>
        <Text dimColor>{mode}</Text>
      </Box>

      <Box gap={2}>
        <Text>
          <Text color="cyan" bold>
            {flushed}
          </Text>{" "}
          <Text dimColor>flushed</Text>
        </Text>
        <Text>
          <Text color="cyan" bold>
            {skipped}
          </Text>{" "}
          <Text dimColor>skipped</Text>
        </Text>
        {failures > 0 && <Text color="red">{failures} failed</Text>}
        <Text dimColor>{formatBytes(bytes)}</Text>
      </Box>
    </Box>
  );
}
