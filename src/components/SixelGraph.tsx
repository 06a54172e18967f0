/**
 * Scrolling Sixel graph
 *
 * Draws a synthetic signal into the scheduler's draft buffer on a timer and
 * presents each frame. Ink only reserves the cells; the image itself is
 * written by the scheduler at a fixed screen position.
 */

import { useEffect, useRef } from "react";
import { Text } from "ink";
import {
  graph,
  hline,
  lineGraph,
  measureText,
  progressBar,
  text,
} from "../lib/sixel-canvas/draw.js";
import { DEFAULT_FONT } from "../lib/sixel-canvas/font.js";
import type { NamedPalette } from "../lib/sixel-canvas/palette.js";
import type { RenderHandle } from "../hooks/useRenderScheduler.js";

// Pixels per terminal cell (approximate)
export const PIXELS_PER_COLUMN = 8;
export const PIXELS_PER_ROW = 16;

export type GraphColor = "background" | "grid" | "fill" | "line" | "text";

export const GRAPH_COLORS: Record<GraphColor, string> = {
  background: "#14181e",
  grid: "#28323c",
  fill: "#0a5a32",
  line: "#00dc64",
  text: "#e6e6e6",
};

const HEADER_HEIGHT = DEFAULT_FONT.height + 4;

/**
 * Synthetic signal in [0, 100]
 */
export function sampleSignal(t: number): number {
  return 50 + 35 * Math.sin(t / 8) + 10 * Math.sin(t / 3);
}

interface SixelGraphProps {
  handle: RenderHandle;
  theme: NamedPalette<GraphColor>;
  width: number; // Pixel width
  height: number; // Pixel height
  title: string;
  frameIntervalMs: number;
  paused: boolean;
}

export function SixelGraph({
  handle,
  theme,
  width,
  height,
  title,
  frameIntervalMs,
  paused,
}: SixelGraphProps) {
  const samplesRef = useRef<number[]>([]);
  const tickRef = useRef(0);
  const pausedRef = useRef(paused);

  useEffect(() => {
    pausedRef.current = paused;
  }, [paused]);

  // Animation loop
  useEffect(() => {
    const { buffers, present } = handle;

    const drawFrame = () => {
      if (!pausedRef.current) {
        samplesRef.current.push(sampleSignal(tickRef.current++));
        if (samplesRef.current.length > width) samplesRef.current.shift();
      }

      const buf = buffers.draft;
      const samples = samplesRef.current;
      const plotHeight = height - HEADER_HEIGHT;

      buf.clear(theme.color("background"));

      // Quarter grid lines
      for (let i = 1; i < 4; i++) {
        hline(buf, 0, width - 1, HEADER_HEIGHT + Math.floor((plotHeight * i) / 4), theme.color("grid"));
      }

      graph(buf, samples, 0, HEADER_HEIGHT, width, plotHeight, 0, 100, theme.color("fill"));
      lineGraph(buf, samples, 0, HEADER_HEIGHT, width, plotHeight, 100, theme.color("line"));

      const titleWidth = text(buf, DEFAULT_FONT, title, 2, 2, theme.color("text"));
      const latest = samples[samples.length - 1];
      if (latest !== undefined) {
        const label = latest.toFixed(1);
        const labelX = width - 2 - measureText(DEFAULT_FONT, label);
        text(buf, DEFAULT_FONT, label, labelX, 2, theme.color("text"));

        // Level meter between the title and the reading
        const meterX = 2 + titleWidth + 4;
        progressBar(
          buf,
          meterX,
          3,
          labelX - 6 - meterX,
          5,
          latest,
          100,
          theme.color("grid"),
          theme.color("line"),
          2,
        );
      }

      present(theme.palette).catch((error: unknown) => {
        console.error("Frame failed:", error);
      });
    };

    drawFrame();
    const interval = setInterval(drawFrame, frameIntervalMs);
    return () => clearInterval(interval);
  }, [handle, theme, width, height, title, frameIntervalMs]);

  // Blank cells the image is painted over
  const columns = Math.ceil(width / PIXELS_PER_COLUMN);
  const rows = Math.ceil(height / PIXELS_PER_ROW);
  const placeholder = Array.from({ length: rows }, () => " ".repeat(columns)).join("\n");

  return <Text>{placeholder}</Text>;
}

export default SixelGraph;
