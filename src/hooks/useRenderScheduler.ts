import { useMemo, useEffect, useCallback, useRef } from "react";
import { DoubleBuffer } from "../lib/sixel-canvas/double-buffer.js";
import type { Palette } from "../lib/sixel-canvas/palette.js";
import type { SixelEncodeOptions } from "../lib/sixel-canvas/encoder.js";
import type { TerminalOutput } from "../lib/sixel-canvas/terminal.js";
import {
  RenderScheduler,
  type FrameOutcome,
  type RenderMode,
} from "../lib/scheduler/RenderScheduler.js";

export interface UseRenderSchedulerOptions {
  width: number;
  height: number;
  output: TerminalOutput;
  /** Fill for a fresh draft buffer (default UNSET) */
  fill?: number;
  mode?: RenderMode;
  rleThreshold?: number;
  backgroundSelect?: SixelEncodeOptions["backgroundSelect"];
  flushTimeoutMs?: number;
  /** Applied to each encoded frame, e.g. to position it on screen */
  wrap?: (sixel: string) => string;
}

export interface RenderHandle {
  scheduler: RenderScheduler;
  buffers: DoubleBuffer;
  /** Commit the current draft and queue it for output */
  present: (palette: Palette) => Promise<FrameOutcome>;
}

/**
 * Owns a RenderScheduler and the DoubleBuffer feeding it.
 * Both are rebuilt when the size or encoder settings change; the old
 * scheduler is shut down, as is the last one on unmount.
 */
export function useRenderScheduler(
  options: UseRenderSchedulerOptions,
): RenderHandle {
  const {
    width,
    height,
    output,
    fill,
    mode,
    rleThreshold,
    backgroundSelect,
    flushTimeoutMs,
    wrap,
  } = options;
  const wrapRef = useRef(wrap);

  // Keep wrap ref up to date without rebuilding the scheduler
  useEffect(() => {
    wrapRef.current = wrap;
  }, [wrap]);

  const { scheduler, buffers } = useMemo(() => {
    const buffers = new DoubleBuffer(width, height, fill);
    const scheduler = new RenderScheduler({
      output,
      mode,
      encoder: { rleThreshold, backgroundSelect },
      flushTimeoutMs,
      wrap: (sixel) => (wrapRef.current ? wrapRef.current(sixel) : sixel),
      onRelease: (buffer) => buffers.release(buffer),
    });
    return { scheduler, buffers };
  }, [width, height, fill, output, mode, rleThreshold, backgroundSelect, flushTimeoutMs]);

  // Cleanup on unmount or rebuild
  useEffect(() => {
    return () => {
      scheduler.shutdown();
    };
  }, [scheduler]);

  const present = useCallback(
    (palette: Palette) => scheduler.submit({ buffer: buffers.commit(), palette }),
    [scheduler, buffers],
  );

  return useMemo(() => ({ scheduler, buffers, present }), [scheduler, buffers, present]);
}
