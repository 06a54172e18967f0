import { createActor, type Actor } from "xstate";
import type { PixelBuffer } from "../sixel-canvas/buffer.js";
import { encodeSixel, type SixelEncodeOptions } from "../sixel-canvas/encoder.js";
import { FlushError } from "../sixel-canvas/errors.js";
import { frameHash } from "../sixel-canvas/hash.js";
import type { Palette } from "../sixel-canvas/palette.js";
import type { TerminalOutput } from "../sixel-canvas/terminal.js";
import {
  schedulerMachine,
  type SchedulerContext,
  type SchedulerState,
} from "./SchedulerMachine.js";

export const DEFAULT_FLUSH_TIMEOUT_MS = 1000;

/**
 * What happened to a submitted frame.
 * - flushed: written to the output
 * - unchanged: identical to the last flushed frame, nothing written
 * - superseded: replaced by a newer frame before encoding started
 * - discarded: encoded while shutting down, never written
 * - stopped: submitted after shutdown, or still waiting when it happened
 */
export type FrameOutcome =
  | "flushed"
  | "unchanged"
  | "superseded"
  | "discarded"
  | "stopped";

/**
 * inline encodes on the caller's turn; background defers encoding to the
 * next macrotask so the caller can keep drawing into its next buffer
 */
export type RenderMode = "inline" | "background";

export interface Frame {
  buffer: PixelBuffer;
  palette: Palette;
}

export interface RenderSchedulerOptions {
  output: TerminalOutput;
  mode?: RenderMode;
  encoder?: SixelEncodeOptions;
  /** Applied to each encoded frame before it is written, e.g. positioning */
  wrap?: (sixel: string) => string;
  flushTimeoutMs?: number;
  /** Called once the scheduler no longer needs a submitted buffer */
  onRelease?: (buffer: PixelBuffer) => void;
}

export type SchedulerStats = Pick<
  SchedulerContext,
  | "framesFlushed"
  | "framesSkipped"
  | "framesDiscarded"
  | "flushFailures"
  | "bytesWritten"
>;

interface Job {
  frame: Frame;
  hash: string;
  resolve: (outcome: FrameOutcome) => void;
  reject: (error: unknown) => void;
}

/**
 * Serializes frames to a TerminalOutput, one at a time.
 *
 * At most one frame is encoding or flushing. Frames submitted meanwhile wait
 * in a single slot where the newest wins. A frame identical to the last one
 * written is skipped.
 */
export class RenderScheduler {
  readonly actor: Actor<typeof schedulerMachine>;

  private readonly output: TerminalOutput;
  private readonly mode: RenderMode;
  private readonly encoderOptions: SixelEncodeOptions;
  private readonly wrap: ((sixel: string) => string) | undefined;
  private readonly flushTimeoutMs: number;
  private readonly onRelease: ((buffer: PixelBuffer) => void) | undefined;
  private pending: Job | null = null;

  constructor(options: RenderSchedulerOptions) {
    const flushTimeoutMs = options.flushTimeoutMs ?? DEFAULT_FLUSH_TIMEOUT_MS;
    if (!(flushTimeoutMs > 0)) {
      throw new RangeError(`Flush timeout must be positive, got ${flushTimeoutMs}`);
    }

    this.output = options.output;
    this.mode = options.mode ?? "inline";
    this.encoderOptions = options.encoder ?? {};
    this.wrap = options.wrap;
    this.flushTimeoutMs = flushTimeoutMs;
    this.onRelease = options.onRelease;
    this.actor = createActor(schedulerMachine).start();
  }

  get state(): SchedulerState {
    return this.actor.getSnapshot().value;
  }

  get stats(): SchedulerStats {
    const {
      framesFlushed,
      framesSkipped,
      framesDiscarded,
      flushFailures,
      bytesWritten,
    } = this.actor.getSnapshot().context;
    return { framesFlushed, framesSkipped, framesDiscarded, flushFailures, bytesWritten };
  }

  /** True while a frame is waiting behind the one in flight */
  get hasPending(): boolean {
    return this.pending !== null;
  }

  /**
   * Queue a frame for output. The buffer must not be written to until the
   * returned promise settles (or `onRelease` hands it back).
   * @throws FlushError (via the promise) when the write fails or times out
   * @throws EncodingError (via the promise) when the buffer does not match
   *   its palette
   */
  submit(frame: Frame): Promise<FrameOutcome> {
    return new Promise<FrameOutcome>((resolve, reject) => {
      const job: Job = {
        frame,
        hash: frameHash(frame.buffer, frame.palette),
        resolve,
        reject,
      };

      switch (this.state) {
        case "stopped":
          this.finish(job, "stopped");
          return;
        case "idle":
          this.start(job);
          return;
        case "encoding":
        case "flushing": {
          const replaced = this.pending;
          this.pending = job;
          if (replaced) this.finish(replaced, "superseded");
          return;
        }
      }
    });
  }

  /**
   * Forget the last flushed frame so the next one is written even if it is
   * identical. Call when something else has drawn over the image.
   */
  invalidate(): void {
    this.actor.send({ type: "INVALIDATE" });
  }

  /**
   * Stop accepting frames. A frame already flushing is allowed to finish;
   * one still encoding is discarded, as is any waiting frame.
   */
  shutdown(): void {
    this.actor.send({ type: "SHUTDOWN" });
    const waiting = this.pending;
    this.pending = null;
    if (waiting) this.finish(waiting, "stopped");
  }

  private start(job: Job): void {
    this.actor.send({ type: "FRAME", hash: job.hash });
    if (this.state !== "encoding") {
      this.finish(job, "unchanged");
      return;
    }
    this.run(job).catch((error: unknown) => this.fail(job, error));
  }

  private async run(job: Job): Promise<void> {
    let data: string;
    try {
      data = await this.encode(job.frame);
    } catch (error) {
      this.actor.send({ type: "ENCODE_FAILED" });
      this.fail(job, error);
      this.drain();
      return;
    }

    this.actor.send({ type: "ENCODED", bytes: data.length });
    if (this.state === "stopped") {
      this.finish(job, "discarded");
      return;
    }

    try {
      await this.flush(data);
    } catch (error) {
      this.actor.send({ type: "FLUSH_FAILED" });
      this.fail(
        job,
        error instanceof FlushError
          ? error
          : new FlushError("Terminal write failed", { cause: error }),
      );
      this.drain();
      return;
    }

    this.actor.send({ type: "FLUSHED" });
    this.finish(job, "flushed");
    this.drain();
  }

  private async encode(frame: Frame): Promise<string> {
    if (this.mode === "background") {
      await new Promise<void>((resolve) => setImmediate(resolve));
    }
    const sixel = encodeSixel(frame.buffer, frame.palette, this.encoderOptions);
    return this.wrap ? this.wrap(sixel) : sixel;
  }

  private async flush(data: string): Promise<void> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(new FlushError(`Terminal write timed out after ${this.flushTimeoutMs}ms`));
      }, this.flushTimeoutMs);
    });

    try {
      await Promise.race([this.output.write(data), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  // Start the waiting frame, if any, once the scheduler is idle again
  private drain(): void {
    const next = this.pending;
    if (!next) return;

    if (this.state === "stopped") {
      this.pending = null;
      this.finish(next, "stopped");
      return;
    }
    if (this.state !== "idle") return;

    this.pending = null;
    this.start(next);
  }

  private finish(job: Job, outcome: FrameOutcome): void {
    this.onRelease?.(job.frame.buffer);
    job.resolve(outcome);
  }

  private fail(job: Job, error: unknown): void {
    this.onRelease?.(job.frame.buffer);
    job.reject(error);
  }
}
