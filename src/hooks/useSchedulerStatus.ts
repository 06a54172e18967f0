import { useEffect, useState } from "react";
import type { RenderScheduler, SchedulerStats } from "../lib/scheduler/RenderScheduler.js";
import type { SchedulerState } from "../lib/scheduler/SchedulerMachine.js";

export const DEFAULT_STATUS_REFRESH_MS = 1000;

export interface SchedulerStatus extends SchedulerStats {
  state: SchedulerState;
}

function readStatus(scheduler: RenderScheduler): SchedulerStatus {
  return { state: scheduler.state, ...scheduler.stats };
}

function sameStatus(a: SchedulerStatus, b: SchedulerStatus): boolean {
  return (
    a.state === b.state &&
    a.framesFlushed === b.framesFlushed &&
    a.framesSkipped === b.framesSkipped &&
    a.framesDiscarded === b.framesDiscarded &&
    a.flushFailures === b.flushFailures &&
    a.bytesWritten === b.bytesWritten
  );
}

/**
 * Scheduler state and counters, sampled every `refreshMs`.
 *
 * Counters change on every frame. Subscribing to them directly would
 * re-render Ink once per frame, and each Ink render blanks the image.
 */
export function useSchedulerStatus(
  scheduler: RenderScheduler,
  refreshMs: number = DEFAULT_STATUS_REFRESH_MS,
): SchedulerStatus {
  const [status, setStatus] = useState(() => readStatus(scheduler));

  useEffect(() => {
    const refresh = () => {
      const next = readStatus(scheduler);
      setStatus((prev) => (sameStatus(prev, next) ? prev : next));
    };
    refresh();
    const interval = setInterval(refresh, refreshMs);
    return () => clearInterval(interval);
  }, [scheduler, refreshMs]);

  return status;
}

/**
 * Ink rewrites all of its lines on each render, painting blank cells over
 * the image. Invalidate after every commit so the next frame repaints it.
 */
export function useInvalidateOnRender(scheduler: RenderScheduler): void {
  useEffect(() => {
    scheduler.invalidate();
  });
}
