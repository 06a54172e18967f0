import { setup, assign } from "xstate";

// Events the scheduler machine can receive
export type SchedulerEvent =
  | { type: "FRAME"; hash: string }
  | { type: "ENCODED"; bytes: number }
  | { type: "ENCODE_FAILED" }
  | { type: "FLUSHED" }
  | { type: "FLUSH_FAILED" }
  | { type: "INVALIDATE" }
  | { type: "SHUTDOWN" };

// Context stored in the state machine
export interface SchedulerContext {
  /** Hash of the last frame that reached the terminal */
  lastFlushedHash: string | null;
  /** Hash of the frame being encoded or flushed */
  inFlightHash: string | null;
  inFlightBytes: number;
  /** The screen changed while a frame was in flight; don't trust its hash */
  invalidated: boolean;
  shuttingDown: boolean;
  framesFlushed: number;
  framesSkipped: number;
  framesDiscarded: number;
  flushFailures: number;
  bytesWritten: number;
}

export type SchedulerState = "idle" | "encoding" | "flushing" | "stopped";

// Idle -> Encoding -> Flushing -> Idle, with Stopped once shut down
export const schedulerMachine = setup({
  types: {
    context: {} as SchedulerContext,
    events: {} as SchedulerEvent,
  },
  actions: {
    beginFrame: assign({
      inFlightHash: ({ context, event }) => {
        if (event.type !== "FRAME") return context.inFlightHash;
        return event.hash;
      },
      inFlightBytes: () => 0,
    }),
    countSkip: assign({
      framesSkipped: ({ context }) => context.framesSkipped + 1,
    }),
    recordEncoded: assign({
      inFlightBytes: ({ context, event }) => {
        if (event.type !== "ENCODED") return context.inFlightBytes;
        return event.bytes;
      },
    }),
    recordFlush: assign({
      lastFlushedHash: ({ context }) =>
        context.invalidated ? null : context.inFlightHash,
      invalidated: () => false,
      inFlightHash: () => null,
      inFlightBytes: () => 0,
      framesFlushed: ({ context }) => context.framesFlushed + 1,
      bytesWritten: ({ context }) => context.bytesWritten + context.inFlightBytes,
    }),
    recordFlushFailure: assign({
      invalidated: () => false,
      inFlightHash: () => null,
      inFlightBytes: () => 0,
      flushFailures: ({ context }) => context.flushFailures + 1,
    }),
    discardFrame: assign({
      invalidated: () => false,
      inFlightHash: () => null,
      inFlightBytes: () => 0,
      framesDiscarded: ({ context }) => context.framesDiscarded + 1,
    }),
    clearInFlight: assign({
      invalidated: () => false,
      inFlightHash: () => null,
      inFlightBytes: () => 0,
    }),
    forgetFlushed: assign({
      lastFlushedHash: () => null,
      invalidated: ({ context }) => context.inFlightHash !== null,
    }),
    markShutdown: assign({
      shuttingDown: () => true,
    }),
  },
  guards: {
    // Same picture as what the terminal already shows
    isUnchanged: ({ context, event }) => {
      if (event.type !== "FRAME") return false;
      return event.hash === context.lastFlushedHash;
    },
    isShuttingDown: ({ context }) => context.shuttingDown,
  },
}).createMachine({
  id: "renderScheduler",
  initial: "idle",
  // Whatever the terminal showed may have been painted over
  on: {
    INVALIDATE: {
      actions: "forgetFlushed",
    },
  },
  context: {
    lastFlushedHash: null,
    inFlightHash: null,
    inFlightBytes: 0,
    invalidated: false,
    shuttingDown: false,
    framesFlushed: 0,
    framesSkipped: 0,
    framesDiscarded: 0,
    flushFailures: 0,
    bytesWritten: 0,
  },
  states: {
    idle: {
      on: {
        FRAME: [
          {
            guard: "isUnchanged",
            actions: "countSkip",
          },
          {
            target: "encoding",
            actions: "beginFrame",
          },
        ],
        SHUTDOWN: {
          target: "stopped",
          actions: "markShutdown",
        },
      },
    },
    encoding: {
      on: {
        ENCODED: [
          {
            // Encode was allowed to finish but its result is thrown away
            guard: "isShuttingDown",
            target: "stopped",
            actions: "discardFrame",
          },
          {
            target: "flushing",
            actions: "recordEncoded",
          },
        ],
        ENCODE_FAILED: [
          {
            guard: "isShuttingDown",
            target: "stopped",
            actions: "clearInFlight",
          },
          {
            target: "idle",
            actions: "clearInFlight",
          },
        ],
        SHUTDOWN: {
          actions: "markShutdown",
        },
      },
    },
    flushing: {
      on: {
        FLUSHED: [
          {
            guard: "isShuttingDown",
            target: "stopped",
            actions: "recordFlush",
          },
          {
            target: "idle",
            actions: "recordFlush",
          },
        ],
        FLUSH_FAILED: [
          {
            guard: "isShuttingDown",
            target: "stopped",
            actions: "recordFlushFailure",
          },
          {
            target: "idle",
            actions: "recordFlushFailure",
          },
        ],
        SHUTDOWN: {
          actions: "markShutdown",
        },
      },
    },
    stopped: {
      type: "final",
    },
  },
});
