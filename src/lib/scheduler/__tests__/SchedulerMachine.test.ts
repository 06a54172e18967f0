import { describe, test, expect } from "vitest";
import { createActor } from "xstate";
import { schedulerMachine } from "../SchedulerMachine.js";

function createSchedulerActor() {
  return createActor(schedulerMachine).start();
}

// Drive one frame through encode and flush
function flushFrame(actor: ReturnType<typeof createSchedulerActor>, hash: string, bytes: number) {
  actor.send({ type: "FRAME", hash });
  actor.send({ type: "ENCODED", bytes });
  actor.send({ type: "FLUSHED" });
}

describe("SchedulerMachine", () => {
  describe("initial state", () => {
    test("starts idle", () => {
      const actor = createSchedulerActor();
      expect(actor.getSnapshot().value).toBe("idle");
    });

    test("starts with no flushed frame", () => {
      const actor = createSchedulerActor();
      expect(actor.getSnapshot().context.lastFlushedHash).toBeNull();
    });

    test("starts with zeroed counters", () => {
      const { context } = createSchedulerActor().getSnapshot();
      expect(context.framesFlushed).toBe(0);
      expect(context.framesSkipped).toBe(0);
      expect(context.bytesWritten).toBe(0);
    });
  });

  describe("frame lifecycle", () => {
    test("FRAME moves to encoding and remembers the hash", () => {
      const actor = createSchedulerActor();
      actor.send({ type: "FRAME", hash: "a" });
      expect(actor.getSnapshot().value).toBe("encoding");
      expect(actor.getSnapshot().context.inFlightHash).toBe("a");
    });

    test("ENCODED moves to flushing", () => {
      const actor = createSchedulerActor();
      actor.send({ type: "FRAME", hash: "a" });
      actor.send({ type: "ENCODED", bytes: 10 });
      expect(actor.getSnapshot().value).toBe("flushing");
    });

    test("FLUSHED returns to idle and records the frame", () => {
      const actor = createSchedulerActor();
      flushFrame(actor, "a", 10);
      const snapshot = actor.getSnapshot();
      expect(snapshot.value).toBe("idle");
      expect(snapshot.context.lastFlushedHash).toBe("a");
      expect(snapshot.context.inFlightHash).toBeNull();
      expect(snapshot.context.framesFlushed).toBe(1);
      expect(snapshot.context.bytesWritten).toBe(10);
    });

    test("bytes accumulate across frames", () => {
      const actor = createSchedulerActor();
      flushFrame(actor, "a", 10);
      flushFrame(actor, "b", 7);
      expect(actor.getSnapshot().context.bytesWritten).toBe(17);
    });

    test("FRAME is ignored while a frame is in flight", () => {
      const actor = createSchedulerActor();
      actor.send({ type: "FRAME", hash: "a" });
      actor.send({ type: "FRAME", hash: "b" });
      expect(actor.getSnapshot().context.inFlightHash).toBe("a");
    });
  });

  describe("unchanged frames", () => {
    test("a frame matching the last flushed hash is skipped", () => {
      const actor = createSchedulerActor();
      flushFrame(actor, "a", 10);
      actor.send({ type: "FRAME", hash: "a" });
      expect(actor.getSnapshot().value).toBe("idle");
      expect(actor.getSnapshot().context.framesSkipped).toBe(1);
    });

    test("a different frame is encoded", () => {
      const actor = createSchedulerActor();
      flushFrame(actor, "a", 10);
      actor.send({ type: "FRAME", hash: "b" });
      expect(actor.getSnapshot().value).toBe("encoding");
    });
  
    test("INVALIDATE makes an identical frame encode again", () => {
      const actor = createSchedulerActor();
      flushFrame(actor, "a", 10);
      actor.send({ type: "INVALIDATE" });
      expect(actor.getSnapshot().context.lastFlushedHash).toBeNull();
      actor.send({ type: "FRAME", hash: "a" });
      expect(actor.getSnapshot().value).toBe("encoding");
      expect(actor.getSnapshot().context.framesSkipped).toBe(0);
    });

    test("INVALIDATE during a flush is not undone by its completion", () => {
      const actor = createSchedulerActor();
      actor.send({ type: "FRAME", hash: "a" });
      actor.send({ type: "ENCODED", bytes: 10 });
      actor.send({ type: "INVALIDATE" });
      actor.send({ type: "FLUSHED" });

      const { context } = actor.getSnapshot();
      expect(context.framesFlushed).toBe(1);
      expect(context.lastFlushedHash).toBeNull();
      expect(context.invalidated).toBe(false);
    });
  });

  describe("failures", () => {
    test("FLUSH_FAILED returns to idle without recording the frame", () => {
      const actor = createSchedulerActor();
      actor.send({ type: "FRAME", hash: "a" });
      actor.send({ type: "ENCODED", bytes: 10 });
      actor.send({ type: "FLUSH_FAILED" });
      const snapshot = actor.getSnapshot();
      expect(snapshot.value).toBe("idle");
      expect(snapshot.context.lastFlushedHash).toBeNull();
      expect(snapshot.context.flushFailures).toBe(1);
      expect(snapshot.context.bytesWritten).toBe(0);
    });

    test("ENCODE_FAILED returns to idle", () => {
      const actor = createSchedulerActor();
      actor.send({ type: "FRAME", hash: "a" });
      actor.send({ type: "ENCODE_FAILED" });
      expect(actor.getSnapshot().value).toBe("idle");
      expect(actor.getSnapshot().context.inFlightHash).toBeNull();
    });
  });

  describe("shutdown", () => {
    test("stops immediately from idle", () => {
      const actor = createSchedulerActor();
      actor.send({ type: "SHUTDOWN" });
      expect(actor.getSnapshot().value).toBe("stopped");
      expect(actor.getSnapshot().status).toBe("done");
    });

    test("discards a frame that finishes encoding after shutdown", () => {
      const actor = createSchedulerActor();
      actor.send({ type: "FRAME", hash: "a" });
      actor.send({ type: "SHUTDOWN" });
      expect(actor.getSnapshot().value).toBe("encoding");
      actor.send({ type: "ENCODED", bytes: 10 });
      expect(actor.getSnapshot().value).toBe("stopped");
      expect(actor.getSnapshot().context.framesDiscarded).toBe(1);
      expect(actor.getSnapshot().context.framesFlushed).toBe(0);
    });

    test("lets a flush in progress complete", () => {
      const actor = createSchedulerActor();
      actor.send({ type: "FRAME", hash: "a" });
      actor.send({ type: "ENCODED", bytes: 10 });
      actor.send({ type: "SHUTDOWN" });
      expect(actor.getSnapshot().value).toBe("flushing");
      actor.send({ type: "FLUSHED" });
      expect(actor.getSnapshot().value).toBe("stopped");
      expect(actor.getSnapshot().context.framesFlushed).toBe(1);
    });

    test("stops after a failed flush", () => {
      const actor = createSchedulerActor();
      actor.send({ type: "FRAME", hash: "a" });
      actor.send({ type: "ENCODED", bytes: 10 });
      actor.send({ type: "SHUTDOWN" });
      actor.send({ type: "FLUSH_FAILED" });
      expect(actor.getSnapshot().value).toBe("stopped");
    });
  });
});
