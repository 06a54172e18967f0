import { describe, test, expect } from "vitest";
import { DoubleBuffer } from "../double-buffer.js";
import { PixelBuffer } from "../buffer.js";

describe("DoubleBuffer", () => {
  test("commit hands off the draft and starts a copy", () => {
    const buffers = new DoubleBuffer(2, 1, 0);
    const first = buffers.draft;
    first.set(1, 0, 4);

    const committed = buffers.commit();

    expect(committed).toBe(first);
    expect(buffers.draft).not.toBe(committed);
    expect(buffers.draft.get(1, 0)).toBe(4);
  });

  test("drawing after commit does not touch the committed frame", () => {
    const buffers = new DoubleBuffer(2, 1, 0);
    const committed = buffers.commit();
    buffers.draft.set(0, 0, 7);
    expect(committed.get(0, 0)).toBe(0);
  });

  test("tracks committed buffers until released", () => {
    const buffers = new DoubleBuffer(1, 1);
    const a = buffers.commit();
    buffers.commit();
    expect(buffers.inFlight).toBe(2);
    buffers.release(a);
    expect(buffers.inFlight).toBe(1);
  });

  test("released buffers are reused as drafts", () => {
    const buffers = new DoubleBuffer(2, 1, 0);
    const first = buffers.commit();
    buffers.release(first);
    buffers.draft.set(0, 0, 3);

    buffers.commit();

    expect(buffers.draft).toBe(first);
    expect(buffers.draft.get(0, 0)).toBe(3);
  });

  test("ignores buffers it did not hand out", () => {
    const buffers = new DoubleBuffer(1, 1);
    buffers.commit();
    buffers.release(new PixelBuffer(1, 1));
    expect(buffers.inFlight).toBe(1);
  });
});
