import "./setup.js";
import { describe, test, expect } from "vitest";
import { renderHook, act } from "@testing-library/react";
import { useRenderScheduler } from "../useRenderScheduler.js";
import { Palette } from "../../lib/sixel-canvas/palette.js";
import { MemoryOutput } from "../../lib/sixel-canvas/terminal.js";
import type { FrameOutcome } from "../../lib/scheduler/RenderScheduler.js";

const palette = Palette.fromColors(["#000000", "#ffffff"]);

describe("useRenderScheduler", () => {
  test("presents the committed draft and releases it", async () => {
    const output = new MemoryOutput();
    const { result, unmount } = renderHook(() =>
      useRenderScheduler({ width: 4, height: 6, output, fill: 0 }),
    );

    result.current.buffers.draft.set(0, 0, 1);
    let outcome: FrameOutcome | undefined;
    await act(async () => {
      outcome = await result.current.present(palette);
    });

    expect(outcome).toBe("flushed");
    expect(output.frames).toHaveLength(1);
    expect(result.current.buffers.inFlight).toBe(0);
    // The new draft starts from the presented picture
    expect(result.current.buffers.draft.get(0, 0)).toBe(1);
    unmount();
  });

  test("skips a frame that did not change", async () => {
    const output = new MemoryOutput();
    const { result, unmount } = renderHook(() =>
      useRenderScheduler({ width: 4, height: 6, output, fill: 0 }),
    );

    const outcomes: FrameOutcome[] = [];
    await act(async () => {
      outcomes.push(await result.current.present(palette));
      outcomes.push(await result.current.present(palette));
    });

    expect(outcomes).toEqual(["flushed", "unchanged"]);
    expect(output.frames).toHaveLength(1);
    unmount();
  });

  test("shuts the scheduler down on unmount", () => {
    const output = new MemoryOutput();
    const { result, unmount } = renderHook(() =>
      useRenderScheduler({ width: 4, height: 6, output }),
    );
    const { scheduler } = result.current;

    unmount();

    expect(scheduler.state).toBe("stopped");
  });

  test("rebuilds when the size changes", () => {
    const output = new MemoryOutput();
    const { result, rerender, unmount } = renderHook(
      ({ width }: { width: number }) => useRenderScheduler({ width, height: 6, output }),
      { initialProps: { width: 4 } },
    );
    const first = result.current.scheduler;

    rerender({ width: 8 });

    expect(result.current.scheduler).not.toBe(first);
    expect(first.state).toBe("stopped");
    expect(result.current.buffers.width).toBe(8);
    unmount();
  });

  test("uses the latest wrap without rebuilding", async () => {
    const output = new MemoryOutput();
    const { result, rerender, unmount } = renderHook(
      ({ prefix }: { prefix: string }) =>
        useRenderScheduler({
          width: 4,
          height: 6,
          output,
          fill: 0,
          wrap: (sixel) => `${prefix}${sixel}`,
        }),
      { initialProps: { prefix: "A:" } },
    );
    const first = result.current.scheduler;

    rerender({ prefix: "B:" });
    await act(async () => {
      await result.current.present(palette);
    });

    expect(result.current.scheduler).toBe(first);
    expect(output.frames[0]?.startsWith("B:\x1bP")).toBe(true);
    unmount();
  });
});
