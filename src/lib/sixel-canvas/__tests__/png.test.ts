import { describe, test, expect } from "vitest";
import { decode } from "fast-png";
import { PixelBuffer, UNSET } from "../buffer.js";
import type { RGB } from "../color.js";
import { Palette } from "../palette.js";
import { fromPng, toPng } from "../png.js";

function sample(): { buffer: PixelBuffer; palette: Palette } {
  const palette = Palette.fromColors(["#000000", "#ff0000"]);
  const buffer = new PixelBuffer(2, 2);
  buffer.set(0, 0, 1);
  buffer.set(1, 0, 0);
  buffer.set(1, 1, 1);
  return { buffer, palette };
}

describe("toPng", () => {
  test("writes RGBA with unset pixels transparent", () => {
    const { buffer, palette } = sample();
    const png = decode(toPng(buffer, palette));
    expect(png.width).toBe(2);
    expect(png.height).toBe(2);
    expect(png.channels).toBe(4);
    expect(Array.from(png.data)).toEqual([
      255, 0, 0, 255, 0, 0, 0, 255, 0, 0, 0, 0, 255, 0, 0, 255,
    ]);
  });

  test("accepts decoded color maps", () => {
    const buffer = new PixelBuffer(1, 1, 5);
    const png = decode(toPng(buffer, new Map<number, RGB>([[5, [0, 0, 100]]])));
    expect(Array.from(png.data)).toEqual([0, 0, 255, 255]);
  });
});

describe("fromPng", () => {
  test("registers colors in pixel order", () => {
    const { buffer, palette } = sample();
    const target = new Palette();
    const loaded = fromPng(toPng(buffer, palette), target);

    expect(target.rgb(0)).toEqual([100, 0, 0]);
    expect(target.rgb(1)).toEqual([0, 0, 0]);
    expect(loaded.get(0, 0)).toBe(0);
    expect(loaded.get(1, 0)).toBe(1);
    expect(loaded.get(0, 1)).toBe(UNSET);
    expect(loaded.get(1, 1)).toBe(0);
  });

  test("quantizes once the palette is full", () => {
    const { buffer, palette } = sample();
    const target = new Palette(1);
    target.register(90, 10, 10);
    const loaded = fromPng(toPng(buffer, palette), target);
    expect(loaded.usedIndices()).toEqual([0]);
    expect(target.size).toBe(1);
  });
});
