import { describe, test, expect } from "vitest";
import { BitmapFont, DEFAULT_FONT } from "../font.js";
import { GlyphNotFoundError } from "../errors.js";

describe("DEFAULT_FONT", () => {
  test("is 5x7 with one column of spacing", () => {
    expect(DEFAULT_FONT.width).toBe(5);
    expect(DEFAULT_FONT.height).toBe(7);
    expect(DEFAULT_FONT.advance).toBe(6);
  });

  test("covers digits and uppercase letters", () => {
    for (const char of "0123456789ABCDEFGHIJKLMNOPQRSTUVWXYZ") {
      expect(DEFAULT_FONT.has(char)).toBe(true);
    }
  });

  test("matches lowercase to uppercase", () => {
    expect(DEFAULT_FONT.has("h")).toBe(true);
    expect(DEFAULT_FONT.glyph("h")).toEqual(DEFAULT_FONT.glyph("H"));
  });

  test("returns the glyph rows for a character", () => {
    expect(DEFAULT_FONT.glyph("1")).toEqual([4, 12, 4, 4, 4, 4, 14]);
  });

  test("falls back to a hollow box for unknown characters", () => {
    expect(DEFAULT_FONT.has("@")).toBe(false);
    expect(DEFAULT_FONT.glyph("@")).toEqual([31, 17, 17, 17, 17, 17, 31]);
  });
});

describe("BitmapFont", () => {
  test("throws GlyphNotFoundError without a fallback", () => {
    const font = new BitmapFont({
      name: "bare",
      width: 2,
      height: 1,
      spacing: 0,
      glyphs: { X: [3] },
    });
    expect(() => font.glyph("Y")).toThrow(GlyphNotFoundError);
  });

  test("rejects glyphs with the wrong row count", () => {
    expect(
      () =>
        new BitmapFont({
          name: "short",
          width: 3,
          height: 2,
          spacing: 1,
          glyphs: { A: [7] },
        }),
    ).toThrow(RangeError);
  });

  test("rejects rows wider than the font", () => {
    expect(
      () =>
        new BitmapFont({
          name: "wide",
          width: 3,
          height: 1,
          spacing: 1,
          glyphs: { A: [8] },
        }),
    ).toThrow(RangeError);
  });
});
