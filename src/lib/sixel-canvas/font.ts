import font5x7 from "./fonts/5x7.json" with { type: "json" };
import { GlyphNotFoundError } from "./errors.js";

/**
 * Fixed-size bitmap font as stored on disk.
 *
 * Each glyph is `height` rows; each row is a bit field `width` bits wide
 * with the most significant bit as the leftmost pixel.
 */
export interface FontDefinition {
  name: string;
  width: number;
  height: number;
  /** Blank columns between glyphs when drawing text */
  spacing: number;
  /** Drawn for characters the font does not define */
  fallback?: readonly number[];
  glyphs: Record<string, readonly number[]>;
}

function checkRows(
  def: FontDefinition,
  char: string,
  rows: readonly number[],
): void {
  if (rows.length !== def.height) {
    throw new RangeError(
      `Glyph ${JSON.stringify(char)} in font ${def.name} has ${rows.length} rows, expected ${def.height}`,
    );
  }
  const limit = 1 << def.width;
  for (const row of rows) {
    if (!Number.isInteger(row) || row < 0 || row >= limit) {
      throw new RangeError(
        `Glyph ${JSON.stringify(char)} in font ${def.name} has a row wider than ${def.width} bits`,
      );
    }
  }
}

export class BitmapFont {
  readonly name: string;
  readonly width: number;
  readonly height: number;
  readonly spacing: number;

  private readonly glyphs = new Map<string, readonly number[]>();
  private readonly fallback: readonly number[] | null;

  constructor(def: FontDefinition) {
    this.name = def.name;
    this.width = def.width;
    this.height = def.height;
    this.spacing = def.spacing;

    for (const [char, rows] of Object.entries(def.glyphs)) {
      checkRows(def, char, rows);
      this.glyphs.set(char, rows);
    }

    if (def.fallback) {
      checkRows(def, "fallback", def.fallback);
    }
    this.fallback = def.fallback ?? null;
  }

  /** Horizontal distance from one glyph to the next at scale 1 */
  get advance(): number {
    return this.width + this.spacing;
  }

  /**
   * Whether the font has a glyph of its own for this character
   * (lowercase letters match their uppercase glyph)
   */
  has(char: string): boolean {
    return this.lookup(char) !== undefined;
  }

  /**
   * Rows of the glyph for a character, or the fallback glyph
   * @throws GlyphNotFoundError when neither exists
   */
  glyph(char: string): readonly number[] {
    const rows = this.lookup(char) ?? this.fallback;
    if (!rows) {
      throw new GlyphNotFoundError(char);
    }
    return rows;
  }

  private lookup(char: string): readonly number[] | undefined {
    return this.glyphs.get(char) ?? this.glyphs.get(char.toUpperCase());
  }
}

/**
 * The built-in 5x7 font: digits, uppercase letters and common punctuation
 */
export const DEFAULT_FONT = new BitmapFont(font5x7);
