import { SIXEL_CHANNEL_MAX, toSixelRgb, type Color, type RGB } from "./color.js";
import { PaletteExhaustedError } from "./errors.js";

/** Largest number of color registers a Sixel terminal is expected to offer */
export const MAX_PALETTE_SIZE = 256;

/**
 * A registered palette color. Channels are in the Sixel range (0-100).
 */
export interface PaletteEntry {
  readonly index: number;
  readonly r: number;
  readonly g: number;
  readonly b: number;
}

function isChannel(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= SIXEL_CHANNEL_MAX;
}

function checkChannel(name: string, value: number): void {
  if (!isChannel(value)) {
    throw new RangeError(
      `Channel ${name} must be an integer in 0-${SIXEL_CHANNEL_MAX}, got ${value}`,
    );
  }
}

function keyOf(r: number, g: number, b: number): number {
  return (r << 16) | (g << 8) | b;
}

/**
 * Bounded, append-only set of colors with stable indices.
 *
 * Indices are dense: the n-th registered color gets index n. Entries are
 * never removed or changed, so an index stays valid for the palette's life.
 */
export class Palette {
  readonly cap: number;

  private readonly list: PaletteEntry[] = [];
  private readonly lookup = new Map<number, number>();
  private revision = 0;

  constructor(cap: number = MAX_PALETTE_SIZE) {
    if (!Number.isInteger(cap) || cap < 1 || cap > MAX_PALETTE_SIZE) {
      throw new RangeError(
        `Palette cap must be an integer in 1-${MAX_PALETTE_SIZE}, got ${cap}`,
      );
    }
    this.cap = cap;
  }

  /**
   * Build a palette from 8-bit colors, registered in order.
   */
  static fromColors(colors: readonly Color[], cap?: number): Palette {
    const palette = new Palette(cap);
    for (const color of colors) {
      palette.registerColor(color);
    }
    return palette;
  }

  /** Number of registered colors */
  get size(): number {
    return this.list.length;
  }

  /** Increases every time a new color is registered */
  get version(): number {
    return this.revision;
  }

  /**
   * Register a Sixel-range color and return its index.
   * An identical color already in the palette is returned as-is.
   */
  register(r: number, g: number, b: number): number {
    checkChannel("r", r);
    checkChannel("g", g);
    checkChannel("b", b);

    const existing = this.lookup.get(keyOf(r, g, b));
    if (existing !== undefined) return existing;

    if (this.list.length >= this.cap) {
      throw new PaletteExhaustedError(this.cap, [r, g, b]);
    }

    const index = this.list.length;
    this.list.push(Object.freeze({ index, r, g, b }));
    this.lookup.set(keyOf(r, g, b), index);
    this.revision++;
    return index;
  }

  /**
   * Index of the closest registered color by squared Euclidean distance.
   * Exact distance ties resolve to the lowest index.
   */
  quantize(r: number, g: number, b: number): number {
    if (isChannel(r) && isChannel(g) && isChannel(b)) {
      const exact = this.lookup.get(keyOf(r, g, b));
      if (exact !== undefined) return exact;
    }

    if (this.list.length === 0) {
      throw new RangeError("Cannot quantize against an empty palette");
    }

    let nearest = 0;
    let minDist = Infinity;
    for (const entry of this.list) {
      const dr = r - entry.r;
      const dg = g - entry.g;
      const db = b - entry.b;
      const dist = dr * dr + dg * dg + db * db;
      // Strict comparison keeps the lowest index on ties
      if (dist < minDist) {
        minDist = dist;
        nearest = entry.index;
      }
    }
    return nearest;
  }

  /**
   * Register the color, or fall back to the nearest registered color
   * once the palette is full.
   */
  registerOrQuantize(r: number, g: number, b: number): number {
    try {
      return this.register(r, g, b);
    } catch (error) {
      if (error instanceof PaletteExhaustedError) {
        return this.quantize(r, g, b);
      }
      throw error;
    }
  }

  /**
   * Register an 8-bit color (hex string or RGB tuple)
   */
  registerColor(color: Color): number {
    const [r, g, b] = toSixelRgb(color);
    return this.register(r, g, b);
  }

  /**
   * Quantize an 8-bit color (hex string or RGB tuple)
   */
  quantizeColor(color: Color): number {
    const [r, g, b] = toSixelRgb(color);
    return this.quantize(r, g, b);
  }

  has(index: number): boolean {
    return Number.isInteger(index) && index >= 0 && index < this.list.length;
  }

  get(index: number): PaletteEntry | undefined {
    return this.list[index];
  }

  /** Sixel-range channels of an entry, or undefined if not registered */
  rgb(index: number): RGB | undefined {
    const entry = this.list[index];
    return entry ? [entry.r, entry.g, entry.b] : undefined;
  }

  /** Copy of the entries in index order */
  entries(): readonly PaletteEntry[] {
    return this.list.slice();
  }
}

/**
 * A palette whose entries can also be looked up by role name.
 */
export interface NamedPalette<K extends string> {
  palette: Palette;
  color(name: K): number;
}

/**
 * Register a table of role name -> 8-bit color, in declaration order.
 *
 * @example
 * ```typescript
 * const theme = createNamedPalette({
 *   background: "#1e1e1e",
 *   text: [200, 200, 200],
 * });
 * bar(buffer, 0, 0, 4, 4, theme.color("text"));
 * ```
 */
export function createNamedPalette<K extends string>(
  table: Record<K, Color>,
  cap?: number,
): NamedPalette<K> {
  const palette = new Palette(cap);
  const indices = new Map<string, number>();
  for (const name in table) {
    indices.set(name, palette.registerColor(table[name]));
  }
  return {
    palette,
    color(name: K): number {
      const index = indices.get(name);
      if (index === undefined) {
        throw new RangeError(`Unknown palette color: ${name}`);
      }
      return index;
    },
  };
}
