/**
 * Sixel encoder - serializes a PixelBuffer against a Palette
 *
 * Stream layout:
 *
 * ```
 * ESC P [P1;P2] q           device control string introducer
 * "1;1;W;H                  raster attributes (1:1 aspect, W x H pixels)
 * #i;2;R;G;B ...            one definition per color used, RGB in 0-100
 * #i <sixels> $ #j <sixels> band 0: one pass per color, $ returns to column 0
 * -                         next band
 * ...
 * ESC \                     string terminator
 * ```
 *
 * A sixel character is 63 + a 6-bit mask; bit 0 is the top row of the band.
 *
 * @see https://vt100.net/docs/vt3xx-gp/chapter14.html
 */

import { UNSET, type PixelBuffer } from "./buffer.js";
import { EncodingError } from "./errors.js";
import type { Palette } from "./palette.js";

export const DCS = "\x1bP";
export const ST = "\x1b\\";
export const SIXEL_CARRIAGE_RETURN = "$";
export const SIXEL_NEWLINE = "-";
export const SIXEL_REPEAT = "!";
export const SIXEL_BASE = 63;
export const BAND_HEIGHT = 6;

/** Default minimum run length written as a repeat */
export const DEFAULT_RLE_THRESHOLD = 3;

export interface SixelEncodeOptions {
  /** Runs at least this long are written as `!count` + char (default 3) */
  rleThreshold?: number;
  /**
   * DCS P2. 0 = device default, 1 = unset pixels keep the screen contents,
   * 2 = unset pixels take the background color. Omitted from the stream
   * when undefined.
   */
  backgroundSelect?: 0 | 1 | 2;
  /** Write the raster attributes after the introducer (default true) */
  emitRaster?: boolean;
}

export interface SixelOutput {
  /** Complete sequence, DCS through ST */
  data: string;
  /** Length in bytes; the stream is plain ASCII */
  bytes: number;
  /** Number of color definitions emitted */
  colors: number;
  /** Number of 6-row bands */
  bands: number;
}

// Pre-computed sixel character lookup table (0-63 -> '?' to '~')
const SIXEL_CHARS: string[] = [];
for (let i = 0; i < 64; i++) {
  SIXEL_CHARS.push(String.fromCharCode(SIXEL_BASE + i));
}

function sixelChar(mask: number): string {
  return SIXEL_CHARS[mask & 0x3f] ?? "?";
}

/**
 * Write one run of identical column masks
 */
function encodeRun(mask: number, count: number, threshold: number): string {
  const char = sixelChar(mask);
  if (count >= threshold) {
    return `${SIXEL_REPEAT}${count}${char}`;
  }
  return char.repeat(count);
}

/**
 * Run-length encode a full row of column masks
 */
export function encodeMasks(
  masks: ArrayLike<number>,
  threshold: number = DEFAULT_RLE_THRESHOLD,
): string {
  const parts: string[] = [];
  let i = 0;

  while (i < masks.length) {
    const mask = masks[i] ?? 0;
    let count = 1;
    while (i + count < masks.length && masks[i + count] === mask) {
      count++;
    }
    parts.push(encodeRun(mask, count, threshold));
    i += count;
  }

  return parts.join("");
}

/**
 * Introducer plus raster attributes
 */
export function sixelHeader(
  width: number,
  height: number,
  options: SixelEncodeOptions = {},
): string {
  const params =
    options.backgroundSelect === undefined ? "" : `0;${options.backgroundSelect}`;
  const raster = options.emitRaster === false ? "" : `"1;1;${width};${height}`;
  return `${DCS}${params}q${raster}`;
}

/**
 * Check every cell against the palette, collecting the colors in use.
 * @throws EncodingError on the first cell outside the palette
 */
function collectColors(buffer: PixelBuffer, palette: Palette): number[] {
  const used = new Uint8Array(palette.size);
  const cells = buffer.cells;

  for (let i = 0; i < cells.length; i++) {
    const value = cells[i] ?? UNSET;
    if (value === UNSET) continue;
    if (!palette.has(value)) {
      throw new EncodingError(
        i % buffer.width,
        Math.floor(i / buffer.width),
        value,
        palette.size,
      );
    }
    used[value] = 1;
  }

  const colors: number[] = [];
  used.forEach((flag, index) => {
    if (flag) colors.push(index);
  });
  return colors;
}

function colorDefinitions(palette: Palette, colors: readonly number[]): string {
  return colors
    .map((index) => {
      const [r, g, b] = palette.rgb(index) ?? [0, 0, 0];
      return `#${index};2;${r};${g};${b}`;
    })
    .join("");
}

/**
 * Encode one band. Colors are written in ascending index order and colors
 * absent from the band are skipped. Every color pass spans the full width,
 * zero-mask runs included, so all passes start and end on the same column.
 */
function encodeBand(
  buffer: PixelBuffer,
  bandTop: number,
  colors: readonly number[],
  masks: Map<number, Uint8Array>,
  threshold: number,
): string {
  const { width } = buffer;
  const rows = Math.min(BAND_HEIGHT, buffer.height - bandTop);
  const cells = buffer.cells;

  for (const color of colors) {
    masks.get(color)?.fill(0);
  }

  const present = new Set<number>();
  for (let dy = 0; dy < rows; dy++) {
    const rowOffset = (bandTop + dy) * width;
    const bit = 1 << dy;
    for (let x = 0; x < width; x++) {
      const value = cells[rowOffset + x] ?? UNSET;
      if (value === UNSET) continue;
      const row = masks.get(value);
      if (!row) continue;
      row[x] = (row[x] ?? 0) | bit;
      present.add(value);
    }
  }

  const passes: string[] = [];
  for (const color of colors) {
    const row = masks.get(color);
    if (!row || !present.has(color)) continue;
    passes.push(`#${color}${encodeMasks(row, threshold)}`);
  }

  return passes.join(SIXEL_CARRIAGE_RETURN);
}

/**
 * Encode a buffer and report stream statistics
 * @throws EncodingError if a cell references a color outside the palette
 */
export function encodeSixelStats(
  buffer: PixelBuffer,
  palette: Palette,
  options: SixelEncodeOptions = {},
): SixelOutput {
  const threshold = options.rleThreshold ?? DEFAULT_RLE_THRESHOLD;
  if (!Number.isInteger(threshold) || threshold < 1) {
    throw new RangeError(`RLE threshold must be a positive integer, got ${threshold}`);
  }

  const { width, height } = buffer;
  const header = sixelHeader(width, height, options);

  if (width === 0 || height === 0) {
    const data = `${header}${ST}`;
    return { data, bytes: data.length, colors: 0, bands: 0 };
  }

  const colors = collectColors(buffer, palette);

  // One reusable mask row per color in use
  const masks = new Map<number, Uint8Array>();
  for (const color of colors) {
    masks.set(color, new Uint8Array(width));
  }

  const bands: string[] = [];
  for (let top = 0; top < height; top += BAND_HEIGHT) {
    bands.push(encodeBand(buffer, top, colors, masks, threshold));
  }

  const data = `${header}${colorDefinitions(palette, colors)}${bands.join(SIXEL_NEWLINE)}${ST}`;

  return {
    data,
    bytes: data.length,
    colors: colors.length,
    bands: bands.length,
  };
}

/**
 * Encode a buffer as a complete Sixel sequence
 * @throws EncodingError if a cell references a color outside the palette
 */
export function encodeSixel(
  buffer: PixelBuffer,
  palette: Palette,
  options: SixelEncodeOptions = {},
): string {
  return encodeSixelStats(buffer, palette, options).data;
}
