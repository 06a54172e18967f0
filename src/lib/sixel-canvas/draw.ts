/**
 * Drawing primitives
 *
 * Pure functions over a PixelBuffer. They know nothing about encoding and
 * rely on the buffer to drop off-canvas pixels, so any coordinates are safe.
 */

import type { PixelBuffer } from "./buffer.js";
import type { BitmapFont } from "./font.js";

/**
 * Draw a horizontal line (inclusive of both ends)
 */
export function hline(
  buf: PixelBuffer,
  x1: number,
  x2: number,
  y: number,
  index: number,
): void {
  const start = Math.max(0, Math.min(x1, x2));
  const end = Math.min(buf.width - 1, Math.max(x1, x2));
  for (let x = start; x <= end; x++) {
    buf.set(x, y, index);
  }
}

/**
 * Draw a vertical line (inclusive of both ends)
 */
export function vline(
  buf: PixelBuffer,
  x: number,
  y1: number,
  y2: number,
  index: number,
): void {
  const start = Math.max(0, Math.min(y1, y2));
  const end = Math.min(buf.height - 1, Math.max(y1, y2));
  for (let y = start; y <= end; y++) {
    buf.set(x, y, index);
  }
}

/**
 * Draw a line using Bresenham's algorithm.
 * Each pixel, endpoints included, is visited exactly once.
 */
export function line(
  buf: PixelBuffer,
  x0: number,
  y0: number,
  x1: number,
  y1: number,
  index: number,
): void {
  if (![x0, y0, x1, y1].every(Number.isFinite)) return;

  x0 = Math.round(x0);
  y0 = Math.round(y0);
  x1 = Math.round(x1);
  y1 = Math.round(y1);

  const dx = Math.abs(x1 - x0);
  const dy = Math.abs(y1 - y0);
  const sx = x0 < x1 ? 1 : -1;
  const sy = y0 < y1 ? 1 : -1;
  let err = dx - dy;

  let x = x0;
  let y = y0;

  while (true) {
    buf.set(x, y, index);
    if (x === x1 && y === y1) break;
    const e2 = 2 * err;
    if (e2 > -dy) {
      err -= dy;
      x += sx;
    }
    if (e2 < dx) {
      err += dx;
      y += sy;
    }
  }
}

/**
 * Draw a rectangle, filled or as a one-pixel outline
 */
export function rect(
  buf: PixelBuffer,
  x: number,
  y: number,
  w: number,
  h: number,
  index: number,
  filled = false,
): void {
  if (w <= 0 || h <= 0) return;

  if (!filled) {
    hline(buf, x, x + w - 1, y, index); // Top
    hline(buf, x, x + w - 1, y + h - 1, index); // Bottom
    vline(buf, x, y, y + h - 1, index); // Left
    vline(buf, x + w - 1, y, y + h - 1, index); // Right
    return;
  }

  const x1 = Math.max(0, x);
  const y1 = Math.max(0, y);
  const x2 = Math.min(buf.width, x + w);
  const y2 = Math.min(buf.height, y + h);

  for (let py = y1; py < y2; py++) {
    for (let px = x1; px < x2; px++) {
      buf.set(px, py, index);
    }
  }
}

export type Corner = "topLeft" | "topRight" | "bottomLeft" | "bottomRight";

export const ALL_CORNERS: readonly Corner[] = [
  "topLeft",
  "topRight",
  "bottomLeft",
  "bottomRight",
];

// Pixels cut from the outer edge of each row of a corner, outermost row first.
// A pixel stays when its center lies within the corner's circle.
function cornerInsets(radius: number): number[] {
  return Array.from({ length: radius }, (_, row) => {
    const dy = radius - row - 0.5;
    let inset = 0;
    while (inset < radius && (radius - inset - 0.5) ** 2 + dy * dy > radius * radius) {
      inset++;
    }
    return inset;
  });
}

/**
 * Rectangle with rounded corners, filled or as a one-pixel outline.
 * The radius is capped at half the shorter side; corners left out of
 * `corners` stay square.
 */
export function roundedRect(
  buf: PixelBuffer,
  x: number,
  y: number,
  w: number,
  h: number,
  radius: number,
  index: number,
  filled = false,
  corners: readonly Corner[] = ALL_CORNERS,
): void {
  if (w <= 0 || h <= 0) return;

  const r = Math.max(0, Math.min(Math.floor(radius), Math.floor(Math.min(w, h) / 2)));
  const insets = cornerInsets(r);

  // Inclusive column span of one row, relative to x
  const span = (row: number): [number, number] => {
    let left = 0;
    let right = w - 1;
    if (row < r) {
      const inset = insets[row] ?? 0;
      if (corners.includes("topLeft")) left = inset;
      if (corners.includes("topRight")) right = w - 1 - inset;
    } else if (row > h - 1 - r) {
      const inset = insets[h - 1 - row] ?? 0;
      if (corners.includes("bottomLeft")) left = inset;
      if (corners.includes("bottomRight")) right = w - 1 - inset;
    }
    return [left, right];
  };

  const inside = (col: number, row: number): boolean => {
    if (row < 0 || row >= h) return false;
    const [left, right] = span(row);
    return col >= left && col <= right;
  };

  for (let row = 0; row < h; row++) {
    const [left, right] = span(row);
    if (filled) {
      hline(buf, x + left, x + right, y + row, index);
      continue;
    }
    // Outline: shape pixels with a neighbour outside the shape
    for (let col = left; col <= right; col++) {
      const edge =
        col === left ||
        col === right ||
        !inside(col, row - 1) ||
        !inside(col, row + 1);
      if (edge) buf.set(x + col, y + row, index);
    }
  }
}

/**
 * Horizontal progress bar: a track, then a fill proportional to
 * value / maxV, then an optional border. All three share the radius.
 * @returns Width of the filled part in pixels
 */
export function progressBar(
  buf: PixelBuffer,
  x: number,
  y: number,
  w: number,
  h: number,
  value: number,
  maxV: number,
  trackIndex: number,
  fillIndex: number,
  radius = 0,
  borderIndex?: number,
): number {
  if (w <= 0 || h <= 0) return 0;

  roundedRect(buf, x, y, w, h, radius, trackIndex, true);

  const ratio = maxV > 0 ? Math.max(0, Math.min(value / maxV, 1)) : 0;
  const fillWidth = Number.isNaN(ratio) ? 0 : Math.floor(ratio * w);
  if (fillWidth > 0) {
    roundedRect(buf, x, y, fillWidth, h, radius, fillIndex, true);
  }

  if (borderIndex !== undefined) {
    roundedRect(buf, x, y, w, h, radius, borderIndex);
  }
  return fillWidth;
}

/**
 * Filled column for graphs
 */
export function bar(
  buf: PixelBuffer,
  x: number,
  y: number,
  w: number,
  h: number,
  index: number,
): void {
  rect(buf, x, y, w, h, index, true);
}

/**
 * Draw a circle using the midpoint algorithm
 */
export function circle(
  buf: PixelBuffer,
  cx: number,
  cy: number,
  radius: number,
  index: number,
  filled = false,
): void {
  if (radius < 0) return;

  let x = radius;
  let y = 0;
  let err = 1 - radius;

  while (x >= y) {
    if (filled) {
      hline(buf, cx - x, cx + x, cy + y, index);
      hline(buf, cx - x, cx + x, cy - y, index);
      hline(buf, cx - y, cx + y, cy + x, index);
      hline(buf, cx - y, cx + y, cy - x, index);
    } else {
      buf.set(cx + x, cy + y, index);
      buf.set(cx + y, cy + x, index);
      buf.set(cx - y, cy + x, index);
      buf.set(cx - x, cy + y, index);
      buf.set(cx - x, cy - y, index);
      buf.set(cx - y, cy - x, index);
      buf.set(cx + y, cy - x, index);
      buf.set(cx + x, cy - y, index);
    }

    y += 1;
    if (err < 0) {
      err += 2 * y + 1;
    } else {
      x -= 1;
      err += 2 * (y - x) + 1;
    }
  }
}

/**
 * Stamp one character cell. Set bits take `index`; clear bits are left alone.
 * Characters missing from the font draw the font's fallback glyph.
 */
export function glyph(
  buf: PixelBuffer,
  font: BitmapFont,
  char: string,
  x: number,
  y: number,
  index: number,
  scale = 1,
): void {
  const rows = font.glyph(char);
  rows.forEach((bits, row) => {
    for (let col = 0; col < font.width; col++) {
      if (bits & (1 << (font.width - 1 - col))) {
        bar(buf, x + col * scale, y + row * scale, scale, scale, index);
      }
    }
  });
}

/**
 * Draw a string left to right.
 * @returns Horizontal advance in pixels
 */
export function text(
  buf: PixelBuffer,
  font: BitmapFont,
  str: string,
  x: number,
  y: number,
  index: number,
  scale = 1,
): number {
  let cursorX = x;
  for (const char of str) {
    glyph(buf, font, char, cursorX, y, index, scale);
    cursorX += font.advance * scale;
  }
  return cursorX - x;
}

/**
 * Width of a string in pixels, excluding the spacing after the last glyph
 */
export function measureText(font: BitmapFont, str: string, scale = 1): number {
  const count = [...str].length;
  if (count === 0) return 0;
  return count * font.advance * scale - font.spacing * scale;
}

/**
 * Column height for one graph sample, in [0, h - 1]
 */
export function columnHeight(
  value: number,
  h: number,
  minV: number,
  maxV: number,
): number {
  const top = h - 1;
  if (maxV === minV) {
    return Math.floor(top / 2);
  }
  const raw = Math.round(((value - minV) / (maxV - minV)) * top);
  if (!Number.isFinite(raw)) return 0;
  return Math.max(0, Math.min(top, raw));
}

/**
 * Draw a series as columns, one pixel wide, standing on the bottom edge.
 *
 * The newest value is the rightmost column; older values scroll left and
 * drop off once there are more values than columns.
 *
 * @returns Heights of the drawn columns, oldest first
 */
export function graph(
  buf: PixelBuffer,
  values: readonly number[],
  x: number,
  y: number,
  w: number,
  h: number,
  minV: number,
  maxV: number,
  index: number,
): number[] {
  if (w <= 0 || h <= 0) return [];

  const visible = values.slice(-w);
  const firstColumn = x + w - visible.length;
  const baseline = y + h;

  return visible.map((value, i) => {
    const height = columnHeight(value, h, minV, maxV);
    bar(buf, firstColumn + i, baseline - height, 1, height, index);
    return height;
  });
}

/**
 * Connected line graph with an optional filled area beneath the line.
 * Values are clamped to [0, maxV]; only the last `w` values are drawn.
 */
export function lineGraph(
  buf: PixelBuffer,
  values: readonly number[],
  x: number,
  y: number,
  w: number,
  h: number,
  maxV: number,
  lineIndex: number,
  fillIndex?: number,
): void {
  if (values.length === 0 || w <= 0 || h <= 0 || maxV <= 0) return;

  const data = values.slice(-w);
  const bottom = y + h - 1;

  const points = data.map((value, i) => {
    const clamped = Math.max(0, Math.min(value, maxV));
    const py = bottom - Math.floor((clamped / maxV) * (h - 1));
    const px =
      data.length === 1
        ? x + w - 1
        : x + Math.floor((i * (w - 1)) / (data.length - 1));
    return { x: px, y: py };
  });

  if (fillIndex !== undefined) {
    points.forEach((point, i) => {
      vline(buf, point.x, point.y, bottom, fillIndex);
      const prev = points[i - 1];
      if (!prev) return;
      // Fill the columns between two samples under the interpolated line
      for (let gx = prev.x + 1; gx < point.x; gx++) {
        const t = (gx - prev.x) / (point.x - prev.x);
        const gy = Math.floor(prev.y + t * (point.y - prev.y));
        vline(buf, gx, gy, bottom, fillIndex);
      }
    });
  }

  points.forEach((point, i) => {
    const prev = points[i - 1];
    if (prev) {
      line(buf, prev.x, prev.y, point.x, point.y, lineIndex);
    } else {
      buf.set(point.x, point.y, lineIndex);
    }
  });
}

export interface Series {
  values: readonly number[];
  lineIndex: number;
  fillIndex?: number;
}

/**
 * Two line graphs sharing one area and scale. The second series is drawn
 * over the first.
 */
export function dualLineGraph(
  buf: PixelBuffer,
  back: Series,
  front: Series,
  x: number,
  y: number,
  w: number,
  h: number,
  maxV: number,
): void {
  for (const series of [back, front]) {
    lineGraph(buf, series.values, x, y, w, h, maxV, series.lineIndex, series.fillIndex);
  }
}
