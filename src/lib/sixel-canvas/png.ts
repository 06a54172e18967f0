/**
 * PNG screenshots of pixel buffers
 */

import { decode, encode } from "fast-png";
import { PixelBuffer, UNSET } from "./buffer.js";
import { channelFromSixel, channelToSixel, type RGB } from "./color.js";
import { Palette } from "./palette.js";

/** Where to look up the color of a palette index (channels 0-100) */
export type ColorSource = Palette | ReadonlyMap<number, RGB>;

function lookupRgb(colors: ColorSource, index: number): RGB | undefined {
  return colors instanceof Palette ? colors.rgb(index) : colors.get(index);
}

/**
 * Render a buffer to an 8-bit RGBA PNG. Unset pixels are fully transparent.
 */
export function toPng(buffer: PixelBuffer, colors: ColorSource): Uint8Array {
  const data = new Uint8Array(buffer.width * buffer.height * 4);
  const cells = buffer.cells;

  for (let i = 0; i < cells.length; i++) {
    const index = cells[i] ?? UNSET;
    if (index === UNSET) continue;
    const rgb = lookupRgb(colors, index);
    if (!rgb) continue;
    data[i * 4] = channelFromSixel(rgb[0]);
    data[i * 4 + 1] = channelFromSixel(rgb[1]);
    data[i * 4 + 2] = channelFromSixel(rgb[2]);
    data[i * 4 + 3] = 255;
  }

  return encode({
    width: buffer.width,
    height: buffer.height,
    data,
    depth: 8,
    channels: 4,
  });
}

/**
 * Load a PNG into a buffer, mapping each opaque pixel into the palette.
 * New colors are registered while the palette has room; after that each
 * pixel takes the nearest registered color. Pixels with alpha below 128
 * stay unset.
 */
export function fromPng(bytes: Uint8Array, palette: Palette): PixelBuffer {
  const png = decode(bytes);
  const buffer = new PixelBuffer(png.width, png.height);
  const { channels, data } = png;
  const shift = png.depth === 16 ? 8 : 0;
  const indexed = png.palette;

  for (let i = 0; i < png.width * png.height; i++) {
    const base = i * channels;
    const sample = (offset: number): number => (data[base + offset] ?? 0) >> shift;

    let rgba: [number, number, number, number];
    if (indexed) {
      const entry = indexed[data[base] ?? 0] ?? [0, 0, 0];
      rgba = [entry[0] ?? 0, entry[1] ?? 0, entry[2] ?? 0, entry[3] ?? 255];
    } else if (channels >= 3) {
      rgba = [sample(0), sample(1), sample(2), channels === 4 ? sample(3) : 255];
    } else {
      const gray = sample(0);
      rgba = [gray, gray, gray, channels === 2 ? sample(1) : 255];
    }

    if (rgba[3] < 128) continue;
    const index = palette.registerOrQuantize(
      channelToSixel(rgba[0]),
      channelToSixel(rgba[1]),
      channelToSixel(rgba[2]),
    );
    buffer.set(i % png.width, Math.floor(i / png.width), index);
  }

  return buffer;
}
