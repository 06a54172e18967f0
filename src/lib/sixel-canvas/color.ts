/**
 * Color utilities
 *
 * Colors enter the library as 8-bit RGB (hex strings or tuples) and are
 * stored in palettes in the Sixel range, where each channel is 0-100.
 */

export type RGB = [number, number, number];
export type Color = string | RGB;

/** Sixel color channel maximum */
export const SIXEL_CHANNEL_MAX = 100;

/**
 * Parse hex color to RGB
 */
export function hexToRgb(hex: string): RGB {
  const result = /^#?([a-f\d]{2})([a-f\d]{2})([a-f\d]{2})$/i.exec(hex);
  if (!result || !result[1] || !result[2] || !result[3]) {
    throw new RangeError(`Invalid hex color: ${hex}`);
  }
  return [
    parseInt(result[1], 16),
    parseInt(result[2], 16),
    parseInt(result[3], 16),
  ];
}

/**
 * Parse HSL to RGB
 */
export function hslToRgb(h: number, s: number, l: number): RGB {
  h = h / 360;
  s = s / 100;
  l = l / 100;

  let r: number, g: number, b: number;

  if (s === 0) {
    r = g = b = l;
  } else {
    const hue2rgb = (p: number, q: number, t: number): number => {
      if (t < 0) t += 1;
      if (t > 1) t -= 1;
      if (t < 1 / 6) return p + (q - p) * 6 * t;
      if (t < 1 / 2) return q;
      if (t < 2 / 3) return p + (q - p) * (2 / 3 - t) * 6;
      return p;
    };

    const q = l < 0.5 ? l * (1 + s) : l + s - l * s;
    const p = 2 * l - q;
    r = hue2rgb(p, q, h + 1 / 3);
    g = hue2rgb(p, q, h);
    b = hue2rgb(p, q, h - 1 / 3);
  }

  return [Math.round(r * 255), Math.round(g * 255), Math.round(b * 255)];
}

/**
 * Parse any color format to 8-bit RGB
 */
export function toRgb(color: Color): RGB {
  if (typeof color === "string") {
    return hexToRgb(color);
  }
  return [color[0], color[1], color[2]];
}

/**
 * Convert an 8-bit channel (0-255) to the Sixel range (0-100), rounding down
 */
export function channelToSixel(value: number): number {
  const clamped = Math.max(0, Math.min(255, Math.round(value)));
  return Math.floor((clamped * SIXEL_CHANNEL_MAX) / 255);
}

/**
 * Convert a Sixel channel (0-100) back to 8 bits
 */
export function channelFromSixel(value: number): number {
  return Math.round((value * 255) / SIXEL_CHANNEL_MAX);
}

/**
 * Convert any color to Sixel RGB (each channel 0-100)
 */
export function toSixelRgb(color: Color): RGB {
  const [r, g, b] = toRgb(color);
  return [channelToSixel(r), channelToSixel(g), channelToSixel(b)];
}
