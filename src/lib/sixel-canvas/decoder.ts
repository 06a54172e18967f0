/**
 * Sixel decoder
 *
 * Reads back the subset of DEC Sixel this library writes: introducer
 * parameters, raster attributes, RGB color definitions and selections,
 * repeats, carriage returns and band advances. Anything else between the
 * introducer and the terminator is ignored, as a terminal would.
 */

import { PixelBuffer, UNSET } from "./buffer.js";
import type { RGB } from "./color.js";
import { BAND_HEIGHT, DCS, SIXEL_BASE, ST } from "./encoder.js";
import { DecodeError } from "./errors.js";

export interface DecodedSixel {
  width: number;
  height: number;
  /** Color registers defined by the stream, channels in 0-100 */
  colors: Map<number, RGB>;
  /** Pixels hold the color register that painted them */
  buffer: PixelBuffer;
  /** Number of band advances (`-`) seen */
  bandAdvances: number;
}

class Reader {
  pos: number;

  constructor(
    readonly input: string,
    start: number,
  ) {
    this.pos = start;
  }

  peek(): string | undefined {
    return this.input[this.pos];
  }

  /** Read `;`-separated decimal parameters; empty parameters read as 0 */
  params(): number[] {
    const values: number[] = [];
    let current = "";
    let sawAny = false;
    while (this.pos < this.input.length) {
      const ch = this.input[this.pos] ?? "";
      if (ch >= "0" && ch <= "9") {
        current += ch;
        sawAny = true;
      } else if (ch === ";") {
        values.push(current === "" ? 0 : Number(current));
        current = "";
        sawAny = true;
      } else {
        break;
      }
      this.pos++;
    }
    if (sawAny) values.push(current === "" ? 0 : Number(current));
    return values;
  }
}

/**
 * Parse a complete Sixel sequence (DCS ... ST)
 * @throws DecodeError when the introducer, a color definition or the
 *   terminator is malformed
 */
export function decodeSixel(stream: string): DecodedSixel {
  const start = stream.indexOf(DCS);
  if (start < 0) {
    throw new DecodeError("Missing device control string introducer", 0);
  }

  const reader = new Reader(stream, start + DCS.length);
  reader.params();
  if (reader.peek() !== "q") {
    throw new DecodeError("Expected sixel mode 'q'", reader.pos);
  }
  reader.pos++;

  const colors = new Map<number, RGB>();
  const rows: number[][] = [];
  let rasterWidth: number | null = null;
  let rasterHeight: number | null = null;
  let color = 0;
  let x = 0;
  let bandTop = 0;
  let bandAdvances = 0;
  let maxX = 0;
  let maxY = 0;
  let terminated = false;

  const paint = (mask: number, count: number): void => {
    for (let bit = 0; bit < BAND_HEIGHT; bit++) {
      if (!(mask & (1 << bit))) continue;
      const y = bandTop + bit;
      const row = rows[y] ?? (rows[y] = []);
      for (let i = 0; i < count; i++) {
        row[x + i] = color;
      }
      maxY = Math.max(maxY, y + 1);
      maxX = Math.max(maxX, x + count);
    }
    x += count;
  };

  while (reader.pos < stream.length) {
    if (stream.startsWith(ST, reader.pos)) {
      terminated = true;
      break;
    }

    const ch = stream[reader.pos] ?? "";
    const code = ch.charCodeAt(0);
    reader.pos++;

    if (code >= SIXEL_BASE && code <= SIXEL_BASE + 63) {
      paint(code - SIXEL_BASE, 1);
      continue;
    }

    switch (ch) {
      case '"': {
        const [, , width, height] = reader.params();
        rasterWidth = width ?? null;
        rasterHeight = height ?? null;
        break;
      }
      case "#": {
        const at = reader.pos;
        const [register, space, r, g, b] = reader.params();
        if (register === undefined) {
          throw new DecodeError("Color directive without a register", at);
        }
        if (space !== undefined) {
          if (space !== 2 || r === undefined || g === undefined || b === undefined) {
            throw new DecodeError("Only RGB color definitions are supported", at);
          }
          colors.set(register, [r, g, b]);
        }
        color = register;
        break;
      }
      case "!": {
        const at = reader.pos;
        const [count] = reader.params();
        const next = stream.charCodeAt(reader.pos);
        if (count === undefined || next < SIXEL_BASE || next > SIXEL_BASE + 63) {
          throw new DecodeError("Malformed repeat", at);
        }
        reader.pos++;
        paint(next - SIXEL_BASE, count);
        break;
      }
      case "$":
        x = 0;
        break;
      case "-":
        x = 0;
        bandTop += BAND_HEIGHT;
        bandAdvances++;
        break;
      default:
        break;
    }
  }

  if (!terminated) {
    throw new DecodeError("Missing string terminator", stream.length);
  }

  const width = rasterWidth ?? maxX;
  const height = rasterHeight ?? maxY;
  const buffer = new PixelBuffer(width, height, UNSET);
  rows.forEach((row, y) => {
    row.forEach((value, px) => buffer.set(px, y, value));
  });

  return { width, height, colors, buffer, bandAdvances };
}
