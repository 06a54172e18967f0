import { createHash } from "node:crypto";
import type { PixelBuffer } from "./buffer.js";
import type { Palette } from "./palette.js";

/**
 * Fingerprint of everything that affects the encoded stream: dimensions,
 * cell values and the palette's colors. Equal hashes mean the frame would
 * encode to the same bytes.
 */
export function frameHash(buffer: PixelBuffer, palette: Palette): string {
  const hash = createHash("sha1");
  hash.update(`${buffer.width}x${buffer.height};`);

  const cells = buffer.cells;
  hash.update(new Uint8Array(cells.buffer, cells.byteOffset, cells.byteLength));

  hash.update(`;v${palette.version};`);
  for (const entry of palette.entries()) {
    hash.update(`${entry.r},${entry.g},${entry.b};`);
  }

  return hash.digest("hex");
}
