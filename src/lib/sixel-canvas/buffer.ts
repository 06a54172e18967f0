/**
 * PixelBuffer - 2D grid of palette indices
 */

/** Cell value for a pixel that has not been drawn */
export const UNSET = -1;

/** Largest index a cell can hold */
export const MAX_CELL_INDEX = 0x7fffffff;

function checkIndex(index: number): void {
  if (index === UNSET) return;
  if (!Number.isInteger(index) || index < 0 || index > MAX_CELL_INDEX) {
    throw new RangeError(
      `Palette index must be UNSET or an integer in 0-${MAX_CELL_INDEX}, got ${index}`,
    );
  }
}

/**
 * Indexed pixel buffer. Each cell holds a palette index or UNSET.
 *
 * Writes outside the buffer are ignored so drawing code never has to clip.
 * Indices are stored as given; whether they exist in a palette is checked
 * when the buffer is encoded.
 */
export class PixelBuffer {
  readonly width: number;
  readonly height: number;
  private readonly data: Int32Array; // row-major palette indices

  constructor(width: number, height: number, fill: number = UNSET) {
    if (!Number.isInteger(width) || width < 0) {
      throw new RangeError(`Buffer width must be a non-negative integer, got ${width}`);
    }
    if (!Number.isInteger(height) || height < 0) {
      throw new RangeError(`Buffer height must be a non-negative integer, got ${height}`);
    }
    this.width = width;
    this.height = height;
    this.data = new Int32Array(width * height);
    this.clear(fill);
  }

  /**
   * Row-major cell values, index = y * width + x
   */
  get cells(): Readonly<Int32Array> {
    return this.data;
  }

  /**
   * Whether (x, y) is an integer coordinate inside the buffer
   */
  contains(x: number, y: number): boolean {
    return (
      Number.isInteger(x) &&
      Number.isInteger(y) &&
      x >= 0 &&
      x < this.width &&
      y >= 0 &&
      y < this.height
    );
  }

  /**
   * Set a single pixel (no-op outside the buffer)
   * @throws RangeError if index is neither UNSET nor a non-negative integer
   */
  set(x: number, y: number, index: number): void {
    checkIndex(index);
    if (!this.contains(x, y)) return;
    this.data[y * this.width + x] = index;
  }

  /**
   * Get the palette index at position, UNSET outside the buffer
   */
  get(x: number, y: number): number {
    if (!this.contains(x, y)) return UNSET;
    return this.data[y * this.width + x] ?? UNSET;
  }

  /**
   * Reset every cell (default: UNSET)
   */
  clear(fill: number = UNSET): void {
    checkIndex(fill);
    this.data.fill(fill);
  }

  /**
   * Copy another buffer's pixels with its top-left corner at (atX, atY).
   * Clipped to this buffer; UNSET source pixels leave the destination as is.
   */
  blit(source: PixelBuffer, atX: number, atY: number): void {
    const x1 = Math.max(0, atX);
    const y1 = Math.max(0, atY);
    const x2 = Math.min(this.width, atX + source.width);
    const y2 = Math.min(this.height, atY + source.height);

    for (let y = y1; y < y2; y++) {
      for (let x = x1; x < x2; x++) {
        const value = source.get(x - atX, y - atY);
        if (value !== UNSET) {
          this.data[y * this.width + x] = value;
        }
      }
    }
  }

  /**
   * Overwrite this buffer with another of the same size
   */
  copyFrom(source: PixelBuffer): void {
    if (source.width !== this.width || source.height !== this.height) {
      throw new RangeError(
        `Cannot copy a ${source.width}x${source.height} buffer into ${this.width}x${this.height}`,
      );
    }
    this.data.set(source.data);
  }

  clone(): PixelBuffer {
    const copy = new PixelBuffer(this.width, this.height);
    copy.copyFrom(this);
    return copy;
  }

  /**
   * Distinct palette indices present in the buffer, ascending
   */
  usedIndices(): number[] {
    const seen = new Set<number>();
    for (const value of this.data) {
      if (value !== UNSET) seen.add(value);
    }
    return [...seen].sort((a, b) => a - b);
  }
}
