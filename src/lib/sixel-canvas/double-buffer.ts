import { PixelBuffer, UNSET } from "./buffer.js";

// Committed buffers kept for reuse
const MAX_SPARE_BUFFERS = 2;

/**
 * Draft/commit buffer pair for handing frames to a renderer.
 *
 * Callers draw into `draft`. `commit()` hands the draft over and swaps in
 * another buffer (pre-filled with the same pixels) as the new draft, so the
 * committed buffer is never written to while the renderer holds it.
 * The renderer gives buffers back with `release()` once done.
 */
export class DoubleBuffer {
  readonly width: number;
  readonly height: number;

  private back: PixelBuffer;
  private readonly spare: PixelBuffer[] = [];
  private readonly outstanding = new Set<PixelBuffer>();

  constructor(width: number, height: number, fill: number = UNSET) {
    this.width = width;
    this.height = height;
    this.back = new PixelBuffer(width, height, fill);
  }

  /** Buffer to draw the next frame into */
  get draft(): PixelBuffer {
    return this.back;
  }

  /** Number of committed buffers not yet released */
  get inFlight(): number {
    return this.outstanding.size;
  }

  /**
   * Hand off the current draft and start a new one with the same contents
   */
  commit(): PixelBuffer {
    const committed = this.back;
    const next = this.spare.pop() ?? new PixelBuffer(this.width, this.height);
    next.copyFrom(committed);

    this.back = next;
    this.outstanding.add(committed);
    return committed;
  }

  /**
   * Return a committed buffer for reuse. Unknown buffers are ignored.
   */
  release(buffer: PixelBuffer): void {
    if (!this.outstanding.delete(buffer)) return;
    if (this.spare.length < MAX_SPARE_BUFFERS) {
      this.spare.push(buffer);
    }
  }
}
