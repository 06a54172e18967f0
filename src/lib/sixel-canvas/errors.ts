/**
 * Base class for all errors raised by the sixel-canvas library.
 */
export class SixelCanvasError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * The palette has reached its cap and the requested color is not registered.
 */
export class PaletteExhaustedError extends SixelCanvasError {
  constructor(
    readonly cap: number,
    readonly rgb: readonly [number, number, number],
  ) {
    super(
      `Palette is full (${cap} colors); cannot register ${rgb.join(",")}`,
    );
  }
}

/**
 * A font has no glyph for a character and no fallback glyph to use instead.
 */
export class GlyphNotFoundError extends SixelCanvasError {
  constructor(readonly char: string) {
    super(`No glyph for character ${JSON.stringify(char)}`);
  }
}

/**
 * A buffer cell references a palette entry that does not exist.
 * Always a caller bug: the encoder refuses to emit a partial stream.
 */
export class EncodingError extends SixelCanvasError {
  constructor(
    readonly x: number,
    readonly y: number,
    readonly index: number,
    readonly paletteSize: number,
  ) {
    super(
      `Pixel (${x},${y}) references color ${index} but the palette has ${paletteSize} entries`,
    );
  }
}

/**
 * A Sixel stream could not be parsed.
 */
export class DecodeError extends SixelCanvasError {
  constructor(
    message: string,
    readonly offset: number,
  ) {
    super(`${message} at offset ${offset}`);
  }
}

/**
 * Writing an encoded frame to the terminal failed or timed out.
 */
export class FlushError extends SixelCanvasError {}
