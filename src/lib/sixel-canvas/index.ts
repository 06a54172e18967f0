/**
 * sixel-canvas - Indexed pixel buffer with Sixel output
 *
 * Draw into a palette-indexed buffer and serialize it as a DEC Sixel
 * sequence. Works with foot, WezTerm, mlterm, iTerm2, Konsole and other
 * Sixel-capable terminals.
 *
 * @example
 * ```typescript
 * import { PixelBuffer, Palette, rect, line, encodeSixel } from './sixel-canvas/index.js';
 *
 * const palette = Palette.fromColors(['#000000', '#ff0000', '#00ff00']);
 * const buffer = new PixelBuffer(200, 100, 0);
 * rect(buffer, 10, 10, 50, 50, 1, true);   // Red square
 * line(buffer, 0, 0, 199, 99, 2);          // Green diagonal
 * process.stdout.write(encodeSixel(buffer, palette));
 * ```
 */

export { PixelBuffer, UNSET } from "./buffer.js";
export {
  channelFromSixel,
  channelToSixel,
  hexToRgb,
  hslToRgb,
  toRgb,
  toSixelRgb,
  type Color,
  type RGB,
} from "./color.js";
export {
  ALL_CORNERS,
  bar,
  circle,
  columnHeight,
  dualLineGraph,
  glyph,
  graph,
  hline,
  line,
  lineGraph,
  measureText,
  progressBar,
  rect,
  roundedRect,
  text,
  vline,
  type Corner,
  type Series,
} from "./draw.js";
export { decodeSixel, type DecodedSixel } from "./decoder.js";
export { DoubleBuffer } from "./double-buffer.js";
export {
  BAND_HEIGHT,
  DEFAULT_RLE_THRESHOLD,
  encodeMasks,
  encodeSixel,
  encodeSixelStats,
  sixelHeader,
  type SixelEncodeOptions,
  type SixelOutput,
} from "./encoder.js";
export {
  DecodeError,
  EncodingError,
  FlushError,
  GlyphNotFoundError,
  PaletteExhaustedError,
  SixelCanvasError,
} from "./errors.js";
export { BitmapFont, DEFAULT_FONT, type FontDefinition } from "./font.js";
export { frameHash } from "./hash.js";
export {
  createNamedPalette,
  MAX_PALETTE_SIZE,
  Palette,
  type NamedPalette,
  type PaletteEntry,
} from "./palette.js";
export { fromPng, toPng, type ColorSource } from "./png.js";
export {
  createTerminalOutput,
  MemoryOutput,
  positioned,
  StreamOutput,
  synchronized,
  Terminal,
  type OutputKind,
  type TerminalOutput,
} from "./terminal.js";
export {
  DEFAULT_FLUSH_TIMEOUT_MS,
  RenderScheduler,
  type Frame,
  type FrameOutcome,
  type RenderMode,
  type RenderSchedulerOptions,
  type SchedulerStats,
} from "../scheduler/RenderScheduler.js";
export {
  schedulerMachine,
  type SchedulerContext,
  type SchedulerEvent,
  type SchedulerState,
} from "../scheduler/SchedulerMachine.js";
