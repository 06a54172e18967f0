/**
 * Terminal utilities and escape sequences
 */

// Escape sequences
const ESC = "\x1b";
const CSI = `${ESC}[`;

export const Terminal = {
  ESC,
  CSI,
  SAVE_CURSOR: `${ESC}7`,
  RESTORE_CURSOR: `${ESC}8`,
  HIDE_CURSOR: `${CSI}?25l`,
  SHOW_CURSOR: `${CSI}?25h`,
  ENTER_ALT_SCREEN: `${CSI}?1049h`,
  EXIT_ALT_SCREEN: `${CSI}?1049l`,
  CLEAR_SCREEN: `${CSI}2J${CSI}H`,
  BEGIN_SYNC: `${CSI}?2026h`,
  END_SYNC: `${CSI}?2026l`,

  /**
   * Cursor position sequence (0-indexed column and row)
   */
  moveCursor(col: number, row: number): string {
    return `${CSI}${row + 1};${col + 1}H`;
  },

  /**
   * Check if the terminal likely supports Sixel graphics
   */
  isSixelSupported(env: NodeJS.ProcessEnv = process.env): boolean {
    const term = env.TERM?.toLowerCase() || "";
    const termProgram = env.TERM_PROGRAM?.toLowerCase() || "";

    return (
      term.includes("sixel") ||
      term.includes("mlterm") ||
      term.includes("foot") ||
      termProgram.includes("wezterm") ||
      termProgram.includes("iterm") ||
      termProgram.includes("mintty") ||
      termProgram.includes("konsole") ||
      termProgram.includes("contour")
    );
  },
};

/**
 * Draw a Sixel image at a cell position, leaving the cursor where it was
 */
export function positioned(sixel: string, col: number, row: number): string {
  return `${Terminal.SAVE_CURSOR}${Terminal.moveCursor(col, row)}${sixel}${Terminal.RESTORE_CURSOR}`;
}

/**
 * Wrap output in synchronized update mode so the terminal paints it at once
 */
export function synchronized(data: string): string {
  return `${Terminal.BEGIN_SYNC}${data}${Terminal.END_SYNC}`;
}

/**
 * Destination for encoded frames. One call carries one whole frame.
 */
export interface TerminalOutput {
  write(data: string): Promise<void>;
}

/**
 * Writes frames to a Node writable stream (stdout by default)
 */
export class StreamOutput implements TerminalOutput {
  constructor(
    private readonly stream: NodeJS.WritableStream = process.stdout,
  ) {}

  write(data: string): Promise<void> {
    return new Promise((resolve, reject) => {
      this.stream.write(data, (error?: Error | null) => {
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });
  }
}

/**
 * Keeps every frame in memory, for headless runs and tests
 */
export class MemoryOutput implements TerminalOutput {
  readonly frames: string[] = [];

  async write(data: string): Promise<void> {
    this.frames.push(data);
  }

  get bytes(): number {
    return this.frames.reduce((total, frame) => total + frame.length, 0);
  }
}

export type OutputKind = "stdout" | "memory";

/**
 * Pick the output for where frames should go
 */
export function createTerminalOutput(kind: OutputKind = "stdout"): TerminalOutput {
  switch (kind) {
    case "memory":
      return new MemoryOutput();
    case "stdout":
      return new StreamOutput(process.stdout);
  }
}
