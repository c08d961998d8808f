/**
 * Terminal implementation for a Node.js TTY.
 *
 * Everything is plain ANSI/xterm escape sequences on the output stream.
 * Window resizing and raising (XTWINOPS) are honoured by xterm-compatible
 * emulators and ignored elsewhere.
 *
 * The cursor row is tracked locally rather than queried: `start()` clears
 * and homes the screen, and every write after that moves the tracked row the
 * way the terminal would (a line break on the last row scrolls, so the row
 * stays put).
 */

import { MarqueeError, type Terminal, type TerminalSize } from "@splash-marquee/core";
import terminalSize from "terminal-size";

const CSI = "\x1b[";
const FALLBACK_SIZE: TerminalSize = Object.freeze({ width: 80, height: 24 });
/** Mouse reporting modes that make terminals hold output while selecting. */
const MOUSE_MODES = [1000, 1002, 1003, 1006] as const;

export type TtyOutput = {
  isTTY?: boolean;
  columns?: number;
  rows?: number;
  write(chunk: string, cb?: (err?: Error | null) => void): boolean;
};

export type NodeTerminalOptions = Readonly<{
  /** Defaults to `process.stdout`. */
  stdout?: TtyOutput;
  /** Size source used when the stream reports none. Defaults to `terminal-size`. */
  querySize?: () => Readonly<{ columns: number; rows: number }>;
}>;

export type NodeTerminal = Terminal &
  Readonly<{
    /** Clear the screen and home the cursor. Call once before rendering. */
    start: () => Promise<void>;
    /** Show the cursor again. */
    restore: () => Promise<void>;
  }>;

function toPositiveIntOr(v: unknown, fallback: number): number {
  if (typeof v !== "number" || !Number.isFinite(v) || !Number.isInteger(v) || v <= 0) return fallback;
  return v;
}

/**
 * @throws MarqueeError("TERMINAL_UNAVAILABLE") when the output is not a TTY
 */
export function createNodeTerminal(opts: NodeTerminalOptions = {}): NodeTerminal {
  const stdout: TtyOutput = opts.stdout ?? process.stdout;
  const querySize = opts.querySize ?? terminalSize;
  if (stdout.isTTY !== true) {
    throw new MarqueeError(
      "TERMINAL_UNAVAILABLE",
      "output is not an interactive terminal; splash-marquee needs a TTY",
    );
  }

  let row = 0;

  const writeRaw = (data: string): Promise<void> =>
    new Promise<void>((resolve, reject) => {
      stdout.write(data, (err?: Error | null) => {
        if (err) reject(err);
        else resolve();
      });
    });

  const getSize = (): TerminalSize => {
    const width = toPositiveIntOr(stdout.columns, 0);
    const height = toPositiveIntOr(stdout.rows, 0);
    if (width > 0 && height > 0) return { width, height };
    try {
      const size = querySize();
      return {
        width: toPositiveIntOr(size.columns, FALLBACK_SIZE.width),
        height: toPositiveIntOr(size.rows, FALLBACK_SIZE.height),
      };
    } catch {
      return FALLBACK_SIZE;
    }
  };

  return Object.freeze({
    getSize,
    async start(): Promise<void> {
      await writeRaw(`${CSI}2J${CSI}H`);
      row = 0;
    },
    async restore(): Promise<void> {
      await writeRaw(`${CSI}?25h`);
    },
    async setSize(width: number, height: number): Promise<void> {
      await writeRaw(`${CSI}8;${String(height)};${String(width)}t`);
    },
    async writeLine(text: string): Promise<void> {
      await writeRaw(`${text}\r\n`);
      row = Math.min(row + 1, Math.max(0, getSize().height - 1));
    },
    async write(text: string): Promise<void> {
      await writeRaw(text);
    },
    async setCursor(column: number, r: number): Promise<void> {
      await writeRaw(`${CSI}${String(r + 1)};${String(column + 1)}H`);
      row = r;
    },
    async getCursorRow(): Promise<number> {
      return row;
    },
    async setCursorVisible(visible: boolean): Promise<void> {
      await writeRaw(visible ? `${CSI}?25h` : `${CSI}?25l`);
    },
    async disableInputCapture(): Promise<void> {
      const modes = MOUSE_MODES.map((mode) => `${CSI}?${String(mode)}l`).join("");
      await writeRaw(`${modes}${CSI}?25l`);
    },
    async setAlwaysOnTop(): Promise<void> {
      await writeRaw(`${CSI}5t`);
    },
  });
}
