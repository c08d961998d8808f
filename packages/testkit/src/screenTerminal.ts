import type { Terminal, TerminalSize } from "@splash-marquee/core";
import xtermHeadless from "@xterm/headless";

export type ScreenSnapshot = Readonly<{
  cols: number;
  rows: number;
  /** Every row, padded to `cols`. */
  lines: readonly string[];
  cursorRow: number;
}>;

export type ScreenTerminal = Terminal &
  Readonly<{
    /** Resize the emulated window, as a user dragging its edge would. */
    resize: (cols: number, rows: number) => Promise<void>;
    flush: () => Promise<void>;
    snapshot: () => Promise<ScreenSnapshot>;
    /** Raw bytes written so far. */
    output: () => string;
  }>;

/**
 * Terminal backed by an in-process xterm emulator. Escape sequences are
 * parsed for real, so cursor addressing and clearing can be asserted on the
 * resulting screen. No scrollback: rows pushed off the top are gone.
 */
export function createScreenTerminal(opts: Readonly<{ cols: number; rows: number }>): ScreenTerminal {
  const { Terminal: HeadlessTerminal } = xtermHeadless;
  if (typeof HeadlessTerminal !== "function") {
    throw new Error("Unexpected @xterm/headless shape: missing Terminal export");
  }

  const term = new HeadlessTerminal({
    cols: opts.cols,
    rows: opts.rows,
    allowProposedApi: true,
    convertEol: false,
    scrollback: 0,
  });
  let raw = "";

  let pending = Promise.resolve();
  const write = async (data: string): Promise<void> => {
    raw += data;
    pending = pending.then(
      () =>
        new Promise<void>((resolve) => {
          term.write(data, resolve);
        }),
    );
    await pending;
  };

  const flush = async (): Promise<void> => {
    await pending;
  };

  const resize = async (cols: number, rows: number): Promise<void> => {
    pending = pending.then(() => {
      term.resize(cols, rows);
    });
    await pending;
  };

  const snapshot = async (): Promise<ScreenSnapshot> => {
    await flush();
    const lines: string[] = [];
    for (let r = 0; r < term.rows; r++) {
      const line = term.buffer.active.getLine(r);
      const text = line?.translateToString(false) ?? "";
      lines.push(text.padEnd(term.cols, " ").slice(0, term.cols));
    }
    return { cols: term.cols, rows: term.rows, lines, cursorRow: term.buffer.active.cursorY };
  };

  return {
    resize,
    flush,
    snapshot,
    output: () => raw,

    getSize(): TerminalSize {
      return { width: term.cols, height: term.rows };
    },
    setSize: (width: number, height: number) => resize(width, height),
    writeLine: (text: string) => write(`${text}\r\n`),
    write,
    setCursor: (column: number, row: number) =>
      write(`\x1b[${String(row + 1)};${String(column + 1)}H`),
    async getCursorRow(): Promise<number> {
      await flush();
      return term.buffer.active.cursorY;
    },
    setCursorVisible: (visible: boolean) => write(visible ? "\x1b[?25h" : "\x1b[?25l"),
    disableInputCapture: () => write("\x1b[?1000l\x1b[?25l"),
    setAlwaysOnTop: () => write("\x1b[5t"),
  };
}
