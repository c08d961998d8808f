import { MarqueeError, safeErr } from "../errors.js";
import type { Terminal, TerminalSize } from "../terminal.js";

function toTerminalError(op: string, err: unknown): MarqueeError {
  if (err instanceof MarqueeError) return err;
  return new MarqueeError("TERMINAL_UNAVAILABLE", `terminal ${op} failed: ${safeErr(err).message}`, {
    cause: err,
  });
}

async function guarded<T>(op: string, run: () => Promise<T>): Promise<T> {
  try {
    return await run();
  } catch (err: unknown) {
    throw toTerminalError(op, err);
  }
}

/**
 * Wrap a terminal so every failure surfaces as
 * MarqueeError("TERMINAL_UNAVAILABLE"), with the original error as `cause`.
 */
export function guardTerminal(terminal: Terminal): Terminal {
  return Object.freeze({
    getSize(): TerminalSize {
      try {
        return terminal.getSize();
      } catch (err: unknown) {
        throw toTerminalError("getSize", err);
      }
    },
    setSize: (width: number, height: number) =>
      guarded("setSize", () => terminal.setSize(width, height)),
    writeLine: (text: string) => guarded("writeLine", () => terminal.writeLine(text)),
    write: (text: string) => guarded("write", () => terminal.write(text)),
    setCursor: (column: number, row: number) =>
      guarded("setCursor", () => terminal.setCursor(column, row)),
    getCursorRow: () => guarded("getCursorRow", () => terminal.getCursorRow()),
    setCursorVisible: (visible: boolean) =>
      guarded("setCursorVisible", () => terminal.setCursorVisible(visible)),
    disableInputCapture: () => guarded("disableInputCapture", () => terminal.disableInputCapture()),
    setAlwaysOnTop: () => guarded("setAlwaysOnTop", () => terminal.setAlwaysOnTop()),
  });
}
