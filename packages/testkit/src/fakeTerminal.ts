import type { Terminal, TerminalSize } from "@splash-marquee/core";

export type TerminalOp =
  | Readonly<{ kind: "setSize"; width: number; height: number }>
  | Readonly<{ kind: "writeLine"; text: string }>
  | Readonly<{ kind: "write"; text: string }>
  | Readonly<{ kind: "setCursor"; column: number; row: number }>
  | Readonly<{ kind: "getCursorRow"; row: number }>
  | Readonly<{ kind: "setCursorVisible"; visible: boolean }>
  | Readonly<{ kind: "disableInputCapture" }>
  | Readonly<{ kind: "setAlwaysOnTop" }>;

export type TerminalOpKind = TerminalOp["kind"];

export type FakeTerminalOptions = Readonly<{
  width?: number;
  height?: number;
  /** When set, `setSize` records the call but keeps the current size. */
  ignoreSetSize?: boolean;
  /**
   * Consulted on every `getSize()` call with the 0-based call index; a
   * returned size replaces the current one (simulates a user resize).
   */
  resizeOnRead?: (call: number) => TerminalSize | undefined;
  /** Make the named operation reject (or throw, for getSize). */
  failOn?: TerminalOpKind | "getSize";
}>;

export type FakeTerminal = Terminal &
  Readonly<{
    ops: readonly TerminalOp[];
    /** Text of every `writeLine` call, in order. */
    lines: () => readonly string[];
    resize: (width: number, height: number) => void;
    cursorRow: () => number;
    cursorVisible: () => boolean;
  }>;

/**
 * Recording terminal: keeps an operation log and a cursor row. `writeLine`
 * moves the cursor down one row; nothing scrolls.
 */
export function createFakeTerminal(opts: FakeTerminalOptions = {}): FakeTerminal {
  const ops: TerminalOp[] = [];
  let width = opts.width ?? 80;
  let height = opts.height ?? 24;
  let row = 0;
  let visible = true;
  let sizeReads = 0;

  const record = async (op: TerminalOp): Promise<void> => {
    if (opts.failOn === op.kind) {
      throw new Error(`fake terminal: ${op.kind} unavailable`);
    }
    ops.push(op);
  };

  return {
    ops,
    lines: () => ops.flatMap((op) => (op.kind === "writeLine" ? [op.text] : [])),
    resize: (w: number, h: number) => {
      width = w;
      height = h;
    },
    cursorRow: () => row,
    cursorVisible: () => visible,

    getSize(): TerminalSize {
      if (opts.failOn === "getSize") throw new Error("fake terminal: getSize unavailable");
      const next = opts.resizeOnRead?.(sizeReads);
      sizeReads++;
      if (next !== undefined) {
        width = next.width;
        height = next.height;
      }
      return { width, height };
    },
    async setSize(w: number, h: number): Promise<void> {
      await record({ kind: "setSize", width: w, height: h });
      if (opts.ignoreSetSize !== true) {
        width = w;
        height = h;
      }
    },
    async writeLine(text: string): Promise<void> {
      await record({ kind: "writeLine", text });
      row++;
    },
    async write(text: string): Promise<void> {
      await record({ kind: "write", text });
    },
    async setCursor(column: number, r: number): Promise<void> {
      await record({ kind: "setCursor", column, row: r });
      row = r;
    },
    async getCursorRow(): Promise<number> {
      await record({ kind: "getCursorRow", row });
      return row;
    },
    async setCursorVisible(v: boolean): Promise<void> {
      await record({ kind: "setCursorVisible", visible: v });
      visible = v;
    },
    async disableInputCapture(): Promise<void> {
      await record({ kind: "disableInputCapture" });
      visible = false;
    },
    async setAlwaysOnTop(): Promise<void> {
      await record({ kind: "setAlwaysOnTop" });
    },
  };
}
