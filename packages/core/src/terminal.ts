/**
 * Terminal capability consumed by the marquee renderer.
 *
 * The renderer never touches process globals; everything it needs from the
 * host terminal goes through this object so it can be replaced in tests.
 * Columns and rows are 0-based.
 */

export type TerminalSize = Readonly<{
  width: number;
  height: number;
}>;

export interface Terminal {
  /** Current size. May change between calls when the user resizes the window. */
  getSize(): TerminalSize;
  /** Resize the display buffer and window. */
  setSize(width: number, height: number): Promise<void>;
  /** Write `text` followed by a line break. */
  writeLine(text: string): Promise<void>;
  /** Write `text` at the cursor without a line break. */
  write(text: string): Promise<void>;
  setCursor(column: number, row: number): Promise<void>;
  getCursorRow(): Promise<number>;
  setCursorVisible(visible: boolean): Promise<void>;
  /** Stop the terminal from pausing output on mouse selection, and hide the cursor. */
  disableInputCapture(): Promise<void>;
  /** Keep the window above other windows. */
  setAlwaysOnTop(): Promise<void>;
}
