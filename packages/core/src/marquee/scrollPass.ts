import { type FrameState, buildFrameLines, computeFrameState } from "../frame.js";
import type { MarqueeLogSink } from "../log.js";
import type { RenderParameters } from "../params.js";
import type { MarqueeSleep } from "../sleep.js";
import type { SplashImage } from "../splash.js";
import type { Terminal, TerminalSize } from "../terminal.js";

/** Rows blanked above a frame in addition to the frame itself. */
export const CLEAR_EXTRA_ROWS = 2;

/**
 * Blank the `outHeight + 2` rows above the cursor and leave the cursor on
 * the first row of the cleared frame. Rows above the top of the screen are
 * skipped.
 */
export async function clearFrame(terminal: Terminal, outHeight: number, hostWidth: number): Promise<void> {
  const row = await terminal.getCursorRow();
  const blank = " ".repeat(Math.max(0, hostWidth));
  for (let r = row - (outHeight + CLEAR_EXTRA_ROWS); r < row; r++) {
    if (r < 0) continue;
    await terminal.setCursor(0, r);
    await terminal.write(blank);
  }
  await terminal.setCursor(0, Math.max(0, row - outHeight));
}

export type ScrollPassContext = Readonly<{
  terminal: Terminal;
  splash: SplashImage;
  params: RenderParameters;
  sleep: MarqueeSleep;
  log: MarqueeLogSink;
  signal?: AbortSignal;
  pass: number;
  /** Buffer width in effect when the pass starts. */
  initialBuffer: number;
  /** Viewport observed by the previous frame; used to report resizes. */
  lastViewport: { current: TerminalSize | null };
}>;

export type ScrollPassResult = Readonly<{
  frames: number;
  /** State of the final frame, or null when the pass rendered nothing. */
  lastFrame: FrameState | null;
}>;

function sameSize(a: TerminalSize, b: TerminalSize): boolean {
  return a.width === b.width && a.height === b.height;
}

/**
 * Render one scroll pass: offsets 0 up to `splash.width + buffer - 1`, where
 * the buffer follows the live viewport. Every frame except the last is
 * cleared before the next one is drawn.
 */
export async function runScrollPass(ctx: ScrollPassContext): Promise<ScrollPassResult> {
  const { terminal, splash, params, log } = ctx;
  let cycleLength = splash.width + ctx.initialBuffer;
  let lastFrame: FrameState | null = null;
  let frames = 0;

  for (let i = 0; i < cycleLength; i++) {
    const viewport = terminal.getSize();
    const previous = ctx.lastViewport.current;
    if (previous !== null && !sameSize(previous, viewport)) {
      log({
        level: "info",
        message: "viewport resized",
        pass: ctx.pass,
        width: viewport.width,
        height: viewport.height,
      });
    }
    ctx.lastViewport.current = viewport;

    const state = computeFrameState(splash, params.bufferPreference, viewport, i);
    cycleLength = state.cycleLength;

    for (const line of buildFrameLines(splash, state)) {
      await terminal.writeLine(line);
    }
    frames++;
    lastFrame = state;

    await ctx.sleep(params.frameDelayMs, ctx.signal);

    if (i < state.cycleLength - 1) {
      await clearFrame(terminal, state.outHeight, state.hostWidth);
    }
    // A resize can bring the cursor back on some terminals.
    await terminal.setCursorVisible(false);
  }

  return Object.freeze({ frames, lastFrame });
}
