import { MarqueeError } from "../errors.js";
import { computeBuffer } from "../frame.js";
import { type MarqueeLogSink, makeLogSink } from "../log.js";
import {
  HOST_HEIGHT_PADDING,
  type RenderParameters,
  type RenderParametersInput,
  resolveRenderParams,
} from "../params.js";
import { type MarqueeSleep, isAbortError, waitWithAbort } from "../sleep.js";
import { type SplashImage, createSplashImage } from "../splash.js";
import type { Terminal, TerminalSize } from "../terminal.js";
import { guardTerminal } from "./guardTerminal.js";
import { clearFrame, runScrollPass } from "./scrollPass.js";

export type MarqueeRunOptions = Readonly<{
  /** Stops the loop. The sleep in progress is cut short. */
  signal?: AbortSignal;
  log?: MarqueeLogSink;
  /** Replaces the timer-based wait; must honour `signal`. */
  sleep?: MarqueeSleep;
  /** Stop after this many scroll passes. Runs until aborted when absent. */
  maxPasses?: number;
}>;

export type MarqueeStopReason = "aborted" | "max-passes";

export type MarqueeRunResult = Readonly<{
  reason: MarqueeStopReason;
  /** Completed scroll passes. */
  passes: number;
  /** Frames rendered by completed passes. */
  frames: number;
}>;

export type MarqueeSetup = Readonly<{
  hostWidth: number;
  hostHeight: number;
  /** Buffer width computed from the resized terminal. */
  buffer: number;
}>;

/** Width/height the terminal is resized to before the first frame. */
export function resolveHostSize(
  params: RenderParameters,
  splash: SplashImage,
  current: TerminalSize,
): TerminalSize {
  return Object.freeze({
    width: params.requestedWidth ?? current.width,
    height: params.requestedHeight ?? splash.height + HOST_HEIGHT_PADDING,
  });
}

/**
 * One-shot terminal preparation: input capture and window pinning when
 * flagged, then the resize. The buffer is computed from the size read back
 * after resizing.
 */
export async function setupMarquee(
  terminal: Terminal,
  splash: SplashImage,
  params: RenderParameters,
  log: MarqueeLogSink = () => {},
): Promise<MarqueeSetup> {
  if (params.disableInputCapture) {
    await terminal.disableInputCapture();
  }
  if (params.alwaysOnTop) {
    await terminal.setAlwaysOnTop();
  }

  const host = resolveHostSize(params, splash, terminal.getSize());
  await terminal.setSize(host.width, host.height);
  const resized = terminal.getSize();
  const buffer = computeBuffer(params.bufferPreference, resized.width, splash.width);

  log({
    level: "info",
    message: `marquee ready: splash ${String(splash.width)}x${String(splash.height)}, buffer ${String(buffer)}`,
    width: resized.width,
    height: resized.height,
  });
  return Object.freeze({ hostWidth: resized.width, hostHeight: resized.height, buffer });
}

function isSplashImage(image: SplashImage | readonly string[]): image is SplashImage {
  return !Array.isArray(image);
}

function toSplash(image: SplashImage | readonly string[]): SplashImage {
  return isSplashImage(image) ? image : createSplashImage(image);
}

function validateMaxPasses(maxPasses: number | undefined): void {
  if (maxPasses === undefined) return;
  if (!Number.isInteger(maxPasses) || maxPasses < 1) {
    throw new MarqueeError(
      "INVALID_INPUT",
      `maxPasses must be a positive integer; got ${String(maxPasses)}`,
    );
  }
}

/**
 * Validate the inputs, prepare the terminal and scroll the splash until the
 * signal aborts (or `maxPasses` passes have run).
 *
 * Each pass is followed by a `loopDelayMs` pause and a clear of the last
 * frame, using that frame's height.
 *
 * @throws MarqueeError("INVALID_INPUT") before touching the terminal
 * @throws MarqueeError("TERMINAL_UNAVAILABLE") when a terminal call fails
 */
export async function runMarquee(
  terminal: Terminal,
  image: SplashImage | readonly string[],
  params: RenderParametersInput = {},
  opts: MarqueeRunOptions = {},
): Promise<MarqueeRunResult> {
  const splash = toSplash(image);
  const resolved = resolveRenderParams(params);
  validateMaxPasses(opts.maxPasses);

  const log = makeLogSink(opts.log);
  const sleep = opts.sleep ?? waitWithAbort;
  const signal = opts.signal;
  const term = guardTerminal(terminal);

  let passes = 0;
  let frames = 0;
  const stopped = (reason: MarqueeStopReason): MarqueeRunResult => {
    log({ level: "info", message: `marquee stopped (${reason})`, pass: passes });
    return Object.freeze({ reason, passes, frames });
  };

  if (signal?.aborted) return stopped("aborted");

  const lastViewport: { current: TerminalSize | null } = { current: null };

  try {
    const setup = await setupMarquee(term, splash, resolved, log);
    let initialBuffer = setup.buffer;
    while (true) {
      log({ level: "debug", message: "scroll pass started", pass: passes });
      const result = await runScrollPass({
        terminal: term,
        splash,
        params: resolved,
        sleep,
        log,
        ...(signal === undefined ? {} : { signal }),
        pass: passes,
        initialBuffer,
        lastViewport,
      });
      passes++;
      frames += result.frames;
      log({
        level: "debug",
        message: `scroll pass finished after ${String(result.frames)} frames`,
        pass: passes - 1,
      });

      await sleep(resolved.loopDelayMs, signal);

      const last = result.lastFrame;
      if (last !== null) {
        await clearFrame(term, last.outHeight, last.hostWidth);
        initialBuffer = last.buffer;
      }

      if (opts.maxPasses !== undefined && passes >= opts.maxPasses) {
        return stopped("max-passes");
      }
    }
  } catch (err: unknown) {
    if (isAbortError(err)) return stopped("aborted");
    log({
      level: "error",
      message: err instanceof Error ? err.message : String(err),
      pass: passes,
    });
    throw err;
  }
}
