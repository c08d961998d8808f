/**
 * Frame math for the horizontal marquee.
 *
 * Every function here is pure: given the splash, the live viewport and the
 * scroll offset it returns the exact text of the frame. Line lengths are
 * UTF-16 code units.
 */

import type { SplashImage } from "./splash.js";

export type ViewportSize = Readonly<{
  width: number;
  height: number;
}>;

export type FrameState = Readonly<{
  /** Horizontal scroll offset, 0-based. */
  offset: number;
  /** Blank columns appended to every line before tiling. */
  buffer: number;
  /** Number of splash lines that fit the viewport. */
  outHeight: number;
  /** Width every emitted line is fitted to. */
  hostWidth: number;
  /** Offsets in one full scroll pass (`splash.width + buffer`). */
  cycleLength: number;
}>;

/**
 * Blank gap between copies: never below the preference, and wide enough that
 * a single copy plus its gap spans the viewport.
 */
export function computeBuffer(bufferPreference: number, hostWidth: number, splashWidth: number): number {
  return Math.max(bufferPreference, hostWidth - splashWidth);
}

export function computeOutHeight(splashHeight: number, viewportHeight: number): number {
  return Math.max(0, Math.min(splashHeight, viewportHeight));
}

export function computeFrameState(
  splash: SplashImage,
  bufferPreference: number,
  viewport: ViewportSize,
  offset: number,
): FrameState {
  const buffer = computeBuffer(bufferPreference, viewport.width, splash.width);
  return Object.freeze({
    offset,
    buffer,
    outHeight: computeOutHeight(splash.height, viewport.height),
    hostWidth: viewport.width,
    cycleLength: splash.width + buffer,
  });
}

/**
 * Substring from `start` to the end. Offsets at or past the end yield "" and
 * negative offsets are clamped to 0.
 */
export function sliceFrom(text: string, start: number): string {
  if (start >= text.length) return "";
  if (start <= 0) return text;
  return text.slice(start);
}

/** Splash line followed by `buffer` spaces, padded to `splashWidth + buffer`. */
export function padSplashLine(line: string, splashWidth: number, buffer: number): string {
  const bufferedLine = line + " ".repeat(Math.max(0, buffer));
  return bufferedLine.padEnd(splashWidth + buffer, " ");
}

/**
 * Build one marquee line of exactly `hostWidth` characters (empty when
 * `hostWidth <= 0`).
 */
export function buildFrameLine(
  line: string,
  splashWidth: number,
  buffer: number,
  offset: number,
  hostWidth: number,
): string {
  if (hostWidth <= 0) return "";
  const paddedLine = padSplashLine(line, splashWidth, buffer);
  if (paddedLine.length === 0) {
    // All-empty image with no gap: nothing to tile.
    return " ".repeat(hostWidth);
  }

  let outLine = sliceFrom(paddedLine, offset);
  while (outLine.length <= hostWidth) {
    outLine += paddedLine;
  }
  return outLine.slice(0, hostWidth);
}

/** All lines of the frame described by `state`. */
export function buildFrameLines(splash: SplashImage, state: FrameState): readonly string[] {
  const out: string[] = [];
  for (let j = 0; j < state.outHeight; j++) {
    const line = splash.lines[j] ?? "";
    out.push(buildFrameLine(line, splash.width, state.buffer, state.offset, state.hostWidth));
  }
  return Object.freeze(out);
}
