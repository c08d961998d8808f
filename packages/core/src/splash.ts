/**
 * Splash image model.
 *
 * A splash is an immutable list of text lines. Width is measured in UTF-16
 * code units; double-width glyphs are not accounted for.
 */

import { MarqueeError } from "./errors.js";

export type SplashImage = Readonly<{
  lines: readonly string[];
  /** Longest line length. */
  width: number;
  /** Line count. */
  height: number;
}>;

export function measureSplashWidth(lines: readonly string[]): number {
  let width = 0;
  for (const line of lines) {
    if (line.length > width) width = line.length;
  }
  return width;
}

/**
 * Build a frozen SplashImage.
 *
 * @throws MarqueeError("INVALID_INPUT") when `lines` is empty
 */
export function createSplashImage(lines: readonly string[]): SplashImage {
  if (lines.length === 0) {
    throw new MarqueeError("INVALID_INPUT", "splash image must contain at least one line");
  }
  const copy = Object.freeze([...lines]);
  return Object.freeze({
    lines: copy,
    width: measureSplashWidth(copy),
    height: copy.length,
  });
}
