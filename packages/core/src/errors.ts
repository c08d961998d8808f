/**
 * Error types for splash-marquee.
 */

/**
 * Deterministic error codes surfaced as MarqueeError instances.
 *
 * - INVALID_INPUT: empty image, or a delay/dimension/buffer value out of range.
 * - TERMINAL_UNAVAILABLE: the terminal cannot be sized, addressed or written to.
 */
export type MarqueeErrorCode = "INVALID_INPUT" | "TERMINAL_UNAVAILABLE";

export class MarqueeError extends Error {
  override readonly name = "MarqueeError";
  readonly code: MarqueeErrorCode;

  constructor(code: MarqueeErrorCode, message?: string, options?: Readonly<{ cause?: unknown }>) {
    super(message ?? code, options?.cause === undefined ? undefined : { cause: options.cause });
    this.code = code;

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, MarqueeError);
    }
  }
}

export function isMarqueeError(err: unknown): err is MarqueeError {
  return err instanceof MarqueeError;
}

export function safeErr(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
