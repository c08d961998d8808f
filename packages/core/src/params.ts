import { MarqueeError } from "./errors.js";

export type RenderParameters = Readonly<{
  /** Minimum blank gap between repeated copies of the image. */
  bufferPreference: number;
  frameDelayMs: number;
  loopDelayMs: number;
  /** Terminal width to set; current width when absent. */
  requestedWidth?: number;
  /** Terminal height to set; image height + 2 when absent. */
  requestedHeight?: number;
  disableInputCapture: boolean;
  alwaysOnTop: boolean;
}>;

export type RenderParametersInput = Readonly<{
  bufferPreference?: number;
  frameDelayMs?: number;
  loopDelayMs?: number;
  requestedWidth?: number;
  requestedHeight?: number;
  disableInputCapture?: boolean;
  alwaysOnTop?: boolean;
}>;

export const DEFAULT_BUFFER_PREFERENCE = 10;
export const DEFAULT_FRAME_DELAY_MS = 100;
export const DEFAULT_LOOP_DELAY_MS = 2000;
/** Rows added to the image height when no height is requested. */
export const HOST_HEIGHT_PADDING = 2;

/** Largest delay a timer can hold (signed 32-bit milliseconds). */
export const MAX_DELAY_MS = 2147483647;
export const MAX_BUFFER_PREFERENCE = 65535;
export const MAX_DIMENSION = 65535;

export const DEFAULT_RENDER_PARAMS: RenderParameters = Object.freeze({
  bufferPreference: DEFAULT_BUFFER_PREFERENCE,
  frameDelayMs: DEFAULT_FRAME_DELAY_MS,
  loopDelayMs: DEFAULT_LOOP_DELAY_MS,
  disableInputCapture: false,
  alwaysOnTop: false,
});

function requireInteger(field: string, value: number, min: 0 | 1, max: number): number {
  const bound = min === 0 ? "a non-negative integer" : "a positive integer";
  if (!Number.isFinite(value) || !Number.isInteger(value) || value < min) {
    throw new MarqueeError("INVALID_INPUT", `${field} must be ${bound}; got ${String(value)}`);
  }
  if (value > max) {
    throw new MarqueeError(
      "INVALID_INPUT",
      `${field} must be ${bound} no greater than ${String(max)}; got ${String(value)}`,
    );
  }
  return value;
}

/**
 * Fill defaults and validate. Delays and dimensions must be positive
 * integers; the buffer preference may be zero. Delays are capped at
 * MAX_DELAY_MS, buffer and dimensions at 65535.
 *
 * @throws MarqueeError("INVALID_INPUT")
 */
export function resolveRenderParams(input: RenderParametersInput = {}): RenderParameters {
  const bufferPreference = requireInteger(
    "bufferPreference",
    input.bufferPreference ?? DEFAULT_BUFFER_PREFERENCE,
    0,
    MAX_BUFFER_PREFERENCE,
  );
  const frameDelayMs = requireInteger(
    "frameDelayMs",
    input.frameDelayMs ?? DEFAULT_FRAME_DELAY_MS,
    1,
    MAX_DELAY_MS,
  );
  const loopDelayMs = requireInteger(
    "loopDelayMs",
    input.loopDelayMs ?? DEFAULT_LOOP_DELAY_MS,
    1,
    MAX_DELAY_MS,
  );

  return Object.freeze({
    bufferPreference,
    frameDelayMs,
    loopDelayMs,
    ...(input.requestedWidth === undefined
      ? {}
      : {
          requestedWidth: requireInteger("requestedWidth", input.requestedWidth, 1, MAX_DIMENSION),
        }),
    ...(input.requestedHeight === undefined
      ? {}
      : {
          requestedHeight: requireInteger("requestedHeight", input.requestedHeight, 1, MAX_DIMENSION),
        }),
    disableInputCapture: input.disableInputCapture === true,
    alwaysOnTop: input.alwaysOnTop === true,
  });
}
