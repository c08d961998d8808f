/**
 * @splash-marquee/core
 *
 * Runtime-agnostic marquee renderer.
 * This package MUST NOT use Node-specific APIs (Buffer, node:* imports); the
 * host terminal is reached only through the Terminal interface.
 */

// =============================================================================
// Errors
// =============================================================================

export { MarqueeError, type MarqueeErrorCode, isMarqueeError, safeErr } from "./errors.js";

// =============================================================================
// Model and parameters
// =============================================================================

export { type SplashImage, createSplashImage, measureSplashWidth } from "./splash.js";
export {
  DEFAULT_BUFFER_PREFERENCE,
  DEFAULT_FRAME_DELAY_MS,
  DEFAULT_LOOP_DELAY_MS,
  DEFAULT_RENDER_PARAMS,
  HOST_HEIGHT_PADDING,
  MAX_BUFFER_PREFERENCE,
  MAX_DELAY_MS,
  MAX_DIMENSION,
  type RenderParameters,
  type RenderParametersInput,
  resolveRenderParams,
} from "./params.js";

// =============================================================================
// Frame math
// =============================================================================

export {
  type FrameState,
  type ViewportSize,
  buildFrameLine,
  buildFrameLines,
  computeBuffer,
  computeFrameState,
  computeOutHeight,
  padSplashLine,
  sliceFrom,
} from "./frame.js";

// =============================================================================
// Terminal, logging, scheduling
// =============================================================================

export type { Terminal, TerminalSize } from "./terminal.js";
export {
  type MarqueeLogEvent,
  type MarqueeLogLevel,
  type MarqueeLogSink,
  makeLogSink,
} from "./log.js";
export { type MarqueeSleep, createAbortError, isAbortError, waitWithAbort } from "./sleep.js";

// =============================================================================
// Render loop
// =============================================================================

export { guardTerminal } from "./marquee/guardTerminal.js";
export {
  CLEAR_EXTRA_ROWS,
  type ScrollPassContext,
  type ScrollPassResult,
  clearFrame,
  runScrollPass,
} from "./marquee/scrollPass.js";
export {
  type MarqueeRunOptions,
  type MarqueeRunResult,
  type MarqueeSetup,
  type MarqueeStopReason,
  resolveHostSize,
  runMarquee,
  setupMarquee,
} from "./marquee/runMarquee.js";
