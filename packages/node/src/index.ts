/**
 * @splash-marquee/node
 *
 * Node.js host for the marquee: TTY terminal, splash loading and the CLI.
 */

export {
  type NodeTerminal,
  type NodeTerminalOptions,
  type TtyOutput,
  createNodeTerminal,
} from "./terminal/nodeTerminal.js";
export { DEFAULT_SPLASH } from "./splash/defaultSplash.js";
export { expandTabs, loadSplashFile, parseSplashText } from "./splash/parseSplash.js";
export {
  ENV_BUFFER,
  ENV_FRAME_DELAY_MS,
  ENV_LOOP_DELAY_MS,
  readEnvRenderParams,
} from "./config.js";
export { type CliOptions, HELP_TEXT, mergeParams, parseArgs } from "./cli/args.js";
export { createStreamLogSink, formatLogEvent } from "./cli/logSink.js";
export {
  type CliDeps,
  EXIT_FAILURE,
  EXIT_INVALID_INPUT,
  EXIT_OK,
  runCli,
} from "./cli/main.js";
