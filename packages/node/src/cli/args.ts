import { MarqueeError, type RenderParametersInput } from "@splash-marquee/core";

export type CliOptions = {
  /** Splash file; the built-in art when absent. */
  file?: string;
  params: {
    bufferPreference?: number;
    frameDelayMs?: number;
    loopDelayMs?: number;
    requestedWidth?: number;
    requestedHeight?: number;
    disableInputCapture?: boolean;
    alwaysOnTop?: boolean;
  };
  verbose: boolean;
  help: boolean;
};

type IntFlag = Readonly<{
  names: readonly string[];
  key: "bufferPreference" | "frameDelayMs" | "loopDelayMs" | "requestedWidth" | "requestedHeight";
}>;

const INT_FLAGS: readonly IntFlag[] = [
  { names: ["--buffer", "-b"], key: "bufferPreference" },
  { names: ["--frame-delay"], key: "frameDelayMs" },
  { names: ["--loop-delay"], key: "loopDelayMs" },
  { names: ["--width", "-W"], key: "requestedWidth" },
  { names: ["--height", "-H"], key: "requestedHeight" },
];

function parseIntValue(flag: string, value: string): number {
  if (!/^-?\d+$/.test(value.trim())) {
    throw new MarqueeError("INVALID_INPUT", `${flag} expects an integer; got "${value}"`);
  }
  return Number.parseInt(value, 10);
}

function matchIntFlag(arg: string): Readonly<{ flag: IntFlag; name: string; inline?: string }> | null {
  for (const flag of INT_FLAGS) {
    for (const name of flag.names) {
      if (arg === name) return { flag, name };
      if (name.startsWith("--") && arg.startsWith(`${name}=`)) {
        return { flag, name, inline: arg.slice(name.length + 1) };
      }
    }
  }
  return null;
}

export function parseArgs(argv: readonly string[]): CliOptions {
  const options: CliOptions = {
    params: {},
    verbose: false,
    help: false,
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? "";
    if (arg === "--help" || arg === "-h") {
      options.help = true;
      continue;
    }
    if (arg === "--verbose" || arg === "-v") {
      options.verbose = true;
      continue;
    }
    if (arg === "--disable-input-capture" || arg === "-q") {
      options.params.disableInputCapture = true;
      continue;
    }
    if (arg === "--always-on-top" || arg === "-t") {
      options.params.alwaysOnTop = true;
      continue;
    }
    const intFlag = matchIntFlag(arg);
    if (intFlag) {
      let value = intFlag.inline;
      if (value === undefined) {
        value = argv[i + 1];
        if (value === undefined) {
          throw new MarqueeError("INVALID_INPUT", `Missing value for ${intFlag.name}`);
        }
        i++;
      }
      options.params[intFlag.flag.key] = parseIntValue(intFlag.name, value);
      continue;
    }
    if (arg.startsWith("-")) {
      throw new MarqueeError("INVALID_INPUT", `Unknown option: ${arg}`);
    }
    if (options.file === undefined) {
      options.file = arg;
      continue;
    }
    throw new MarqueeError("INVALID_INPUT", `Unexpected argument: ${arg}`);
  }

  return options;
}

/** Environment values first, command-line flags on top. */
export function mergeParams(
  env: RenderParametersInput,
  cli: CliOptions["params"],
): RenderParametersInput {
  return Object.freeze({ ...env, ...cli });
}

export const HELP_TEXT = [
  "splash-marquee",
  "",
  "Usage:",
  "  splash-marquee [options] [file]",
  "",
  "Scrolls the splash in <file> (or a built-in sample) across the terminal until interrupted.",
  "",
  "Options:",
  "  --buffer, -b <n>             Minimum gap between copies of the image (default 10)",
  "  --frame-delay <ms>           Delay between frames (default 100)",
  "  --loop-delay <ms>            Delay between scroll passes (default 2000)",
  "  --width, -W <n>              Terminal width to set (default: current width)",
  "  --height, -H <n>             Terminal height to set (default: image height + 2)",
  "  --disable-input-capture, -q  Turn off mouse capture and hide the cursor",
  "  --always-on-top, -t          Raise the terminal window",
  "  --verbose, -v                Log to stderr",
  "  --help, -h                   Show this help",
  "",
  "Environment:",
  "  SPLASH_MARQUEE_BUFFER, SPLASH_MARQUEE_FRAME_DELAY_MS, SPLASH_MARQUEE_LOOP_DELAY_MS",
  "",
].join("\n");
