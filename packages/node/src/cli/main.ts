#!/usr/bin/env -S node --import tsx
import { resolve } from "node:path";
import process from "node:process";
import { fileURLToPath } from "node:url";
import {
  type MarqueeRunOptions,
  type MarqueeRunResult,
  createSplashImage,
  isMarqueeError,
  resolveRenderParams,
  runMarquee,
  safeErr,
} from "@splash-marquee/core";
import { readEnvRenderParams } from "../config.js";
import { DEFAULT_SPLASH } from "../splash/defaultSplash.js";
import { loadSplashFile } from "../splash/parseSplash.js";
import { type NodeTerminal, createNodeTerminal } from "../terminal/nodeTerminal.js";
import { HELP_TEXT, mergeParams, parseArgs } from "./args.js";
import { createStreamLogSink } from "./logSink.js";

type Writable = { write(chunk: string): boolean };

type SignalSource = {
  once(event: "SIGINT" | "SIGTERM", listener: () => void): unknown;
  off(event: "SIGINT" | "SIGTERM", listener: () => void): unknown;
};

export type CliDeps = Readonly<{
  stdout: Writable;
  stderr: Writable;
  env: Readonly<Record<string, string | undefined>>;
  signals: SignalSource;
  createTerminal: () => NodeTerminal;
  /** Extra run options (tests bound the run with `maxPasses` and a fake sleep). */
  runOptions?: Omit<MarqueeRunOptions, "signal" | "log">;
}>;

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_INVALID_INPUT = 2;

function exitCodeFor(err: unknown): number {
  return isMarqueeError(err) && err.code === "INVALID_INPUT" ? EXIT_INVALID_INPUT : EXIT_FAILURE;
}

/**
 * Parse `argv`, validate everything, then scroll until SIGINT/SIGTERM.
 * Resolves with the process exit code.
 */
export async function runCli(argv: readonly string[], deps: CliDeps): Promise<number> {
  let terminal: NodeTerminal | null = null;
  const controller = new AbortController();
  const onSignal = (): void => controller.abort();

  try {
    const options = parseArgs(argv);
    if (options.help) {
      deps.stdout.write(HELP_TEXT);
      return EXIT_OK;
    }

    const lines = options.file === undefined ? DEFAULT_SPLASH : await loadSplashFile(options.file);
    const splash = createSplashImage(lines);
    const params = resolveRenderParams(mergeParams(readEnvRenderParams(deps.env), options.params));

    terminal = deps.createTerminal();
    deps.signals.once("SIGINT", onSignal);
    deps.signals.once("SIGTERM", onSignal);

    await terminal.start();
    const result: MarqueeRunResult = await runMarquee(terminal, splash, params, {
      ...deps.runOptions,
      signal: controller.signal,
      ...(options.verbose ? { log: createStreamLogSink(deps.stderr) } : {}),
    });
    if (options.verbose) {
      deps.stderr.write(
        `splash-marquee: ${String(result.passes)} passes, ${String(result.frames)} frames\n`,
      );
    }
    return EXIT_OK;
  } catch (err: unknown) {
    deps.stderr.write(`splash-marquee error: ${safeErr(err).message}\n`);
    return exitCodeFor(err);
  } finally {
    deps.signals.off("SIGINT", onSignal);
    deps.signals.off("SIGTERM", onSignal);
    if (terminal !== null) {
      await terminal.restore().catch((err: unknown) => {
        deps.stderr.write(`splash-marquee error: cannot restore cursor: ${safeErr(err).message}\n`);
      });
    }
  }
}

const isMain = process.argv[1] && fileURLToPath(import.meta.url) === resolve(process.argv[1]);
if (isMain) {
  runCli(process.argv.slice(2), {
    stdout: process.stdout,
    stderr: process.stderr,
    env: process.env,
    signals: process,
    createTerminal: () => createNodeTerminal(),
  }).then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      process.stderr.write(`\nsplash-marquee error: ${safeErr(err).message}\n`);
      process.exitCode = EXIT_FAILURE;
    },
  );
}
