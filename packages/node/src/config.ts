import type { RenderParametersInput } from "@splash-marquee/core";

type EnvMap = Readonly<Record<string, string | undefined>>;

export const ENV_BUFFER = "SPLASH_MARQUEE_BUFFER";
export const ENV_FRAME_DELAY_MS = "SPLASH_MARQUEE_FRAME_DELAY_MS";
export const ENV_LOOP_DELAY_MS = "SPLASH_MARQUEE_LOOP_DELAY_MS";

function envText(env: EnvMap, key: string): string | undefined {
  const value = env[key];
  if (typeof value !== "string") return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function envInt(env: EnvMap, key: string): number | undefined {
  const raw = envText(env, key);
  if (!raw || !/^-?\d+$/.test(raw)) return undefined;
  const value = Number.parseInt(raw, 10);
  if (!Number.isFinite(value)) return undefined;
  return value;
}

/**
 * Render parameters from the environment. Blank or non-numeric values are
 * treated as unset; negative numbers are kept so resolveRenderParams can
 * reject them.
 */
export function readEnvRenderParams(env: EnvMap = process.env): RenderParametersInput {
  const bufferPreference = envInt(env, ENV_BUFFER);
  const frameDelayMs = envInt(env, ENV_FRAME_DELAY_MS);
  const loopDelayMs = envInt(env, ENV_LOOP_DELAY_MS);
  return Object.freeze({
    ...(bufferPreference === undefined ? {} : { bufferPreference }),
    ...(frameDelayMs === undefined ? {} : { frameDelayMs }),
    ...(loopDelayMs === undefined ? {} : { loopDelayMs }),
  });
}
