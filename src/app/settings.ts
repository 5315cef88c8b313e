// Runtime settings: defaults, environment overrides and merge helpers

import { createDurationMs, isDurationMs } from "../types/brands";
import { isBoolean, isNumber, isString } from "../utils/guards";

import type { DurationMs } from "../types/brands";
import type { Mutable } from "../utils/guards";

export type RuntimeSettings = Readonly<{
  stepDelayMs: DurationMs; // pause after each executed step
  autoRestart: boolean; // reload the level after a failed run
  autoAdvance: boolean; // load the next level after a completed run
  playerName: string;
}>;

export const defaultRuntimeSettings: RuntimeSettings = {
  autoAdvance: true,
  autoRestart: true,
  playerName: "Player",
  stepDelayMs: createDurationMs(500),
};

export const SETTINGS_ENV_KEYS = {
  autoAdvance: "TILEWALK_AUTO_ADVANCE",
  autoRestart: "TILEWALK_AUTO_RESTART",
  playerName: "TILEWALK_PLAYER_NAME",
  stepDelayMs: "TILEWALK_STEP_DELAY_MS",
} as const satisfies Record<keyof RuntimeSettings, string>;

function coerceBoolean(raw: string | undefined): boolean | undefined {
  if (raw === undefined) return undefined;
  const v = raw.trim().toLowerCase();
  if (v === "1" || v === "true" || v === "on" || v === "yes") return true;
  if (v === "0" || v === "false" || v === "off" || v === "no") return false;
  return undefined;
}

function coerceDuration(raw: string | undefined): DurationMs | undefined {
  if (raw === undefined || raw.trim().length === 0) return undefined;
  const n = Number(raw);
  return isDurationMs(n) ? n : undefined;
}

/** Read overrides from the environment, ignoring values that do not parse. */
export function loadSettings(
  env: Readonly<Record<string, string | undefined>> = process.env,
): Partial<RuntimeSettings> {
  const out: Partial<Mutable<RuntimeSettings>> = {};
  const delay = coerceDuration(env[SETTINGS_ENV_KEYS.stepDelayMs]);
  if (delay !== undefined) out.stepDelayMs = delay;
  for (const k of ["autoRestart", "autoAdvance"] as const) {
    const v = coerceBoolean(env[SETTINGS_ENV_KEYS[k]]);
    if (v !== undefined) out[k] = v;
  }
  const name = env[SETTINGS_ENV_KEYS.playerName]?.trim();
  if (name !== undefined && name.length > 0) out.playerName = name;
  return out;
}

/**
 * Merge a partial (possibly from untrusted input) onto the defaults.
 * Fields of the wrong type fall back to the default.
 */
export function resolveSettings(
  partial: Readonly<Record<string, unknown>> = {},
): RuntimeSettings {
  const out: Mutable<RuntimeSettings> = { ...defaultRuntimeSettings };
  const delay = partial["stepDelayMs"];
  if (isNumber(delay) && isDurationMs(delay)) out.stepDelayMs = delay;
  for (const k of ["autoRestart", "autoAdvance"] as const) {
    const v = partial[k];
    if (isBoolean(v)) out[k] = v;
  }
  const name = partial["playerName"];
  if (isString(name) && name.trim().length > 0) out.playerName = name.trim();
  return out;
}
