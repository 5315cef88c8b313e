// Lightweight, opt-in debug logging utilities for the engine + tests

// Topics can be enabled via:
// - environment variable TILEWALK_DEBUG with values: "true", "1", "on", or a comma list of topics
//   e.g. TILEWALK_DEBUG=level,interpreter
// - globalThis.__TILEWALK_DEBUG__ = { on: true } or { board: true, campaign: true }

export const DEBUG_TOPICS = [
  "level",
  "board",
  "interpreter",
  "campaign",
  "progress",
] as const;

export type DebugTopic = (typeof DEBUG_TOPICS)[number];

type DebugConfig = { on?: boolean } & Partial<Record<DebugTopic, boolean>>;

declare global {
  // eslint-disable-next-line no-var
  var __TILEWALK_DEBUG__: unknown;
}

export const DEBUG_ENV_KEY = "TILEWALK_DEBUG" as const;

function isObject(u: unknown): u is Record<string, unknown> {
  return typeof u === "object" && u !== null;
}

function readGlobalDebug(): DebugConfig | null {
  const raw = globalThis.__TILEWALK_DEBUG__;
  if (!isObject(raw)) return null;
  const cfg: DebugConfig = { on: raw["on"] === true };
  for (const k of DEBUG_TOPICS) {
    cfg[k] = raw[k] === true;
  }
  return cfg;
}

function readEnvTopics(): ReadonlyArray<string> {
  const raw = process.env[DEBUG_ENV_KEY];
  if (raw === undefined) return [];
  const v = raw.trim().toLowerCase();
  if (v === "1" || v === "true" || v === "on") return ["*"];
  return v
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

export function isDebugEnabled(topic?: DebugTopic): boolean {
  const globalCfg = readGlobalDebug();
  if (globalCfg !== null && globalCfg.on === true) return true;
  if (topic !== undefined && globalCfg !== null && globalCfg[topic] === true) {
    return true;
  }
  const topics = readEnvTopics();
  if (topics.length === 0) return false;
  if (topics.includes("*")) return true;
  if (topic !== undefined) return topics.includes(topic);
  return true;
}

export function debugLog(
  topic: DebugTopic,
  message: string,
  data?: unknown,
): void {
  if (!isDebugEnabled(topic)) return;
  if (data !== undefined) {
    console.warn(`[DBG:${topic}] ${message}`, data);
  } else {
    console.warn(`[DBG:${topic}] ${message}`);
  }
}
