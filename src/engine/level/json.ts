import {
  isBoolean,
  isInteger,
  isNumber,
  isRecord,
  isString,
  isStringArray,
} from "../../utils/guards";

import { loadLevel } from "./loader";

import type {
  CompactLevel,
  GridLevel,
  LevelLoadError,
  LevelSource,
  LoadResult,
  TileDefinition,
  TileFields,
  TileRecord,
} from "./types";
import type { Mutable } from "../../utils/guards";

export type LevelSourceResult =
  | { ok: true; source: LevelSource }
  | { ok: false; error: LevelLoadError };

class LevelJsonError extends Error {}

const ID_FIELDS = ["switchId", "controlledBySwitchId"] as const;
const FLAG_FIELDS = ["isBridgeInitiallyActive", "activateOnSwitchOn"] as const;

function readFields(raw: Record<string, unknown>, where: string): TileFields {
  const out: Mutable<TileFields> = {};
  for (const k of ID_FIELDS) {
    const v = raw[k];
    if (v === undefined) continue;
    if (!isInteger(v)) {
      throw new LevelJsonError(`${where}.${k} must be an integer`);
    }
    out[k] = v;
  }
  for (const k of FLAG_FIELDS) {
    const v = raw[k];
    if (v === undefined) continue;
    if (!isBoolean(v)) {
      throw new LevelJsonError(`${where}.${k} must be a boolean`);
    }
    out[k] = v;
  }
  const steps = raw["initialSteps"];
  if (steps !== undefined) {
    if (!isNumber(steps)) {
      throw new LevelJsonError(`${where}.initialSteps must be a number`);
    }
    out.initialSteps = steps;
  }
  return out;
}

function readString(
  raw: Record<string, unknown>,
  key: string,
  where: string,
): string {
  const v = raw[key];
  if (!isString(v)) throw new LevelJsonError(`${where}.${key} must be a string`);
  return v;
}

function readStartDirection(
  raw: Record<string, unknown>,
): { startDirection?: string } {
  const v = raw["startDirection"];
  if (v === undefined) return {};
  if (!isString(v)) throw new LevelJsonError("startDirection must be a string");
  return { startDirection: v };
}

function readDefinition(raw: unknown, index: number): TileDefinition {
  const where = `definitions[${String(index)}]`;
  if (!isRecord(raw)) throw new LevelJsonError(`${where} must be an object`);
  return {
    ...readFields(raw, where),
    key: readString(raw, "key", where),
    type: readString(raw, "type", where),
  };
}

function readCompact(raw: Record<string, unknown>): CompactLevel {
  const layout = raw["layout"];
  if (!isStringArray(layout)) {
    throw new LevelJsonError("layout must be an array of strings");
  }
  const defs = raw["definitions"];
  if (defs !== undefined && !Array.isArray(defs)) {
    throw new LevelJsonError("definitions must be an array");
  }
  return {
    layout,
    ...(defs === undefined ? {} : { definitions: defs.map(readDefinition) }),
    ...readStartDirection(raw),
  };
}

function readTileRecord(raw: unknown, index: number): TileRecord {
  const where = `tiles[${String(index)}]`;
  if (!isRecord(raw)) throw new LevelJsonError(`${where} must be an object`);
  const position = raw["position"];
  const x = isRecord(position) ? position["x"] : undefined;
  const y = isRecord(position) ? position["y"] : undefined;
  if (!isInteger(x) || !isInteger(y)) {
    throw new LevelJsonError(`${where}.position must be {x, y} integers`);
  }
  return {
    ...readFields(raw, where),
    position: { x, y },
    type: readString(raw, "type", where),
  };
}

function readGrid(raw: Record<string, unknown>): GridLevel {
  const width = raw["width"];
  const height = raw["height"];
  const tiles = raw["tiles"];
  if (!isInteger(width) || !isInteger(height)) {
    throw new LevelJsonError("width and height must be integers");
  }
  if (!Array.isArray(tiles)) throw new LevelJsonError("tiles must be an array");
  return {
    height,
    tiles: tiles.map(readTileRecord),
    width,
    ...readStartDirection(raw),
  };
}

/** Validate an already-parsed JSON value as one of the two level shapes. */
export function toLevelSource(raw: unknown): LevelSourceResult {
  try {
    if (!isRecord(raw)) throw new LevelJsonError("level must be an object");
    const source = "layout" in raw ? readCompact(raw) : readGrid(raw);
    return { ok: true, source };
  } catch (e) {
    if (e instanceof LevelJsonError) {
      return {
        error: { code: "InvalidLevelJson", message: e.message },
        ok: false,
      };
    }
    throw e;
  }
}

export function parseLevelJson(text: string): LevelSourceResult {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    return { error: { code: "InvalidLevelJson", message }, ok: false };
  }
  return toLevelSource(raw);
}

export function loadLevelJson(text: string): LoadResult {
  const parsed = parseLevelJson(text);
  return parsed.ok ? loadLevel(parsed.source) : parsed;
}
