import { createSwitchId, isSwitchId } from "../../types/brands";
import { debugLog } from "../../utils/debug";
import { TILE_KINDS, createPosition, formatPosition } from "../core/types";
import { parseDirection } from "../player/pose";

import type {
  CompactLevel,
  GridLevel,
  LayoutResult,
  LevelLoadError,
  LevelWarning,
  TileDefinition,
  TileFields,
} from "./types";
import type {
  Direction,
  TileKind,
  TilePlacement,
  TileTemplate,
} from "../core/types";

// Single-character fallbacks used when no definition key matches
const SYMBOL_TABLE: ReadonlyMap<string, TileKind> = new Map([
  [".", "Floor"],
  ["#", "Wall"],
  ["S", "Start"],
  ["E", "End"],
  [" ", "Air"],
]);

const DEFAULT_FACING: Direction = "Up";

export function parseTileKind(type: string): TileKind | undefined {
  const wanted = type.trim().toLowerCase();
  return TILE_KINDS.find((k) => k.toLowerCase() === wanted);
}

export function templateFrom(kind: TileKind, fields: TileFields): TileTemplate {
  return {
    activatesWhenSwitchOn: fields.activateOnSwitchOn ?? true,
    controlledBySwitchId: createSwitchId(fields.controlledBySwitchId ?? 0),
    initialSteps: fields.initialSteps ?? 0,
    initiallyActive: fields.isBridgeInitiallyActive ?? true,
    kind,
    switchId: createSwitchId(fields.switchId ?? 0),
  };
}

const SWITCH_ID_FIELDS = ["switchId", "controlledBySwitchId"] as const;

// Sources built in code skip the JSON reader, so ids are checked here too
function checkSwitchIds(
  fields: TileFields,
  source: string,
): LevelLoadError | undefined {
  for (const field of SWITCH_ID_FIELDS) {
    const value = fields[field];
    if (value !== undefined && !isSwitchId(value)) {
      return { code: "InvalidSwitchId", field, source, value };
    }
  }
  return undefined;
}

function resolveStartFacing(
  raw: string | undefined,
  warnings: Array<LevelWarning>,
): Direction {
  if (raw === undefined || raw.length === 0) return DEFAULT_FACING;
  const facing = parseDirection(raw);
  if (facing !== undefined) return facing;
  warnings.push({ code: "UnknownStartDirection", value: raw });
  debugLog("level", `Unknown startDirection '${raw}', defaulting to Up`);
  return DEFAULT_FACING;
}

type DefinitionIndex = Readonly<{
  // Longest first, so the first prefix hit is the longest match
  keys: ReadonlyArray<string>;
  templates: ReadonlyMap<string, TileTemplate>;
}>;

function indexDefinitions(
  definitions: ReadonlyArray<TileDefinition>,
): { ok: true; index: DefinitionIndex } | { ok: false; error: LevelLoadError } {
  const templates = new Map<string, TileTemplate>();
  for (const [i, def] of definitions.entries()) {
    if (def.key.length === 0) {
      return { error: { code: "InvalidDefinitionKey", index: i }, ok: false };
    }
    // Two equal keys would both match at the same index with equal length
    if (templates.has(def.key)) {
      return {
        error: { code: "AmbiguousDefinitionKey", key: def.key },
        ok: false,
      };
    }
    const kind = parseTileKind(def.type);
    if (kind === undefined) {
      return {
        error: {
          code: "UnknownTileType",
          source: `definition "${def.key}"`,
          type: def.type,
        },
        ok: false,
      };
    }
    const badId = checkSwitchIds(def, `definition "${def.key}"`);
    if (badId !== undefined) return { error: badId, ok: false };
    templates.set(def.key, templateFrom(kind, def));
  }
  const keys = [...templates.keys()].sort((a, b) => b.length - a.length);
  return { index: { keys, templates }, ok: true };
}

function longestKeyAt(
  row: string,
  stringX: number,
  index: DefinitionIndex,
): { key: string; template: TileTemplate } | undefined {
  for (const key of index.keys) {
    if (!row.startsWith(key, stringX)) continue;
    const template = index.templates.get(key);
    if (template !== undefined) return { key, template };
  }
  return undefined;
}

/**
 * Scan a compact layout. The grid cursor and the string cursor advance
 * independently: a multi-character key fills one cell.
 */
export function parseCompactLevel(level: CompactLevel): LayoutResult {
  const indexed = indexDefinitions(level.definitions ?? []);
  if (!indexed.ok) return indexed;

  const rows = level.layout;
  if (rows.length === 0) return { error: { code: "EmptyLayout" }, ok: false };

  const warnings: Array<LevelWarning> = [];
  const startFacing = resolveStartFacing(level.startDirection, warnings);
  const placements: Array<TilePlacement> = [];
  const height = rows.length;
  let width = 0;

  for (let y = 0; y < height; y++) {
    const rowIndex = height - 1 - y;
    const row = rows[rowIndex] ?? "";
    let gridX = 0;
    let stringX = 0;

    while (stringX < row.length) {
      const position = createPosition(gridX, y);
      const match = longestKeyAt(row, stringX, indexed.index);

      if (match !== undefined) {
        if (match.template.kind !== "Air") {
          placements.push({ position, template: match.template });
        }
        stringX += match.key.length;
      } else {
        const symbol = row.charAt(stringX);
        const kind = SYMBOL_TABLE.get(symbol);
        if (kind === undefined) {
          warnings.push({
            code: "UnknownSymbol",
            column: stringX,
            position,
            row: rowIndex,
            symbol,
          });
          debugLog(
            "level",
            `Unrecognized symbol '${symbol}' at string index ${String(stringX)} for grid pos ${formatPosition(position)}`,
          );
        } else if (kind !== "Air") {
          placements.push({ position, template: templateFrom(kind, {}) });
        }
        stringX += 1;
      }

      gridX += 1;
      width = Math.max(width, gridX);
    }
  }

  return {
    layout: { height, placements, startFacing, warnings, width },
    ok: true,
  };
}

/** Validate a literal tile grid: in-bounds, one tile per cell. */
export function parseGridLevel(level: GridLevel): LayoutResult {
  const { height, width } = level;
  if (
    !Number.isInteger(width) ||
    !Number.isInteger(height) ||
    width <= 0 ||
    height <= 0
  ) {
    return { error: { code: "EmptyLayout" }, ok: false };
  }

  const warnings: Array<LevelWarning> = [];
  const startFacing = resolveStartFacing(level.startDirection, warnings);
  const placements: Array<TilePlacement> = [];
  const occupied = new Set<number>();

  for (const record of level.tiles) {
    const { x, y } = record.position;
    if (
      !Number.isInteger(x) ||
      !Number.isInteger(y) ||
      x < 0 ||
      x >= width ||
      y < 0 ||
      y >= height
    ) {
      return {
        error: { at: { x, y }, code: "TileOutOfBounds", height, width },
        ok: false,
      };
    }
    const position = createPosition(x, y);
    const kind = parseTileKind(record.type);
    if (kind === undefined) {
      return {
        error: {
          code: "UnknownTileType",
          source: `tile ${formatPosition(position)}`,
          type: record.type,
        },
        ok: false,
      };
    }
    const badId = checkSwitchIds(record, `tile ${formatPosition(position)}`);
    if (badId !== undefined) return { error: badId, ok: false };
    const cell = y * width + x;
    if (occupied.has(cell)) {
      return { error: { code: "DuplicateTilePosition", position }, ok: false };
    }
    occupied.add(cell);
    if (kind !== "Air") {
      placements.push({ position, template: templateFrom(kind, record) });
    }
  }

  return {
    layout: { height, placements, startFacing, warnings, width },
    ok: true,
  };
}
