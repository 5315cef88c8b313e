import { debugLog } from "../../utils/debug";
import { Board } from "../core/board";
import { formatPosition } from "../core/types";

import { parseCompactLevel, parseGridLevel } from "./parser";
import { isCompactLevel } from "./types";

import type {
  LevelLoadError,
  LevelSource,
  LevelWarning,
  LoadResult,
  ParsedLayout,
} from "./types";
import type { Position, Tile, TilePlacement } from "../core/types";

/**
 * Turn a placement into a tile with fresh runtime state. Switches start off,
 * bridges start from their authored state and are synced by the Board.
 */
export function createRuntimeTile(
  placement: TilePlacement,
  warnings: Array<LevelWarning>,
): Tile {
  const { position, template } = placement;
  switch (template.kind) {
    case "Switch":
      return {
        isOn: false,
        kind: "Switch",
        position,
        switchId: template.switchId,
      };
    case "Bridge":
      return {
        activatesWhenSwitchOn: template.activatesWhenSwitchOn,
        controlledBySwitchId: template.controlledBySwitchId,
        initiallyActive: template.initiallyActive,
        isActive: template.initiallyActive,
        kind: "Bridge",
        position,
      };
    case "WeakFloor": {
      let steps = Math.floor(template.initialSteps);
      if (!(steps >= 1)) {
        warnings.push({
          code: "NonPositiveSteps",
          initialSteps: template.initialSteps,
          position,
        });
        debugLog(
          "level",
          `WeakFloor at ${formatPosition(position)} has initialSteps ${String(template.initialSteps)}, using 1`,
        );
        steps = 1;
      }
      return {
        initialSteps: steps,
        kind: "WeakFloor",
        position,
        stepsRemaining: steps,
      };
    }
    default:
      return { kind: template.kind, position };
  }
}

function buildBoard(layout: ParsedLayout): LoadResult {
  const starts: Array<Position> = layout.placements
    .filter((p) => p.template.kind === "Start")
    .map((p) => p.position);
  const [start] = starts;
  if (start === undefined) return { error: { code: "NoStart" }, ok: false };
  if (starts.length > 1) {
    return { error: { code: "MultipleStarts", positions: starts }, ok: false };
  }

  const warnings = [...layout.warnings];
  const tiles = layout.placements.map((p) => createRuntimeTile(p, warnings));
  const board = new Board({
    height: layout.height,
    start,
    startFacing: layout.startFacing,
    tiles,
    width: layout.width,
  });

  debugLog(
    "level",
    `Loaded ${String(board.width)}x${String(board.height)} board, start ${formatPosition(start)} facing ${board.startFacing}`,
  );
  return { level: { board, warnings }, ok: true };
}

/** Build a fresh Board from either level shape. Never mutates the source. */
export function loadLevel(source: LevelSource): LoadResult {
  const parsed = isCompactLevel(source)
    ? parseCompactLevel(source)
    : parseGridLevel(source);
  if (!parsed.ok) {
    debugLog("level", describeLoadError(parsed.error));
    return parsed;
  }
  return buildBoard(parsed.layout);
}

export function describeLoadError(error: LevelLoadError): string {
  switch (error.code) {
    case "EmptyLayout":
      return "Level layout has no rows";
    case "InvalidSwitchId":
      return `${error.field} ${String(error.value)} in ${error.source} is not an integer`;
    case "NoStart":
      return "Level has no Start tile";
    case "MultipleStarts":
      return `Level has ${String(error.positions.length)} Start tiles: ${error.positions.map(formatPosition).join(", ")}`;
    case "UnknownTileType":
      return `Unknown tile type "${error.type}" in ${error.source}`;
    case "InvalidDefinitionKey":
      return `Definition #${String(error.index)} has an empty key`;
    case "AmbiguousDefinitionKey":
      return `Definition key "${error.key}" is defined more than once`;
    case "TileOutOfBounds":
      return `Tile (${String(error.at.x)},${String(error.at.y)}) is outside the ${String(error.width)}x${String(error.height)} grid`;
    case "DuplicateTilePosition":
      return `More than one tile at ${formatPosition(error.position)}`;
    case "InvalidLevelJson":
      return `Invalid level JSON: ${error.message}`;
  }
}
