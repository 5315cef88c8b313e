import type { Board } from "../core/board";
import type {
  Direction,
  Position,
  TilePlacement,
} from "../core/types";

// Optional per-tile parameters shared by definitions and literal tile records
export type TileFields = Readonly<{
  switchId?: number;
  controlledBySwitchId?: number;
  isBridgeInitiallyActive?: boolean;
  activateOnSwitchOn?: boolean;
  initialSteps?: number;
}>;

// Maps a layout key such as "W3" to a tile template
export type TileDefinition = TileFields &
  Readonly<{
    key: string;
    type: string;
  }>;

/** Rows are written top row first; the last row becomes y=0. */
export type CompactLevel = Readonly<{
  layout: ReadonlyArray<string>;
  definitions?: ReadonlyArray<TileDefinition>;
  startDirection?: string;
}>;

export type TileRecord = TileFields &
  Readonly<{
    type: string;
    position: Readonly<{ x: number; y: number }>;
  }>;

export type GridLevel = Readonly<{
  width: number;
  height: number;
  tiles: ReadonlyArray<TileRecord>;
  startDirection?: string;
}>;

export type LevelSource = CompactLevel | GridLevel;

export function isCompactLevel(source: LevelSource): source is CompactLevel {
  return "layout" in source;
}

export type LevelWarning =
  | {
      code: "UnknownSymbol";
      symbol: string;
      row: number; // index into the layout as written
      column: number; // string index within that row
      position: Position;
    }
  | { code: "UnknownStartDirection"; value: string }
  | { code: "NonPositiveSteps"; position: Position; initialSteps: number };

export type LevelLoadError =
  | { code: "EmptyLayout" }
  | { code: "NoStart" }
  | { code: "MultipleStarts"; positions: ReadonlyArray<Position> }
  | { code: "UnknownTileType"; type: string; source: string }
  | {
      code: "InvalidSwitchId";
      field: "switchId" | "controlledBySwitchId";
      value: number;
      source: string;
    }
  | { code: "InvalidDefinitionKey"; index: number }
  | { code: "AmbiguousDefinitionKey"; key: string }
  | {
      code: "TileOutOfBounds";
      at: Readonly<{ x: number; y: number }>;
      width: number;
      height: number;
    }
  | { code: "DuplicateTilePosition"; position: Position }
  | { code: "InvalidLevelJson"; message: string };

// Intermediate form shared by both level shapes, before runtime state exists
export type ParsedLayout = Readonly<{
  width: number;
  height: number;
  placements: ReadonlyArray<TilePlacement>;
  startFacing: Direction;
  warnings: ReadonlyArray<LevelWarning>;
}>;

export type LayoutResult =
  | { ok: true; layout: ParsedLayout }
  | { ok: false; error: LevelLoadError };

export type LoadedLevel = Readonly<{
  board: Board;
  warnings: ReadonlyArray<LevelWarning>;
}>;

export type LoadResult =
  | { ok: true; level: LoadedLevel }
  | { ok: false; error: LevelLoadError };
