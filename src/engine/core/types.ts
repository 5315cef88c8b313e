import {
  type GridCoord,
  type SwitchId,
  createGridCoord,
  gridCoordAsNumber,
} from "../../types/brands";

export type { GridCoord, SwitchId } from "../../types/brands";

// Grid positions - y=0 is the bottom row, x grows to the right
export type Position = Readonly<{
  x: GridCoord;
  y: GridCoord;
}>;

export function createPosition(x: number, y: number): Position {
  return { x: createGridCoord(x), y: createGridCoord(y) };
}

export function offsetPosition(p: Position, dx: number, dy: number): Position {
  return createPosition(
    gridCoordAsNumber(p.x) + dx,
    gridCoordAsNumber(p.y) + dy,
  );
}

export function formatPosition(p: Position): string {
  return `(${String(p.x)},${String(p.y)})`;
}

// Cardinal facings, listed clockwise so rotation is index arithmetic
export type Direction = "Up" | "Right" | "Down" | "Left";
export const DIRECTIONS: ReadonlyArray<Direction> = [
  "Up",
  "Right",
  "Down",
  "Left",
] as const;

export type TileKind =
  | "Floor"
  | "Wall"
  | "Air"
  | "Start"
  | "End"
  | "Switch"
  | "Bridge"
  | "WeakFloor";

export const TILE_KINDS: ReadonlyArray<TileKind> = [
  "Floor",
  "Wall",
  "Air",
  "Start",
  "End",
  "Switch",
  "Bridge",
  "WeakFloor",
] as const;

export type StatefulKind = "Switch" | "Bridge" | "WeakFloor";
export type PlainKind = Exclude<TileKind, StatefulKind>;

export type PlainTile = {
  readonly kind: PlainKind;
  readonly position: Position;
};

export type SwitchTile = {
  readonly kind: "Switch";
  readonly position: Position;
  readonly switchId: SwitchId;
  isOn: boolean;
};

export type BridgeTile = {
  readonly kind: "Bridge";
  readonly position: Position;
  readonly controlledBySwitchId: SwitchId;
  readonly activatesWhenSwitchOn: boolean;
  readonly initiallyActive: boolean;
  isActive: boolean;
};

export type WeakFloorTile = {
  readonly kind: "WeakFloor";
  readonly position: Position;
  readonly initialSteps: number;
  stepsRemaining: number;
};

export type Tile = PlainTile | SwitchTile | BridgeTile | WeakFloorTile;

// Everything a level author can say about a tile, before runtime state exists
export type TileTemplate = Readonly<{
  kind: TileKind;
  switchId: SwitchId;
  controlledBySwitchId: SwitchId;
  initiallyActive: boolean;
  activatesWhenSwitchOn: boolean;
  initialSteps: number;
}>;

export type TilePlacement = Readonly<{
  position: Position;
  template: TileTemplate;
}>;

export type MoveResult = "Success" | "Blocked" | "Fall";

export type TileVisual =
  | "floor"
  | "wall"
  | "air"
  | "start"
  | "end"
  | "switch-on"
  | "switch-off"
  | "bridge-active"
  | "bridge-inactive"
  | `weak-floor-${number}`;

export type TileChange = Readonly<{
  position: Position;
  visual: TileVisual;
}>;

export type LandingEffect = "none" | "collapsed" | "reachedEnd";

export type LandingOutcome = Readonly<{
  changes: ReadonlyArray<TileChange>;
  effect: LandingEffect;
}>;
