import { gridCoordAsNumber } from "../../types/brands";
import { debugLog } from "../../utils/debug";

import { formatPosition } from "./types";

import type {
  BridgeTile,
  Direction,
  LandingOutcome,
  MoveResult,
  PlainTile,
  Position,
  SwitchTile,
  Tile,
  TileChange,
  TileVisual,
  WeakFloorTile,
} from "./types";

const NO_EFFECT: LandingOutcome = { changes: [], effect: "none" };

export type BoardInit = Readonly<{
  width: number;
  height: number;
  tiles: ReadonlyArray<Tile>;
  start: Position;
  startFacing: Direction;
}>;

/**
 * Owns every tile of a loaded level. Tiles are only mutated through the
 * landing and switch-sync operations below; queries hand out readonly views.
 */
export class Board {
  readonly width: number;
  readonly height: number;
  readonly start: Position;
  readonly startFacing: Direction;
  private readonly cells: Array<Tile | undefined>;

  constructor(init: BoardInit) {
    this.width = init.width;
    this.height = init.height;
    this.start = init.start;
    this.startFacing = init.startFacing;
    this.cells = new Array<Tile | undefined>(init.width * init.height).fill(
      undefined,
    );
    for (const tile of init.tiles) {
      const i = this.indexOf(tile.position);
      if (i === null) {
        throw new Error(
          `Tile ${formatPosition(tile.position)} lies outside a ${String(init.width)}x${String(init.height)} board`,
        );
      }
      this.cells[i] = tile;
    }
    for (const tile of this.tiles()) {
      if (tile.kind === "Switch") this.syncSwitch(tile);
    }
  }

  // Storage is row-major: y * width + x
  private indexOf(position: Position): number | null {
    const x = gridCoordAsNumber(position.x);
    const y = gridCoordAsNumber(position.y);
    if (x < 0 || x >= this.width || y < 0 || y >= this.height) return null;
    return y * this.width + x;
  }

  private cellAt(position: Position): Tile | undefined {
    const i = this.indexOf(position);
    return i === null ? undefined : this.cells[i];
  }

  tileAt(position: Position): Readonly<Tile> | undefined {
    return this.cellAt(position);
  }

  /** Every materialized tile, in ascending position order (x, then y). */
  tiles(): ReadonlyArray<Readonly<Tile>> {
    const out: Array<Tile> = [];
    for (let x = 0; x < this.width; x++) {
      for (let y = 0; y < this.height; y++) {
        const tile = this.cells[y * this.width + x];
        if (tile !== undefined) out.push(tile);
      }
    }
    return out;
  }

  checkMove(target: Position): MoveResult {
    const tile = this.cellAt(target);
    if (tile === undefined) return "Fall";
    switch (tile.kind) {
      case "Wall":
        return "Blocked";
      case "Air":
        return "Fall";
      case "Bridge":
        return tile.isActive ? "Success" : "Fall";
      default:
        return "Success";
    }
  }

  onPlayerLanded(position: Position): LandingOutcome {
    const tile = this.cellAt(position);
    if (tile === undefined) return NO_EFFECT;

    switch (tile.kind) {
      case "Switch": {
        tile.isOn = !tile.isOn;
        debugLog(
          "board",
          `Switch ${String(tile.switchId)} at ${formatPosition(tile.position)} turned ${tile.isOn ? "ON" : "OFF"}`,
        );
        return {
          changes: [changeOf(tile), ...this.syncSwitch(tile)],
          effect: "none",
        };
      }
      case "WeakFloor":
        return this.stepOnWeakFloor(tile);
      case "End":
        return { changes: [], effect: "reachedEnd" };
      default:
        return NO_EFFECT;
    }
  }

  /**
   * Recompute every bridge bound to this switch. Returns only the bridges
   * whose state actually changed, so a repeated sync reports nothing.
   */
  syncSwitch(switchTile: Readonly<SwitchTile>): ReadonlyArray<TileChange> {
    const changes: Array<TileChange> = [];
    for (const tile of this.cells) {
      if (!isBridgeOf(tile, switchTile)) continue;
      const next = switchTile.isOn === tile.activatesWhenSwitchOn;
      if (tile.isActive === next) continue;
      tile.isActive = next;
      changes.push(changeOf(tile));
    }
    return changes;
  }

  private stepOnWeakFloor(tile: WeakFloorTile): LandingOutcome {
    if (tile.stepsRemaining <= 0) return NO_EFFECT;
    tile.stepsRemaining -= 1;
    debugLog(
      "board",
      `Weak floor at ${formatPosition(tile.position)} has ${String(tile.stepsRemaining)} steps left`,
    );
    if (tile.stepsRemaining > 0) {
      return { changes: [changeOf(tile)], effect: "none" };
    }

    // The cell itself degrades, so every later query sees Air here
    const air: PlainTile = { kind: "Air", position: tile.position };
    const i = this.indexOf(tile.position);
    if (i !== null) this.cells[i] = air;
    return { changes: [changeOf(air)], effect: "collapsed" };
  }
}

function isBridgeOf(
  tile: Tile | undefined,
  switchTile: Readonly<SwitchTile>,
): tile is BridgeTile {
  return (
    tile !== undefined &&
    tile.kind === "Bridge" &&
    tile.controlledBySwitchId === switchTile.switchId
  );
}

function changeOf(tile: Readonly<Tile>): TileChange {
  return { position: tile.position, visual: visualOf(tile) };
}

export function visualOf(tile: Readonly<Tile>): TileVisual {
  switch (tile.kind) {
    case "Switch":
      return tile.isOn ? "switch-on" : "switch-off";
    case "Bridge":
      return tile.isActive ? "bridge-active" : "bridge-inactive";
    case "WeakFloor":
      return `weak-floor-${tile.stepsRemaining}`;
    case "Floor":
      return "floor";
    case "Wall":
      return "wall";
    case "Air":
      return "air";
    case "Start":
      return "start";
    case "End":
      return "end";
  }
}
