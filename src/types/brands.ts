// Branded numbers used across the engine and the campaign

// Pause between executed steps, in milliseconds
declare const DurationMsBrand: unique symbol;
export type DurationMs = number & { readonly [DurationMsBrand]: true };

// One board axis; integer, may be negative while probing off-board cells
declare const GridCoordBrand: unique symbol;
export type GridCoord = number & { readonly [GridCoordBrand]: true };

// Shared by a switch and every bridge it drives; 0 means unassigned
declare const SwitchIdBrand: unique symbol;
export type SwitchId = number & { readonly [SwitchIdBrand]: true };

// Zero-based slot of a level in a campaign
declare const LevelIndexBrand: unique symbol;
export type LevelIndex = number & { readonly [LevelIndexBrand]: true };

export function isDurationMs(n: unknown): n is DurationMs {
  return typeof n === "number" && n >= 0 && Number.isFinite(n);
}

export function createDurationMs(value: number): DurationMs {
  if (!isDurationMs(value)) {
    throw new Error(
      `Step delay must be a non-negative number of ms, got ${String(value)}`,
    );
  }
  return value;
}

export function createGridCoord(value: number): GridCoord {
  if (!Number.isInteger(value)) {
    throw new Error(`Grid coordinate must be an integer, got ${String(value)}`);
  }
  return value as GridCoord;
}

export function isSwitchId(n: unknown): n is SwitchId {
  return typeof n === "number" && Number.isInteger(n);
}

export function createSwitchId(value: number): SwitchId {
  if (!isSwitchId(value)) {
    throw new Error(`Switch id must be an integer, got ${String(value)}`);
  }
  return value;
}

export function createLevelIndex(value: number): LevelIndex {
  if (!Number.isInteger(value) || value < 0) {
    throw new Error(
      `Level index must be a non-negative integer, got ${String(value)}`,
    );
  }
  return value as LevelIndex;
}

export const durationMsAsNumber = (d: DurationMs): number => d;
export const gridCoordAsNumber = (g: GridCoord): number => g;
export const levelIndexAsNumber = (l: LevelIndex): number => l;
