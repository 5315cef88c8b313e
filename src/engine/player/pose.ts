import { DIRECTIONS, offsetPosition } from "../core/types";

import type { Direction, Position } from "../core/types";

export type PlayerPose = Readonly<{
  position: Position;
  facing: Direction;
}>;

// Up points at larger y because row 0 is the bottom of the board
const UNIT_VECTORS: Record<Direction, readonly [number, number]> = {
  Down: [0, -1],
  Left: [-1, 0],
  Right: [1, 0],
  Up: [0, 1],
};

function rotate(facing: Direction, quarterTurns: number): Direction {
  const i = DIRECTIONS.indexOf(facing);
  const next = DIRECTIONS[(i + quarterTurns + 4) % 4];
  if (next === undefined) {
    throw new Error(`Unknown facing ${facing}`);
  }
  return next;
}

export function turnLeft(facing: Direction): Direction {
  return rotate(facing, -1);
}

export function turnRight(facing: Direction): Direction {
  return rotate(facing, 1);
}

export function unitVector(facing: Direction): readonly [number, number] {
  return UNIT_VECTORS[facing];
}

/** The cell directly in front of the player. */
export function forwardOf(pose: PlayerPose): Position {
  const [dx, dy] = unitVector(pose.facing);
  return offsetPosition(pose.position, dx, dy);
}

// Case-insensitive, tolerates surrounding whitespace
export function parseDirection(raw: string): Direction | undefined {
  const wanted = raw.trim().toLowerCase();
  return DIRECTIONS.find((d) => d.toLowerCase() === wanted);
}
