import type { StepKind } from "./commands";
import type { Direction, Position, TileVisual } from "./core/types";
import type { LevelLoadError } from "./level/types";
import type { LevelIndex } from "../types/brands";

export type FailureReason = "fell" | "floor-collapsed" | "not-on-end";

export type DomainEvent =
  | { kind: "SequenceStarted"; commandCount: number }
  | { kind: "StepTaken"; count: number; command: StepKind }
  | { kind: "PlayerMoved"; from: Position; to: Position }
  | { kind: "PlayerTurned"; dir: "left" | "right"; facing: Direction }
  | { kind: "MoveBlocked"; at: Position; target: Position }
  | { kind: "TileChanged"; position: Position; visual: TileVisual }
  | { kind: "SequenceCompleted"; stepsTaken: number }
  | { kind: "SequenceFailed"; reason: FailureReason; stepsTaken: number }
  | { kind: "SequenceHalted"; stepsTaken: number }
  | { kind: "LevelLoaded"; levelIndex: LevelIndex; width: number; height: number }
  | { kind: "LevelLoadFailed"; levelIndex: LevelIndex; error: LevelLoadError }
  | { kind: "LevelCompleted"; levelIndex: LevelIndex; stepsTaken: number }
  | { kind: "CampaignCompleted"; levelsPassed: number };

export type DomainEventKind = DomainEvent["kind"];
