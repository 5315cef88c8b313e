// Engine surface: boards, levels, commands and the paced interpreter

export { Board, visualOf } from "./core/board";
export type { BoardInit } from "./core/board";
export {
  DIRECTIONS,
  TILE_KINDS,
  createPosition,
  formatPosition,
  offsetPosition,
} from "./core/types";
export type {
  BridgeTile,
  Direction,
  LandingEffect,
  LandingOutcome,
  MoveResult,
  PlainTile,
  Position,
  SwitchTile,
  Tile,
  TileChange,
  TileKind,
  TileVisual,
  WeakFloorTile,
} from "./core/types";

export {
  countSteps,
  createRepeatCount,
  describeProgram,
  isLoop,
  loop,
  moveForward,
  turnLeft,
  turnRight,
} from "./commands";
export type {
  Command,
  LoopCommand,
  Program,
  RepeatCount,
  StepCommand,
  StepKind,
} from "./commands";

export { EventHub } from "./event-hub";
export type { Listener, Unsubscribe } from "./event-hub";
export type { DomainEvent, DomainEventKind, FailureReason } from "./events";

export { forwardOf, parseDirection, unitVector } from "./player/pose";
export type { PlayerPose } from "./player/pose";

export { loadLevelJson, parseLevelJson, toLevelSource } from "./level/json";
export type { LevelSourceResult } from "./level/json";
export { describeLoadError, loadLevel } from "./level/loader";
export { parseCompactLevel, parseGridLevel } from "./level/parser";
export { isCompactLevel } from "./level/types";
export type {
  CompactLevel,
  GridLevel,
  LevelLoadError,
  LevelSource,
  LevelWarning,
  LoadResult,
  LoadedLevel,
  TileDefinition,
  TileRecord,
} from "./level/types";

export { Interpreter } from "./interpreter/interpreter";
export type {
  InterpreterOptions,
  InterpreterStatus,
  RunOutcome,
} from "./interpreter/interpreter";
export { RunMachineService } from "./interpreter/run-machine";
export type { RunContext, RunState } from "./interpreter/run-machine";
export { immediateScheduler, timerScheduler } from "./interpreter/scheduler";
export type { Scheduler } from "./interpreter/scheduler";
