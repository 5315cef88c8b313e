import { createLevelIndex, levelIndexAsNumber } from "../types/brands";
import { debugLog } from "../utils/debug";
import { EventHub } from "../engine/event-hub";
import { Interpreter } from "../engine/interpreter/interpreter";
import { describeLoadError, loadLevel } from "../engine/level/loader";

import { resolveSettings } from "./settings";

import type { ProgressTracker } from "./progress";
import type { RuntimeSettings } from "./settings";
import type { Program } from "../engine/commands";
import type { Board } from "../engine/core/board";
import type { DomainEvent, FailureReason } from "../engine/events";
import type {
  InterpreterStatus,
  RunOutcome,
} from "../engine/interpreter/interpreter";
import type { Scheduler } from "../engine/interpreter/scheduler";
import type {
  LevelSource,
  LevelWarning,
  LoadResult,
} from "../engine/level/types";
import type { LevelIndex } from "../types/brands";

export type CampaignOptions = {
  levels: ReadonlyArray<LevelSource>;
  settings?: Partial<RuntimeSettings>;
  scheduler?: Scheduler;
  events?: EventHub<DomainEvent>;
  progress?: ProgressTracker;
  onRestartRequested?: (levelIndex: LevelIndex, reason: FailureReason) => void;
  onNextLevel?: (nextIndex: LevelIndex) => void;
  onCampaignCompleted?: () => void;
};

type LoadedState = Readonly<{
  index: LevelIndex;
  board: Board;
  interpreter: Interpreter;
  warnings: ReadonlyArray<LevelWarning>;
}>;

/**
 * Walks an ordered list of levels. Every load (first load, restart,
 * advance) builds a fresh board and interpreter from the level source;
 * nothing is carried over from the previous attempt.
 */
export class Campaign {
  readonly events: EventHub<DomainEvent>;
  readonly settings: RuntimeSettings;
  private readonly levels: ReadonlyArray<LevelSource>;
  private readonly options: CampaignOptions;
  private loaded: LoadedState | undefined;

  constructor(options: CampaignOptions) {
    this.options = options;
    this.levels = options.levels;
    this.settings = resolveSettings(options.settings);
    this.events = options.events ?? new EventHub<DomainEvent>();
  }

  get levelCount(): number {
    return this.levels.length;
  }

  get levelIndex(): LevelIndex | undefined {
    return this.loaded?.index;
  }

  get board(): Board | undefined {
    return this.loaded?.board;
  }

  get interpreter(): Interpreter | undefined {
    return this.loaded?.interpreter;
  }

  get warnings(): ReadonlyArray<LevelWarning> {
    return this.loaded?.warnings ?? [];
  }

  get status(): InterpreterStatus | undefined {
    return this.loaded?.interpreter.status;
  }

  /** Open a progress session under the configured name, then load level 0. */
  async start(): Promise<LoadResult> {
    const { progress } = this.options;
    if (progress !== undefined && progress.current === undefined) {
      await progress.beginSession(this.settings.playerName);
    }
    return this.loadLevel(0);
  }

  loadLevel(index: number): LoadResult {
    const source = this.levels[index];
    if (source === undefined) {
      throw new RangeError(
        `Level ${String(index)} does not exist (campaign has ${String(this.levels.length)})`,
      );
    }
    const levelIndex = createLevelIndex(index);

    this.loaded?.interpreter.halt();
    this.loaded = undefined;

    const result = loadLevel(source);
    if (!result.ok) {
      debugLog(
        "campaign",
        `Level ${String(index)} failed to load: ${describeLoadError(result.error)}`,
      );
      // Restart and advance load without a caller to return this to
      this.events.emit({
        error: result.error,
        kind: "LevelLoadFailed",
        levelIndex,
      });
      return result;
    }

    const { board, warnings } = result.level;
    const interpreter = new Interpreter({
      board,
      events: this.events,
      onRestartRequested: (reason) => {
        this.handleFailure(levelIndex, reason);
      },
      stepDelayMs: this.settings.stepDelayMs,
      ...(this.options.scheduler === undefined
        ? {}
        : { scheduler: this.options.scheduler }),
    });
    this.loaded = { board, index: levelIndex, interpreter, warnings };

    debugLog("campaign", `Level ${String(index)} loaded`);
    this.events.emit({
      height: board.height,
      kind: "LevelLoaded",
      levelIndex,
      width: board.width,
    });
    return result;
  }

  /** Reload the current level from its source. */
  restart(): LoadResult {
    const index = this.requireLoaded().index;
    return this.loadLevel(levelIndexAsNumber(index));
  }

  async run(program: Program): Promise<RunOutcome> {
    const { index, interpreter } = this.requireLoaded();
    const outcome = await interpreter.run(program);
    if (outcome.status === "Completed") {
      await this.completeLevel(index, outcome.stepsTaken);
    }
    return outcome;
  }

  halt(): void {
    this.loaded?.interpreter.halt();
  }

  private requireLoaded(): LoadedState {
    if (this.loaded === undefined) throw new Error("No level is loaded");
    return this.loaded;
  }

  // Runs inside the failing interpreter's run, after SequenceFailed
  private handleFailure(index: LevelIndex, reason: FailureReason): void {
    this.options.onRestartRequested?.(index, reason);
    if (!this.settings.autoRestart) return;
    debugLog("campaign", `Restarting level ${String(index)} after ${reason}`);
    this.loadLevel(levelIndexAsNumber(index));
  }

  private async completeLevel(
    index: LevelIndex,
    stepsTaken: number,
  ): Promise<void> {
    this.events.emit({ kind: "LevelCompleted", levelIndex: index, stepsTaken });
    await this.options.progress?.recordLevelPassed(
      levelIndexAsNumber(index) + 1,
      stepsTaken,
    );

    const next = levelIndexAsNumber(index) + 1;
    if (next >= this.levels.length) {
      debugLog("campaign", "Last level completed");
      this.events.emit({
        kind: "CampaignCompleted",
        levelsPassed: this.levels.length,
      });
      this.options.onCampaignCompleted?.();
      return;
    }

    const nextIndex = createLevelIndex(next);
    this.options.onNextLevel?.(nextIndex);
    if (this.settings.autoAdvance) this.loadLevel(next);
  }
}
