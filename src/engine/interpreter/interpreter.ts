import { debugLog } from "../../utils/debug";
import { describeProgram, isLoop } from "../commands";
import { formatPosition } from "../core/types";
import { EventHub } from "../event-hub";
import { forwardOf, turnLeft, turnRight } from "../player/pose";

import { RunMachineService } from "./run-machine";
import { timerScheduler } from "./scheduler";

import type { Scheduler } from "./scheduler";
import type { RunState } from "./run-machine";
import type { DurationMs } from "../../types/brands";
import type { Command, Program, StepKind } from "../commands";
import type { Board } from "../core/board";
import type { DomainEvent, FailureReason } from "../events";
import type { PlayerPose } from "../player/pose";

export type InterpreterStatus =
  | "Idle"
  | "Running"
  | "Completed"
  | "Failed"
  | "Halted";

const STATUS_BY_STATE: Record<RunState, InterpreterStatus> = {
  completed: "Completed",
  failed: "Failed",
  halted: "Halted",
  idle: "Idle",
  running: "Running",
};

export type RunOutcome =
  | { status: "Completed"; stepsTaken: number }
  | { status: "Failed"; reason: FailureReason; stepsTaken: number }
  | { status: "Halted"; stepsTaken: number }
  | { status: "Rejected" };

export type InterpreterOptions = {
  board: Board;
  stepDelayMs: DurationMs;
  // Defaults to the board's start position and facing
  pose?: PlayerPose;
  scheduler?: Scheduler;
  events?: EventHub<DomainEvent>;
  onRestartRequested?: (reason: FailureReason) => void;
};

// One per run() call; a run is live until it has an outcome
type ActiveRun = {
  readonly controller: AbortController;
  outcome: RunOutcome | undefined;
};

/**
 * Executes a command program against a board, one paced step at a time.
 *
 * Commands are expanded depth-first. After every step the interpreter waits
 * `stepDelayMs` through the scheduler; `halt()` aborts that wait and the
 * next command never starts. A failure (falling, a collapsing floor, or
 * ending off the End tile) settles the run and requests a restart.
 */
export class Interpreter {
  readonly board: Board;
  readonly events: EventHub<DomainEvent>;
  private readonly machine = new RunMachineService();
  private readonly scheduler: Scheduler;
  private readonly stepDelayMs: DurationMs;
  private readonly onRestartRequested:
    | ((reason: FailureReason) => void)
    | undefined;
  private currentPose: PlayerPose;
  private active: ActiveRun | undefined;
  private reachedEnd = false;

  constructor(options: InterpreterOptions) {
    this.board = options.board;
    this.stepDelayMs = options.stepDelayMs;
    this.scheduler = options.scheduler ?? timerScheduler;
    this.events = options.events ?? new EventHub<DomainEvent>();
    this.onRestartRequested = options.onRestartRequested;
    this.currentPose = options.pose ?? {
      facing: options.board.startFacing,
      position: options.board.start,
    };
  }

  get status(): InterpreterStatus {
    return STATUS_BY_STATE[this.machine.state];
  }

  get pose(): PlayerPose {
    return this.currentPose;
  }

  /** Steps executed by the current (or last) run. */
  get stepsTaken(): number {
    return this.machine.getState().context.stepsTaken;
  }

  async run(program: Program): Promise<RunOutcome> {
    if (this.machine.state === "running") {
      debugLog("interpreter", "run() ignored: a sequence is already running");
      return { status: "Rejected" };
    }

    const run: ActiveRun = {
      controller: new AbortController(),
      outcome: undefined,
    };
    this.active = run;
    this.reachedEnd = false;
    this.machine.send({ type: "RUN" });
    debugLog("interpreter", `Running ${describeProgram(program)}`);

    try {
      this.events.emit({
        commandCount: program.length,
        kind: "SequenceStarted",
      });
      await this.executeAll(program, run);
    } catch (e) {
      // A throwing listener must not leave the machine running
      this.haltRun(run);
      throw e;
    }

    if (run.outcome === undefined && !run.controller.signal.aborted) {
      return this.finish(run);
    }
    return run.outcome ?? this.haltRun(run);
  }

  /** Stop the current run. Safe to call at any time, any number of times. */
  halt(): void {
    if (this.active !== undefined) this.haltRun(this.active);
  }

  private isLive(run: ActiveRun): boolean {
    return run.outcome === undefined && !run.controller.signal.aborted;
  }

  private async executeAll(
    commands: ReadonlyArray<Command>,
    run: ActiveRun,
  ): Promise<void> {
    for (const command of commands) {
      if (!this.isLive(run)) return;
      if (isLoop(command)) {
        for (let pass = 0; pass < command.repeatCount; pass++) {
          await this.executeAll(command.body, run);
          if (!this.isLive(run)) return;
        }
      } else {
        await this.executeStep(command.kind, run);
      }
    }
  }

  private async executeStep(kind: StepKind, run: ActiveRun): Promise<void> {
    this.machine.send({ type: "STEP" });
    this.events.emit({
      command: kind,
      count: this.stepsTaken,
      kind: "StepTaken",
    });
    if (!this.isLive(run)) return;

    switch (kind) {
      case "TurnLeft":
        this.turn("left");
        break;
      case "TurnRight":
        this.turn("right");
        break;
      case "MoveForward":
        this.moveForward(run);
        break;
    }

    if (this.isLive(run)) {
      await this.scheduler.wait(this.stepDelayMs, run.controller.signal);
    }
  }

  private turn(dir: "left" | "right"): void {
    const facing =
      dir === "left"
        ? turnLeft(this.currentPose.facing)
        : turnRight(this.currentPose.facing);
    this.currentPose = { ...this.currentPose, facing };
    this.events.emit({ dir, facing, kind: "PlayerTurned" });
  }

  private moveForward(run: ActiveRun): void {
    const from = this.currentPose.position;
    const target = forwardOf(this.currentPose);

    switch (this.board.checkMove(target)) {
      case "Blocked":
        this.events.emit({ at: from, kind: "MoveBlocked", target });
        return;
      case "Fall":
        this.fail(run, "fell");
        return;
      case "Success":
        break;
    }

    this.currentPose = { ...this.currentPose, position: target };
    this.events.emit({ from, kind: "PlayerMoved", to: target });

    const landing = this.board.onPlayerLanded(target);
    for (const change of landing.changes) {
      this.events.emit({ kind: "TileChanged", ...change });
    }
    if (landing.effect === "collapsed") {
      this.fail(run, "floor-collapsed");
    } else if (landing.effect === "reachedEnd") {
      this.reachedEnd = true;
    }
  }

  private finish(run: ActiveRun): RunOutcome {
    const here = this.board.tileAt(this.currentPose.position);
    if (here?.kind !== "End") {
      if (this.reachedEnd) {
        debugLog(
          "interpreter",
          `End was reached, but the program finished at ${formatPosition(this.currentPose.position)}`,
        );
      }
      return this.fail(run, "not-on-end");
    }

    const stepsTaken = this.stepsTaken;
    const outcome: RunOutcome = { status: "Completed", stepsTaken };
    run.outcome = outcome;
    run.controller.abort();
    this.machine.send({ type: "COMPLETE" });
    debugLog("interpreter", `Completed in ${String(stepsTaken)} steps`);
    this.events.emit({ kind: "SequenceCompleted", stepsTaken });
    return outcome;
  }

  private fail(run: ActiveRun, reason: FailureReason): RunOutcome {
    if (run.outcome !== undefined) return run.outcome;

    const stepsTaken = this.stepsTaken;
    const outcome: RunOutcome = { reason, status: "Failed", stepsTaken };
    run.outcome = outcome;
    run.controller.abort();
    this.machine.send({ reason, type: "FAIL" });
    debugLog(
      "interpreter",
      `Failed (${reason}) at ${formatPosition(this.currentPose.position)} after ${String(stepsTaken)} steps`,
    );
    this.events.emit({ kind: "SequenceFailed", reason, stepsTaken });
    this.onRestartRequested?.(reason);
    return outcome;
  }

  private haltRun(run: ActiveRun): RunOutcome {
    if (run.outcome !== undefined) return run.outcome;

    const stepsTaken = this.stepsTaken;
    const outcome: RunOutcome = { status: "Halted", stepsTaken };
    run.outcome = outcome;
    run.controller.abort();
    this.machine.send({ type: "HALT" });
    debugLog("interpreter", `Halted after ${String(stepsTaken)} steps`);
    this.events.emit({ kind: "SequenceHalted", stepsTaken });
    return outcome;
  }
}
