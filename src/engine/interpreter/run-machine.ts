/*
 * Run lifecycle as a robot3 machine.
 *
 * idle → running (RUN)
 * running → running (STEP, counts the step)
 * running → completed (COMPLETE) | failed (FAIL) | halted (HALT)
 * completed | failed | halted → running (RUN, fresh counters)
 *
 * Events with no transition in the current state are ignored by robot3,
 * so a late HALT after a run settled is a no-op.
 */

import {
  createMachine,
  interpret,
  reduce,
  state,
  transition,
} from "robot3";

import type { FailureReason } from "../events";
import type {
  Machine,
  MachineState,
  MachineStates,
  Service,
  Transition,
} from "robot3";

export type RunState = "idle" | "running" | "completed" | "failed" | "halted";

export type RunContext = {
  stepsTaken: number; // atomic steps executed in the current run
  failure: FailureReason | undefined; // set only on entering failed
  runs: number; // runs started since creation
};

export type RunEvent =
  | { type: "RUN" }
  | { type: "STEP" }
  | { type: "COMPLETE" }
  | { type: "FAIL"; reason: FailureReason }
  | { type: "HALT" };

type RunEventType = RunEvent["type"];
type RunTransition = Transition<RunEventType>;

export const startRun = (ctx: RunContext, event: RunEvent): RunContext => {
  void event;
  return { failure: undefined, runs: ctx.runs + 1, stepsTaken: 0 };
};

export const countStep = (ctx: RunContext, event: RunEvent): RunContext => {
  void event;
  return { ...ctx, stepsTaken: ctx.stepsTaken + 1 };
};

export const recordFailure = (
  ctx: RunContext,
  event: RunEvent,
): RunContext => {
  if (event.type === "FAIL") {
    return { ...ctx, failure: event.reason };
  }
  return ctx;
};

// Every settled state accepts a new run
const createSettledState = (): MachineState<RunEventType> =>
  state<RunTransition>(transition("RUN", "running", reduce(startRun)));

// state() infers its event type from the first transition unless told
const createRunningState = (): MachineState<RunEventType> =>
  state<RunTransition>(
    transition("STEP", "running", reduce(countStep)),
    transition("COMPLETE", "completed"),
    transition("FAIL", "failed", reduce(recordFailure)),
    transition("HALT", "halted"),
  );

type RunStatesObject = Record<RunState, MachineState<RunEventType>>;
export type RunMachine = Machine<
  RunStatesObject,
  RunContext,
  RunState,
  RunEventType
>;

export const createDefaultRunContext = (): RunContext => ({
  failure: undefined,
  runs: 0,
  stepsTaken: 0,
});

export const createRunMachine = (initialContext: RunContext): RunMachine => {
  const states = {
    completed: createSettledState(),
    failed: createSettledState(),
    halted: createSettledState(),
    idle: createSettledState(),
    running: createRunningState(),
  } as const;

  // robot3 widens the event type to string; keep ours at the module boundary
  return createMachine(
    "idle" as const,
    states as unknown as MachineStates<RunStatesObject, RunEventType>,
    (_ctx: RunContext): RunContext => initialContext,
  ) as unknown as RunMachine;
};

type RunService = Service<RunMachine>;

/** Thin wrapper: all transitions live in the machine above. */
export class RunMachineService {
  private readonly service: RunService;
  private currentStateName: RunState = "idle";

  constructor(initialContext?: RunContext) {
    const machine = createRunMachine(
      initialContext ?? createDefaultRunContext(),
    );
    this.service = interpret(machine, (service) => {
      this.currentStateName = service.machine.state.name;
    });
  }

  send(event: RunEvent): RunState {
    this.service.send(event);
    return this.currentStateName;
  }

  get state(): RunState {
    return this.currentStateName;
  }

  getState(): { state: RunState; context: RunContext } {
    return {
      context: { ...this.service.context },
      state: this.currentStateName,
    };
  }
}
