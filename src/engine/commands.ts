export type StepKind = "MoveForward" | "TurnLeft" | "TurnRight";

// Loop counts only come from createRepeatCount, which never yields less than 1
declare const RepeatCountBrand: unique symbol;
export type RepeatCount = number & { readonly [RepeatCountBrand]: true };

export type StepCommand = Readonly<{ kind: StepKind }>;

export type LoopCommand = Readonly<{
  kind: "Loop";
  repeatCount: RepeatCount;
  body: ReadonlyArray<Command>;
}>;

export type Command = StepCommand | LoopCommand;

export type Program = ReadonlyArray<Command>;

/**
 * Clamp a requested repeat count. Zero, negative and non-finite requests
 * still run the body once; fractional counts are floored first.
 */
export function createRepeatCount(requested: number): RepeatCount {
  const n = Number.isFinite(requested) ? Math.floor(requested) : 1;
  return Math.max(1, n) as RepeatCount;
}

export const moveForward = (): StepCommand => ({ kind: "MoveForward" });
export const turnLeft = (): StepCommand => ({ kind: "TurnLeft" });
export const turnRight = (): StepCommand => ({ kind: "TurnRight" });

export function loop(
  repeatCount: number,
  body: ReadonlyArray<Command>,
): LoopCommand {
  return {
    body: Object.freeze([...body]),
    kind: "Loop",
    repeatCount: createRepeatCount(repeatCount),
  };
}

export function isLoop(command: Command): command is LoopCommand {
  return command.kind === "Loop";
}

/** Number of atomic steps a full, failure-free run of the program executes. */
export function countSteps(program: Program): number {
  let total = 0;
  for (const command of program) {
    total += isLoop(command)
      ? command.repeatCount * countSteps(command.body)
      : 1;
  }
  return total;
}

const STEP_GLYPHS: Record<StepKind, string> = {
  MoveForward: "F",
  TurnLeft: "L",
  TurnRight: "R",
};

/** Compact text form for logs, e.g. `F 3x[F R] L`. */
export function describeProgram(program: Program): string {
  return program
    .map((command) =>
      isLoop(command)
        ? `${String(command.repeatCount)}x[${describeProgram(command.body)}]`
        : STEP_GLYPHS[command.kind],
    )
    .join(" ");
}
