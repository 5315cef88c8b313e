import { DIRECTIONS } from "@/engine/core/types";
import {
  forwardOf,
  parseDirection,
  turnLeft,
  turnRight,
  unitVector,
} from "@/engine/player/pose";

import { pos } from "../../test-helpers";

describe("turning", () => {
  it("turns right clockwise", () => {
    expect(turnRight("Up")).toBe("Right");
    expect(turnRight("Right")).toBe("Down");
    expect(turnRight("Down")).toBe("Left");
    expect(turnRight("Left")).toBe("Up");
  });

  it("turns left counter-clockwise", () => {
    expect(turnLeft("Up")).toBe("Left");
    expect(turnLeft("Left")).toBe("Down");
    expect(turnLeft("Down")).toBe("Right");
    expect(turnLeft("Right")).toBe("Up");
  });

  it("returns to the same facing after four turns", () => {
    for (const d of DIRECTIONS) {
      expect(turnRight(turnRight(turnRight(turnRight(d))))).toBe(d);
      expect(turnLeft(turnRight(d))).toBe(d);
    }
  });
});

describe("forwardOf", () => {
  it("uses y-up unit vectors", () => {
    expect(unitVector("Up")).toEqual([0, 1]);
    expect(unitVector("Down")).toEqual([0, -1]);
    expect(forwardOf({ facing: "Up", position: pos(2, 2) })).toEqual(pos(2, 3));
    expect(forwardOf({ facing: "Right", position: pos(2, 2) })).toEqual(
      pos(3, 2),
    );
    expect(forwardOf({ facing: "Down", position: pos(2, 2) })).toEqual(
      pos(2, 1),
    );
    expect(forwardOf({ facing: "Left", position: pos(0, 0) })).toEqual(
      pos(-1, 0),
    );
  });
});

describe("parseDirection", () => {
  it("accepts any casing and surrounding space", () => {
    expect(parseDirection("right")).toBe("Right");
    expect(parseDirection("  DOWN ")).toBe("Down");
  });

  it("returns undefined for unknown names", () => {
    expect(parseDirection("East")).toBeUndefined();
    expect(parseDirection("")).toBeUndefined();
  });
});
