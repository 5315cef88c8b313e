import {
  loadLevelJson,
  parseLevelJson,
  toLevelSource,
} from "@/engine/level/json";

import { pos } from "../../test-helpers";

function invalid(message: string): unknown {
  return { error: { code: "InvalidLevelJson", message }, ok: false };
}

describe("toLevelSource", () => {
  it("accepts a compact level", () => {
    const raw = {
      definitions: [
        { key: "s", switchId: 1, type: "Switch" },
        {
          activateOnSwitchOn: false,
          controlledBySwitchId: 1,
          key: "b",
          type: "Bridge",
        },
      ],
      layout: ["Ssb.E"],
      startDirection: "Right",
    };
    expect(toLevelSource(raw)).toEqual({ ok: true, source: raw });
  });

  it("accepts a literal grid level", () => {
    const raw = {
      height: 1,
      tiles: [
        { position: { x: 0, y: 0 }, type: "Start" },
        { initialSteps: 2, position: { x: 1, y: 0 }, type: "WeakFloor" },
      ],
      width: 2,
    };
    expect(toLevelSource(raw)).toEqual({ ok: true, source: raw });
  });

  it("does not copy unknown fields", () => {
    const result = toLevelSource({ author: "someone", layout: ["S"] });
    expect(result).toEqual({ ok: true, source: { layout: ["S"] } });
  });

  it("rejects values that are not objects", () => {
    expect(toLevelSource(["S"])).toEqual(invalid("level must be an object"));
    expect(toLevelSource(null)).toEqual(invalid("level must be an object"));
  });

  it("names the first malformed field", () => {
    expect(toLevelSource({ layout: "S.E" })).toEqual(
      invalid("layout must be an array of strings"),
    );
    expect(
      toLevelSource({
        definitions: [
          { key: "a", type: "Floor" },
          { key: "b", switchId: "1", type: "Switch" },
        ],
        layout: ["S"],
      }),
    ).toEqual(invalid("definitions[1].switchId must be an integer"));
    expect(
      toLevelSource({ definitions: [{ type: "Floor" }], layout: ["S"] }),
    ).toEqual(invalid("definitions[0].key must be a string"));
    expect(toLevelSource({ layout: ["S"], startDirection: 2 })).toEqual(
      invalid("startDirection must be a string"),
    );
    expect(
      toLevelSource({
        height: 1,
        tiles: [{ position: { x: 0 }, type: "Start" }],
        width: 1,
      }),
    ).toEqual(invalid("tiles[0].position must be {x, y} integers"));
    expect(toLevelSource({ tiles: [] })).toEqual(
      invalid("width and height must be integers"),
    );
  });
});

describe("parseLevelJson", () => {
  it("parses JSON text", () => {
    expect(parseLevelJson('{"layout":["S.E"]}')).toEqual({
      ok: true,
      source: { layout: ["S.E"] },
    });
  });

  it("reports malformed JSON as InvalidLevelJson", () => {
    const result = parseLevelJson("{ layout: ");
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.code).toBe("InvalidLevelJson");
  });
});

describe("loadLevelJson", () => {
  it("loads a board straight from text", () => {
    const result = loadLevelJson('{"layout":["S.E"],"startDirection":"Right"}');
    if (!result.ok) throw new Error(result.error.code);
    expect(result.level.board.start).toEqual(pos(0, 0));
    expect(result.level.board.startFacing).toBe("Right");
  });

  it("reports structural errors after validation", () => {
    expect(loadLevelJson('{"layout":["..E"]}')).toEqual({
      error: { code: "NoStart" },
      ok: false,
    });
  });
});
