import { describeLoadError, loadLevel } from "@/engine/level/loader";

import { mustLoadLevel, pos } from "../../test-helpers";

describe("loadLevel", () => {
  it("builds a board with the start tile and facing", () => {
    const { board, warnings } = mustLoadLevel({
      layout: ["..E", "S.."],
      startDirection: "right",
    });

    expect(board.width).toBe(3);
    expect(board.height).toBe(2);
    expect(board.start).toEqual(pos(0, 0));
    expect(board.startFacing).toBe("Right");
    expect(warnings).toEqual([]);
  });

  it("rejects a level with no Start tile", () => {
    expect(loadLevel({ layout: ["..E"] })).toEqual({
      error: { code: "NoStart" },
      ok: false,
    });
  });

  it("rejects a level with more than one Start tile", () => {
    expect(loadLevel({ layout: ["S.S"] })).toEqual({
      error: { code: "MultipleStarts", positions: [pos(0, 0), pos(2, 0)] },
      ok: false,
    });
  });

  it("passes parser errors through", () => {
    expect(loadLevel({ layout: [] })).toEqual({
      error: { code: "EmptyLayout" },
      ok: false,
    });
  });

  it("returns an error instead of throwing for a bad switch id", () => {
    const result = loadLevel({
      definitions: [{ key: "s", switchId: 1.5, type: "Switch" }],
      layout: ["Ss"],
    });
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(describeLoadError(result.error)).toBe(
      'switchId 1.5 in definition "s" is not an integer',
    );
  });

  it("starts switches off and weak floors at their initial steps", () => {
    const { board } = mustLoadLevel({
      definitions: [
        { key: "s", switchId: 3, type: "Switch" },
        { initialSteps: 4, key: "w", type: "WeakFloor" },
      ],
      layout: ["Ssw"],
    });

    expect(board.tileAt(pos(1, 0))).toEqual({
      isOn: false,
      kind: "Switch",
      position: pos(1, 0),
      switchId: 3,
    });
    expect(board.tileAt(pos(2, 0))).toEqual({
      initialSteps: 4,
      kind: "WeakFloor",
      position: pos(2, 0),
      stepsRemaining: 4,
    });
  });

  it("treats weak floors without positive steps as one step", () => {
    const { board, warnings } = mustLoadLevel({
      definitions: [
        { key: "a", type: "WeakFloor" },
        { initialSteps: -2, key: "b", type: "WeakFloor" },
      ],
      layout: ["Sab"],
    });

    expect(board.tileAt(pos(1, 0))).toMatchObject({ stepsRemaining: 1 });
    expect(board.tileAt(pos(2, 0))).toMatchObject({ stepsRemaining: 1 });
    expect(warnings).toEqual([
      { code: "NonPositiveSteps", initialSteps: 0, position: pos(1, 0) },
      { code: "NonPositiveSteps", initialSteps: -2, position: pos(2, 0) },
    ]);
  });

  it("keeps parser warnings", () => {
    const { warnings } = mustLoadLevel({ layout: ["S!E"] });
    expect(warnings.map((w) => w.code)).toEqual(["UnknownSymbol"]);
  });

  it("builds an independent board on every load", () => {
    const source = {
      definitions: [{ initialSteps: 2, key: "w", type: "WeakFloor" }],
      layout: ["Sw"],
    };
    const first = mustLoadLevel(source).board;
    first.onPlayerLanded(pos(1, 0));

    const second = mustLoadLevel(source).board;
    expect(first.tileAt(pos(1, 0))).toMatchObject({ stepsRemaining: 1 });
    expect(second.tileAt(pos(1, 0))).toMatchObject({ stepsRemaining: 2 });
  });

  it("loads literal grid levels", () => {
    const { board } = mustLoadLevel({
      height: 2,
      tiles: [
        { position: { x: 1, y: 0 }, type: "Start" },
        { position: { x: 1, y: 1 }, type: "End" },
        { controlledBySwitchId: 5, position: { x: 0, y: 0 }, type: "Bridge" },
      ],
      width: 2,
    });

    expect(board.start).toEqual(pos(1, 0));
    expect(board.startFacing).toBe("Up");
    expect(board.tileAt(pos(0, 0))).toMatchObject({
      controlledBySwitchId: 5,
      isActive: true,
      kind: "Bridge",
    });
  });
});

describe("describeLoadError", () => {
  it("renders one line per error", () => {
    expect(describeLoadError({ code: "NoStart" })).toBe(
      "Level has no Start tile",
    );
    expect(
      describeLoadError({
        code: "MultipleStarts",
        positions: [pos(0, 0), pos(2, 1)],
      }),
    ).toBe("Level has 2 Start tiles: (0,0), (2,1)");
    expect(
      describeLoadError({
        at: { x: 4, y: -1 },
        code: "TileOutOfBounds",
        height: 3,
        width: 3,
      }),
    ).toBe("Tile (4,-1) is outside the 3x3 grid");
    expect(
      describeLoadError({ code: "AmbiguousDefinitionKey", key: "W2" }),
    ).toBe('Definition key "W2" is defined more than once');
    expect(
      describeLoadError({ code: "InvalidLevelJson", message: "bad" }),
    ).toBe("Invalid level JSON: bad");
  });
});
