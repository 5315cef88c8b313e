import {
  parseCompactLevel,
  parseGridLevel,
  parseTileKind,
  templateFrom,
} from "@/engine/level/parser";
import { type LayoutResult, type ParsedLayout } from "@/engine/level/types";
import { createSwitchId } from "@/types/brands";

import { pos } from "../../test-helpers";

function mustParse(result: LayoutResult): ParsedLayout {
  if (!result.ok) throw new Error(`unexpected ${result.error.code}`);
  return result.layout;
}

function kindsAt(layout: ParsedLayout): Array<string> {
  return layout.placements.map(
    (p) => `${p.template.kind}@${String(p.position.x)},${String(p.position.y)}`,
  );
}

describe("parseCompactLevel", () => {
  it("reads rows bottom-up so the last row is y=0", () => {
    const layout = mustParse(parseCompactLevel({ layout: ["E.", "S#"] }));

    expect(layout.width).toBe(2);
    expect(layout.height).toBe(2);
    expect(kindsAt(layout)).toEqual([
      "Start@0,0",
      "Wall@1,0",
      "End@0,1",
      "Floor@1,1",
    ]);
  });

  it("advances the grid by one cell for a multi-character key", () => {
    const layout = mustParse(
      parseCompactLevel({
        definitions: [{ initialSteps: 3, key: "W3", type: "WeakFloor" }],
        layout: ["SW3.E"],
      }),
    );

    expect(layout.width).toBe(4);
    expect(kindsAt(layout)).toEqual([
      "Start@0,0",
      "WeakFloor@1,0",
      "Floor@2,0",
      "End@3,0",
    ]);
    expect(layout.placements[1]?.template.initialSteps).toBe(3);
  });

  it("prefers the longest matching key", () => {
    const layout = mustParse(
      parseCompactLevel({
        definitions: [
          { key: "W", type: "Floor" },
          { key: "W3", type: "WeakFloor" },
        ],
        layout: ["SW3W"],
      }),
    );

    expect(kindsAt(layout)).toEqual([
      "Start@0,0",
      "WeakFloor@1,0",
      "Floor@2,0",
    ]);
  });

  it("lets definitions shadow the symbol table", () => {
    const layout = mustParse(
      parseCompactLevel({
        definitions: [{ key: "#", type: "Floor" }],
        layout: ["S#E"],
      }),
    );
    expect(layout.placements[1]?.template.kind).toBe("Floor");
  });

  it("takes the width of the widest row", () => {
    const layout = mustParse(parseCompactLevel({ layout: ["S..", "."] }));
    expect(layout.width).toBe(3);
    expect(layout.height).toBe(2);
  });

  it("leaves spaces and Air definitions unmaterialized", () => {
    const layout = mustParse(
      parseCompactLevel({
        definitions: [{ key: "~", type: "air" }],
        layout: ["S ~E"],
      }),
    );
    expect(layout.width).toBe(4);
    expect(kindsAt(layout)).toEqual(["Start@0,0", "End@3,0"]);
  });

  it("skips unknown symbols and reports where they were", () => {
    const layout = mustParse(
      parseCompactLevel({
        definitions: [{ initialSteps: 3, key: "W3", type: "WeakFloor" }],
        layout: ["..?", "SW3?"],
      }),
    );

    expect(layout.warnings).toEqual([
      {
        code: "UnknownSymbol",
        column: 3,
        position: pos(2, 0),
        row: 1,
        symbol: "?",
      },
      {
        code: "UnknownSymbol",
        column: 2,
        position: pos(2, 1),
        row: 0,
        symbol: "?",
      },
    ]);
    expect(kindsAt(layout)).toEqual([
      "Start@0,0",
      "WeakFloor@1,0",
      "Floor@0,1",
      "Floor@1,1",
    ]);
    expect(layout.width).toBe(3);
  });

  it("defaults the start facing to Up", () => {
    const layout = mustParse(parseCompactLevel({ layout: ["S"] }));
    expect(layout.startFacing).toBe("Up");
    expect(layout.warnings).toEqual([]);
  });

  it("reads the start facing case-insensitively", () => {
    const layout = mustParse(
      parseCompactLevel({ layout: ["S"], startDirection: "left" }),
    );
    expect(layout.startFacing).toBe("Left");
  });

  it("warns about an unknown start facing and uses Up", () => {
    const layout = mustParse(
      parseCompactLevel({ layout: ["S"], startDirection: "East" }),
    );
    expect(layout.startFacing).toBe("Up");
    expect(layout.warnings).toEqual([
      { code: "UnknownStartDirection", value: "East" },
    ]);
  });

  it("rejects a layout with no rows", () => {
    expect(parseCompactLevel({ layout: [] })).toEqual({
      error: { code: "EmptyLayout" },
      ok: false,
    });
  });

  it("rejects an empty definition key", () => {
    expect(
      parseCompactLevel({
        definitions: [
          { key: "a", type: "Floor" },
          { key: "", type: "Wall" },
        ],
        layout: ["S"],
      }),
    ).toEqual({ error: { code: "InvalidDefinitionKey", index: 1 }, ok: false });
  });

  it("rejects a key defined twice", () => {
    expect(
      parseCompactLevel({
        definitions: [
          { key: "W2", type: "WeakFloor" },
          { key: "W2", type: "Wall" },
        ],
        layout: ["SW2"],
      }),
    ).toEqual({
      error: { code: "AmbiguousDefinitionKey", key: "W2" },
      ok: false,
    });
  });

  it("rejects an unknown tile type", () => {
    expect(
      parseCompactLevel({
        definitions: [{ key: "L", type: "Lava" }],
        layout: ["SL"],
      }),
    ).toEqual({
      error: {
        code: "UnknownTileType",
        source: 'definition "L"',
        type: "Lava",
      },
      ok: false,
    });
  });

  it("rejects a definition with a fractional switch id", () => {
    expect(
      parseCompactLevel({
        definitions: [{ key: "s", switchId: 1.5, type: "Switch" }],
        layout: ["Ss"],
      }),
    ).toEqual({
      error: {
        code: "InvalidSwitchId",
        field: "switchId",
        source: 'definition "s"',
        value: 1.5,
      },
      ok: false,
    });
  });
});

describe("parseGridLevel", () => {
  it("places literal tiles", () => {
    const layout = mustParse(
      parseGridLevel({
        height: 2,
        startDirection: "Down",
        tiles: [
          { position: { x: 0, y: 1 }, type: "Start" },
          { position: { x: 0, y: 0 }, type: "End" },
          { position: { x: 1, y: 0 }, type: "Air" },
        ],
        width: 2,
      }),
    );

    expect(layout.startFacing).toBe("Down");
    expect(kindsAt(layout)).toEqual(["Start@0,1", "End@0,0"]);
  });

  it("rejects tiles outside the declared grid", () => {
    expect(
      parseGridLevel({
        height: 1,
        tiles: [{ position: { x: 2, y: 0 }, type: "Start" }],
        width: 2,
      }),
    ).toEqual({
      error: {
        at: { x: 2, y: 0 },
        code: "TileOutOfBounds",
        height: 1,
        width: 2,
      },
      ok: false,
    });
  });

  it("rejects two tiles in one cell", () => {
    expect(
      parseGridLevel({
        height: 1,
        tiles: [
          { position: { x: 0, y: 0 }, type: "Start" },
          { position: { x: 0, y: 0 }, type: "Floor" },
        ],
        width: 1,
      }),
    ).toEqual({
      error: { code: "DuplicateTilePosition", position: pos(0, 0) },
      ok: false,
    });
  });

  it("rejects a grid without cells", () => {
    expect(parseGridLevel({ height: 3, tiles: [], width: 0 })).toEqual({
      error: { code: "EmptyLayout" },
      ok: false,
    });
  });

  it("rejects a bridge bound to a fractional switch id", () => {
    expect(
      parseGridLevel({
        height: 1,
        tiles: [
          { position: { x: 0, y: 0 }, type: "Start" },
          {
            controlledBySwitchId: 0.5,
            position: { x: 1, y: 0 },
            type: "Bridge",
          },
        ],
        width: 2,
      }),
    ).toEqual({
      error: {
        code: "InvalidSwitchId",
        field: "controlledBySwitchId",
        source: "tile (1,0)",
        value: 0.5,
      },
      ok: false,
    });
  });

  it("rejects unknown tile types with their position", () => {
    expect(
      parseGridLevel({
        height: 1,
        tiles: [{ position: { x: 0, y: 0 }, type: "Ice" }],
        width: 1,
      }),
    ).toEqual({
      error: { code: "UnknownTileType", source: "tile (0,0)", type: "Ice" },
      ok: false,
    });
  });
});

describe("tile templates", () => {
  it("matches kinds case-insensitively", () => {
    expect(parseTileKind("weakfloor")).toBe("WeakFloor");
    expect(parseTileKind(" BRIDGE ")).toBe("Bridge");
    expect(parseTileKind("lava")).toBeUndefined();
  });

  it("fills in defaults for missing fields", () => {
    expect(templateFrom("Bridge", {})).toEqual({
      activatesWhenSwitchOn: true,
      controlledBySwitchId: createSwitchId(0),
      initialSteps: 0,
      initiallyActive: true,
      kind: "Bridge",
      switchId: createSwitchId(0),
    });
  });
});
