import { describe, expect, it } from "vitest";

import { allScripts, decodeMapState, encodeMapState } from "../src/fallout/mapState.js";
import { tileBlockSize } from "../src/fallout/tiles.js";
import { catchFormatError } from "./helpers/errors.js";
import {
  buildMapBytes,
  FLAGS_WORD_ELEVATION_0,
  scriptsOfType,
  type MapFixture,
} from "./helpers/mapFixture.js";

function range(n: number): number[] {
  return Array.from({ length: n }, (_, i) => i);
}

// 0 + 12 + 2 + 33 + 38 = 85 scripts
const SCENARIO_A: MapFixture = {
  globals: [1, 0, -1, 42],
  locals: range(739),
  groups: [
    [],
    scriptsOfType(1, 12, 1000),
    scriptsOfType(2, 2, 2000),
    scriptsOfType(3, 33, 3000),
    scriptsOfType(4, 38, 4000),
  ],
  trailing: new Uint8Array(10).fill(0x77),
};

const SCENARIO_B: MapFixture = {
  globals: [5],
  locals: [],
  groups: [],
};

describe("map state decoding", () => {
  it("scenario A: 4 globals, 739 locals, 85 scripts over five groups", () => {
    const bytes = buildMapBytes(SCENARIO_A);
    const state = decodeMapState(bytes);

    expect(state.header.globalVariableCount).toBe(4);
    expect(state.header.localVariableCount).toBe(739);
    expect(state.variables.globalVariables).toEqual([1, 0, -1, 42]);
    expect(state.variables.localVariables.length).toBe(739);
    expect(state.variables.localVariables[738]).toBe(738);

    expect(state.scriptGroups.map((g) => g.scripts.length)).toEqual([0, 12, 2, 33, 38]);
    const scripts = allScripts(state);
    expect(scripts.length).toBe(85);
    expect(scripts[0]!.id).toBe(1000);
    expect(scripts[0]!.scriptType).toBe("SPATIAL");
    expect(scripts[84]!.id).toBe(4037);
    expect(scripts[84]!.scriptType).toBe("CRITTERS");

    expect(Array.from(state.trailing)).toEqual(new Array(10).fill(0x77));
  });

  it("scenario A re-encodes to identical bytes", () => {
    const bytes = buildMapBytes(SCENARIO_A);
    expect(Buffer.from(encodeMapState(decodeMapState(bytes)))).toEqual(bytes);
  });

  it("scenario B: one global, no locals, empty groups", () => {
    const bytes = buildMapBytes(SCENARIO_B);
    expect(bytes.length).toBe(236 + 4 + 5 * 4);

    const state = decodeMapState(bytes);
    expect(state.variables).toEqual({ globalVariables: [5], localVariables: [] });
    expect(allScripts(state)).toEqual([]);
    expect(state.scriptGroups.every((g) => g.batchFooters.length === 0)).toBe(true);
    expect(state.trailing.length).toBe(0);
  });

  it("decodes the header fields", () => {
    const { header } = decodeMapState(buildMapBytes({ ...SCENARIO_B, version: 19 }));

    expect(header.version).toBe("FALLOUT_1");
    expect(header.filename).toBe("TESTMAP.SAV");
    expect(header.defaultPlayerPosition).toBe(20100);
    expect(header.defaultPlayerOrientation).toBe(2);
    expect(header.scriptId).toBe(-1);
    expect(header.flags).toEqual({ set: [], otherBits: 0 });
    expect(header.darkness).toBe(1);
    expect(header.id).toBe(7);
    expect(header.ticks).toBe(123456);
    expect(header.mysteryBytes.length).toBe(176);
  });

  it("skips one tile block per present elevation", () => {
    const one = decodeMapState(buildMapBytes({ ...SCENARIO_B, flagsWord: FLAGS_WORD_ELEVATION_0 }));
    expect(one.header.flags.set).toEqual(["HAS_ELEVATION_0"]);
    expect(one.tiles.length).toBe(40000);
    expect(allScripts(one)).toEqual([]);

    const bytes = buildMapBytes({ ...SCENARIO_A, flagsWord: 0x1 });
    const all = decodeMapState(bytes);
    expect(all.header.flags.set).toEqual([
      "IS_MAP_SAVE",
      "HAS_ELEVATION_0",
      "HAS_ELEVATION_1",
      "HAS_ELEVATION_2",
    ]);
    expect(tileBlockSize(all.header.flags)).toBe(120000);
    expect(all.tiles.length).toBe(120000);
    expect(allScripts(all).length).toBe(85);
    expect(Buffer.from(encodeMapState(all))).toEqual(bytes);
  });

  it("fails fast on an unknown version", () => {
    const e = catchFormatError(() => decodeMapState(buildMapBytes({ ...SCENARIO_B, version: 21 })));
    expect(e.code).toBe("INVALID_VERSION");
    expect(e.offset).toBe(0);
    expect(e.context).toEqual(["header"]);
  });

  it("reports a malformed filename at its file offset", () => {
    const bytes = buildMapBytes(SCENARIO_B);
    bytes[4] = 0xff;

    const e = catchFormatError(() => decodeMapState(bytes));
    expect(e.code).toBe("MALFORMED_STRING");
    expect(e.offset).toBe(4);
    expect(e.context).toEqual(["header", "filename"]);
  });

  it("reports the absolute offset of a truncated group", () => {
    const bytes = buildMapBytes(SCENARIO_B);
    const e = catchFormatError(() => decodeMapState(bytes.subarray(0, bytes.length - 2)));

    expect(e.code).toBe("INSUFFICIENT_DATA");
    expect(e.offset).toBe(256);
    expect(e.context).toEqual(["script group 4"]);
  });

  it("fails when the variable tables are cut short", () => {
    const bytes = buildMapBytes(SCENARIO_A).subarray(0, 236 + 100);
    const e = catchFormatError(() => decodeMapState(bytes));

    expect(e.code).toBe("INSUFFICIENT_DATA");
    expect(e.context).toEqual(["variables"]);
  });

  it("warns about script variable windows outside the local table", () => {
    const bytes = buildMapBytes({
      globals: [],
      locals: [0, 0, 0],
      groups: [[], [], [], [], [{ type: 4, id: 9, localVariableOffset: 2, localVariableCount: 2 }]],
    });

    const warnings: string[] = [];
    decodeMapState(bytes, { warn: (m) => warnings.push(m) });
    expect(warnings).toEqual(["Script 9: local variables [2, 4) fall outside the table of 3"]);
  });

  it("refuses to encode variables that disagree with the header", () => {
    const state = decodeMapState(buildMapBytes(SCENARIO_B));
    const bad = { ...state, variables: { globalVariables: [], localVariables: [] } };
    expect(catchFormatError(() => encodeMapState(bad)).code).toBe("INVALID_LAYOUT");
  });
});
