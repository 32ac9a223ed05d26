import { describe, expect, it } from "vitest";

import { BinaryWriter } from "../src/fallout/binary.js";
import { decodeScript, encodeScript } from "../src/fallout/script.js";
import { catchFormatError } from "./helpers/errors.js";
import { fixtureRecordSize, writeFixtureScript, type FixtureScript } from "./helpers/mapFixture.js";

function recordBytes(s: FixtureScript): Buffer {
  const w = new BinaryWriter();
  writeFixtureScript(w, s);
  return w.toBuffer();
}

describe("script records", () => {
  it("consumes exactly the record size for every known type", () => {
    for (const type of [1, 2, 3, 4] as const) {
      const record = recordBytes({ type, id: 300 + type, localVariableOffset: 12, localVariableCount: 3 });
      const input = Buffer.concat([record, Buffer.from([7, 7, 7])]);
      const size = fixtureRecordSize(type);

      const { value, rest } = decodeScript(input);

      expect(record.length, `type ${type}`).toBe(size);
      expect(input.length - rest.length, `type ${type}`).toBe(size);
      expect(value.id).toBe(300 + type);
      expect(value.localVariableOffset).toBe(12);
      expect(value.localVariableCount).toBe(3);
      expect(value.prefixJunk.length).toBe(size - 0x38);
      expect(value.unknownAfterId.length).toBe(8);
      expect(value.suffixJunk.length).toBe(32);
    }
  });

  it("decodes a spatial record's fields", () => {
    const { value } = decodeScript(recordBytes({ type: 1, id: 1001 }));

    expect(value.scriptType).toBe("SPATIAL");
    expect(value.tagWord).toBe(0x010003e9);
    expect(value.localVariableOffset).toBe(-1);
    expect(value.localVariableCount).toBe(0);
    expect(value.prefixJunk.every((b) => b === 0xaa)).toBe(true);
    expect(value.suffixJunk.every((b) => b === 0xcc)).toBe(true);
  });

  it("re-encodes byte for byte", () => {
    for (const type of [1, 2, 3, 4] as const) {
      const record = recordBytes({ type, id: 9 });
      expect(Buffer.from(encodeScript(decodeScript(record).value))).toEqual(record);
    }
  });

  it("refuses records whose size is not known", () => {
    const system = Buffer.alloc(64);
    const unknown = Buffer.alloc(64);
    unknown[0] = 0x09;

    expect(catchFormatError(() => decodeScript(system)).code).toBe("UNKNOWN_RECORD_SIZE");
    expect(catchFormatError(() => decodeScript(unknown)).code).toBe("UNKNOWN_RECORD_SIZE");
  });

  it("fails on a truncated record", () => {
    const record = recordBytes({ type: 3, id: 1 });
    expect(catchFormatError(() => decodeScript(record.subarray(0, 60))).code).toBe(
      "INSUFFICIENT_DATA",
    );
  });

  it("rejects a type that disagrees with the tag word", () => {
    const { value } = decodeScript(recordBytes({ type: 3, id: 1 }));
    const e = catchFormatError(() => encodeScript({ ...value, scriptType: "CRITTERS" }));
    expect(e.code).toBe("INVALID_LAYOUT");
  });
});
