// src/fallout/patch.ts
//
// Raw patches against the original (inflated) map bytes. These never go through
// encodeMapState: the rest of the file is left exactly as it was read.

import { SaveFormatError } from "./errors.js";
import { MAP_HEADER_SIZE, type MapHeader } from "./mapHeader.js";
import type { Script } from "./script.js";

export const MAP_GLOBAL_VARIABLE_TABLE_START = MAP_HEADER_SIZE;

export function globalVariableFileOffset(header: MapHeader, index: number): number {
  if (!Number.isInteger(index) || index < 0 || index >= header.globalVariableCount) {
    throw new SaveFormatError(
      "VALUE_OUT_OF_RANGE",
      `Global variable ${index} outside [0, ${header.globalVariableCount})`,
    );
  }
  return MAP_GLOBAL_VARIABLE_TABLE_START + index * 4;
}

export function localVariableFileOffset(
  header: MapHeader,
  script: Script,
  fieldIndex: number,
): number {
  if (script.localVariableOffset < 0) {
    throw new SaveFormatError(
      "VALUE_OUT_OF_RANGE",
      `Script ${script.id} has no local variables in this file`,
    );
  }
  if (!Number.isInteger(fieldIndex) || fieldIndex < 0 || fieldIndex >= script.localVariableCount) {
    throw new SaveFormatError(
      "VALUE_OUT_OF_RANGE",
      `Field ${fieldIndex} outside script ${script.id}'s ${script.localVariableCount} local variables`,
    );
  }
  if (script.localVariableOffset + fieldIndex >= header.localVariableCount) {
    throw new SaveFormatError(
      "VALUE_OUT_OF_RANGE",
      `Script ${script.id} field ${fieldIndex} is past the local variable table (${header.localVariableCount})`,
    );
  }

  return (
    MAP_GLOBAL_VARIABLE_TABLE_START +
    header.globalVariableCount * 4 +
    (script.localVariableOffset + fieldIndex) * 4
  );
}

/** Copy of `bytes` with a big-endian i32 written at `offset`. */
export function patchI32(bytes: Uint8Array, offset: number, value: number): Uint8Array {
  if (!Number.isInteger(offset) || offset < 0 || offset + 4 > bytes.length) {
    throw new SaveFormatError(
      "INSUFFICIENT_DATA",
      `Cannot patch 4 bytes at ${offset} in ${bytes.length} bytes`,
    );
  }
  if (!Number.isInteger(value) || value < -0x80000000 || value > 0x7fffffff) {
    throw new SaveFormatError("VALUE_OUT_OF_RANGE", `I32 out of range: ${value}`);
  }

  const out = Buffer.from(bytes);
  out.writeInt32BE(value, offset);
  return out;
}

export function findScriptById(scripts: ReadonlyArray<Script>, id: number): Script {
  const found = scripts.find((s) => s.id === id);
  if (!found) throw new Error(`No script with id ${id}`);
  return found;
}
