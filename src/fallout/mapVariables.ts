// src/fallout/mapVariables.ts
import { BinaryReader, BinaryWriter, type Decoded } from "./binary.js";
import { SaveFormatError } from "./errors.js";

export type MapVariables = Readonly<{
  globalVariables: ReadonlyArray<number>;
  localVariables: ReadonlyArray<number>;
}>;

function assertCount(n: number, label: string): void {
  if (!Number.isInteger(n) || n < 0) {
    throw new SaveFormatError("NEGATIVE_COUNT", `${label} must be a non-negative integer, got ${n}`);
  }
}

function readI32Array(r: BinaryReader, n: number): number[] {
  const out: number[] = [];
  for (let i = 0; i < n; i++) out.push(r.readI32BE());
  return out;
}

export function decodeMapVariables(
  bytes: Uint8Array,
  globalCount: number,
  localCount: number,
): Decoded<MapVariables> {
  assertCount(globalCount, "global variable count");
  assertCount(localCount, "local variable count");

  const need = 4 * (globalCount + localCount);
  if (bytes.length < need) {
    throw new SaveFormatError(
      "INSUFFICIENT_DATA",
      `Variable tables need ${need} bytes, have ${bytes.length}`,
      { offset: 0 },
    );
  }

  const r = new BinaryReader(bytes);
  const globalVariables = readI32Array(r, globalCount);
  const localVariables = readI32Array(r, localCount);
  return r.done({ globalVariables, localVariables });
}

export function writeMapVariables(w: BinaryWriter, vars: MapVariables): void {
  for (const v of vars.globalVariables) w.writeI32BE(v);
  for (const v of vars.localVariables) w.writeI32BE(v);
}
