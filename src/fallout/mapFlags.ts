// src/fallout/mapFlags.ts
//
// On disk the elevation bits are "zero flags": a cleared bit means the level is
// present. The codec XORs bits 1..3 so that in memory a set flag means present
// and an all-zero value stays meaningful. Bit 0 is not inverted.

import { SaveFormatError } from "./errors.js";

export type MapFlagName = "IS_MAP_SAVE" | "HAS_ELEVATION_0" | "HAS_ELEVATION_1" | "HAS_ELEVATION_2";

export type MapFlags = Readonly<{
  set: ReadonlyArray<MapFlagName>;
  // Unnamed bits, passed through untouched.
  otherBits: number;
}>;

export const MAP_FLAGS_WIRE_XOR = 0x0000000e;

const FLAG_BITS: ReadonlyArray<readonly [number, MapFlagName]> = [
  [0x1, "IS_MAP_SAVE"],
  [0x2, "HAS_ELEVATION_0"],
  [0x4, "HAS_ELEVATION_1"],
  [0x8, "HAS_ELEVATION_2"],
];

const NAMED_MASK = 0xf;

export const ELEVATION_FLAGS: ReadonlyArray<MapFlagName> = [
  "HAS_ELEVATION_0",
  "HAS_ELEVATION_1",
  "HAS_ELEVATION_2",
];

export function isMapFlagName(v: unknown): v is MapFlagName {
  return FLAG_BITS.some(([, name]) => name === v);
}

export function hasFlag(flags: MapFlags, name: MapFlagName): boolean {
  return flags.set.includes(name);
}

function assertU32(v: number, label: string): void {
  if (!Number.isInteger(v) || v < 0 || v > 0xffffffff) {
    throw new SaveFormatError("INVALID_FLAGS", `${label} must be u32, got ${v}`);
  }
}

/** In-memory bit set from its 32-bit value (already un-XORed). */
export function flagsFromBits(bits: number): MapFlags {
  assertU32(bits, "map flags");
  const set: MapFlagName[] = [];
  for (const [bit, name] of FLAG_BITS) if ((bits & bit) !== 0) set.push(name);
  return { set, otherBits: (bits & ~NAMED_MASK) >>> 0 };
}

export function flagsToBits(flags: MapFlags): number {
  assertU32(flags.otherBits, "map flags otherBits");
  if ((flags.otherBits & NAMED_MASK) !== 0) {
    throw new SaveFormatError(
      "INVALID_FLAGS",
      `otherBits overlaps named flags: 0x${flags.otherBits.toString(16)}`,
    );
  }

  let bits = flags.otherBits;
  for (const [bit, name] of FLAG_BITS) if (flags.set.includes(name)) bits |= bit;
  return bits >>> 0;
}

export function decodeFlags(word: number): MapFlags {
  assertU32(word, "map flags word");
  return flagsFromBits((word ^ MAP_FLAGS_WIRE_XOR) >>> 0);
}

export function encodeFlags(flags: MapFlags): number {
  return (flagsToBits(flags) ^ MAP_FLAGS_WIRE_XOR) >>> 0;
}
