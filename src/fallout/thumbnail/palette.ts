// src/fallout/thumbnail/palette.ts
//
// Fallout .PAL files start with 256 RGB triples in 0..63 units; the lookup
// tables that follow are not needed here.

import { readFile } from "node:fs/promises";

export type Palette = ReadonlyArray<readonly [number, number, number]>;

const PALETTE_ENTRIES = 256;
const PALETTE_BYTES = PALETTE_ENTRIES * 3;

export function grayscalePalette(): Palette {
  const out: Array<readonly [number, number, number]> = [];
  for (let i = 0; i < PALETTE_ENTRIES; i++) out.push([i, i, i]);
  return out;
}

export function parsePalette(bytes: Uint8Array): Palette {
  if (bytes.length < PALETTE_BYTES) {
    throw new Error(`Palette needs ${PALETTE_BYTES} bytes, got ${bytes.length}`);
  }

  const out: Array<readonly [number, number, number]> = [];
  for (let i = 0; i < PALETTE_ENTRIES; i++) {
    const o = i * 3;
    const r = bytes[o + 0]!;
    const g = bytes[o + 1]!;
    const b = bytes[o + 2]!;
    // Entries outside 0..63 are unused slots.
    if (r > 63 || g > 63 || b > 63) out.push([0, 0, 0]);
    else out.push([r * 4, g * 4, b * 4]);
  }
  return out;
}

export async function loadPalette(path: string): Promise<Palette> {
  return parsePalette(await readFile(path));
}
