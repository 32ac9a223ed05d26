// src/fallout/tiles.ts
//
// Each present elevation is a 100x100 grid of floor and roof tiles. The
// documented tile size is 2 bytes, but the files seen so far only line up
// with 4 bytes per tile, so that is what is used here.
// TODO: drop the extra *2 once the source of the difference (a patched save
// format, or a misread field before the tiles) is pinned down.

import { BinaryReader, type Decoded } from "./binary.js";
import { ELEVATION_FLAGS, hasFlag, type MapFlags } from "./mapFlags.js";

export const ELEVATION_TILE_BLOCK_SIZE = 100 * 100 * 2 * 2;

export function tileBlockSize(flags: MapFlags): number {
  let bytes = 0;
  for (const f of ELEVATION_FLAGS) if (hasFlag(flags, f)) bytes += ELEVATION_TILE_BLOCK_SIZE;
  return bytes;
}

export function skipTileBlock(bytes: Uint8Array, flags: MapFlags): Decoded<Uint8Array> {
  const r = new BinaryReader(bytes);
  return r.done(r.readOpaque(tileBlockSize(flags)));
}
