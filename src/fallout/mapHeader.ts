// src/fallout/mapHeader.ts
import { decodeAscii, encodeAscii } from "./ascii.js";
import { BinaryReader, BinaryWriter, type Decoded } from "./binary.js";
import { SaveFormatError } from "./errors.js";
import { decodeFlags, encodeFlags, type MapFlags } from "./mapFlags.js";

export type MapVersion = "FALLOUT_1" | "FALLOUT_2";

export type MapHeader = Readonly<{
  version: MapVersion;
  filename: string;
  defaultPlayerPosition: number;
  defaultPlayerElevation: number;
  defaultPlayerOrientation: number;
  localVariableCount: number;
  scriptId: number;
  flags: MapFlags;
  darkness: number;
  globalVariableCount: number;
  id: number;
  ticks: number;
  // 44 undocumented words
  mysteryBytes: Uint8Array;
}>;

export const MAP_FILENAME_SIZE = 16;
export const MAP_MYSTERY_BYTES_SIZE = 4 * 44;
export const MAP_HEADER_SIZE = 0xec;

const VERSION_BY_WORD = new Map<number, MapVersion>([
  [19, "FALLOUT_1"],
  [20, "FALLOUT_2"],
]);

export function mapVersionFromWord(word: number): MapVersion {
  const v = VERSION_BY_WORD.get(word);
  if (!v) {
    throw new SaveFormatError("INVALID_VERSION", `Unknown map version ${word}`, { offset: 0 });
  }
  return v;
}

export function mapVersionToWord(version: MapVersion): number {
  return version === "FALLOUT_1" ? 19 : 20;
}

export function isMapVersion(v: unknown): v is MapVersion {
  return v === "FALLOUT_1" || v === "FALLOUT_2";
}

function readFilename(r: BinaryReader): string {
  const start = r.offset;
  const field = r.readBytes(MAP_FILENAME_SIZE);
  try {
    return decodeAscii(field, MAP_FILENAME_SIZE).value;
  } catch (e: unknown) {
    if (e instanceof SaveFormatError) throw e.rebase(start, "filename");
    throw e;
  }
}

export function decodeMapHeader(bytes: Uint8Array): Decoded<MapHeader> {
  const r = new BinaryReader(bytes);

  const version = mapVersionFromWord(r.readU32BE());
  const filename = readFilename(r);
  const defaultPlayerPosition = r.readI32BE();
  const defaultPlayerElevation = r.readI32BE();
  const defaultPlayerOrientation = r.readI32BE();
  const localVariableCount = r.readI32BE();
  const scriptId = r.readI32BE();
  const flags = decodeFlags(r.readU32BE());
  const darkness = r.readI32BE();
  const globalVariableCount = r.readI32BE();
  const id = r.readI32BE();
  const ticks = r.readU32BE();
  const mysteryBytes = r.readOpaque(MAP_MYSTERY_BYTES_SIZE);

  return r.done({
    version,
    filename,
    defaultPlayerPosition,
    defaultPlayerElevation,
    defaultPlayerOrientation,
    localVariableCount,
    scriptId,
    flags,
    darkness,
    globalVariableCount,
    id,
    ticks,
    mysteryBytes,
  });
}

export function writeMapHeader(w: BinaryWriter, h: MapHeader): void {
  w.writeU32BE(mapVersionToWord(h.version));
  w.writeBytes(encodeAscii(h.filename, MAP_FILENAME_SIZE));
  w.writeI32BE(h.defaultPlayerPosition);
  w.writeI32BE(h.defaultPlayerElevation);
  w.writeI32BE(h.defaultPlayerOrientation);
  w.writeI32BE(h.localVariableCount);
  w.writeI32BE(h.scriptId);
  w.writeU32BE(encodeFlags(h.flags));
  w.writeI32BE(h.darkness);
  w.writeI32BE(h.globalVariableCount);
  w.writeI32BE(h.id);
  w.writeU32BE(h.ticks);
  w.writeOpaque(h.mysteryBytes, MAP_MYSTERY_BYTES_SIZE, "mysteryBytes");
}
