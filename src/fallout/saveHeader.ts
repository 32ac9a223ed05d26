// src/fallout/saveHeader.ts
//
// Preamble of SAVE.DAT. The 18-byte signature is followed by 6 bytes that are
// not documented (seen on the Steam Windows build); they are kept as-is.

import { decodeAscii, encodeAscii } from "./ascii.js";
import { BinaryReader, BinaryWriter, type Decoded } from "./binary.js";
import { SaveFormatError } from "./errors.js";

export const SAVE_MAGIC = "FALLOUT SAVE FILE";
export const SAVE_MAGIC_SIZE = 18;
export const SAVE_PADDING_SIZE = 6;
export const SAVE_NAME_SIZE = 32;
export const SAVE_SAVE_NAME_SIZE = 30;
export const SAVE_MAP_NAME_SIZE = 16;
export const THUMBNAIL_WIDTH = 224;
export const THUMBNAIL_HEIGHT = 133;
export const SAVE_BITMAP_SIZE = THUMBNAIL_WIDTH * THUMBNAIL_HEIGHT;
export const SAVE_VOID_SIZE = 128;
export const SAVE_HEADER_SIZE = 30051;

const MAGIC_BYTES = encodeAscii(SAVE_MAGIC, SAVE_MAGIC_SIZE);

export type SaveHeader = Readonly<{
  magic: string;
  padding: Uint8Array;
  version: number;
  releaseType: number;
  name: string;
  saveName: string;
  saveDay: number;
  saveMonth: number;
  saveYear: number;
  ingameTime: number;
  ingameMonth: number;
  ingameDay: number;
  ingameYear: number;
  ingameTicks: number;
  currentMap: number;
  mapName: string;
  // Palette-indexed thumbnail, THUMBNAIL_WIDTH x THUMBNAIL_HEIGHT
  bitmap: Uint8Array;
  void: Uint8Array;
}>;

function readAscii(r: BinaryReader, size: number): string {
  const start = r.offset;
  const field = r.readBytes(size);
  try {
    return decodeAscii(field, size).value;
  } catch (e: unknown) {
    if (e instanceof SaveFormatError) throw e.rebase(start, `ascii[${size}]`);
    throw e;
  }
}

function sameBytes(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) if (a[i] !== b[i]) return false;
  return true;
}

export function decodeSaveHeader(bytes: Uint8Array): Decoded<SaveHeader> {
  const r = new BinaryReader(bytes);

  const magicBytes = r.readBytes(SAVE_MAGIC_SIZE);
  if (!sameBytes(magicBytes, MAGIC_BYTES)) {
    const seen = Buffer.from(magicBytes).toString("latin1").replace(/\0/g, "\\0");
    throw new SaveFormatError("MAGIC_MISMATCH", `Not a save file: signature '${seen}'`, {
      offset: 0,
    });
  }

  const padding = r.readOpaque(SAVE_PADDING_SIZE);
  const version = r.readU32BE();
  const releaseType = r.readU8();
  const name = readAscii(r, SAVE_NAME_SIZE);
  const saveName = readAscii(r, SAVE_SAVE_NAME_SIZE);
  const saveDay = r.readU16BE();
  const saveMonth = r.readU16BE();
  const saveYear = r.readU16BE();
  const ingameTime = r.readU32BE();
  const ingameMonth = r.readU16BE();
  const ingameDay = r.readU16BE();
  const ingameYear = r.readU16BE();
  const ingameTicks = r.readU32BE();
  const currentMap = r.readU32BE();
  const mapName = readAscii(r, SAVE_MAP_NAME_SIZE);
  const bitmap = r.readOpaque(SAVE_BITMAP_SIZE);
  const voidBytes = r.readOpaque(SAVE_VOID_SIZE);

  return r.done({
    magic: SAVE_MAGIC,
    padding,
    version,
    releaseType,
    name,
    saveName,
    saveDay,
    saveMonth,
    saveYear,
    ingameTime,
    ingameMonth,
    ingameDay,
    ingameYear,
    ingameTicks,
    currentMap,
    mapName,
    bitmap,
    void: voidBytes,
  });
}

export function encodeSaveHeader(h: SaveHeader): Uint8Array {
  if (h.magic !== SAVE_MAGIC) {
    throw new SaveFormatError("MAGIC_MISMATCH", `Save header magic must be '${SAVE_MAGIC}'`);
  }

  const w = new BinaryWriter();
  w.writeBytes(MAGIC_BYTES);
  w.writeOpaque(h.padding, SAVE_PADDING_SIZE, "padding");
  w.writeU32BE(h.version);
  w.writeU8(h.releaseType);
  w.writeBytes(encodeAscii(h.name, SAVE_NAME_SIZE));
  w.writeBytes(encodeAscii(h.saveName, SAVE_SAVE_NAME_SIZE));
  w.writeU16BE(h.saveDay);
  w.writeU16BE(h.saveMonth);
  w.writeU16BE(h.saveYear);
  w.writeU32BE(h.ingameTime);
  w.writeU16BE(h.ingameMonth);
  w.writeU16BE(h.ingameDay);
  w.writeU16BE(h.ingameYear);
  w.writeU32BE(h.ingameTicks);
  w.writeU32BE(h.currentMap);
  w.writeBytes(encodeAscii(h.mapName, SAVE_MAP_NAME_SIZE));
  w.writeOpaque(h.bitmap, SAVE_BITMAP_SIZE, "bitmap");
  w.writeOpaque(h.void, SAVE_VOID_SIZE, "void");
  return w.toBuffer();
}
