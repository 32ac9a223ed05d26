// src/fallout/scriptTag.ts
import { BinaryReader, type Decoded } from "./binary.js";
import { SaveFormatError } from "./errors.js";

export type ScriptTagType = "SYSTEM" | "SPATIAL" | "ITEMS" | "SCENERY" | "CRITTERS" | "UNKNOWN";

export type ScriptTag = Readonly<{
  type: ScriptTagType;
  word: number;
}>;

// 0x00 and 0x02 are rare or unused in shipped maps.
const TAG_TYPE_BY_BYTE = new Map<number, ScriptTagType>([
  [0x00, "SYSTEM"],
  [0x01, "SPATIAL"],
  [0x02, "ITEMS"],
  [0x03, "SCENERY"],
  [0x04, "CRITTERS"],
]);

export const SCRIPT_TAG_TYPES: ReadonlyArray<ScriptTagType> = [
  "SYSTEM",
  "SPATIAL",
  "ITEMS",
  "SCENERY",
  "CRITTERS",
  "UNKNOWN",
];

export function isScriptTagType(v: unknown): v is ScriptTagType {
  return SCRIPT_TAG_TYPES.some((t) => t === v);
}

export function scriptTypeFromWord(word: number): ScriptTagType {
  return TAG_TYPE_BY_BYTE.get(word >>> 24) ?? "UNKNOWN";
}

export function decodeTag(bytes: Uint8Array): Decoded<ScriptTag> {
  const r = new BinaryReader(bytes);
  const word = r.readU32BE();
  return r.done({ type: scriptTypeFromWord(word), word });
}

/** Size of a real record, tag word included. */
export function recordSize(type: ScriptTagType): number {
  switch (type) {
    case "SPATIAL":
      return 72;
    case "ITEMS":
      return 68;
    case "SCENERY":
    case "CRITTERS":
      return 64;
    case "SYSTEM":
    case "UNKNOWN":
      throw new SaveFormatError(
        "UNKNOWN_RECORD_SIZE",
        `Record size is not known for scripts of type ${type}`,
      );
  }
}

/**
 * Size of a padding slot, tag word included. Unlike {@link recordSize} this
 * falls back to 64 for SYSTEM and UNKNOWN.
 */
export function junkSize(type: ScriptTagType): number {
  switch (type) {
    case "SPATIAL":
      return 72;
    case "ITEMS":
      return 68;
    default:
      return 64;
  }
}
