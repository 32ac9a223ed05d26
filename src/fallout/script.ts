// src/fallout/script.ts
//
// One script record:
//
//   tag word          4
//   prefix junk       recordSize - 0x38
//   id                4
//   unknown           8
//   local var offset  4
//   local var count   4
//   suffix junk       recordSize - (recordSize - 0x38 + 20 + 4) = 32
//
// Many fields live in the junk ranges (next script, trigger type, radius,
// flags, object id, ...). They are kept as bytes, not interpreted.

import { BinaryReader, BinaryWriter, type Decoded } from "./binary.js";
import { SaveFormatError } from "./errors.js";
import { decodeTag, recordSize, scriptTypeFromWord, type ScriptTagType } from "./scriptTag.js";

const PREFIX_BASE = 0x38;
const FIXED_FIELDS_SIZE = 20;
const TAG_SIZE = 4;
export const SCRIPT_UNKNOWN_AFTER_ID_SIZE = 8;

export type Script = Readonly<{
  tagWord: number;
  scriptType: ScriptTagType;
  prefixJunk: Uint8Array;
  id: number;
  unknownAfterId: Uint8Array;
  // -1 in map files, an index into the local variable table in saves
  localVariableOffset: number;
  // 0 in map files
  localVariableCount: number;
  suffixJunk: Uint8Array;
}>;

export function scriptPrefixSize(size: number): number {
  return size - PREFIX_BASE;
}

export function scriptSuffixSize(size: number): number {
  return size - (scriptPrefixSize(size) + FIXED_FIELDS_SIZE + TAG_SIZE);
}

export function decodeScript(bytes: Uint8Array): Decoded<Script> {
  const { value: tag } = decodeTag(bytes);
  const size = recordSize(tag.type);

  const r = new BinaryReader(bytes);
  r.skip(TAG_SIZE);
  const prefixJunk = r.readOpaque(scriptPrefixSize(size));
  const id = r.readI32BE();
  const unknownAfterId = r.readOpaque(SCRIPT_UNKNOWN_AFTER_ID_SIZE);
  const localVariableOffset = r.readI32BE();
  const localVariableCount = r.readI32BE();
  const suffixJunk = r.readOpaque(scriptSuffixSize(size));

  return r.done({
    tagWord: tag.word,
    scriptType: tag.type,
    prefixJunk,
    id,
    unknownAfterId,
    localVariableOffset,
    localVariableCount,
    suffixJunk,
  });
}

export function writeScript(w: BinaryWriter, script: Script): void {
  const fromWord = scriptTypeFromWord(script.tagWord);
  if (fromWord !== script.scriptType) {
    throw new SaveFormatError(
      "INVALID_LAYOUT",
      `Script ${script.id}: tag word 0x${script.tagWord.toString(16)} is ${fromWord}, not ${script.scriptType}`,
    );
  }
  const size = recordSize(script.scriptType);

  w.writeU32BE(script.tagWord);
  w.writeOpaque(script.prefixJunk, scriptPrefixSize(size), `script ${script.id} prefixJunk`);
  w.writeI32BE(script.id);
  w.writeOpaque(
    script.unknownAfterId,
    SCRIPT_UNKNOWN_AFTER_ID_SIZE,
    `script ${script.id} unknownAfterId`,
  );
  w.writeI32BE(script.localVariableOffset);
  w.writeI32BE(script.localVariableCount);
  w.writeOpaque(script.suffixJunk, scriptSuffixSize(size), `script ${script.id} suffixJunk`);
}

export function encodeScript(script: Script): Uint8Array {
  const w = new BinaryWriter();
  writeScript(w, script);
  return w.toBuffer();
}
