// src/fallout/scriptGroup.ts
//
// A group is a count followed by batches of 16 records. Every full batch that
// is followed by more records ends in an 8-byte footer (script check counter
// and possibly a CRC). A non-empty tail is padded out to 16 slots and gets one
// footer. A group whose records end exactly on a batch boundary gets no extra
// footer, and an empty group is just its count.

import { BinaryReader, BinaryWriter, type Decoded } from "./binary.js";
import { SaveFormatError } from "./errors.js";
import { decodeScript, writeScript, type Script } from "./script.js";
import { junkSize, scriptTypeFromWord } from "./scriptTag.js";

export const SCRIPTS_IN_BATCH = 16;
export const BATCH_FOOTER_SIZE = 8;
export const SCRIPT_GROUP_COUNT = 5;

export type ScriptGroup = Readonly<{
  scripts: ReadonlyArray<Script>;
  batchFooters: ReadonlyArray<Uint8Array>;
  // Raw bytes of each padding slot, tag word included.
  paddingSlots: ReadonlyArray<Uint8Array>;
}>;

export type GroupLayout = Readonly<{
  footers: number;
  paddingSlots: number;
}>;

export function groupLayout(scriptCount: number): GroupLayout {
  if (scriptCount === 0) return { footers: 0, paddingSlots: 0 };
  const tail = scriptCount % SCRIPTS_IN_BATCH;
  return {
    footers: Math.ceil(scriptCount / SCRIPTS_IN_BATCH),
    paddingSlots: tail === 0 ? 0 : SCRIPTS_IN_BATCH - tail,
  };
}

// Padding slots describe their own size through their tag word, like records.
function readPaddingSlot(r: BinaryReader): Uint8Array {
  const type = scriptTypeFromWord(r.peekU32BE());
  return r.readOpaque(junkSize(type));
}

function readScripts(r: BinaryReader, n: number, out: Script[]): void {
  for (let i = 0; i < n; i++) {
    const start = r.offset;
    let decoded: Decoded<Script>;
    try {
      decoded = decodeScript(r.rest());
    } catch (e: unknown) {
      if (e instanceof SaveFormatError) throw e.rebase(start, `script ${out.length}`);
      throw e;
    }
    r.skip(r.remaining() - decoded.rest.length);
    out.push(decoded.value);
  }
}

export function decodeScriptGroup(bytes: Uint8Array): Decoded<ScriptGroup> {
  const r = new BinaryReader(bytes);
  const declared = r.readI32BE();
  if (declared < 0) {
    throw new SaveFormatError("NEGATIVE_COUNT", `Script count is negative: ${declared}`, {
      offset: 0,
    });
  }

  const scripts: Script[] = [];
  const batchFooters: Uint8Array[] = [];
  const paddingSlots: Uint8Array[] = [];

  let left = declared;
  while (left > SCRIPTS_IN_BATCH) {
    readScripts(r, SCRIPTS_IN_BATCH, scripts);
    batchFooters.push(r.readOpaque(BATCH_FOOTER_SIZE));
    left -= SCRIPTS_IN_BATCH;
  }

  readScripts(r, left, scripts);

  if (left > 0) {
    for (let i = 0; i < SCRIPTS_IN_BATCH - left; i++) paddingSlots.push(readPaddingSlot(r));
    batchFooters.push(r.readOpaque(BATCH_FOOTER_SIZE));
  }

  return r.done({ scripts, batchFooters, paddingSlots });
}

export function writeScriptGroup(w: BinaryWriter, group: ScriptGroup): void {
  const count = group.scripts.length;
  const layout = groupLayout(count);

  if (group.batchFooters.length !== layout.footers) {
    throw new SaveFormatError(
      "INVALID_LAYOUT",
      `Group of ${count} scripts needs ${layout.footers} batch footers, got ${group.batchFooters.length}`,
    );
  }
  if (group.paddingSlots.length !== layout.paddingSlots) {
    throw new SaveFormatError(
      "INVALID_LAYOUT",
      `Group of ${count} scripts needs ${layout.paddingSlots} padding slots, got ${group.paddingSlots.length}`,
    );
  }

  w.writeI32BE(count);

  for (let i = 0; i < count; i++) {
    writeScript(w, group.scripts[i]!);

    const endOfBatch = (i + 1) % SCRIPTS_IN_BATCH === 0;
    const isLast = i === count - 1;
    if (endOfBatch && !isLast) {
      const footer = group.batchFooters[(i + 1) / SCRIPTS_IN_BATCH - 1]!;
      w.writeOpaque(footer, BATCH_FOOTER_SIZE, "batch footer");
    }
  }

  if (count === 0) return;

  for (const slot of group.paddingSlots) {
    if (slot.length < 4) {
      throw new SaveFormatError("INVALID_LAYOUT", `Padding slot of ${slot.length} bytes has no tag`);
    }
    const word = Buffer.from(slot.buffer, slot.byteOffset, slot.byteLength).readUInt32BE(0);
    w.writeOpaque(slot, junkSize(scriptTypeFromWord(word)), "padding slot");
  }
  w.writeOpaque(group.batchFooters[layout.footers - 1]!, BATCH_FOOTER_SIZE, "batch footer");
}

export function encodeScriptGroup(group: ScriptGroup): Uint8Array {
  const w = new BinaryWriter();
  writeScriptGroup(w, group);
  return w.toBuffer();
}
