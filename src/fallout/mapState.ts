// src/fallout/mapState.ts
//
// A map state file (.SAV inside a save slot, or a plain .MAP) is laid out as:
//
//   header | global vars | local vars | tiles | 5 script groups | rest
//
// "rest" holds objects and everything after them. It is carried as bytes so the
// file can be written back unchanged.

import { BinaryWriter, type Decoded, type WarnFn } from "./binary.js";
import { SaveFormatError } from "./errors.js";
import { inflateIfGzipped, gzipBytes } from "./gzip.js";
import { decodeMapHeader, writeMapHeader, type MapHeader } from "./mapHeader.js";
import { decodeMapVariables, writeMapVariables, type MapVariables } from "./mapVariables.js";
import type { Script } from "./script.js";
import {
  decodeScriptGroup,
  SCRIPT_GROUP_COUNT,
  writeScriptGroup,
  type ScriptGroup,
} from "./scriptGroup.js";
import { skipTileBlock, tileBlockSize } from "./tiles.js";

export type MapState = Readonly<{
  header: MapHeader;
  variables: MapVariables;
  tiles: Uint8Array;
  scriptGroups: ReadonlyArray<ScriptGroup>;
  trailing: Uint8Array;
}>;

export type MapDecodeOptions = Readonly<{
  warn?: WarnFn;
}>;

export type MapFile = Readonly<{
  compressed: boolean;
  state: MapState;
}>;

/** Scripts of all five groups, in group order. */
export function allScripts(state: MapState): Script[] {
  return state.scriptGroups.flatMap((g) => g.scripts);
}

function stage<T>(
  name: string,
  input: Uint8Array,
  fileSize: number,
  run: (bytes: Uint8Array) => Decoded<T>,
): Decoded<T> {
  try {
    return run(input);
  } catch (e: unknown) {
    if (e instanceof SaveFormatError) throw e.rebase(fileSize - input.length, name);
    throw e;
  }
}

function checkScriptWindows(state: MapState, warn: WarnFn): void {
  const locals = state.variables.localVariables.length;
  for (const s of allScripts(state)) {
    if (s.localVariableOffset === -1 && s.localVariableCount === 0) continue;
    const end = s.localVariableOffset + s.localVariableCount;
    if (s.localVariableOffset < 0 || s.localVariableCount < 0 || end > locals) {
      warn(
        `Script ${s.id}: local variables [${s.localVariableOffset}, ${end}) fall outside the table of ${locals}`,
      );
    }
  }
}

export function decodeMapState(bytes: Uint8Array, opts: MapDecodeOptions = {}): MapState {
  const size = bytes.length;

  const { value: header, rest: afterHeader } = stage("header", bytes, size, decodeMapHeader);

  if (header.globalVariableCount < 0 || header.localVariableCount < 0) {
    throw new SaveFormatError(
      "NEGATIVE_COUNT",
      `Negative variable count: globals=${header.globalVariableCount} locals=${header.localVariableCount}`,
      { offset: 0, context: ["header"] },
    );
  }

  const { value: variables, rest: afterVars } = stage("variables", afterHeader, size, (b) =>
    decodeMapVariables(b, header.globalVariableCount, header.localVariableCount),
  );

  const { value: tiles, rest: afterTiles } = stage("tiles", afterVars, size, (b) =>
    skipTileBlock(b, header.flags),
  );

  const scriptGroups: ScriptGroup[] = [];
  let input = afterTiles;
  for (let i = 0; i < SCRIPT_GROUP_COUNT; i++) {
    const decoded = stage(`script group ${i}`, input, size, decodeScriptGroup);
    scriptGroups.push(decoded.value);
    input = decoded.rest;
  }

  const state: MapState = {
    header,
    variables,
    tiles,
    scriptGroups,
    trailing: Uint8Array.from(input),
  };

  if (opts.warn) checkScriptWindows(state, opts.warn);
  return state;
}

export function encodeMapState(state: MapState): Uint8Array {
  const { header, variables } = state;

  if (variables.globalVariables.length !== header.globalVariableCount) {
    throw new SaveFormatError(
      "INVALID_LAYOUT",
      `Header declares ${header.globalVariableCount} global variables, got ${variables.globalVariables.length}`,
    );
  }
  if (variables.localVariables.length !== header.localVariableCount) {
    throw new SaveFormatError(
      "INVALID_LAYOUT",
      `Header declares ${header.localVariableCount} local variables, got ${variables.localVariables.length}`,
    );
  }
  if (state.scriptGroups.length !== SCRIPT_GROUP_COUNT) {
    throw new SaveFormatError(
      "INVALID_LAYOUT",
      `Expected ${SCRIPT_GROUP_COUNT} script groups, got ${state.scriptGroups.length}`,
    );
  }

  const w = new BinaryWriter();
  writeMapHeader(w, header);
  writeMapVariables(w, variables);
  w.writeOpaque(state.tiles, tileBlockSize(header.flags), "tiles");
  for (const g of state.scriptGroups) writeScriptGroup(w, g);
  w.writeBytes(state.trailing);
  return w.toBuffer();
}

/** Raw file bytes (gzipped or not) to a decoded map state. */
export function readMapFile(fileBytes: Uint8Array, opts: MapDecodeOptions = {}): MapFile {
  const { bytes, compressed } = inflateIfGzipped(fileBytes);
  return { compressed, state: decodeMapState(bytes, opts) };
}

export function writeMapFile(file: MapFile): Uint8Array {
  const bytes = encodeMapState(file.state);
  return file.compressed ? gzipBytes(bytes) : bytes;
}
