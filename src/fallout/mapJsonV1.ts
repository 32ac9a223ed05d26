// src/fallout/mapJsonV1.ts
import { isMapFlagName, type MapFlagName, type MapFlags } from "./mapFlags.js";
import { isMapVersion, type MapHeader } from "./mapHeader.js";
import type { MapFile } from "./mapState.js";
import type { Script } from "./script.js";
import type { ScriptGroup } from "./scriptGroup.js";
import { isScriptTagType, type ScriptTagType } from "./scriptTag.js";

export type Base64Blob = {
  encoding: "base64";
  dataBase64: string;
};

export type ScriptJson = {
  tagWord: number; // u32
  scriptType: ScriptTagType;
  id: number;
  localVariableOffset: number;
  localVariableCount: number;
  prefixJunk: Base64Blob;
  unknownAfterId: Base64Blob; // 8 bytes
  suffixJunk: Base64Blob; // 32 bytes
};

export type ScriptGroupJson = {
  scripts: ScriptJson[];
  batchFooters: Base64Blob[];
  paddingSlots: Base64Blob[];
};

export type MapJsonV1 = {
  schema: "fosave.map.json.v1";
  compressed: boolean;

  header: {
    version: MapHeader["version"];
    filename: string;
    defaultPlayerPosition: number;
    defaultPlayerElevation: number;
    defaultPlayerOrientation: number;
    localVariableCount: number;
    scriptId: number;
    flags: { set: MapFlagName[]; otherBits: number };
    darkness: number;
    globalVariableCount: number;
    id: number;
    ticks: number; // u32
    mysteryBytes: Base64Blob;
  };

  globalVariables: number[];
  localVariables: number[];

  // Opaque: tile block of every present elevation
  tiles: Base64Blob;
  scriptGroups: ScriptGroupJson[];
  // Objects and everything after the script groups
  trailing: Base64Blob;
};

const SCHEMA = "fosave.map.json.v1";

function toBase64(bytes: Uint8Array): Base64Blob {
  return { encoding: "base64", dataBase64: Buffer.from(bytes).toString("base64") };
}

function fromBase64(blob: Base64Blob): Uint8Array {
  return Uint8Array.from(Buffer.from(blob.dataBase64, "base64"));
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function parseBase64Blob(v: unknown, name: string): Base64Blob {
  if (!isRecord(v)) throw new Error(`Invalid ${name}: expected object`);
  const enc = v.encoding;
  const data = v.dataBase64;

  if (enc !== "base64") throw new Error(`Invalid ${name}.encoding (expected "base64")`);
  if (typeof data !== "string") throw new Error(`Invalid ${name}.dataBase64 (expected string)`);

  return { encoding: "base64", dataBase64: data };
}

function parseInt32(v: unknown, name: string, min = -0x80000000, max = 0x7fffffff): number {
  if (typeof v !== "number" || !Number.isInteger(v) || v < min || v > max) {
    throw new Error(`Invalid ${name}: expected integer in [${min}, ${max}]`);
  }
  return v;
}

function parseU32(v: unknown, name: string): number {
  return parseInt32(v, name, 0, 0xffffffff);
}

function parseString(v: unknown, name: string): string {
  if (typeof v !== "string") throw new Error(`Invalid ${name}: expected string`);
  return v;
}

function parseArray<T>(v: unknown, name: string, item: (x: unknown, name: string) => T): T[] {
  if (!Array.isArray(v)) throw new Error(`Invalid ${name}: expected array`);
  return v.map((x, i) => item(x, `${name}[${i}]`));
}

function parseFlags(v: unknown, name: string): MapJsonV1["header"]["flags"] {
  if (!isRecord(v)) throw new Error(`Invalid ${name}: expected object`);
  const set = parseArray(v.set, `${name}.set`, (x, n) => {
    if (!isMapFlagName(x)) throw new Error(`Invalid ${n}: unknown flag '${String(x)}'`);
    return x;
  });
  return { set, otherBits: parseU32(v.otherBits, `${name}.otherBits`) };
}

function parseScriptJson(v: unknown, name: string): ScriptJson {
  if (!isRecord(v)) throw new Error(`Invalid ${name}: expected object`);
  const scriptType = v.scriptType;
  if (!isScriptTagType(scriptType)) throw new Error(`Invalid ${name}.scriptType`);

  return {
    tagWord: parseU32(v.tagWord, `${name}.tagWord`),
    scriptType,
    id: parseInt32(v.id, `${name}.id`),
    localVariableOffset: parseInt32(v.localVariableOffset, `${name}.localVariableOffset`),
    localVariableCount: parseInt32(v.localVariableCount, `${name}.localVariableCount`),
    prefixJunk: parseBase64Blob(v.prefixJunk, `${name}.prefixJunk`),
    unknownAfterId: parseBase64Blob(v.unknownAfterId, `${name}.unknownAfterId`),
    suffixJunk: parseBase64Blob(v.suffixJunk, `${name}.suffixJunk`),
  };
}

function parseScriptGroupJson(v: unknown, name: string): ScriptGroupJson {
  if (!isRecord(v)) throw new Error(`Invalid ${name}: expected object`);
  return {
    scripts: parseArray(v.scripts, `${name}.scripts`, parseScriptJson),
    batchFooters: parseArray(v.batchFooters, `${name}.batchFooters`, parseBase64Blob),
    paddingSlots: parseArray(v.paddingSlots, `${name}.paddingSlots`, parseBase64Blob),
  };
}

export function parseMapJsonV1(input: unknown): MapJsonV1 {
  if (!isRecord(input)) throw new Error("Invalid JSON: expected object");
  if (input.schema !== SCHEMA) throw new Error("Invalid schema");
  if (typeof input.compressed !== "boolean") throw new Error("Invalid compressed: expected boolean");

  const h = input.header;
  if (!isRecord(h)) throw new Error("Invalid header: expected object");
  if (!isMapVersion(h.version)) throw new Error("Invalid header.version");

  return {
    schema: SCHEMA,
    compressed: input.compressed,
    header: {
      version: h.version,
      filename: parseString(h.filename, "header.filename"),
      defaultPlayerPosition: parseInt32(h.defaultPlayerPosition, "header.defaultPlayerPosition"),
      defaultPlayerElevation: parseInt32(h.defaultPlayerElevation, "header.defaultPlayerElevation"),
      defaultPlayerOrientation: parseInt32(
        h.defaultPlayerOrientation,
        "header.defaultPlayerOrientation",
      ),
      localVariableCount: parseInt32(h.localVariableCount, "header.localVariableCount"),
      scriptId: parseInt32(h.scriptId, "header.scriptId"),
      flags: parseFlags(h.flags, "header.flags"),
      darkness: parseInt32(h.darkness, "header.darkness"),
      globalVariableCount: parseInt32(h.globalVariableCount, "header.globalVariableCount"),
      id: parseInt32(h.id, "header.id"),
      ticks: parseU32(h.ticks, "header.ticks"),
      mysteryBytes: parseBase64Blob(h.mysteryBytes, "header.mysteryBytes"),
    },
    globalVariables: parseArray(input.globalVariables, "globalVariables", (x, n) => parseInt32(x, n)),
    localVariables: parseArray(input.localVariables, "localVariables", (x, n) => parseInt32(x, n)),
    tiles: parseBase64Blob(input.tiles, "tiles"),
    scriptGroups: parseArray(input.scriptGroups, "scriptGroups", parseScriptGroupJson),
    trailing: parseBase64Blob(input.trailing, "trailing"),
  };
}

export function stringifyMapJsonV1(doc: MapJsonV1): string {
  return JSON.stringify(doc, null, 2) + "\n";
}

function scriptToJson(s: Script): ScriptJson {
  return {
    tagWord: s.tagWord,
    scriptType: s.scriptType,
    id: s.id,
    localVariableOffset: s.localVariableOffset,
    localVariableCount: s.localVariableCount,
    prefixJunk: toBase64(s.prefixJunk),
    unknownAfterId: toBase64(s.unknownAfterId),
    suffixJunk: toBase64(s.suffixJunk),
  };
}

function scriptFromJson(s: ScriptJson): Script {
  return {
    tagWord: s.tagWord,
    scriptType: s.scriptType,
    id: s.id,
    localVariableOffset: s.localVariableOffset,
    localVariableCount: s.localVariableCount,
    prefixJunk: fromBase64(s.prefixJunk),
    unknownAfterId: fromBase64(s.unknownAfterId),
    suffixJunk: fromBase64(s.suffixJunk),
  };
}

function groupToJson(g: ScriptGroup): ScriptGroupJson {
  return {
    scripts: g.scripts.map(scriptToJson),
    batchFooters: g.batchFooters.map(toBase64),
    paddingSlots: g.paddingSlots.map(toBase64),
  };
}

function groupFromJson(g: ScriptGroupJson): ScriptGroup {
  return {
    scripts: g.scripts.map(scriptFromJson),
    batchFooters: g.batchFooters.map(fromBase64),
    paddingSlots: g.paddingSlots.map(fromBase64),
  };
}

export function mapFileToJsonV1(file: MapFile): MapJsonV1 {
  const { header, variables } = file.state;
  return {
    schema: SCHEMA,
    compressed: file.compressed,
    header: {
      version: header.version,
      filename: header.filename,
      defaultPlayerPosition: header.defaultPlayerPosition,
      defaultPlayerElevation: header.defaultPlayerElevation,
      defaultPlayerOrientation: header.defaultPlayerOrientation,
      localVariableCount: header.localVariableCount,
      scriptId: header.scriptId,
      flags: { set: [...header.flags.set], otherBits: header.flags.otherBits },
      darkness: header.darkness,
      globalVariableCount: header.globalVariableCount,
      id: header.id,
      ticks: header.ticks,
      mysteryBytes: toBase64(header.mysteryBytes),
    },
    globalVariables: [...variables.globalVariables],
    localVariables: [...variables.localVariables],
    tiles: toBase64(file.state.tiles),
    scriptGroups: file.state.scriptGroups.map(groupToJson),
    trailing: toBase64(file.state.trailing),
  };
}

export function mapFileFromJsonV1(doc: MapJsonV1): MapFile {
  if (doc.schema !== SCHEMA) throw new Error(`Unsupported schema: ${doc.schema}`);

  const h = doc.header;
  const flags: MapFlags = { set: [...h.flags.set], otherBits: h.flags.otherBits };

  return {
    compressed: doc.compressed,
    state: {
      header: {
        version: h.version,
        filename: h.filename,
        defaultPlayerPosition: h.defaultPlayerPosition,
        defaultPlayerElevation: h.defaultPlayerElevation,
        defaultPlayerOrientation: h.defaultPlayerOrientation,
        localVariableCount: h.localVariableCount,
        scriptId: h.scriptId,
        flags,
        darkness: h.darkness,
        globalVariableCount: h.globalVariableCount,
        id: h.id,
        ticks: h.ticks,
        mysteryBytes: fromBase64(h.mysteryBytes),
      },
      variables: {
        globalVariables: [...doc.globalVariables],
        localVariables: [...doc.localVariables],
      },
      tiles: fromBase64(doc.tiles),
      scriptGroups: doc.scriptGroups.map(groupFromJson),
      trailing: fromBase64(doc.trailing),
    },
  };
}
