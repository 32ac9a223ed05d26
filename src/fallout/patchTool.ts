// src/fallout/patchTool.ts
import path from "node:path";
import { copyFile, mkdir, readFile, stat, writeFile } from "node:fs/promises";

import { gzipBytes, inflateIfGzipped } from "./gzip.js";
import { allScripts, decodeMapState } from "./mapState.js";
import {
  findScriptById,
  globalVariableFileOffset,
  localVariableFileOffset,
  patchI32,
} from "./patch.js";

export type VariableTarget =
  | Readonly<{ kind: "GLOBAL"; index: number }>
  | Readonly<{ kind: "LOCAL"; scriptId: number; field: number }>;

export type PatchToolOptions = Readonly<{
  out?: string;
  inPlace?: boolean;
  overwrite?: boolean;
  dryRun?: boolean;
  backup?: boolean; // requires inPlace
}>;

export type PatchResult = Readonly<{
  offset: number;
  previous: number;
  value: number;
  outPath: string;
  written: boolean;
}>;

async function existsPath(p: string): Promise<boolean> {
  try {
    await stat(p);
    return true;
  } catch {
    return false;
  }
}

function defaultOutFileForFile(inputFile: string): string {
  const ext = path.extname(inputFile);
  const base = inputFile.slice(0, inputFile.length - ext.length);
  return `${base}.patched${ext}`;
}

export function describeTarget(t: VariableTarget): string {
  return t.kind === "GLOBAL" ? `global[${t.index}]` : `script ${t.scriptId} local[${t.field}]`;
}

/** Patched file bytes plus where the write landed. Re-gzips when the input was gzipped. */
export function patchMapVariable(
  fileBytes: Uint8Array,
  target: VariableTarget,
  value: number,
): { bytes: Uint8Array; offset: number; previous: number } {
  const { bytes, compressed } = inflateIfGzipped(fileBytes);
  const state = decodeMapState(bytes);

  const offset =
    target.kind === "GLOBAL"
      ? globalVariableFileOffset(state.header, target.index)
      : localVariableFileOffset(
          state.header,
          findScriptById(allScripts(state), target.scriptId),
          target.field,
        );

  const previous = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).readInt32BE(
    offset,
  );
  const patched = patchI32(bytes, offset, value);
  return { bytes: compressed ? gzipBytes(patched) : patched, offset, previous };
}

export async function runPatchTool(
  inputPath: string,
  target: VariableTarget,
  value: number,
  opts: PatchToolOptions,
): Promise<PatchResult> {
  const inPlace = opts.inPlace === true;
  const overwrite = opts.overwrite === true;
  const dryRun = opts.dryRun === true;
  const backup = opts.backup === true;
  if (backup && !inPlace) throw new Error("--backup only applies with --in-place");

  const original = await readFile(inputPath);
  const { bytes, offset, previous } = patchMapVariable(original, target, value);

  const outPath = inPlace ? inputPath : (opts.out ?? defaultOutFileForFile(inputPath));
  const summary = `${describeTarget(target)} @0x${offset.toString(16)}: ${previous} -> ${value}`;

  if (!inPlace && !overwrite && (await existsPath(outPath))) {
    console.warn(`Skip (exists): ${outPath}`);
    return { offset, previous, value, outPath, written: false };
  }

  if (dryRun) {
    console.log(`[dry-run] ${inputPath} -> ${outPath}: ${summary}`);
    return { offset, previous, value, outPath, written: false };
  }

  if (inPlace && backup) {
    const bak = `${inputPath}.bak`;
    if (!overwrite && (await existsPath(bak))) {
      throw new Error(`Backup exists (use --overwrite or delete): ${bak}`);
    }
    await copyFile(inputPath, bak);
  }

  await mkdir(path.dirname(outPath), { recursive: true });
  await writeFile(outPath, bytes);
  console.log(`${inputPath} -> ${outPath}: ${summary}`);

  return { offset, previous, value, outPath, written: true };
}
