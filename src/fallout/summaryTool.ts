// src/fallout/summaryTool.ts
import path from "node:path";
import { readdir, readFile, stat } from "node:fs/promises";

import { errorMessage } from "./errors.js";
import { allScripts, readMapFile } from "./mapState.js";

export type SummaryToolOptions = Readonly<{
  recursive?: boolean;
}>;

export type MapSummary = Readonly<{
  file: string;
  compressed: boolean;
  version: string;
  filename: string;
  globalVariables: number;
  localVariables: number;
  scripts: number;
  scriptsPerGroup: ReadonlyArray<number>;
}>;

export type SummaryResult = Readonly<{
  processed: number;
  decoded: number;
  failed: number;
  maps: ReadonlyArray<MapSummary>;
}>;

function isMapSavePath(p: string): boolean {
  const lower = p.toLowerCase();
  return lower.endsWith(".sav") || lower.endsWith(".map");
}

async function isDirectory(p: string): Promise<boolean> {
  try {
    const st = await stat(p);
    return st.isDirectory();
  } catch {
    return false;
  }
}

async function listFiles(dir: string, recursive: boolean): Promise<string[]> {
  const out: string[] = [];
  const entries = await readdir(dir, { withFileTypes: true });

  for (const e of entries) {
    const full = path.join(dir, e.name);
    if (e.isDirectory()) {
      if (recursive) out.push(...(await listFiles(full, true)));
    } else if (e.isFile()) {
      out.push(full);
    }
  }

  out.sort();
  return out;
}

export async function summarizeMapFile(file: string): Promise<MapSummary> {
  const bytes = await readFile(file);
  const warnings: string[] = [];
  const { compressed, state } = readMapFile(bytes, { warn: (m) => warnings.push(m) });
  for (const w of warnings) console.warn(`${file}: ${w}`);

  return {
    file,
    compressed,
    version: state.header.version,
    filename: state.header.filename,
    globalVariables: state.variables.globalVariables.length,
    localVariables: state.variables.localVariables.length,
    scripts: allScripts(state).length,
    scriptsPerGroup: state.scriptGroups.map((g) => g.scripts.length),
  };
}

export function formatMapSummary(s: MapSummary): string {
  return (
    `${s.file}: ${s.filename} ${s.version}${s.compressed ? " (gz)" : ""}` +
    ` gvars=${s.globalVariables} lvars=${s.localVariables}` +
    ` scripts=${s.scripts} [${s.scriptsPerGroup.join(",")}]`
  );
}

export async function runSummaryTool(
  inputPath: string,
  opts: SummaryToolOptions,
): Promise<SummaryResult> {
  const recursive = opts.recursive === true;

  const files = (await isDirectory(inputPath))
    ? (await listFiles(inputPath, recursive)).filter(isMapSavePath)
    : [inputPath];

  const maps: MapSummary[] = [];
  let failed = 0;

  for (const f of files) {
    try {
      const s = await summarizeMapFile(f);
      maps.push(s);
      console.log(formatMapSummary(s));
    } catch (e: unknown) {
      failed++;
      console.warn(`${f}: ${errorMessage(e)}`);
    }
  }

  console.log(`Done. processed=${files.length} decoded=${maps.length} failed=${failed}`);
  return { processed: files.length, decoded: maps.length, failed, maps };
}
