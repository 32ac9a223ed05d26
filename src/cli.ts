#!/usr/bin/env node
// src/cli.ts
import { Command, InvalidArgumentError } from "commander";
import { readFile, writeFile } from "node:fs/promises";

import { errorMessage } from "./fallout/errors.js";
import { inflateIfGzipped } from "./fallout/gzip.js";
import {
  mapFileFromJsonV1,
  mapFileToJsonV1,
  parseMapJsonV1,
  stringifyMapJsonV1,
} from "./fallout/mapJsonV1.js";
import { readMapFile, writeMapFile } from "./fallout/mapState.js";
import { runPatchTool, type VariableTarget } from "./fallout/patchTool.js";
import { decodeSaveHeader, type SaveHeader } from "./fallout/saveHeader.js";
import { runSummaryTool } from "./fallout/summaryTool.js";
import { grayscalePalette, loadPalette } from "./fallout/thumbnail/palette.js";
import { encodeThumbnailPng, renderThumbnail } from "./fallout/thumbnail/thumbnail.js";

const program = new Command();

function parseIntArg(label: string): (v: string) => number {
  return (v) => {
    const n = Number(v);
    if (v.trim() === "" || !Number.isInteger(n)) {
      throw new InvalidArgumentError(`${label} must be an integer, got '${v}'`);
    }
    return n;
  };
}

async function readSaveHeader(input: string): Promise<SaveHeader> {
  const { bytes } = inflateIfGzipped(await readFile(input));
  return decodeSaveHeader(bytes).value;
}

type PatchCliOptions = {
  output?: string;
  inPlace: boolean;
  overwrite: boolean;
  backup: boolean;
  dryRun: boolean;
};

async function runPatchCommand(
  input: string,
  target: VariableTarget,
  value: number,
  opts: PatchCliOptions,
): Promise<void> {
  const params: {
    out?: string;
    inPlace: boolean;
    overwrite: boolean;
    backup: boolean;
    dryRun: boolean;
  } = {
    inPlace: opts.inPlace,
    overwrite: opts.overwrite,
    backup: opts.backup,
    dryRun: opts.dryRun,
  };
  if (opts.output !== undefined) params.out = opts.output;
  await runPatchTool(input, target, value, params);
}

function withPatchOptions(cmd: Command): Command {
  return cmd
    .option("-o, --output <path>", "Write the patched file here (default: <input>.patched.<ext>)")
    .option("--in-place", "Overwrite the input file (use with care)", false)
    .option("--overwrite", "Allow overwriting an existing output or backup", false)
    .option("--backup", "Write a .bak copy before overwriting (requires --in-place)", false)
    .option("--dry-run", "Print the planned patch but do not write anything", false);
}

program
  .name("fosave")
  .description("Fallout save tools (SAVE.DAT header, map state .SAV <-> JSON, variable patches)")
  .version("0.1.0");

program
  .command("header")
  .description("Print the SAVE.DAT header as JSON")
  .argument("<input>", "Path to SAVE.DAT")
  .action(async (input: string) => {
    const h = await readSaveHeader(input);
    const { bitmap, void: voidBytes, padding, ...fields } = h;
    const out = {
      ...fields,
      padding: Buffer.from(padding).toString("hex"),
      bitmapBytes: bitmap.length,
      voidBytes: voidBytes.length,
    };
    process.stdout.write(JSON.stringify(out, null, 2) + "\n");
  });

program
  .command("to-json")
  .description("Convert a map state file (.sav, gzipped or not) to JSON")
  .argument("<input>", "Path to map state file")
  .option("-o, --output <path>", "Write JSON to a file (default: stdout)")
  .action(async (input: string, opts: { output?: string }) => {
    const bytes = await readFile(input);

    const warnings: string[] = [];
    const file = readMapFile(bytes, { warn: (m) => warnings.push(m) });
    for (const w of warnings) console.warn(w);

    const text = stringifyMapJsonV1(mapFileToJsonV1(file));
    if (opts.output) await writeFile(opts.output, text, "utf8");
    else process.stdout.write(text);
  });

program
  .command("from-json")
  .description("Convert JSON back to a map state file (gzipped if the JSON says so)")
  .argument("<input>", "Path to JSON file")
  .requiredOption("-o, --output <path>", "Write the map state file to this path")
  .action(async (input: string, opts: { output: string }) => {
    const text = await readFile(input, "utf8");
    const parsed: unknown = JSON.parse(text);
    const doc = parseMapJsonV1(parsed);

    const bytes = writeMapFile(mapFileFromJsonV1(doc));
    await writeFile(opts.output, bytes);
  });

program
  .command("scripts")
  .description("List the scripts of a map state file")
  .argument("<input>", "Path to map state file")
  .action(async (input: string) => {
    const { state } = readMapFile(await readFile(input), { warn: (m) => console.warn(m) });
    state.scriptGroups.forEach((g, group) => {
      for (const s of g.scripts) {
        const window =
          s.localVariableOffset < 0
            ? "-"
            : `[${s.localVariableOffset}, ${s.localVariableOffset + s.localVariableCount})`;
        console.log(
          `group=${group} type=${s.scriptType} tag=0x${s.tagWord.toString(16).padStart(8, "0")} id=${s.id} locals=${window}`,
        );
      }
    });
  });

program
  .command("thumbnail")
  .description("Write the SAVE.DAT thumbnail as PNG")
  .argument("<input>", "Path to SAVE.DAT")
  .option("-o, --output <path>", "Output PNG", "thumbnail.png")
  .option("--palette <path>", "Fallout .pal file (default: grayscale)")
  .action(async (input: string, opts: { output: string; palette?: string }) => {
    const header = await readSaveHeader(input);
    const palette = opts.palette ? await loadPalette(opts.palette) : grayscalePalette();
    await writeFile(opts.output, encodeThumbnailPng(renderThumbnail(header, palette)));
    console.log(`${input} -> ${opts.output}`);
  });

program
  .command("summary")
  .description("Decode every map state file in a directory and print counts")
  .argument("<input>", "Map state file or directory (e.g. a SLOTxx folder)")
  .option("--recursive", "Recurse into subdirectories", false)
  .action(async (input: string, opts: { recursive: boolean }) => {
    const result = await runSummaryTool(input, { recursive: opts.recursive });
    if (result.failed > 0) process.exitCode = 1;
  });

withPatchOptions(
  program
    .command("set-global")
    .description("Overwrite one global map variable in place in the file bytes")
    .argument("<input>", "Path to map state file")
    .argument("<index>", "Global variable index", parseIntArg("index"))
    .argument("<value>", "New i32 value", parseIntArg("value")),
).action(async (input: string, index: number, value: number, opts: PatchCliOptions) => {
  await runPatchCommand(input, { kind: "GLOBAL", index }, value, opts);
});

withPatchOptions(
  program
    .command("set-local")
    .description("Overwrite one local variable of a script in place in the file bytes")
    .argument("<input>", "Path to map state file")
    .argument("<scriptId>", "Script id", parseIntArg("scriptId"))
    .argument("<field>", "Index within the script's local variables", parseIntArg("field"))
    .argument("<value>", "New i32 value", parseIntArg("value")),
).action(
  async (input: string, scriptId: number, field: number, value: number, opts: PatchCliOptions) => {
    await runPatchCommand(input, { kind: "LOCAL", scriptId, field }, value, opts);
  },
);

program.parseAsync(process.argv).catch((err: unknown) => {
  process.stderr.write(errorMessage(err) + "\n");
  process.exitCode = 1;
});
