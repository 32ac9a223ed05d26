import { mkdtemp, readFile, rm, stat, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { decodeMapState } from "../src/fallout/mapState.js";
import { runPatchTool } from "../src/fallout/patchTool.js";
import { buildMapBytes } from "./helpers/mapFixture.js";

const BYTES = buildMapBytes({ globals: [10, 20, 30], locals: [], groups: [] });

async function exists(p: string): Promise<boolean> {
  try {
    await stat(p);
    return true;
  } catch {
    return false;
  }
}

async function globalsOf(p: string): Promise<ReadonlyArray<number>> {
  return decodeMapState(await readFile(p)).variables.globalVariables;
}

describe("runPatchTool", () => {
  let dir: string;
  let input: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "fosave-patch-"));
    input = path.join(dir, "MAP.SAV");
    await writeFile(input, BYTES);
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it("writes <base>.patched<ext> beside the input by default", async () => {
    const result = await runPatchTool(input, { kind: "GLOBAL", index: 1 }, 7, {});
    const out = path.join(dir, "MAP.patched.SAV");

    expect(result).toEqual({ offset: 240, previous: 20, value: 7, outPath: out, written: true });
    expect(await globalsOf(out)).toEqual([10, 7, 30]);
    expect(await globalsOf(input)).toEqual([10, 20, 30]);
    expect(console.log).toHaveBeenCalledWith(`${input} -> ${out}: global[1] @0xf0: 20 -> 7`);
  });

  it("skips an existing output unless overwrite is set", async () => {
    const out = path.join(dir, "MAP.patched.SAV");
    await writeFile(out, "keep");

    const skipped = await runPatchTool(input, { kind: "GLOBAL", index: 0 }, 1, {});
    expect(skipped.written).toBe(false);
    expect(console.warn).toHaveBeenCalledWith(`Skip (exists): ${out}`);
    expect(await readFile(out, "utf8")).toBe("keep");

    const forced = await runPatchTool(input, { kind: "GLOBAL", index: 0 }, 1, { overwrite: true });
    expect(forced.written).toBe(true);
    expect(await globalsOf(out)).toEqual([1, 20, 30]);
  });

  it("writes to an explicit output path, creating its directory", async () => {
    const out = path.join(dir, "nested", "out.sav");
    const result = await runPatchTool(input, { kind: "GLOBAL", index: 2 }, -1, { out });

    expect(result.outPath).toBe(out);
    expect(await globalsOf(out)).toEqual([10, 20, -1]);
  });

  it("writes nothing on a dry run", async () => {
    const result = await runPatchTool(input, { kind: "GLOBAL", index: 1 }, 7, { dryRun: true });

    expect(result.written).toBe(false);
    expect(await exists(path.join(dir, "MAP.patched.SAV"))).toBe(false);
    expect(console.log).toHaveBeenCalledWith(
      `[dry-run] ${input} -> ${path.join(dir, "MAP.patched.SAV")}: global[1] @0xf0: 20 -> 7`,
    );
  });

  it("patches in place after saving a backup, and refuses to replace the backup", async () => {
    const result = await runPatchTool(input, { kind: "GLOBAL", index: 1 }, 7, {
      inPlace: true,
      backup: true,
    });
    const bak = `${input}.bak`;

    expect(result.outPath).toBe(input);
    expect(await globalsOf(input)).toEqual([10, 7, 30]);
    expect(await readFile(bak)).toEqual(BYTES);

    await expect(
      runPatchTool(input, { kind: "GLOBAL", index: 1 }, 8, { inPlace: true, backup: true }),
    ).rejects.toThrow(`Backup exists (use --overwrite or delete): ${bak}`);
    expect(await globalsOf(input)).toEqual([10, 7, 30]);
  });

  it("rejects a backup without in-place", async () => {
    await expect(
      runPatchTool(input, { kind: "GLOBAL", index: 1 }, 7, { backup: true }),
    ).rejects.toThrow("--backup only applies with --in-place");
    expect(await exists(path.join(dir, "MAP.patched.SAV"))).toBe(false);
  });
});
