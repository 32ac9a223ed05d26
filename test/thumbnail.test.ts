import * as pngjs from "pngjs";
import { describe, expect, it } from "vitest";

import { decodeSaveHeader } from "../src/fallout/saveHeader.js";
import { grayscalePalette, parsePalette } from "../src/fallout/thumbnail/palette.js";
import { encodeThumbnailPng, renderThumbnail } from "../src/fallout/thumbnail/thumbnail.js";
import { buildSaveHeaderBytes } from "./helpers/saveFixture.js";

const { PNG } = pngjs;

const HEADER = decodeSaveHeader(buildSaveHeaderBytes()).value;

describe("palette", () => {
  it("scales 6-bit entries and blanks unused ones", () => {
    const bytes = new Uint8Array(768);
    bytes.set([63, 0, 10], 0);
    bytes.set([64, 1, 1], 3);

    const pal = parsePalette(bytes);
    expect(pal.length).toBe(256);
    expect(pal[0]).toEqual([252, 0, 40]);
    expect(pal[1]).toEqual([0, 0, 0]);
  });

  it("needs 256 entries", () => {
    expect(() => parsePalette(new Uint8Array(767))).toThrow("Palette needs 768 bytes, got 767");
  });
});

describe("thumbnail", () => {
  it("maps each palette index to an opaque pixel", () => {
    const img = renderThumbnail(HEADER, grayscalePalette());

    expect(img.width).toBe(224);
    expect(img.height).toBe(133);
    // pixel 300 holds index 44
    expect(Array.from(img.rgba.subarray(1200, 1204))).toEqual([44, 44, 44, 255]);
  });

  it("renders indices missing from the palette as black", () => {
    const img = renderThumbnail(HEADER, [[9, 9, 9]]);

    expect(Array.from(img.rgba.subarray(0, 8))).toEqual([9, 9, 9, 255, 0, 0, 0, 255]);
  });

  it("encodes a PNG of the thumbnail size", () => {
    const png = PNG.sync.read(encodeThumbnailPng(renderThumbnail(HEADER, grayscalePalette())));

    expect(png.width).toBe(224);
    expect(png.height).toBe(133);
    expect(Array.from(png.data.subarray(4, 8))).toEqual([1, 1, 1, 255]);
  });
});
