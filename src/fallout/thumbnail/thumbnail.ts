// src/fallout/thumbnail/thumbnail.ts
import * as pngjs from "pngjs";

import {
  SAVE_BITMAP_SIZE,
  THUMBNAIL_HEIGHT,
  THUMBNAIL_WIDTH,
  type SaveHeader,
} from "../saveHeader.js";
import type { Palette } from "./palette.js";

const { PNG } = pngjs;

export type Thumbnail = Readonly<{
  width: number;
  height: number;
  // RGBA, 4 bytes per pixel, row-major
  rgba: Uint8Array;
}>;

/** Palette-indexed save bitmap to opaque RGBA; indices the palette lacks render black. */
export function renderThumbnail(header: SaveHeader, palette: Palette): Thumbnail {
  if (header.bitmap.length !== SAVE_BITMAP_SIZE) {
    throw new Error(`Thumbnail must be ${SAVE_BITMAP_SIZE} bytes, got ${header.bitmap.length}`);
  }

  const rgba = new Uint8Array(SAVE_BITMAP_SIZE * 4);
  header.bitmap.forEach((index, i) => {
    const [r, g, b] = palette[index] ?? [0, 0, 0];
    rgba.set([r, g, b, 255], i * 4);
  });
  return { width: THUMBNAIL_WIDTH, height: THUMBNAIL_HEIGHT, rgba };
}

export function encodeThumbnailPng(thumb: Thumbnail): Buffer {
  const png = new PNG({ width: thumb.width, height: thumb.height });
  png.data = Buffer.from(thumb.rgba);
  return PNG.sync.write(png);
}
