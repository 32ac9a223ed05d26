// src/fallout/gzip.ts
import { gzip, ungzip } from "pako";

const GZIP_MAGIC = [0x1f, 0x8b] as const;

export type Inflated = Readonly<{
  bytes: Uint8Array;
  compressed: boolean;
}>;

export function isGzipped(bytes: Uint8Array): boolean {
  return bytes.length >= 2 && bytes[0] === GZIP_MAGIC[0] && bytes[1] === GZIP_MAGIC[1];
}

/** Inflates gzip input; anything else is returned as the same array. */
export function inflateIfGzipped(bytes: Uint8Array): Inflated {
  if (!isGzipped(bytes)) return { bytes, compressed: false };

  try {
    return { bytes: ungzip(bytes), compressed: true };
  } catch (e: unknown) {
    const msg = e instanceof Error ? e.message : String(e);
    throw new Error(`Failed to decompress gzip data: ${msg}`, { cause: e });
  }
}

export function gzipBytes(bytes: Uint8Array): Uint8Array {
  return gzip(bytes);
}
