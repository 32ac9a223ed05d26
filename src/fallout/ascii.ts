// src/fallout/ascii.ts
//
// Fixed-width C strings. A 32-byte field holds at most 31 characters plus the
// NUL; whatever follows the first NUL is padding.

import { BinaryReader, type Decoded } from "./binary.js";
import { SaveFormatError } from "./errors.js";

const utf8 = new TextDecoder("utf-8", { fatal: true });
const utf8Encoder = new TextEncoder();

export function decodeAscii(bytes: Uint8Array, size: number): Decoded<string> {
  const r = new BinaryReader(bytes);
  const field = r.readBytes(size);

  const nul = field.indexOf(0);
  const text = nul === -1 ? field : field.subarray(0, nul);

  try {
    return r.done(utf8.decode(text));
  } catch (e: unknown) {
    throw new SaveFormatError("MALFORMED_STRING", `Field of ${size} bytes is not valid text`, {
      offset: 0,
      cause: e,
    });
  }
}

export function encodeAscii(text: string, size: number): Uint8Array {
  if (text.includes("\0")) {
    throw new SaveFormatError("MALFORMED_STRING", `String contains NUL: '${text}'`);
  }
  const bytes = utf8Encoder.encode(text);
  if (bytes.length + 1 > size) {
    throw new SaveFormatError(
      "STRING_TOO_LONG",
      `'${text}' needs ${bytes.length + 1} bytes, field holds ${size}`,
    );
  }

  const out = new Uint8Array(size);
  out.set(bytes, 0);
  return out;
}
