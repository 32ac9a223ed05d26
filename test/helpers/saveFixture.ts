// test/helpers/saveFixture.ts
import { BinaryWriter } from "../../src/fallout/binary.js";

function ascii(text: string, size: number): Buffer {
  const b = Buffer.alloc(size);
  b.write(text, "ascii");
  return b;
}

export function fixtureBitmap(): Uint8Array {
  const out = new Uint8Array(224 * 133);
  for (let i = 0; i < out.length; i++) out[i] = i % 256;
  return out;
}

export function buildSaveHeaderBytes(overrides: { magic?: Uint8Array; name?: Uint8Array } = {}): Buffer {
  const w = new BinaryWriter();
  w.writeBytes(overrides.magic ?? ascii("FALLOUT SAVE FILE", 18));
  w.writeBytes(Uint8Array.from([1, 2, 3, 4, 5, 6]));
  w.writeU32BE(65538);
  w.writeU8(82);
  w.writeBytes(overrides.name ?? ascii("diglet", 32));
  w.writeBytes(ascii("start", 30));
  w.writeU16BE(2);
  w.writeU16BE(6);
  w.writeU16BE(2024);
  w.writeU32BE(68);
  w.writeU16BE(6); // ingame month
  w.writeU16BE(13); // ingame day
  w.writeU16BE(2242); // ingame year
  w.writeU32BE(279545357);
  w.writeU32BE(46);
  w.writeBytes(ascii("NCRENT.sav", 16));
  w.writeBytes(fixtureBitmap());
  w.writeBytes(new Uint8Array(128));
  return w.toBuffer();
}
