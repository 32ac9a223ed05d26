// src/fallout/binary.ts
import { SaveFormatError } from "./errors.js";

/** A decoded value plus a view of the bytes that follow it. */
export type Decoded<T> = Readonly<{
  value: T;
  rest: Uint8Array;
}>;

export type WarnFn = (msg: string) => void;

function asBuffer(bytes: Uint8Array): Buffer {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}

export class BinaryReader {
  private pos = 0;
  private readonly buf: Buffer;

  public constructor(bytes: Uint8Array) {
    this.buf = asBuffer(bytes);
  }

  public get offset(): number {
    return this.pos;
  }

  public remaining(): number {
    return this.buf.length - this.pos;
  }

  /** Zero-copy view of everything not yet consumed. */
  public rest(): Uint8Array {
    return this.buf.subarray(this.pos);
  }

  public done<T>(value: T): Decoded<T> {
    return { value, rest: this.rest() };
  }

  public readU8(): number {
    this.ensure(1);
    const v = this.buf.readUInt8(this.pos);
    this.pos += 1;
    return v;
  }

  public readU16BE(): number {
    this.ensure(2);
    const v = this.buf.readUInt16BE(this.pos);
    this.pos += 2;
    return v;
  }

  public readU32BE(): number {
    this.ensure(4);
    const v = this.buf.readUInt32BE(this.pos);
    this.pos += 4;
    return v;
  }

  public peekU32BE(): number {
    this.ensure(4);
    return this.buf.readUInt32BE(this.pos);
  }

  public readI32BE(): number {
    this.ensure(4);
    const v = this.buf.readInt32BE(this.pos);
    this.pos += 4;
    return v;
  }

  /** View into the underlying bytes; copy it before keeping it. */
  public readBytes(n: number): Uint8Array {
    if (!Number.isInteger(n) || n < 0) {
      throw new SaveFormatError("VALUE_OUT_OF_RANGE", `Invalid read length: ${n}`, {
        offset: this.pos,
      });
    }
    this.ensure(n);
    const out = this.buf.subarray(this.pos, this.pos + n);
    this.pos += n;
    return out;
  }

  public readOpaque(n: number): Uint8Array {
    return Uint8Array.from(this.readBytes(n));
  }

  public skip(n: number): void {
    this.readBytes(n);
  }

  private ensure(n: number): void {
    if (this.pos + n > this.buf.length) {
      throw new SaveFormatError(
        "INSUFFICIENT_DATA",
        `Unexpected EOF: need ${n} bytes, have ${this.remaining()}`,
        { offset: this.pos },
      );
    }
  }
}

function outOfRange(kind: string, v: number): SaveFormatError {
  return new SaveFormatError("VALUE_OUT_OF_RANGE", `${kind} out of range: ${v}`);
}

export class BinaryWriter {
  private readonly chunks: Buffer[] = [];
  private size = 0;

  public get length(): number {
    return this.size;
  }

  public writeU8(v: number): void {
    if (!Number.isInteger(v) || v < 0 || v > 0xff) throw outOfRange("U8", v);
    const b = Buffer.alloc(1);
    b.writeUInt8(v, 0);
    this.push(b);
  }

  public writeU16BE(v: number): void {
    if (!Number.isInteger(v) || v < 0 || v > 0xffff) throw outOfRange("U16", v);
    const b = Buffer.alloc(2);
    b.writeUInt16BE(v, 0);
    this.push(b);
  }

  public writeU32BE(v: number): void {
    if (!Number.isInteger(v) || v < 0 || v > 0xffffffff) throw outOfRange("U32", v);
    const b = Buffer.alloc(4);
    b.writeUInt32BE(v >>> 0, 0);
    this.push(b);
  }

  public writeI32BE(v: number): void {
    if (!Number.isInteger(v) || v < -0x80000000 || v > 0x7fffffff) throw outOfRange("I32", v);
    const b = Buffer.alloc(4);
    b.writeInt32BE(v, 0);
    this.push(b);
  }

  public writeBytes(bytes: Uint8Array): void {
    this.push(Buffer.from(bytes));
  }

  /** Writes `bytes`, failing unless it is exactly `n` long. */
  public writeOpaque(bytes: Uint8Array, n: number, label: string): void {
    if (bytes.length !== n) {
      throw new SaveFormatError(
        "INVALID_LAYOUT",
        `${label} must be ${n} bytes, got ${bytes.length}`,
      );
    }
    this.writeBytes(bytes);
  }

  public toBuffer(): Buffer {
    return Buffer.concat(this.chunks, this.size);
  }

  private push(b: Buffer): void {
    this.chunks.push(b);
    this.size += b.length;
  }
}
