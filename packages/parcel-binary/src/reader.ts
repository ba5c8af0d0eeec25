// Positioned cursor over a received parcel buffer.
//
// Wire layout: all fields little-endian, 4-byte aligned. Variable-length
// payloads (strings, byte arrays) are padded up to the next word boundary.

import { ParcelError, hexDump } from "./errors.ts";

/**
 * Read-side view of a parcel, as handed to decoders and record creators.
 *
 * Implementations must throw a `truncated` ParcelError instead of reading
 * past the end of the data.
 */
export interface ParcelCursor {
  /** Current read offset in bytes. */
  readonly position: number;
  /** Total number of bytes in the parcel. */
  readonly dataSize: number;
  /** Bytes left between `position` and `dataSize`. */
  readonly remaining: number;

  seek(position: number): void;
  readI32(): number;
  readU32(): number;
  readI64(): bigint;
  readF32(): number;
  readF64(): number;
  /** Read exactly `count` bytes without padding. */
  readBytes(count: number): Uint8Array;
  /** Read `count` bytes, then skip to the next word boundary. */
  readPadded(count: number): Uint8Array;
}

/** Round a byte count up to a whole number of 32-bit words. */
export function pad4(count: number): number {
  return Math.ceil(count / 4) * 4;
}

export class ParcelReader implements ParcelCursor {
  private readonly data: Uint8Array;
  private readonly view: DataView;
  private offset: number;

  constructor(data: Uint8Array, position = 0) {
    this.data = data;
    this.view = new DataView(data.buffer, data.byteOffset, data.byteLength);
    this.offset = 0;
    this.seek(position);
  }

  get position(): number {
    return this.offset;
  }

  get dataSize(): number {
    return this.data.length;
  }

  get remaining(): number {
    return this.data.length - this.offset;
  }

  seek(position: number): void {
    if (!Number.isInteger(position) || position < 0 || position > this.data.length) {
      throw ParcelError.truncated(position, this.data.length, { offset: position });
    }
    this.offset = position;
  }

  readI32(): number {
    const at = this.take(4);
    return this.view.getInt32(at, true);
  }

  readU32(): number {
    const at = this.take(4);
    return this.view.getUint32(at, true);
  }

  readI64(): bigint {
    const at = this.take(8);
    return this.view.getBigInt64(at, true);
  }

  readF32(): number {
    const at = this.take(4);
    return this.view.getFloat32(at, true);
  }

  readF64(): number {
    const at = this.take(8);
    return this.view.getFloat64(at, true);
  }

  readBytes(count: number): Uint8Array {
    const at = this.take(count);
    return this.data.slice(at, at + count);
  }

  readPadded(count: number): Uint8Array {
    this.ensure(pad4(count));
    const bytes = this.data.slice(this.offset, this.offset + count);
    this.offset += pad4(count);
    return bytes;
  }

  private ensure(count: number): void {
    if (!Number.isInteger(count) || count < 0 || count > this.remaining) {
      throw ParcelError.truncated(count, this.remaining, {
        offset: this.offset,
        detail: hexDump(this.data, this.offset),
      });
    }
  }

  /** Bounds-check `count` bytes and advance past them, returning their start. */
  private take(count: number): number {
    this.ensure(count);
    const at = this.offset;
    this.offset += count;
    return at;
  }
}
