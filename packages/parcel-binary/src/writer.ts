/**
 * Primitive parcel writer.
 *
 * Counterpart of {@link ParcelReader} for framing buffers on the producing
 * side: integers, floats, the three string conventions and backpatched length
 * prefixes. It has no notion of dynamic values or bundles.
 */

import { pad4 } from "./reader.ts";

const textEncoder = new TextEncoder();

export class ParcelWriter {
  private buffer: Uint8Array;
  private view: DataView;
  private offset = 0;

  constructor(initialCapacity = 64) {
    this.buffer = new Uint8Array(Math.max(initialCapacity, 4));
    this.view = new DataView(this.buffer.buffer);
  }

  /** Number of bytes written so far. */
  get position(): number {
    return this.offset;
  }

  /** Copy of the written bytes. */
  get bytes(): Uint8Array {
    return this.buffer.slice(0, this.offset);
  }

  writeI32(value: number): this {
    this.reserve(4);
    this.view.setInt32(this.offset, value, true);
    this.offset += 4;
    return this;
  }

  writeU32(value: number): this {
    this.reserve(4);
    this.view.setUint32(this.offset, value, true);
    this.offset += 4;
    return this;
  }

  writeI64(value: bigint): this {
    this.reserve(8);
    this.view.setBigInt64(this.offset, value, true);
    this.offset += 8;
    return this;
  }

  writeF32(value: number): this {
    this.reserve(4);
    this.view.setFloat32(this.offset, value, true);
    this.offset += 4;
    return this;
  }

  writeF64(value: number): this {
    this.reserve(8);
    this.view.setFloat64(this.offset, value, true);
    this.offset += 8;
    return this;
  }

  /** Raw bytes, no padding. */
  writeBytes(bytes: Uint8Array): this {
    this.reserve(bytes.length);
    this.buffer.set(bytes, this.offset);
    this.offset += bytes.length;
    return this;
  }

  /** Bytes followed by zero padding up to the next word boundary. */
  writePadded(bytes: Uint8Array): this {
    const padded = pad4(bytes.length);
    this.reserve(padded);
    this.buffer.set(bytes, this.offset);
    this.buffer.fill(0, this.offset + bytes.length, this.offset + padded);
    this.offset += padded;
    return this;
  }

  /** Plain string: i32 byte length, UTF-8, padded. `null` is written as length -1. */
  writeString(value: string | null): this {
    if (value === null) return this.writeI32(-1);
    const bytes = textEncoder.encode(value);
    return this.writeI32(bytes.length).writePadded(bytes);
  }

  /** String8: u32 byte length, UTF-8, NUL, padded. */
  writeString8(value: string): this {
    const bytes = textEncoder.encode(value);
    const withNul = new Uint8Array(bytes.length + 1);
    withNul.set(bytes);
    return this.writeU32(bytes.length).writePadded(withNul);
  }

  /** String16: i32 code-unit count, UTF-16LE, NUL unit, padded. `null` is -1. */
  writeString16(value: string | null): this {
    if (value === null) return this.writeI32(-1);
    const units = new Uint8Array((value.length + 1) * 2);
    const unitView = new DataView(units.buffer);
    for (let i = 0; i < value.length; i++) {
      unitView.setUint16(i * 2, value.charCodeAt(i), true);
    }
    return this.writeI32(value.length).writePadded(units);
  }

  /**
   * Write a length placeholder and return a mark for {@link endLength}.
   * The mark is the position right after the placeholder.
   */
  beginLength(): number {
    this.writeI32(0);
    return this.offset;
  }

  /**
   * Backpatch the placeholder opened at `mark` with the bytes written since
   * `from`, which defaults to the mark itself. Bundles count from after their
   * magic, so their producers pass the position following it.
   */
  endLength(mark: number, from: number = mark): this {
    this.view.setInt32(mark - 4, this.offset - from, true);
    return this;
  }

  private reserve(count: number): void {
    const needed = this.offset + count;
    if (needed <= this.buffer.length) return;
    let capacity = this.buffer.length * 2;
    while (capacity < needed) capacity *= 2;
    const grown = new Uint8Array(capacity);
    grown.set(this.buffer.subarray(0, this.offset));
    this.buffer = grown;
    this.view = new DataView(grown.buffer);
  }
}
