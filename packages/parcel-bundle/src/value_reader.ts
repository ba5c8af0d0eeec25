// Tag-dispatched value decoding.
//
// Wire layout of one value:
//   i32 tag
//   i32 byte length          (only for length-prefixed tags)
//   payload                  (layout depends on the tag)
//
// For length-prefixed tags the payload must end exactly `length` bytes after
// the length field. A mismatch is an error; the reader never resyncs.

import {
  ParcelError,
  readKey,
  readStringAs,
  type ParcelCursor,
} from "@parcelkit/binary";
import { log } from "./logging.ts";
import type { DecodeContext } from "./options.ts";
import type { ParcelableRecord } from "./records.ts";
import { NULL_VALUE, type Bundle, type ParcelValue } from "./value.ts";
import { ValueType, isLengthPrefixed, valueTypeName } from "./value_types.ts";

/** 'B' 'N' 'D' 'L' */
export const BUNDLE_MAGIC = 0x4c444e42;
/** 'B' 'N' 'D' 'N' */
export const BUNDLE_MAGIC_NATIVE = 0x4c444e44;

/**
 * Decode one tagged value, including everything nested inside it.
 */
export function readValue(cursor: ParcelCursor, ctx: DecodeContext): ParcelValue {
  const tagOffset = cursor.position;
  const tag = cursor.readI32();
  if (!isLengthPrefixed(tag)) {
    return readValuePayload(cursor, tag, tagOffset, ctx);
  }

  const lengthOffset = cursor.position;
  const length = cursor.readI32();
  if (length < 0) {
    throw ParcelError.framing(`${valueTypeName(tag)}: negative length ${length}`, {
      offset: lengthOffset,
    });
  }
  if (length > cursor.remaining) {
    throw ParcelError.truncated(length, cursor.remaining, { offset: cursor.position });
  }

  const start = cursor.position;
  const value = readValuePayload(cursor, tag, tagOffset, ctx);
  const end = cursor.position;
  if (end !== start + length) {
    throw ParcelError.lengthMismatch(valueTypeName(tag), start + length, end, { offset: start });
  }
  return value;
}

function readValuePayload(
  cursor: ParcelCursor,
  tag: number,
  tagOffset: number,
  ctx: DecodeContext,
): ParcelValue {
  switch (tag) {
    case ValueType.NULL:
      return NULL_VALUE;

    case ValueType.STRING: {
      const value = readStringAs(cursor, ctx.strings);
      return value === null ? NULL_VALUE : { tag: "String", value };
    }

    case ValueType.INTEGER:
    case ValueType.SHORT:
    case ValueType.BYTE:
    case ValueType.CHAR:
      return { tag: "Integer", value: cursor.readI32() };

    case ValueType.LONG:
      return { tag: "Long", value: cursor.readI64() };

    case ValueType.BOOLEAN:
      return { tag: "Boolean", value: cursor.readI32() !== 0 };

    case ValueType.DOUBLE:
      return { tag: "Double", value: cursor.readF64() };

    case ValueType.BUNDLE:
      return readNestedBundle(cursor, ctx);

    case ValueType.BYTEARRAY: {
      const offset = cursor.position;
      const length = cursor.readI32();
      if (length === -1) return NULL_VALUE;
      if (length < 0) {
        throw ParcelError.framing(`BYTEARRAY: bad length ${length}`, { offset });
      }
      return { tag: "ByteArray", value: cursor.readPadded(length) };
    }

    case ValueType.STRINGARRAY: {
      const n = readCount(cursor, "STRINGARRAY", 4);
      if (n === null) return NULL_VALUE;
      const value: Array<string | null> = [];
      for (let i = 0; i < n; i++) {
        value.push(readStringAs(cursor, ctx.strings));
      }
      return { tag: "StringArray", value };
    }

    case ValueType.INTARRAY: {
      const n = readCount(cursor, "INTARRAY", 4);
      if (n === null) return NULL_VALUE;
      const value: number[] = [];
      for (let i = 0; i < n; i++) {
        value.push(cursor.readI32());
      }
      return { tag: "IntArray", value };
    }

    case ValueType.LONGARRAY: {
      const n = readCount(cursor, "LONGARRAY", 8);
      if (n === null) return NULL_VALUE;
      const value: bigint[] = [];
      for (let i = 0; i < n; i++) {
        value.push(cursor.readI64());
      }
      return { tag: "LongArray", value };
    }

    case ValueType.BOOLEANARRAY: {
      const n = cursor.readI32();
      // A count the buffer cannot hold means "no array", not an error.
      if (n < 0 || n > Math.floor(cursor.remaining / 4)) {
        return NULL_VALUE;
      }
      const value: boolean[] = [];
      for (let i = 0; i < n; i++) {
        value.push(cursor.readI32() !== 0);
      }
      return { tag: "BooleanArray", value };
    }

    case ValueType.PARCELABLEARRAY:
      return readParcelableArray(cursor, ctx);

    default:
      throw ParcelError.unsupportedValue(tag, valueTypeName(tag), { offset: tagOffset });
  }
}

/**
 * Read an element count. -1 is the producer's null marker and yields null.
 *
 * Counts that cannot fit in the remaining bytes at `minElementSize` bytes per
 * element are rejected before any element is read.
 */
function readCount(cursor: ParcelCursor, what: string, minElementSize: number): number | null {
  const offset = cursor.position;
  const n = cursor.readI32();
  if (n === -1) return null;
  if (n < 0) {
    throw ParcelError.framing(`${what}: bad count ${n}`, { offset });
  }
  if (n * minElementSize > cursor.remaining) {
    throw ParcelError.truncated(n * minElementSize, cursor.remaining, {
      offset: cursor.position,
    });
  }
  return n;
}

function readParcelableArray(cursor: ParcelCursor, ctx: DecodeContext): ParcelValue {
  const n = readCount(cursor, "PARCELABLEARRAY", 4);
  if (n === null) return NULL_VALUE;

  const value: ParcelableRecord[] = [];
  for (let i = 0; i < n; i++) {
    const name = readKey(cursor, ctx.strings);
    const creator = ctx.registry.lookup(name);
    value.push(creator.createFromParcel(cursor, name));
  }
  return { tag: "ParcelableArray", value };
}

function readNestedBundle(cursor: ParcelCursor, ctx: DecodeContext): ParcelValue {
  const offset = cursor.position;
  const length = cursor.readI32();
  if (length === -1) return NULL_VALUE;
  if (length < 0) {
    throw ParcelError.framing(`BUNDLE: bad length ${length}`, { offset });
  }
  if (ctx.depth >= ctx.maxDepth) {
    throw ParcelError.framing(`bundles nested deeper than ${ctx.maxDepth}`, { offset });
  }
  return {
    tag: "Bundle",
    value: readBundleBody(cursor, length, { ...ctx, depth: ctx.depth + 1 }),
  };
}

/**
 * Decode a bundle body whose i32 length has already been read.
 *
 * Layout after the length: i32 magic, i32 entry count, then `count` pairs of
 * key string and tagged value. `length` covers everything after the magic,
 * from the entry count to the end of the last value.
 */
export function readBundleBody(cursor: ParcelCursor, length: number, ctx: DecodeContext): Bundle {
  if (length === 0) {
    log.bundle("empty bundle at offset %d", cursor.position);
    return new Map();
  }
  if (length + 4 > cursor.remaining) {
    throw ParcelError.truncated(length + 4, cursor.remaining, { offset: cursor.position });
  }

  const magicOffset = cursor.position;
  const magic = cursor.readI32();
  if (magic !== BUNDLE_MAGIC && magic !== BUNDLE_MAGIC_NATIVE) {
    const hex = `0x${(magic >>> 0).toString(16).padStart(8, "0")}`;
    if (ctx.strictMagic) {
      throw ParcelError.framing(`bad bundle magic ${hex}`, { offset: magicOffset });
    }
    log.bundle("ignoring unknown bundle magic %s", hex);
  }

  const start = cursor.position;
  const count = cursor.readI32();
  if (count < 0) {
    throw ParcelError.framing(`bad bundle entry count ${count}`, { offset: start });
  }
  // Each entry takes at least a key length and a value tag.
  if (count * 8 > cursor.remaining) {
    throw ParcelError.truncated(count * 8, cursor.remaining, { offset: cursor.position });
  }

  const bundle: Bundle = new Map();
  for (let i = 0; i < count; i++) {
    const key = readKey(cursor, ctx.strings);
    bundle.set(key, readValue(cursor, ctx));
  }

  const end = cursor.position;
  if (end !== start + length) {
    throw ParcelError.lengthMismatch("bundle", start + length, end, { offset: start });
  }
  log.bundle("decoded %d entries (%d bytes) at depth %d", bundle.size, length, ctx.depth);
  return bundle;
}
