// String conventions found in parcels.
//
// plain:    i32 byte length, UTF-8 bytes, padded to a word (no terminator)
// String8:  u32 byte length, UTF-8 bytes, NUL, padded to a word
// String16: i32 code-unit count, UTF-16LE units, NUL unit, padded to a word

import { ParcelError } from "./errors.ts";
import type { ParcelCursor } from "./reader.ts";

const utf8Decoder = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });
const utf16Decoder = new TextDecoder("utf-16le", { fatal: true, ignoreBOM: true });

/** Which string convention a decoder uses for keys, names and string values. */
export type StringEncoding = "utf8" | "utf16";

function decodeText(decoder: TextDecoder, bytes: Uint8Array, offset: number): string {
  try {
    return decoder.decode(bytes);
  } catch (cause) {
    throw ParcelError.encoding(`invalid ${decoder.encoding} string data`, { offset, cause });
  }
}

/** Read a plain UTF-8 string that may be null (length -1). */
export function readNullableString(cursor: ParcelCursor): string | null {
  const offset = cursor.position;
  const len = cursor.readI32();
  if (len === -1) return null;
  if (len < 0) {
    throw ParcelError.framing(`bad string length ${len}`, { offset });
  }
  const bytes = cursor.readPadded(len);
  return decodeText(utf8Decoder, bytes, offset);
}

/** Read a plain UTF-8 string. Null is rejected. */
export function readString(cursor: ParcelCursor): string {
  const offset = cursor.position;
  const value = readNullableString(cursor);
  if (value === null) {
    throw ParcelError.framing("unexpected null string", { offset });
  }
  return value;
}

/**
 * Read a String8.
 *
 * Consumes exactly `4 * ceil((len + 1) / 4)` bytes after the length field,
 * so the cursor stays word-aligned.
 */
export function readString8(cursor: ParcelCursor): string {
  const offset = cursor.position;
  const len = cursor.readU32();
  const chars = cursor.readPadded(len + 1);
  if (chars[len] !== 0) {
    throw ParcelError.encoding(`String8 of length ${len} is missing its NUL terminator`, {
      offset,
    });
  }
  return decodeText(utf8Decoder, chars.subarray(0, len), offset);
}

/** Read a String16, or null for a count of -1. */
export function readString16(cursor: ParcelCursor): string | null {
  const offset = cursor.position;
  const units = cursor.readI32();
  if (units === -1) return null;
  if (units < 0) {
    throw ParcelError.framing(`bad String16 length ${units}`, { offset });
  }
  const bytes = cursor.readPadded((units + 1) * 2);
  if (bytes[units * 2] !== 0 || bytes[units * 2 + 1] !== 0) {
    throw ParcelError.encoding(`String16 of length ${units} is missing its NUL terminator`, {
      offset,
    });
  }
  return decodeText(utf16Decoder, bytes.subarray(0, units * 2), offset);
}

/** Read a non-null string in the given convention. */
export function readKey(cursor: ParcelCursor, encoding: StringEncoding): string {
  if (encoding === "utf8") return readString(cursor);
  const offset = cursor.position;
  const value = readString16(cursor);
  if (value === null) {
    throw ParcelError.framing("unexpected null string", { offset });
  }
  return value;
}

/** Read a nullable string in the given convention. */
export function readStringAs(cursor: ParcelCursor, encoding: StringEncoding): string | null {
  return encoding === "utf8" ? readNullableString(cursor) : readString16(cursor);
}
