// Top-level bundle decoding.
//
// A bundle field in an RPC payload is written as a nullable typed object:
//   i32 presence flag (1)
//   i32 byte length (0 for an empty bundle, nothing follows)
//   i32 magic
//   i32 entry count, entries...   (the `length` bytes)

import { ParcelError, ParcelReader, type ParcelCursor } from "@parcelkit/binary";
import { log } from "./logging.ts";
import { resolveDecoderOptions, type BundleDecoderOptions } from "./options.ts";
import type { Bundle } from "./value.ts";
import { readBundleBody } from "./value_reader.ts";

/**
 * Decode a bundle at the cursor.
 *
 * @throws ParcelError on any framing, bounds, registry or encoding problem.
 *   The cursor position is unspecified after a failure.
 */
export function decodeBundle(cursor: ParcelCursor, options: BundleDecoderOptions): Bundle {
  const ctx = resolveDecoderOptions(options);

  const presenceOffset = cursor.position;
  const present = cursor.readI32();
  if (present !== 1) {
    throw ParcelError.framing(`expected bundle presence flag 1, got ${present}`, {
      offset: presenceOffset,
    });
  }

  const lengthOffset = cursor.position;
  const length = cursor.readI32();
  if (length < 0) {
    throw ParcelError.framing(`bad bundle length ${length}`, { offset: lengthOffset });
  }

  return readBundleBody(cursor, length, ctx);
}

/** Decode a bundle from the start of `buf`. */
export function decodeBundleBytes(buf: Uint8Array, options: BundleDecoderOptions): Bundle {
  return decodeBundle(new ParcelReader(buf), options);
}

export type BundleResult =
  | { ok: true; value: Bundle }
  | { ok: false; error: ParcelError };

/**
 * Like {@link decodeBundle}, but returns decode failures instead of throwing.
 *
 * Only ParcelErrors are captured; anything else (for example an exception
 * from a custom creator) is rethrown.
 */
export function tryDecodeBundle(cursor: ParcelCursor, options: BundleDecoderOptions): BundleResult {
  try {
    return { ok: true, value: decodeBundle(cursor, options) };
  } catch (error) {
    if (!(error instanceof ParcelError)) throw error;
    log.bundle("decode failed (%s): %s", error.kind, error.message);
    return { ok: false, error };
  }
}
