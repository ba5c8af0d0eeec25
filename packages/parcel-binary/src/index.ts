// Low-level parcel primitives: cursor, writer, string conventions, errors.
//
// This package knows nothing about dynamic values or bundles; see
// @parcelkit/bundle for those.

export { ParcelError, StatusCode, hexDump, type ParcelErrorKind, type ParcelErrorInit } from "./errors.ts";

export { ParcelReader, pad4, type ParcelCursor } from "./reader.ts";

export { ParcelWriter } from "./writer.ts";

export {
  readString,
  readNullableString,
  readString8,
  readString16,
  readKey,
  readStringAs,
  type StringEncoding,
} from "./string.ts";
