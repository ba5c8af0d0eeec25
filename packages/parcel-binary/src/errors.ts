// Error taxonomy for parcel decoding.
//
// Every structural violation surfaces as a ParcelError; nothing in the decoder
// asserts or aborts. The first error ends the whole decode.

/** Binder-style status codes reported alongside each error kind. */
export const StatusCode = {
  OK: 0,
  NAME_NOT_FOUND: -2,
  BAD_VALUE: -22,
  NOT_ENOUGH_DATA: -61,
  BAD_TYPE: -2147483647,
} as const;

export type StatusCode = (typeof StatusCode)[keyof typeof StatusCode];

export type ParcelErrorKind =
  | "framing"
  | "truncated"
  | "lengthMismatch"
  | "nameNotFound"
  | "unsupportedValue"
  | "encoding"
  | "typeMismatch";

export interface ParcelErrorInit {
  /** Cursor position the error refers to, when known. */
  offset?: number;
  /** Extra diagnostic text, typically a hex dump. */
  detail?: string;
  cause?: unknown;
}

/** Error raised for malformed, truncated or unsupported parcel data. */
export class ParcelError extends Error {
  readonly kind: ParcelErrorKind;
  readonly offset: number | null;
  readonly detail: string | null;

  constructor(kind: ParcelErrorKind, message: string, init: ParcelErrorInit = {}) {
    super(message, init.cause === undefined ? undefined : { cause: init.cause });
    this.name = "ParcelError";
    this.kind = kind;
    this.offset = init.offset ?? null;
    this.detail = init.detail ?? null;
  }

  /** Status code matching this error's kind. */
  get status(): StatusCode {
    switch (this.kind) {
      case "truncated":
        return StatusCode.NOT_ENOUGH_DATA;
      case "nameNotFound":
        return StatusCode.NAME_NOT_FOUND;
      case "unsupportedValue":
      case "typeMismatch":
        return StatusCode.BAD_TYPE;
      default:
        return StatusCode.BAD_VALUE;
    }
  }

  static framing(message: string, init?: ParcelErrorInit): ParcelError {
    return new ParcelError("framing", message, init);
  }

  static truncated(
    requested: number,
    available: number,
    init?: ParcelErrorInit,
  ): ParcelError {
    return new ParcelError(
      "truncated",
      `need ${requested} bytes, only ${available} remain`,
      init,
    );
  }

  static lengthMismatch(
    what: string,
    expectedEnd: number,
    actualEnd: number,
    init?: ParcelErrorInit,
  ): ParcelError {
    return new ParcelError(
      "lengthMismatch",
      `${what}: declared length ends at ${expectedEnd}, payload ended at ${actualEnd}`,
      init,
    );
  }

  static nameNotFound(name: string, init?: ParcelErrorInit): ParcelError {
    return new ParcelError("nameNotFound", `no creator registered for \`${name}\``, init);
  }

  static unsupportedValue(tag: number, tagName: string, init?: ParcelErrorInit): ParcelError {
    return new ParcelError(
      "unsupportedValue",
      `unsupported value kind ${tagName} (tag ${tag})`,
      init,
    );
  }

  static encoding(message: string, init?: ParcelErrorInit): ParcelError {
    return new ParcelError("encoding", message, init);
  }

  static typeMismatch(message: string, init?: ParcelErrorInit): ParcelError {
    return new ParcelError("typeMismatch", message, init);
  }
}

/** Hex dump of `length` bytes starting at `offset`, with the first byte bracketed. */
export function hexDump(buf: Uint8Array, offset: number, length = 32): string {
  const start = Math.max(0, offset);
  const end = Math.min(buf.length, start + length);
  const bytes: string[] = [];
  for (let i = start; i < end; i++) {
    const hex = buf[i].toString(16).padStart(2, "0");
    bytes.push(i === offset ? `[${hex}]` : hex);
  }
  return bytes.join(" ");
}
