import type { StringEncoding } from "@parcelkit/binary";
import type { CreatorRegistry } from "./registry.ts";

export interface BundleDecoderOptions {
  /** Creators for PARCELABLEARRAY elements. */
  registry: CreatorRegistry;

  /**
   * String convention for keys, record type names and string values.
   * Defaults to "utf8".
   */
  strings?: StringEncoding;

  /**
   * Reject bundles whose magic is neither BNDL nor BNDN. Defaults to true.
   */
  strictMagic?: boolean;

  /**
   * Maximum nesting of BUNDLE values inside each other. Defaults to 32.
   */
  maxDepth?: number;
}

/** Resolved options plus the current nesting depth. */
export interface DecodeContext {
  readonly registry: CreatorRegistry;
  readonly strings: StringEncoding;
  readonly strictMagic: boolean;
  readonly maxDepth: number;
  readonly depth: number;
}

export const DEFAULT_MAX_DEPTH = 32;

export function resolveDecoderOptions(options: BundleDecoderOptions): DecodeContext {
  const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
  if (!Number.isInteger(maxDepth) || maxDepth < 0) {
    throw new RangeError(`maxDepth must be a non-negative integer, got ${maxDepth}`);
  }
  return {
    registry: options.registry,
    strings: options.strings ?? "utf8",
    strictMagic: options.strictMagic ?? true,
    maxDepth,
    depth: 0,
  };
}
