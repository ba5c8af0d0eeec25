// Dynamic values decoded from a bundle.
//
// One variant per value kind the decoder supports; callers switch on `tag`.

import type { ParcelableRecord } from "./records.ts";

export interface NullValue {
  tag: "Null";
}

export interface StringValue {
  tag: "String";
  value: string;
}

/** INTEGER, and SHORT, BYTE and CHAR, which travel widened to 32 bits. */
export interface IntegerValue {
  tag: "Integer";
  value: number;
}

export interface LongValue {
  tag: "Long";
  value: bigint;
}

export interface BooleanValue {
  tag: "Boolean";
  value: boolean;
}

export interface DoubleValue {
  tag: "Double";
  value: number;
}

export interface BundleValue {
  tag: "Bundle";
  value: Bundle;
}

export interface ByteArrayValue {
  tag: "ByteArray";
  value: Uint8Array;
}

export interface StringArrayValue {
  tag: "StringArray";
  value: Array<string | null>;
}

export interface IntArrayValue {
  tag: "IntArray";
  value: number[];
}

export interface LongArrayValue {
  tag: "LongArray";
  value: bigint[];
}

export interface BooleanArrayValue {
  tag: "BooleanArray";
  value: boolean[];
}

/** Polymorphic records in stream order. */
export interface ParcelableArrayValue {
  tag: "ParcelableArray";
  value: ParcelableRecord[];
}

export type ParcelValue =
  | NullValue
  | StringValue
  | IntegerValue
  | LongValue
  | BooleanValue
  | DoubleValue
  | BundleValue
  | ByteArrayValue
  | StringArrayValue
  | IntArrayValue
  | LongArrayValue
  | BooleanArrayValue
  | ParcelableArrayValue;

export type ParcelValueTag = ParcelValue["tag"];

/**
 * Decoded bundle. Keys are unique; iteration order follows the wire but
 * callers should treat it as a set of entries.
 */
export type Bundle = Map<string, ParcelValue>;

// ============================================================================
// Factory functions
// ============================================================================

export const NULL_VALUE: NullValue = Object.freeze({ tag: "Null" });

export function stringValue(value: string): StringValue {
  return { tag: "String", value };
}

export function integerValue(value: number): IntegerValue {
  return { tag: "Integer", value };
}

export function longValue(value: bigint): LongValue {
  return { tag: "Long", value };
}

export function booleanValue(value: boolean): BooleanValue {
  return { tag: "Boolean", value };
}

export function longArrayValue(value: bigint[]): LongArrayValue {
  return { tag: "LongArray", value };
}

export function booleanArrayValue(value: boolean[]): BooleanArrayValue {
  return { tag: "BooleanArray", value };
}

export function parcelableArrayValue(value: ParcelableRecord[]): ParcelableArrayValue {
  return { tag: "ParcelableArray", value };
}
