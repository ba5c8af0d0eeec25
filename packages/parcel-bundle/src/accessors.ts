// Typed extraction of bundle entries.
//
// Result receivers know which key carries which kind of value; these helpers
// turn a wrong or missing entry into a typeMismatch error.

import { ParcelError } from "@parcelkit/binary";
import type { PowerMonitor, ParcelableRecord } from "./records.ts";
import type { Bundle, ParcelValue, ParcelValueTag } from "./value.ts";

/** Keys under which power stats results arrive. */
export const ResultKey = {
  /** ParcelableArray of PowerMonitor records. */
  Monitors: "monitors",
  /** LongArray of sample times in milliseconds. */
  Timestamps: "timestamps",
  /** LongArray of accumulated energy in microwatt-seconds, parallel to Timestamps. */
  Energy: "energy",
} as const;

export type ResultKey = (typeof ResultKey)[keyof typeof ResultKey];

function mismatch(key: string, expected: ParcelValueTag, actual: ParcelValueTag): ParcelError {
  return ParcelError.typeMismatch(`bundle entry \`${key}\` is ${actual}, expected ${expected}`);
}

export function requireValue(bundle: Bundle, key: string): ParcelValue {
  const value = bundle.get(key);
  if (value === undefined) {
    throw ParcelError.typeMismatch(`bundle has no entry \`${key}\``);
  }
  return value;
}

export function requireLongArray(bundle: Bundle, key: string): bigint[] {
  const value = requireValue(bundle, key);
  if (value.tag !== "LongArray") throw mismatch(key, "LongArray", value.tag);
  return value.value;
}

export function requireBooleanArray(bundle: Bundle, key: string): boolean[] {
  const value = requireValue(bundle, key);
  if (value.tag !== "BooleanArray") throw mismatch(key, "BooleanArray", value.tag);
  return value.value;
}

export function requireParcelableArray(bundle: Bundle, key: string): ParcelableRecord[] {
  const value = requireValue(bundle, key);
  if (value.tag !== "ParcelableArray") throw mismatch(key, "ParcelableArray", value.tag);
  return value.value;
}

/** Every record under `key`, which must all be PowerMonitors. */
export function requirePowerMonitors(bundle: Bundle, key: string): PowerMonitor[] {
  return requireParcelableArray(bundle, key).map((record, i) => {
    if (record.tag !== "PowerMonitor") {
      throw ParcelError.typeMismatch(
        `bundle entry \`${key}\` element ${i} is ${record.tag} \`${record.value.name}\`, expected PowerMonitor`,
      );
    }
    return record.value;
  });
}
