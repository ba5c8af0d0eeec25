// Polymorphic records that can appear inside PARCELABLEARRAY values.
//
// Every record type the decoder understands is a variant of ParcelableRecord.
// Records registered at runtime without a dedicated variant decode to Opaque.

import { ParcelError, readString8, type ParcelCursor } from "@parcelkit/binary";
import type { CreatorRegistry, ParcelableCreator } from "./registry.ts";

// ============================================================================
// PowerMonitor
// ============================================================================

export const POWER_MONITOR = "android.os.PowerMonitor";

export const PowerMonitorType = {
  /**
   * Monitor for a subsystem. The energy value may be a direct rail measurement
   * or modelled, e.g. a share of a rail used by several subsystems.
   */
  Consumer: 0,
  /** Monitor for a directly measured, device-specific power rail. */
  Measurement: 1,
} as const;

export type PowerMonitorType = (typeof PowerMonitorType)[keyof typeof PowerMonitorType];

export interface PowerMonitor {
  index: number;
  type: PowerMonitorType;
  name: string;
}

function readPowerMonitorType(cursor: ParcelCursor): PowerMonitorType {
  const offset = cursor.position;
  const raw = cursor.readI32();
  switch (raw) {
    case PowerMonitorType.Consumer:
      return PowerMonitorType.Consumer;
    case PowerMonitorType.Measurement:
      return PowerMonitorType.Measurement;
    default:
      throw ParcelError.framing(`unknown PowerMonitorType ${raw}`, { offset });
  }
}

/** Layout: i32 index, i32 type, String8 name. */
export const powerMonitorCreator: ParcelableCreator = {
  createFromParcel(cursor) {
    const index = cursor.readI32();
    const type = readPowerMonitorType(cursor);
    const name = readString8(cursor);
    return { tag: "PowerMonitor", value: { index, type, name } };
  },
};

// ============================================================================
// Record union
// ============================================================================

export interface OpaqueRecord {
  /** Type name the record was registered under. */
  name: string;
  bytes: Uint8Array;
}

export type ParcelableRecord =
  | { tag: "PowerMonitor"; value: PowerMonitor }
  | { tag: "Opaque"; value: OpaqueRecord };

/**
 * Creator for records of a known, fixed encoded size that have no dedicated
 * variant. The raw bytes are kept for the caller to interpret.
 */
export function opaqueCreator(byteLength: number): ParcelableCreator {
  if (!Number.isInteger(byteLength) || byteLength < 0 || byteLength % 4 !== 0) {
    throw new RangeError(`opaque record size must be a non-negative multiple of 4, got ${byteLength}`);
  }
  return {
    createFromParcel(cursor, name) {
      return { tag: "Opaque", value: { name, bytes: cursor.readBytes(byteLength) } };
    },
  };
}

// ============================================================================
// Built-ins
// ============================================================================

const builtins: ReadonlyArray<[name: string, creator: ParcelableCreator]> = [
  [POWER_MONITOR, powerMonitorCreator],
];

/**
 * Register every built-in record creator. Names already present are left
 * alone, so calling this again is a no-op.
 */
export function registerBuiltinCreators(registry: CreatorRegistry): void {
  for (const [name, creator] of builtins) {
    registry.registerOnce(name, () => creator);
  }
}
