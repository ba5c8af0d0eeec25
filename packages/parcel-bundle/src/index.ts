// Bundle decoding for the parcel wire format.
//
// Decodes length-prefixed key/value bundles into tagged dynamic values,
// resolving polymorphic records through a creator registry.

// ============================================================================
// Values
// ============================================================================

export type {
  NullValue,
  StringValue,
  IntegerValue,
  LongValue,
  BooleanValue,
  DoubleValue,
  BundleValue,
  ByteArrayValue,
  StringArrayValue,
  IntArrayValue,
  LongArrayValue,
  BooleanArrayValue,
  ParcelableArrayValue,
  ParcelValue,
  ParcelValueTag,
  Bundle,
} from "./value.ts";

export {
  NULL_VALUE,
  stringValue,
  integerValue,
  longValue,
  booleanValue,
  longArrayValue,
  booleanArrayValue,
  parcelableArrayValue,
} from "./value.ts";

export { ValueType, valueTypeName, isLengthPrefixed } from "./value_types.ts";

// ============================================================================
// Records and registry
// ============================================================================

export {
  POWER_MONITOR,
  PowerMonitorType,
  powerMonitorCreator,
  opaqueCreator,
  registerBuiltinCreators,
  type PowerMonitor,
  type OpaqueRecord,
  type ParcelableRecord,
} from "./records.ts";

export {
  CreatorRegistry,
  createCreatorRegistry,
  type ParcelableCreator,
  type CreatorRegistryOptions,
} from "./registry.ts";

// ============================================================================
// Decoding
// ============================================================================

export {
  resolveDecoderOptions,
  DEFAULT_MAX_DEPTH,
  type BundleDecoderOptions,
  type DecodeContext,
} from "./options.ts";

export { readValue, readBundleBody, BUNDLE_MAGIC, BUNDLE_MAGIC_NATIVE } from "./value_reader.ts";

export { decodeBundle, decodeBundleBytes, tryDecodeBundle, type BundleResult } from "./bundle.ts";

export {
  ResultKey,
  requireValue,
  requireLongArray,
  requireBooleanArray,
  requireParcelableArray,
  requirePowerMonitors,
} from "./accessors.ts";
