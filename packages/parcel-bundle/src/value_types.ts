// Value tags written in front of every bundle value.
//
// The numbering is fixed by the producing side and must not change.

export const ValueType = {
  NULL: -1,
  STRING: 0,
  INTEGER: 1,
  /** length-prefixed */
  MAP: 2,
  BUNDLE: 3,
  /** length-prefixed */
  PARCELABLE: 4,
  SHORT: 5,
  LONG: 6,
  FLOAT: 7,
  DOUBLE: 8,
  BOOLEAN: 9,
  CHARSEQUENCE: 10,
  /** length-prefixed */
  LIST: 11,
  /** length-prefixed */
  SPARSEARRAY: 12,
  BYTEARRAY: 13,
  STRINGARRAY: 14,
  IBINDER: 15,
  /** length-prefixed */
  PARCELABLEARRAY: 16,
  /** length-prefixed */
  OBJECTARRAY: 17,
  INTARRAY: 18,
  LONGARRAY: 19,
  BYTE: 20,
  /** length-prefixed */
  SERIALIZABLE: 21,
  SPARSEBOOLEANARRAY: 22,
  BOOLEANARRAY: 23,
  CHARSEQUENCEARRAY: 24,
  PERSISTABLEBUNDLE: 25,
  SIZE: 26,
  SIZEF: 27,
  DOUBLEARRAY: 28,
  CHAR: 29,
  SHORTARRAY: 30,
  CHARARRAY: 31,
  FLOATARRAY: 32,
} as const;

export type ValueType = (typeof ValueType)[keyof typeof ValueType];

const namesByTag = new Map<number, string>(
  Object.entries(ValueType).map(([name, tag]) => [tag, name]),
);

const lengthPrefixed: ReadonlySet<number> = new Set<number>([
  ValueType.MAP,
  ValueType.PARCELABLE,
  ValueType.LIST,
  ValueType.SPARSEARRAY,
  ValueType.PARCELABLEARRAY,
  ValueType.OBJECTARRAY,
  ValueType.SERIALIZABLE,
]);

/** Name of a tag for diagnostics, or "unknown". */
export function valueTypeName(tag: number): string {
  return namesByTag.get(tag) ?? "unknown";
}

/**
 * Whether values with this tag carry an i32 byte length after the tag.
 *
 * Custom types and containers of custom types are prefixed so readers can
 * skip them. Nested bundles are not: they carry their own length.
 */
export function isLengthPrefixed(tag: number): boolean {
  return lengthPrefixed.has(tag);
}
