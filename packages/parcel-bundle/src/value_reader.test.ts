import { describe, it, expect } from "vitest";
import { ParcelError, ParcelReader, ParcelWriter } from "@parcelkit/binary";
import { readValue } from "./value_reader.ts";
import { resolveDecoderOptions } from "./options.ts";
import { CreatorRegistry, createCreatorRegistry } from "./registry.ts";
import { POWER_MONITOR, PowerMonitorType, opaqueCreator } from "./records.ts";
import { ValueType } from "./value_types.ts";
import { NULL_VALUE, booleanArrayValue, longArrayValue, parcelableArrayValue } from "./value.ts";

function catchParcelError(fn: () => unknown): ParcelError {
  try {
    fn();
  } catch (e) {
    if (e instanceof ParcelError) return e;
    throw e;
  }
  throw new Error("expected a ParcelError");
}

const ctx = resolveDecoderOptions({ registry: createCreatorRegistry() });

function writePowerMonitor(w: ParcelWriter, index: number, type: number, name: string): void {
  w.writeString(POWER_MONITOR).writeI32(index).writeI32(type).writeString8(name);
}

/** Tag, backpatched length, then `body`. */
function prefixed(tag: number, body: (w: ParcelWriter) => void): ParcelWriter {
  const w = new ParcelWriter();
  w.writeI32(tag);
  const mark = w.beginLength();
  body(w);
  w.endLength(mark);
  return w;
}

describe("readValue: length-prefixed values", () => {
  it("ends exactly at the declared length", () => {
    const w = prefixed(ValueType.PARCELABLEARRAY, (w) => {
      w.writeI32(2);
      writePowerMonitor(w, 0, PowerMonitorType.Consumer, "CPU");
      writePowerMonitor(w, 1, PowerMonitorType.Measurement, "[VSYS_PWR_DISPLAY]:Display");
    });
    w.writeI32(0x7777);
    const reader = new ParcelReader(w.bytes);

    const value = readValue(reader, ctx);

    expect(value).toEqual(
      parcelableArrayValue([
        { tag: "PowerMonitor", value: { index: 0, type: PowerMonitorType.Consumer, name: "CPU" } },
        {
          tag: "PowerMonitor",
          value: { index: 1, type: PowerMonitorType.Measurement, name: "[VSYS_PWR_DISPLAY]:Display" },
        },
      ]),
    );
    expect(reader.position).toBe(w.position - 4);
    expect(reader.readI32()).toBe(0x7777);
  });

  it("fails when the payload ends before the declared length", () => {
    const w = new ParcelWriter();
    w.writeI32(ValueType.PARCELABLEARRAY).writeI32(12).writeI32(0).writeI32(0).writeI32(0);

    const error = catchParcelError(() => readValue(new ParcelReader(w.bytes), ctx));
    expect(error.kind).toBe("lengthMismatch");
    expect(error.message).toBe("PARCELABLEARRAY: declared length ends at 20, payload ended at 12");
    expect(error.offset).toBe(8);
  });

  it("fails when the payload runs past the declared length", () => {
    const w = new ParcelWriter();
    w.writeI32(ValueType.PARCELABLEARRAY).writeI32(4).writeI32(1);
    writePowerMonitor(w, 0, PowerMonitorType.Consumer, "CPU");

    const error = catchParcelError(() => readValue(new ParcelReader(w.bytes), ctx));
    expect(error.kind).toBe("lengthMismatch");
    expect(error.message).toBe("PARCELABLEARRAY: declared length ends at 12, payload ended at 56");
  });

  it("rejects a negative length", () => {
    const w = new ParcelWriter().writeI32(ValueType.PARCELABLEARRAY).writeI32(-8);
    const error = catchParcelError(() => readValue(new ParcelReader(w.bytes), ctx));
    expect(error.kind).toBe("framing");
    expect(error.message).toBe("PARCELABLEARRAY: negative length -8");
    expect(error.offset).toBe(4);
  });

  it("rejects a length beyond the buffer", () => {
    const w = new ParcelWriter().writeI32(ValueType.PARCELABLEARRAY).writeI32(100).writeI32(0);
    const error = catchParcelError(() => readValue(new ParcelReader(w.bytes), ctx));
    expect(error.kind).toBe("truncated");
    expect(error.message).toBe("need 100 bytes, only 4 remain");
  });

  it("treats a null parcelable array as Null", () => {
    const w = prefixed(ValueType.PARCELABLEARRAY, (w) => {
      w.writeI32(-1);
    });
    const reader = new ParcelReader(w.bytes);
    expect(readValue(reader, ctx)).toEqual(NULL_VALUE);
    expect(reader.remaining).toBe(0);
  });
});

describe("readValue: parcelable arrays", () => {
  it("fails on an unregistered type name", () => {
    const w = prefixed(ValueType.PARCELABLEARRAY, (w) => {
      w.writeI32(2);
      writePowerMonitor(w, 0, PowerMonitorType.Consumer, "CPU");
      w.writeString("com.example.Missing");
    });

    const error = catchParcelError(() => readValue(new ParcelReader(w.bytes), ctx));
    expect(error.kind).toBe("nameNotFound");
    expect(error.message).toBe("no creator registered for `com.example.Missing`");
  });

  it("rejects a count the buffer cannot hold", () => {
    const w = prefixed(ValueType.PARCELABLEARRAY, (w) => {
      w.writeI32(5).writeI32(0);
    });
    const error = catchParcelError(() => readValue(new ParcelReader(w.bytes), ctx));
    expect(error.kind).toBe("truncated");
    expect(error.message).toBe("need 20 bytes, only 4 remain");
  });

  it("rejects negative counts other than -1", () => {
    const w = prefixed(ValueType.PARCELABLEARRAY, (w) => {
      w.writeI32(-3);
    });
    const error = catchParcelError(() => readValue(new ParcelReader(w.bytes), ctx));
    expect(error.kind).toBe("framing");
    expect(error.message).toBe("PARCELABLEARRAY: bad count -3");
  });

  it("uses runtime-registered creators", () => {
    const registry = new CreatorRegistry();
    registry.register("com.example.Pair", opaqueCreator(8));
    const w = prefixed(ValueType.PARCELABLEARRAY, (w) => {
      w.writeI32(1).writeString("com.example.Pair").writeI32(3).writeI32(4);
    });

    const value = readValue(new ParcelReader(w.bytes), resolveDecoderOptions({ registry }));

    expect(value).toEqual(
      parcelableArrayValue([
        {
          tag: "Opaque",
          value: { name: "com.example.Pair", bytes: Uint8Array.of(3, 0, 0, 0, 4, 0, 0, 0) },
        },
      ]),
    );
  });
});

describe("readValue: long arrays", () => {
  it("reads signed 64-bit values in order", () => {
    const w = new ParcelWriter()
      .writeI32(ValueType.LONGARRAY)
      .writeI32(3)
      .writeI64(-1n)
      .writeI64(0n)
      .writeI64(9_007_199_254_740_993n);
    expect(readValue(new ParcelReader(w.bytes), ctx)).toEqual(
      longArrayValue([-1n, 0n, 9_007_199_254_740_993n]),
    );
  });

  it("treats -1 as a null array", () => {
    const w = new ParcelWriter().writeI32(ValueType.LONGARRAY).writeI32(-1);
    expect(readValue(new ParcelReader(w.bytes), ctx)).toEqual(NULL_VALUE);
  });

  it("rejects a count larger than the remaining bytes", () => {
    const w = new ParcelWriter().writeI32(ValueType.LONGARRAY).writeI32(2).writeI64(1n);
    const error = catchParcelError(() => readValue(new ParcelReader(w.bytes), ctx));
    expect(error.kind).toBe("truncated");
    expect(error.message).toBe("need 16 bytes, only 8 remain");
  });

  it("rejects other negative counts", () => {
    const w = new ParcelWriter().writeI32(ValueType.LONGARRAY).writeI32(-2);
    const error = catchParcelError(() => readValue(new ParcelReader(w.bytes), ctx));
    expect(error.kind).toBe("framing");
    expect(error.message).toBe("LONGARRAY: bad count -2");
  });
});

describe("readValue: boolean arrays", () => {
  it("reads one word per boolean", () => {
    const w = new ParcelWriter().writeI32(ValueType.BOOLEANARRAY).writeI32(3).writeI32(1).writeI32(0).writeI32(-1);
    expect(readValue(new ParcelReader(w.bytes), ctx)).toEqual(booleanArrayValue([true, false, true]));
  });

  it("yields Null for a count the buffer cannot hold", () => {
    const w = new ParcelWriter().writeI32(ValueType.BOOLEANARRAY).writeI32(3).writeI32(1).writeI32(1);
    const reader = new ParcelReader(w.bytes);

    expect(readValue(reader, ctx)).toEqual(NULL_VALUE);
    expect(reader.position).toBe(8);
  });

  it("yields Null for a negative count", () => {
    const w = new ParcelWriter().writeI32(ValueType.BOOLEANARRAY).writeI32(-1);
    expect(readValue(new ParcelReader(w.bytes), ctx)).toEqual(NULL_VALUE);
  });

  it("reads an empty array", () => {
    const w = new ParcelWriter().writeI32(ValueType.BOOLEANARRAY).writeI32(0);
    expect(readValue(new ParcelReader(w.bytes), ctx)).toEqual(booleanArrayValue([]));
  });
});

describe("readValue: other kinds", () => {
  it("widens short, byte and char to Integer", () => {
    const w = new ParcelWriter()
      .writeI32(ValueType.SHORT).writeI32(-300)
      .writeI32(ValueType.BYTE).writeI32(127)
      .writeI32(ValueType.CHAR).writeI32(0x41);
    const reader = new ParcelReader(w.bytes);
    expect(readValue(reader, ctx)).toEqual({ tag: "Integer", value: -300 });
    expect(readValue(reader, ctx)).toEqual({ tag: "Integer", value: 127 });
    expect(readValue(reader, ctx)).toEqual({ tag: "Integer", value: 0x41 });
  });

  it("treats a -1 byte array as Null", () => {
    const w = new ParcelWriter().writeI32(ValueType.BYTEARRAY).writeI32(-1);
    expect(readValue(new ParcelReader(w.bytes), ctx)).toEqual(NULL_VALUE);
  });

  it("treats -1 int and string arrays as Null", () => {
    const w = new ParcelWriter()
      .writeI32(ValueType.INTARRAY).writeI32(-1)
      .writeI32(ValueType.STRINGARRAY).writeI32(-1);
    const reader = new ParcelReader(w.bytes);
    expect(readValue(reader, ctx)).toEqual(NULL_VALUE);
    expect(readValue(reader, ctx)).toEqual(NULL_VALUE);
  });
});

describe("readValue: unsupported kinds", () => {
  it("names the offending tag", () => {
    const w = new ParcelWriter().writeI32(ValueType.FLOAT).writeF32(1);
    const error = catchParcelError(() => readValue(new ParcelReader(w.bytes), ctx));
    expect(error.kind).toBe("unsupportedValue");
    expect(error.message).toBe("unsupported value kind FLOAT (tag 7)");
    expect(error.offset).toBe(0);
  });

  it("reports length-prefixed tags at the tag offset", () => {
    const w = new ParcelWriter().writeI32(ValueType.SERIALIZABLE).writeI32(0);
    const error = catchParcelError(() => readValue(new ParcelReader(w.bytes), ctx));
    expect(error.message).toBe("unsupported value kind SERIALIZABLE (tag 21)");
    expect(error.offset).toBe(0);
  });

  it("rejects tags outside the table", () => {
    const w = new ParcelWriter().writeI32(99);
    const error = catchParcelError(() => readValue(new ParcelReader(w.bytes), ctx));
    expect(error.kind).toBe("unsupportedValue");
    expect(error.message).toBe("unsupported value kind unknown (tag 99)");
  });
});
