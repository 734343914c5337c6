import { describe, it, expect } from "vitest";
import { ByteView } from "../byte-view.js";
import {
  NlaIterator,
  alignTo4,
  emitNlaHeader,
  joinTypeField,
  splitTypeField,
  type NlaRecord,
} from "../nla.js";

function region(...bytes: number[]): ByteView {
  return ByteView.from(new Uint8Array(bytes));
}

function collect(iterator: NlaIterator): NlaRecord[] {
  const records: NlaRecord[] = [];
  for (const record of iterator) {
    records.push(record.unwrap());
  }
  return records;
}

describe("alignTo4", () => {
  it("rounds up to the next multiple of four", () => {
    expect([0, 1, 2, 3, 4, 5, 8, 9].map(alignTo4)).toEqual([0, 4, 4, 4, 4, 8, 8, 12]);
  });
});

describe("type field", () => {
  it("isolates both flags from the kind", () => {
    expect(splitTypeField(0xc00a)).toEqual({ kind: 10, nested: true, networkByteOrder: true });
    expect(splitTypeField(0x8001)).toEqual({ kind: 1, nested: true, networkByteOrder: false });
    expect(splitTypeField(0x4001)).toEqual({ kind: 1, nested: false, networkByteOrder: true });
    expect(splitTypeField(0x3fff)).toEqual({ kind: 0x3fff, nested: false, networkByteOrder: false });
  });

  it("joins the flags back", () => {
    expect(joinTypeField({ kind: 10, nested: true, networkByteOrder: true })).toBe(0xc00a);
    expect(joinTypeField({ kind: 3, nested: false, networkByteOrder: false })).toBe(3);
  });
});

describe("NlaIterator", () => {
  it("yields records and skips padding", () => {
    // len 5 (one payload byte + 3 padding), then len 8
    const iterator = new NlaIterator(
      region(0x05, 0x00, 0x01, 0x00, 0xaa, 0x00, 0x00, 0x00, 0x08, 0x00, 0x02, 0x80, 1, 2, 3, 4)
    );
    const records = collect(iterator);

    expect(records).toHaveLength(2);
    expect(records[0].kind).toBe(1);
    expect(records[0].offset).toBe(0);
    expect(records[0].length).toBe(5);
    expect(Array.from(records[0].payload.toBytes())).toEqual([0xaa]);
    expect(records[1].kind).toBe(2);
    expect(records[1].nested).toBe(true);
    expect(records[1].offset).toBe(8);
    expect(Array.from(records[1].payload.toBytes())).toEqual([1, 2, 3, 4]);
    expect(iterator.getState()).toBe("exhausted");
  });

  it("is exhausted immediately on an empty region", () => {
    const iterator = new NlaIterator(region());
    expect(collect(iterator)).toEqual([]);
    expect(iterator.getState()).toBe("exhausted");
  });

  it("ignores up to three trailing bytes", () => {
    const iterator = new NlaIterator(region(0x04, 0x00, 0x07, 0x00, 0xff, 0xff, 0xff));
    const records = collect(iterator);

    expect(records).toHaveLength(1);
    expect(records[0].kind).toBe(7);
    expect(records[0].payload.length).toBe(0);
    expect(iterator.getState()).toBe("exhausted");
  });

  it("fails on a declared length below the header", () => {
    const iterator = new NlaIterator(region(0x02, 0x00, 0x01, 0x00));
    const first = iterator.next();

    expect(first.done).toBe(false);
    if (!first.done) {
      expect(first.value.isErr()).toBe(true);
      if (first.value.isErr()) {
        expect(first.value.error._tag).toBe("TlvMalformedError");
        if (first.value.error._tag === "TlvMalformedError") {
          expect(first.value.error.declaredLength).toBe(2);
        }
      }
    }
    expect(iterator.getState()).toBe("failed");
    expect(iterator.next().done).toBe(true);
  });

  it("fails on a length that overruns the region", () => {
    const iterator = new NlaIterator(region(0x0c, 0x00, 0x01, 0x00, 1, 2, 3, 4));
    const results = Array.from(iterator);

    expect(results).toHaveLength(1);
    expect(results[0].isErr()).toBe(true);
  });

  it("fails when the padding of the last record is missing", () => {
    const iterator = new NlaIterator(region(0x05, 0x00, 0x01, 0x00, 0xaa));
    const results = Array.from(iterator);

    expect(results).toHaveLength(1);
    expect(results[0].isErr()).toBe(true);
  });

  it("reports records after a valid one before failing", () => {
    const iterator = new NlaIterator(region(0x04, 0x00, 0x01, 0x00, 0x00, 0x00, 0x02, 0x00));
    const results = Array.from(iterator);

    expect(results).toHaveLength(2);
    expect(results[0].isOk()).toBe(true);
    expect(results[1].isErr()).toBe(true);
  });
});

describe("emitNlaHeader", () => {
  it("writes length and type with flags", () => {
    const buffer = new Uint8Array(8);
    emitNlaHeader(buffer, 4, 8, { kind: 10, nested: true, networkByteOrder: true });
    expect(Array.from(buffer)).toEqual([0, 0, 0, 0, 0x08, 0x00, 0x0a, 0xc0]);
  });
});
