import { describe, it, expect, vi, afterEach } from "vitest";
import { Result } from "better-result";
import { createLogger } from "@nlroute/logger";
import { writerFor } from "../byte-view.js";
import {
  describeUnknown,
  parseScalar,
  scalar,
  unknownAttribute,
  type AttributeContract,
  type UnknownAttribute,
} from "../attribute.js";
import { NetlinkFlags, type FixedHeaderCodec } from "../envelope.js";
import { defineFamily, type AnyFamilyMessage, type FamilyMessage } from "../family.js";
import { MessageCodec, isUnrecognized, type UnrecognizedMessage } from "../dispatch.js";
import { u32 } from "../values.js";

interface TestHeader {
  addressFamily: number;
  index: number;
}

type TestAttribute = { type: "metric"; value: number } | UnknownAttribute;

const testHeader: FixedHeaderCodec<TestHeader> = {
  length: 4,
  parse: (view) => ({
    addressFamily: view.readU8(0).unwrapOr(0),
    index: view.readU16(2).unwrapOr(0),
  }),
  emit: (header, buffer) => {
    const view = writerFor(buffer);
    view.setUint8(0, header.addressFamily);
    view.setUint16(2, header.index, true);
  },
};

const testAttributes: AttributeContract<TestAttribute> = {
  family: "test",
  describe: (attribute) =>
    attribute.type === "metric" ? scalar(2, u32, attribute.value) : describeUnknown(attribute),
  parse: (record, context) =>
    record.kind === 2
      ? parseScalar(record, context, u32, (value): TestAttribute => ({ type: "metric", value }))
      : Result.ok(unknownAttribute(record)),
};

const testFamily = defineFamily({
  tag: "test",
  operations: [
    ["new", 200],
    ["get", 202],
  ],
  header: testHeader,
  attributes: testAttributes,
  shortRequest: {
    operations: ["get"],
    lengths: [1],
    header: (addressFamily) => ({ addressFamily, index: 0 }),
  },
});

const otherFamily = defineFamily({
  tag: "other",
  operations: [["new", 300]],
  header: testHeader,
  attributes: testAttributes,
});

type TestMessage = FamilyMessage<"test", "new" | "get", TestHeader, TestAttribute>;

const message: TestMessage = {
  family: "test",
  operation: "new",
  envelope: { flags: NetlinkFlags.REQUEST | NetlinkFlags.ACK, sequence: 7, portId: 0 },
  header: { addressFamily: 2, index: 3 },
  attributes: [{ type: "metric", value: 1 }],
};

const MESSAGE_BYTES = [
  // nlmsghdr: len 28, type 200, flags REQUEST|ACK, seq 7, pid 0
  0x1c, 0x00, 0x00, 0x00, 0xc8, 0x00, 0x05, 0x00, 0x07, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00,
  // header
  0x02, 0x00, 0x03, 0x00,
  // metric = 1
  0x08, 0x00, 0x02, 0x00, 0x01, 0x00, 0x00, 0x00,
];

const UNKNOWN_BYTES = [
  0x13, 0x00, 0x00, 0x00, 0xe7, 0x03, 0x00, 0x00, 0x01, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00,
  0x01, 0x02, 0x03,
];

function quietCodec() {
  return new MessageCodec([testFamily], {
    logger: createLogger({ component: "test" }, { level: "silent" }),
  });
}

describe("MessageCodec", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("construction", () => {
    it("maps message types to families", () => {
      const codec = quietCodec();
      expect(codec.familyOf(200)).toBe("test");
      expect(codec.familyOf(202)).toBe("test");
      expect(codec.familyOf(201)).toBeUndefined();
    });

    it("throws when two families claim one message type", () => {
      const clashing = defineFamily({
        tag: "clash",
        operations: [["new", 200]],
        header: testHeader,
        attributes: testAttributes,
      });
      expect(() => new MessageCodec<AnyFamilyMessage>([testFamily, clashing])).toThrow(
        'Message type 200 is claimed by both "test" and "clash"'
      );
    });

    it("registers into a new codec and leaves the original alone", () => {
      const codec = quietCodec();
      const extended = codec.register(otherFamily);
      expect(extended.familyOf(300)).toBe("other");
      expect(codec.familyOf(300)).toBeUndefined();
    });
  });

  describe("encode", () => {
    it("derives length and message type", () => {
      expect(Array.from(quietCodec().encode(message).unwrap())).toEqual(MESSAGE_BYTES);
    });

    it("writes the scenario attribute without padding", () => {
      const bytes = quietCodec().encode(message).unwrap();
      expect(Array.from(bytes.subarray(20))).toEqual([0x08, 0x00, 0x02, 0x00, 0x01, 0x00, 0x00, 0x00]);
    });

    it("rejects envelope fields out of range", () => {
      const result = quietCodec().encode({ ...message, envelope: { flags: 0, sequence: -1, portId: 0 } });
      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error._tag).toBe("MessageEncodeError");
        expect(result.error.message).toBe("Cannot encode test message: envelope sequence -1 is out of range");
      }
    });

    it("range-checks the envelope of unrecognized messages", () => {
      const codec = quietCodec();
      const raw: UnrecognizedMessage = {
        family: "unrecognized",
        messageType: 999,
        envelope: { flags: 0, sequence: 1, portId: 0 },
        payload: new Uint8Array([1, 2, 3]),
      };
      const cases: [UnrecognizedMessage, string][] = [
        [{ ...raw, envelope: { ...raw.envelope, flags: 0x10001 } }, "envelope flags 65537 is out of range"],
        [{ ...raw, envelope: { ...raw.envelope, sequence: 2 ** 32 + 5 } }, "envelope sequence 4294967301 is out of range"],
        [{ ...raw, envelope: { ...raw.envelope, portId: -1 } }, "envelope portId -1 is out of range"],
        [{ ...raw, messageType: 1.5 }, "message type 1.5 is out of range"],
      ];

      for (const [input, reason] of cases) {
        const result = codec.encode(input);
        expect(result.isErr()).toBe(true);
        if (result.isErr()) {
          expect(result.error._tag).toBe("MessageEncodeError");
          expect(result.error.message).toBe(`Cannot encode message type ${input.messageType}: ${reason}`);
        }
      }
    });

    it("rejects invalid attributes", () => {
      const result = quietCodec().encode({ ...message, attributes: [{ type: "metric", value: 2 ** 32 }] });
      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error._tag).toBe("AttributeEncodeError");
      }
    });
  });

  describe("decode", () => {
    it("round-trips a message", () => {
      expect(quietCodec().decode(new Uint8Array(MESSAGE_BYTES)).unwrap()).toEqual(message);
    });

    it("decodes an empty attribute region to no attributes", () => {
      const codec = quietCodec();
      const bytes = codec.encode({ ...message, attributes: [] }).unwrap();
      expect(bytes.length).toBe(20);
      expect(codec.decode(bytes).unwrap()).toEqual({ ...message, attributes: [] });
    });

    it("ignores bytes past the declared length", () => {
      const bytes = new Uint8Array([...MESSAGE_BYTES, 0xff, 0xff, 0xff, 0xff]);
      expect(quietCodec().decode(bytes).unwrap()).toEqual(message);
    });

    it("reports an error for every truncated prefix", () => {
      const codec = quietCodec();
      const full = new Uint8Array(MESSAGE_BYTES);

      for (let length = 0; length < full.length; length++) {
        const result = codec.decode(full.subarray(0, length));
        // the declared length still covers the whole message
        expect(result.isErr() && result.error._tag).toBe(length < 16 ? "HeaderTooShortError" : "BufferTooShortError");
      }
    });

    it("rejects a declared attribute length of 2", () => {
      const bytes = new Uint8Array(MESSAGE_BYTES);
      bytes[20] = 0x02;
      const result = quietCodec().decode(bytes);
      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error._tag).toBe("TlvMalformedError");
      }
    });

    it("keeps unrecognized message types as raw bytes", () => {
      const codec = quietCodec();
      const decoded = codec.decode(new Uint8Array(UNKNOWN_BYTES)).unwrap();
      const expected: UnrecognizedMessage = {
        family: "unrecognized",
        messageType: 999,
        envelope: { flags: 0, sequence: 1, portId: 0 },
        payload: new Uint8Array([1, 2, 3]),
      };

      expect(isUnrecognized(decoded)).toBe(true);
      expect(decoded).toEqual(expected);
      expect(Array.from(codec.encode(decoded).unwrap())).toEqual(UNKNOWN_BYTES);
    });

    it("logs unrecognized message types at debug", () => {
      const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
      const codec = new MessageCodec([testFamily], {
        logger: createLogger({ component: "test" }, { level: "debug" }),
      });

      codec.decode(new Uint8Array(UNKNOWN_BYTES));

      expect(debug).toHaveBeenCalledTimes(1);
      const entry = JSON.parse(String(debug.mock.calls[0][0]));
      expect(entry.message).toBe("Unrecognized message type");
      expect(entry.messageType).toBe(999);
      expect(entry.length).toBe(3);
    });

    it("accepts a short dump request", () => {
      // RTM_GET (202) with only the address family byte
      const bytes = new Uint8Array([
        0x11, 0x00, 0x00, 0x00, 0xca, 0x00, 0x01, 0x03, 0x01, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00,
        0x0a,
      ]);
      expect(quietCodec().decode(bytes).unwrap()).toEqual({
        family: "test",
        operation: "get",
        envelope: { flags: 0x0301, sequence: 1, portId: 0 },
        header: { addressFamily: 10, index: 0 },
        attributes: [],
      });
    });

    it("rejects a short body for other operations", () => {
      const bytes = new Uint8Array([
        0x11, 0x00, 0x00, 0x00, 0xc8, 0x00, 0x00, 0x00, 0x01, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00,
        0x0a,
      ]);
      const result = quietCodec().decode(bytes);
      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error._tag).toBe("FamilyHeaderTooShortError");
      }
    });
  });

  describe("decodeBatch", () => {
    it("isolates failures and logs them at warn", () => {
      const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
      const codec = new MessageCodec([testFamily], {
        logger: createLogger({ component: "test" }, { level: "warn" }),
      });

      const entries = codec.decodeBatch([
        new Uint8Array(MESSAGE_BYTES),
        new Uint8Array(MESSAGE_BYTES.slice(0, 10)),
        new Uint8Array(UNKNOWN_BYTES),
      ]);

      expect(entries.map((entry) => entry.status)).toEqual(["decoded", "failed", "decoded"]);
      expect(entries[0]).toEqual({ index: 0, status: "decoded", message });

      expect(warn).toHaveBeenCalledTimes(1);
      const entry = JSON.parse(String(warn.mock.calls[0][0]));
      expect(entry.message).toBe("Failed to decode message");
      expect(entry.index).toBe(1);
      expect(entry.error).toBe("HeaderTooShortError");
      expect(entry.required).toBe(16);
      expect(entry.available).toBe(10);
    });
  });
});
