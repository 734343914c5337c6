import { describe, it, expect, vi, afterEach } from "vitest";
import { NetlinkFlags, isUnrecognized, loadCodecConfig } from "@nlroute/codec";
import { createLogger } from "@nlroute/logger";
import { createRouteCodec, decodeMessage, encodeMessage } from "../route-codec.js";
import { RTM_NEWLINK, RTM_NEWROUTE } from "../constants.js";
import { ascii, le32, message, nla } from "./wire.js";

const LINK_HEADER = new Array<number>(16).fill(0);

// IFLA_LINKINFO > IFLA_INFO_DATA > one leaf: two levels of nesting
const DEEP_LINK = message(RTM_NEWLINK, [
  ...LINK_HEADER,
  ...nla(0x8012, [...nla(1, ascii("vlan")), ...nla(0x8002, nla(1, [0x0a, 0]))]),
]);

describe("createRouteCodec", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("routes every family by message type", () => {
    const codec = createRouteCodec();

    expect([16, 20, 24, 28, 32, 36, 52, 64, 88, 108].map((type) => codec.familyOf(type))).toEqual([
      "link",
      "address",
      "route",
      "neighbour",
      "rule",
      "tc",
      "prefix",
      "neighbourTable",
      "nsid",
      "link",
    ]);
    expect(codec.familyOf(3)).toBeUndefined();
  });

  it("passes control messages through unrecognized", () => {
    const bytes = message(3, le32(0), NetlinkFlags.MULTI);

    const decoded = decodeMessage(bytes).unwrap();

    expect(decoded).toEqual({
      family: "unrecognized",
      messageType: 3,
      envelope: { flags: NetlinkFlags.MULTI, sequence: 1, portId: 0 },
      payload: new Uint8Array([0, 0, 0, 0]),
    });
    expect(isUnrecognized(decoded)).toBe(true);
    expect(encodeMessage(decoded).unwrap()).toEqual(bytes);
  });

  it("applies the configured nesting depth", () => {
    const config = loadCodecConfig({ NLROUTE_MAX_NESTING_DEPTH: "1", NLROUTE_LOG_LEVEL: "silent" }).unwrap();

    const shallow = createRouteCodec({ config }).decode(DEEP_LINK);

    expect(shallow.isErr()).toBe(true);
    if (shallow.isErr()) {
      expect(shallow.error._tag).toBe("NestingTooDeepError");
      expect(shallow.error.message).toBe("Nested attributes exceed the depth limit of 1");
    }
    expect(decodeMessage(DEEP_LINK).isOk()).toBe(true);
  });

  it("decodes a batch and logs each failure", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const codec = createRouteCodec({ logger: createLogger({ component: "test" }, { level: "warn" }) });
    const route = message(RTM_NEWROUTE, [2, 0, 0, 0, 254, 2, 253, 1, 0, 0, 0, 0, ...nla(4, le32(1))]);

    const entries = codec.decodeBatch([route, route.subarray(0, 10), route]);

    expect(entries.map((entry) => entry.status)).toEqual(["decoded", "failed", "decoded"]);
    expect(entries[2]).toMatchObject({
      index: 2,
      message: { family: "route", attributes: [{ type: "oif", value: 1 }] },
    });
    expect(warn).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(warn.mock.calls[0][0]))).toMatchObject({
      level: "warn",
      component: "test",
      message: "Failed to decode message",
      index: 1,
      error: "HeaderTooShortError",
      required: 16,
      available: 10,
    });
  });
});
