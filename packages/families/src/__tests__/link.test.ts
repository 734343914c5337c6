import { describe, it, expect } from "vitest";
import { NetlinkFlags } from "@nlroute/codec";
import { decodeMessage, encodeMessage } from "../route-codec.js";
import type { LinkMessage } from "../link.js";
import { IFF_BROADCAST, IFF_MULTICAST, IFF_UP, RTM_GETLINK, RTM_NEWLINK } from "../constants.js";
import { ascii, message, nla } from "./wire.js";

const HEADER = [0, 0, 1, 0, 2, 0, 0, 0, 0x03, 0x10, 0, 0, 0, 0, 0, 0];

const veth: LinkMessage = {
  family: "link",
  operation: "new",
  envelope: { flags: 0, sequence: 1, portId: 0 },
  header: {
    interfaceFamily: 0,
    linkLayerType: 1,
    index: 2,
    flags: IFF_UP | IFF_BROADCAST | IFF_MULTICAST,
    changeMask: 0,
  },
  attributes: [
    { type: "ifname", value: "eth0" },
    { type: "mtu", value: 1500 },
    { type: "address", value: "02:00:00:00:00:01" },
    { type: "linkInfo", value: [{ type: "kind", value: "veth" }] },
  ],
};

const VETH_BYTES = message(RTM_NEWLINK, [
  ...HEADER,
  ...nla(3, ascii("eth0")),
  ...nla(4, [0xdc, 0x05, 0, 0]),
  ...nla(1, [2, 0, 0, 0, 0, 1]),
  // IFLA_LINKINFO with NLA_F_NESTED
  ...nla(0x8012, nla(1, ascii("veth"))),
]);

describe("link family", () => {
  it("decodes a new link", () => {
    expect(decodeMessage(VETH_BYTES).unwrap()).toEqual(veth);
  });

  it("encodes the same bytes", () => {
    expect(VETH_BYTES.length).toBe(80);
    expect(encodeMessage(veth).unwrap()).toEqual(VETH_BYTES);
  });

  it("keeps unknown attributes byte for byte", () => {
    const bytes = message(RTM_NEWLINK, [...HEADER, ...nla(200, [1, 2, 3])]);

    const decoded = decodeMessage(bytes).unwrap();

    expect(decoded).toEqual({
      ...veth,
      attributes: [
        { type: "unknown", kind: 200, nested: false, networkByteOrder: false, value: new Uint8Array([1, 2, 3]) },
      ],
    });
    expect(encodeMessage(decoded).unwrap()).toEqual(bytes);
  });

  it("keeps link-kind data opaque", () => {
    const data = nla(0x8002, nla(1, [0x0a, 0, 0, 0]));
    const bytes = message(RTM_NEWLINK, [...HEADER, ...nla(0x8012, [...nla(1, ascii("vlan")), ...data])]);

    const decoded = decodeMessage(bytes).unwrap();

    expect(decoded).toEqual({
      ...veth,
      attributes: [
        {
          type: "linkInfo",
          value: [
            { type: "kind", value: "vlan" },
            {
              type: "data",
              value: [
                { type: "unknown", kind: 1, nested: false, networkByteOrder: false, value: new Uint8Array([10, 0, 0, 0]) },
              ],
            },
          ],
        },
      ],
    });
    expect(encodeMessage(decoded).unwrap()).toEqual(bytes);
  });

  it("rejects a message cut between two attributes", () => {
    // ends right after IFLA_IFNAME, before IFLA_MTU
    const result = decodeMessage(VETH_BYTES.subarray(0, 44));

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error._tag).toBe("BufferTooShortError");
      expect(result.error.message).toBe("Netlink message declares 80 bytes, only 44 available");
    }
  });

  it("rejects a name that is not valid UTF-8", () => {
    const result = decodeMessage(message(RTM_NEWLINK, [...HEADER, ...nla(3, [0x65, 0xff, 0x30, 0x00])]));

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error._tag).toBe("AttributeDecodeFailedError");
      expect(result.error.message).toBe("Invalid link attribute 3 (string): not valid UTF-8");
    }
  });

  it("writes an unknown attribute of kind 2 as eight bytes without padding", () => {
    const encoded = encodeMessage({
      ...veth,
      attributes: [
        { type: "unknown", kind: 2, nested: false, networkByteOrder: false, value: new Uint8Array([1, 0, 0, 0]) },
      ],
    }).unwrap();

    expect(encoded.length).toBe(40);
    expect(Array.from(encoded.subarray(32))).toEqual([0x08, 0x00, 0x02, 0x00, 0x01, 0x00, 0x00, 0x00]);
    // kind 2 is IFLA_BROADCAST, so the same bytes decode as a known attribute
    const decoded = decodeMessage(encoded).unwrap();
    expect(decoded).toMatchObject({ attributes: [{ type: "broadcast", value: "01:00:00:00" }] });
    expect(encodeMessage(decoded).unwrap()).toEqual(encoded);
  });

  it("round-trips only canonical hardware addresses", () => {
    const result = encodeMessage({ ...veth, attributes: [{ type: "address", value: "AA:BB:CC:DD:EE:FF" }] });

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.message).toBe("Cannot encode link attribute 1: not a hardware address: AA:BB:CC:DD:EE:FF");
    }
    const lower: LinkMessage = { ...veth, attributes: [{ type: "address", value: "aa:bb:cc:dd:ee:ff" }] };
    expect(decodeMessage(encodeMessage(lower).unwrap()).unwrap()).toEqual(lower);
  });

  it("reports a malformed known attribute", () => {
    const result = decodeMessage(message(RTM_NEWLINK, [...HEADER, ...nla(4, [0xdc, 0x05])]));

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error._tag).toBe("AttributeDecodeFailedError");
      expect(result.error.message).toBe("Invalid link attribute 4 (u32): expected 4 bytes, got 2");
    }
  });

  it("decodes the short dump request iproute2 sends", () => {
    const bytes = message(RTM_GETLINK, [17, 0, 0, 0], NetlinkFlags.REQUEST | NetlinkFlags.DUMP);

    expect(decodeMessage(bytes).unwrap()).toEqual({
      family: "link",
      operation: "get",
      envelope: { flags: 0x301, sequence: 1, portId: 0 },
      header: { interfaceFamily: 17, linkLayerType: 0, index: 0, flags: 0, changeMask: 0 },
      attributes: [],
    });
  });

  it("does not accept a short body for other operations", () => {
    const result = decodeMessage(message(RTM_NEWLINK, [17, 0, 0, 0]));

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error._tag).toBe("FamilyHeaderTooShortError");
      expect(result.error.message).toBe("The link header needs 16 bytes, got 4");
    }
  });

  it("refuses header fields wider than the wire", () => {
    const result = encodeMessage({ ...veth, header: { ...veth.header, linkLayerType: 70000 } });

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.message).toBe(
        "Cannot encode link message: link header field linkLayerType = 70000 does not fit in u16"
      );
    }
  });

  it("refuses names with a NUL byte", () => {
    const result = encodeMessage({ ...veth, attributes: [{ type: "ifname", value: "eth\u00000" }] });

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error._tag).toBe("AttributeEncodeError");
      expect(result.error.message).toBe("Cannot encode link attribute 3: string contains a NUL byte");
    }
  });

  it("round-trips alternative names", () => {
    const property: LinkMessage = {
      family: "link",
      operation: "newProp",
      envelope: { flags: NetlinkFlags.REQUEST | NetlinkFlags.ACK, sequence: 9, portId: 0 },
      header: { interfaceFamily: 0, linkLayerType: 0, index: 4, flags: 0, changeMask: 0 },
      attributes: [{ type: "propList", value: [{ type: "altIfname", value: "uplink" }] }],
    };

    const encoded = encodeMessage(property).unwrap();

    expect(Array.from(encoded.subarray(4, 6))).toEqual([108, 0]);
    expect(Array.from(encoded.subarray(32, 40))).toEqual([16, 0, 0x34, 0x80, 11, 0, 53, 0]);
    expect(decodeMessage(encoded).unwrap()).toEqual(property);
  });
});
