import { describe, it, expect } from "vitest";
import { decodeMessage, encodeMessage } from "../route-codec.js";
import type { NeighbourTableMessage } from "../neighbour-table.js";
import { RTM_NEWNEIGHTBL, RTM_SETNEIGHTBL } from "../constants.js";
import { ascii, le32, message, nla } from "./wire.js";

// 30000 as a little-endian u64
const THIRTY_SECONDS = [0x30, 0x75, 0, 0, 0, 0, 0, 0];

const table: NeighbourTableMessage = {
  family: "neighbourTable",
  operation: "new",
  envelope: { flags: 0, sequence: 1, portId: 0 },
  header: { family: 2 },
  attributes: [
    { type: "name", value: "arp_cache" },
    { type: "threshold1", value: 128 },
    { type: "gcInterval", value: 30000n },
    {
      type: "parms",
      value: [
        { type: "ifindex", value: 0 },
        { type: "reachableTime", value: 30000n },
      ],
    },
  ],
};

const TABLE_BYTES = message(RTM_NEWNEIGHTBL, [
  2, 0, 0, 0,
  ...nla(1, ascii("arp_cache")),
  ...nla(2, le32(128)),
  ...nla(8, THIRTY_SECONDS),
  ...nla(0x8006, [...nla(1, le32(0)), ...nla(3, THIRTY_SECONDS)]),
]);

describe("neighbour table family", () => {
  it("decodes table parameters", () => {
    expect(decodeMessage(TABLE_BYTES).unwrap()).toEqual(table);
  });

  it("encodes the same bytes", () => {
    const encoded = encodeMessage(table).unwrap();

    expect(encoded.length).toBe(80);
    expect(encoded).toEqual(TABLE_BYTES);
  });

  it("sends updates as RTM_SETNEIGHTBL", () => {
    const encoded = encodeMessage({ ...table, operation: "set", attributes: [] }).unwrap();

    expect(Array.from(encoded)).toEqual(Array.from(message(RTM_SETNEIGHTBL, [2, 0, 0, 0])));
  });
});
