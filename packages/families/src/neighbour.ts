/**
 * Neighbour messages (RTM_NEWNEIGH, RTM_DELNEIGH, RTM_GETNEIGH): struct ndmsg
 * plus NDA_* attributes.
 */

import { Result } from "better-result";
import {
  defineFamily,
  describeUnknown,
  hardwareAddress,
  u16,
  u16be,
  u32,
  u32Struct,
  u8,
  unknownAttribute,
  writerFor,
  type AttributeContract,
  type FamilyMessage,
  type FixedHeaderCodec,
  type UnknownAttribute,
} from "@nlroute/codec";
import { checkHeaderFields } from "./header-fields.js";
import { ipAddress, isIPLength } from "./ip.js";
import { scalarGroup } from "./scalar-group.js";
import { RTM_DELNEIGH, RTM_GETNEIGH, RTM_NEWNEIGH } from "./constants.js";

export interface NeighbourHeader {
  family: number;
  index: number;
  /** NeighbourState bits */
  state: number;
  /** NTF_* */
  flags: number;
  /** RouteType of the entry */
  kind: number;
}

export const neighbourHeader: FixedHeaderCodec<NeighbourHeader> = {
  length: 12,
  parse: (view) => ({
    family: view.readU8(0).unwrapOr(0),
    index: view.readU32(4).unwrapOr(0),
    state: view.readU16(8).unwrapOr(0),
    flags: view.readU8(10).unwrapOr(0),
    kind: view.readU8(11).unwrapOr(0),
  }),
  emit: (header, buffer) => {
    const view = writerFor(buffer);
    view.setUint8(0, header.family);
    view.setUint32(4, header.index, true);
    view.setUint16(8, header.state, true);
    view.setUint8(10, header.flags);
    view.setUint8(11, header.kind);
  },
  check: (header) =>
    checkHeaderFields("neighbour", [
      ["family", header.family, "u8"],
      ["index", header.index, "u32"],
      ["state", header.state, "u16"],
      ["flags", header.flags, "u8"],
      ["kind", header.kind, "u8"],
    ]),
};

/** struct nda_cacheinfo, ages in clock ticks */
export interface NeighbourCacheInfo {
  confirmed: number;
  used: number;
  updated: number;
  refcnt: number;
}

const neighbourCacheInfo = u32Struct<NeighbourCacheInfo>(
  "nda_cacheinfo",
  4,
  ([confirmed, used, updated, refcnt]) => ({ confirmed, used, updated, refcnt }),
  (info) => [info.confirmed, info.used, info.updated, info.refcnt]
);

const NDA_DST = 1;

const neighbourIPs = scalarGroup({ destination: NDA_DST }, ipAddress);
const neighbourLinkLayer = scalarGroup({ linkLocalAddress: 2 }, hardwareAddress);
const neighbourCache = scalarGroup({ cacheInfo: 3 }, neighbourCacheInfo);
const neighbourU32 = scalarGroup(
  { probes: 4, vni: 7, ifindex: 8, controller: 9, linkNetnsid: 10, sourceVni: 11 },
  u32
);
const neighbourVlan = scalarGroup({ vlan: 5 }, u16);
const neighbourPort = scalarGroup({ port: 6 }, u16be);
const neighbourProtocol = scalarGroup({ protocol: 12 }, u8);

export type NeighbourAttribute =
  /** IPv4 or IPv6 only; other families keep NDA_DST opaque */
  | { type: "destination"; value: string }
  | { type: "linkLocalAddress"; value: string }
  | { type: "cacheInfo"; value: NeighbourCacheInfo }
  | {
      type: "probes" | "vni" | "ifindex" | "controller" | "linkNetnsid" | "sourceVni";
      value: number;
    }
  | { type: "vlan"; value: number }
  /** UDP port of a VXLAN entry, big-endian on the wire */
  | { type: "port"; value: number }
  | { type: "protocol"; value: number }
  | UnknownAttribute;

export const neighbourAttributes: AttributeContract<NeighbourAttribute> = {
  family: "neighbour",
  describe(attribute) {
    if (neighbourIPs.has(attribute)) return neighbourIPs.describe(attribute);
    if (neighbourLinkLayer.has(attribute)) return neighbourLinkLayer.describe(attribute);
    if (neighbourCache.has(attribute)) return neighbourCache.describe(attribute);
    if (neighbourU32.has(attribute)) return neighbourU32.describe(attribute);
    if (neighbourVlan.has(attribute)) return neighbourVlan.describe(attribute);
    if (neighbourPort.has(attribute)) return neighbourPort.describe(attribute);
    if (neighbourProtocol.has(attribute)) return neighbourProtocol.describe(attribute);
    return describeUnknown(attribute);
  },
  parse(record, context) {
    if (record.kind === NDA_DST && !isIPLength(record.payload.length)) {
      return Result.ok(unknownAttribute(record));
    }

    const wrap = (attribute: NeighbourAttribute) => attribute;
    return (
      neighbourIPs.parse(record, context, wrap) ??
      neighbourLinkLayer.parse(record, context, wrap) ??
      neighbourCache.parse(record, context, wrap) ??
      neighbourU32.parse(record, context, wrap) ??
      neighbourVlan.parse(record, context, wrap) ??
      neighbourPort.parse(record, context, wrap) ??
      neighbourProtocol.parse(record, context, wrap) ??
      Result.ok(unknownAttribute(record))
    );
  },
};

export type NeighbourOperation = "new" | "del" | "get";

export type NeighbourMessage = FamilyMessage<
  "neighbour",
  NeighbourOperation,
  NeighbourHeader,
  NeighbourAttribute
>;

export const neighbourFamily = defineFamily({
  tag: "neighbour",
  operations: [
    ["new", RTM_NEWNEIGH],
    ["del", RTM_DELNEIGH],
    ["get", RTM_GETNEIGH],
  ],
  header: neighbourHeader,
  attributes: neighbourAttributes,
});
