/**
 * Route messages (RTM_NEWROUTE, RTM_DELROUTE, RTM_GETROUTE): struct rtmsg
 * plus RTA_* attributes.
 */

import { Result } from "better-result";
import {
  cstring,
  defineFamily,
  describeUnknown,
  nested,
  parseNested,
  u16,
  u32,
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
import { RTM_DELROUTE, RTM_GETROUTE, RTM_NEWROUTE } from "./constants.js";

export interface RouteHeader {
  addressFamily: number;
  destinationPrefixLength: number;
  sourcePrefixLength: number;
  tos: number;
  /** RouteTable; tables above 255 travel in the `table` attribute */
  table: number;
  protocol: number;
  scope: number;
  /** RouteType */
  routeType: number;
  /** RTM_F_* */
  flags: number;
}

export const routeHeader: FixedHeaderCodec<RouteHeader> = {
  length: 12,
  parse: (view) => ({
    addressFamily: view.readU8(0).unwrapOr(0),
    destinationPrefixLength: view.readU8(1).unwrapOr(0),
    sourcePrefixLength: view.readU8(2).unwrapOr(0),
    tos: view.readU8(3).unwrapOr(0),
    table: view.readU8(4).unwrapOr(0),
    protocol: view.readU8(5).unwrapOr(0),
    scope: view.readU8(6).unwrapOr(0),
    routeType: view.readU8(7).unwrapOr(0),
    flags: view.readU32(8).unwrapOr(0),
  }),
  emit: (header, buffer) => {
    const view = writerFor(buffer);
    view.setUint8(0, header.addressFamily);
    view.setUint8(1, header.destinationPrefixLength);
    view.setUint8(2, header.sourcePrefixLength);
    view.setUint8(3, header.tos);
    view.setUint8(4, header.table);
    view.setUint8(5, header.protocol);
    view.setUint8(6, header.scope);
    view.setUint8(7, header.routeType);
    view.setUint32(8, header.flags, true);
  },
  check: (header) =>
    checkHeaderFields("route", [
      ["addressFamily", header.addressFamily, "u8"],
      ["destinationPrefixLength", header.destinationPrefixLength, "u8"],
      ["sourcePrefixLength", header.sourcePrefixLength, "u8"],
      ["tos", header.tos, "u8"],
      ["table", header.table, "u8"],
      ["protocol", header.protocol, "u8"],
      ["scope", header.scope, "u8"],
      ["routeType", header.routeType, "u8"],
      ["flags", header.flags, "u32"],
    ]),
};

export function defaultRouteHeader(addressFamily: number): RouteHeader {
  return {
    addressFamily,
    destinationPrefixLength: 0,
    sourcePrefixLength: 0,
    tos: 0,
    table: 0,
    protocol: 0,
    scope: 0,
    routeType: 0,
    flags: 0,
  };
}

// RTA_METRICS children (RTAX_*)
const metricValues = scalarGroup(
  {
    lock: 1,
    mtu: 2,
    window: 3,
    rtt: 4,
    rttVariance: 5,
    slowStartThreshold: 6,
    congestionWindow: 7,
    advertisedMss: 8,
    reordering: 9,
    hopLimit: 10,
    initialCongestionWindow: 11,
    features: 12,
    rtoMin: 13,
    initialReceiveWindow: 14,
    quickAck: 15,
    fastOpenNoCookie: 17,
  },
  u32
);
const metricNames = scalarGroup({ congestionControl: 16 }, cstring);

export type RouteMetric =
  | {
      type:
        | "lock"
        | "mtu"
        | "window"
        | "rtt"
        | "rttVariance"
        | "slowStartThreshold"
        | "congestionWindow"
        | "advertisedMss"
        | "reordering"
        | "hopLimit"
        | "initialCongestionWindow"
        | "features"
        | "rtoMin"
        | "initialReceiveWindow"
        | "quickAck"
        | "fastOpenNoCookie";
      value: number;
    }
  | { type: "congestionControl"; value: string }
  | UnknownAttribute;

export const routeMetricAttributes: AttributeContract<RouteMetric> = {
  family: "routeMetrics",
  describe(attribute) {
    if (metricValues.has(attribute)) return metricValues.describe(attribute);
    if (metricNames.has(attribute)) return metricNames.describe(attribute);
    return describeUnknown(attribute);
  },
  parse(record, context) {
    const wrap = (attribute: RouteMetric) => attribute;
    return (
      metricValues.parse(record, context, wrap) ??
      metricNames.parse(record, context, wrap) ??
      Result.ok(unknownAttribute(record))
    );
  },
};

const RTA_METRICS = 8;
const RTA_EXPIRES = 23;

const routeIPs = scalarGroup({ destination: 1, source: 2, gateway: 5, prefSource: 7 }, ipAddress);
const routeU32 = scalarGroup(
  { iif: 3, oif: 4, priority: 6, flow: 11, table: 15, mark: 16, expires: RTA_EXPIRES, uid: 25 },
  u32
);
const routeU16 = scalarGroup({ encapType: 21 }, u16);
const routeU8 = scalarGroup({ pref: 20, ttlPropagate: 26 }, u8);

export type RouteAttribute =
  /** Present for IPv4 and IPv6 routes; other families keep these opaque */
  | { type: "destination" | "source" | "gateway" | "prefSource"; value: string }
  | {
      type: "iif" | "oif" | "priority" | "flow" | "table" | "mark" | "expires" | "uid";
      value: number;
    }
  | { type: "encapType"; value: number }
  | { type: "pref" | "ttlPropagate"; value: number }
  | { type: "metrics"; value: RouteMetric[] }
  | UnknownAttribute;

export const routeAttributes: AttributeContract<RouteAttribute> = {
  family: "route",
  describe(attribute) {
    if (routeIPs.has(attribute)) return routeIPs.describe(attribute);
    if (routeU32.has(attribute)) return routeU32.describe(attribute);
    if (routeU16.has(attribute)) return routeU16.describe(attribute);
    if (routeU8.has(attribute)) return routeU8.describe(attribute);
    if (attribute.type === "metrics") return nested(RTA_METRICS, routeMetricAttributes, attribute.value);
    return describeUnknown(attribute);
  },
  parse(record, context) {
    // MPLS labels and the 64-bit multicast expiry are not decoded
    const notAnIP =
      Object.values(routeIPs.table).includes(record.kind) && !isIPLength(record.payload.length);
    if (notAnIP || (record.kind === RTA_EXPIRES && record.payload.length !== 4)) {
      return Result.ok(unknownAttribute(record));
    }

    if (record.kind === RTA_METRICS) {
      return parseNested(record, context, routeMetricAttributes, (value): RouteAttribute => ({
        type: "metrics",
        value,
      }));
    }

    const wrap = (attribute: RouteAttribute) => attribute;
    return (
      routeIPs.parse(record, context, wrap) ??
      routeU32.parse(record, context, wrap) ??
      routeU16.parse(record, context, wrap) ??
      routeU8.parse(record, context, wrap) ??
      Result.ok(unknownAttribute(record))
    );
  },
};

export type RouteOperation = "new" | "del" | "get";

export type RouteMessage = FamilyMessage<"route", RouteOperation, RouteHeader, RouteAttribute>;

export const routeFamily = defineFamily({
  tag: "route",
  operations: [
    ["new", RTM_NEWROUTE],
    ["del", RTM_DELROUTE],
    ["get", RTM_GETROUTE],
  ],
  header: routeHeader,
  attributes: routeAttributes,
  // iproute2 counts the padding for link and address dumps but not here
  shortRequest: {
    operations: ["get"],
    lengths: [1, 4],
    header: defaultRouteHeader,
  },
});
