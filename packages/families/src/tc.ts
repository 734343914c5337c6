/**
 * Traffic control messages: queueing disciplines, classes, filters and
 * filter chains. All share struct tcmsg and the TCA_* attributes.
 */

import { Result } from "better-result";
import {
  bytes,
  cstring,
  defineFamily,
  describeUnknown,
  flag,
  nested,
  opaqueAttributes,
  parseNested,
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
import { scalarGroup } from "./scalar-group.js";
import {
  RTM_DELCHAIN,
  RTM_DELQDISC,
  RTM_DELTCLASS,
  RTM_DELTFILTER,
  RTM_GETCHAIN,
  RTM_GETQDISC,
  RTM_GETTCLASS,
  RTM_GETTFILTER,
  RTM_NEWCHAIN,
  RTM_NEWQDISC,
  RTM_NEWTCLASS,
  RTM_NEWTFILTER,
} from "./constants.js";

/** A tc handle, written `major:minor` by tc(8) */
export interface TcHandle {
  major: number;
  minor: number;
}

export const TC_H_ROOT: TcHandle = { major: 0xffff, minor: 0xffff };
export const TC_H_INGRESS: TcHandle = { major: 0xffff, minor: 0xfff1 };

export function splitHandle(raw: number): TcHandle {
  return { major: raw >>> 16, minor: raw & 0xffff };
}

export function joinHandle(handle: TcHandle): number {
  return ((handle.major << 16) | handle.minor) >>> 0;
}

export interface TcHeader {
  family: number;
  index: number;
  handle: TcHandle;
  parent: TcHandle;
  /** Filters: priority in the upper 16 bits, protocol in the lower */
  info: number;
}

export const tcHeader: FixedHeaderCodec<TcHeader> = {
  length: 20,
  parse: (view) => ({
    family: view.readU8(0).unwrapOr(0),
    index: view.readI32(4).unwrapOr(0),
    handle: splitHandle(view.readU32(8).unwrapOr(0)),
    parent: splitHandle(view.readU32(12).unwrapOr(0)),
    info: view.readU32(16).unwrapOr(0),
  }),
  emit: (header, buffer) => {
    const view = writerFor(buffer);
    view.setUint8(0, header.family);
    view.setInt32(4, header.index, true);
    view.setUint32(8, joinHandle(header.handle), true);
    view.setUint32(12, joinHandle(header.parent), true);
    view.setUint32(16, header.info, true);
  },
  check: (header) =>
    checkHeaderFields("tc", [
      ["family", header.family, "u8"],
      ["index", header.index, "i32"],
      ["handle.major", header.handle.major, "u16"],
      ["handle.minor", header.handle.minor, "u16"],
      ["parent.major", header.parent.major, "u16"],
      ["parent.minor", header.parent.minor, "u16"],
      ["info", header.info, "u32"],
    ]),
};

const TCA_OPTIONS = 2;
const TCA_STATS2 = 7;
const TCA_STAB = 8;

const tcNames = scalarGroup({ kind: 1 }, cstring);
const tcBlobs = scalarGroup({ stats: 3, xstats: 4, rate: 5 }, bytes);
const tcFlags = scalarGroup({ dumpInvisible: 10 }, flag);
const tcChain = scalarGroup({ chain: 11 }, u32);
const tcOffload = scalarGroup({ hwOffload: 12 }, u8);

// Option layout depends on the qdisc, class or filter kind
const tcOptions = opaqueAttributes("tcOptions");
const tcStats = opaqueAttributes("tcStats");
const tcStab = opaqueAttributes("tcStab");

export type TcAttribute =
  | { type: "kind"; value: string }
  /** struct tc_stats, tc_estimator and kind-specific xstats, raw */
  | { type: "stats" | "xstats" | "rate"; value: Uint8Array }
  | { type: "dumpInvisible"; value: true }
  | { type: "chain"; value: number }
  | { type: "hwOffload"; value: number }
  | { type: "options" | "stats2" | "stab"; value: UnknownAttribute[] }
  | UnknownAttribute;

export const tcAttributes: AttributeContract<TcAttribute> = {
  family: "tc",
  describe(attribute) {
    if (tcNames.has(attribute)) return tcNames.describe(attribute);
    if (tcBlobs.has(attribute)) return tcBlobs.describe(attribute);
    if (tcFlags.has(attribute)) return tcFlags.describe(attribute);
    if (tcChain.has(attribute)) return tcChain.describe(attribute);
    if (tcOffload.has(attribute)) return tcOffload.describe(attribute);
    switch (attribute.type) {
      case "options":
        return nested(TCA_OPTIONS, tcOptions, attribute.value);
      case "stats2":
        return nested(TCA_STATS2, tcStats, attribute.value);
      case "stab":
        return nested(TCA_STAB, tcStab, attribute.value);
      case "unknown":
        return describeUnknown(attribute);
    }
  },
  parse(record, context) {
    const wrap = (attribute: TcAttribute) => attribute;
    const parsed =
      tcNames.parse(record, context, wrap) ??
      tcBlobs.parse(record, context, wrap) ??
      tcFlags.parse(record, context, wrap) ??
      tcChain.parse(record, context, wrap) ??
      tcOffload.parse(record, context, wrap);
    if (parsed) return parsed;

    switch (record.kind) {
      case TCA_OPTIONS:
        return parseNested(record, context, tcOptions, (value): TcAttribute => ({ type: "options", value }));
      case TCA_STATS2:
        return parseNested(record, context, tcStats, (value): TcAttribute => ({ type: "stats2", value }));
      case TCA_STAB:
        return parseNested(record, context, tcStab, (value): TcAttribute => ({ type: "stab", value }));
      default:
        return Result.ok(unknownAttribute(record));
    }
  },
};

export type TcOperation =
  | "newQdisc"
  | "delQdisc"
  | "getQdisc"
  | "newClass"
  | "delClass"
  | "getClass"
  | "newFilter"
  | "delFilter"
  | "getFilter"
  | "newChain"
  | "delChain"
  | "getChain";

export type TcMessage = FamilyMessage<"tc", TcOperation, TcHeader, TcAttribute>;

export const tcFamily = defineFamily({
  tag: "tc",
  operations: [
    ["newQdisc", RTM_NEWQDISC],
    ["delQdisc", RTM_DELQDISC],
    ["getQdisc", RTM_GETQDISC],
    ["newClass", RTM_NEWTCLASS],
    ["delClass", RTM_DELTCLASS],
    ["getClass", RTM_GETTCLASS],
    ["newFilter", RTM_NEWTFILTER],
    ["delFilter", RTM_DELTFILTER],
    ["getFilter", RTM_GETTFILTER],
    ["newChain", RTM_NEWCHAIN],
    ["delChain", RTM_DELCHAIN],
    ["getChain", RTM_GETCHAIN],
  ],
  header: tcHeader,
  attributes: tcAttributes,
});
