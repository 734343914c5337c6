/**
 * Neighbour table messages (RTM_NEWNEIGHTBL, RTM_GETNEIGHTBL,
 * RTM_SETNEIGHTBL): struct ndtmsg plus NDTA_* attributes.
 */

import { Result } from "better-result";
import {
  bytes,
  cstring,
  defineFamily,
  describeUnknown,
  nested,
  parseNested,
  u32,
  u64,
  unknownAttribute,
  writerFor,
  type AttributeContract,
  type FamilyMessage,
  type FixedHeaderCodec,
  type UnknownAttribute,
} from "@nlroute/codec";
import { checkHeaderFields } from "./header-fields.js";
import { scalarGroup } from "./scalar-group.js";
import { RTM_GETNEIGHTBL, RTM_NEWNEIGHTBL, RTM_SETNEIGHTBL } from "./constants.js";

export interface NeighbourTableHeader {
  family: number;
}

export const neighbourTableHeader: FixedHeaderCodec<NeighbourTableHeader> = {
  length: 4,
  parse: (view) => ({ family: view.readU8(0).unwrapOr(0) }),
  emit: (header, buffer) => writerFor(buffer).setUint8(0, header.family),
  check: (header) => checkHeaderFields("neighbourTable", [["family", header.family, "u8"]]),
};

// NDTA_PARMS children (NDTPA_*); times are in milliseconds
const parmsU32 = scalarGroup(
  {
    ifindex: 1,
    refcnt: 2,
    queueLen: 8,
    appProbes: 9,
    ucastProbes: 10,
    mcastProbes: 11,
    proxyQlen: 14,
    queueLenBytes: 16,
    mcastReprobes: 17,
  },
  u32
);
const parmsU64 = scalarGroup(
  {
    reachableTime: 3,
    baseReachableTime: 4,
    retransTime: 5,
    gcStaletime: 6,
    delayProbeTime: 7,
    anycastDelay: 12,
    proxyDelay: 13,
    locktime: 15,
    intervalProbeTimeMs: 19,
  },
  u64
);

export type NeighbourTableParm =
  | {
      type:
        | "ifindex"
        | "refcnt"
        | "queueLen"
        | "appProbes"
        | "ucastProbes"
        | "mcastProbes"
        | "proxyQlen"
        | "queueLenBytes"
        | "mcastReprobes";
      value: number;
    }
  | {
      type:
        | "reachableTime"
        | "baseReachableTime"
        | "retransTime"
        | "gcStaletime"
        | "delayProbeTime"
        | "anycastDelay"
        | "proxyDelay"
        | "locktime"
        | "intervalProbeTimeMs";
      value: bigint;
    }
  | UnknownAttribute;

export const neighbourTableParmAttributes: AttributeContract<NeighbourTableParm> = {
  family: "neighbourTableParms",
  describe(attribute) {
    if (parmsU32.has(attribute)) return parmsU32.describe(attribute);
    if (parmsU64.has(attribute)) return parmsU64.describe(attribute);
    return describeUnknown(attribute);
  },
  parse(record, context) {
    const wrap = (attribute: NeighbourTableParm) => attribute;
    return (
      parmsU32.parse(record, context, wrap) ??
      parmsU64.parse(record, context, wrap) ??
      Result.ok(unknownAttribute(record))
    );
  },
};

const NDTA_PARMS = 6;

const tableNames = scalarGroup({ name: 1 }, cstring);
const tableThresholds = scalarGroup({ threshold1: 2, threshold2: 3, threshold3: 4 }, u32);
// struct ndt_config and struct ndt_stats, raw
const tableBlobs = scalarGroup({ config: 5, stats: 7 }, bytes);
const tableInterval = scalarGroup({ gcInterval: 8 }, u64);

export type NeighbourTableAttribute =
  | { type: "name"; value: string }
  | { type: "threshold1" | "threshold2" | "threshold3"; value: number }
  | { type: "config" | "stats"; value: Uint8Array }
  | { type: "parms"; value: NeighbourTableParm[] }
  /** Milliseconds */
  | { type: "gcInterval"; value: bigint }
  | UnknownAttribute;

export const neighbourTableAttributes: AttributeContract<NeighbourTableAttribute> = {
  family: "neighbourTable",
  describe(attribute) {
    if (tableNames.has(attribute)) return tableNames.describe(attribute);
    if (tableThresholds.has(attribute)) return tableThresholds.describe(attribute);
    if (tableBlobs.has(attribute)) return tableBlobs.describe(attribute);
    if (tableInterval.has(attribute)) return tableInterval.describe(attribute);
    if (attribute.type === "parms") return nested(NDTA_PARMS, neighbourTableParmAttributes, attribute.value);
    return describeUnknown(attribute);
  },
  parse(record, context) {
    if (record.kind === NDTA_PARMS) {
      return parseNested(record, context, neighbourTableParmAttributes, (value): NeighbourTableAttribute => ({
        type: "parms",
        value,
      }));
    }

    const wrap = (attribute: NeighbourTableAttribute) => attribute;
    return (
      tableNames.parse(record, context, wrap) ??
      tableThresholds.parse(record, context, wrap) ??
      tableBlobs.parse(record, context, wrap) ??
      tableInterval.parse(record, context, wrap) ??
      Result.ok(unknownAttribute(record))
    );
  },
};

export type NeighbourTableOperation = "new" | "get" | "set";

export type NeighbourTableMessage = FamilyMessage<
  "neighbourTable",
  NeighbourTableOperation,
  NeighbourTableHeader,
  NeighbourTableAttribute
>;

export const neighbourTableFamily = defineFamily({
  tag: "neighbourTable",
  operations: [
    ["new", RTM_NEWNEIGHTBL],
    ["get", RTM_GETNEIGHTBL],
    ["set", RTM_SETNEIGHTBL],
  ],
  header: neighbourTableHeader,
  attributes: neighbourTableAttributes,
});
