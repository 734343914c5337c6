/**
 * Routing policy rules (RTM_NEWRULE, RTM_DELRULE, RTM_GETRULE): struct
 * fib_rule_hdr plus FRA_* attributes.
 */

import { Result } from "better-result";
import {
  cstring,
  defineFamily,
  describeUnknown,
  u32,
  u32Struct,
  u64be,
  u8,
  unknownAttribute,
  writerFor,
  type AttributeContract,
  type FamilyMessage,
  type FixedHeaderCodec,
  type UnknownAttribute,
  type ValueCodec,
} from "@nlroute/codec";
import { checkHeaderFields } from "./header-fields.js";
import { ipAddress } from "./ip.js";
import { scalarGroup } from "./scalar-group.js";
import { RTM_DELRULE, RTM_GETRULE, RTM_NEWRULE } from "./constants.js";

export interface RuleHeader {
  family: number;
  destinationPrefixLength: number;
  sourcePrefixLength: number;
  tos: number;
  table: number;
  /** RuleAction */
  action: number;
  /** FIB_RULE_* */
  flags: number;
}

export const ruleHeader: FixedHeaderCodec<RuleHeader> = {
  length: 12,
  parse: (view) => ({
    family: view.readU8(0).unwrapOr(0),
    destinationPrefixLength: view.readU8(1).unwrapOr(0),
    sourcePrefixLength: view.readU8(2).unwrapOr(0),
    tos: view.readU8(3).unwrapOr(0),
    table: view.readU8(4).unwrapOr(0),
    // bytes 5 and 6 are reserved
    action: view.readU8(7).unwrapOr(0),
    flags: view.readU32(8).unwrapOr(0),
  }),
  emit: (header, buffer) => {
    const view = writerFor(buffer);
    view.setUint8(0, header.family);
    view.setUint8(1, header.destinationPrefixLength);
    view.setUint8(2, header.sourcePrefixLength);
    view.setUint8(3, header.tos);
    view.setUint8(4, header.table);
    view.setUint8(7, header.action);
    view.setUint32(8, header.flags, true);
  },
  check: (header) =>
    checkHeaderFields("rule", [
      ["family", header.family, "u8"],
      ["destinationPrefixLength", header.destinationPrefixLength, "u8"],
      ["sourcePrefixLength", header.sourcePrefixLength, "u8"],
      ["tos", header.tos, "u8"],
      ["table", header.table, "u8"],
      ["action", header.action, "u8"],
      ["flags", header.flags, "u32"],
    ]),
};

export interface Range {
  start: number;
  end: number;
}

const uidRange = u32Struct<Range>(
  "fib_rule_uid_range",
  2,
  ([start, end]) => ({ start, end }),
  (range) => [range.start, range.end]
);

// struct fib_rule_port_range: two u16
const portRange: ValueCodec<Range> = {
  description: "fib_rule_port_range",
  length: () => 4,
  emit: (range, buffer) => {
    const view = writerFor(buffer);
    view.setUint16(0, range.start, true);
    view.setUint16(2, range.end, true);
  },
  parse: (payload, order) => {
    if (payload.length !== 4) {
      return Result.err(`expected 4 bytes, got ${payload.length}`);
    }
    return Result.ok({
      start: payload.readU16(0, order).unwrapOr(0),
      end: payload.readU16(2, order).unwrapOr(0),
    });
  },
  check: (range) =>
    [range.start, range.end].every((port) => Number.isInteger(port) && port >= 0 && port <= 0xffff)
      ? undefined
      : `port range ${range.start}-${range.end} is outside 0..65535`,
};

const ruleIPs = scalarGroup({ destination: 1, source: 2 }, ipAddress);
const ruleNames = scalarGroup({ iifName: 3, oifName: 17 }, cstring);
const ruleU32 = scalarGroup(
  {
    goto: 4,
    priority: 6,
    fwMark: 10,
    flow: 11,
    suppressIfGroup: 13,
    suppressPrefixLength: 14,
    table: 15,
    fwMask: 16,
  },
  u32
);
const ruleU8 = scalarGroup({ l3mdev: 19, protocol: 21, ipProtocol: 22 }, u8);
const ruleTunnel = scalarGroup({ tunnelId: 12 }, u64be);
const ruleUids = scalarGroup({ uidRange: 20 }, uidRange);
const rulePorts = scalarGroup({ sourcePortRange: 23, destinationPortRange: 24 }, portRange);

export type RuleAttribute =
  | { type: "destination" | "source"; value: string }
  | { type: "iifName" | "oifName"; value: string }
  | {
      type:
        | "goto"
        | "priority"
        | "fwMark"
        | "flow"
        | "suppressIfGroup"
        | "suppressPrefixLength"
        | "table"
        | "fwMask";
      value: number;
    }
  | { type: "l3mdev" | "protocol" | "ipProtocol"; value: number }
  /** Big-endian on the wire */
  | { type: "tunnelId"; value: bigint }
  | { type: "uidRange"; value: Range }
  | { type: "sourcePortRange" | "destinationPortRange"; value: Range }
  | UnknownAttribute;

export const ruleAttributes: AttributeContract<RuleAttribute> = {
  family: "rule",
  describe(attribute) {
    if (ruleIPs.has(attribute)) return ruleIPs.describe(attribute);
    if (ruleNames.has(attribute)) return ruleNames.describe(attribute);
    if (ruleU32.has(attribute)) return ruleU32.describe(attribute);
    if (ruleU8.has(attribute)) return ruleU8.describe(attribute);
    if (ruleTunnel.has(attribute)) return ruleTunnel.describe(attribute);
    if (ruleUids.has(attribute)) return ruleUids.describe(attribute);
    if (rulePorts.has(attribute)) return rulePorts.describe(attribute);
    return describeUnknown(attribute);
  },
  parse(record, context) {
    const wrap = (attribute: RuleAttribute) => attribute;
    return (
      ruleIPs.parse(record, context, wrap) ??
      ruleNames.parse(record, context, wrap) ??
      ruleU32.parse(record, context, wrap) ??
      ruleU8.parse(record, context, wrap) ??
      ruleTunnel.parse(record, context, wrap) ??
      ruleUids.parse(record, context, wrap) ??
      rulePorts.parse(record, context, wrap) ??
      Result.ok(unknownAttribute(record))
    );
  },
};

export type RuleOperation = "new" | "del" | "get";

export type RuleMessage = FamilyMessage<"rule", RuleOperation, RuleHeader, RuleAttribute>;

export const ruleFamily = defineFamily({
  tag: "rule",
  operations: [
    ["new", RTM_NEWRULE],
    ["del", RTM_DELRULE],
    ["get", RTM_GETRULE],
  ],
  header: ruleHeader,
  attributes: ruleAttributes,
});
