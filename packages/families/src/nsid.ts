/**
 * Network namespace id messages (RTM_NEWNSID, RTM_DELNSID, RTM_GETNSID):
 * struct rtgenmsg plus NETNSA_* attributes.
 */

import { Result } from "better-result";
import {
  defineFamily,
  describeUnknown,
  i32,
  u32,
  unknownAttribute,
  writerFor,
  type AttributeContract,
  type FamilyMessage,
  type FixedHeaderCodec,
  type UnknownAttribute,
} from "@nlroute/codec";
import { checkHeaderFields } from "./header-fields.js";
import { scalarGroup } from "./scalar-group.js";
import { RTM_DELNSID, RTM_GETNSID, RTM_NEWNSID } from "./constants.js";

/** rtgenmsg is one byte; the kernel pads it to four */
export interface NsidHeader {
  family: number;
}

export const nsidHeader: FixedHeaderCodec<NsidHeader> = {
  length: 4,
  parse: (view) => ({ family: view.readU8(0).unwrapOr(0) }),
  emit: (header, buffer) => writerFor(buffer).setUint8(0, header.family),
  check: (header) => checkHeaderFields("nsid", [["family", header.family, "u8"]]),
};

/** Returned for a namespace without an assigned id */
export const NETNSA_NSID_NOT_ASSIGNED = -1;

const nsidIds = scalarGroup({ id: 1, targetNsid: 4, currentNsid: 5 }, i32);
const nsidHandles = scalarGroup({ pid: 2, fd: 3 }, u32);

export type NsidAttribute =
  | { type: "id" | "targetNsid" | "currentNsid"; value: number }
  /** Names the namespace by a process in it or an open file descriptor */
  | { type: "pid" | "fd"; value: number }
  | UnknownAttribute;

export const nsidAttributes: AttributeContract<NsidAttribute> = {
  family: "nsid",
  describe(attribute) {
    if (nsidIds.has(attribute)) return nsidIds.describe(attribute);
    if (nsidHandles.has(attribute)) return nsidHandles.describe(attribute);
    return describeUnknown(attribute);
  },
  parse(record, context) {
    const wrap = (attribute: NsidAttribute) => attribute;
    return (
      nsidIds.parse(record, context, wrap) ??
      nsidHandles.parse(record, context, wrap) ??
      Result.ok(unknownAttribute(record))
    );
  },
};

export type NsidOperation = "new" | "del" | "get";

export type NsidMessage = FamilyMessage<"nsid", NsidOperation, NsidHeader, NsidAttribute>;

export const nsidFamily = defineFamily({
  tag: "nsid",
  operations: [
    ["new", RTM_NEWNSID],
    ["del", RTM_DELNSID],
    ["get", RTM_GETNSID],
  ],
  header: nsidHeader,
  attributes: nsidAttributes,
});
