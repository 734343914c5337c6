/**
 * Address messages (RTM_NEWADDR, RTM_DELADDR, RTM_GETADDR): struct
 * ifaddrmsg plus IFA_* attributes.
 */

import { Result } from "better-result";
import {
  cstring,
  defineFamily,
  describeUnknown,
  u32,
  u32Struct,
  unknownAttribute,
  writerFor,
  type AttributeContract,
  type FamilyMessage,
  type FixedHeaderCodec,
  type UnknownAttribute,
} from "@nlroute/codec";
import { checkHeaderFields } from "./header-fields.js";
import { ipAddress } from "./ip.js";
import { scalarGroup } from "./scalar-group.js";
import { RTM_DELADDR, RTM_GETADDR, RTM_NEWADDR } from "./constants.js";

export interface AddressHeader {
  family: number;
  prefixLength: number;
  /** IFA_F_*, low 8 bits only; see the `flags` attribute */
  flags: number;
  scope: number;
  index: number;
}

export const addressHeader: FixedHeaderCodec<AddressHeader> = {
  length: 8,
  parse: (view) => ({
    family: view.readU8(0).unwrapOr(0),
    prefixLength: view.readU8(1).unwrapOr(0),
    flags: view.readU8(2).unwrapOr(0),
    scope: view.readU8(3).unwrapOr(0),
    index: view.readU32(4).unwrapOr(0),
  }),
  emit: (header, buffer) => {
    const view = writerFor(buffer);
    view.setUint8(0, header.family);
    view.setUint8(1, header.prefixLength);
    view.setUint8(2, header.flags);
    view.setUint8(3, header.scope);
    view.setUint32(4, header.index, true);
  },
  check: (header) =>
    checkHeaderFields("address", [
      ["family", header.family, "u8"],
      ["prefixLength", header.prefixLength, "u8"],
      ["flags", header.flags, "u8"],
      ["scope", header.scope, "u8"],
      ["index", header.index, "u32"],
    ]),
};

/** struct ifa_cacheinfo, times in seconds and hundredths of a second */
export interface AddressCacheInfo {
  preferred: number;
  valid: number;
  created: number;
  updated: number;
}

const addressCacheInfo = u32Struct<AddressCacheInfo>(
  "ifa_cacheinfo",
  4,
  ([preferred, valid, created, updated]) => ({ preferred, valid, created, updated }),
  (info) => [info.preferred, info.valid, info.created, info.updated]
);

const addressIPs = scalarGroup(
  { address: 1, local: 2, broadcast: 4, anycast: 5, multicast: 7 },
  ipAddress
);
const addressLabel = scalarGroup({ label: 3 }, cstring);
const addressCache = scalarGroup({ cacheInfo: 6 }, addressCacheInfo);
const addressFlags = scalarGroup({ flags: 8 }, u32);

export type AddressAttribute =
  | { type: "address" | "local" | "broadcast" | "anycast" | "multicast"; value: string }
  | { type: "label"; value: string }
  | { type: "cacheInfo"; value: AddressCacheInfo }
  /** All 32 bits of IFA_F_* */
  | { type: "flags"; value: number }
  | UnknownAttribute;

export const addressAttributes: AttributeContract<AddressAttribute> = {
  family: "address",
  describe(attribute) {
    if (addressIPs.has(attribute)) return addressIPs.describe(attribute);
    if (addressLabel.has(attribute)) return addressLabel.describe(attribute);
    if (addressCache.has(attribute)) return addressCache.describe(attribute);
    if (addressFlags.has(attribute)) return addressFlags.describe(attribute);
    return describeUnknown(attribute);
  },
  parse(record, context) {
    const wrap = (attribute: AddressAttribute) => attribute;
    return (
      addressIPs.parse(record, context, wrap) ??
      addressLabel.parse(record, context, wrap) ??
      addressCache.parse(record, context, wrap) ??
      addressFlags.parse(record, context, wrap) ??
      Result.ok(unknownAttribute(record))
    );
  },
};

export type AddressOperation = "new" | "del" | "get";

export type AddressMessage = FamilyMessage<"address", AddressOperation, AddressHeader, AddressAttribute>;

export const addressFamily = defineFamily({
  tag: "address",
  operations: [
    ["new", RTM_NEWADDR],
    ["del", RTM_DELADDR],
    ["get", RTM_GETADDR],
  ],
  header: addressHeader,
  attributes: addressAttributes,
  shortRequest: {
    operations: ["get"],
    lengths: [4],
    header: (family) => ({ family, prefixLength: 0, flags: 0, scope: 0, index: 0 }),
  },
});
