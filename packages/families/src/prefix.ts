/**
 * IPv6 prefix notifications (RTM_NEWPREFIX): struct prefixmsg plus
 * PREFIX_* attributes. The kernel only ever sends these.
 */

import { Result } from "better-result";
import {
  defineFamily,
  describeUnknown,
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
import { RTM_NEWPREFIX } from "./constants.js";

export interface PrefixHeader {
  family: number;
  index: number;
  /** ICMPv6 option type, 3 for a prefix information option */
  prefixType: number;
  prefixLength: number;
  /** IF_PREFIX_ONLINK (0x01), IF_PREFIX_AUTOCONF (0x02) */
  flags: number;
}

export const prefixHeader: FixedHeaderCodec<PrefixHeader> = {
  length: 12,
  parse: (view) => ({
    family: view.readU8(0).unwrapOr(0),
    index: view.readI32(4).unwrapOr(0),
    prefixType: view.readU8(8).unwrapOr(0),
    prefixLength: view.readU8(9).unwrapOr(0),
    flags: view.readU8(10).unwrapOr(0),
  }),
  emit: (header, buffer) => {
    const view = writerFor(buffer);
    view.setUint8(0, header.family);
    view.setInt32(4, header.index, true);
    view.setUint8(8, header.prefixType);
    view.setUint8(9, header.prefixLength);
    view.setUint8(10, header.flags);
  },
  check: (header) =>
    checkHeaderFields("prefix", [
      ["family", header.family, "u8"],
      ["index", header.index, "i32"],
      ["prefixType", header.prefixType, "u8"],
      ["prefixLength", header.prefixLength, "u8"],
      ["flags", header.flags, "u8"],
    ]),
};

/** struct prefix_cacheinfo, seconds */
export interface PrefixCacheInfo {
  preferredTime: number;
  validTime: number;
}

const prefixCacheInfo = u32Struct<PrefixCacheInfo>(
  "prefix_cacheinfo",
  2,
  ([preferredTime, validTime]) => ({ preferredTime, validTime }),
  (info) => [info.preferredTime, info.validTime]
);

const prefixAddresses = scalarGroup({ address: 1 }, ipAddress);
const prefixCache = scalarGroup({ cacheInfo: 2 }, prefixCacheInfo);

export type PrefixAttribute =
  | { type: "address"; value: string }
  | { type: "cacheInfo"; value: PrefixCacheInfo }
  | UnknownAttribute;

export const prefixAttributes: AttributeContract<PrefixAttribute> = {
  family: "prefix",
  describe(attribute) {
    if (prefixAddresses.has(attribute)) return prefixAddresses.describe(attribute);
    if (prefixCache.has(attribute)) return prefixCache.describe(attribute);
    return describeUnknown(attribute);
  },
  parse(record, context) {
    const wrap = (attribute: PrefixAttribute) => attribute;
    return (
      prefixAddresses.parse(record, context, wrap) ??
      prefixCache.parse(record, context, wrap) ??
      Result.ok(unknownAttribute(record))
    );
  },
};

export type PrefixOperation = "new";

export type PrefixMessage = FamilyMessage<"prefix", PrefixOperation, PrefixHeader, PrefixAttribute>;

export const prefixFamily = defineFamily({
  tag: "prefix",
  operations: [["new", RTM_NEWPREFIX]],
  header: prefixHeader,
  attributes: prefixAttributes,
});
