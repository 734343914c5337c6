/**
 * Link messages (RTM_NEWLINK, RTM_DELLINK, RTM_GETLINK, RTM_SETLINK and the
 * alternative-name property messages): struct ifinfomsg plus IFLA_*
 * attributes.
 */

import { Result } from "better-result";
import {
  bytes,
  cstring,
  defineFamily,
  describeUnknown,
  hardwareAddress,
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
  RTM_DELLINK,
  RTM_DELLINKPROP,
  RTM_GETLINK,
  RTM_NEWLINK,
  RTM_NEWLINKPROP,
  RTM_SETLINK,
} from "./constants.js";

export interface LinkHeader {
  interfaceFamily: number;
  /** ARPHRD_* */
  linkLayerType: number;
  index: number;
  /** IFF_* */
  flags: number;
  changeMask: number;
}

export const LINK_HEADER_LENGTH = 16;

export const linkHeader: FixedHeaderCodec<LinkHeader> = {
  length: LINK_HEADER_LENGTH,
  parse: (view) => ({
    interfaceFamily: view.readU8(0).unwrapOr(0),
    linkLayerType: view.readU16(2).unwrapOr(0),
    index: view.readU32(4).unwrapOr(0),
    flags: view.readU32(8).unwrapOr(0),
    changeMask: view.readU32(12).unwrapOr(0),
  }),
  emit: (header, buffer) => {
    const view = writerFor(buffer);
    view.setUint8(0, header.interfaceFamily);
    view.setUint16(2, header.linkLayerType, true);
    view.setUint32(4, header.index, true);
    view.setUint32(8, header.flags, true);
    view.setUint32(12, header.changeMask, true);
  },
  check: (header) =>
    checkHeaderFields("link", [
      ["interfaceFamily", header.interfaceFamily, "u8"],
      ["linkLayerType", header.linkLayerType, "u16"],
      ["index", header.index, "u32"],
      ["flags", header.flags, "u32"],
      ["changeMask", header.changeMask, "u32"],
    ]),
};

// IFLA_LINKINFO children
const IFLA_INFO_DATA = 2;
const IFLA_INFO_PORT_DATA = 5;

const linkInfoStrings = scalarGroup({ kind: 1, portKind: 4 }, cstring);
const linkInfoBytes = scalarGroup({ xstats: 3 }, bytes);

/**
 * IFLA_INFO_*. The layout of `data` and `portData` depends on the link
 * kind, so both are kept as opaque attribute lists.
 */
export type LinkInfoAttribute =
  | { type: "kind" | "portKind"; value: string }
  | { type: "xstats"; value: Uint8Array }
  | { type: "data" | "portData"; value: UnknownAttribute[] }
  | UnknownAttribute;

const infoData = opaqueAttributes("linkInfoData");

export const linkInfoAttributes: AttributeContract<LinkInfoAttribute> = {
  family: "linkInfo",
  describe(attribute) {
    if (linkInfoStrings.has(attribute)) return linkInfoStrings.describe(attribute);
    if (linkInfoBytes.has(attribute)) return linkInfoBytes.describe(attribute);
    switch (attribute.type) {
      case "data":
        return nested(IFLA_INFO_DATA, infoData, attribute.value);
      case "portData":
        return nested(IFLA_INFO_PORT_DATA, infoData, attribute.value);
      case "unknown":
        return describeUnknown(attribute);
    }
  },
  parse(record, context) {
    const wrap = (attribute: LinkInfoAttribute) => attribute;
    const parsed =
      linkInfoStrings.parse(record, context, wrap) ?? linkInfoBytes.parse(record, context, wrap);
    if (parsed) return parsed;

    switch (record.kind) {
      case IFLA_INFO_DATA:
        return parseNested(record, context, infoData, (value): LinkInfoAttribute => ({ type: "data", value }));
      case IFLA_INFO_PORT_DATA:
        return parseNested(record, context, infoData, (value): LinkInfoAttribute => ({
          type: "portData",
          value,
        }));
      default:
        return Result.ok(unknownAttribute(record));
    }
  },
};

// IFLA_PROP_LIST children
const linkPropStrings = scalarGroup({ altIfname: 53 }, cstring);

export type LinkPropAttribute = { type: "altIfname"; value: string } | UnknownAttribute;

export const linkPropAttributes: AttributeContract<LinkPropAttribute> = {
  family: "linkProp",
  describe: (attribute) =>
    linkPropStrings.has(attribute) ? linkPropStrings.describe(attribute) : describeUnknown(attribute),
  parse: (record, context) =>
    linkPropStrings.parse(record, context, (attribute): LinkPropAttribute => attribute) ??
    Result.ok(unknownAttribute(record)),
};

const IFLA_LINKINFO = 18;
const IFLA_AF_SPEC = 26;
const IFLA_PROP_LIST = 52;

const linkU32 = scalarGroup(
  {
    mtu: 4,
    link: 5,
    master: 10,
    txQueueLength: 13,
    group: 27,
    promiscuity: 30,
    numTxQueues: 31,
    numRxQueues: 32,
    minMtu: 50,
    maxMtu: 51,
  },
  u32
);
const linkU8 = scalarGroup({ operState: 16, linkMode: 17, carrier: 33 }, u8);
const linkStrings = scalarGroup({ ifname: 3, qdisc: 6, ifAlias: 20 }, cstring);
const linkAddresses = scalarGroup({ address: 1, broadcast: 2, permAddress: 54 }, hardwareAddress);

const afSpec = opaqueAttributes("afSpec");

export type LinkAttribute =
  | {
      type:
        | "mtu"
        | "link"
        | "master"
        | "txQueueLength"
        | "group"
        | "promiscuity"
        | "numTxQueues"
        | "numRxQueues"
        | "minMtu"
        | "maxMtu";
      value: number;
    }
  | { type: "operState" | "linkMode" | "carrier"; value: number }
  | { type: "ifname" | "qdisc" | "ifAlias"; value: string }
  /** Link-layer addresses as colon hex */
  | { type: "address" | "broadcast" | "permAddress"; value: string }
  | { type: "linkInfo"; value: LinkInfoAttribute[] }
  | { type: "propList"; value: LinkPropAttribute[] }
  /** Per address family settings; kept opaque */
  | { type: "afSpec"; value: UnknownAttribute[] }
  | UnknownAttribute;

export const linkAttributes: AttributeContract<LinkAttribute> = {
  family: "link",
  describe(attribute) {
    if (linkU32.has(attribute)) return linkU32.describe(attribute);
    if (linkU8.has(attribute)) return linkU8.describe(attribute);
    if (linkStrings.has(attribute)) return linkStrings.describe(attribute);
    if (linkAddresses.has(attribute)) return linkAddresses.describe(attribute);
    switch (attribute.type) {
      case "linkInfo":
        return nested(IFLA_LINKINFO, linkInfoAttributes, attribute.value);
      case "propList":
        return nested(IFLA_PROP_LIST, linkPropAttributes, attribute.value);
      case "afSpec":
        return nested(IFLA_AF_SPEC, afSpec, attribute.value);
      case "unknown":
        return describeUnknown(attribute);
    }
  },
  parse(record, context) {
    const wrap = (attribute: LinkAttribute) => attribute;
    const parsed =
      linkU32.parse(record, context, wrap) ??
      linkU8.parse(record, context, wrap) ??
      linkStrings.parse(record, context, wrap) ??
      linkAddresses.parse(record, context, wrap);
    if (parsed) return parsed;

    switch (record.kind) {
      case IFLA_LINKINFO:
        return parseNested(record, context, linkInfoAttributes, (value): LinkAttribute => ({
          type: "linkInfo",
          value,
        }));
      case IFLA_PROP_LIST:
        return parseNested(record, context, linkPropAttributes, (value): LinkAttribute => ({
          type: "propList",
          value,
        }));
      case IFLA_AF_SPEC:
        return parseNested(record, context, afSpec, (value): LinkAttribute => ({ type: "afSpec", value }));
      default:
        return Result.ok(unknownAttribute(record));
    }
  },
};

export type LinkOperation = "new" | "del" | "get" | "set" | "newProp" | "delProp";

export type LinkMessage = FamilyMessage<"link", LinkOperation, LinkHeader, LinkAttribute>;

export const linkFamily = defineFamily({
  tag: "link",
  operations: [
    ["new", RTM_NEWLINK],
    ["del", RTM_DELLINK],
    ["get", RTM_GETLINK],
    ["set", RTM_SETLINK],
    ["newProp", RTM_NEWLINKPROP],
    ["delProp", RTM_DELLINKPROP],
  ],
  header: linkHeader,
  attributes: linkAttributes,
  shortRequest: {
    operations: ["get"],
    lengths: [4],
    header: (interfaceFamily) => ({
      interfaceFamily,
      linkLayerType: 0,
      index: 0,
      flags: 0,
      changeMask: 0,
    }),
  },
});
