/**
 * @nlroute/families
 *
 * Message families of the netlink route protocol and the codec that
 * assembles them.
 */

export * from "./constants.js";
export {
  formatIP,
  formatIPv4,
  formatIPv6,
  ipAddress,
  isIPLength,
  parseIP,
  parseIPv4,
  parseIPv6,
} from "./ip.js";
export { scalarGroup, type KindTable, type ScalarGroup } from "./scalar-group.js";
export { checkHeaderFields, type FieldWidth } from "./header-fields.js";

export {
  LINK_HEADER_LENGTH,
  linkAttributes,
  linkFamily,
  linkHeader,
  linkInfoAttributes,
  linkPropAttributes,
  type LinkAttribute,
  type LinkHeader,
  type LinkInfoAttribute,
  type LinkMessage,
  type LinkOperation,
  type LinkPropAttribute,
} from "./link.js";

export {
  addressAttributes,
  addressFamily,
  addressHeader,
  type AddressAttribute,
  type AddressCacheInfo,
  type AddressHeader,
  type AddressMessage,
  type AddressOperation,
} from "./address.js";

export {
  defaultRouteHeader,
  routeAttributes,
  routeFamily,
  routeHeader,
  routeMetricAttributes,
  type RouteAttribute,
  type RouteHeader,
  type RouteMessage,
  type RouteMetric,
  type RouteOperation,
} from "./route.js";

export {
  neighbourAttributes,
  neighbourFamily,
  neighbourHeader,
  type NeighbourAttribute,
  type NeighbourCacheInfo,
  type NeighbourHeader,
  type NeighbourMessage,
  type NeighbourOperation,
} from "./neighbour.js";

export {
  ruleAttributes,
  ruleFamily,
  ruleHeader,
  type Range,
  type RuleAttribute,
  type RuleHeader,
  type RuleMessage,
  type RuleOperation,
} from "./rule.js";

export {
  TC_H_INGRESS,
  TC_H_ROOT,
  joinHandle,
  splitHandle,
  tcAttributes,
  tcFamily,
  tcHeader,
  type TcAttribute,
  type TcHandle,
  type TcHeader,
  type TcMessage,
  type TcOperation,
} from "./tc.js";

export {
  prefixAttributes,
  prefixFamily,
  prefixHeader,
  type PrefixAttribute,
  type PrefixCacheInfo,
  type PrefixHeader,
  type PrefixMessage,
  type PrefixOperation,
} from "./prefix.js";

export {
  neighbourTableAttributes,
  neighbourTableFamily,
  neighbourTableHeader,
  neighbourTableParmAttributes,
  type NeighbourTableAttribute,
  type NeighbourTableHeader,
  type NeighbourTableMessage,
  type NeighbourTableOperation,
  type NeighbourTableParm,
} from "./neighbour-table.js";

export {
  NETNSA_NSID_NOT_ASSIGNED,
  nsidAttributes,
  nsidFamily,
  nsidHeader,
  type NsidAttribute,
  type NsidHeader,
  type NsidMessage,
  type NsidOperation,
} from "./nsid.js";

export {
  createRouteCodec,
  decodeMessage,
  encodeMessage,
  type RouteCodecOptions,
  type RouteFamilyMessage,
  type RouteNetlinkMessage,
} from "./route-codec.js";
