/**
 * @nlroute/codec
 *
 * Wire-level building blocks for netlink route messages: byte views, the
 * netlink header, TLV attributes, and message dispatch.
 */

export { ByteView, writerFor, type ByteOrder } from "./byte-view.js";

export {
  NLA_ALIGNTO,
  NLA_F_NESTED,
  NLA_F_NET_BYTEORDER,
  NLA_HEADER_LENGTH,
  NLA_MAX_LENGTH,
  NLA_TYPE_MASK,
  NlaIterator,
  alignTo4,
  emitNlaHeader,
  joinTypeField,
  splitTypeField,
  type NlaIteratorError,
  type NlaIteratorState,
  type NlaRecord,
  type NlaTypeField,
} from "./nla.js";

export {
  bytes,
  cstring,
  flag,
  hardwareAddress,
  i32,
  u16,
  u16be,
  u32,
  u32Struct,
  u64,
  u64be,
  u8,
  type ValueCodec,
} from "./values.js";

export {
  describeUnknown,
  opaqueAttributes,
  parseScalar,
  scalar,
  unknownAttribute,
  type AttributeContract,
  type DecodeContext,
  type LeafDescriptor,
  type NestedDescriptor,
  type NlaDescriptor,
  type UnknownAttribute,
} from "./attribute.js";

export {
  DEFAULT_MAX_NESTING_DEPTH,
  attributesLength,
  decodeAttributes,
  emitAttributes,
  encodeAttributes,
  nested,
  parseNested,
  rootContext,
  validateAttributes,
} from "./attribute-set.js";

export {
  NLMSG_HEADER_LENGTH,
  NetlinkFlags,
  decodeEnvelope,
  decodeFamilyHeader,
  emitEnvelope,
  envelopeProblem,
  payloadOf,
  type Envelope,
  type EnvelopeFields,
  type FixedHeaderCodec,
} from "./envelope.js";

export {
  defineFamily,
  type AnyFamilyMessage,
  type FamilyCodec,
  type FamilyDefinition,
  type FamilyMessage,
  type ShortRequest,
} from "./family.js";

export {
  MessageCodec,
  isUnrecognized,
  type BatchEntry,
  type MessageCodecOptions,
  type UnrecognizedMessage,
} from "./dispatch.js";

export {
  DEFAULT_CODEC_CONFIG,
  MAX_NESTING_DEPTH_LIMIT,
  loadCodecConfig,
  parseLogLevel,
  parseMaxNestingDepth,
  type CodecConfig,
} from "./config.js";
