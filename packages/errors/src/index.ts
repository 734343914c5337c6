/* eslint-disable no-redeclare */
import { TaggedError } from "better-result";

// A read ran past the end of a byte view
export const BufferTooShortError = TaggedError("BufferTooShortError")<{
  message: string;
  offset: number;
  requested: number;
  available: number;
}>();

export type BufferTooShortError = InstanceType<typeof BufferTooShortError>;

// Fewer than 16 bytes for the netlink envelope, or a declared length below it
export const HeaderTooShortError = TaggedError("HeaderTooShortError")<{
  message: string;
  required: number;
  available: number;
}>();

export type HeaderTooShortError = InstanceType<typeof HeaderTooShortError>;

// The fixed header of a message family is incomplete
export const FamilyHeaderTooShortError = TaggedError("FamilyHeaderTooShortError")<{
  message: string;
  family: string;
  required: number;
  available: number;
}>();

export type FamilyHeaderTooShortError = InstanceType<typeof FamilyHeaderTooShortError>;

// A TLV length below 4, or one that overruns its region
export const TlvMalformedError = TaggedError("TlvMalformedError")<{
  message: string;
  offset: number;
  declaredLength: number;
  available: number;
}>();

export type TlvMalformedError = InstanceType<typeof TlvMalformedError>;

// A recognized attribute whose payload failed its structural check
export const AttributeDecodeFailedError = TaggedError("AttributeDecodeFailedError")<{
  message: string;
  family: string;
  kind: number;
  reason: string;
}>();

export type AttributeDecodeFailedError = InstanceType<typeof AttributeDecodeFailedError>;

// Nested attributes deeper than the configured limit
export const NestingTooDeepError = TaggedError("NestingTooDeepError")<{
  message: string;
  depth: number;
  maxDepth: number;
}>();

export type NestingTooDeepError = InstanceType<typeof NestingTooDeepError>;

// An attribute value that cannot be written as given
export const AttributeEncodeError = TaggedError("AttributeEncodeError")<{
  message: string;
  family: string;
  kind: number;
  reason: string;
}>();

export type AttributeEncodeError = InstanceType<typeof AttributeEncodeError>;

// A message that cannot be written as given
export const MessageEncodeError = TaggedError("MessageEncodeError")<{
  message: string;
  family: string;
  reason: string;
}>();

export type MessageEncodeError = InstanceType<typeof MessageEncodeError>;

// Configuration errors
export const ValidationError = TaggedError("ValidationError")<{
  message: string;
  field: string;
}>();

export type ValidationError = InstanceType<typeof ValidationError>;

// Everything the decode path can return
export type DecodeError =
  | BufferTooShortError
  | HeaderTooShortError
  | FamilyHeaderTooShortError
  | TlvMalformedError
  | AttributeDecodeFailedError
  | NestingTooDeepError;

// Everything the encode path can return
export type EncodeError = AttributeEncodeError | MessageEncodeError;

// Union type for all nlroute errors
export type NlrouteError = DecodeError | EncodeError | ValidationError;

/**
 * Flatten an error into log fields
 */
export function toLogFields(error: NlrouteError): Record<string, unknown> {
  switch (error._tag) {
    case "BufferTooShortError":
      return {
        error: error._tag,
        offset: error.offset,
        requested: error.requested,
        available: error.available,
      };
    case "HeaderTooShortError":
      return { error: error._tag, required: error.required, available: error.available };
    case "FamilyHeaderTooShortError":
      return {
        error: error._tag,
        family: error.family,
        required: error.required,
        available: error.available,
      };
    case "TlvMalformedError":
      return {
        error: error._tag,
        offset: error.offset,
        declaredLength: error.declaredLength,
        available: error.available,
      };
    case "AttributeDecodeFailedError":
    case "AttributeEncodeError":
      return { error: error._tag, family: error.family, kind: error.kind, reason: error.reason };
    case "NestingTooDeepError":
      return { error: error._tag, depth: error.depth, maxDepth: error.maxDepth };
    case "MessageEncodeError":
      return { error: error._tag, family: error.family, reason: error.reason };
    case "ValidationError":
    default:
      return { error: error._tag, message: error.message };
  }
}
