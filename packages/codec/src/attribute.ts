/**
 * The attribute contract every family catalog implements, plus the opaque
 * fallback that keeps unrecognized attributes byte-for-byte.
 */

import { Result } from "better-result";
import { AttributeDecodeFailedError, type DecodeError } from "@nlroute/errors";
import type { NlaRecord } from "./nla.js";
import type { ValueCodec } from "./values.js";

/**
 * An attribute the catalog does not know. Keeps the flag bits it arrived
 * with so that re-emitting reproduces the same type field.
 */
export interface UnknownAttribute {
  readonly type: "unknown";
  kind: number;
  nested: boolean;
  networkByteOrder: boolean;
  value: Uint8Array;
}

export interface DecodeContext {
  /** Family name used in error reports */
  family: string;
  /** 0 for a message's top-level attributes */
  depth: number;
  maxDepth: number;
}

/**
 * How to write one leaf attribute
 */
export interface LeafDescriptor {
  readonly shape: "leaf";
  kind: number;
  nested: boolean;
  networkByteOrder: boolean;
  length(): number;
  emit(buffer: Uint8Array): void;
  check(): string | undefined;
}

/**
 * How to write one attribute whose payload is itself a list of attributes
 */
export interface NestedDescriptor {
  readonly shape: "nested";
  kind: number;
  contract: AttributeContract<unknown>;
  attributes: readonly unknown[];
}

export type NlaDescriptor = LeafDescriptor | NestedDescriptor;

/**
 * Implemented once per attribute catalog.
 *
 * `parse` must be total over attribute kinds: unknown kinds become an
 * UnknownAttribute, and only a malformed payload of a known kind is an
 * error.
 */
export interface AttributeContract<A> {
  readonly family: string;
  describe(attribute: A): NlaDescriptor;
  parse(record: NlaRecord, context: DecodeContext): Result<A, DecodeError>;
}

/**
 * Copy a record into an UnknownAttribute
 */
export function unknownAttribute(record: NlaRecord): UnknownAttribute {
  return {
    type: "unknown",
    kind: record.kind,
    nested: record.nested,
    networkByteOrder: record.networkByteOrder,
    value: record.payload.toBytes(),
  };
}

export function describeUnknown(attribute: UnknownAttribute): LeafDescriptor {
  return {
    shape: "leaf",
    kind: attribute.kind,
    nested: attribute.nested,
    networkByteOrder: attribute.networkByteOrder,
    length: () => attribute.value.length,
    emit: (buffer) => buffer.set(attribute.value, 0),
    check: () => undefined,
  };
}

/**
 * Descriptor for a single typed value
 */
export function scalar<T>(kind: number, codec: ValueCodec<T>, value: T): LeafDescriptor {
  return {
    shape: "leaf",
    kind,
    nested: false,
    networkByteOrder: false,
    length: () => codec.length(value),
    emit: (buffer) => codec.emit(value, buffer),
    check: () => codec.check?.(value),
  };
}

/**
 * Decode a record's payload with `codec` and wrap the value into the
 * catalog's variant
 */
export function parseScalar<T, A>(
  record: NlaRecord,
  context: DecodeContext,
  codec: ValueCodec<T>,
  wrap: (value: T) => A
): Result<A, AttributeDecodeFailedError> {
  const parsed = codec.parse(record.payload, record.networkByteOrder ? "big" : "little");
  if (parsed.isErr()) {
    return Result.err(
      new AttributeDecodeFailedError({
        message: `Invalid ${context.family} attribute ${record.kind} (${codec.description}): ${parsed.error}`,
        family: context.family,
        kind: record.kind,
        reason: parsed.error,
      })
    );
  }
  return Result.ok(wrap(parsed.unwrap()));
}

/**
 * Catalog that knows nothing: every record is kept opaque. Used for nested
 * payloads whose layout depends on something outside the attribute, such
 * as the link kind for IFLA_INFO_DATA.
 */
export function opaqueAttributes(family: string): AttributeContract<UnknownAttribute> {
  return {
    family,
    describe: describeUnknown,
    parse: (record) => Result.ok(unknownAttribute(record)),
  };
}
