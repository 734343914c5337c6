/**
 * Attribute Set Codec: an ordered list of attributes to and from a region
 * of TLV records.
 */

import { Result } from "better-result";
import {
  AttributeEncodeError,
  NestingTooDeepError,
  type DecodeError,
} from "@nlroute/errors";
import type { ByteView } from "./byte-view.js";
import type {
  AttributeContract,
  DecodeContext,
  NestedDescriptor,
  NlaDescriptor,
} from "./attribute.js";
import {
  NLA_HEADER_LENGTH,
  NLA_MAX_LENGTH,
  NLA_TYPE_MASK,
  NlaIterator,
  alignTo4,
  emitNlaHeader,
  type NlaRecord,
} from "./nla.js";

export const DEFAULT_MAX_NESTING_DEPTH = 32;

export function rootContext(family: string, maxDepth = DEFAULT_MAX_NESTING_DEPTH): DecodeContext {
  return { family, depth: 0, maxDepth };
}

/**
 * Decode every record in `region` through `contract`.
 *
 * All or nothing: the first malformed record or payload discards what was
 * decoded so far.
 */
export function decodeAttributes<A>(
  region: ByteView,
  contract: AttributeContract<A>,
  context: DecodeContext = rootContext(contract.family)
): Result<A[], DecodeError> {
  if (context.depth > context.maxDepth) {
    return Result.err(
      new NestingTooDeepError({
        message: `Nested attributes exceed the depth limit of ${context.maxDepth}`,
        depth: context.depth,
        maxDepth: context.maxDepth,
      })
    );
  }

  const attributes: A[] = [];
  for (const record of new NlaIterator(region)) {
    if (record.isErr()) {
      return Result.err(record.error);
    }
    const parsed = contract.parse(record.unwrap(), context);
    if (parsed.isErr()) {
      return Result.err(parsed.error);
    }
    attributes.push(parsed.unwrap());
  }
  return Result.ok(attributes);
}

/**
 * Decode a known nested attribute: its payload is decoded one level deeper
 * with the child catalog, then wrapped into the parent's variant
 */
export function parseNested<N, A>(
  record: NlaRecord,
  context: DecodeContext,
  contract: AttributeContract<N>,
  wrap: (attributes: N[]) => A
): Result<A, DecodeError> {
  const children = decodeAttributes(record.payload, contract, {
    family: contract.family,
    depth: context.depth + 1,
    maxDepth: context.maxDepth,
  });
  if (children.isErr()) {
    return Result.err(children.error);
  }
  return Result.ok(wrap(children.unwrap()));
}

/**
 * Descriptor for a nested attribute; emitted with the nested flag set
 */
export function nested<N>(
  kind: number,
  contract: AttributeContract<N>,
  attributes: readonly N[]
): NestedDescriptor {
  return { shape: "nested", kind, contract, attributes };
}

function payloadLength(descriptor: NlaDescriptor): number {
  if (descriptor.shape === "leaf") {
    return descriptor.length();
  }
  return attributesLength(descriptor.attributes, descriptor.contract);
}

/**
 * Bytes the list occupies on the wire, padding included
 */
export function attributesLength<A>(
  attributes: readonly A[],
  contract: AttributeContract<A>
): number {
  let total = 0;
  for (const attribute of attributes) {
    total += alignTo4(NLA_HEADER_LENGTH + payloadLength(contract.describe(attribute)));
  }
  return total;
}

/**
 * Check that every attribute, nested ones included, can be written as
 * given
 */
export function validateAttributes<A>(
  attributes: readonly A[],
  contract: AttributeContract<A>
): Result<void, AttributeEncodeError> {
  for (const attribute of attributes) {
    const descriptor = contract.describe(attribute);
    const fail = (reason: string) =>
      Result.err(
        new AttributeEncodeError({
          message: `Cannot encode ${contract.family} attribute ${descriptor.kind}: ${reason}`,
          family: contract.family,
          kind: descriptor.kind,
          reason,
        })
      );

    if (!Number.isInteger(descriptor.kind) || descriptor.kind < 0 || descriptor.kind > NLA_TYPE_MASK) {
      return fail(`kind must be within 0..${NLA_TYPE_MASK}`);
    }

    if (descriptor.shape === "leaf") {
      const reason = descriptor.check();
      if (reason) {
        return fail(reason);
      }
    } else {
      const children = validateAttributes(descriptor.attributes, descriptor.contract);
      if (children.isErr()) {
        return Result.err(children.error);
      }
    }

    const length = NLA_HEADER_LENGTH + payloadLength(descriptor);
    if (length > NLA_MAX_LENGTH) {
      return fail(`attribute is ${length} bytes, above the ${NLA_MAX_LENGTH}-byte limit`);
    }
  }
  return Result.ok(undefined);
}

/**
 * Write the list at `offset`; returns the offset just past it. The caller
 * supplies a zeroed buffer of at least `attributesLength` bytes, so padding
 * is already zero.
 */
export function emitAttributes<A>(
  attributes: readonly A[],
  contract: AttributeContract<A>,
  buffer: Uint8Array,
  offset = 0
): number {
  let cursor = offset;
  for (const attribute of attributes) {
    const descriptor = contract.describe(attribute);
    const length = NLA_HEADER_LENGTH + payloadLength(descriptor);
    const payloadStart = cursor + NLA_HEADER_LENGTH;

    if (descriptor.shape === "leaf") {
      emitNlaHeader(buffer, cursor, length, descriptor);
      descriptor.emit(buffer.subarray(payloadStart, cursor + length));
    } else {
      emitNlaHeader(buffer, cursor, length, {
        kind: descriptor.kind,
        nested: true,
        networkByteOrder: false,
      });
      emitAttributes(descriptor.attributes, descriptor.contract, buffer, payloadStart);
    }

    cursor += alignTo4(length);
  }
  return cursor;
}

/**
 * Encode the list into a fresh buffer
 */
export function encodeAttributes<A>(
  attributes: readonly A[],
  contract: AttributeContract<A>
): Result<Uint8Array, AttributeEncodeError> {
  const valid = validateAttributes(attributes, contract);
  if (valid.isErr()) {
    return Result.err(valid.error);
  }

  const buffer = new Uint8Array(attributesLength(attributes, contract));
  emitAttributes(attributes, contract, buffer);
  return Result.ok(buffer);
}
