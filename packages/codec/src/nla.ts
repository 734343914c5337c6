/**
 * Netlink attribute (NLA) records: the 4-byte TLV header, alignment, and
 * the iterator that walks a region of attributes.
 *
 * Wire layout of one record:
 *
 *   0       2       4
 *   +-------+-------+----------------+---------+
 *   | len   | type  | payload        | padding |
 *   +-------+-------+----------------+---------+
 *
 * `len` counts the header and payload but never the padding. Bit 15 of
 * `type` is the nested flag, bit 14 the network-byte-order flag, and the
 * low 14 bits are the attribute kind.
 */

import { Result } from "better-result";
import { TlvMalformedError, type BufferTooShortError } from "@nlroute/errors";
import { ByteView, writerFor } from "./byte-view.js";

export const NLA_HEADER_LENGTH = 4;
export const NLA_ALIGNTO = 4;
export const NLA_F_NESTED = 0x8000;
export const NLA_F_NET_BYTEORDER = 0x4000;
export const NLA_TYPE_MASK = 0x3fff;
export const NLA_MAX_LENGTH = 0xffff;

/**
 * Round a length up to the next 4-byte boundary
 */
export function alignTo4(length: number): number {
  return (length + NLA_ALIGNTO - 1) & ~(NLA_ALIGNTO - 1);
}

export interface NlaTypeField {
  /** Attribute kind with both flag bits masked out */
  kind: number;
  nested: boolean;
  networkByteOrder: boolean;
}

export function splitTypeField(field: number): NlaTypeField {
  return {
    kind: field & NLA_TYPE_MASK,
    nested: (field & NLA_F_NESTED) !== 0,
    networkByteOrder: (field & NLA_F_NET_BYTEORDER) !== 0,
  };
}

export function joinTypeField(type: NlaTypeField): number {
  let field = type.kind & NLA_TYPE_MASK;
  if (type.nested) field |= NLA_F_NESTED;
  if (type.networkByteOrder) field |= NLA_F_NET_BYTEORDER;
  return field;
}

/**
 * One attribute as found on the wire
 */
export interface NlaRecord extends NlaTypeField {
  /** Offset of the record header within its region */
  offset: number;
  /** Declared length, header included */
  length: number;
  payload: ByteView;
}

export type NlaIteratorError = TlvMalformedError | BufferTooShortError;

export type NlaIteratorState =
  | { status: "positioned"; offset: number }
  | { status: "exhausted" }
  | { status: "failed"; error: NlaIteratorError };

/**
 * Walks a region as a sequence of attribute records.
 *
 * States:
 * - positioned: the next record starts at `offset`
 * - exhausted: fewer than 4 bytes remain, normal end
 * - failed: a record broke the length rules; the error is yielded once
 *
 * @example
 * ```ts
 * for (const record of new NlaIterator(region)) {
 *   if (record.isErr()) return Result.err(record.error);
 *   console.log(record.unwrap().kind);
 * }
 * ```
 */
export class NlaIterator implements IterableIterator<Result<NlaRecord, NlaIteratorError>> {
  private state: NlaIteratorState = { status: "positioned", offset: 0 };
  private reported = false;

  constructor(private readonly region: ByteView) {}

  getState(): NlaIteratorState["status"] {
    return this.state.status;
  }

  next(): IteratorResult<Result<NlaRecord, NlaIteratorError>, undefined> {
    if (this.state.status === "failed") {
      if (this.reported) {
        return { done: true, value: undefined };
      }
      this.reported = true;
      return { done: false, value: Result.err(this.state.error) };
    }

    if (this.state.status === "exhausted") {
      return { done: true, value: undefined };
    }

    const offset = this.state.offset;
    if (this.region.length - offset < NLA_HEADER_LENGTH) {
      this.state = { status: "exhausted" };
      return { done: true, value: undefined };
    }

    const record = this.readRecord(offset);
    if (record.isErr()) {
      this.state = { status: "failed", error: record.error };
      return this.next();
    }

    const found = record.unwrap();
    this.state = { status: "positioned", offset: offset + alignTo4(found.length) };
    return { done: false, value: Result.ok(found) };
  }

  [Symbol.iterator](): IterableIterator<Result<NlaRecord, NlaIteratorError>> {
    return this;
  }

  private readRecord(offset: number): Result<NlaRecord, NlaIteratorError> {
    const lengthResult = this.region.readU16(offset);
    if (lengthResult.isErr()) {
      return Result.err(lengthResult.error);
    }
    const typeResult = this.region.readU16(offset + 2);
    if (typeResult.isErr()) {
      return Result.err(typeResult.error);
    }

    const length = lengthResult.unwrap();
    const available = this.region.length - offset;

    if (length < NLA_HEADER_LENGTH) {
      return Result.err(
        new TlvMalformedError({
          message: `Attribute at offset ${offset} declares length ${length}, below the ${NLA_HEADER_LENGTH}-byte header`,
          offset,
          declaredLength: length,
          available,
        })
      );
    }

    if (alignTo4(length) > available) {
      return Result.err(
        new TlvMalformedError({
          message: `Attribute at offset ${offset} declares length ${length} but only ${available} bytes remain`,
          offset,
          declaredLength: length,
          available,
        })
      );
    }

    const payload = this.region.slice(offset + NLA_HEADER_LENGTH, length - NLA_HEADER_LENGTH);
    if (payload.isErr()) {
      return Result.err(payload.error);
    }

    return Result.ok({
      ...splitTypeField(typeResult.unwrap()),
      offset,
      length,
      payload: payload.unwrap(),
    });
  }
}

/**
 * Write a 4-byte attribute header at `offset`
 */
export function emitNlaHeader(
  buffer: Uint8Array,
  offset: number,
  length: number,
  type: NlaTypeField
): void {
  const view = writerFor(buffer);
  view.setUint16(offset, length, true); // nla_len
  view.setUint16(offset + 2, joinTypeField(type), true); // nla_type
}
