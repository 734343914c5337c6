/**
 * The 16-byte netlink message header (nlmsghdr) and the fixed header that
 * opens every family's body.
 */

import { Result } from "better-result";
import { BufferTooShortError, FamilyHeaderTooShortError, HeaderTooShortError } from "@nlroute/errors";
import { ByteView, writerFor } from "./byte-view.js";

export const NLMSG_HEADER_LENGTH = 16;

// nlmsg_flags
export const NetlinkFlags = {
  REQUEST: 0x01,
  MULTI: 0x02,
  ACK: 0x04,
  ECHO: 0x08,
  // GET requests
  ROOT: 0x100,
  MATCH: 0x200,
  ATOMIC: 0x400,
  DUMP: 0x300,
  // NEW requests
  REPLACE: 0x100,
  EXCL: 0x200,
  CREATE: 0x400,
  APPEND: 0x800,
} as const;

/**
 * The fields of nlmsghdr a caller controls. Length and message type are
 * derived when the message is encoded.
 */
export interface EnvelopeFields {
  flags: number;
  sequence: number;
  portId: number;
}

export const U32_MAX = 0xffffffff;

/**
 * Reason the caller-controlled fields do not fit nlmsghdr, if any
 */
export function envelopeProblem(fields: EnvelopeFields): string | undefined {
  const limits: [string, number, number][] = [
    ["flags", fields.flags, 0xffff],
    ["sequence", fields.sequence, U32_MAX],
    ["portId", fields.portId, U32_MAX],
  ];
  for (const [field, value, max] of limits) {
    if (!Number.isInteger(value) || value < 0 || value > max) {
      return `envelope ${field} ${value} is out of range`;
    }
  }
  return undefined;
}

export interface Envelope extends EnvelopeFields {
  /** As declared on the wire, at most the buffer length */
  length: number;
  messageType: number;
}

/**
 * Read the header at the start of `view`. A declared length past the end of
 * the buffer means the message was cut short.
 */
export function decodeEnvelope(
  view: ByteView
): Result<Envelope, HeaderTooShortError | BufferTooShortError> {
  if (view.length < NLMSG_HEADER_LENGTH) {
    return Result.err(
      new HeaderTooShortError({
        message: `Netlink header needs ${NLMSG_HEADER_LENGTH} bytes, got ${view.length}`,
        required: NLMSG_HEADER_LENGTH,
        available: view.length,
      })
    );
  }

  const length = view.readU32(0).unwrapOr(0);
  if (length < NLMSG_HEADER_LENGTH) {
    return Result.err(
      new HeaderTooShortError({
        message: `Netlink header declares length ${length}, below the ${NLMSG_HEADER_LENGTH}-byte header`,
        required: NLMSG_HEADER_LENGTH,
        available: length,
      })
    );
  }

  if (length > view.length) {
    return Result.err(
      new BufferTooShortError({
        message: `Netlink message declares ${length} bytes, only ${view.length} available`,
        offset: 0,
        requested: length,
        available: view.length,
      })
    );
  }

  return Result.ok({
    length,
    messageType: view.readU16(4).unwrapOr(0),
    flags: view.readU16(6).unwrapOr(0),
    sequence: view.readU32(8).unwrapOr(0),
    portId: view.readU32(12).unwrapOr(0),
  });
}

/**
 * Write the header at the start of `buffer`
 */
export function emitEnvelope(envelope: Envelope, buffer: Uint8Array): void {
  const view = writerFor(buffer);
  view.setUint32(0, envelope.length, true); // nlmsg_len
  view.setUint16(4, envelope.messageType, true); // nlmsg_type
  view.setUint16(6, envelope.flags, true); // nlmsg_flags
  view.setUint32(8, envelope.sequence, true); // nlmsg_seq
  view.setUint32(12, envelope.portId, true); // nlmsg_pid
}

/**
 * The message body: the bytes after the header, up to the declared length.
 * Trailing bytes past it are not part of the message.
 */
export function payloadOf(view: ByteView, envelope: Envelope): ByteView {
  const end = Math.min(envelope.length, view.length);
  return view.slice(NLMSG_HEADER_LENGTH, end - NLMSG_HEADER_LENGTH).unwrapOr(ByteView.from(new Uint8Array(0)));
}

/**
 * A family's fixed-size header (ifinfomsg, rtmsg, ...)
 */
export interface FixedHeaderCodec<H> {
  readonly length: number;
  /** Only called with a view of at least `length` bytes */
  parse(view: ByteView): H;
  emit(header: H, buffer: Uint8Array): void;
  /** Reason the header cannot be encoded, if any */
  check?(header: H): string | undefined;
}

export function decodeFamilyHeader<H>(
  codec: FixedHeaderCodec<H>,
  payload: ByteView,
  family: string
): Result<H, FamilyHeaderTooShortError> {
  const view = payload.slice(0, codec.length);
  if (view.isErr()) {
    return Result.err(
      new FamilyHeaderTooShortError({
        message: `The ${family} header needs ${codec.length} bytes, got ${payload.length}`,
        family,
        required: codec.length,
        available: payload.length,
      })
    );
  }
  return Result.ok(codec.parse(view.unwrap()));
}
