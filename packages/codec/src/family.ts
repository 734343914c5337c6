/**
 * Message families: one fixed header plus one attribute catalog, shared by
 * a handful of message types (RTM_NEWLINK, RTM_DELLINK, ...).
 */

import { Result } from "better-result";
import {
  MessageEncodeError,
  type DecodeError,
  type EncodeError,
} from "@nlroute/errors";
import type { ByteView } from "./byte-view.js";
import type { AttributeContract } from "./attribute.js";
import {
  attributesLength,
  decodeAttributes,
  emitAttributes,
  validateAttributes,
} from "./attribute-set.js";
import {
  NLMSG_HEADER_LENGTH,
  decodeFamilyHeader,
  emitEnvelope,
  type Envelope,
  U32_MAX,
  envelopeProblem,
  type EnvelopeFields,
  type FixedHeaderCodec,
} from "./envelope.js";

/**
 * A decoded message of one family
 */
export interface FamilyMessage<Tag extends string, Op extends string, H, A> {
  family: Tag;
  operation: Op;
  envelope: EnvelopeFields;
  header: H;
  attributes: A[];
}

export interface AnyFamilyMessage {
  family: string;
  operation: string;
  envelope: EnvelopeFields;
}

/**
 * Dump requests from iproute2 carry only the address family byte and up to
 * three bytes of padding instead of the full header. Bodies of exactly one
 * of `lengths` bytes for one of `operations` decode into `header(family)`
 * with no attributes.
 */
export interface ShortRequest<Op extends string, H> {
  operations: readonly Op[];
  lengths: readonly number[];
  header(addressFamily: number): H;
}

export interface FamilyDefinition<Tag extends string, Op extends string, H, A> {
  tag: Tag;
  /** Operation name and the message type it is sent as */
  operations: readonly (readonly [Op, number])[];
  header: FixedHeaderCodec<H>;
  attributes: AttributeContract<A>;
  shortRequest?: ShortRequest<Op, H>;
}

export interface FamilyCodec<M extends AnyFamilyMessage> {
  readonly tag: string;
  /** Every message type this family claims */
  readonly messageTypes: readonly number[];
  decode(envelope: Envelope, body: ByteView, maxDepth: number): Result<M, DecodeError>;
  encode(message: M): Result<Uint8Array, EncodeError>;
}

/**
 * Build the codec for one family.
 *
 * @example
 * ```ts
 * const nsid = defineFamily({
 *   tag: "nsid",
 *   operations: [["new", 88], ["del", 89], ["get", 90]],
 *   header: nsidHeaderCodec,
 *   attributes: nsidAttributes,
 * });
 * ```
 */
export function defineFamily<Tag extends string, Op extends string, H, A>(
  definition: FamilyDefinition<Tag, Op, H, A>
): FamilyCodec<FamilyMessage<Tag, Op, H, A>> {
  const { tag, header, attributes, shortRequest } = definition;
  const byType = new Map<number, Op>();
  const byOperation = new Map<Op, number>();
  for (const [operation, messageType] of definition.operations) {
    byType.set(messageType, operation);
    byOperation.set(operation, messageType);
  }

  const encodeError = (reason: string) =>
    Result.err(
      new MessageEncodeError({
        message: `Cannot encode ${tag} message: ${reason}`,
        family: tag,
        reason,
      })
    );

  return {
    tag,
    messageTypes: [...byType.keys()],

    decode(envelope, body, maxDepth) {
      const operation = byType.get(envelope.messageType);
      if (operation === undefined) {
        // Dispatch only routes claimed types here
        throw new Error(`${tag} family does not handle message type ${envelope.messageType}`);
      }
      const fields: EnvelopeFields = {
        flags: envelope.flags,
        sequence: envelope.sequence,
        portId: envelope.portId,
      };

      if (
        shortRequest &&
        body.length < header.length &&
        shortRequest.operations.includes(operation) &&
        shortRequest.lengths.includes(body.length)
      ) {
        return Result.ok({
          family: tag,
          operation,
          envelope: fields,
          header: shortRequest.header(body.readU8(0).unwrapOr(0)),
          attributes: [],
        });
      }

      const decodedHeader = decodeFamilyHeader(header, body, tag);
      if (decodedHeader.isErr()) {
        return Result.err(decodedHeader.error);
      }

      const region = body.rest(header.length);
      if (region.isErr()) {
        return Result.err(region.error);
      }

      const decodedAttributes = decodeAttributes(region.unwrap(), attributes, {
        family: tag,
        depth: 0,
        maxDepth,
      });
      if (decodedAttributes.isErr()) {
        return Result.err(decodedAttributes.error);
      }

      return Result.ok({
        family: tag,
        operation,
        envelope: fields,
        header: decodedHeader.unwrap(),
        attributes: decodedAttributes.unwrap(),
      });
    },

    encode(message) {
      const messageType = byOperation.get(message.operation);
      if (messageType === undefined) {
        return encodeError(`unknown operation "${message.operation}"`);
      }

      const { flags, sequence, portId } = message.envelope;
      const fieldProblem = envelopeProblem(message.envelope);
      if (fieldProblem) {
        return encodeError(fieldProblem);
      }

      const headerProblem = header.check?.(message.header);
      if (headerProblem) {
        return encodeError(headerProblem);
      }

      const valid = validateAttributes(message.attributes, attributes);
      if (valid.isErr()) {
        return Result.err(valid.error);
      }

      const length =
        NLMSG_HEADER_LENGTH + header.length + attributesLength(message.attributes, attributes);
      if (length > U32_MAX) {
        return encodeError(`message is ${length} bytes`);
      }

      const buffer = new Uint8Array(length);
      emitEnvelope({ flags, sequence, portId, length, messageType }, buffer);
      header.emit(message.header, buffer.subarray(NLMSG_HEADER_LENGTH, NLMSG_HEADER_LENGTH + header.length));
      emitAttributes(message.attributes, attributes, buffer, NLMSG_HEADER_LENGTH + header.length);
      return Result.ok(buffer);
    },
  };
}
