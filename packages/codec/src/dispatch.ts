/**
 * Message dispatch: routes a buffer to the family that claims its message
 * type, and a message back to bytes.
 */

import { Result } from "better-result";
import {
  MessageEncodeError,
  toLogFields,
  type DecodeError,
  type EncodeError,
} from "@nlroute/errors";
import { createLogger, type Logger } from "@nlroute/logger";
import { ByteView } from "./byte-view.js";
import { DEFAULT_MAX_NESTING_DEPTH } from "./attribute-set.js";
import {
  NLMSG_HEADER_LENGTH,
  U32_MAX,
  decodeEnvelope,
  emitEnvelope,
  envelopeProblem,
  payloadOf,
  type EnvelopeFields,
} from "./envelope.js";
import type { AnyFamilyMessage, FamilyCodec } from "./family.js";

/**
 * A message whose type no registered family claims. The body is kept as-is
 * and re-encodes byte-for-byte.
 */
export interface UnrecognizedMessage {
  family: "unrecognized";
  messageType: number;
  envelope: EnvelopeFields;
  payload: Uint8Array;
}

export function isUnrecognized<M extends AnyFamilyMessage>(
  message: M | UnrecognizedMessage
): message is UnrecognizedMessage {
  return message.family === "unrecognized";
}

export interface MessageCodecOptions {
  /** Deepest nesting accepted for attributes (default: 32) */
  maxNestingDepth?: number;
  logger?: Logger;
}

export type BatchEntry<M> =
  | { index: number; status: "decoded"; message: M | UnrecognizedMessage }
  | { index: number; status: "failed"; error: DecodeError };

/**
 * Immutable mapping from message type to family codec.
 *
 * @example
 * ```ts
 * const codec = new MessageCodec([link, address]);
 * const decoded = codec.decode(bytes);
 * if (decoded.isOk() && !isUnrecognized(decoded.unwrap())) {
 *   console.log(decoded.unwrap().operation);
 * }
 * ```
 */
export class MessageCodec<M extends AnyFamilyMessage> {
  private readonly byType: ReadonlyMap<number, FamilyCodec<M>>;
  private readonly byTag: ReadonlyMap<string, FamilyCodec<M>>;
  private readonly maxNestingDepth: number;
  private readonly logger: Logger;

  constructor(
    private readonly families: readonly FamilyCodec<M>[],
    private readonly options: MessageCodecOptions = {}
  ) {
    const byType = new Map<number, FamilyCodec<M>>();
    const byTag = new Map<string, FamilyCodec<M>>();
    for (const family of families) {
      if (byTag.has(family.tag)) {
        throw new Error(`Family "${family.tag}" is registered twice`);
      }
      byTag.set(family.tag, family);
      for (const messageType of family.messageTypes) {
        const claimed = byType.get(messageType);
        if (claimed) {
          throw new Error(
            `Message type ${messageType} is claimed by both "${claimed.tag}" and "${family.tag}"`
          );
        }
        byType.set(messageType, family);
      }
    }

    this.byType = byType;
    this.byTag = byTag;
    this.maxNestingDepth = options.maxNestingDepth ?? DEFAULT_MAX_NESTING_DEPTH;
    this.logger = options.logger ?? createLogger({ component: "message-codec" }, { level: "warn" });
  }

  /**
   * A new codec with one more family; this one is left unchanged
   */
  register<N extends AnyFamilyMessage>(family: FamilyCodec<N>): MessageCodec<M | N> {
    const families: FamilyCodec<M | N>[] = [...this.families, family];
    return new MessageCodec<M | N>(families, this.options);
  }

  familyOf(messageType: number): string | undefined {
    return this.byType.get(messageType)?.tag;
  }

  decode(bytes: Uint8Array): Result<M | UnrecognizedMessage, DecodeError> {
    const view = ByteView.from(bytes);
    const decodedEnvelope = decodeEnvelope(view);
    if (decodedEnvelope.isErr()) {
      return Result.err(decodedEnvelope.error);
    }

    const envelope = decodedEnvelope.unwrap();
    const body = payloadOf(view, envelope);
    const family = this.byType.get(envelope.messageType);

    if (!family) {
      this.logger.debug("Unrecognized message type", {
        messageType: envelope.messageType,
        length: body.length,
      });
      const unrecognized: UnrecognizedMessage = {
        family: "unrecognized",
        messageType: envelope.messageType,
        envelope: { flags: envelope.flags, sequence: envelope.sequence, portId: envelope.portId },
        payload: body.toBytes(),
      };
      return Result.ok(unrecognized);
    }

    return family.decode(envelope, body, this.maxNestingDepth);
  }

  encode(message: M | UnrecognizedMessage): Result<Uint8Array, EncodeError> {
    if (isUnrecognized(message)) {
      return this.encodeUnrecognized(message);
    }

    const family = this.byTag.get(message.family);
    if (!family) {
      return Result.err(
        new MessageEncodeError({
          message: `No family "${message.family}" is registered`,
          family: message.family,
          reason: "family not registered",
        })
      );
    }
    return family.encode(message);
  }

  /**
   * Decode each buffer on its own; a failure is reported in its slot and
   * logged without affecting the others
   */
  decodeBatch(buffers: readonly Uint8Array[]): BatchEntry<M>[] {
    return buffers.map((bytes, index): BatchEntry<M> => {
      const decoded = this.decode(bytes);
      if (decoded.isErr()) {
        this.logger.warn("Failed to decode message", { index, ...toLogFields(decoded.error) });
        return { index, status: "failed", error: decoded.error };
      }
      return { index, status: "decoded", message: decoded.unwrap() };
    });
  }

  private encodeUnrecognized(message: UnrecognizedMessage): Result<Uint8Array, EncodeError> {
    const length = NLMSG_HEADER_LENGTH + message.payload.length;
    const { messageType } = message;
    const reason =
      !Number.isInteger(messageType) || messageType < 0 || messageType > 0xffff
        ? `message type ${messageType} is out of range`
        : length > U32_MAX
          ? `message is ${length} bytes`
          : envelopeProblem(message.envelope);
    if (reason) {
      return Result.err(
        new MessageEncodeError({
          message: `Cannot encode message type ${messageType}: ${reason}`,
          family: "unrecognized",
          reason,
        })
      );
    }

    const buffer = new Uint8Array(length);
    emitEnvelope({ ...message.envelope, length, messageType: message.messageType }, buffer);
    buffer.set(message.payload, NLMSG_HEADER_LENGTH);
    return Result.ok(buffer);
  }
}
