/**
 * The assembled codec for every family in this package
 */

import type { Result } from "better-result";
import type { DecodeError, EncodeError } from "@nlroute/errors";
import { createLogger, type Logger } from "@nlroute/logger";
import {
  DEFAULT_CODEC_CONFIG,
  MessageCodec,
  type CodecConfig,
  type UnrecognizedMessage,
} from "@nlroute/codec";
import { addressFamily, type AddressMessage } from "./address.js";
import { linkFamily, type LinkMessage } from "./link.js";
import { neighbourFamily, type NeighbourMessage } from "./neighbour.js";
import { neighbourTableFamily, type NeighbourTableMessage } from "./neighbour-table.js";
import { nsidFamily, type NsidMessage } from "./nsid.js";
import { prefixFamily, type PrefixMessage } from "./prefix.js";
import { routeFamily, type RouteMessage } from "./route.js";
import { ruleFamily, type RuleMessage } from "./rule.js";
import { tcFamily, type TcMessage } from "./tc.js";

export type RouteFamilyMessage =
  | LinkMessage
  | AddressMessage
  | RouteMessage
  | NeighbourMessage
  | RuleMessage
  | TcMessage
  | PrefixMessage
  | NeighbourTableMessage
  | NsidMessage;

export type RouteNetlinkMessage = RouteFamilyMessage | UnrecognizedMessage;

export interface RouteCodecOptions {
  /** Usually from loadCodecConfig() */
  config?: CodecConfig;
  logger?: Logger;
}

export function createRouteCodec(options: RouteCodecOptions = {}): MessageCodec<RouteFamilyMessage> {
  const config = options.config ?? DEFAULT_CODEC_CONFIG;
  const logger =
    options.logger ?? createLogger({ component: "route-codec" }, { level: config.logLevel });

  return new MessageCodec<RouteFamilyMessage>(
    [
      linkFamily,
      addressFamily,
      routeFamily,
      neighbourFamily,
      ruleFamily,
      tcFamily,
      prefixFamily,
      neighbourTableFamily,
      nsidFamily,
    ],
    { maxNestingDepth: config.maxNestingDepth, logger }
  );
}

let defaultCodec: MessageCodec<RouteFamilyMessage> | undefined;

function getDefaultCodec(): MessageCodec<RouteFamilyMessage> {
  if (!defaultCodec) {
    defaultCodec = createRouteCodec();
  }
  return defaultCodec;
}

/**
 * Decode one netlink message with the default settings
 */
export function decodeMessage(bytes: Uint8Array): Result<RouteNetlinkMessage, DecodeError> {
  return getDefaultCodec().decode(bytes);
}

export function encodeMessage(message: RouteNetlinkMessage): Result<Uint8Array, EncodeError> {
  return getDefaultCodec().encode(message);
}
