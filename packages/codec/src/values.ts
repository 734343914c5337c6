/**
 * Value codecs for attribute payloads.
 *
 * A ValueCodec turns one attribute payload into a typed value and back.
 * `parse` reports a short reason string on failure; the attribute layer
 * wraps it into an AttributeDecodeFailedError carrying the family and kind.
 */

import { Result } from "better-result";
import type { BufferTooShortError } from "@nlroute/errors";
import { type ByteOrder, type ByteView, writerFor } from "./byte-view.js";

export interface ValueCodec<T> {
  /** Short name used in error reasons, e.g. "u32" */
  readonly description: string;
  /** Payload length in bytes, header excluded */
  length(value: T): number;
  /** Write exactly `length(value)` bytes */
  emit(value: T, buffer: Uint8Array): void;
  parse(payload: ByteView, order: ByteOrder): Result<T, string>;
  /** Reason the value cannot be encoded, if any */
  check?(value: T): string | undefined;
}

const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder("utf-8", { fatal: true });

function expectLength(payload: ByteView, size: number): string | undefined {
  return payload.length === size ? undefined : `expected ${size} bytes, got ${payload.length}`;
}

function reasonOf<T>(read: Result<T, BufferTooShortError>): Result<T, string> {
  return read.isErr() ? Result.err(read.error.message) : Result.ok(read.unwrap());
}

function integerCheck(min: number, max: number) {
  return (value: number): string | undefined =>
    Number.isInteger(value) && value >= min && value <= max
      ? undefined
      : `${value} is outside ${min}..${max}`;
}

export const u8: ValueCodec<number> = {
  description: "u8",
  length: () => 1,
  emit: (value, buffer) => writerFor(buffer).setUint8(0, value),
  parse: (payload) => {
    const reason = expectLength(payload, 1);
    return reason ? Result.err(reason) : reasonOf(payload.readU8(0));
  },
  check: integerCheck(0, 0xff),
};

export const u16: ValueCodec<number> = {
  description: "u16",
  length: () => 2,
  emit: (value, buffer) => writerFor(buffer).setUint16(0, value, true),
  parse: (payload, order) => {
    const reason = expectLength(payload, 2);
    return reason ? Result.err(reason) : reasonOf(payload.readU16(0, order));
  },
  check: integerCheck(0, 0xffff),
};

export const u32: ValueCodec<number> = {
  description: "u32",
  length: () => 4,
  emit: (value, buffer) => writerFor(buffer).setUint32(0, value, true),
  parse: (payload, order) => {
    const reason = expectLength(payload, 4);
    return reason ? Result.err(reason) : reasonOf(payload.readU32(0, order));
  },
  check: integerCheck(0, 0xffffffff),
};

export const i32: ValueCodec<number> = {
  description: "i32",
  length: () => 4,
  emit: (value, buffer) => writerFor(buffer).setInt32(0, value, true),
  parse: (payload, order) => {
    const reason = expectLength(payload, 4);
    return reason ? Result.err(reason) : reasonOf(payload.readI32(0, order));
  },
  check: integerCheck(-0x80000000, 0x7fffffff),
};

const U64_MAX = 0xffffffffffffffffn;

export const u64: ValueCodec<bigint> = {
  description: "u64",
  length: () => 8,
  emit: (value, buffer) => writerFor(buffer).setBigUint64(0, value, true),
  parse: (payload, order) => {
    const reason = expectLength(payload, 8);
    return reason ? Result.err(reason) : reasonOf(payload.readU64(0, order));
  },
  check: (value) => (value >= 0n && value <= U64_MAX ? undefined : `${value} is outside 0..2^64-1`),
};

// Fields the kernel always sends in network byte order, flag or not
export const u16be: ValueCodec<number> = {
  description: "u16be",
  length: () => 2,
  emit: (value, buffer) => writerFor(buffer).setUint16(0, value, false),
  parse: (payload) => {
    const reason = expectLength(payload, 2);
    return reason ? Result.err(reason) : reasonOf(payload.readU16(0, "big"));
  },
  check: integerCheck(0, 0xffff),
};

export const u64be: ValueCodec<bigint> = {
  description: "u64be",
  length: () => 8,
  emit: (value, buffer) => writerFor(buffer).setBigUint64(0, value, false),
  parse: (payload) => {
    const reason = expectLength(payload, 8);
    return reason ? Result.err(reason) : reasonOf(payload.readU64(0, "big"));
  },
  check: u64.check,
};

/**
 * Presence-only attribute with an empty payload
 */
export const flag: ValueCodec<true> = {
  description: "flag",
  length: () => 0,
  emit: () => {},
  parse: (payload) => {
    const reason = expectLength(payload, 0);
    const present: true = true;
    return reason ? Result.err(reason) : Result.ok(present);
  },
};

/**
 * NUL-terminated UTF-8 string. Decoding stops at the first NUL; a payload
 * without one is taken whole. Malformed UTF-8 is an error, not U+FFFD.
 */
export const cstring: ValueCodec<string> = {
  description: "string",
  length: (value) => textEncoder.encode(value).length + 1,
  emit: (value, buffer) => {
    buffer.set(textEncoder.encode(value), 0);
    buffer[buffer.length - 1] = 0;
  },
  parse: (payload) => {
    const bytes = payload.toBytes();
    const end = bytes.indexOf(0);
    return Result.try({
      try: () => textDecoder.decode(end === -1 ? bytes : bytes.subarray(0, end)),
      catch: () => "not valid UTF-8",
    });
  },
  check: (value) => (value.includes("\0") ? "string contains a NUL byte" : undefined),
};

/**
 * Raw payload bytes of any length
 */
export const bytes: ValueCodec<Uint8Array> = {
  description: "bytes",
  length: (value) => value.length,
  emit: (value, buffer) => buffer.set(value, 0),
  parse: (payload) => Result.ok(payload.toBytes()),
};

const HARDWARE_ADDRESS_PATTERN = /^([0-9a-f]{2}(:[0-9a-f]{2})*)?$/;

/**
 * Link-layer address as lowercase colon-separated hex ("02:00:00:00:00:01").
 * Length follows the payload: 6 bytes for Ethernet, 20 for InfiniBand, etc.
 */
export const hardwareAddress: ValueCodec<string> = {
  description: "hwaddr",
  length: (value) => (value === "" ? 0 : value.split(":").length),
  emit: (value, buffer) => {
    if (value === "") return;
    value.split(":").forEach((octet, index) => {
      buffer[index] = parseInt(octet, 16);
    });
  },
  parse: (payload) =>
    Result.ok(
      Array.from(payload.toBytes())
        .map((byte) => byte.toString(16).padStart(2, "0"))
        .join(":")
    ),
  check: (value) =>
    HARDWARE_ADDRESS_PATTERN.test(value) ? undefined : `not a hardware address: ${value}`,
};

/**
 * Fixed C struct made only of u32 fields. `build` receives the words in
 * wire order and `flatten` must return them in the same order.
 */
export function u32Struct<T>(
  name: string,
  words: number,
  build: (values: number[]) => T,
  flatten: (value: T) => number[]
): ValueCodec<T> {
  const size = words * 4;
  const wordCheck = integerCheck(0, 0xffffffff);

  return {
    description: name,
    length: () => size,
    emit: (value, buffer) => {
      const view = writerFor(buffer);
      flatten(value).forEach((word, index) => view.setUint32(index * 4, word, true));
    },
    parse: (payload, order) => {
      const reason = expectLength(payload, size);
      if (reason) {
        return Result.err(reason);
      }
      const values: number[] = [];
      for (let index = 0; index < words; index++) {
        const read = payload.readU32(index * 4, order);
        if (read.isErr()) {
          return Result.err(read.error.message);
        }
        values.push(read.unwrap());
      }
      return Result.ok(build(values));
    },
    check: (value) => {
      const values = flatten(value);
      if (values.length !== words) {
        return `${name} needs ${words} words, got ${values.length}`;
      }
      for (const word of values) {
        const reason = wordCheck(word);
        if (reason) return `${name}: ${reason}`;
      }
      return undefined;
    },
  };
}
