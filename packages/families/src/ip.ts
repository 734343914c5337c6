/**
 * IP address text and wire forms.
 *
 * Addresses travel as 4 (IPv4) or 16 (IPv6) raw bytes in network order;
 * values hold them as text ("192.0.2.1", "2001:db8::1").
 */

import { isIPv4, isIPv6 } from "node:net";
import { Result } from "better-result";
import type { ValueCodec } from "@nlroute/codec";

/**
 * Parse an IPv4 address string to a 4-byte array
 */
export function parseIPv4(ip: string): Result<Uint8Array, string> {
  if (!isIPv4(ip)) {
    return Result.err(`Invalid IPv4 address: ${ip}`);
  }
  return Result.ok(new Uint8Array(ip.split(".").map((part) => parseInt(part, 10))));
}

/**
 * Format a 4-byte array as an IPv4 address string
 */
export function formatIPv4(bytes: Uint8Array): string {
  return Array.from(bytes).join(".");
}

function hextets(part: string): number[] {
  if (part === "") {
    return [];
  }
  return part.split(":").flatMap((group) => {
    if (!group.includes(".")) {
      return [parseInt(group, 16)];
    }
    // Trailing dotted quad, as in ::ffff:192.0.2.1
    const [a, b, c, d] = group.split(".").map((octet) => parseInt(octet, 10));
    return [(a << 8) | b, (c << 8) | d];
  });
}

/**
 * Parse an IPv6 address string to a 16-byte array
 */
export function parseIPv6(ip: string): Result<Uint8Array, string> {
  if (!isIPv6(ip) || ip.includes("%")) {
    return Result.err(`Invalid IPv6 address: ${ip}`);
  }

  const halves = ip.split("::");
  const head = hextets(halves[0]);
  const groups =
    halves.length === 1
      ? head
      : [...head, ...new Array<number>(8 - head.length - hextets(halves[1]).length).fill(0), ...hextets(halves[1])];

  const bytes = new Uint8Array(16);
  groups.forEach((group, index) => {
    bytes[index * 2] = group >> 8;
    bytes[index * 2 + 1] = group & 0xff;
  });
  return Result.ok(bytes);
}

/**
 * Format a 16-byte array in the canonical compressed form: lowercase, no
 * leading zeros, the longest run of two or more zero groups as "::"
 */
export function formatIPv6(bytes: Uint8Array): string {
  const groups: number[] = [];
  for (let index = 0; index < 16; index += 2) {
    groups.push((bytes[index] << 8) | bytes[index + 1]);
  }

  let bestStart = -1;
  let bestLength = 1;
  let runStart = -1;
  groups.forEach((group, index) => {
    if (group !== 0) {
      runStart = -1;
      return;
    }
    if (runStart === -1) runStart = index;
    const runLength = index - runStart + 1;
    if (runLength > bestLength) {
      bestStart = runStart;
      bestLength = runLength;
    }
  });

  const hex = groups.map((group) => group.toString(16));
  if (bestStart === -1) {
    return hex.join(":");
  }
  return `${hex.slice(0, bestStart).join(":")}::${hex.slice(bestStart + bestLength).join(":")}`;
}

export function parseIP(ip: string): Result<Uint8Array, string> {
  return ip.includes(":") ? parseIPv6(ip) : parseIPv4(ip);
}

export function isIPLength(length: number): boolean {
  return length === 4 || length === 16;
}

export function formatIP(bytes: Uint8Array): Result<string, string> {
  if (!isIPLength(bytes.length)) {
    return Result.err(`expected 4 or 16 bytes, got ${bytes.length}`);
  }
  return Result.ok(bytes.length === 4 ? formatIPv4(bytes) : formatIPv6(bytes));
}

/**
 * IPv4 or IPv6 address; the payload length picks the version
 */
export const ipAddress: ValueCodec<string> = {
  description: "ip",
  length: (value) => parseIP(value).unwrapOr(new Uint8Array(0)).length,
  emit: (value, buffer) => buffer.set(parseIP(value).unwrapOr(new Uint8Array(0)), 0),
  parse: (payload) => formatIP(payload.toBytes()),
  check: (value) => {
    const parsed = parseIP(value);
    if (parsed.isErr()) return parsed.error;
    const canonical = formatIP(parsed.unwrap()).unwrapOr(value);
    return canonical === value ? undefined : `not in canonical form: ${value} (${canonical})`;
  },
};
