/**
 * Bounds-checked, read-only window over a byte buffer.
 *
 * Every read validates `offset + size <= length` before touching the
 * underlying DataView, and reports a BufferTooShortError instead of reading
 * out of range. Views never copy; `toBytes()` is the only way to take
 * ownership of the bytes.
 */

import { Result } from "better-result";
import { BufferTooShortError } from "@nlroute/errors";

export type ByteOrder = "little" | "big";

export class ByteView {
  private readonly data: DataView;

  private constructor(private readonly bytes: Uint8Array) {
    this.data = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }

  /**
   * Wrap a buffer without copying it
   */
  static from(bytes: Uint8Array): ByteView {
    return new ByteView(bytes);
  }

  get length(): number {
    return this.bytes.byteLength;
  }

  /**
   * A view over `length` bytes starting at `offset`
   */
  slice(offset: number, length: number): Result<ByteView, BufferTooShortError> {
    const error = this.check(offset, length);
    if (error) {
      return Result.err(error);
    }
    return Result.ok(new ByteView(this.bytes.subarray(offset, offset + length)));
  }

  /**
   * A view over everything from `offset` to the end
   */
  rest(offset: number): Result<ByteView, BufferTooShortError> {
    return this.slice(offset, this.length - offset);
  }

  readU8(offset: number): Result<number, BufferTooShortError> {
    const error = this.check(offset, 1);
    return error ? Result.err(error) : Result.ok(this.data.getUint8(offset));
  }

  readU16(offset: number, order: ByteOrder = "little"): Result<number, BufferTooShortError> {
    const error = this.check(offset, 2);
    return error ? Result.err(error) : Result.ok(this.data.getUint16(offset, order === "little"));
  }

  readU32(offset: number, order: ByteOrder = "little"): Result<number, BufferTooShortError> {
    const error = this.check(offset, 4);
    return error ? Result.err(error) : Result.ok(this.data.getUint32(offset, order === "little"));
  }

  readI32(offset: number, order: ByteOrder = "little"): Result<number, BufferTooShortError> {
    const error = this.check(offset, 4);
    return error ? Result.err(error) : Result.ok(this.data.getInt32(offset, order === "little"));
  }

  readU64(offset: number, order: ByteOrder = "little"): Result<bigint, BufferTooShortError> {
    const error = this.check(offset, 8);
    return error
      ? Result.err(error)
      : Result.ok(this.data.getBigUint64(offset, order === "little"));
  }

  /**
   * Copy the viewed bytes into a new buffer
   */
  toBytes(): Uint8Array {
    return this.bytes.slice();
  }

  private check(offset: number, size: number): BufferTooShortError | undefined {
    if (
      !Number.isInteger(offset) ||
      !Number.isInteger(size) ||
      offset < 0 ||
      size < 0 ||
      offset + size > this.length
    ) {
      return new BufferTooShortError({
        message: `Cannot read ${size} bytes at offset ${offset} from a ${this.length}-byte view`,
        offset,
        requested: size,
        available: Math.max(0, this.length - Math.max(0, offset)),
      });
    }
    return undefined;
  }
}

/**
 * DataView over an output buffer, for emitters
 */
export function writerFor(buffer: Uint8Array): DataView {
  return new DataView(buffer.buffer, buffer.byteOffset, buffer.byteLength);
}
