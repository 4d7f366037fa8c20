/**
 * LEB128 varint encoding for protobuf wire format.
 */

import { FramingError } from './errors.ts';

/** Largest byte count of a varint32. */
const MAX_VARINT32_BYTES = 5;

export interface DecodedVarint {
  value: number;
  /** Number of bytes the varint occupied. */
  length: number;
}

/** Write a varint for a non-negative JS number (no BigInt overhead). */
export function writeIntVarint(buf: Uint8Array, offset: number, value: number): number {
  let i = offset;
  while (value > 0x7f) {
    buf[i++] = (value & 0x7f) | 0x80;
    value >>>= 7;
  }
  buf[i++] = value;
  return i - offset;
}

/** Byte length of a non-negative JS number varint. */
export function intVarintSize(n: number): number {
  if (n < 0x80) return 1;
  if (n < 0x4000) return 2;
  if (n < 0x200000) return 3;
  if (n < 0x10000000) return 4;
  return 5; // up to ~4 GB, sufficient for proto field sizes
}

/**
 * Read an unsigned varint32 starting at `offset`.
 *
 * Throws FramingError when the buffer ends mid-varint, or when the encoding
 * runs past five bytes or above 2^32 - 1.
 */
export function readVarint32(buf: Uint8Array, offset: number): DecodedVarint {
  let value = 0;
  let multiplier = 1;
  for (let i = 0; i < MAX_VARINT32_BYTES; i++) {
    const byte = buf[offset + i];
    if (byte === undefined) {
      throw new FramingError(`Truncated varint at offset ${offset}`, offset);
    }
    // Multiplication instead of shifts: the fifth group would overflow int32.
    value += (byte & 0x7f) * multiplier;
    if ((byte & 0x80) === 0) {
      if (value > 0xffffffff) {
        throw new FramingError(`Varint at offset ${offset} exceeds 32 bits`, offset);
      }
      return { value, length: i + 1 };
    }
    multiplier *= 0x80;
  }
  throw new FramingError(`Varint at offset ${offset} is longer than ${MAX_VARINT32_BYTES} bytes`, offset);
}
