/**
 * @rwtf/core — LEB128 variable-length integers
 *
 * Each byte: [C][D D D D D D D]
 *            ^  ^^^^^^^^^^^^^
 *            |  7 data bits, least significant group first
 *            continuation bit: 1 = more bytes follow
 *
 * Unsigned LEB128 carries counts and sizes (point_count, data_size,
 * encoded_data_size, string lengths). Signed LEB128 carries integer column
 * deltas; the sign is taken from bit 6 of the final byte.
 *
 * Both are capped at 10 bytes, the width of a 64-bit integer, and must be
 * minimal: a final byte that only repeats what the bytes before it already
 * imply is rejected, so every value has exactly one encoding.
 */

import { MAX_VARINT_BYTES } from './constants';
import { BoundsError, MalformedVarIntError } from './errors';

const CONT_BIT  = 0x80;
const DATA_MASK = 0x7f;
const SIGN_BIT  = 0x40;

/** Bits of data carried by the tenth byte of a 64-bit varint. */
const LAST_BYTE_BITS = 64 - 7 * (MAX_VARINT_BYTES - 1); // 1

// ─── Decoding ─────────────────────────────────────────────────────────────────

function byteAt(buffer: Uint8Array, pos: number, start: number, end: number): number {
  const byte = pos < end ? buffer[pos] : undefined;
  if (byte === undefined) {
    throw new BoundsError(start, pos - start + 1, Math.max(0, end - start), 'varint');
  }
  return byte;
}

/**
 * Decode an unsigned 64-bit LEB128 integer starting at `offset`.
 * Reads no further than `end` (default: end of buffer).
 *
 * @returns [value, offset of the first byte after the varint]
 */
export function decodeVarUint(
  buffer: Uint8Array,
  offset: number,
  end:    number = buffer.length,
): [bigint, number] {
  let result = 0n;
  for (let i = 0; i < MAX_VARINT_BYTES; i++) {
    const byte = byteAt(buffer, offset + i, offset, end);
    if (i === MAX_VARINT_BYTES - 1 && (byte & DATA_MASK) >> LAST_BYTE_BITS !== 0) {
      throw new MalformedVarIntError(offset, 'value exceeds 64 bits');
    }
    result |= BigInt(byte & DATA_MASK) << BigInt(7 * i);
    if ((byte & CONT_BIT) === 0) {
      if (i > 0 && byte === 0) throw new MalformedVarIntError(offset, 'overlong encoding');
      return [result, offset + i + 1];
    }
  }
  throw new MalformedVarIntError(
    offset,
    `continuation bit still set after ${MAX_VARINT_BYTES} bytes`,
  );
}

/**
 * Decode an unsigned varint that is used as a count or byte length.
 * Values beyond Number.MAX_SAFE_INTEGER cannot describe any real buffer and
 * fail as a bounds error.
 */
export function decodeVarSize(
  buffer: Uint8Array,
  offset: number,
  end:    number = buffer.length,
): [number, number] {
  const [value, next] = decodeVarUint(buffer, offset, end);
  if (value > BigInt(Number.MAX_SAFE_INTEGER)) {
    throw new BoundsError(offset, Number.MAX_SAFE_INTEGER, end - offset, `size ${value}`);
  }
  return [Number(value), next];
}

/**
 * Decode a signed 64-bit LEB128 integer starting at `offset`.
 *
 * @returns [value, offset of the first byte after the varint]
 */
export function decodeVarInt(
  buffer: Uint8Array,
  offset: number,
  end:    number = buffer.length,
): [bigint, number] {
  let result = 0n;
  for (let i = 0; i < MAX_VARINT_BYTES; i++) {
    const prev  = i > 0 ? byteAt(buffer, offset + i - 1, offset, end) : 0;
    const byte  = byteAt(buffer, offset + i, offset, end);
    const shift = 7 * (i + 1);
    // Bits above 63 must all repeat the sign bit.
    if (i === MAX_VARINT_BYTES - 1 && (byte & DATA_MASK) !== 0 && (byte & DATA_MASK) !== DATA_MASK) {
      throw new MalformedVarIntError(offset, 'value exceeds 64 bits');
    }
    result |= BigInt(byte & DATA_MASK) << BigInt(7 * i);
    if ((byte & CONT_BIT) === 0) {
      const redundant = (byte === 0 && (prev & SIGN_BIT) === 0) || (byte === DATA_MASK && (prev & SIGN_BIT) !== 0);
      if (i > 0 && redundant) throw new MalformedVarIntError(offset, 'overlong encoding');
      if (shift < 64 && (byte & SIGN_BIT) !== 0) {
        result |= -1n << BigInt(shift); // sign-extend
      }
      return [BigInt.asIntN(64, result), offset + i + 1];
    }
  }
  throw new MalformedVarIntError(
    offset,
    `continuation bit still set after ${MAX_VARINT_BYTES} bytes`,
  );
}

// ─── Encoding ─────────────────────────────────────────────────────────────────

/** Minimal unsigned LEB128 encoding of a non-negative integer below 2^64. */
export function encodeVarUint(value: number | bigint): Uint8Array {
  let v = BigInt(value);
  if (v < 0n || v > 0xffffffffffffffffn) {
    throw new RangeError(`encodeVarUint: ${value} is outside the u64 range.`);
  }
  const out: number[] = [];
  while (v >= BigInt(CONT_BIT)) {
    out.push(Number(v & BigInt(DATA_MASK)) | CONT_BIT);
    v >>= 7n;
  }
  out.push(Number(v));
  return Uint8Array.from(out);
}

/** Minimal signed LEB128 encoding of an integer in the i64 range. */
export function encodeVarInt(value: bigint): Uint8Array {
  if (value < -(1n << 63n) || value >= 1n << 63n) {
    throw new RangeError(`encodeVarInt: ${value} is outside the i64 range.`);
  }
  const out: number[] = [];
  let v = value;
  for (;;) {
    const byte = Number(v & BigInt(DATA_MASK));
    v >>= 7n; // arithmetic shift: bigint keeps the sign
    const done = (v === 0n && (byte & SIGN_BIT) === 0) || (v === -1n && (byte & SIGN_BIT) !== 0);
    out.push(done ? byte : byte | CONT_BIT);
    if (done) return Uint8Array.from(out);
  }
}

/** Byte length of the unsigned LEB128 encoding of `value`. */
export function varUintSize(value: number | bigint): number {
  let v    = BigInt(value);
  let size = 1;
  while (v >= BigInt(CONT_BIT)) {
    size++;
    v >>= 7n;
  }
  return size;
}
