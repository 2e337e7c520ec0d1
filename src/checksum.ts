/**
 * @rwtf/core — block checksums
 *
 * Two widths, chosen by the kind of block:
 *
 *   2 bytes  CRC-16/USB     (poly 0x8005 reflected, init 0xFFFF, xorout 0xFFFF)
 *            header, metadata table, data-table structure
 *   4 bytes  CRC-32/BZIP2   (poly 0x04C11DB7, init 0xFFFFFFFF, xorout 0xFFFFFFFF)
 *            presence columns, data columns
 *
 * Checksums are stored little-endian immediately after the bytes they cover.
 */

import {
  TABLE_CHECKSUM_BYTES,
  type ChecksumWidth,
} from './constants';
import { HeaderCorruptError, IntegrityError } from './errors';
import type { BlockLocation } from './types';

// ─── Tables ───────────────────────────────────────────────────────────────────

let crc16Table: Uint16Array | null = null;
let crc32Table: Uint32Array | null = null;

function getCRC16Table(): Uint16Array {
  if (crc16Table) return crc16Table;

  crc16Table = new Uint16Array(256);
  for (let i = 0; i < 256; i++) {
    let c = i;
    for (let j = 0; j < 8; j++) {
      c = c & 1 ? 0xa001 ^ (c >>> 1) : c >>> 1;
    }
    crc16Table[i] = c;
  }
  return crc16Table;
}

function getCRC32Table(): Uint32Array {
  if (crc32Table) return crc32Table;

  // MSB-first table: the BZIP2 variant does not reflect its input.
  crc32Table = new Uint32Array(256);
  for (let i = 0; i < 256; i++) {
    let c = i << 24;
    for (let j = 0; j < 8; j++) {
      c = c & 0x80000000 ? (c << 1) ^ 0x04c11db7 : c << 1;
    }
    crc32Table[i] = c >>> 0;
  }
  return crc32Table;
}

// ─── CRCs ─────────────────────────────────────────────────────────────────────

export function crc16(bytes: Uint8Array): number {
  const table = getCRC16Table();
  let crc = 0xffff;
  for (const byte of bytes) {
    crc = (crc >>> 8) ^ (table[(crc ^ byte) & 0xff] ?? 0);
  }
  return (crc ^ 0xffff) & 0xffff;
}

export function crc32(bytes: Uint8Array): number {
  const table = getCRC32Table();
  let crc = 0xffffffff;
  for (const byte of bytes) {
    crc = ((crc << 8) ^ (table[((crc >>> 24) ^ byte) & 0xff] ?? 0)) >>> 0;
  }
  return (crc ^ 0xffffffff) >>> 0;
}

// ─── Compute / verify ─────────────────────────────────────────────────────────

export function computeChecksum(bytes: Uint8Array, width: ChecksumWidth): number {
  return width === TABLE_CHECKSUM_BYTES ? crc16(bytes) : crc32(bytes);
}

/** Little-endian bytes of the checksum of `bytes`, ready to append. */
export function checksumBytes(bytes: Uint8Array, width: ChecksumWidth): Uint8Array {
  const value = computeChecksum(bytes, width);
  const out   = new Uint8Array(width);
  for (let i = 0; i < width; i++) {
    out[i] = (value >>> (8 * i)) & 0xff;
  }
  return out;
}

/**
 * Throw if `bytes` does not hash to `expected`.
 *
 * A header failure is raised as HeaderCorruptError; every other block as a
 * plain IntegrityError carrying the location.
 */
export function verifyChecksum(
  bytes:    Uint8Array,
  expected: number,
  width:    ChecksumWidth,
  location: BlockLocation,
): void {
  const computed = computeChecksum(bytes, width);
  if (computed === expected) return;

  if (location.block === 'header') {
    throw new HeaderCorruptError(expected, computed, width);
  }
  throw new IntegrityError(location, expected, computed, width);
}
