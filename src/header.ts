/**
 * @rwtf/core — header codec
 *
 * readHeader()   validates the fixed 24-byte header at the start of a track
 *                and returns the versions and table offsets.
 * writeHeader()  encodes the same 24 bytes, checksum last.
 *
 * Validation order is fastest-to-detect-corruption first:
 *   length → magic → header_crc → file_version → reserved bytes → table offsets
 *
 * The checksum is checked before any other field is interpreted, so a
 * flipped version or offset byte is reported as corruption, not as an
 * unsupported version.
 */

import { ByteCursor, ByteSink } from './bytes';
import { checksumBytes, verifyChecksum } from './checksum';
import {
  DEFAULT_CREATOR_VERSION,
  FILE_VERSION,
  HEADER_SIZE,
  OFFSET_CREATOR_VERSION,
  OFFSET_FILE_VERSION,
  OFFSET_HEADER_CRC,
  OFFSET_HEADER_RESERVED,
  OFFSET_MAGIC,
  OFFSET_METADATA_TABLE_OFFSET,
  RWTF_MAGIC,
  TABLE_CHECKSUM_BYTES,
} from './constants';
import { BoundsError, InvalidMagicError, NonCanonicalError, UnsupportedVersionError } from './errors';
import type { TrackHeader } from './types';

// ─── readHeader ───────────────────────────────────────────────────────────────

/**
 * Read and strictly validate the header of a track.
 *
 * Throws:
 *   BoundsError             buffer shorter than the header, or a table
 *                           offset pointing inside the header or past the end
 *   InvalidMagicError       not an RWTF track
 *   HeaderCorruptError      header checksum mismatch
 *   UnsupportedVersionError file_version other than FILE_VERSION
 *   NonCanonicalError       a reserved byte that is not zero
 */
export function readHeader(bytes: Uint8Array): TrackHeader {
  if (bytes.length < HEADER_SIZE) {
    throw new BoundsError(0, HEADER_SIZE, bytes.length, 'header');
  }

  // ── Magic ──────────────────────────────────────────────────────────────────

  const magic = bytes.subarray(OFFSET_MAGIC, OFFSET_MAGIC + RWTF_MAGIC.length);
  if (!RWTF_MAGIC.every((b, i) => magic[i] === b)) {
    throw new InvalidMagicError(magic.slice());
  }

  // ── Checksum ───────────────────────────────────────────────────────────────

  const cursor = new ByteCursor(bytes, OFFSET_HEADER_CRC, HEADER_SIZE);
  verifyChecksum(
    bytes.subarray(0, OFFSET_HEADER_CRC),
    cursor.u16('header checksum'),
    TABLE_CHECKSUM_BYTES,
    { block: 'header' },
  );

  // ── Versions ───────────────────────────────────────────────────────────────

  const fileVersion    = bytes[OFFSET_FILE_VERSION] ?? 0;
  const creatorVersion = bytes[OFFSET_CREATOR_VERSION] ?? 0;

  if (fileVersion !== FILE_VERSION) {
    throw new UnsupportedVersionError('file', fileVersion, FILE_VERSION);
  }

  // ── Reserved ───────────────────────────────────────────────────────────────

  for (const offset of RESERVED_OFFSETS) {
    const byte = bytes[offset] ?? 0;
    if (byte !== 0) {
      throw new NonCanonicalError(offset, 'header', `reserved byte is 0x${byte.toString(16).padStart(2, '0')}, not 0x00`);
    }
  }

  // ── Table offsets ──────────────────────────────────────────────────────────

  const offsets             = new ByteCursor(bytes, OFFSET_METADATA_TABLE_OFFSET, OFFSET_HEADER_CRC);
  const metadataTableOffset = offsets.u16('metadata_table_offset');
  const dataTableOffset     = offsets.u16('data_table_offset');

  checkTableOffset(metadataTableOffset, bytes.length, 'metadata table');
  checkTableOffset(dataTableOffset,     bytes.length, 'data table');

  return Object.freeze({ fileVersion, creatorVersion, metadataTableOffset, dataTableOffset });
}

const RESERVED_OFFSETS: readonly number[] = [
  OFFSET_FILE_VERSION + 1, OFFSET_FILE_VERSION + 2, OFFSET_FILE_VERSION + 3,
  OFFSET_CREATOR_VERSION + 1, OFFSET_CREATOR_VERSION + 2, OFFSET_CREATOR_VERSION + 3,
  OFFSET_HEADER_RESERVED, OFFSET_HEADER_RESERVED + 1,
];

function checkTableOffset(offset: number, length: number, what: string): void {
  if (offset < HEADER_SIZE) {
    throw new BoundsError(
      offset, HEADER_SIZE - offset, 0,
      `${what} (offset ${offset} points inside the ${HEADER_SIZE}-byte header)`,
    );
  }
  if (offset >= length) {
    throw new BoundsError(offset, 1, Math.max(0, length - offset), what);
  }
}

// ─── writeHeader ──────────────────────────────────────────────────────────────

export interface HeaderFields {
  readonly creatorVersion?:     number;
  readonly metadataTableOffset: number;
  readonly dataTableOffset:     number;
}

/**
 * Encode a header. file_version is always FILE_VERSION; reserved bytes are
 * zero.
 *
 * @throws RangeError if a version does not fit a u8 or an offset a u16.
 */
export function writeHeader(fields: HeaderFields): Uint8Array {
  const creatorVersion = fields.creatorVersion ?? DEFAULT_CREATOR_VERSION;
  checkRange('creator_version',       creatorVersion,             0xff);
  checkRange('metadata_table_offset', fields.metadataTableOffset, 0xffff);
  checkRange('data_table_offset',     fields.dataTableOffset,     0xffff);

  const sink = new ByteSink(HEADER_SIZE);
  sink.bytes(Uint8Array.from(RWTF_MAGIC));
  sink.u8(FILE_VERSION).u8(0).u8(0).u8(0);
  sink.u8(creatorVersion).u8(0).u8(0).u8(0);
  sink.u16(fields.metadataTableOffset);
  sink.u16(fields.dataTableOffset);
  sink.u16(0);
  sink.bytes(checksumBytes(sink.since(0), TABLE_CHECKSUM_BYTES));
  return sink.finish();
}

function checkRange(name: string, value: number, max: number): void {
  if (!Number.isInteger(value) || value < 0 || value > max) {
    throw new RangeError(`${name} must be an integer in [0, ${max}]; got ${value}.`);
  }
}
