/**
 * @rwtf/core — metadata table codec
 *
 * Wire format (all values little-endian):
 *
 *   [entry_count: u8]
 *   For each entry:
 *     [entry_type: u8]
 *     [entry_size: u16]        ← payload length; lets a reader skip any entry
 *     [payload:    entry_size bytes]
 *   [table_crc: u16]           ← CRC-16 over entry_count and every entry
 *
 * Known entry types:
 *
 *   0x00 track_type   [track_type_code: u8][segment_id: u32]
 *
 * Entry types this build does not know are not an error. They are surfaced as
 * { kind: 'unknown' } with their raw payload and written back unchanged, so an
 * older reader tolerates a newer writer.
 */

import { ByteCursor, ByteSink } from './bytes';
import { checksumBytes, verifyChecksum } from './checksum';
import {
  MAX_METADATA_ENTRY_SIZE,
  MAX_TABLE_ENTRIES,
  METADATA_ENTRY_TRACK_TYPE,
  TABLE_CHECKSUM_BYTES,
  TRACK_TYPE_PAYLOAD_SIZE,
} from './constants';
import { BoundsError } from './errors';
import { TRACK_TYPE_CODES, type MetadataEntry, type TrackType } from './types';

const CODE_TO_TRACK_TYPE: Readonly<Record<number, TrackType>> = {
  0x00: 'trip', 0x01: 'route', 0x02: 'segment',
};

// ─── Decoding ─────────────────────────────────────────────────────────────────

/** Interpret one entry. Anything not fully understood is kept opaque. */
function decodeEntry(entryType: number, payload: Uint8Array): MetadataEntry {
  if (entryType === METADATA_ENTRY_TRACK_TYPE && payload.length === TRACK_TYPE_PAYLOAD_SIZE) {
    const cursor = new ByteCursor(payload);
    const value  = CODE_TO_TRACK_TYPE[cursor.u8('track_type_code')];
    if (value !== undefined) {
      const entry: MetadataEntry = { kind: 'track_type', value, segmentId: cursor.u32('segment_id') };
      return Object.freeze(entry);
    }
  }
  const entry: MetadataEntry = { kind: 'unknown', entryType, payload: payload.slice() };
  return Object.freeze(entry);
}

/**
 * Read the metadata table starting at `offset`.
 *
 * @param end  Where the table's block ends, when the layout says so (the data
 *             table offset). Entries are then read no further than `end`, and
 *             an entry count or size that runs past it is checked against the
 *             checksum stored in the block's last two bytes, so a damaged
 *             count reports the table as corrupt rather than out of bounds.
 * @returns the entries in table order and the offset of the first byte after
 *          the table checksum.
 * @throws  BoundsError    if a declared entry size runs past the buffer or
 *                         the block, and the block checksum still matches
 *          IntegrityError (location `metadata_table`) on checksum mismatch
 */
export function readMetadataTable(
  bytes:  Uint8Array,
  offset: number,
  end?:   number,
): { entries: readonly MetadataEntry[]; nextOffset: number } {
  const cursor = new ByteCursor(bytes, offset, end ?? bytes.length);
  const raw: Array<{ entryType: number; payload: Uint8Array }> = [];

  try {
    const count = cursor.u8('metadata entry count');
    for (let i = 0; i < count; i++) {
      const entryType = cursor.u8(`metadata entry ${i} type`);
      const size      = cursor.u16(`metadata entry ${i} size`);
      raw.push({ entryType, payload: cursor.take(size, `metadata entry ${i} payload`) });
    }
  } catch (e) {
    if (e instanceof BoundsError && end !== undefined) verifyBlockChecksum(bytes, offset, end);
    throw e;
  }

  const tableEnd = cursor.offset;
  verifyChecksum(
    bytes.subarray(offset, tableEnd),
    cursor.u16('metadata table checksum'),
    TABLE_CHECKSUM_BYTES,
    { block: 'metadata_table' },
  );

  // Payloads are interpreted only once the table is known to be intact.
  const entries = raw.map(e => decodeEntry(e.entryType, e.payload));
  return { entries: Object.freeze(entries), nextOffset: cursor.offset };
}

/** Verify [offset, end) as a table whose checksum fills its last two bytes. */
function verifyBlockChecksum(bytes: Uint8Array, offset: number, end: number): void {
  const crcAt = end - TABLE_CHECKSUM_BYTES;
  if (crcAt <= offset) return;
  verifyChecksum(
    bytes.subarray(offset, crcAt),
    new ByteCursor(bytes, crcAt, end).u16('metadata table checksum'),
    TABLE_CHECKSUM_BYTES,
    { block: 'metadata_table' },
  );
}

// ─── Encoding ─────────────────────────────────────────────────────────────────

function encodeEntry(entry: MetadataEntry): { entryType: number; payload: Uint8Array } {
  switch (entry.kind) {
    case 'track_type': {
      if (!Number.isInteger(entry.segmentId) || entry.segmentId < 0 || entry.segmentId > 0xffffffff) {
        throw new RangeError(
          `track_type segmentId must be a u32; got ${entry.segmentId}.`,
        );
      }
      const payload = new ByteSink(TRACK_TYPE_PAYLOAD_SIZE)
        .u8(TRACK_TYPE_CODES[entry.value])
        .u32(entry.segmentId)
        .finish();
      return { entryType: METADATA_ENTRY_TRACK_TYPE, payload };
    }
    case 'unknown': {
      if (!Number.isInteger(entry.entryType) || entry.entryType < 0 || entry.entryType > 0xff) {
        throw new RangeError(`Metadata entryType must be a u8; got ${entry.entryType}.`);
      }
      return { entryType: entry.entryType, payload: entry.payload };
    }
  }
}

/**
 * Encode a metadata table, checksum included.
 *
 * @throws RangeError if there are more than 255 entries or a payload is
 *         larger than a u16 can describe.
 */
export function writeMetadataTable(entries: readonly MetadataEntry[]): Uint8Array {
  if (entries.length > MAX_TABLE_ENTRIES) {
    throw new RangeError(
      `A metadata table holds at most ${MAX_TABLE_ENTRIES} entries; got ${entries.length}.`,
    );
  }

  const sink = new ByteSink();
  sink.u8(entries.length);

  for (const entry of entries) {
    const { entryType, payload } = encodeEntry(entry);
    if (payload.length > MAX_METADATA_ENTRY_SIZE) {
      throw new RangeError(
        `Metadata entry 0x${entryType.toString(16).padStart(2, '0')} payload is ` +
        `${payload.length} bytes; entry_size is a u16 (max ${MAX_METADATA_ENTRY_SIZE}).`,
      );
    }
    sink.u8(entryType).u16(payload.length).bytes(payload);
  }

  sink.bytes(checksumBytes(sink.since(0), TABLE_CHECKSUM_BYTES));
  return sink.finish();
}
