/**
 * @rwtf/core — layout constants
 *
 * These constants define the binary contract of an RWTF track.
 * Any change to byte offsets, magic bytes or type codes is a BREAKING CHANGE
 * requiring a bump of FILE_VERSION.
 *
 * A track is three tables laid out back to back:
 *
 *   ── Header (24 bytes, fixed) ─────────────────────────────────────────────
 *   [0..7]    magic                  8 bytes = 89 'R' 'W' 'T' 'F' 0A 1A 0A
 *   [8]       file_version           u8
 *   [9..11]   reserved
 *   [12]      creator_version        u8
 *   [13..15]  reserved
 *   [16..17]  metadata_table_offset  u16
 *   [18..19]  data_table_offset      u16
 *   [20..21]  reserved
 *   [22..23]  header_crc             u16 = CRC-16 of bytes 0–21
 *
 *   ── Metadata table (at metadata_table_offset) ────────────────────────────
 *   [entry_count: u8] { [type: u8][size: u16][payload] }* [crc: u16]
 *
 *   ── Data table (at data_table_offset) ────────────────────────────────────
 *   [section_count: u8] { section header + schema }* [crc: u16]
 *   { presence column [crc: u32], data column [crc: u32]* }*
 *
 * All multi-byte integers are little-endian.
 */

// ─── Magic & Version ──────────────────────────────────────────────────────────

/**
 * The leading high-bit byte catches 7-bit transports; the LF, SUB, LF tail
 * catches line-ending and DOS end-of-file translation.
 */
export const RWTF_MAGIC: readonly number[] = Object.freeze([
  0x89, 0x52, 0x57, 0x54, 0x46, 0x0a, 0x1a, 0x0a,
]);

/** The only file_version this build reads and writes. */
export const FILE_VERSION = 1;

/** creator_version written when the caller does not supply one. */
export const DEFAULT_CREATOR_VERSION = 0;

/** The only schema version this build understands. */
export const SCHEMA_VERSION = 0;

// ─── Header Layout ────────────────────────────────────────────────────────────

export const HEADER_SIZE = 24; // bytes

export const OFFSET_MAGIC                 =  0; // 8 bytes
export const OFFSET_FILE_VERSION          =  8; // u8 + 3 reserved
export const OFFSET_CREATOR_VERSION       = 12; // u8 + 3 reserved
export const OFFSET_METADATA_TABLE_OFFSET = 16; // u16
export const OFFSET_DATA_TABLE_OFFSET     = 18; // u16
export const OFFSET_HEADER_RESERVED       = 20; // 2 bytes
export const OFFSET_HEADER_CRC            = 22; // u16, covers bytes 0–21

// ─── Checksums ────────────────────────────────────────────────────────────────

/** Header, metadata table and data-table structure (section headers + schemas). */
export const TABLE_CHECKSUM_BYTES  = 2;
/** Presence columns and data columns. */
export const COLUMN_CHECKSUM_BYTES = 4;

export type ChecksumWidth = typeof TABLE_CHECKSUM_BYTES | typeof COLUMN_CHECKSUM_BYTES;

// ─── Metadata Table ───────────────────────────────────────────────────────────

export const METADATA_ENTRY_TRACK_TYPE = 0x00;

/** track_type payload: [track_type_code: u8][segment_id: u32] */
export const TRACK_TYPE_PAYLOAD_SIZE = 5;

/** Largest payload an entry_size u16 can describe. */
export const MAX_METADATA_ENTRY_SIZE = 0xffff;

/** entry_count and section_count are single bytes. */
export const MAX_TABLE_ENTRIES = 0xff;

// ─── Data Table ───────────────────────────────────────────────────────────────

export const SECTION_ENCODING_STANDARD = 0x00;

/** field_count is a u8. */
export const MAX_SCHEMA_FIELDS = 0xff;

/** Field names are prefixed by a u8 byte length. */
export const MAX_FIELD_NAME_BYTES = 0xff;

// ─── VarInt ───────────────────────────────────────────────────────────────────

/** ceil(64 / 7): longest LEB128 encoding of a 64-bit integer. */
export const MAX_VARINT_BYTES = 10;
