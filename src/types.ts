/**
 * @rwtf/core — type definitions
 *
 * The bytes are the truth; these types are the decoded lens onto them.
 * Every value the reader hands out is frozen.
 */

// ─── Field Types ──────────────────────────────────────────────────────────────

/**
 * Supported column types in a section schema.
 *
 * i64:        Signed 64-bit integers, delta-encoded as signed LEB128 against
 *             the previous present value. Decoded as bigint.
 * f64:        Fixed-point numbers. Stored as round(value × 10^scale) and
 *             delta-encoded exactly like i64. Decoded as number.
 * u64:        Unsigned 64-bit integers, delta-encoded like i64 with unsigned
 *             wrap-around. Decoded as bigint.
 * string:     UTF-8 text, one [len: varint][bytes] run per present point.
 * bool:       One byte per present point, 0x00 or 0x01.
 * bool_array: [count: varint] then one 0x00/0x01 byte per element.
 * u64_array:  [count: varint] then one unsigned LEB128 per element.
 * bytes:      Opaque byte strings, same physical layout as string.
 */
export type FieldType =
  | 'i64' | 'f64' | 'u64'
  | 'string' | 'bool'
  | 'bool_array' | 'u64_array' | 'bytes';

/** Wire codes for each FieldType. Code 0x03 and codes from 0x09 up are reserved. */
export const FIELD_TYPE_CODES: Readonly<Record<FieldType, number>> = {
  i64:        0x00,
  f64:        0x01,
  u64:        0x02,
  string:     0x04,
  bool:       0x05,
  bool_array: 0x06,
  u64_array:  0x07,
  bytes:      0x08,
};

/** Decoded value of a present point, keyed by field type. */
export interface FieldValueMap {
  i64:        bigint;
  f64:        number;
  u64:        bigint;
  string:     string;
  bool:       boolean;
  bool_array: readonly boolean[];
  u64_array:  readonly bigint[];
  bytes:      Uint8Array;
}

export type FieldValue = FieldValueMap[FieldType];

// ─── Schema ───────────────────────────────────────────────────────────────────

/** f64 fields also carry their decimal scale (0–255). */
export type FieldDescriptor =
  | { readonly name: string; readonly type: Exclude<FieldType, 'f64'> }
  | { readonly name: string; readonly type: 'f64'; readonly scale: number };

/**
 * A section schema. Field order is significant: it is the bit order of the
 * presence bitmap and the order of the data columns.
 */
export interface Schema {
  readonly fields: readonly FieldDescriptor[];
}

// ─── Columns ──────────────────────────────────────────────────────────────────

/**
 * One decoded column. `values[p]` is the value at point p, or null when the
 * presence bitmap marks the field absent there. null is never used for a
 * present value, so absent is distinct from 0n, '', false and an empty array.
 */
export type Column = {
  [T in FieldType]: {
    readonly name:   string;
    readonly type:   T;
    readonly values: readonly (FieldValueMap[T] | null)[];
  };
}[FieldType];

// ─── Sections ─────────────────────────────────────────────────────────────────

/** Only the standard encoding exists in file version 1. */
export type SectionEncoding = 'standard';

export interface Section {
  readonly encoding:   SectionEncoding;
  readonly pointCount: number;
  readonly schema:     Schema;
  /**
   * One column per schema field, in schema order. When the section was read
   * with a field projection only the projected columns are present.
   */
  readonly columns:    readonly Column[];
}

// ─── Metadata ─────────────────────────────────────────────────────────────────

export type TrackType = 'trip' | 'route' | 'segment';

export const TRACK_TYPE_CODES: Readonly<Record<TrackType, number>> = {
  trip:    0x00,
  route:   0x01,
  segment: 0x02,
};

/**
 * A metadata table entry.
 *
 * track_type: what the track records and the id of the object it belongs to.
 * unknown:    an entry this build cannot interpret. Kept byte for byte so a
 *             track written by a newer producer survives a read/write cycle.
 */
export type MetadataEntry =
  | { readonly kind: 'track_type'; readonly value: TrackType; readonly segmentId: number }
  | { readonly kind: 'unknown';    readonly entryType: number; readonly payload: Uint8Array };

// ─── Header ───────────────────────────────────────────────────────────────────

export interface TrackHeader {
  readonly fileVersion:         number;
  readonly creatorVersion:      number;
  /** Absolute byte offset of the metadata table. */
  readonly metadataTableOffset: number;
  /** Absolute byte offset of the data table. */
  readonly dataTableOffset:     number;
}

// ─── Track ────────────────────────────────────────────────────────────────────

/** Everything needed to serialise a track. */
export interface TrackContent {
  readonly creatorVersion?: number;
  readonly metadata:        readonly MetadataEntry[];
  readonly sections:        readonly Section[];
}

// ─── Block locations ──────────────────────────────────────────────────────────

/**
 * Identifies a checksummed block, so an integrity failure names the block
 * that is damaged rather than the whole track.
 */
export type BlockLocation =
  | { readonly block: 'header' }
  | { readonly block: 'metadata_table' }
  | { readonly block: 'data_table' }
  | { readonly block: 'presence'; readonly section: number }
  | { readonly block: 'column';   readonly section: number; readonly field: string; readonly fieldIndex: number };
