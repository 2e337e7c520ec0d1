// ─── Types ────────────────────────────────────────────────────────────────────
export type {
  FieldType,
  FieldValue,
  FieldValueMap,
  FieldDescriptor,
  Schema,
  Column,
  Section,
  SectionEncoding,
  TrackType,
  MetadataEntry,
  TrackHeader,
  TrackContent,
  BlockLocation,
} from './types';

export { FIELD_TYPE_CODES, TRACK_TYPE_CODES } from './types';

// ─── Constants ────────────────────────────────────────────────────────────────
export {
  RWTF_MAGIC,
  FILE_VERSION,
  DEFAULT_CREATOR_VERSION,
  SCHEMA_VERSION,
  HEADER_SIZE,
  OFFSET_MAGIC,
  OFFSET_FILE_VERSION,
  OFFSET_CREATOR_VERSION,
  OFFSET_METADATA_TABLE_OFFSET,
  OFFSET_DATA_TABLE_OFFSET,
  OFFSET_HEADER_CRC,
  TABLE_CHECKSUM_BYTES,
  COLUMN_CHECKSUM_BYTES,
  METADATA_ENTRY_TRACK_TYPE,
  SECTION_ENCODING_STANDARD,
} from './constants';
export type { ChecksumWidth } from './constants';

// ─── Errors ───────────────────────────────────────────────────────────────────
export {
  TrackFormatError,
  InvalidMagicError,
  UnsupportedVersionError,
  UnsupportedSchemaVersionError,
  UnsupportedEncodingError,
  UnsupportedFieldTypeError,
  IntegrityError,
  HeaderCorruptError,
  BoundsError,
  MalformedVarIntError,
  SizeMismatchError,
  InvalidUtf8Error,
  NonCanonicalError,
  describeLocation,
} from './errors';

// ─── Primitives ───────────────────────────────────────────────────────────────
export { crc16, crc32, computeChecksum, verifyChecksum } from './checksum';
export {
  decodeVarUint,
  decodeVarInt,
  encodeVarUint,
  encodeVarInt,
  varUintSize,
} from './varint';

// ─── Codecs ───────────────────────────────────────────────────────────────────
export { readHeader, writeHeader } from './header';
export type { HeaderFields } from './header';
export { readMetadataTable, writeMetadataTable } from './metadata';
export { buildSchema, readSchema, writeSchema } from './schema';
export { readDataTable, writeDataTable } from './data-table';
export type { ReadOptions } from './data-table';

// ─── Reader ───────────────────────────────────────────────────────────────────
export { TrackReader, SectionView, readTrack } from './track';
export type { TrackPoint } from './track';

// ─── Writer ───────────────────────────────────────────────────────────────────
export { TrackWriter, SectionBuilder, writeTrack } from './writer';
export type { WritableValue, WritableRecord, TrackWriterOptions } from './writer';
