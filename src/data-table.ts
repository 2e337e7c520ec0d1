/**
 * @rwtf/core — data table codec
 *
 * The data table is laid out in two phases so that its structure can be
 * verified before any bulk data is touched:
 *
 *   ── Structure ─────────────────────────────────────────────────────────────
 *   [section_count: u8]
 *   For each section:
 *     [encoding:    u8]       ← 0x00 standard
 *     [point_count: varint]
 *     [data_size:   varint]   ← byte length of this section's body
 *     [schema]                ← see schema.ts
 *   [data_table_crc: u16]     ← CRC-16 over everything above
 *
 *   ── Bodies, in section order ──────────────────────────────────────────────
 *   For each section (exactly data_size bytes):
 *     [presence column]       ← see presence.ts
 *     [data column]*          ← one per schema field, see columns.ts
 *
 * Every body and every column is read through a cursor bounded to its
 * declared size, and the declared sizes must add up exactly: data_size =
 * presence column + Σ encoded_data_size. A reader can therefore skip any
 * section or column by length alone.
 */

import { ByteCursor, ByteSink } from './bytes';
import { checksumBytes, verifyChecksum } from './checksum';
import { encodeColumn, readColumn } from './columns';
import {
  MAX_TABLE_ENTRIES,
  SECTION_ENCODING_STANDARD,
  TABLE_CHECKSUM_BYTES,
} from './constants';
import { SizeMismatchError, UnsupportedEncodingError } from './errors';
import { encodePresenceColumn, presenceColumnSize, readPresenceColumn } from './presence';
import { readRawSchema, resolveSchema, writeSchema, type RawSchema } from './schema';
import type { Column, FieldDescriptor, Schema, Section } from './types';

// ─── Options ──────────────────────────────────────────────────────────────────

export interface ReadOptions {
  /**
   * Decode only the columns with these names. Other columns are skipped by
   * their encoded_data_size without being decoded or checksummed, and are
   * left out of Section.columns. Omit to decode every column.
   */
  readonly fields?: readonly string[];
}

interface SectionHeader {
  readonly pointCount:  number;
  readonly dataSize:    number;
  readonly schema:      Schema;
  readonly columnSizes: readonly number[];
}

// ─── readDataTable ────────────────────────────────────────────────────────────

/**
 * Read the data table starting at `offset`.
 *
 * Throws (first failure wins):
 *   BoundsError, MalformedVarIntError,
 *   InvalidUtf8Error            structure cannot be parsed
 *   IntegrityError              data_table checksum
 *   UnsupportedEncodingError, UnsupportedSchemaVersionError,
 *   UnsupportedFieldTypeError   intact structure this build cannot read
 *   IntegrityError              presence or column checksum
 *   BoundsError                 a body size running past the buffer
 *   SizeMismatchError           sizes that do not add up
 */
export function readDataTable(
  bytes:   Uint8Array,
  offset:  number,
  options: ReadOptions = {},
): { sections: readonly Section[]; nextOffset: number } {
  const cursor = new ByteCursor(bytes, offset);

  // ── Phase 1: section headers and schemas ──────────────────────────────────

  const count = cursor.u8('section count');
  const raw: Array<{ encoding: number; pointCount: number; dataSize: number; schema: RawSchema }> = [];

  for (let s = 0; s < count; s++) {
    const encoding   = cursor.u8(`section ${s} encoding`);
    const pointCount = cursor.varSize();
    const dataSize   = cursor.varSize();
    raw.push({ encoding, pointCount, dataSize, schema: readRawSchema(cursor) });
  }

  const structureEnd = cursor.offset;
  verifyChecksum(
    bytes.subarray(offset, structureEnd),
    cursor.u16('data table checksum'),
    TABLE_CHECKSUM_BYTES,
    { block: 'data_table' },
  );

  // Encoding, schema version and type codes are judged only after the
  // structure checksum has passed.
  const headers = raw.map(({ encoding, pointCount, dataSize, schema }, s): SectionHeader => {
    if (encoding !== SECTION_ENCODING_STANDARD) {
      throw new UnsupportedEncodingError(encoding, s);
    }
    return { pointCount, dataSize, ...resolveSchema(schema, s) };
  });

  // ── Phase 2: section bodies ───────────────────────────────────────────────

  const wanted   = options.fields === undefined ? null : new Set(options.fields);
  const sections = headers.map((header, s) => readSectionBody(cursor, header, s, wanted));

  return { sections: Object.freeze(sections), nextOffset: cursor.offset };
}

function readSectionBody(
  cursor: ByteCursor,
  header: SectionHeader,
  s:      number,
  wanted: ReadonlySet<string> | null,
): Section {
  const { pointCount, dataSize, schema, columnSizes } = header;
  const body = cursor.sub(dataSize, `body of section ${s}`);

  const presenceSize = presenceColumnSize(pointCount, schema.fields.length);
  const bodySize     = columnSizes.reduce((sum, n) => sum + n, presenceSize);
  if (bodySize !== dataSize) {
    throw new SizeMismatchError(`body of section ${s}`, dataSize, bodySize);
  }

  const presence = readPresenceColumn(body, pointCount, schema.fields.length, s);
  const columns: Column[] = [];

  schema.fields.forEach((field, i) => {
    const column = body.sub(columnSizes[i] ?? 0, `column '${field.name}' of section ${s}`);
    if (wanted !== null && !wanted.has(field.name)) return;
    columns.push(readColumn(column, field, i, presence, {
      block: 'column', section: s, field: field.name, fieldIndex: i,
    }));
  });

  const section: Section = {
    encoding: 'standard',
    pointCount,
    schema,
    columns: Object.freeze(columns),
  };
  return Object.freeze(section);
}

// ─── writeDataTable ───────────────────────────────────────────────────────────

/** Throw unless `section` carries one full-length column per schema field, in order. */
function checkSection(section: Section, s: number): void {
  const { pointCount, schema, columns } = section;

  if (!Number.isSafeInteger(pointCount) || pointCount < 0) {
    throw new RangeError(`Section ${s}: pointCount must be a non-negative integer; got ${pointCount}.`);
  }
  if (section.encoding !== 'standard') {
    throw new TypeError(`Section ${s}: unsupported encoding '${String(section.encoding)}'.`);
  }
  if (columns.length !== schema.fields.length) {
    throw new TypeError(
      `Section ${s}: ${schema.fields.length} schema field(s) but ${columns.length} column(s). ` +
      `A section read with a field projection cannot be written.`,
    );
  }

  schema.fields.forEach((field, i) => {
    const column = columns[i];
    if (column === undefined || column.name !== field.name || column.type !== field.type) {
      throw new TypeError(
        `Section ${s}: column ${i} must be '${field.name}' (${field.type}); ` +
        `got ${column === undefined ? 'nothing' : `'${column.name}' (${column.type})`}.`,
      );
    }
    if (column.values.length !== pointCount) {
      throw new RangeError(
        `Section ${s}: column '${field.name}' has ${column.values.length} value(s); ` +
        `expected ${pointCount}.`,
      );
    }
  });
}

function scaleOf(field: FieldDescriptor | undefined): number {
  return field?.type === 'f64' ? field.scale : 0;
}

/**
 * Encode a data table. The exact mirror of readDataTable(): all section
 * headers and schemas, the structure checksum, then every body.
 *
 * data_size and each encoded_data_size are the lengths of the bytes actually
 * produced, so the output always satisfies the reader's size checks.
 *
 * @throws TypeError / RangeError if a section is inconsistent with its schema.
 */
export function writeDataTable(sections: readonly Section[]): Uint8Array {
  if (sections.length > MAX_TABLE_ENTRIES) {
    throw new RangeError(
      `A data table holds at most ${MAX_TABLE_ENTRIES} sections; got ${sections.length}.`,
    );
  }

  const encoded = sections.map((section, s) => {
    checkSection(section, s);
    return {
      section,
      presence: encodePresenceColumn(section.columns, section.pointCount),
      columns:  section.columns.map((column, i) => encodeColumn(column, scaleOf(section.schema.fields[i]))),
    };
  });

  const sink = new ByteSink();
  sink.u8(sections.length);

  for (const { section, presence, columns } of encoded) {
    const columnSizes = columns.map(c => c.length);
    sink.u8(SECTION_ENCODING_STANDARD);
    sink.varUint(section.pointCount);
    sink.varUint(columnSizes.reduce((sum, n) => sum + n, presence.length));
    writeSchema(sink, section.schema, columnSizes);
  }

  sink.bytes(checksumBytes(sink.since(0), TABLE_CHECKSUM_BYTES));

  for (const { presence, columns } of encoded) {
    sink.bytes(presence);
    for (const column of columns) sink.bytes(column);
  }

  return sink.finish();
}
