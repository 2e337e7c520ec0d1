/**
 * @rwtf/core — TrackWriter (producer)
 *
 * Builds a track from plain JavaScript values and serialises it in one pass.
 *
 * ── Layout produced ──────────────────────────────────────────────────────────
 *
 *   [header: 24 bytes]
 *   [metadata table]     ← metadata_table_offset = 24
 *   [data table]         ← data_table_offset     = 24 + metadata table length
 *
 * The tables are contiguous, reserved bytes and bits are zero and every
 * varint is minimal, so a track read and written again is byte-identical.
 *
 * ── Values ───────────────────────────────────────────────────────────────────
 *
 *   i64, u64     bigint, or a number that is a safe integer
 *   f64          number, rounded to the field's scale
 *   bool         boolean
 *   string       string
 *   bytes        Uint8Array
 *   bool_array   array of booleans
 *   u64_array    array of u64 values, each as for u64
 *
 * A field that is missing from a record, undefined or null is absent at that
 * point. Appending a point is all-or-nothing: if any value is rejected the
 * section is left unchanged.
 */

import { HEADER_SIZE } from './constants';
import { writeDataTable } from './data-table';
import { writeHeader } from './header';
import { writeMetadataTable } from './metadata';
import { checkInteger, roundToScale, type IntegerType } from './numbers';
import { buildSchema } from './schema';
import type {
  Column,
  FieldDescriptor,
  FieldType,
  FieldValueMap,
  MetadataEntry,
  Schema,
  Section,
  TrackContent,
} from './types';

// ─── Public types ─────────────────────────────────────────────────────────────

export type WritableValue =
  | bigint | number | boolean | string | Uint8Array
  | readonly (boolean | bigint | number)[]
  | null | undefined;

/**
 * One point to be written. Keys are schema field names. A key that is not in
 * the schema is a TypeError rather than being dropped.
 */
export type WritableRecord = Readonly<Record<string, WritableValue>>;

export interface TrackWriterOptions {
  /** Stored in the header's creator_version byte. Defaults to 0. */
  readonly creatorVersion?: number;
}

// ─── writeTrack ───────────────────────────────────────────────────────────────

/**
 * Serialise a complete track.
 *
 * @throws RangeError if the metadata table is so large that the data table
 *         offset no longer fits the header's u16, or on any range error from
 *         the table codecs.
 * @throws TypeError  if a section's columns disagree with its schema.
 */
export function writeTrack(content: TrackContent): Uint8Array {
  const metadata = writeMetadataTable(content.metadata);
  const data     = writeDataTable(content.sections);

  const header = writeHeader({
    creatorVersion:      content.creatorVersion,
    metadataTableOffset: HEADER_SIZE,
    dataTableOffset:     HEADER_SIZE + metadata.length,
  });

  const out = new Uint8Array(header.length + metadata.length + data.length);
  out.set(header, 0);
  out.set(metadata, header.length);
  out.set(data, header.length + metadata.length);
  return out;
}

// ─── Column buffers ───────────────────────────────────────────────────────────

type ColumnBuffer = {
  [T in FieldType]: {
    readonly name:   string;
    readonly type:   T;
    /** Decimal scale of an f64 field, 0 otherwise. */
    readonly scale:  number;
    readonly values: (FieldValueMap[T] | null)[];
  };
}[FieldType];

function createBuffer(field: FieldDescriptor): ColumnBuffer {
  const { name } = field;
  switch (field.type) {
    case 'i64':        return { name, type: 'i64',        scale: 0,           values: [] };
    case 'f64':        return { name, type: 'f64',        scale: field.scale, values: [] };
    case 'u64':        return { name, type: 'u64',        scale: 0,           values: [] };
    case 'bool':       return { name, type: 'bool',       scale: 0,           values: [] };
    case 'string':     return { name, type: 'string',     scale: 0,           values: [] };
    case 'bool_array': return { name, type: 'bool_array', scale: 0,           values: [] };
    case 'u64_array':  return { name, type: 'u64_array',  scale: 0,           values: [] };
    case 'bytes':      return { name, type: 'bytes',      scale: 0,           values: [] };
  }
}

function snapshot(buffer: ColumnBuffer): Column {
  const { name } = buffer;
  switch (buffer.type) {
    case 'i64':        return { name, type: 'i64',        values: Object.freeze(buffer.values.slice()) };
    case 'f64':        return { name, type: 'f64',        values: Object.freeze(buffer.values.slice()) };
    case 'u64':        return { name, type: 'u64',        values: Object.freeze(buffer.values.slice()) };
    case 'bool':       return { name, type: 'bool',       values: Object.freeze(buffer.values.slice()) };
    case 'string':     return { name, type: 'string',     values: Object.freeze(buffer.values.slice()) };
    case 'bool_array': return { name, type: 'bool_array', values: Object.freeze(buffer.values.slice()) };
    case 'u64_array':  return { name, type: 'u64_array',  values: Object.freeze(buffer.values.slice()) };
    case 'bytes':      return { name, type: 'bytes',      values: Object.freeze(buffer.values.slice()) };
  }
}

// ─── Value coercion ───────────────────────────────────────────────────────────

function isList(value: WritableValue): value is readonly (boolean | bigint | number)[] {
  return Array.isArray(value);
}

function kindOf(value: WritableValue): string {
  if (value instanceof Uint8Array) return 'Uint8Array';
  return isList(value) ? 'array' : typeof value;
}

function toInteger(type: IntegerType, name: string, point: number, value: WritableValue): bigint {
  let result: bigint;
  if (typeof value === 'bigint') {
    result = value;
  } else if (typeof value === 'number') {
    if (!Number.isInteger(value)) {
      throw new TypeError(`Field '${name}' (${type}) at point ${point}: ${value} is not an integer.`);
    }
    if (!Number.isSafeInteger(value)) {
      throw new RangeError(
        `Field '${name}' (${type}) at point ${point}: ${value} is beyond Number.MAX_SAFE_INTEGER; ` +
        `pass a bigint to write it exactly.`,
      );
    }
    result = BigInt(value);
  } else {
    throw new TypeError(
      `Field '${name}' (${type}) at point ${point} expects a bigint or an integer number; got ${kindOf(value)}.`,
    );
  }

  checkInteger(type, name, point, result);
  return result;
}

/**
 * Validate `value` for `buffer` and return the push that stores it. Nothing
 * is stored until every field of the point has been validated.
 */
function stage(buffer: ColumnBuffer, point: number, value: WritableValue): () => void {
  const { name } = buffer;

  if (value === undefined || value === null) {
    const values = buffer.values;
    return () => { values.push(null); };
  }

  switch (buffer.type) {
    case 'i64':
    case 'u64': {
      const values  = buffer.values;
      const integer = toInteger(buffer.type, name, point, value);
      return () => { values.push(integer); };
    }
    case 'f64': {
      if (typeof value !== 'number') {
        throw new TypeError(`Field '${name}' (f64) at point ${point} expects a number; got ${kindOf(value)}.`);
      }
      const values  = buffer.values;
      const rounded = roundToScale(value, buffer.scale, name, point);
      return () => { values.push(rounded); };
    }
    case 'bool': {
      if (typeof value !== 'boolean') {
        throw new TypeError(`Field '${name}' (bool) at point ${point} expects a boolean; got ${kindOf(value)}.`);
      }
      const values = buffer.values;
      const flag   = value;
      return () => { values.push(flag); };
    }
    case 'string': {
      if (typeof value !== 'string') {
        throw new TypeError(`Field '${name}' (string) at point ${point} expects a string; got ${kindOf(value)}.`);
      }
      const values = buffer.values;
      const text   = value;
      return () => { values.push(text); };
    }
    case 'bytes': {
      if (!(value instanceof Uint8Array)) {
        throw new TypeError(`Field '${name}' (bytes) at point ${point} expects a Uint8Array; got ${kindOf(value)}.`);
      }
      const values = buffer.values;
      const copy   = value.slice();
      return () => { values.push(copy); };
    }
    case 'bool_array': {
      if (!isList(value)) {
        throw new TypeError(`Field '${name}' (bool_array) at point ${point} expects an array; got ${kindOf(value)}.`);
      }
      const flags = value.map((element, i) => {
        if (typeof element !== 'boolean') {
          throw new TypeError(
            `Field '${name}' (bool_array) at point ${point}, element ${i} expects a boolean; got ${typeof element}.`,
          );
        }
        return element;
      });
      const values = buffer.values;
      return () => { values.push(Object.freeze(flags)); };
    }
    case 'u64_array': {
      if (!isList(value)) {
        throw new TypeError(`Field '${name}' (u64_array) at point ${point} expects an array; got ${kindOf(value)}.`);
      }
      const integers = value.map(element => toInteger('u64', name, point, element));
      const values   = buffer.values;
      return () => { values.push(Object.freeze(integers)); };
    }
  }
}

// ─── SectionBuilder ───────────────────────────────────────────────────────────

/** Accumulates the points of one section. Obtain one from TrackWriter.addSection(). */
export class SectionBuilder {
  readonly schema: Schema;

  private readonly buffers: readonly ColumnBuffer[];
  private readonly known:   ReadonlySet<string>;
  private _pointCount = 0;

  /** @internal Use TrackWriter.addSection(). */
  constructor(schema: Schema) {
    this.schema  = schema;
    this.buffers = schema.fields.map(createBuffer);
    this.known   = new Set(schema.fields.map(f => f.name));
  }

  get pointCount(): number {
    return this._pointCount;
  }

  /**
   * Append one point.
   *
   * @throws TypeError  on a key outside the schema or a value of the wrong type
   * @throws RangeError on an integer outside its field's range
   */
  appendPoint(record: WritableRecord): this {
    const point = this._pointCount;

    for (const key of Object.keys(record)) {
      if (!this.known.has(key)) {
        throw new TypeError(
          `Point ${point} has field '${key}', which is not in the section schema ` +
          `[${this.schema.fields.map(f => f.name).join(', ')}].`,
        );
      }
    }

    const commits = this.buffers.map(buffer =>
      stage(buffer, point, Object.prototype.hasOwnProperty.call(record, buffer.name) ? record[buffer.name] : undefined),
    );
    for (const commit of commits) commit();

    this._pointCount++;
    return this;
  }

  appendPoints(records: Iterable<WritableRecord>): this {
    for (const record of records) this.appendPoint(record);
    return this;
  }

  /** Snapshot of the points appended so far. */
  toSection(): Section {
    const section: Section = {
      encoding:   'standard',
      pointCount: this._pointCount,
      schema:     this.schema,
      columns:    Object.freeze(this.buffers.map(snapshot)),
    };
    return Object.freeze(section);
  }
}

// ─── TrackWriter ──────────────────────────────────────────────────────────────

/**
 * Usage:
 *   const writer = new TrackWriter();
 *   writer.addMetadata({ kind: 'track_type', value: 'trip', segmentId: 7 });
 *   writer.addSection([
 *     { name: 'time', type: 'i64' },
 *     { name: 'note', type: 'string' },
 *   ]).appendPoints([
 *     { time: 1_700_000_000n, note: 'start' },
 *     { time: 1_700_000_005n },
 *   ]);
 *   const bytes = writer.finish();
 */
export class TrackWriter {
  private readonly metadata: MetadataEntry[]  = [];
  private readonly sections: SectionBuilder[] = [];

  constructor(private readonly options: TrackWriterOptions = {}) {}

  addMetadata(entry: MetadataEntry): this {
    this.metadata.push(entry);
    return this;
  }

  /**
   * Start a new section. Sections are written in the order they are added.
   *
   * @throws TypeError on an invalid field list (see buildSchema)
   */
  addSection(fields: readonly FieldDescriptor[]): SectionBuilder {
    const builder = new SectionBuilder(buildSchema(fields));
    this.sections.push(builder);
    return builder;
  }

  /** The track as it stands, as plain content. */
  content(): TrackContent {
    return {
      creatorVersion: this.options.creatorVersion,
      metadata:       this.metadata.slice(),
      sections:       this.sections.map(s => s.toSection()),
    };
  }

  /** Serialise everything added so far. The writer stays usable. */
  finish(): Uint8Array {
    return writeTrack(this.content());
  }
}
