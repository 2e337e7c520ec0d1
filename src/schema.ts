/**
 * @rwtf/core — section schema encoding and decoding
 *
 * Each section carries its own schema, stored in the data table ahead of all
 * section bodies. Wire format:
 *
 *   [schema_version: u8]          ← must be SCHEMA_VERSION (0)
 *   [field_count:    u8]
 *   For each field, in column order:
 *     [field_type:        u8]     ← FIELD_TYPE_CODES
 *     [scale:             u8]     ← f64 only: decimal places kept
 *     [name_len:          u8]
 *     [name:              name_len bytes, UTF-8]
 *     [encoded_data_size: varint] ← byte length of this field's column,
 *                                   checksum included
 *
 * encoded_data_size belongs to the column, not to the schema, so readSchema()
 * returns the sizes alongside the descriptors rather than inside them.
 *
 * The schema has no checksum of its own; it is covered by the data-table
 * checksum that follows the last section header.
 */

import { ByteCursor, ByteSink, encodeUtf8 } from './bytes';
import {
  MAX_FIELD_NAME_BYTES,
  MAX_SCHEMA_FIELDS,
  SCHEMA_VERSION,
} from './constants';
import { UnsupportedFieldTypeError, UnsupportedSchemaVersionError } from './errors';
import { MAX_F64_SCALE } from './numbers';
import {
  FIELD_TYPE_CODES,
  type FieldDescriptor,
  type FieldType,
  type Schema,
} from './types';

// ─── Type Tag Mappings ────────────────────────────────────────────────────────

const CODE_TO_TYPE: Readonly<Record<number, FieldType>> = {
  0x00: 'i64',        0x01: 'f64',       0x02: 'u64',
  0x04: 'string',     0x05: 'bool',
  0x06: 'bool_array', 0x07: 'u64_array', 0x08: 'bytes',
};

export function fieldTypeFromCode(code: number): FieldType | undefined {
  return CODE_TO_TYPE[code];
}

// ─── Decoding ─────────────────────────────────────────────────────────────────

export interface DecodedSchema {
  readonly schema:      Schema;
  /** encoded_data_size of each field's column, in field order. */
  readonly columnSizes: readonly number[];
}

interface RawField {
  readonly code:  number;
  readonly scale: number;
  readonly name:  string;
}

/**
 * A schema as it appears on the wire, before its version and type codes are
 * checked. Only the f64 code changes how a field is laid out, so the data
 * table codec can verify its checksum before deciding whether it supports
 * what it read.
 */
export interface RawSchema {
  readonly version:     number;
  readonly fields:      readonly RawField[];
  readonly columnSizes: readonly number[];
}

/** Parse one schema at the cursor position without interpreting it. */
export function readRawSchema(cursor: ByteCursor): RawSchema {
  const version     = cursor.u8('schema version');
  const fieldCount  = cursor.u8('schema field count');
  const fields:      RawField[] = [];
  const columnSizes: number[] = [];

  for (let i = 0; i < fieldCount; i++) {
    const code    = cursor.u8(`field ${i} type`);
    const scale   = code === FIELD_TYPE_CODES.f64 ? cursor.u8(`field ${i} scale`) : 0;
    const nameLen = cursor.u8(`field ${i} name length`);
    const name    = cursor.utf8(nameLen, `field ${i} name`);
    fields.push({ code, scale, name });
    columnSizes.push(cursor.varSize());
  }

  return { version, fields, columnSizes };
}

/**
 * Check a raw schema's version and type codes.
 *
 * @param section  Index of the owning section, for error messages.
 * @throws UnsupportedSchemaVersionError, UnsupportedFieldTypeError
 */
export function resolveSchema(raw: RawSchema, section: number): DecodedSchema {
  if (raw.version !== SCHEMA_VERSION) {
    throw new UnsupportedSchemaVersionError(raw.version, SCHEMA_VERSION, section);
  }

  const fields = raw.fields.map(({ code, scale, name }): FieldDescriptor => {
    const type = fieldTypeFromCode(code);
    if (type === undefined) throw new UnsupportedFieldTypeError(code, name);
    return Object.freeze(type === 'f64' ? { name, type, scale } : { name, type });
  });

  return {
    schema:      Object.freeze({ fields: Object.freeze(fields) }),
    columnSizes: Object.freeze(raw.columnSizes.slice()),
  };
}

/**
 * Decode one schema at the cursor position.
 *
 * @throws UnsupportedSchemaVersionError, UnsupportedFieldTypeError,
 *         BoundsError, MalformedVarIntError, InvalidUtf8Error
 */
export function readSchema(cursor: ByteCursor, section: number): DecodedSchema {
  return resolveSchema(readRawSchema(cursor), section);
}

// ─── Encoding ─────────────────────────────────────────────────────────────────

/**
 * Append a schema to `sink`. `columnSizes[i]` is the already-measured byte
 * length of field i's encoded column.
 */
export function writeSchema(
  sink:        ByteSink,
  schema:      Schema,
  columnSizes: readonly number[],
): void {
  if (columnSizes.length !== schema.fields.length) {
    throw new RangeError(
      `writeSchema: ${schema.fields.length} field(s) but ${columnSizes.length} column size(s).`,
    );
  }

  if (schema.fields.length > MAX_SCHEMA_FIELDS) {
    throw new RangeError(
      `writeSchema: field_count is a u8 (max ${MAX_SCHEMA_FIELDS}); got ${schema.fields.length}.`,
    );
  }

  sink.u8(SCHEMA_VERSION);
  sink.u8(schema.fields.length);

  schema.fields.forEach((field, i) => {
    const name = encodeUtf8(field.name);
    if (name.length > MAX_FIELD_NAME_BYTES) {
      throw new RangeError(
        `writeSchema: field name '${field.name.slice(0, 32)}…' is ${name.length} UTF-8 bytes; ` +
        `the maximum is ${MAX_FIELD_NAME_BYTES}.`,
      );
    }
    sink.u8(FIELD_TYPE_CODES[field.type]);
    if (field.type === 'f64') sink.u8(field.scale);
    sink.u8(name.length);
    sink.bytes(name);
    sink.varUint(columnSizes[i] ?? 0);
  });
}

// ─── Schema Builder ───────────────────────────────────────────────────────────

/**
 * Build a validated Schema from a list of field definitions.
 *
 * Usage:
 *   const schema = buildSchema([
 *     { name: 'time',      type: 'i64' },
 *     { name: 'latitude',  type: 'f64', scale: 7 },
 *     { name: 'moving',    type: 'bool' },
 *     { name: 'note',      type: 'string' },
 *   ]);
 *
 * @throws TypeError on duplicate names, names longer than 255 UTF-8 bytes,
 *         unknown types, an f64 scale outside 0–255 or more than 255 fields.
 */
export function buildSchema(fields: readonly FieldDescriptor[]): Schema {
  if (fields.length > MAX_SCHEMA_FIELDS) {
    throw new TypeError(
      `buildSchema: a section schema holds at most ${MAX_SCHEMA_FIELDS} fields; got ${fields.length}.`,
    );
  }

  const seen = new Set<string>();
  const resolved: FieldDescriptor[] = [];

  for (const f of fields) {
    if (seen.has(f.name)) {
      throw new TypeError(
        `buildSchema: duplicate field name '${f.name}'. ` +
        `All field names must be unique within a schema.`,
      );
    }
    seen.add(f.name);

    if (!Object.prototype.hasOwnProperty.call(FIELD_TYPE_CODES, f.type)) {
      throw new TypeError(`buildSchema: field '${f.name}' has unknown type '${String(f.type)}'.`);
    }

    const nameBytes = encodeUtf8(f.name).length;
    if (nameBytes > MAX_FIELD_NAME_BYTES) {
      throw new TypeError(
        `buildSchema: field name '${f.name.slice(0, 32)}…' is ${nameBytes} UTF-8 bytes; ` +
        `the maximum is ${MAX_FIELD_NAME_BYTES}.`,
      );
    }

    if (f.type === 'f64') {
      if (!Number.isInteger(f.scale) || f.scale < 0 || f.scale > MAX_F64_SCALE) {
        throw new TypeError(
          `buildSchema: field '${f.name}' (f64) needs an integer scale in [0, ${MAX_F64_SCALE}]; ` +
          `got ${String(f.scale)}.`,
        );
      }
      resolved.push(Object.freeze({ name: f.name, type: f.type, scale: f.scale }));
    } else {
      resolved.push(Object.freeze({ name: f.name, type: f.type }));
    }
  }

  return Object.freeze({ fields: Object.freeze(resolved) });
}
