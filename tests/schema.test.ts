import { describe, it, expect } from 'vitest';
import { ByteCursor, ByteSink } from '../src/bytes';
import { buildSchema, fieldTypeFromCode, readSchema, writeSchema } from '../src/schema';
import {
  InvalidUtf8Error,
  UnsupportedFieldTypeError,
  UnsupportedSchemaVersionError,
} from '../src/errors';
import { TWO_SECTIONS } from './helpers';

// Section 0's schema starts after the section count and its three-byte header.
const SCHEMA_0 = 39;
const SCHEMA_0_END = 53;

describe('readSchema', () => {
  it('decodes the fixture schema with its column sizes', () => {
    const cursor = new ByteCursor(TWO_SECTIONS, SCHEMA_0);
    const { schema, columnSizes } = readSchema(cursor, 0);

    expect(schema.fields).toEqual([
      { name: 'm', type: 'i64' },
      { name: 'k', type: 'bool' },
      { name: 'j', type: 'string' },
    ]);
    expect(columnSizes).toEqual([9, 9, 24]);
    expect(cursor.offset).toBe(SCHEMA_0_END);
  });

  it('rejects a schema version other than 0', () => {
    let caught: unknown;
    try {
      readSchema(new ByteCursor(Uint8Array.of(0x01, 0x00)), 3);
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(UnsupportedSchemaVersionError);
    if (caught instanceof UnsupportedSchemaVersionError) {
      expect(caught.section).toBe(3);
      expect(caught.version).toBe(1);
    }
  });

  it('rejects a reserved field type code, naming the field', () => {
    let caught: unknown;
    try {
      readSchema(new ByteCursor(Uint8Array.of(0x00, 0x01, 0x03, 0x01, 0x78, 0x05)), 0);
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(UnsupportedFieldTypeError);
    if (caught instanceof UnsupportedFieldTypeError) {
      expect(caught.code).toBe(0x03);
      expect(caught.field).toBe('x');
    }
  });

  it('reads the scale byte that follows an f64 type code', () => {
    const cursor = new ByteCursor(Uint8Array.of(0x00, 0x01, 0x01, 0x07, 0x03, 0x6c, 0x61, 0x74, 0x0c));
    const { schema, columnSizes } = readSchema(cursor, 0);
    expect(schema.fields).toEqual([{ name: 'lat', type: 'f64', scale: 7 }]);
    expect(columnSizes).toEqual([12]);
    expect(cursor.offset).toBe(9);
  });

  it('rejects a field name that is not UTF-8', () => {
    expect(() => readSchema(new ByteCursor(Uint8Array.of(0x00, 0x01, 0x00, 0x01, 0xff, 0x05)), 0))
      .toThrow(InvalidUtf8Error);
  });
});

describe('writeSchema', () => {
  it('reproduces the fixture schema byte for byte', () => {
    const sink = new ByteSink();
    writeSchema(sink, buildSchema([
      { name: 'm', type: 'i64' },
      { name: 'k', type: 'bool' },
      { name: 'j', type: 'string' },
    ]), [9, 9, 24]);
    expect(Array.from(sink.finish())).toEqual(Array.from(TWO_SECTIONS.subarray(SCHEMA_0, SCHEMA_0_END)));
  });

  it('writes an f64 scale right after its type code', () => {
    const sink = new ByteSink();
    writeSchema(sink, buildSchema([{ name: 'lat', type: 'f64', scale: 7 }]), [12]);
    expect(Array.from(sink.finish())).toEqual([0x00, 0x01, 0x01, 0x07, 0x03, 0x6c, 0x61, 0x74, 0x0c]);
  });

  it('round-trips every field type', () => {
    const schema = buildSchema([
      { name: 'time',    type: 'i64' },
      { name: 'lat',     type: 'f64', scale: 7 },
      { name: 'counter', type: 'u64' },
      { name: 'label',   type: 'string' },
      { name: 'moving',  type: 'bool' },
      { name: 'flags',   type: 'bool_array' },
      { name: 'ids',     type: 'u64_array' },
      { name: 'blob',    type: 'bytes' },
    ]);
    const sizes = [4, 12, 5, 300, 7, 9, 10, 8];
    const sink = new ByteSink();
    writeSchema(sink, schema, sizes);

    const decoded = readSchema(new ByteCursor(sink.finish()), 0);
    expect(decoded.schema).toEqual(schema);
    expect(decoded.columnSizes).toEqual(sizes);
  });

  it('requires one column size per field', () => {
    expect(() => writeSchema(new ByteSink(), buildSchema([{ name: 'a', type: 'i64' }]), [])).toThrow(RangeError);
  });
});

describe('buildSchema', () => {
  it('returns a frozen schema', () => {
    const schema = buildSchema([{ name: 'a', type: 'i64' }]);
    expect(Object.isFrozen(schema)).toBe(true);
    expect(Object.isFrozen(schema.fields)).toBe(true);
  });

  it('rejects duplicate field names', () => {
    expect(() => buildSchema([
      { name: 'a', type: 'i64' },
      { name: 'a', type: 'bool' },
    ])).toThrow(TypeError);
  });

  it('requires an integer f64 scale from 0 to 255', () => {
    expect(buildSchema([{ name: 'x', type: 'f64', scale: 0 }]).fields).toEqual([{ name: 'x', type: 'f64', scale: 0 }]);
    expect(() => buildSchema([{ name: 'x', type: 'f64', scale: 255 }])).not.toThrow();
    expect(() => buildSchema([{ name: 'x', type: 'f64', scale: 256 }])).toThrow(TypeError);
    expect(() => buildSchema([{ name: 'x', type: 'f64', scale: -1 }])).toThrow(TypeError);
    expect(() => buildSchema([{ name: 'x', type: 'f64', scale: 1.5 }])).toThrow(TypeError);
  });

  it('limits field names to 255 UTF-8 bytes', () => {
    expect(() => buildSchema([{ name: 'a'.repeat(255), type: 'i64' }])).not.toThrow();
    expect(() => buildSchema([{ name: 'é'.repeat(128), type: 'i64' }])).toThrow(TypeError);
  });

  it('limits a schema to 255 fields', () => {
    const fields = Array.from({ length: 256 }, (_, i) => ({ name: `f${i}`, type: 'bool' as const }));
    expect(() => buildSchema(fields)).toThrow(TypeError);
    expect(buildSchema(fields.slice(0, 255)).fields).toHaveLength(255);
  });
});

describe('fieldTypeFromCode', () => {
  it('maps known codes and leaves reserved ones undefined', () => {
    expect(fieldTypeFromCode(0x00)).toBe('i64');
    expect(fieldTypeFromCode(0x01)).toBe('f64');
    expect(fieldTypeFromCode(0x02)).toBe('u64');
    expect(fieldTypeFromCode(0x04)).toBe('string');
    expect(fieldTypeFromCode(0x05)).toBe('bool');
    expect(fieldTypeFromCode(0x06)).toBe('bool_array');
    expect(fieldTypeFromCode(0x07)).toBe('u64_array');
    expect(fieldTypeFromCode(0x08)).toBe('bytes');
    expect(fieldTypeFromCode(0x03)).toBeUndefined();
    expect(fieldTypeFromCode(0x09)).toBeUndefined();
  });
});
