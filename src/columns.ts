/**
 * @rwtf/core — data column codecs
 *
 * One data column per schema field, in schema order, each laid out as:
 *
 *   [payload][crc: u32]        total length = the field's encoded_data_size
 *
 * Payload by field type. Absent points (presence bit clear) contribute no
 * bytes in every layout.
 *
 *   i64, u64     delta-encoded signed LEB128. The first present value is
 *                written as-is; every later present value as (value − previous
 *                present value), wrapping at 64 bits. Absent points do not
 *                move the "previous" cursor.
 *   f64          round(value × 10^scale), then exactly as i64
 *   bool         one byte per present point, 0x00 or 0x01
 *   string       [len: varint][len bytes UTF-8] per present point
 *   bytes        [len: varint][len bytes] per present point
 *   bool_array   [count: varint][count bytes, each 0x00 or 0x01]
 *   u64_array    [count: varint][count unsigned LEB128s]
 *
 * Decoders work on a cursor bounded to exactly one column, so a column can
 * neither read into its neighbour nor leave bytes unaccounted for.
 */

import { ByteCursor, ByteSink, encodeUtf8 } from './bytes';
import { checksumBytes, verifyChecksum } from './checksum';
import { COLUMN_CHECKSUM_BYTES } from './constants';
import { BoundsError, NonCanonicalError, SizeMismatchError, describeLocation } from './errors';
import {
  checkInteger,
  fromScaled,
  toScaled,
  wrapInteger,
  type IntegerType,
} from './numbers';
import type { PresenceColumn } from './presence';
import type { BlockLocation, Column, FieldDescriptor } from './types';

// ─── Decoding ─────────────────────────────────────────────────────────────────

/** Decode one value per point, or null where the field is absent. */
function decodePresent<T>(
  presence: PresenceColumn,
  field:    number,
  decode:   (point: number) => T,
): (T | null)[] {
  const values: (T | null)[] = [];
  for (let p = 0; p < presence.pointCount; p++) {
    values.push(presence.isPresent(p, field) ? decode(p) : null);
  }
  return values;
}

function decodeIntegers(
  cursor:   ByteCursor,
  presence: PresenceColumn,
  field:    number,
  type:     IntegerType,
): (bigint | null)[] {
  let previous: bigint | null = null;
  return decodePresent(presence, field, () => {
    const delta = cursor.varInt();
    const value = wrapInteger(type, previous === null ? delta : previous + delta);
    previous = value;
    return value;
  });
}

function decodeFixedPoint(
  cursor:   ByteCursor,
  presence: PresenceColumn,
  field:    number,
  scale:    number,
  what:     string,
): (number | null)[] {
  let previous: bigint | null = null;
  return decodePresent(presence, field, p => {
    const at     = cursor.offset;
    const stored = wrapInteger('i64', previous === null ? cursor.varInt() : previous + cursor.varInt());
    previous = stored;
    const value = fromScaled(stored, scale);
    if (value === undefined) {
      throw new NonCanonicalError(at, what, `f64 ${stored}e-${scale} at point ${p} has no exact number value`);
    }
    return value;
  });
}

function readBool(cursor: ByteCursor, what: string): boolean {
  const at   = cursor.offset;
  const byte = cursor.u8(what);
  if (byte > 1) throw new NonCanonicalError(at, what, `bool byte 0x${byte.toString(16).padStart(2, '0')}`);
  return byte === 1;
}

function decodeValues(
  cursor:     ByteCursor,
  descriptor: FieldDescriptor,
  field:      number,
  presence:   PresenceColumn,
  what:       string,
): Column {
  const { name } = descriptor;
  const freeze = <T>(values: T[]): readonly T[] => Object.freeze(values);

  switch (descriptor.type) {
    case 'i64':
      return { name, type: 'i64', values: freeze(decodeIntegers(cursor, presence, field, 'i64')) };
    case 'u64':
      return { name, type: 'u64', values: freeze(decodeIntegers(cursor, presence, field, 'u64')) };
    case 'f64':
      return { name, type: 'f64', values: freeze(decodeFixedPoint(cursor, presence, field, descriptor.scale, what)) };
    case 'bool':
      return { name, type: 'bool', values: freeze(decodePresent(presence, field, () => readBool(cursor, what))) };
    case 'string':
      return {
        name, type: 'string',
        values: freeze(decodePresent(presence, field, p => cursor.utf8(cursor.varSize(), `string at point ${p}`))),
      };
    case 'bytes':
      return {
        name, type: 'bytes',
        values: freeze(decodePresent(presence, field, p => cursor.take(cursor.varSize(), `bytes at point ${p}`).slice())),
      };
    case 'bool_array':
      return {
        name, type: 'bool_array',
        values: freeze(decodePresent(presence, field, () => {
          const count = cursor.varSize();
          cursor.require(count, what);
          return Object.freeze(Array.from({ length: count }, () => readBool(cursor, what)));
        })),
      };
    case 'u64_array':
      return {
        name, type: 'u64_array',
        values: freeze(decodePresent(presence, field, () => {
          const count = cursor.varSize();
          // Every element takes at least one byte.
          cursor.require(count, what);
          return Object.freeze(Array.from({ length: count }, () => cursor.varUint()));
        })),
      };
  }
}

/**
 * Decode one data column.
 *
 * @param column    Cursor spanning exactly the column's encoded_data_size.
 * @param location  Identifies the column for IntegrityError / SizeMismatchError.
 *
 * The checksum is verified before any value is decoded.
 */
export function readColumn(
  column:     ByteCursor,
  descriptor: FieldDescriptor,
  fieldIndex: number,
  presence:   PresenceColumn,
  location:   BlockLocation,
): Column {
  const payloadSize = column.remaining - COLUMN_CHECKSUM_BYTES;
  if (payloadSize < 0) {
    throw new BoundsError(column.offset, COLUMN_CHECKSUM_BYTES, column.remaining, `${describeLocation(location)} checksum`);
  }

  const payload = column.take(payloadSize, describeLocation(location));
  verifyChecksum(payload, column.u32(), COLUMN_CHECKSUM_BYTES, location);

  const cursor  = new ByteCursor(payload);
  const decoded = decodeValues(cursor, descriptor, fieldIndex, presence, describeLocation(location));

  if (cursor.remaining !== 0) {
    throw new SizeMismatchError(describeLocation(location), payloadSize, payloadSize - cursor.remaining);
  }
  return Object.freeze(decoded);
}

// ─── Encoding ─────────────────────────────────────────────────────────────────

function encodeIntegers(sink: ByteSink, name: string, type: IntegerType, values: readonly (bigint | null)[]): void {
  let previous: bigint | null = null;
  values.forEach((value, p) => {
    if (value === null) return;
    checkInteger(type, name, p, value);
    // Deltas are always emitted in the signed 64-bit range.
    sink.varInt(BigInt.asIntN(64, previous === null ? value : value - previous));
    previous = value;
  });
}

function checkType(name: string, type: string, point: number, value: unknown, expected: string): void {
  if (typeof value !== expected) {
    throw new TypeError(`Field '${name}' (${type}) expects a ${expected} at point ${point}; got ${typeof value}.`);
  }
}

/**
 * Encode one data column, checksum included.
 * The returned length is the field's encoded_data_size.
 *
 * @param scale  Decimal scale of an f64 column; ignored for other types.
 */
export function encodeColumn(column: Column, scale = 0): Uint8Array {
  const sink = new ByteSink();
  const { name } = column;

  switch (column.type) {
    case 'i64':
    case 'u64':
      encodeIntegers(sink, name, column.type, column.values);
      break;
    case 'f64':
      encodeIntegers(
        sink, name, 'i64',
        column.values.map((value, p) => (value === null ? null : toScaled(value, scale, name, p))),
      );
      break;
    case 'bool':
      column.values.forEach((value, p) => {
        if (value === null) return;
        checkType(name, 'bool', p, value, 'boolean');
        sink.u8(value ? 1 : 0);
      });
      break;
    case 'string':
      column.values.forEach((value, p) => {
        if (value === null) return;
        checkType(name, 'string', p, value, 'string');
        const bytes = encodeUtf8(value);
        sink.varUint(bytes.length).bytes(bytes);
      });
      break;
    case 'bytes':
      column.values.forEach((value, p) => {
        if (value === null) return;
        if (!(value instanceof Uint8Array)) {
          throw new TypeError(`Field '${name}' (bytes) expects a Uint8Array at point ${p}; got ${typeof value}.`);
        }
        sink.varUint(value.length).bytes(value);
      });
      break;
    case 'bool_array':
      column.values.forEach(value => {
        if (value === null) return;
        sink.varUint(value.length);
        for (const flag of value) sink.u8(flag ? 1 : 0);
      });
      break;
    case 'u64_array':
      column.values.forEach((value, p) => {
        if (value === null) return;
        sink.varUint(value.length);
        for (const element of value) {
          checkInteger('u64', name, p, element);
          sink.varUint(element);
        }
      });
      break;
  }

  sink.bytes(checksumBytes(sink.since(0), COLUMN_CHECKSUM_BYTES));
  return sink.finish();
}
