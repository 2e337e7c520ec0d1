/**
 * @rwtf/core — presence column
 *
 * The presence column says, for every point of a section, which fields have a
 * value there. It precedes the data columns in the section body:
 *
 *   [bitmap: point_count × stride bytes][crc: u32]
 *
 * stride = ceil(field_count / 8), so a schema of up to eight fields costs one
 * byte per point. For field i at point p:
 *
 *   byte = p * stride + (i >>> 3)
 *   bit  = i & 7                    (least significant bit = first field)
 *
 * A set bit means present. Bits at or above field_count are reserved; readers
 * ignore them and writers leave them clear.
 */

import { ByteCursor, ByteSink } from './bytes';
import { checksumBytes, verifyChecksum } from './checksum';
import { COLUMN_CHECKSUM_BYTES } from './constants';
import type { Column } from './types';

/** Bitmap bytes per point for a schema with `fieldCount` fields. */
export function presenceStride(fieldCount: number): number {
  return Math.ceil(fieldCount / 8);
}

/** Total encoded size of a presence column, checksum included. */
export function presenceColumnSize(pointCount: number, fieldCount: number): number {
  return pointCount * presenceStride(fieldCount) + COLUMN_CHECKSUM_BYTES;
}

// ─── PresenceColumn ───────────────────────────────────────────────────────────

export class PresenceColumn {
  private readonly stride: number;

  constructor(
    private readonly bitmap: Uint8Array,
    readonly pointCount:     number,
    readonly fieldCount:     number,
  ) {
    this.stride = presenceStride(fieldCount);
  }

  isPresent(point: number, field: number): boolean {
    const byte = this.bitmap[point * this.stride + (field >>> 3)] ?? 0;
    return (byte & (1 << (field & 7))) !== 0;
  }

  /** Number of points at which `field` is present. */
  count(field: number): number {
    let n = 0;
    for (let p = 0; p < this.pointCount; p++) {
      if (this.isPresent(p, field)) n++;
    }
    return n;
  }
}

// ─── Decoding ─────────────────────────────────────────────────────────────────

/**
 * Read a presence column at the cursor and verify its checksum.
 *
 * @param section  Section index, used to tag an IntegrityError.
 */
export function readPresenceColumn(
  cursor:     ByteCursor,
  pointCount: number,
  fieldCount: number,
  section:    number,
): PresenceColumn {
  const bitmap = cursor.take(pointCount * presenceStride(fieldCount), `presence column of section ${section}`);
  verifyChecksum(
    bitmap,
    cursor.u32(`presence checksum of section ${section}`),
    COLUMN_CHECKSUM_BYTES,
    { block: 'presence', section },
  );
  return new PresenceColumn(bitmap, pointCount, fieldCount);
}

// ─── Encoding ─────────────────────────────────────────────────────────────────

/**
 * Encode the presence column for `columns`, which must all hold
 * `pointCount` values. A null value clears the field's bit at that point.
 */
export function encodePresenceColumn(columns: readonly Column[], pointCount: number): Uint8Array {
  const stride = presenceStride(columns.length);
  const bitmap = new Uint8Array(pointCount * stride);

  columns.forEach((column, field) => {
    const mask = 1 << (field & 7);
    const lane = field >>> 3;
    for (let p = 0; p < pointCount; p++) {
      if (column.values[p] !== null) {
        const at = p * stride + lane;
        bitmap[at] = (bitmap[at] ?? 0) | mask;
      }
    }
  });

  return new ByteSink(bitmap.length + COLUMN_CHECKSUM_BYTES)
    .bytes(bitmap)
    .bytes(checksumBytes(bitmap, COLUMN_CHECKSUM_BYTES))
    .finish();
}
