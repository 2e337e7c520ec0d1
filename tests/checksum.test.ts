/**
 * @rwtf/core — checksum tests
 *
 * The two CRC variants are checked against their published check values and
 * against the stored checksums of the two-sections fixture.
 */

import { describe, it, expect } from 'vitest';
import { checksumBytes, computeChecksum, crc16, crc32, verifyChecksum } from '../src/checksum';
import { HeaderCorruptError, IntegrityError } from '../src/errors';
import { TWO_SECTIONS } from './helpers';

const ascii = (s: string) => new TextEncoder().encode(s);

describe('crc16', () => {
  it('matches the CRC-16/USB check value', () => {
    expect(crc16(ascii('123456789'))).toBe(0xb4c8);
  });

  it('is 0 for empty input', () => {
    expect(crc16(new Uint8Array(0))).toBe(0);
  });

  it('reproduces the fixture header, metadata and data-table checksums', () => {
    expect(crc16(TWO_SECTIONS.subarray(0, 22))).toBe(0x9889);
    expect(crc16(TWO_SECTIONS.subarray(24, 33))).toBe(0x93d4);
    expect(crc16(TWO_SECTIONS.subarray(35, 70))).toBe(0x42c8);
  });
});

describe('crc32', () => {
  it('matches the CRC-32/BZIP2 check value', () => {
    expect(crc32(ascii('123456789'))).toBe(0xfc891918);
  });

  it('is 0 for empty input', () => {
    expect(crc32(new Uint8Array(0))).toBe(0);
  });

  it('reproduces the fixture column checksums', () => {
    expect(crc32(Uint8Array.of(7, 7, 7, 7, 7))).toBe(0x730df8f6);
    expect(crc32(Uint8Array.of(0x2a, 0, 0, 0, 0))).toBe(0x68798dd0);
    expect(crc32(Uint8Array.of(1, 1, 2))).toBe(0x92d8d4ca);
    expect(crc32(Uint8Array.of(0, 1))).toBe(0xfb898635);
  });
});

describe('computeChecksum / checksumBytes', () => {
  it('selects the algorithm by width', () => {
    const data = ascii('123456789');
    expect(computeChecksum(data, 2)).toBe(0xb4c8);
    expect(computeChecksum(data, 4)).toBe(0xfc891918);
  });

  it('serialises little-endian', () => {
    expect(Array.from(checksumBytes(Uint8Array.of(1, 1, 2), 4))).toEqual([0xca, 0xd4, 0xd8, 0x92]);
    expect(Array.from(checksumBytes(TWO_SECTIONS.subarray(0, 22), 2))).toEqual([0x89, 0x98]);
  });
});

describe('verifyChecksum', () => {
  it('returns silently on a match', () => {
    expect(() => verifyChecksum(Uint8Array.of(1, 1, 2), 0x92d8d4ca, 4, { block: 'data_table' })).not.toThrow();
  });

  it('raises HeaderCorruptError for the header', () => {
    let caught: unknown;
    try {
      verifyChecksum(TWO_SECTIONS.subarray(0, 22), 0x1234, 2, { block: 'header' });
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(HeaderCorruptError);
    expect(caught).toBeInstanceOf(IntegrityError);
    if (caught instanceof HeaderCorruptError) {
      expect(caught.expected).toBe(0x1234);
      expect(caught.computed).toBe(0x9889);
      expect(caught.location).toEqual({ block: 'header' });
    }
  });

  it('raises IntegrityError carrying the location for other blocks', () => {
    const location = { block: 'column', section: 1, field: 'a', fieldIndex: 0 } as const;
    let caught: unknown;
    try {
      verifyChecksum(Uint8Array.of(1, 1, 3), 0x92d8d4ca, 4, location);
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(IntegrityError);
    expect(caught).not.toBeInstanceOf(HeaderCorruptError);
    if (caught instanceof IntegrityError) {
      expect(caught.location).toEqual(location);
      expect(caught.expected).toBe(0x92d8d4ca);
      expect(caught.message).toContain("column 'a' (field 0) of section 1");
    }
  });
});
