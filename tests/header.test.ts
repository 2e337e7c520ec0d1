import { describe, it, expect } from 'vitest';
import { readHeader, writeHeader } from '../src/header';
import { checksumBytes } from '../src/checksum';
import {
  BoundsError,
  HeaderCorruptError,
  InvalidMagicError,
  NonCanonicalError,
  UnsupportedVersionError,
} from '../src/errors';
import { TWO_SECTIONS, flip } from './helpers';

/** The fixture with header byte `offset` set to `value` and the header CRC recomputed. */
function patchHeader(offset: number, value: number): Uint8Array {
  const bytes = TWO_SECTIONS.slice();
  bytes[offset] = value;
  bytes.set(checksumBytes(bytes.subarray(0, 22), 2), 22);
  return bytes;
}

describe('readHeader', () => {
  it('decodes the fixture header', () => {
    expect(readHeader(TWO_SECTIONS)).toEqual({
      fileVersion:         1,
      creatorVersion:      0,
      metadataTableOffset: 24,
      dataTableOffset:     35,
    });
  });

  it('throws BoundsError on a buffer shorter than the header', () => {
    expect(() => readHeader(TWO_SECTIONS.subarray(0, 23))).toThrow(BoundsError);
  });

  it('checks the magic before the checksum', () => {
    expect(() => readHeader(flip(TWO_SECTIONS, 1))).toThrow(InvalidMagicError);
  });

  it('throws HeaderCorruptError when a covered byte changes', () => {
    expect(() => readHeader(flip(TWO_SECTIONS, 12))).toThrow(HeaderCorruptError);
    expect(() => readHeader(flip(TWO_SECTIONS, 23))).toThrow(HeaderCorruptError);
  });

  it('rejects any file version other than 1', () => {
    let caught: unknown;
    try {
      readHeader(patchHeader(8, 2));
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(UnsupportedVersionError);
    if (caught instanceof UnsupportedVersionError) {
      expect(caught.subject).toBe('file');
      expect(caught.version).toBe(2);
      expect(caught.supported).toBe(1);
    }
  });

  it('rejects a reserved byte that is not zero, even with a valid checksum', () => {
    for (const offset of [9, 10, 11, 13, 14, 15, 20, 21]) {
      expect(() => readHeader(patchHeader(offset, 7))).toThrow(NonCanonicalError);
    }
  });

  it('names the reserved byte it rejects', () => {
    expect(() => readHeader(patchHeader(20, 7))).toThrow(
      'Non-canonical header at offset 20: reserved byte is 0x07, not 0x00.',
    );
  });

  it('rejects a table offset that points into the header', () => {
    expect(() => readHeader(patchHeader(16, 10))).toThrow(BoundsError);
  });

  it('rejects a table offset at or past the end of the buffer', () => {
    expect(() => readHeader(TWO_SECTIONS.subarray(0, 35))).toThrow(BoundsError);
  });
});

describe('writeHeader', () => {
  it('reproduces the fixture header byte for byte', () => {
    const header = writeHeader({ metadataTableOffset: 24, dataTableOffset: 35 });
    expect(Array.from(header)).toEqual(Array.from(TWO_SECTIONS.subarray(0, 24)));
  });

  it('stores creator_version', () => {
    const bytes = TWO_SECTIONS.slice();
    bytes.set(writeHeader({ creatorVersion: 7, metadataTableOffset: 24, dataTableOffset: 35 }), 0);
    expect(bytes[12]).toBe(7);
    expect(readHeader(bytes).creatorVersion).toBe(7);
  });

  it('range-checks every field', () => {
    expect(() => writeHeader({ creatorVersion: 256, metadataTableOffset: 24, dataTableOffset: 35 })).toThrow(RangeError);
    expect(() => writeHeader({ metadataTableOffset: -1, dataTableOffset: 35 })).toThrow(RangeError);
    expect(() => writeHeader({ metadataTableOffset: 24, dataTableOffset: 0x10000 })).toThrow(RangeError);
  });
});
