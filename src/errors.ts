/**
 * @rwtf/core — error taxonomy
 *
 * Every failure to read a track throws one of these. Errors propagate
 * unchanged from the codec that detected them up through readTrack(), so
 * callers can branch on the class and inspect the location fields.
 */

import type { BlockLocation } from './types';

// ─── Base ─────────────────────────────────────────────────────────────────────

export class TrackFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TrackFormatError';
  }
}

/** Render a BlockLocation for error messages. */
export function describeLocation(location: BlockLocation): string {
  switch (location.block) {
    case 'header':         return 'header';
    case 'metadata_table': return 'metadata table';
    case 'data_table':     return 'data table';
    case 'presence':       return `presence column of section ${location.section}`;
    case 'column':
      return `column '${location.field}' (field ${location.fieldIndex}) of section ${location.section}`;
  }
}

function hex(value: number, width: number): string {
  return `0x${value.toString(16).padStart(width * 2, '0')}`;
}

// ─── Structure ────────────────────────────────────────────────────────────────

export class InvalidMagicError extends TrackFormatError {
  constructor(readonly actual: Uint8Array) {
    super(
      `Invalid magic: got [${Array.from(actual, b => hex(b, 1)).join(' ')}]; ` +
      `expected 89 52 57 54 46 0A 1A 0A ('\\x89RWTF\\n\\x1a\\n'). ` +
      `The buffer is not an RWTF track, or was mangled by a text-mode transfer.`,
    );
    this.name = 'InvalidMagicError';
  }
}

export class UnsupportedVersionError extends TrackFormatError {
  constructor(
    readonly subject:   'file' | 'schema',
    readonly version:   number,
    readonly supported: number,
  ) {
    super(
      `Unsupported ${subject} version ${version}. ` +
      `This build of @rwtf/core reads ${subject} version ${supported} only.`,
    );
    this.name = 'UnsupportedVersionError';
  }
}

export class UnsupportedSchemaVersionError extends UnsupportedVersionError {
  constructor(version: number, supported: number, readonly section: number) {
    super('schema', version, supported);
    this.message = `Section ${section}: ${this.message}`;
    this.name = 'UnsupportedSchemaVersionError';
  }
}

export class UnsupportedEncodingError extends TrackFormatError {
  constructor(readonly code: number, readonly section: number) {
    super(
      `Section ${section} uses encoding ${hex(code, 1)}; ` +
      `only the standard encoding (0x00) is supported.`,
    );
    this.name = 'UnsupportedEncodingError';
  }
}

export class UnsupportedFieldTypeError extends TrackFormatError {
  constructor(readonly code: number, readonly field: string) {
    super(
      `Field '${field}' has type code ${hex(code, 1)}, which this build does not support. ` +
      `Known codes: 0x00 (i64), 0x01 (f64), 0x02 (u64), 0x04 (string), 0x05 (bool), ` +
      `0x06 (bool_array), 0x07 (u64_array), 0x08 (bytes).`,
    );
    this.name = 'UnsupportedFieldTypeError';
  }
}

// ─── Integrity ────────────────────────────────────────────────────────────────

export class IntegrityError extends TrackFormatError {
  constructor(
    readonly location: BlockLocation,
    readonly expected: number,
    readonly computed: number,
    width: number,
  ) {
    super(
      `Checksum mismatch in ${describeLocation(location)}: ` +
      `stored ${hex(expected, width)}, computed ${hex(computed, width)}. ` +
      `The block is corrupt.`,
    );
    this.name = 'IntegrityError';
  }
}

/** IntegrityError for the fixed header; location is always `header`. */
export class HeaderCorruptError extends IntegrityError {
  constructor(expected: number, computed: number, width: number) {
    super({ block: 'header' }, expected, computed, width);
    this.name = 'HeaderCorruptError';
  }
}

// ─── Byte-level ───────────────────────────────────────────────────────────────

/** A read would go past the end of the buffer or of the enclosing block. */
export class BoundsError extends TrackFormatError {
  constructor(
    readonly offset:    number,
    readonly needed:    number,
    readonly available: number,
    what: string,
  ) {
    super(
      `Out of bounds reading ${what} at offset ${offset}: ` +
      `need ${needed} byte(s), ${available} available.`,
    );
    this.name = 'BoundsError';
  }
}

export class MalformedVarIntError extends TrackFormatError {
  constructor(readonly offset: number, reason: string) {
    super(`Malformed varint at offset ${offset}: ${reason}.`);
    this.name = 'MalformedVarIntError';
  }
}

/** A declared size does not match the bytes its contents actually occupy. */
export class SizeMismatchError extends TrackFormatError {
  constructor(
    readonly what:     string,
    readonly declared: number,
    readonly actual:   number,
  ) {
    super(
      `Size mismatch in ${what}: declared ${declared} byte(s), contents occupy ${actual}.`,
    );
    this.name = 'SizeMismatchError';
  }
}

/**
 * Bytes that pass every checksum but are not in the one form this library
 * writes, so re-encoding what they decode to would not reproduce them:
 *
 *   - a reserved header byte that is set
 *   - tables out of order, with gaps between them, or followed by more bytes
 *   - a bool byte other than 0x00 or 0x01
 *   - an f64 integer with no exact number equivalent
 */
export class NonCanonicalError extends TrackFormatError {
  constructor(
    readonly offset: number,
    readonly what:   string,
    detail: string,
  ) {
    super(`Non-canonical ${what} at offset ${offset}: ${detail}.`);
    this.name = 'NonCanonicalError';
  }
}

export class InvalidUtf8Error extends TrackFormatError {
  constructor(readonly offset: number, what: string) {
    super(`Invalid UTF-8 in ${what} at offset ${offset}.`);
    this.name = 'InvalidUtf8Error';
  }
}
