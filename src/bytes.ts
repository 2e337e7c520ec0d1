/**
 * @rwtf/core — bounded byte cursor and growable byte sink
 *
 * ByteCursor is the only way the codecs read input. It never reads past its
 * `end`, which is either the end of the buffer or the declared end of the
 * enclosing block, so an untrusted size field can at worst raise BoundsError.
 *
 * ByteSink collects output for the writers and tracks absolute offsets so the
 * header can point at the tables that follow it.
 */

import { BoundsError, InvalidUtf8Error } from './errors';
import { decodeVarInt, decodeVarSize, decodeVarUint, encodeVarInt, encodeVarUint } from './varint';

// Fatal: malformed UTF-8 must fail, not be replaced with U+FFFD.
// ignoreBOM: a leading U+FEFF is data and must survive a round trip.
const utf8Decoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });
const utf8Encoder = new TextEncoder();

// ─── ByteCursor ───────────────────────────────────────────────────────────────

export class ByteCursor {
  private _offset: number;

  constructor(
    readonly bytes: Uint8Array,
    offset: number = 0,
    readonly end:   number = bytes.length,
  ) {
    if (end > bytes.length) {
      throw new BoundsError(offset, end - offset, bytes.length - offset, 'block');
    }
    this._offset = offset;
  }

  get offset(): number {
    return this._offset;
  }

  get remaining(): number {
    return Math.max(0, this.end - this._offset);
  }

  /** Throw BoundsError unless `n` more bytes are available. */
  require(n: number, what: string): void {
    if (n < 0 || this._offset + n > this.end) {
      throw new BoundsError(this._offset, n, this.remaining, what);
    }
  }

  u8(what = 'u8'): number {
    this.require(1, what);
    const value = this.bytes[this._offset] ?? 0;
    this._offset += 1;
    return value;
  }

  u16(what = 'u16'): number {
    this.require(2, what);
    const b = this.bytes;
    const o = this._offset;
    this._offset += 2;
    return (b[o] ?? 0) | ((b[o + 1] ?? 0) << 8);
  }

  u32(what = 'u32'): number {
    this.require(4, what);
    const b = this.bytes;
    const o = this._offset;
    this._offset += 4;
    return ((b[o] ?? 0) | ((b[o + 1] ?? 0) << 8) | ((b[o + 2] ?? 0) << 16) | ((b[o + 3] ?? 0) << 24)) >>> 0;
  }

  /** A zero-copy view of the next `n` bytes. */
  take(n: number, what = 'bytes'): Uint8Array {
    this.require(n, what);
    const out = this.bytes.subarray(this._offset, this._offset + n);
    this._offset += n;
    return out;
  }

  varUint(): bigint {
    const [value, next] = decodeVarUint(this.bytes, this._offset, this.end);
    this._offset = next;
    return value;
  }

  varInt(): bigint {
    const [value, next] = decodeVarInt(this.bytes, this._offset, this.end);
    this._offset = next;
    return value;
  }

  varSize(): number {
    const [value, next] = decodeVarSize(this.bytes, this._offset, this.end);
    this._offset = next;
    return value;
  }

  /** Strictly decode `n` bytes as UTF-8. */
  utf8(n: number, what = 'string'): string {
    const start = this._offset;
    const bytes = this.take(n, what);
    try {
      return utf8Decoder.decode(bytes);
    } catch {
      throw new InvalidUtf8Error(start, what);
    }
  }

  /**
   * A cursor over the next `n` bytes, which this cursor then skips.
   * Reads through the child can never reach past the declared block.
   */
  sub(n: number, what = 'block'): ByteCursor {
    this.require(n, what);
    const child = new ByteCursor(this.bytes, this._offset, this._offset + n);
    this._offset += n;
    return child;
  }
}

// ─── ByteSink ─────────────────────────────────────────────────────────────────

export class ByteSink {
  private buffer: Uint8Array;
  private _length = 0;

  constructor(initialSize = 256) {
    this.buffer = new Uint8Array(initialSize);
  }

  get length(): number {
    return this._length;
  }

  private ensure(extra: number): void {
    const needed = this._length + extra;
    if (needed <= this.buffer.length) return;
    let size = Math.max(this.buffer.length, 16);
    while (size < needed) size *= 2;
    const next = new Uint8Array(size);
    next.set(this.buffer.subarray(0, this._length));
    this.buffer = next;
  }

  u8(value: number): this {
    this.ensure(1);
    this.buffer[this._length++] = value & 0xff;
    return this;
  }

  u16(value: number): this {
    this.ensure(2);
    this.buffer[this._length++] = value & 0xff;
    this.buffer[this._length++] = (value >>> 8) & 0xff;
    return this;
  }

  u32(value: number): this {
    this.ensure(4);
    for (let i = 0; i < 4; i++) {
      this.buffer[this._length++] = (value >>> (8 * i)) & 0xff;
    }
    return this;
  }

  bytes(bytes: Uint8Array): this {
    this.ensure(bytes.length);
    this.buffer.set(bytes, this._length);
    this._length += bytes.length;
    return this;
  }

  varUint(value: number | bigint): this {
    return this.bytes(encodeVarUint(value));
  }

  varInt(value: bigint): this {
    return this.bytes(encodeVarInt(value));
  }

  /** The bytes written from `start` to the current end, as a view. */
  since(start: number): Uint8Array {
    return this.buffer.subarray(start, this._length);
  }

  /** A copy of everything written so far. */
  finish(): Uint8Array {
    return this.buffer.slice(0, this._length);
  }
}

export function encodeUtf8(value: string): Uint8Array {
  return utf8Encoder.encode(value);
}
