/**
 * @rwtf/core — integer ranges and fixed-point scaling
 *
 * Shared by the column codec and the writer, so a value the writer accepts is
 * exactly a value the codec can encode and the reader can decode back.
 *
 * f64 fields store round(value × 10^scale) as an i64. A stored integer n is
 * only meaningful if n / 10^scale is a number that scales back to n exactly;
 * anything else could not survive a read/write cycle.
 */

export type IntegerType = 'i64' | 'u64';

export const I64_MIN = -(1n << 63n);
export const I64_MAX = (1n << 63n) - 1n;
export const U64_MAX = (1n << 64n) - 1n;

/** [min, max] inclusive for an integer field type. */
export function integerRange(type: IntegerType): readonly [bigint, bigint] {
  return type === 'i64' ? [I64_MIN, I64_MAX] : [0n, U64_MAX];
}

/** @throws RangeError unless `value` fits `type`. */
export function checkInteger(type: IntegerType, name: string, point: number, value: bigint): void {
  const [lo, hi] = integerRange(type);
  if (value < lo || value > hi) {
    throw new RangeError(
      `Field '${name}' (${type}) at point ${point}: ${value} is outside [${lo}, ${hi}].`,
    );
  }
}

/** Wrap an arithmetic result back into the range of `type`. */
export function wrapInteger(type: IntegerType, value: bigint): bigint {
  return type === 'i64' ? BigInt.asIntN(64, value) : BigInt.asUintN(64, value);
}

// ─── Fixed-point ──────────────────────────────────────────────────────────────

/** f64 scale is stored as a u8. */
export const MAX_F64_SCALE = 0xff;

function factor(scale: number): number {
  return 10 ** scale;
}

/**
 * The number a stored f64 integer stands for, or undefined if it has no
 * exact representation that scales back to `stored`.
 */
export function fromScaled(stored: bigint, scale: number): number | undefined {
  const n = Number(stored);
  if (!Number.isSafeInteger(n)) return undefined;
  const value = n / factor(scale);
  return Math.round(value * factor(scale)) === n ? value : undefined;
}

/**
 * The integer stored for `value` in an f64 field.
 *
 * @throws RangeError if `value` is not finite, or its scaled form is not a
 *         safe integer that reads back to the same number.
 */
export function toScaled(value: number, scale: number, name: string, point: number): bigint {
  if (!Number.isFinite(value)) {
    throw new RangeError(`Field '${name}' (f64) at point ${point}: ${value} is not finite.`);
  }
  const n = Math.round(value * factor(scale));
  if (!Number.isSafeInteger(n) || fromScaled(BigInt(n), scale) === undefined) {
    throw new RangeError(
      `Field '${name}' (f64, scale ${scale}) at point ${point}: ${value} cannot be stored exactly ` +
      `as a scaled integer.`,
    );
  }
  return BigInt(n);
}

/** `value` as it reads back from an f64 field of the given scale. */
export function roundToScale(value: number, scale: number, name: string, point: number): number {
  return Number(toScaled(value, scale, name, point)) / factor(scale);
}
