/**
 * Integer helpers for sompi and mass arithmetic. Amounts never pass through `number`.
 */

export const U64_MAX = 0xffff_ffff_ffff_ffffn;

/**
 * Ceiling division of non-negative integers
 */
export function ceilDiv(numerator: bigint, denominator: bigint): bigint {
  if (denominator <= 0n) {
    throw new RangeError('ceilDiv: denominator must be positive');
  }
  if (numerator < 0n) {
    throw new RangeError('ceilDiv: numerator must not be negative');
  }
  return (numerator + denominator - 1n) / denominator;
}

export function sumBigInt(values: Iterable<bigint>): bigint {
  let total = 0n;
  for (const value of values) {
    total += value;
  }
  return total;
}

export function maxBigInt(first: bigint, ...rest: bigint[]): bigint {
  return rest.reduce((max, value) => (value > max ? value : max), first);
}

export function minBigInt(first: bigint, ...rest: bigint[]): bigint {
  return rest.reduce((min, value) => (value < min ? value : min), first);
}

/**
 * Three-way comparison usable as an `Array.prototype.sort` callback
 */
export function compareBigInt(a: bigint, b: bigint): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
