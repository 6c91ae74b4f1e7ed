import { ceilDiv, compareBigInt, maxBigInt, minBigInt, sumBigInt } from './bigint';

describe('bigint helpers', () => {
  test('ceilDiv rounds up only when there is a remainder', () => {
    expect(ceilDiv(10n, 5n)).toBe(2n);
    expect(ceilDiv(11n, 5n)).toBe(3n);
    expect(ceilDiv(0n, 7n)).toBe(0n);
  });

  test('ceilDiv rejects a non-positive denominator', () => {
    expect(() => ceilDiv(1n, 0n)).toThrow(RangeError);
  });

  test('sum, max and min', () => {
    expect(sumBigInt([1n, 2n, 3n])).toBe(6n);
    expect(sumBigInt([])).toBe(0n);
    expect(maxBigInt(4n, 9n, 2n)).toBe(9n);
    expect(minBigInt(4n, 9n, 2n)).toBe(2n);
  });

  test('compareBigInt sorts ascending', () => {
    expect([3n, 1n, 2n].sort(compareBigInt)).toEqual([1n, 2n, 3n]);
  });
});
