import { describe, expect, it } from 'vitest';
import { compare, formatRational, fromNumber, isMultipleOf, rational } from '../src/schema/rational.js';

describe('rational', () => {
  it('reads a float through its shortest decimal rendering', () => {
    expect(fromNumber(0.1)).toEqual({ num: 1n, den: 10n });
    expect(fromNumber(1.5)).toEqual({ num: 3n, den: 2n });
    expect(fromNumber(1e21)).toEqual({ num: 10n ** 21n, den: 1n });
    expect(fromNumber(-2.5e-7)).toEqual({ num: -1n, den: 4000000n });
  });

  it('rejects non-finite numbers', () => {
    expect(() => fromNumber(Number.NaN)).toThrow(RangeError);
    expect(() => fromNumber(Number.POSITIVE_INFINITY)).toThrow(RangeError);
  });

  it('normalizes sign and common factors', () => {
    expect(rational(4n, -6n)).toEqual({ num: -2n, den: 3n });
    expect(() => rational(1n, 0n)).toThrow(RangeError);
  });

  it('checks multiples exactly', () => {
    expect(isMultipleOf(fromNumber(0.3), fromNumber(0.1))).toBe(true);
    expect(isMultipleOf(fromNumber(0.35), fromNumber(0.1))).toBe(false);
    expect(isMultipleOf(rational(6n), rational(0n))).toBe(false);
  });

  it('compares like a sort comparator', () => {
    expect(compare(rational(1n, 3n), rational(1n, 2n))).toBe(-1);
    expect(compare(rational(2n, 4n), rational(1n, 2n))).toBe(0);
  });

  it('formats terminating fractions as decimals', () => {
    expect(formatRational(rational(3n, 2n))).toBe('1.5');
    expect(formatRational(rational(-1n, 4n))).toBe('-0.25');
    expect(formatRational(rational(1n, 3n))).toBe('1/3');
    expect(formatRational(rational(7n))).toBe('7');
  });
});
