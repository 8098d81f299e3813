/**
 * Exact rational numbers over bigint, used for float range and multiple-of
 * checks. A float is read through its shortest decimal rendering, so `0.1`
 * is exactly 1/10 and `0.3` is a multiple of `0.1`.
 */
export interface Rational {
  readonly num: bigint;
  /** Always positive. */
  readonly den: bigint;
}

function gcd(a: bigint, b: bigint): bigint {
  let x = a < 0n ? -a : a;
  let y = b < 0n ? -b : b;
  while (y !== 0n) {
    [x, y] = [y, x % y];
  }
  return x;
}

export function rational(num: bigint, den: bigint = 1n): Rational {
  if (den === 0n) throw new RangeError('Rational denominator must not be zero');
  const sign = den < 0n ? -1n : 1n;
  const g = gcd(num, den) || 1n;
  return { num: (sign * num) / g, den: (sign * den) / g };
}

const DECIMAL_RE = /^(-?)(\d+)(?:\.(\d+))?(?:e([+-]?\d+))?$/i;

/**
 * Converts a finite number to the rational its shortest decimal rendering
 * denotes. Throws `RangeError` for NaN and infinities.
 */
export function fromNumber(value: number): Rational {
  if (!Number.isFinite(value)) throw new RangeError(`Cannot convert ${value} to a rational`);
  const match = DECIMAL_RE.exec(String(value));
  if (!match) throw new RangeError(`Unexpected numeric rendering: ${String(value)}`);
  const [, sign, intPart, fracPart = '', expPart = '0'] = match;
  const exponent = Number(expPart) - fracPart.length;
  let num = BigInt(`${sign}${intPart}${fracPart}`);
  let den = 1n;
  if (exponent >= 0) num *= 10n ** BigInt(exponent);
  else den = 10n ** BigInt(-exponent);
  return rational(num, den);
}

export function fromBigInt(value: bigint): Rational {
  return { num: value, den: 1n };
}

/** Returns a negative number, zero, or a positive number like a sort comparator. */
export function compare(a: Rational, b: Rational): number {
  const left = a.num * b.den;
  const right = b.num * a.den;
  return left < right ? -1 : left > right ? 1 : 0;
}

/** True when `value / divisor` is an integer. A zero divisor never divides. */
export function isMultipleOf(value: Rational, divisor: Rational): boolean {
  if (divisor.num === 0n) return false;
  return (value.num * divisor.den) % (value.den * divisor.num) === 0n;
}

export function formatRational(value: Rational): string {
  if (value.den === 1n) return value.num.toString();
  // Terminating decimals print as decimals; anything else as a fraction.
  let den = value.den;
  let twos = 0;
  let fives = 0;
  while (den % 2n === 0n) {
    den /= 2n;
    twos++;
  }
  while (den % 5n === 0n) {
    den /= 5n;
    fives++;
  }
  if (den !== 1n) return `${value.num}/${value.den}`;
  const digits = Math.max(twos, fives);
  const scaled = (value.num * 10n ** BigInt(digits)) / value.den;
  const negative = scaled < 0n;
  const abs = (negative ? -scaled : scaled).toString().padStart(digits + 1, '0');
  const text = `${abs.slice(0, abs.length - digits)}.${abs.slice(abs.length - digits)}`;
  return negative ? `-${text}` : text;
}
