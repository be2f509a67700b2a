/**
 * Exact fractions over bigint, as a matrix element type.
 *
 * Values are kept reduced with a positive denominator, so two fractions are
 * equal exactly when their fields are. Determinants of `Rational` matrices
 * are exact.
 */

import { makeEq, type Eq, type Numeric } from "@tessera/std";

export interface Rational {
  readonly num: bigint;
  readonly den: bigint;
}

const abs = (n: bigint): bigint => (n < 0n ? -n : n);

function gcd(a: bigint, b: bigint): bigint {
  return b === 0n ? abs(a) : gcd(b, a % b);
}

function reduced(num: bigint, den: bigint): Rational {
  if (den === 0n) {
    throw new RangeError("Rational denominator must be non-zero");
  }
  const sign = den < 0n ? -1n : 1n;
  const g = gcd(num, den);
  return { num: (sign * num) / g, den: abs(den) / g };
}

/**
 * `num/den` in lowest terms.
 *
 * @throws RangeError when `den` is zero
 */
export function rational(num: bigint, den: bigint = 1n): Rational {
  return reduced(num, den);
}

export const numericRational: Numeric<Rational> = {
  add: (a, b) => reduced(a.num * b.den + b.num * a.den, a.den * b.den),
  sub: (a, b) => reduced(a.num * b.den - b.num * a.den, a.den * b.den),
  mul: (a, b) => reduced(a.num * b.num, a.den * b.den),
  negate: (a) => ({ num: -a.num, den: a.den }),
  zero: () => ({ num: 0n, den: 1n }),
  one: () => ({ num: 1n, den: 1n }),
};

export const eqRational: Eq<Rational> = makeEq((a, b) => a.num === b.num && a.den === b.den);
