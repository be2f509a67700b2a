/**
 * Element typeclasses
 *
 * A matrix never inspects its cells directly: arithmetic goes through a
 * `Numeric<A>` dictionary and comparison through an `Eq<A>` dictionary, both
 * passed in when the matrix is built.
 */

/**
 * Equality on elements. Must be reflexive, symmetric and transitive.
 */
export interface Eq<A> {
  equals(a: A, b: A): boolean;
}

/** `===`. The default for matrices built without an explicit Eq. */
export function eqStrict<A>(): Eq<A> {
  return { equals: (a, b) => a === b };
}

export function makeEq<A>(equals: (a: A, b: A) => boolean): Eq<A> {
  return { equals };
}

/**
 * Ring operations on elements.
 *
 * - `add` is associative and commutative with identity `zero()`
 * - `mul` is associative with identity `one()` and distributes over `add`
 * - `add(a, negate(a))` is `zero()`; `sub(a, b)` is `add(a, negate(b))`
 *
 * `zero` and `one` are thunks so instances over objects hand out fresh values.
 */
export interface Numeric<A> {
  add(a: A, b: A): A;
  sub(a: A, b: A): A;
  mul(a: A, b: A): A;
  negate(a: A): A;
  zero(): A;
  one(): A;
}

export const numericNumber: Numeric<number> = {
  add: (a, b) => a + b,
  sub: (a, b) => a - b,
  mul: (a, b) => a * b,
  negate: (a) => -a,
  zero: () => 0,
  one: () => 1,
};

export const numericBigInt: Numeric<bigint> = {
  add: (a, b) => a + b,
  sub: (a, b) => a - b,
  mul: (a, b) => a * b,
  negate: (a) => -a,
  zero: () => 0n,
  one: () => 1n,
};

export * from "./numeric-ops.js";
