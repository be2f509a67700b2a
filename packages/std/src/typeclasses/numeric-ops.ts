/**
 * Folds and signs over any `Numeric<A>`.
 */

import type { Numeric } from "./index.js";

/** Left-to-right sum starting from `zero()`. */
export function sum<A>(xs: Iterable<A>, N: Numeric<A>): A {
  let total = N.zero();
  for (const x of xs) total = N.add(total, x);
  return total;
}

/**
 * Σ xs[i]·ys[i], accumulated from `zero()`. The shorter sequence bounds the
 * sum.
 */
export function dot<A>(xs: readonly A[], ys: readonly A[], N: Numeric<A>): A {
  let total = N.zero();
  for (let i = 0; i < Math.min(xs.length, ys.length); i++) {
    total = N.add(total, N.mul(xs[i], ys[i]));
  }
  return total;
}

/** `negate(one())`. */
export function minusOne<A>(N: Numeric<A>): A {
  return N.negate(N.one());
}

/** (-1)^k: `one()` for even k, `minusOne()` for odd k. */
export function alternatingSign<A>(k: number, N: Numeric<A>): A {
  return k % 2 === 0 ? N.one() : minusOne(N);
}
