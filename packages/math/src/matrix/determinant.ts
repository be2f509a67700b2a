/**
 * Laplace (cofactor) expansion along the first row:
 *
 *   det(M) = Σ_j (-1)^j · M[0][j] · det(minor(0, j))
 *
 * Exponential in the order of the matrix. Each minor is a fresh grid, so the
 * recursion shares no mutable state between branches.
 */

import { alternatingSign, type Numeric } from "@tessera/std";
import { unsafeRemove, type Grid } from "./selection.js";

/**
 * Determinant of a non-empty square grid. Squareness is not checked here.
 */
export function cofactorExpansion<A>(grid: Grid<A>, N: Numeric<A>): A {
  const order = grid.length;
  if (order === 1) {
    return grid[0][0];
  }

  const firstRow = grid[0];
  let result = N.zero();
  for (let j = 0; j < order; j++) {
    const minor = unsafeRemove(grid, [0], [j]);
    const cofactor = N.mul(alternatingSign(j, N), cofactorExpansion(minor, N));
    result = N.add(result, N.mul(firstRow[j], cofactor));
  }
  return result;
}
