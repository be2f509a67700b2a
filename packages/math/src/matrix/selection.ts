/**
 * Index-set helpers behind `Matrix.choose` / `Matrix.remove`, and their
 * unchecked grid-level counterparts.
 *
 * The `unsafe*` functions skip emptiness and bounds checks; callers must pass
 * a rectangular, non-empty grid and indices that lie inside it. For such
 * input they return exactly what the validated methods return.
 */

import { range, rangeContains, rangeFilter } from "@tessera/std";

export type Grid<A> = ReadonlyArray<ReadonlyArray<A>>;

/**
 * Deduplicated, ascending copy of `indices`.
 */
export function normalizeIndices(indices: Iterable<number>): number[] {
  return [...new Set(indices)].sort((a, b) => a - b);
}

/**
 * Indices of `0..<count` that are not in `removed`, ascending.
 */
export function complementIndices(count: number, removed: Iterable<number>): number[] {
  const crossedOff = new Set(removed);
  return rangeFilter(range(0, count), (i) => !crossedOff.has(i));
}

/**
 * First index (in the order given) that is not a whole number in `0..<count`.
 */
export function findOutOfRange(indices: Iterable<number>, count: number): number | undefined {
  const valid = range(0, count);
  for (const index of indices) {
    if (!rangeContains(valid, index)) return index;
  }
  return undefined;
}

/**
 * Cells at the crossings of `rows` and `columns`, in the order given.
 */
export function pick<A>(grid: Grid<A>, rows: readonly number[], columns: readonly number[]): A[][] {
  return rows.map((r) => {
    const source = grid[r];
    return columns.map((c) => source[c]);
  });
}

export function unsafeChoose<A>(
  grid: Grid<A>,
  rows: Iterable<number>,
  columns: Iterable<number>
): A[][] {
  return pick(grid, normalizeIndices(rows), normalizeIndices(columns));
}

export function unsafeRemove<A>(
  grid: Grid<A>,
  rows: Iterable<number>,
  columns: Iterable<number>
): A[][] {
  return pick(
    grid,
    complementIndices(grid.length, rows),
    complementIndices(grid[0].length, columns)
  );
}
