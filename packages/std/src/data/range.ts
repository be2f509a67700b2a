/**
 * Half-open integer ranges `[start, end)`, used for index sets.
 */

export interface Range {
  readonly start: number;
  readonly end: number;
}

export function range(start: number, end: number): Range {
  return { start, end };
}

function* members({ start, end }: Range): Generator<number> {
  for (let i = start; i < end; i++) yield i;
}

export function rangeMap<A>(r: Range, fn: (n: number) => A): A[] {
  return Array.from(members(r), fn);
}

export function rangeFilter(r: Range, keep: (n: number) => boolean): number[] {
  return [...members(r)].filter(keep);
}

/** True only for whole numbers inside the range; NaN and 1.5 are never members. */
export function rangeContains({ start, end }: Range, value: number): boolean {
  return Number.isInteger(value - start) && value >= start && value < end;
}
