/**
 * Matrix dimensions.
 */
export interface Size {
  readonly rows: number;
  readonly columns: number;
}

export function size(rows: number, columns: number): Size {
  return { rows, columns };
}

export function sizeEquals(a: Size, b: Size): boolean {
  return a.rows === b.rows && a.columns === b.columns;
}

/** Rows and columns swapped. */
export function transposeSize(s: Size): Size {
  return { rows: s.columns, columns: s.rows };
}

/** Both dimensions are positive integers. */
export function isValidSize(s: Size): boolean {
  return (
    Number.isInteger(s.rows) && Number.isInteger(s.columns) && s.rows >= 1 && s.columns >= 1
  );
}

/** `RxC`, e.g. "2x3". */
export function formatSize(s: Size): string {
  return `${s.rows}x${s.columns}`;
}
