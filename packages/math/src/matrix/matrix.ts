/**
 * Matrix<A> - rectangular grids over any Numeric element type
 *
 * Element arithmetic goes through the `Numeric<A>` instance the matrix was
 * built with, and cell comparison through its `Eq<A>` instance, so the same
 * code serves `number`, `bigint` and exact `Rational` grids.
 *
 * Operations that can fail return `Either<MatrixError, T>`; nothing answers
 * an impossible operation with a placeholder matrix.
 *
 * @example
 * ```typescript
 * const m = getOrThrow(Matrix.fromRows([[1, 2], [3, 4]], numericNumber));
 * getOrThrow(m.determinant());         // -2
 * getOrThrow(m.multiply(m)).toArray(); // [[7, 10], [15, 22]]
 * m.add(Matrix.zeros(size(3, 3), numericNumber)); // Left(ShapeMismatch)
 * ```
 */

import { diagnostic, invariant } from "@tessera/core";
import { Left, Right, map, type Either } from "@tessera/fp";
import {
  dot,
  eqStrict,
  minusOne,
  range,
  rangeContains,
  rangeMap,
  sum,
  type Eq,
  type Numeric,
} from "@tessera/std";
import { cofactorExpansion } from "./determinant.js";
import {
  TM1001,
  TM1002,
  TM1003,
  TM1004,
  TM1005,
  TM1006,
  TM1007,
  TM2001,
  fail,
  matrixError,
  type MatrixError,
} from "./errors.js";
import {
  complementIndices,
  findOutOfRange,
  normalizeIndices,
  pick,
  type Grid,
} from "./selection.js";
import { formatSize, isValidSize, size, sizeEquals, transposeSize, type Size } from "./size.js";

export class Matrix<A> {
  private grid: A[][];
  private dims: Size;
  private transposedFlag = false;

  private constructor(
    grid: A[][],
    readonly numeric: Numeric<A>,
    readonly eq: Eq<A>
  ) {
    invariant(grid.length > 0 && grid[0].length > 0, "matrix grid must be non-empty");
    this.grid = grid;
    this.dims = size(grid.length, grid[0].length);
  }

  // ==========================================================================
  // Construction
  // ==========================================================================

  /**
   * Build a matrix from rows of values. The rows are copied.
   *
   * Fails with `MalformedInput` when there are no rows, when the first row is
   * empty, or when two rows differ in length.
   */
  static fromRows<A>(
    rows: Grid<A>,
    numeric: Numeric<A>,
    eq: Eq<A> = eqStrict()
  ): Either<MatrixError, Matrix<A>> {
    if (rows.length === 0) {
      return fail(TM1001);
    }
    const expected = rows[0].length;
    if (expected === 0) {
      return fail(TM1003, { size: formatSize(size(rows.length, 0)) });
    }
    for (let i = 1; i < rows.length; i++) {
      if (rows[i].length !== expected) {
        return fail(TM1002, { row: i, actual: rows[i].length, expected });
      }
    }
    return Right(new Matrix(rows.map((row) => [...row]), numeric, eq));
  }

  /**
   * A matrix of the given size filled with `numeric.zero()`.
   *
   * @throws MatrixError (`MalformedInput`) unless rows and columns are positive integers
   */
  static zeros<A>(dims: Size, numeric: Numeric<A>, eq: Eq<A> = eqStrict()): Matrix<A> {
    if (!isValidSize(dims)) {
      throw matrixError(TM1003, { size: formatSize(dims) });
    }
    const grid = rangeMap(range(0, dims.rows), () =>
      rangeMap(range(0, dims.columns), () => numeric.zero())
    );
    return new Matrix(grid, numeric, eq);
  }

  /**
   * The identity matrix of the given order.
   *
   * @throws MatrixError (`MalformedInput`) unless order is a positive integer
   */
  static identity<A>(order: number, numeric: Numeric<A>, eq: Eq<A> = eqStrict()): Matrix<A> {
    const dims = size(order, order);
    if (!isValidSize(dims)) {
      throw matrixError(TM1003, { size: formatSize(dims) });
    }
    const grid = rangeMap(range(0, order), (i) =>
      rangeMap(range(0, order), (j) => (i === j ? numeric.one() : numeric.zero()))
    );
    return new Matrix(grid, numeric, eq);
  }

  /**
   * A square matrix with `values` on the diagonal and zero elsewhere.
   */
  static diagonal<A>(
    values: readonly A[],
    numeric: Numeric<A>,
    eq: Eq<A> = eqStrict()
  ): Either<MatrixError, Matrix<A>> {
    if (values.length === 0) {
      return fail(TM1003, { size: formatSize(size(0, 0)) });
    }
    const grid = values.map((value, i) =>
      values.map((_, j) => (i === j ? value : numeric.zero()))
    );
    return Right(new Matrix(grid, numeric, eq));
  }

  /**
   * scalar × matrix. `matrix.scale(scalar)` is defined through this, so the
   * two orders agree; for a non-commutative element type the scalar is always
   * applied on the left.
   */
  static scalarMultiply<A>(scalar: A, matrix: Matrix<A>): Matrix<A> {
    const N = matrix.numeric;
    return matrix.derive(matrix.grid.map((row) => row.map((value) => N.mul(scalar, value))));
  }

  private derive(grid: A[][]): Matrix<A> {
    return new Matrix(grid, this.numeric, this.eq);
  }

  // ==========================================================================
  // Shape
  // ==========================================================================

  get size(): Size {
    return this.dims;
  }

  /** Live read-only view of the cells, row by row. */
  get storage(): Grid<A> {
    return this.grid;
  }

  /** Whether the in-place `transpose()` has run an odd number of times. */
  get isTransposed(): boolean {
    return this.transposedFlag;
  }

  isSquare(): boolean {
    return this.dims.rows === this.dims.columns;
  }

  // ==========================================================================
  // Element access
  // ==========================================================================

  private checkCell(row: number, column: number): MatrixError | undefined {
    if (!rangeContains(range(0, this.dims.rows), row)) {
      return matrixError(TM1006, { axis: "row", index: row, limit: this.dims.rows });
    }
    if (!rangeContains(range(0, this.dims.columns), column)) {
      return matrixError(TM1006, { axis: "column", index: column, limit: this.dims.columns });
    }
    return undefined;
  }

  get(row: number, column: number): Either<MatrixError, A> {
    const error = this.checkCell(row, column);
    return error ? Left(error) : Right(this.grid[row][column]);
  }

  set(row: number, column: number, value: A): Either<MatrixError, void> {
    const error = this.checkCell(row, column);
    if (error) return Left(error);
    this.grid[row][column] = value;
    return Right(undefined);
  }

  /** Unchecked read; the caller guarantees the coordinates are in range. */
  unsafeGet(row: number, column: number): A {
    return this.grid[row][column];
  }

  /** Unchecked write; the caller guarantees the coordinates are in range. */
  unsafeSet(row: number, column: number, value: A): void {
    this.grid[row][column] = value;
  }

  row(index: number): Either<MatrixError, A[]> {
    if (!rangeContains(range(0, this.dims.rows), index)) {
      return fail(TM1006, { axis: "row", index, limit: this.dims.rows });
    }
    return Right([...this.grid[index]]);
  }

  column(index: number): Either<MatrixError, A[]> {
    if (!rangeContains(range(0, this.dims.columns), index)) {
      return fail(TM1006, { axis: "column", index, limit: this.dims.columns });
    }
    return Right(this.grid.map((row) => row[index]));
  }

  /** Deep copy of the cells. */
  toArray(): A[][] {
    return this.grid.map((row) => [...row]);
  }

  // ==========================================================================
  // Equality
  // ==========================================================================

  /**
   * Same size and equal cells under this matrix's `Eq`. Matrices of different
   * sizes are unequal, and a TM2001 note is emitted for them.
   */
  equals(other: Matrix<A>): boolean {
    if (!sizeEquals(this.dims, other.dims)) {
      diagnostic(TM2001)
        .withArgs({ left: formatSize(this.dims), right: formatSize(other.dims) })
        .note("equality is only checked between matrices with the same number of rows and columns")
        .emit();
      return false;
    }
    return this.grid.every((row, i) =>
      row.every((value, j) => this.eq.equals(value, other.grid[i][j]))
    );
  }

  // ==========================================================================
  // Arithmetic
  // ==========================================================================

  private zipWith(
    other: Matrix<A>,
    operation: string,
    f: (a: A, b: A) => A
  ): Either<MatrixError, Matrix<A>> {
    if (!sizeEquals(this.dims, other.dims)) {
      return fail(TM1004, {
        operation,
        left: formatSize(this.dims),
        right: formatSize(other.dims),
      });
    }
    return Right(
      this.derive(this.grid.map((row, i) => row.map((value, j) => f(value, other.grid[i][j]))))
    );
  }

  add(other: Matrix<A>): Either<MatrixError, Matrix<A>> {
    return this.zipWith(other, "add", (a, b) => this.numeric.add(a, b));
  }

  subtract(other: Matrix<A>): Either<MatrixError, Matrix<A>> {
    return this.zipWith(other, "subtract", (a, b) => this.numeric.sub(a, b));
  }

  /**
   * Matrix product. Requires `this.columns === other.rows`; the result is
   * `this.rows × other.columns`, each cell a dot product accumulated from zero.
   */
  multiply(other: Matrix<A>): Either<MatrixError, Matrix<A>> {
    if (this.dims.columns !== other.dims.rows) {
      return fail(TM1004, {
        operation: "multiply",
        left: formatSize(this.dims),
        right: formatSize(other.dims),
      });
    }
    const N = this.numeric;
    const otherColumns = other.transposedGrid();
    return Right(
      this.derive(this.grid.map((row) => otherColumns.map((column) => dot(row, column, N))))
    );
  }

  /** matrix × scalar. */
  scale(scalar: A): Matrix<A> {
    return Matrix.scalarMultiply(scalar, this);
  }

  negate(): Matrix<A> {
    return Matrix.scalarMultiply(minusOne(this.numeric), this);
  }

  /** `this += other`. On failure the receiver is left as it was. */
  addAssign(other: Matrix<A>): Either<MatrixError, this> {
    return map(this.add(other), (result) => this.replaceGrid(result.grid));
  }

  /** `this -= other`. On failure the receiver is left as it was. */
  subtractAssign(other: Matrix<A>): Either<MatrixError, this> {
    return map(this.subtract(other), (result) => this.replaceGrid(result.grid));
  }

  /** `this *= scalar`, cell by cell. */
  scaleAssign(scalar: A): this {
    const N = this.numeric;
    for (const row of this.grid) {
      for (let j = 0; j < row.length; j++) {
        row[j] = N.mul(scalar, row[j]);
      }
    }
    return this;
  }

  private replaceGrid(grid: A[][]): this {
    this.grid = grid;
    this.dims = size(grid.length, grid[0].length);
    return this;
  }

  /** Sum of the diagonal. */
  trace(): Either<MatrixError, A> {
    if (!this.isSquare()) {
      return fail(TM1007, { operation: "trace", size: formatSize(this.dims) });
    }
    return Right(sum(this.grid.map((row, i) => row[i]), this.numeric));
  }

  // ==========================================================================
  // Transpose
  // ==========================================================================

  private transposedGrid(): A[][] {
    return rangeMap(range(0, this.dims.columns), (j) => this.grid.map((row) => row[j]));
  }

  /** A new matrix with rows and columns swapped; the receiver is untouched. */
  transposed(): Matrix<A> {
    return this.derive(this.transposedGrid());
  }

  /** Swap rows and columns in place and flip `isTransposed`. */
  transpose(): this {
    const grid = this.transposedGrid();
    this.grid = grid;
    this.dims = transposeSize(this.dims);
    this.transposedFlag = !this.transposedFlag;
    return this;
  }

  // ==========================================================================
  // Submatrices
  // ==========================================================================

  private checkSelection(
    rowIndices: readonly number[],
    columnIndices: readonly number[]
  ): MatrixError | undefined {
    if (rowIndices.length === 0) {
      return matrixError(TM1005, { axis: "row" });
    }
    if (columnIndices.length === 0) {
      return matrixError(TM1005, { axis: "column" });
    }
    const badRow = findOutOfRange(normalizeIndices(rowIndices), this.dims.rows);
    if (badRow !== undefined) {
      return matrixError(TM1006, { axis: "row", index: badRow, limit: this.dims.rows });
    }
    const badColumn = findOutOfRange(normalizeIndices(columnIndices), this.dims.columns);
    if (badColumn !== undefined) {
      return matrixError(TM1006, { axis: "column", index: badColumn, limit: this.dims.columns });
    }
    return undefined;
  }

  /**
   * The submatrix at the crossings of the given rows and columns. Indices are
   * deduplicated and sorted first, so their order does not matter.
   */
  choose(
    rowIndices: readonly number[],
    columnIndices: readonly number[]
  ): Either<MatrixError, Matrix<A>> {
    const error = this.checkSelection(rowIndices, columnIndices);
    if (error) return Left(error);
    return Right(
      this.derive(pick(this.grid, normalizeIndices(rowIndices), normalizeIndices(columnIndices)))
    );
  }

  /**
   * The submatrix left after crossing off the given rows and columns.
   * Crossing off every row (or column) fails with `EmptySelection`.
   */
  remove(
    rowIndices: readonly number[],
    columnIndices: readonly number[]
  ): Either<MatrixError, Matrix<A>> {
    const error = this.checkSelection(rowIndices, columnIndices);
    if (error) return Left(error);
    return this.choose(
      complementIndices(this.dims.rows, rowIndices),
      complementIndices(this.dims.columns, columnIndices)
    );
  }

  // ==========================================================================
  // Determinant and predicates
  // ==========================================================================

  /**
   * Determinant by cofactor expansion along the first row. Exponential in the
   * order of the matrix.
   */
  determinant(): Either<MatrixError, A> {
    if (!this.isSquare()) {
      return fail(TM1007, { operation: "determinant", size: formatSize(this.dims) });
    }
    return Right(cofactorExpansion(this.grid, this.numeric));
  }

  /** Determinant equals zero. Non-square matrices are never degenerate. */
  isDegenerate(): boolean {
    if (!this.isSquare()) return false;
    return this.eq.equals(cofactorExpansion(this.grid, this.numeric), this.numeric.zero());
  }

  isSymmetric(): boolean {
    return this.isSquare() && this.transposed().equals(this);
  }

  isAntisymmetric(): boolean {
    return this.isSquare() && this.transposed().negate().equals(this);
  }
}
