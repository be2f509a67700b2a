/**
 * @tessera/math - Generic matrices over Numeric element types
 *
 * This package provides:
 * - **Matrix<A>**: rectangular grids with arithmetic, transpose, submatrix
 *   selection and a cofactor determinant, over any `Numeric<A>`
 * - **Rational**: exact bigint fractions, for determinants without rounding
 * - **MatrixError**: the catalogued, typed failures of the matrix API
 *
 * Fallible operations return `Either<MatrixError, T>` from @tessera/fp.
 *
 * @example
 * ```typescript
 * import { Matrix, numericRational, eqRational, rational } from "@tessera/math";
 * import { getOrThrow } from "@tessera/fp";
 *
 * const m = getOrThrow(
 *   Matrix.fromRows(
 *     [[rational(1n, 2n), rational(1n)], [rational(3n), rational(4n)]],
 *     numericRational,
 *     eqRational
 *   )
 * );
 * getOrThrow(m.determinant()); // { num: -1n, den: 1n }
 * ```
 *
 * @packageDocumentation
 */

// ============================================================================
// Matrix
// ============================================================================

export * from "./matrix/index.js";

// ============================================================================
// Rational Numbers
// ============================================================================

export { type Rational, rational, numericRational, eqRational } from "./types/rational.js";
