/**
 * @tessera/std
 *
 * Element typeclasses (`Eq`, `Numeric`) with number and bigint instances,
 * generic folds over them, and half-open index ranges.
 *
 * @example
 * ```ts
 * import { dot, numericBigInt } from "@tessera/std";
 *
 * dot([1n, 2n], [3n, 4n], numericBigInt); // 11n
 * ```
 */

export * from "./typeclasses/index.js";
export * from "./data/index.js";
