/**
 * @tessera/fp - typed failures
 *
 * @example
 * ```typescript
 * import { getOrThrow, map } from "@tessera/fp";
 *
 * getOrThrow(map(matrix.determinant(), (d) => d * 2));
 * ```
 */

export * from "./data/index.js";
