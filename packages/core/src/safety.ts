/**
 * Runtime Safety Primitives
 *
 * `invariant(condition, message)` asserts conditions the type system cannot
 * express. A failed invariant is a bug in the library, not a user error, so
 * it throws a plain Error rather than a catalogued one.
 */

/**
 * Runtime invariant check.
 *
 * @throws Error if condition is false
 */
export function invariant(condition: boolean, message?: string): asserts condition {
  if (!condition) {
    throw new Error(message ?? "Invariant violation");
  }
}
