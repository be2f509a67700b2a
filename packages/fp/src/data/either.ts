/**
 * Either<E, A>: a failure `Left<E>` or a success `Right<A>`.
 *
 * Fallible matrix operations return `Either<MatrixError, T>` instead of
 * throwing, so callers branch on `_tag` (or use the helpers below).
 */

export interface Left<E> {
  readonly _tag: "Left";
  readonly left: E;
}

export interface Right<A> {
  readonly _tag: "Right";
  readonly right: A;
}

export type Either<E, A> = Left<E> | Right<A>;

export function Left<E, A = never>(left: E): Either<E, A> {
  return { _tag: "Left", left };
}

export function Right<E = never, A = unknown>(right: A): Either<E, A> {
  return { _tag: "Right", right };
}

export function isLeft<E, A>(either: Either<E, A>): either is Left<E> {
  return either._tag === "Left";
}

export function isRight<E, A>(either: Either<E, A>): either is Right<A> {
  return either._tag === "Right";
}

/** Apply `f` to a Right; a Left passes through untouched. */
export function map<E, A, B>(either: Either<E, A>, f: (a: A) => B): Either<E, B> {
  return either._tag === "Right" ? Right(f(either.right)) : either;
}

/** The Right value; a Left's payload is thrown. */
export function getOrThrow<E, A>(either: Either<E, A>): A {
  if (either._tag === "Left") throw either.left;
  return either.right;
}
