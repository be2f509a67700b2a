import { describe, it, expect } from "vitest";
import { type Either, Left, Right, isLeft, isRight, map, getOrThrow } from "./either.js";

const half = (n: number): Either<string, number> =>
  n % 2 === 0 ? Right(n / 2) : Left(`${n} is odd`);

describe("Either", () => {
  it("tags each side", () => {
    expect(Right(42)).toEqual({ _tag: "Right", right: 42 });
    expect(Left("odd")).toEqual({ _tag: "Left", left: "odd" });
  });

  it("narrows with isLeft and isRight", () => {
    expect(isRight(half(4))).toBe(true);
    expect(isLeft(half(3))).toBe(true);
    expect(isLeft(half(4))).toBe(false);
  });

  it("maps only a Right", () => {
    expect(map(half(8), (n) => n + 1)).toEqual(Right(5));
    expect(map(half(7), (n) => n + 1)).toEqual(Left("7 is odd"));
  });

  it("unwraps a Right and throws a Left's payload", () => {
    expect(getOrThrow(half(10))).toBe(5);
    expect(() => getOrThrow(Left(new RangeError("bad")))).toThrow(RangeError);
  });
});
