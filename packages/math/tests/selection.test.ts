import { describe, it, expect } from "vitest";
import { getOrThrow, isLeft, type Either } from "@tessera/fp";
import { numericNumber } from "@tessera/std";
import { Matrix, unsafeChoose, unsafeRemove } from "../src/index.js";

function leftOf<E, A>(either: Either<E, A>): E {
  if (isLeft(either)) return either.left;
  throw new Error("expected a Left");
}

const m = getOrThrow(
  Matrix.fromRows(
    [
      [1, 3, -5, 4],
      [3, 2, 7, 6],
      [-8, 4, 5, 2],
    ],
    numericNumber
  )
);

describe("choose", () => {
  it("keeps the crossings of the given rows and columns", () => {
    expect(getOrThrow(m.choose([1, 2], [0, 2, 3])).toArray()).toEqual([
      [3, 7, 6],
      [-8, 5, 2],
    ]);
  });

  it("ignores the order of the indices", () => {
    const ordered = getOrThrow(m.choose([1, 2], [0, 1]));
    const shuffled = getOrThrow(m.choose([2, 1], [1, 0]));
    expect(shuffled.equals(ordered)).toBe(true);
  });

  it("ignores repeated indices", () => {
    expect(getOrThrow(m.choose([1, 1, 2], [0, 0])).toArray()).toEqual([[3], [-8]]);
  });

  it("returns a matrix that does not share cells with the source", () => {
    const sub = getOrThrow(m.choose([0], [0]));
    sub.unsafeSet(0, 0, 42);
    expect(m.unsafeGet(0, 0)).toBe(1);
  });

  it("rejects an empty row selection", () => {
    const error = leftOf(m.choose([], [0]));
    expect(error.kind).toBe("EmptySelection");
    expect(error.message).toBe("Cannot select from an empty set of row indices");
  });

  it("rejects an empty column selection", () => {
    expect(leftOf(m.choose([0], [])).message).toBe(
      "Cannot select from an empty set of column indices"
    );
  });

  it("rejects indices outside the matrix", () => {
    expect(leftOf(m.choose([0, 3], [0])).message).toBe("row index 3 is out of range 0..<3");
    expect(leftOf(m.choose([0], [4])).message).toBe("column index 4 is out of range 0..<4");
  });
});

describe("remove", () => {
  it("crosses off the given rows and columns", () => {
    expect(getOrThrow(m.remove([0], [1])).toArray()).toEqual([
      [3, 7, 6],
      [-8, 5, 2],
    ]);
  });

  it("matches choose on the complement", () => {
    const removed = getOrThrow(m.remove([1], [0, 3]));
    const chosen = getOrThrow(m.choose([0, 2], [1, 2]));
    expect(removed.toArray()).toEqual([
      [3, -5],
      [4, 5],
    ]);
    expect(removed.equals(chosen)).toBe(true);
  });

  it("rejects removing every row", () => {
    const error = leftOf(m.remove([0, 1, 2], [0]));
    expect(error.kind).toBe("EmptySelection");
    expect(error.details).toEqual({ axis: "row" });
  });

  it("rejects indices outside the matrix", () => {
    expect(leftOf(m.remove([5], [0])).kind).toBe("IndexOutOfBounds");
  });
});

describe("unchecked selection", () => {
  it("agrees with choose on valid input", () => {
    expect(unsafeChoose(m.storage, [2, 1], [3, 0, 2])).toEqual(
      getOrThrow(m.choose([1, 2], [0, 2, 3])).toArray()
    );
  });

  it("agrees with remove on valid input", () => {
    expect(unsafeRemove(m.storage, [1], [3, 0])).toEqual(
      getOrThrow(m.remove([1], [0, 3])).toArray()
    );
  });
});
