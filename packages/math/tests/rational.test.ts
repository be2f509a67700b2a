import { describe, it, expect } from "vitest";
import { eqRational, numericRational, rational } from "../src/index.js";

describe("Rational", () => {
  it("reduces to lowest terms", () => {
    expect(rational(6n, 8n)).toEqual({ num: 3n, den: 4n });
    expect(rational(0n, 5n)).toEqual({ num: 0n, den: 1n });
  });

  it("keeps the denominator positive", () => {
    expect(rational(1n, -2n)).toEqual({ num: -1n, den: 2n });
    expect(rational(-3n, -9n)).toEqual({ num: 1n, den: 3n });
  });

  it("throws for a zero denominator", () => {
    expect(() => rational(1n, 0n)).toThrow(RangeError);
  });

  describe("numericRational", () => {
    const half = rational(1n, 2n);
    const third = rational(1n, 3n);

    it("adds, subtracts and multiplies exactly", () => {
      expect(numericRational.add(half, third)).toEqual({ num: 5n, den: 6n });
      expect(numericRational.sub(third, half)).toEqual({ num: -1n, den: 6n });
      expect(numericRational.mul(rational(2n, 3n), rational(3n, 4n))).toEqual(half);
    });

    it("negates", () => {
      expect(numericRational.negate(half)).toEqual({ num: -1n, den: 2n });
      expect(numericRational.negate(numericRational.zero())).toEqual({ num: 0n, den: 1n });
    });

    it("has zero and one as identities", () => {
      expect(numericRational.add(third, numericRational.zero())).toEqual(third);
      expect(numericRational.mul(third, numericRational.one())).toEqual(third);
    });
  });

  it("compares by value", () => {
    expect(eqRational.equals(rational(2n, 4n), rational(1n, 2n))).toBe(true);
    expect(eqRational.equals(rational(1n, 3n), rational(1n, 2n))).toBe(false);
  });
});
