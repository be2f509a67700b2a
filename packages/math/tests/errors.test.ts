import { describe, it, expect, afterEach } from "vitest";
import { config, setDiagnosticWriter } from "@tessera/core";
import { numericNumber } from "@tessera/std";
import { Matrix, MatrixError, TM1004, isMatrixError, matrixError } from "../src/index.js";

afterEach(() => {
  setDiagnosticWriter(undefined);
  config.reset();
});

describe("MatrixError", () => {
  it("carries the descriptor's kind and code", () => {
    const error = matrixError(TM1004, { operation: "add", left: "1x2", right: "2x1" });
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe("MatrixError");
    expect(error.kind).toBe("ShapeMismatch");
    expect(error.code).toBe("TM1004");
    expect(error.message).toBe("Cannot add matrices of size 1x2 and 2x1");
    expect(error.details).toEqual({ operation: "add", left: "1x2", right: "2x1" });
  });

  it("is recognized by isMatrixError", () => {
    expect(isMatrixError(new MatrixError(TM1004))).toBe(true);
    expect(isMatrixError(new Error("plain"))).toBe(false);
    expect(isMatrixError("TM1004")).toBe(false);
  });

  it("is not printed by default", () => {
    const lines: string[] = [];
    setDiagnosticWriter((line) => lines.push(line));
    Matrix.fromRows([], numericNumber);
    expect(lines).toEqual([]);
  });

  it("is printed when verbose diagnostics are on", () => {
    const lines: string[] = [];
    setDiagnosticWriter((line) => lines.push(line));
    config.set({ diagnostics: { verbose: true } });
    Matrix.fromRows([[1, 2], [3]], numericNumber);
    expect(lines).toEqual(["error[TM1002]: Row 1 has 1 values but row 0 has 2"]);
  });
});
