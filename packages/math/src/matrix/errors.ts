/**
 * Matrix error catalog
 *
 * Every recoverable failure of the matrix API is a {@link MatrixError} built
 * from one of the descriptors below. The `kind` lets callers branch on the
 * failure class; the `code` is stable across releases.
 */

import {
  config,
  diagnostic,
  DiagnosticCategory,
  interpolate,
  type DiagnosticArgs,
  type DiagnosticDescriptor,
} from "@tessera/core";
import { Left, type Either } from "@tessera/fp";

export type MatrixErrorKind =
  | "MalformedInput"
  | "ShapeMismatch"
  | "EmptySelection"
  | "IndexOutOfBounds"
  | "NotSquare";

export interface MatrixErrorDescriptor extends DiagnosticDescriptor {
  readonly kind: MatrixErrorKind;
}

export type MatrixErrorDetails = DiagnosticArgs;

// ============================================================================
// Construction (TM1001-TM1003)
// ============================================================================

export const TM1001: MatrixErrorDescriptor = {
  code: "TM1001",
  kind: "MalformedInput",
  severity: "error",
  category: DiagnosticCategory.Construction,
  messageTemplate: "Cannot build a matrix from an empty list of rows",
};

export const TM1002: MatrixErrorDescriptor = {
  code: "TM1002",
  kind: "MalformedInput",
  severity: "error",
  category: DiagnosticCategory.Construction,
  messageTemplate: "Row {row} has {actual} values but row 0 has {expected}",
};

export const TM1003: MatrixErrorDescriptor = {
  code: "TM1003",
  kind: "MalformedInput",
  severity: "error",
  category: DiagnosticCategory.Construction,
  messageTemplate: "A matrix needs a positive whole number of rows and columns, got {size}",
};

// ============================================================================
// Arithmetic (TM1004)
// ============================================================================

export const TM1004: MatrixErrorDescriptor = {
  code: "TM1004",
  kind: "ShapeMismatch",
  severity: "error",
  category: DiagnosticCategory.Shape,
  messageTemplate: "Cannot {operation} matrices of size {left} and {right}",
};

// ============================================================================
// Selection and access (TM1005-TM1006)
// ============================================================================

export const TM1005: MatrixErrorDescriptor = {
  code: "TM1005",
  kind: "EmptySelection",
  severity: "error",
  category: DiagnosticCategory.Selection,
  messageTemplate: "Cannot select from an empty set of {axis} indices",
};

export const TM1006: MatrixErrorDescriptor = {
  code: "TM1006",
  kind: "IndexOutOfBounds",
  severity: "error",
  category: DiagnosticCategory.Access,
  messageTemplate: "{axis} index {index} is out of range 0..<{limit}",
};

// ============================================================================
// Square-only operations (TM1007)
// ============================================================================

export const TM1007: MatrixErrorDescriptor = {
  code: "TM1007",
  kind: "NotSquare",
  severity: "error",
  category: DiagnosticCategory.Shape,
  messageTemplate: "{operation} requires a square matrix, got {size}",
};

// ============================================================================
// Notes (TM2001)
// ============================================================================

export const TM2001: DiagnosticDescriptor = {
  code: "TM2001",
  severity: "info",
  category: DiagnosticCategory.Equality,
  messageTemplate: "Matrices of size {left} and {right} are never equal",
};

// ============================================================================
// MatrixError
// ============================================================================

export class MatrixError extends Error {
  readonly kind: MatrixErrorKind;
  readonly code: string;
  readonly details: MatrixErrorDetails;

  constructor(descriptor: MatrixErrorDescriptor, details: MatrixErrorDetails = {}) {
    super(interpolate(descriptor.messageTemplate, details));
    this.name = "MatrixError";
    this.kind = descriptor.kind;
    this.code = descriptor.code;
    this.details = details;
  }
}

export function isMatrixError(value: unknown): value is MatrixError {
  return value instanceof MatrixError;
}

/**
 * Create a MatrixError, reporting it on the diagnostics channel when
 * `diagnostics.verbose` is set.
 */
export function matrixError(
  descriptor: MatrixErrorDescriptor,
  details: MatrixErrorDetails = {}
): MatrixError {
  if (config.flag("diagnostics.verbose", false)) {
    diagnostic(descriptor).withArgs(details).emit();
  }
  return new MatrixError(descriptor, details);
}

/**
 * A Left carrying a fresh MatrixError.
 */
export function fail<A = never>(
  descriptor: MatrixErrorDescriptor,
  details: MatrixErrorDetails = {}
): Either<MatrixError, A> {
  return Left(matrixError(descriptor, details));
}
