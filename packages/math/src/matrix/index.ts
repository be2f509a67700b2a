export { Matrix } from "./matrix.js";
export {
  size,
  sizeEquals,
  transposeSize,
  isValidSize,
  formatSize,
  type Size,
} from "./size.js";
export {
  MatrixError,
  isMatrixError,
  matrixError,
  TM1001,
  TM1002,
  TM1003,
  TM1004,
  TM1005,
  TM1006,
  TM1007,
  TM2001,
  type MatrixErrorKind,
  type MatrixErrorDescriptor,
  type MatrixErrorDetails,
} from "./errors.js";
export { unsafeChoose, unsafeRemove, type Grid } from "./selection.js";
export { cofactorExpansion } from "./determinant.js";
