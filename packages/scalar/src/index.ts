export { scalarKind } from "./kind.js";
export { Scalar, type ScalarLike } from "./scalar.js";
export {
  ScalarFunction,
  Add, Mul, LT, EQ,
  Neg, Inv, Log, Exp, Sigmoid, ReLU, Square,
  sigmoidValue,
} from "./functions.js";
export { centralDifference, derivativeCheck, type DerivativeMismatch } from "./check.js";
