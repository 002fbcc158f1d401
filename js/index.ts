export {
  Dual,
  DualLike,
  isDual,
  val,
  ddx,
  primal,
  dualNumber,
  c as constant,
  x as variable,
  add,
  subtract,
  neg,
  mult,
  div,
  inv,
  pow,
  square,
  toString,
} from "./ad";
export { dexp, dlog, dcos, dsin, dabs } from "./elementary";
export {
  DualFn,
  differentiate,
  derivative,
  differentiateReal,
  valueAt,
} from "./diff";
export { bisection, newton, BisectionOptions, NewtonOptions } from "./root";
export { SolverParams, DEFAULT_PARAMS } from "./params";
export { IterationLog, IterationRecord } from "./debug-info";
export {
  DualRootError,
  DivisionByZeroError,
  DomainError,
  BracketError,
  ConvergenceError,
} from "./errors";
export { Scalar, isComplex } from "./scalar";
export { Complex, complex } from "./complex";
