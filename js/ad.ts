// Forward-mode automatic differentiation with dual numbers.

import { DivisionByZeroError, DomainError } from "./errors";
import {
  Scalar,
  sAdd,
  sSub,
  sNeg,
  sMul,
  sDiv,
  sIsZero,
  sToString,
} from "./scalar";

// The value of a function together with its derivative with respect to the
// single seeded variable. Components are usually scalars, but may themselves be
// dual numbers: differentiating a function of a dual number nests one inside
// the other, which is how second derivatives come out.
export interface Dual {
  readonly real: DualLike;
  readonly dual: DualLike;
}

// Anything the operators accept. A bare scalar is promoted with `c`, i.e. it is
// treated as a constant whose derivative is 0.
export type DualLike = Dual | Scalar;

export function isDual(a: DualLike): a is Dual {
  return typeof a === "object" && "real" in a && "dual" in a;
}

// Access components of Dual.

export function val(a: Dual): DualLike {
  return a.real;
}

export function ddx(a: Dual): DualLike {
  return a.dual;
}

// The innermost function value, past any nesting.
export function primal(a: DualLike): Scalar {
  return isDual(a) ? primal(a.real) : a;
}

// Create basic dual numbers.

export function dualNumber(real: DualLike, dual: DualLike): Dual {
  return Object.freeze({ real, dual });
}

// c for constant.
export function c(k: DualLike): Dual {
  return dualNumber(k, 0);
}

// The independent variable: its derivative with respect to itself is 1.
export function x(k: DualLike): Dual {
  return dualNumber(k, 1);
}

export function lift(a: DualLike): Dual {
  return isDual(a) ? a : c(a);
}

// Arithmetic on components: scalars stay scalars, a dual operand on either
// side recurses into the dual operations below.

export function plus(a: DualLike, b: DualLike): DualLike {
  return isDual(a) || isDual(b) ? add(a, b) : sAdd(a, b);
}

export function minus(a: DualLike, b: DualLike): DualLike {
  return isDual(a) || isDual(b) ? subtract(a, b) : sSub(a, b);
}

export function times(a: DualLike, b: DualLike): DualLike {
  return isDual(a) || isDual(b) ? mult(a, b) : sMul(a, b);
}

export function over(a: DualLike, b: DualLike): DualLike {
  return isDual(a) || isDual(b) ? div(a, b) : sDiv(a, b);
}

export function negate(a: DualLike): DualLike {
  return isDual(a) ? neg(a) : sNeg(a);
}

function isZero(a: DualLike): boolean {
  return isDual(a) ? isZero(a.real) : sIsZero(a);
}

// Operations.

export function add(a: DualLike, b: DualLike): Dual {
  a = lift(a);
  b = lift(b);
  return dualNumber(plus(a.real, b.real), plus(a.dual, b.dual));
}

export function subtract(a: DualLike, b: DualLike): Dual {
  a = lift(a);
  b = lift(b);
  return dualNumber(minus(a.real, b.real), minus(a.dual, b.dual));
}

export function neg(a: Dual): Dual {
  return dualNumber(negate(a.real), negate(a.dual));
}

export function mult(a: DualLike, b: DualLike): Dual {
  a = lift(a);
  b = lift(b);
  return dualNumber(
    times(a.real, b.real),
    plus(times(a.dual, b.real), times(a.real, b.dual))
  );
}

export function div(a: DualLike, b: DualLike): Dual {
  a = lift(a);
  b = lift(b);
  if (isZero(b.real)) throw new DivisionByZeroError();
  const denom = times(b.real, b.real);
  return dualNumber(
    over(a.real, b.real),
    over(minus(times(a.dual, b.real), times(a.real, b.dual)), denom)
  );
}

export function inv(a: Dual): Dual {
  return div(1, a);
}

// Only positive integer exponents are supported. The result is built by
// repeated multiplication so it stays exact for complex values too.
export function pow(a: Dual, n: number): Dual {
  if (!Number.isInteger(n) || n < 1) {
    throw new DomainError(`Exponent must be a positive integer, got ${n}`);
  }
  let result = a;
  for (let i = 1; i < n; i++) {
    result = mult(result, a);
  }
  return result;
}

export function square(a: Dual): Dual {
  return mult(a, a);
}

function componentToString(a: DualLike): string {
  return isDual(a) ? `(${toString(a)})` : sToString(a);
}

export function toString(a: Dual): string {
  return `${componentToString(a.real)}, ${componentToString(a.dual)}E`;
}
