// Elementary functions of a dual number. Each applies the function to the
// real part and multiplies the inner derivative by the outer derivative
// evaluated at the real part (chain rule). A real part that is itself a dual
// number goes through the same function one level down.

import {
  Dual,
  DualLike,
  dualNumber,
  isDual,
  negate,
  over,
  primal,
  times,
} from "./ad";
import { DomainError } from "./errors";
import { isComplex, sExp, sIsZero, sLog, sSin, sCos } from "./scalar";

export function dexp(a: Dual): Dual {
  const e = isDual(a.real) ? dexp(a.real) : sExp(a.real);
  return dualNumber(e, times(a.dual, e));
}

// Complex arguments take the principal branch and skip the sign check.
export function dlog(a: Dual): Dual {
  const v = primal(a.real);
  if (isComplex(v)) {
    if (sIsZero(v)) {
      throw new DomainError("Logarithm is undefined at zero.");
    }
  } else if (v <= 0) {
    throw new DomainError("Logarithm is undefined for non-positive values.");
  }
  const l = isDual(a.real) ? dlog(a.real) : sLog(a.real);
  return dualNumber(l, over(a.dual, a.real));
}

function cosOf(a: DualLike): DualLike {
  return isDual(a) ? dcos(a) : sCos(a);
}

function sinOf(a: DualLike): DualLike {
  return isDual(a) ? dsin(a) : sSin(a);
}

export function dcos(a: Dual): Dual {
  return dualNumber(cosOf(a.real), negate(times(a.dual, sinOf(a.real))));
}

export function dsin(a: Dual): Dual {
  return dualNumber(sinOf(a.real), times(a.dual, cosOf(a.real)));
}

export function dabs(a: Dual): Dual {
  const v = primal(a.real);
  if (isComplex(v)) {
    throw new DomainError("Complex absolute value is nowhere differentiable.");
  }
  if (v === 0) {
    throw new DomainError("Derivative of absolute value is undefined at 0.");
  }
  const r = isDual(a.real) ? dabs(a.real) : Math.abs(v);
  return dualNumber(r, times(a.dual, Math.sign(v)));
}
