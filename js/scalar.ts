import {
  Complex,
  complex,
  cAdd,
  cSub,
  cNeg,
  cMul,
  cDiv,
  cIsZero,
  cExp,
  cLog,
  cSin,
  cCos,
  cToString,
} from "./complex";

// The components of a dual number are either plain numbers or complex numbers.
// Two numbers combine to a number; a complex operand makes the result complex.
export type Scalar = number | Complex;

export function isComplex(a: Scalar): a is Complex {
  return typeof a !== "number";
}

function promote(a: Scalar): Complex {
  return typeof a === "number" ? complex(a) : a;
}

export function sAdd(a: Scalar, b: Scalar): Scalar {
  if (typeof a === "number" && typeof b === "number") return a + b;
  return cAdd(promote(a), promote(b));
}

export function sSub(a: Scalar, b: Scalar): Scalar {
  if (typeof a === "number" && typeof b === "number") return a - b;
  return cSub(promote(a), promote(b));
}

export function sNeg(a: Scalar): Scalar {
  return typeof a === "number" ? -a : cNeg(a);
}

export function sMul(a: Scalar, b: Scalar): Scalar {
  if (typeof a === "number" && typeof b === "number") return a * b;
  return cMul(promote(a), promote(b));
}

export function sDiv(a: Scalar, b: Scalar): Scalar {
  if (typeof a === "number" && typeof b === "number") return a / b;
  return cDiv(promote(a), promote(b));
}

export function sIsZero(a: Scalar): boolean {
  return typeof a === "number" ? a === 0 : cIsZero(a);
}

export function sExp(a: Scalar): Scalar {
  return typeof a === "number" ? Math.exp(a) : cExp(a);
}

export function sLog(a: Scalar): Scalar {
  return typeof a === "number" ? Math.log(a) : cLog(a);
}

export function sSin(a: Scalar): Scalar {
  return typeof a === "number" ? Math.sin(a) : cSin(a);
}

export function sCos(a: Scalar): Scalar {
  return typeof a === "number" ? Math.cos(a) : cCos(a);
}

export function sToString(a: Scalar): string {
  return typeof a === "number" ? `${a}` : cToString(a);
}
