import * as ad from "./ad";
import { DomainError } from "./errors";

// A function written only with the operators in ./ad and ./elementary.
export type DualFn = (a: ad.Dual) => ad.Dual;

// Computes the derivative of `f` at `x` exactly, by evaluating `f` once on the
// seed `(x, 1)` and reading off the derivative component.
export function differentiate(f: DualFn, x: ad.DualLike): ad.DualLike {
  return ad.ddx(f(ad.x(x)));
}

// f' as a function of dual numbers. Evaluating it on a dual number nests that
// number inside the seed, so f' can itself be differentiated, e.g. by Newton's
// method when looking for the extrema of f.
export function derivative(f: DualFn): DualFn {
  return (a) => ad.lift(differentiate(f, a));
}

function real(s: ad.DualLike, what: string, x: number): number {
  if (typeof s !== "number") {
    throw new DomainError(`Expected a real ${what} at x = ${x}`);
  }
  return s;
}

// Real-line variant of `differentiate`.
export function differentiateReal(f: DualFn, x: number): number {
  return real(differentiate(f, x), "derivative", x);
}

// The value of `f` at `x`, so that a DualFn can be used where a plain
// function of a number is expected.
export function valueAt(f: DualFn, x: number): number {
  return real(ad.val(f(ad.c(x))), "value", x);
}
