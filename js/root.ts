// Root finding: bisection on a bracket, and Newton's method using exact
// derivatives from dual numbers.

import { DualFn, differentiateReal, valueAt } from "./diff";
import { IterationLog } from "./debug-info";
import { BracketError, ConvergenceError } from "./errors";
import { DEFAULT_PARAMS, SolverParams } from "./params";

export interface BisectionOptions {
  // Defaults to `params.bisectionMaxIter`.
  maxIter?: number;
  params?: SolverParams;
  log?: IterationLog;
}

// Finds a root of `f` in `[a, b]` by repeatedly halving the bracket.
// `f` must be continuous with `f(a) * f(b) <= 0`. Returns the first midpoint
// where `|f(p)| <= epsilon`, or the midpoint of the bracket once its width is
// at most `epsilon`.
export function bisection(
  f: (x: number) => number,
  a: number,
  b: number,
  epsilon: number,
  options: BisectionOptions = {}
): number {
  const params = options.params ?? DEFAULT_PARAMS;
  const maxIter = options.maxIter ?? params.bisectionMaxIter;

  let fa = f(a);
  const fb = f(b);
  if (fa * fb > 0) throw new BracketError(a, b, fa, fb);

  let iteration = 0;
  while (Math.abs(b - a) > epsilon) {
    if (iteration >= maxIter) {
      throw new ConvergenceError("Bisection", iteration, (a + b) / 2);
    }
    iteration += 1;

    const p = (a + b) / 2;
    const fp = f(p);
    options.log?.record({ method: "bisection", iteration, x: p, fx: fp });

    if (Math.abs(fp) <= epsilon) return p;
    if (fa * fp < 0) {
      // Root is in [a, p].
      b = p;
    } else {
      // Root is in [p, b].
      a = p;
      fa = fp;
    }
  }

  return (a + b) / 2;
}

export interface NewtonOptions {
  // Initial guess. When absent, a bisection over `params.fallbackBracket`
  // picks one.
  x0?: number;
  // Defaults to `params.newtonMaxIter`.
  maxIter?: number;
  params?: SolverParams;
  log?: IterationLog;
}

// Newton's method. `f` must be differentiable near its root and written with
// the dual number operators, since its derivative is taken with
// `differentiateReal` at every iterate. Throws ConvergenceError if no iterate
// satisfies `|f(x)| <= epsilon` within `maxIter` iterations.
export function newton(
  f: DualFn,
  epsilon: number,
  options: NewtonOptions = {}
): number {
  const params = options.params ?? DEFAULT_PARAMS;
  const maxIter = options.maxIter ?? params.newtonMaxIter;

  let x = options.x0 ?? initialGuess(f, params);
  let iteration = 0;
  while (iteration < maxIter) {
    iteration += 1;
    const fx = valueAt(f, x);
    options.log?.record({ method: "newton", iteration, x, fx });
    if (Math.abs(fx) <= epsilon) return x;

    const dfx = differentiateReal(f, x);
    if (dfx === 0) {
      // Stationary point: nudge off it and try again.
      x += epsilon;
      continue;
    }

    x -= fx / dfx;
  }

  throw new ConvergenceError("Newton's method", iteration, x);
}

function initialGuess(f: DualFn, params: SolverParams): number {
  const [lo, hi] = params.fallbackBracket;
  return bisection((t) => valueAt(f, t), lo, hi, params.fallbackEpsilon, {
    params,
  });
}
