// SolverParams store the defaults governing the root finders. Callers that
// need different limits construct their own instance and pass it in the
// solver options; everything else reads DEFAULT_PARAMS.

export class SolverParams {
  // Newton iterations before giving up.
  readonly newtonMaxIter: number;

  // Bisection halvings before giving up. Halving a bracket of width 2e10
  // reaches the spacing of doubles long before this.
  readonly bisectionMaxIter: number;

  // Bracket searched for a starting point when Newton is given no x0, and the
  // (loose) tolerance used for that search.
  readonly fallbackBracket: readonly [number, number];
  readonly fallbackEpsilon: number;

  // Fields left out of `overrides`, or given as undefined, keep their default.
  constructor(overrides: Partial<SolverParams> = {}) {
    this.newtonMaxIter = overrides.newtonMaxIter ?? 100;
    this.bisectionMaxIter = overrides.bisectionMaxIter ?? 1000;
    this.fallbackBracket = overrides.fallbackBracket ?? [-1e10, 1e10];
    this.fallbackEpsilon = overrides.fallbackEpsilon ?? 1e-2;
  }
}

export const DEFAULT_PARAMS = new SolverParams();
