// Errors thrown by the dual number arithmetic and the root finders. None of
// them is caught inside the library.

export abstract class DualRootError extends Error {
  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
  }
}

// The divisor's real component is zero.
export class DivisionByZeroError extends DualRootError {
  constructor(message = "Division by zero") {
    super(message);
  }
}

// A function was applied outside the set where it (or its derivative) is
// defined.
export class DomainError extends DualRootError {}

export class BracketError extends DualRootError {
  readonly a: number;
  readonly b: number;
  readonly fa: number;
  readonly fb: number;

  constructor(a: number, b: number, fa: number, fb: number) {
    super(
      `Function values at endpoints must have opposite signs: f(${a}) = ${fa}, f(${b}) = ${fb}`
    );
    this.a = a;
    this.b = b;
    this.fa = fa;
    this.fb = fb;
  }
}

export class ConvergenceError extends DualRootError {
  readonly iterations: number;
  // The last approximation reached before giving up.
  readonly last: number;

  constructor(method: string, iterations: number, last: number) {
    super(`${method} did not converge after ${iterations} iterations`);
    this.iterations = iterations;
    this.last = last;
  }
}
