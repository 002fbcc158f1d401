import * as ad from "./ad";
import { Complex, complex } from "./complex";
import { derivative, differentiate } from "./diff";
import { dexp, dlog, dcos, dsin, dabs } from "./elementary";
import { DomainError } from "./errors";

function asComplex(s: ad.DualLike): Complex {
  if (typeof s === "number" || ad.isDual(s)) {
    throw new Error(`expected a complex value: ${JSON.stringify(s)}`);
  }
  return s;
}

const points = [-2, -0.5, 0.3, 1, 4.25];

test("differentiates exp, sin and cos", () => {
  for (const a of points) {
    expect(differentiate(dexp, a)).toBeCloseTo(Math.exp(a));
    expect(differentiate(dsin, a)).toBeCloseTo(Math.cos(a));
    expect(differentiate(dcos, a)).toBeCloseTo(-Math.sin(a));
  }
});

test("sin'(0) = 1", () => {
  expect(differentiate(dsin, 0)).toBe(1);
});

test("differentiates exp(log(x)) to 1", () => {
  for (const a of [0.1, 1, 2.5, 40]) {
    expect(differentiate((x) => dexp(dlog(x)), a)).toBeCloseTo(1, 10);
  }
});

test("differentiates log(x) to 1/x", () => {
  expect(dlog(ad.x(4))).toEqual({ real: Math.log(4), dual: 0.25 });
});

test("rejects log of non-positive reals", () => {
  expect(() => dlog(ad.x(0))).toThrow(DomainError);
  expect(() => dlog(ad.x(-1))).toThrow(DomainError);
});

test("takes the principal log of a negative complex value", () => {
  const result = dlog(ad.x(complex(-1, 0)));
  expect(asComplex(result.real).re).toBeCloseTo(0);
  expect(asComplex(result.real).im).toBeCloseTo(Math.PI);
  expect(asComplex(result.dual).re).toBeCloseTo(-1);
  expect(asComplex(result.dual).im).toBeCloseTo(0);
});

test("rejects log of complex zero", () => {
  expect(() => dlog(ad.x(complex(0, 0)))).toThrow(DomainError);
});

test("differentiates abs(x) away from 0", () => {
  expect(dabs(ad.x(-3))).toEqual({ real: 3, dual: -1 });
  expect(dabs(ad.x(2))).toEqual({ real: 2, dual: 1 });
});

test("rejects abs at 0 and for complex values", () => {
  expect(() => dabs(ad.x(0))).toThrow(DomainError);
  expect(() => dabs(ad.x(complex(3, 4)))).toThrow(DomainError);
});

test("differentiates sin at a complex point", () => {
  const d = asComplex(differentiate(dsin, complex(1, 1)));
  expect(d.re).toBeCloseTo(Math.cos(1) * Math.cosh(1));
  expect(d.im).toBeCloseTo(-Math.sin(1) * Math.sinh(1));
});

test("differentiates exp at a complex point", () => {
  const d = asComplex(differentiate(dexp, complex(0, Math.PI / 2)));
  expect(d.re).toBeCloseTo(0);
  expect(d.im).toBeCloseTo(1);
});

test("chains through nested functions", () => {
  // d/dx exp(sin x) = cos x * exp(sin x)
  const a = 0.7;
  expect(differentiate((x) => dexp(dsin(x)), a)).toBeCloseTo(
    Math.cos(a) * Math.exp(Math.sin(a))
  );
  // d/dx |cos x| = -sin x * sign(cos x)
  expect(differentiate((x) => dabs(dcos(x)), 2)).toBeCloseTo(Math.sin(2));
});

test("differentiates exp, sin, cos and log twice", () => {
  const a = 0.8;
  expect(differentiate(derivative(dexp), a)).toBeCloseTo(Math.exp(a));
  expect(differentiate(derivative(dsin), a)).toBeCloseTo(-Math.sin(a));
  expect(differentiate(derivative(dcos), a)).toBeCloseTo(-Math.cos(a));
  expect(differentiate(derivative(dlog), a)).toBeCloseTo(-1 / (a * a));
  expect(differentiate(derivative(dabs), -a)).toBe(0);
});

test("applies domain checks to the innermost value of nested dual numbers", () => {
  expect(() => differentiate(derivative(dlog), -2)).toThrow(DomainError);
  expect(() => differentiate(derivative(dabs), 0)).toThrow(DomainError);
});
