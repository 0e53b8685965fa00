/**
 * One-dimensional solvers shared by the solar-term locator and the
 * apparent-midnight search. Both stop on tolerance or on the iteration cap;
 * an exhausted cap is a ConvergenceError, never an approximation.
 */

import { ConvergenceError } from "../lib/errors.js";

export interface SolverOptions {
  /** Stop when |residual| ≤ tolerance (units of the residual). */
  tolerance: number;
  maxIterations: number;
  /** Names the quantity in ConvergenceError messages. */
  subject: string;
}

export interface SolverResult {
  root: number;
  iterations: number;
  residual: number;
}

/**
 * Root of an increasing f on [lo, hi] with f(lo) ≤ 0 < f(hi).
 * Newton steps are taken when `derivative` is given and stay inside the
 * bracket; otherwise the bracket is bisected.
 */
export function solveBracketed(
  f: (x: number) => number,
  lo: number,
  hi: number,
  options: SolverOptions,
  derivative?: (x: number) => number | undefined
): SolverResult {
  const fLo = f(lo);
  if (Math.abs(fLo) <= options.tolerance) {
    return { root: lo, iterations: 0, residual: fLo };
  }

  let a = lo;
  let b = hi;
  let x = nextEstimate(a, b, lo, fLo, derivative);
  let residual = fLo;

  for (let i = 1; i <= options.maxIterations; i++) {
    residual = f(x);
    if (Math.abs(residual) <= options.tolerance) {
      return { root: x, iterations: i, residual };
    }
    if (residual < 0) {
      a = x;
    } else {
      b = x;
    }
    x = nextEstimate(a, b, x, residual, derivative);
  }

  throw new ConvergenceError(options.subject, options.maxIterations, residual);
}

function nextEstimate(
  a: number,
  b: number,
  x: number,
  fx: number,
  derivative?: (x: number) => number | undefined
): number {
  const mid = a + (b - a) / 2;
  if (!derivative) return mid;

  const slope = derivative(x);
  if (slope === undefined || !(slope > 0)) return mid;

  const newton = x - fx / slope;
  return newton > a && newton < b ? newton : mid;
}

/**
 * Iterates x ← g(x) until successive values differ by at most the tolerance.
 */
export function solveFixedPoint(
  g: (x: number) => number,
  x0: number,
  options: SolverOptions
): SolverResult {
  let x = x0;
  let step = Number.POSITIVE_INFINITY;

  for (let i = 1; i <= options.maxIterations; i++) {
    const next = g(x);
    step = next - x;
    x = next;
    if (Math.abs(step) <= options.tolerance) {
      return { root: x, iterations: i, residual: step };
    }
  }

  throw new ConvergenceError(options.subject, options.maxIterations, step);
}
