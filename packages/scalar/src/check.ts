/**
 * Numerical derivative checks against the engine's analytic derivatives.
 */
import { Scalar } from "./scalar.js";

/** Symmetric finite difference of `f` in argument `index`. */
export function centralDifference(
  f: (...xs: number[]) => number,
  args: readonly number[],
  index = 0,
  epsilon = 1e-6,
): number {
  const up = args.map((x, i) => (i === index ? x + epsilon : x));
  const down = args.map((x, i) => (i === index ? x - epsilon : x));
  return (f(...up) - f(...down)) / (2 * epsilon);
}

export interface DerivativeMismatch {
  readonly index: number;
  readonly analytic: number;
  readonly numeric: number;
}

/**
 * Run `f` on fresh grad-tracked scalars, backpropagate, and compare each
 * argument's derivative with a central difference. Returns the arguments
 * whose derivatives disagree beyond `tolerance` (relative, floored at 1).
 */
export function derivativeCheck(
  f: (...xs: Scalar[]) => Scalar,
  values: readonly number[],
  tolerance = 1e-2,
): DerivativeMismatch[] {
  const params = values.map((v, i) => Scalar.param(v, `x${i}`));
  f(...params).backward();

  const raw = (...xs: number[]): number => f(...xs.map((x) => new Scalar(x))).value;
  const mismatches: DerivativeMismatch[] = [];
  params.forEach((p, index) => {
    const analytic = p.derivative ?? 0;
    const numeric = centralDifference(raw, values, index);
    if (Math.abs(analytic - numeric) > tolerance * Math.max(1, Math.abs(numeric))) {
      mismatches.push({ index, analytic, numeric });
    }
  });
  return mismatches;
}
