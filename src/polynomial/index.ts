/**
 * Polynomial arithmetic over a prime field
 *
 * The sharing polynomials f(x) = a_0 + a_1*x + ... + a_{t-1}*x^{t-1} are
 * stored as coefficient arrays [a_0, a_1, ..., a_{t-1}]. Field operations
 * come from the @noble/curves `IField` of the group in use.
 */

import type { IField } from '@noble/curves/abstract/modular';
import type { GroupContext, Scalar } from '../group/types.js';
import type { RandomSource } from '../utils/random.js';
import { DuplicateIndexError } from '../pedersen/errors.js';

/**
 * A sample point (x, y) of a polynomial
 */
export interface PolynomialPoint {
  x: bigint;
  y: Scalar;
}

/**
 * Evaluate a polynomial at point x using Horner's method.
 *
 * For polynomial f(x) = a_0 + a_1*x + a_2*x^2 + ... + a_n*x^n
 * Horner's method computes: f(x) = a_0 + x(a_1 + x(a_2 + ... + x(a_n)))
 *
 * @param coefficients - Polynomial coefficients [a_0, a_1, ..., a_n]
 * @param x - The point at which to evaluate (lifted into the field)
 * @param Fr - The scalar field
 * @returns The polynomial value at x
 */
export function evaluatePolynomial(
  coefficients: readonly Scalar[],
  x: number | bigint,
  Fr: IField<Scalar>
): Scalar {
  if (coefficients.length === 0) {
    throw new Error('Coefficients array cannot be empty');
  }

  const point = Fr.create(BigInt(x));

  // Work backwards from the highest-degree coefficient
  let result = Fr.ZERO;
  for (let i = coefficients.length - 1; i >= 0; i--) {
    result = Fr.add(Fr.mul(result, point), Fr.create(coefficients[i]));
  }

  return result;
}

/**
 * Generate a random polynomial of the given degree with a fixed constant term
 *
 * @param constant - The constant term a_0
 * @param degree - Degree of the polynomial (threshold - 1)
 * @param group - Supplies the field and the scalar sampler
 * @param random - Source of randomness for a_1, ..., a_degree
 * @returns Array of coefficients [a_0, a_1, ..., a_degree]
 */
export function generatePolynomial(
  constant: Scalar,
  degree: number,
  group: GroupContext,
  random: RandomSource
): Scalar[] {
  if (!Number.isSafeInteger(degree) || degree < 0) {
    throw new Error('Polynomial degree must be a non-negative integer');
  }

  const coefficients: Scalar[] = [group.Fr.create(constant)];
  for (let i = 0; i < degree; i++) {
    coefficients.push(group.randomScalar(random));
  }

  return coefficients;
}

/**
 * Lagrange basis polynomial L_i evaluated at 0
 *
 * L_i(0) = Π_{j ≠ i} (0 - x_j) / (x_i - x_j)
 *
 * Only the first occurrence of `xi` in `xs` is skipped. Any other x equal
 * to `xi` makes the denominator zero, and the field inversion throws.
 *
 * @param xi - The x-coordinate whose basis polynomial is wanted
 * @param xs - All x-coordinates of the interpolation set (including xi)
 * @param Fr - The scalar field
 */
export function lagrangeCoefficientAtZero(
  xi: bigint,
  xs: readonly bigint[],
  Fr: IField<Scalar>
): Scalar {
  let numerator = Fr.ONE;
  let denominator = Fr.ONE;
  let skipped = false;

  for (const xj of xs) {
    if (!skipped && xj === xi) {
      skipped = true;
      continue;
    }
    numerator = Fr.mul(numerator, Fr.neg(Fr.create(xj)));
    denominator = Fr.mul(denominator, Fr.create(xi - xj));
  }

  return Fr.mul(numerator, Fr.inv(denominator));
}

/**
 * Recover f(0) from sample points by Lagrange interpolation.
 *
 * f(0) = Σ y_i * L_i(0)
 *
 * With more points than the polynomial's degree + 1 the result is still
 * f(0), provided every point lies on the same polynomial.
 *
 * @throws DuplicateIndexError if two points share an x-coordinate
 */
export function interpolateAtZero(
  points: readonly PolynomialPoint[],
  Fr: IField<Scalar>
): Scalar {
  if (points.length === 0) {
    throw new Error('At least one point is required');
  }

  const xs = points.map((p) => p.x);
  const seen = new Set<bigint>();
  for (const x of xs) {
    if (seen.has(x)) {
      throw new DuplicateIndexError(Number(x));
    }
    seen.add(x);
  }

  let result = Fr.ZERO;

  for (const { x, y } of points) {
    result = Fr.add(result, Fr.mul(Fr.create(y), lagrangeCoefficientAtZero(x, xs, Fr)));
  }

  return result;
}
