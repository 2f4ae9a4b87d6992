/**
 * Pedersen Verifiable Secret Sharing (VSS) Implementation
 *
 * Like Feldman VSS, every share can be checked against public commitments
 * to the polynomial coefficients. Unlike Feldman, the commitments are
 * Pedersen commitments, so they hide the secret information-theoretically.
 *
 * Based on: Pedersen, T. P. (1991). "Non-Interactive and
 * Information-Theoretic Secure Verifiable Secret Sharing."
 *
 * Algorithm:
 * 1. Split: pick f with f(0) = secret and a random g, both of degree t-1;
 *    publish C_j = g^{f_j} h^{g_j}; give party i the pair (f(i), g(i))
 * 2. Verify: check g^{f(i)} h^{g(i)} == ∏ C_j^{i^j}
 * 3. Combine: Lagrange interpolation of the f(i) values at 0
 */

import { createGroup, deriveGenerators } from '../group/index.js';
import type { CurveName, GroupContext, GroupElement, Scalar } from '../group/types.js';
import { evaluatePolynomial, generatePolynomial, interpolateAtZero } from '../polynomial/index.js';
import { systemRandom, type RandomSource } from '../utils/random.js';
import {
  ConfigurationError,
  DuplicateIndexError,
  InsufficientSharesError,
  InvalidSecretError,
  InvalidShareError,
  InvalidThresholdError,
} from './errors.js';
import type {
  PedersenCommitments,
  PedersenCurveOptions,
  PedersenShare,
  PedersenSplitResult,
  PedersenVSSOptions,
  VerificationResult,
} from './types.js';

/**
 * Pedersen VSS over a prime-order group with generators g and h
 *
 * @example
 * ```typescript
 * const vss = PedersenVSS.fromCurve('secp256k1');
 * const shares = vss.shareSecret(12345n, 3, 5);
 *
 * // Any party can check its share against the public commitments
 * vss.verifyShare(shares[0]); // true
 *
 * // Any 3 shares recover the secret
 * vss.reconstruct([shares[1], shares[2], shares[4]], 3); // 12345n
 * ```
 */
export class PedersenVSS {
  readonly group: GroupContext;
  readonly g: GroupElement;
  readonly h: GroupElement;
  private readonly random: RandomSource;

  constructor(
    group: GroupContext,
    g: GroupElement,
    h: GroupElement,
    options: PedersenVSSOptions = {}
  ) {
    if (group.equals(g, h)) {
      throw new ConfigurationError('Generators g and h must be different');
    }
    if (group.isIdentity(g) || group.isIdentity(h)) {
      throw new ConfigurationError('Generators must not be the identity element');
    }

    this.group = group;
    this.g = g;
    this.h = h;
    this.random = options.random ?? systemRandom;
  }

  /**
   * Sharing instance on a named curve, with h derived by hash-to-curve
   */
  static fromCurve(curve: CurveName, options: PedersenCurveOptions = {}): PedersenVSS {
    const group = createGroup(curve);
    const { g, h } = deriveGenerators(group, options.generatorDomain);
    return new PedersenVSS(group, g, h, { random: options.random });
  }

  /**
   * Pedersen commitment g * a + h * b
   */
  commit(a: Scalar, b: Scalar): GroupElement {
    return this.group.combine(
      this.group.scalarMultiply(this.g, a),
      this.group.scalarMultiply(this.h, b)
    );
  }

  /**
   * Splits a secret into verifiable shares
   *
   * @param secret - Nonzero scalar to share
   * @param threshold - Minimum number of shares needed to reconstruct (t)
   * @param totalShares - Total number of shares to create (n)
   * @returns Shares plus the commitment vector they all reference
   */
  split(secret: Scalar, threshold: number, totalShares: number): PedersenSplitResult {
    const { Fr, order } = this.group;

    if (!Number.isSafeInteger(threshold) || !Number.isSafeInteger(totalShares)) {
      throw new InvalidThresholdError('Threshold and total shares must be integers', {
        threshold,
        totalShares,
      });
    }
    if (threshold < 1) {
      throw new InvalidThresholdError('Threshold must be at least 1', { threshold });
    }
    if (threshold > totalShares) {
      throw new InvalidThresholdError(
        `Threshold (${threshold}) cannot be greater than total shares (${totalShares})`,
        { threshold, totalShares }
      );
    }
    if (BigInt(totalShares) >= order) {
      throw new InvalidThresholdError('Total shares must be smaller than the group order', {
        totalShares,
      });
    }
    if (!Fr.isValid(secret)) {
      throw new InvalidSecretError('Secret must be in range [0, r) of the scalar field');
    }
    if (Fr.is0(secret)) {
      throw new InvalidSecretError('Secret must be a non-zero element');
    }

    // f(0) = secret; g(0) only blinds and carries no meaning of its own
    const f = generatePolynomial(secret, threshold - 1, this.group, this.random);
    const g = generatePolynomial(
      this.group.randomScalar(this.random),
      threshold - 1,
      this.group,
      this.random
    );

    const commitments: PedersenCommitments = Object.freeze(
      f.map((fj, j) => this.commit(fj, g[j]))
    );

    const shares: PedersenShare[] = [];
    for (let i = 1; i <= totalShares; i++) {
      shares.push(
        Object.freeze({
          index: i,
          value1: evaluatePolynomial(f, i, Fr),
          value2: evaluatePolynomial(g, i, Fr),
          commitments,
        })
      );
    }

    return {
      shares: Object.freeze(shares),
      commitments,
      threshold,
      totalShares,
    };
  }

  /**
   * Splits a secret and returns only the shares
   */
  shareSecret(secret: Scalar, threshold: number, totalShares: number): readonly PedersenShare[] {
    return this.split(secret, threshold, totalShares).shares;
  }

  /**
   * Checks a share against its commitments and reports why it failed
   *
   * Verification equation: g^{f(i)} h^{g(i)} == ∏_{j=0}^{t-1} C_j^{i^j}
   */
  verify(share: PedersenShare): VerificationResult {
    try {
      const { index, value1, value2, commitments } = share;
      const { Fr } = this.group;

      if (!Number.isSafeInteger(index) || index < 1) {
        return { valid: false, error: 'Share index must be a positive integer' };
      }
      if (commitments.length === 0) {
        return { valid: false, error: 'Share carries no commitments' };
      }
      if (!Fr.isValid(value1) || !Fr.isValid(value2)) {
        return { valid: false, error: 'Share values must be reduced field elements' };
      }

      // Left-hand side: g * f(i) + h * g(i)
      const lhs = this.commit(value1, value2);

      // Right-hand side: Σ C_j * i^j, folded Horner-style from the top coefficient
      const x = this.group.scalarFromInteger(index);
      let rhs = commitments[commitments.length - 1];
      for (let j = commitments.length - 2; j >= 0; j--) {
        rhs = this.group.combine(this.group.scalarMultiply(rhs, x), commitments[j]);
      }

      const valid = this.group.equals(lhs, rhs);
      return {
        valid,
        error: valid ? undefined : 'Share verification failed: commitment mismatch',
      };
    } catch (error) {
      return {
        valid: false,
        error: `Verification error: ${error instanceof Error ? error.message : String(error)}`,
      };
    }
  }

  /**
   * Checks a share against its commitments
   */
  verifyShare(share: PedersenShare): boolean {
    return this.verify(share).valid;
  }

  /**
   * True if every share verifies
   */
  verifyAll(shares: readonly PedersenShare[]): boolean {
    return shares.every((share) => this.verifyShare(share));
  }

  /**
   * Reconstructs the secret from at least `threshold` shares
   *
   * f(0) = Σ f(x_i) * λ_i, with λ_i = Π_{j≠i} (-x_j) / (x_i - x_j)
   *
   * Shares are not verified here; run `verifyShare` on them first.
   *
   * @param shares - At least t shares with distinct indices
   * @param threshold - The threshold the secret was split with
   * @returns The secret f(0)
   */
  reconstruct(shares: readonly PedersenShare[], threshold: number): Scalar {
    if (!Number.isSafeInteger(threshold) || threshold < 1) {
      throw new InvalidThresholdError('Threshold must be a positive integer', { threshold });
    }
    if (shares.length < threshold) {
      throw new InsufficientSharesError(threshold, shares.length);
    }

    const seen = new Set<number>();
    for (const share of shares) {
      if (!Number.isSafeInteger(share.index) || share.index < 1) {
        throw new InvalidShareError(`Share has invalid index: ${share.index}`, {
          index: share.index,
        });
      }
      if (!this.group.Fr.isValid(share.value1)) {
        throw new InvalidShareError(`Share ${share.index} value is not a field element`, {
          index: share.index,
        });
      }
      if (seen.has(share.index)) {
        throw new DuplicateIndexError(share.index);
      }
      seen.add(share.index);
    }

    return interpolateAtZero(
      shares.map((share) => ({ x: BigInt(share.index), y: share.value1 })),
      this.group.Fr
    );
  }
}

export * from './errors.js';
export type {
  PedersenCommitments,
  PedersenCurveOptions,
  PedersenShare,
  PedersenSplitResult,
  PedersenVSSOptions,
  VerificationResult,
} from './types.js';
