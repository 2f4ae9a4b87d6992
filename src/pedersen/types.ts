/**
 * Types for Pedersen Verifiable Secret Sharing (VSS)
 *
 * Pedersen VSS hides the secret polynomial f behind a second, random
 * polynomial g. Commitments C_j = g^{f_j} h^{g_j} reveal nothing about the
 * secret, even to an unbounded adversary, yet still let every share be checked.
 */

import type { GroupElement, Scalar } from '../group/types.js';
import type { RandomSource } from '../utils/random.js';

/**
 * Commitments to the coefficient pairs (f_j, g_j)
 * commitments[j] = g * f_j + h * g_j (additive notation)
 *
 * One frozen array per sharing, referenced by every share.
 */
export type PedersenCommitments = readonly GroupElement[];

/**
 * A share handed to one participant
 */
export interface PedersenShare {
  /** Participant index (1 to n) */
  readonly index: number;
  /** f(index), the share of the secret */
  readonly value1: Scalar;
  /** g(index), the share of the blinding polynomial */
  readonly value2: Scalar;
  /** Commitment vector of the sharing this share belongs to */
  readonly commitments: PedersenCommitments;
}

/**
 * Result of splitting a secret
 */
export interface PedersenSplitResult {
  /** One share per participant, in index order */
  shares: readonly PedersenShare[];
  /** The commitment vector (same object every share references) */
  commitments: PedersenCommitments;
  /** The threshold required for reconstruction */
  threshold: number;
  /** Number of shares issued */
  totalShares: number;
}

/**
 * Options for constructing a sharing instance
 */
export interface PedersenVSSOptions {
  /** Source of randomness for polynomial coefficients (default: system CSPRNG) */
  random?: RandomSource;
}

/**
 * Options for building a sharing instance from a curve name
 */
export interface PedersenCurveOptions extends PedersenVSSOptions {
  /** Domain string hashed to derive the generator h */
  generatorDomain?: string;
}

/**
 * Share verification result
 */
export interface VerificationResult {
  /** Whether the share is valid */
  valid: boolean;
  /** Reason the share was rejected */
  error?: string;
}
