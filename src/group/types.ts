/**
 * Types for the prime-order group and its scalar field
 */

import type { IField } from '@noble/curves/abstract/modular';
import type { ProjPointType } from '@noble/curves/abstract/weierstrass';
import type { RandomSource } from '../utils/random.js';

/**
 * Supported groups
 * - secp256k1: Bitcoin/Ethereum curve (256-bit order)
 * - P-256: NIST P-256 / secp256r1 (256-bit order)
 * - bls12-381: G1 subgroup of the BLS12-381 pairing curve (255-bit order)
 */
export type CurveName = 'secp256k1' | 'P-256' | 'bls12-381';

export const CURVE_NAMES = ['secp256k1', 'P-256', 'bls12-381'] as const satisfies readonly CurveName[];

/** Element of the scalar field Z_r */
export type Scalar = bigint;

/** Element of the prime-order group (additive notation) */
export type GroupElement = ProjPointType<bigint>;

/**
 * Group and scalar-field operations used by the sharing scheme.
 * All arithmetic is delegated to @noble/curves.
 */
export interface GroupContext {
  /** Curve identifier */
  readonly curve: CurveName;

  /** Prime order r of the group (and modulus of the scalar field) */
  readonly order: bigint;

  /** Scalar field Z_r */
  readonly Fr: IField<Scalar>;

  /** Standard base point of the group */
  base(): GroupElement;

  /** Neutral element */
  identity(): GroupElement;

  /** point * k, with k reduced mod r; k = 0 gives the identity */
  scalarMultiply(point: GroupElement, k: Scalar): GroupElement;

  /** Group operation */
  combine(a: GroupElement, b: GroupElement): GroupElement;

  equals(a: GroupElement, b: GroupElement): boolean;

  isIdentity(point: GroupElement): boolean;

  /** Uniform scalar in [1, r) */
  randomScalar(random: RandomSource): Scalar;

  /** Lift an integer into Z_r (negative values wrap around) */
  scalarFromInteger(value: number | bigint): Scalar;

  /** Hash to a group element with unknown discrete log (RFC 9380) */
  hashToGroup(message: Uint8Array, dst: string): GroupElement;

  /** Compressed point encoding, hex */
  encodeElement(point: GroupElement): string;

  /** Parses and validates a compressed or uncompressed point */
  decodeElement(hex: string): GroupElement;

  /** Fixed-width big-endian scalar encoding, hex */
  encodeScalar(k: Scalar): string;

  /** Parses a fixed-width scalar; rejects values >= r */
  decodeScalar(hex: string): Scalar;
}

/**
 * The pair of public generators used for Pedersen commitments
 */
export interface Generators {
  /** Commits to the secret polynomial */
  g: GroupElement;
  /** Commits to the blinding polynomial */
  h: GroupElement;
}
