/**
 * Prime-order group adapter
 *
 * Wraps the @noble/curves short-Weierstrass groups behind one
 * `GroupContext`, so the sharing scheme can run over secp256k1, P-256 or
 * the G1 subgroup of BLS12-381 without knowing which one it has.
 */

import { secp256k1, hashToCurve as secp256k1HashToCurve } from '@noble/curves/secp256k1';
import { p256, hashToCurve as p256HashToCurve } from '@noble/curves/p256';
import { bls12_381 } from '@noble/curves/bls12-381';
import { Field, getMinHashLength, mapHashToField } from '@noble/curves/abstract/modular';
import { bytesToNumberBE, numberToBytesBE } from '@noble/curves/abstract/utils';
import type { AffinePoint } from '@noble/curves/abstract/curve';
import type { ProjConstructor } from '@noble/curves/abstract/weierstrass';
import { bytesToHex, hexToBytes, utf8ToBytes } from '@noble/hashes/utils';
import type { RandomSource } from '../utils/random.js';
import type { CurveName, GroupContext, GroupElement, Generators, Scalar } from './types.js';

/**
 * Domain string hashed to obtain the second generator h when none is given
 */
export const DEFAULT_GENERATOR_DOMAIN = 'pedersen-vss/generator-h';

// =============================================================================
// Curve Table
// =============================================================================

interface CurveBackend {
  Point: ProjConstructor<bigint>;
  order: bigint;
  hashToCurve(message: Uint8Array, dst: string): AffinePoint<bigint>;
}

function getBackend(curve: CurveName): CurveBackend {
  switch (curve) {
    case 'secp256k1':
      return {
        Point: secp256k1.ProjectivePoint,
        order: secp256k1.CURVE.n,
        hashToCurve: (message, DST) => secp256k1HashToCurve(message, { DST }).toAffine(),
      };
    case 'P-256':
      return {
        Point: p256.ProjectivePoint,
        order: p256.CURVE.n,
        hashToCurve: (message, DST) => p256HashToCurve(message, { DST }).toAffine(),
      };
    case 'bls12-381':
      return {
        Point: bls12_381.G1.ProjectivePoint,
        order: bls12_381.fields.Fr.ORDER,
        hashToCurve: (message, DST) => bls12_381.G1.hashToCurve(message, { DST }).toAffine(),
      };
    default:
      throw new Error(`Unsupported curve: ${String(curve)}`);
  }
}

// =============================================================================
// Group Context
// =============================================================================

/**
 * Builds the group context for a curve
 *
 * @example
 * ```typescript
 * const group = createGroup('secp256k1');
 * const k = group.scalarFromInteger(7);
 * const P = group.scalarMultiply(group.base(), k);
 * ```
 */
export function createGroup(curve: CurveName): GroupContext {
  const { Point, order, hashToCurve } = getBackend(curve);
  const Fr = Field(order);
  // mapHashToField needs at least 16 input bytes regardless of field size
  const sampleLength = Math.max(16, getMinHashLength(order));

  return {
    curve,
    order,
    Fr,

    base: () => Point.BASE,

    identity: () => Point.ZERO,

    scalarMultiply(point: GroupElement, k: Scalar): GroupElement {
      const reduced = Fr.create(k);
      // noble rejects a zero multiplier
      if (reduced === 0n) return Point.ZERO;
      return point.multiply(reduced);
    },

    combine: (a, b) => a.add(b),

    equals: (a, b) => a.equals(b),

    isIdentity: (point) => point.equals(Point.ZERO),

    randomScalar(random: RandomSource): Scalar {
      return bytesToNumberBE(mapHashToField(random(sampleLength), order));
    },

    scalarFromInteger: (value) => Fr.create(BigInt(value)),

    hashToGroup(message: Uint8Array, dst: string): GroupElement {
      return Point.fromAffine(hashToCurve(message, dst));
    },

    encodeElement: (point) => point.toHex(true),

    decodeElement(hex: string): GroupElement {
      const point = Point.fromHex(hex);
      point.assertValidity();
      return point;
    },

    encodeScalar: (k) => bytesToHex(numberToBytesBE(Fr.create(k), Fr.BYTES)),

    decodeScalar(hex: string): Scalar {
      const bytes = hexToBytes(hex);
      if (bytes.length !== Fr.BYTES) {
        throw new Error(`Scalar must be ${Fr.BYTES} bytes, got ${bytes.length}`);
      }
      const k = bytesToNumberBE(bytes);
      if (!Fr.isValid(k)) {
        throw new Error('Scalar is not reduced modulo the group order');
      }
      return k;
    },
  };
}

/**
 * Domain separation tag for deriving h on a given curve
 */
export function generatorDST(curve: CurveName): string {
  return `PEDERSEN-VSS-V01-${curve.toUpperCase()}_XMD:SHA-256_SSWU_RO_`;
}

/**
 * Derives the public generator pair (g, h)
 *
 * g is the curve's standard base point. h is hashed to the curve from
 * `domain`, so nobody knows log_g(h); commitments stay binding.
 */
export function deriveGenerators(
  group: GroupContext,
  domain: string = DEFAULT_GENERATOR_DOMAIN
): Generators {
  return {
    g: group.base(),
    h: group.hashToGroup(utf8ToBytes(domain), generatorDST(group.curve)),
  };
}

export type { CurveName, GroupContext, GroupElement, Generators, Scalar } from './types.js';
export { CURVE_NAMES } from './types.js';
