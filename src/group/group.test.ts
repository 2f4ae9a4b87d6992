/**
 * Tests for the prime-order group adapter
 */

import { describe, it, expect } from 'vitest';
import { createGroup, deriveGenerators, generatorDST, DEFAULT_GENERATOR_DOMAIN } from './index.js';
import { CURVE_NAMES } from './types.js';
import { createSeededRandom } from '../utils/random.js';

const SECP256K1_ORDER = 0xFFFFFFFFFFFFFFFFFFFFFFFFFFFFFFFEBAAEDCE6AF48A03BBFD25E8CD0364141n;
const P256_ORDER = 0xFFFFFFFF00000000FFFFFFFFFFFFFFFFBCE6FAADA7179E84F3B9CAC2FC632551n;
const BLS12_381_R = 0x73EDA753299D7D483339D80809A1D80553BDA402FFFE5BFEFFFFFFFF00000001n;

const ENCODED_POINT_LENGTH = {
  secp256k1: 66,
  'P-256': 66,
  'bls12-381': 96,
};

describe('group', () => {
  it('should expose the known group orders', () => {
    expect(createGroup('secp256k1').order).toBe(SECP256K1_ORDER);
    expect(createGroup('P-256').order).toBe(P256_ORDER);
    expect(createGroup('bls12-381').order).toBe(BLS12_381_R);
  });

  describe.each([...CURVE_NAMES])('%s', (curve) => {
    const group = createGroup(curve);
    const G = group.base();

    describe('arithmetic', () => {
      it('should map scalar 0 and the order to the identity', () => {
        expect(group.isIdentity(group.scalarMultiply(G, 0n))).toBe(true);
        expect(group.isIdentity(group.scalarMultiply(G, group.order))).toBe(true);
      });

      it('should treat scalar 1 as the identity map', () => {
        expect(group.equals(group.scalarMultiply(G, 1n), G)).toBe(true);
      });

      it('should agree between doubling and adding', () => {
        expect(group.equals(group.scalarMultiply(G, 2n), group.combine(G, G))).toBe(true);
      });

      it('should leave a point unchanged when combined with the identity', () => {
        const P = group.scalarMultiply(G, 12345n);
        expect(group.equals(group.combine(P, group.identity()), P)).toBe(true);
      });

      it('should distribute scalar multiplication over field addition', () => {
        const a = 987654321n;
        const b = group.order - 5n;
        const lhs = group.scalarMultiply(G, group.Fr.add(a, b));
        const rhs = group.combine(group.scalarMultiply(G, a), group.scalarMultiply(G, b));
        expect(group.equals(lhs, rhs)).toBe(true);
      });
    });

    describe('scalars', () => {
      it('should lift integers into the field', () => {
        expect(group.scalarFromInteger(7)).toBe(7n);
        expect(group.scalarFromInteger(-1)).toBe(group.order - 1n);
        expect(group.scalarFromInteger(group.order + 3n)).toBe(3n);
      });

      it('should sample nonzero scalars below the order', () => {
        const random = createSeededRandom(`scalars-${curve}`);
        for (let i = 0; i < 20; i++) {
          const k = group.randomScalar(random);
          expect(k).toBeGreaterThan(0n);
          expect(k).toBeLessThan(group.order);
        }
      });

      it('should sample the same scalars from the same seed', () => {
        const a = createSeededRandom('same-seed');
        const b = createSeededRandom('same-seed');
        expect(group.randomScalar(a)).toBe(group.randomScalar(b));
      });
    });

    describe('encoding', () => {
      it('should round-trip points in compressed form', () => {
        const P = group.scalarMultiply(G, 424242n);
        const hex = group.encodeElement(P);

        expect(hex).toHaveLength(ENCODED_POINT_LENGTH[curve]);
        expect(group.equals(group.decodeElement(hex), P)).toBe(true);
      });

      it('should round-trip scalars at fixed width', () => {
        const k = group.order - 1n;
        const hex = group.encodeScalar(k);

        expect(hex).toHaveLength(group.Fr.BYTES * 2);
        expect(group.decodeScalar(hex)).toBe(k);
        expect(group.encodeScalar(1n)).toBe('01'.padStart(group.Fr.BYTES * 2, '0'));
      });

      it('should reject scalars of the wrong width', () => {
        expect(() => group.decodeScalar('abcd')).toThrow(
          `Scalar must be ${group.Fr.BYTES} bytes, got 2`
        );
      });

      it('should reject unreduced scalars', () => {
        const hex = group.order.toString(16).padStart(group.Fr.BYTES * 2, '0');
        expect(() => group.decodeScalar(hex)).toThrow('Scalar is not reduced modulo the group order');
      });

      it('should reject bytes that are not a point', () => {
        expect(() => group.decodeElement('00')).toThrow();
      });
    });

    describe('generators', () => {
      it('should use the base point for g and a hashed point for h', () => {
        const { g, h } = deriveGenerators(group);

        expect(group.equals(g, G)).toBe(true);
        expect(group.equals(h, g)).toBe(false);
        expect(group.isIdentity(h)).toBe(false);
      });

      it('should derive h deterministically from the domain', () => {
        const first = deriveGenerators(group, DEFAULT_GENERATOR_DOMAIN);
        const second = deriveGenerators(group);
        const other = deriveGenerators(group, 'another-domain');

        expect(group.equals(first.h, second.h)).toBe(true);
        expect(group.equals(first.h, other.h)).toBe(false);
      });
    });
  });

  describe('generatorDST', () => {
    it('should tag the curve name', () => {
      expect(generatorDST('secp256k1')).toBe('PEDERSEN-VSS-V01-SECP256K1_XMD:SHA-256_SSWU_RO_');
      expect(generatorDST('bls12-381')).toBe('PEDERSEN-VSS-V01-BLS12-381_XMD:SHA-256_SSWU_RO_');
    });
  });
});
