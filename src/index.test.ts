/**
 * End-to-end workflow through the public API
 */

import { describe, it, expect } from 'vitest';
import {
  PedersenVSS,
  createSeededRandom,
  decodeShare,
  encodeShare,
  InsufficientSharesError,
  VSSError,
} from './index.js';

describe('pedersen-vss', () => {
  it('should deal, transmit, verify and combine shares', () => {
    const dealer = PedersenVSS.fromCurve('P-256', { random: createSeededRandom('e2e') });
    const secret = 0x0badc0ffeen;
    const shares = dealer.shareSecret(secret, 3, 5);

    // Each participant receives its share as JSON and checks it on its own
    const received = shares.map((share) =>
      decodeShare(JSON.parse(JSON.stringify(encodeShare(share, dealer.group))), dealer.group)
    );
    const verifier = PedersenVSS.fromCurve('P-256');
    expect(received.every((share) => verifier.verifyShare(share))).toBe(true);

    // A combiner holding any three shares recovers the secret
    expect(verifier.reconstruct([received[4], received[1], received[3]], 3)).toBe(secret);
  });

  it('should surface precondition failures as VSSError subclasses', () => {
    const vss = PedersenVSS.fromCurve('secp256k1', { random: createSeededRandom('e2e') });
    const shares = vss.shareSecret(7n, 2, 2);

    expect(() => vss.reconstruct(shares.slice(0, 1), 2)).toThrow(InsufficientSharesError);
    expect(() => vss.reconstruct(shares.slice(0, 1), 2)).toThrow(VSSError);
  });
});
