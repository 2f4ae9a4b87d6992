/**
 * Randomness sources for coefficient sampling
 *
 * Every random draw made while splitting a secret goes through a
 * `RandomSource`, so callers can swap the system CSPRNG for a seeded
 * generator and reproduce a sharing exactly.
 */

import { hmac } from '@noble/hashes/hmac';
import { sha256 } from '@noble/hashes/sha256';
import { randomBytes, utf8ToBytes } from '@noble/hashes/utils';

/**
 * Returns `bytesLength` random bytes
 */
export type RandomSource = (bytesLength: number) => Uint8Array;

/**
 * System CSPRNG (WebCrypto `getRandomValues`)
 */
export const systemRandom: RandomSource = (bytesLength) => randomBytes(bytesLength);

/**
 * Deterministic byte stream: HMAC-SHA256(seed, counter) blocks, concatenated.
 *
 * Two sources built from the same seed yield the same bytes in the same
 * order. Use only for tests and reproducible demonstrations.
 *
 * @example
 * ```typescript
 * const vss = PedersenVSS.fromCurve('secp256k1', {
 *   random: createSeededRandom('test-seed'),
 * });
 * ```
 */
export function createSeededRandom(seed: string | Uint8Array): RandomSource {
  const key = typeof seed === 'string' ? utf8ToBytes(seed) : Uint8Array.from(seed);
  let counter = 0n;

  return (bytesLength) => {
    const out = new Uint8Array(bytesLength);
    let offset = 0;

    while (offset < bytesLength) {
      const counterBytes = new Uint8Array(8);
      new DataView(counterBytes.buffer).setBigUint64(0, counter);
      counter++;

      const block = hmac(sha256, key, counterBytes);
      const take = Math.min(block.length, bytesLength - offset);
      out.set(block.subarray(0, take), offset);
      offset += take;
    }

    return out;
  };
}
