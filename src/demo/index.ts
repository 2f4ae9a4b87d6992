/**
 * Demonstration run: share a random secret, verify every share, reconstruct
 *
 * Logs progress through the given logger. Share values and the secret are
 * never logged; only indices, verdicts and public generators are.
 */

import type { Logger } from 'pino';
import type { VSSConfig } from '../config/index.js';
import type { CurveName } from '../group/types.js';
import { PedersenVSS } from '../pedersen/index.js';
import { systemRandom, type RandomSource } from '../utils/random.js';

export interface DemoReport {
  curve: CurveName;
  threshold: number;
  parties: number;
  /** How many of the issued shares passed verification */
  validShares: number;
  /** Whether the first t shares gave back the original secret */
  reconstructed: boolean;
}

export interface DemoOptions {
  random?: RandomSource;
}

export function runDemo(config: VSSConfig, logger: Logger, options: DemoOptions = {}): DemoReport {
  const random = options.random ?? systemRandom;
  const vss = PedersenVSS.fromCurve(config.curve, {
    generatorDomain: config.generatorDomain,
    random,
  });
  const { group } = vss;

  logger.info(
    { curve: group.curve, g: group.encodeElement(vss.g), h: group.encodeElement(vss.h) },
    'Generators ready'
  );

  const secret = group.randomScalar(random);
  const result = vss.split(secret, config.threshold, config.parties);
  logger.info(
    { threshold: result.threshold, parties: result.totalShares },
    'Secret split into shares'
  );

  let validShares = 0;
  for (const share of result.shares) {
    const verification = vss.verify(share);
    if (verification.valid) {
      validShares++;
      logger.debug({ index: share.index }, 'Share valid');
    } else {
      logger.warn({ index: share.index, reason: verification.error }, 'Share invalid');
    }
  }

  const selected = result.shares.slice(0, config.threshold);
  const reconstructed = vss.reconstruct(selected, config.threshold) === secret;
  logger.info(
    { indices: selected.map((share) => share.index), success: reconstructed },
    'Secret reconstruction finished'
  );

  return {
    curve: group.curve,
    threshold: config.threshold,
    parties: config.parties,
    validShares,
    reconstructed,
  };
}
