/**
 * Pedersen VSS Example
 *
 * Shares a random secret with the configured threshold, verifies every
 * share and reconstructs the secret from the first t shares.
 *
 * Configure with VSS_CURVE, VSS_THRESHOLD, VSS_PARTIES,
 * VSS_GENERATOR_DOMAIN and LOG_LEVEL.
 */

import { loadConfig, type VSSConfig } from '../src/config/index.js';
import { runDemo } from '../src/demo/index.js';
import { createLogger } from '../src/logger.js';

function main(): void {
  let config: VSSConfig;
  try {
    config = loadConfig();
  } catch (error) {
    createLogger().error({ err: error }, 'Invalid configuration');
    process.exitCode = 1;
    return;
  }

  const logger = createLogger({ level: config.logLevel });

  try {
    const report = runDemo(config, logger);
    logger.info(report, 'Example completed');
    if (!report.reconstructed || report.validShares !== report.parties) {
      process.exitCode = 1;
    }
  } catch (error) {
    logger.error({ err: error }, 'Example failed');
    process.exitCode = 1;
  }
}

main();
