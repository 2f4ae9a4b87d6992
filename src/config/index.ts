/**
 * Runtime configuration
 *
 * Read from environment variables and validated with zod:
 *
 * | Variable             | Default                  |
 * |----------------------|--------------------------|
 * | VSS_CURVE            | secp256k1                |
 * | VSS_GENERATOR_DOMAIN | pedersen-vss/generator-h |
 * | VSS_THRESHOLD        | 3                        |
 * | VSS_PARTIES          | 5                        |
 * | LOG_LEVEL            | info                     |
 */

import { z } from 'zod';
import { DEFAULT_GENERATOR_DOMAIN } from '../group/index.js';
import { CURVE_NAMES } from '../group/types.js';
import { ConfigurationError } from '../pedersen/errors.js';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

/**
 * Schema for the sharing parameters
 */
export const VSSConfigSchema = z.object({
  curve: z.enum(CURVE_NAMES).default('secp256k1'),
  generatorDomain: z.string().min(1).default(DEFAULT_GENERATOR_DOMAIN),
  threshold: z.coerce.number().int().positive().default(3),
  parties: z.coerce.number().int().positive().default(5),
  logLevel: z.enum(LOG_LEVELS).default('info'),
}).refine(
  (data) => data.threshold <= data.parties,
  { message: 'Threshold cannot exceed number of parties', path: ['threshold'] }
);

export type VSSConfig = z.infer<typeof VSSConfigSchema>;

/**
 * Loads the configuration from environment variables
 *
 * @throws ConfigurationError listing every invalid setting
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): VSSConfig {
  const parsed = VSSConfigSchema.safeParse({
    curve: env.VSS_CURVE,
    generatorDomain: env.VSS_GENERATOR_DOMAIN,
    threshold: env.VSS_THRESHOLD,
    parties: env.VSS_PARTIES,
    logLevel: env.LOG_LEVEL,
  });

  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`, { issues });
  }

  return parsed.data;
}
