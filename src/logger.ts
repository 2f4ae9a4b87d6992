/**
 * Logger factory (pino, the logger Fastify ships with)
 */

import { pino, type DestinationStream, type LevelWithSilent, type Logger } from 'pino';

export interface LoggerOptions {
  /** Minimum level to emit (default: info) */
  level?: LevelWithSilent;
  /** Where to write JSON lines (default: stdout) */
  destination?: DestinationStream;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const settings = { name: 'pedersen-vss', level: options.level ?? 'info' };
  return options.destination ? pino(settings, options.destination) : pino(settings);
}

export type { Logger } from 'pino';
