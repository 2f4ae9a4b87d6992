/**
 * Tests for the logger factory
 */

import { describe, it, expect } from 'vitest';
import { createLogger } from './logger.js';

function capture(): { lines: string[]; destination: { write(msg: string): void } } {
  const lines: string[] = [];
  return { lines, destination: { write: (msg: string) => { lines.push(msg); } } };
}

describe('createLogger', () => {
  it('should write named JSON lines', () => {
    const { lines, destination } = capture();
    const logger = createLogger({ destination });

    logger.info({ index: 3 }, 'hello');

    expect(lines).toHaveLength(1);
    const entry = JSON.parse(lines[0]);
    expect(entry.name).toBe('pedersen-vss');
    expect(entry.level).toBe(30);
    expect(entry.msg).toBe('hello');
    expect(entry.index).toBe(3);
  });

  it('should default to the info level', () => {
    const { lines, destination } = capture();
    const logger = createLogger({ destination });

    logger.debug('hidden');

    expect(logger.level).toBe('info');
    expect(lines).toHaveLength(0);
  });

  it('should honour an explicit level', () => {
    const { lines, destination } = capture();
    const logger = createLogger({ level: 'silent', destination });

    logger.error('hidden');

    expect(lines).toHaveLength(0);
  });
});
