/**
 * Tests for configuration loading
 */

import { describe, it, expect } from 'vitest';
import { loadConfig } from './index.js';
import { ConfigurationError } from '../pedersen/errors.js';

describe('loadConfig', () => {
  it('should apply defaults to an empty environment', () => {
    expect(loadConfig({})).toEqual({
      curve: 'secp256k1',
      generatorDomain: 'pedersen-vss/generator-h',
      threshold: 3,
      parties: 5,
      logLevel: 'info',
    });
  });

  it('should read every setting from the environment', () => {
    const config = loadConfig({
      VSS_CURVE: 'bls12-381',
      VSS_GENERATOR_DOMAIN: 'test-domain',
      VSS_THRESHOLD: '2',
      VSS_PARTIES: '4',
      LOG_LEVEL: 'debug',
    });

    expect(config).toEqual({
      curve: 'bls12-381',
      generatorDomain: 'test-domain',
      threshold: 2,
      parties: 4,
      logLevel: 'debug',
    });
  });

  it('should reject a threshold above the number of parties', () => {
    const env = { VSS_THRESHOLD: '6', VSS_PARTIES: '5' };

    expect(() => loadConfig(env)).toThrow(ConfigurationError);
    expect(() => loadConfig(env)).toThrow(
      'Invalid configuration: threshold: Threshold cannot exceed number of parties'
    );
  });

  it('should reject an unknown curve', () => {
    let caught: unknown;
    try {
      loadConfig({ VSS_CURVE: 'ed25519' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigurationError);
    expect(caught).toMatchObject({
      code: 'CONFIGURATION_ERROR',
      details: { issues: [expect.stringMatching(/^curve: /)] },
    });
  });

  it('should reject non-numeric and non-positive counts', () => {
    expect(() => loadConfig({ VSS_THRESHOLD: 'three' })).toThrow(ConfigurationError);
    expect(() => loadConfig({ VSS_PARTIES: '0' })).toThrow(/^Invalid configuration: parties: /);
  });

  it('should reject an unknown log level', () => {
    expect(() => loadConfig({ LOG_LEVEL: 'verbose' })).toThrow(/logLevel: /);
  });
});
