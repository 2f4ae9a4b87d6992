/**
 * Errors raised by Pedersen VSS
 */

export type VSSErrorCode =
  | 'CONFIGURATION_ERROR'
  | 'INVALID_THRESHOLD'
  | 'INVALID_SECRET'
  | 'INSUFFICIENT_SHARES'
  | 'DUPLICATE_INDEX'
  | 'INVALID_SHARE';

export class VSSError extends Error {
  constructor(
    message: string,
    public readonly code: VSSErrorCode,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'VSSError';
  }
}

/**
 * Unusable public parameters (equal or degenerate generators, bad config)
 */
export class ConfigurationError extends VSSError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', details);
    this.name = 'ConfigurationError';
  }
}

export class InvalidThresholdError extends VSSError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'INVALID_THRESHOLD', details);
    this.name = 'InvalidThresholdError';
  }
}

export class InvalidSecretError extends VSSError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'INVALID_SECRET', details);
    this.name = 'InvalidSecretError';
  }
}

export class InsufficientSharesError extends VSSError {
  constructor(required: number, provided: number) {
    super(
      `Not enough shares to reconstruct the secret: at least ${required} required, got ${provided}`,
      'INSUFFICIENT_SHARES',
      { required, provided }
    );
    this.name = 'InsufficientSharesError';
  }
}

export class DuplicateIndexError extends VSSError {
  constructor(index: number) {
    super(`Duplicate share index: ${index}`, 'DUPLICATE_INDEX', { index });
    this.name = 'DuplicateIndexError';
  }
}

/**
 * A share (or encoded share) that is structurally malformed
 */
export class InvalidShareError extends VSSError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'INVALID_SHARE', details);
    this.name = 'InvalidShareError';
  }
}
