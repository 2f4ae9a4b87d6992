/**
 * pedersen-vss
 * Pedersen Verifiable Secret Sharing over prime-order elliptic-curve groups
 *
 * - A secret is split into n shares; any t of them reconstruct it
 * - Fewer than t shares reveal nothing about the secret
 * - Every share can be checked against public commitments, which
 *   themselves hide the secret information-theoretically
 */

// =============================================================================
// Main API
// =============================================================================

export { PedersenVSS } from './pedersen/index.js';

export type {
  PedersenShare,
  PedersenCommitments,
  PedersenSplitResult,
  PedersenVSSOptions,
  PedersenCurveOptions,
  VerificationResult,
} from './pedersen/types.js';

export {
  VSSError,
  ConfigurationError,
  InvalidThresholdError,
  InvalidSecretError,
  InsufficientSharesError,
  DuplicateIndexError,
  InvalidShareError,
} from './pedersen/errors.js';

export type { VSSErrorCode } from './pedersen/errors.js';

// =============================================================================
// Core Primitives
// =============================================================================

// Group and scalar field
export {
  createGroup,
  deriveGenerators,
  generatorDST,
  DEFAULT_GENERATOR_DOMAIN,
} from './group/index.js';

export { CURVE_NAMES } from './group/types.js';

export type {
  CurveName,
  GroupContext,
  GroupElement,
  Generators,
  Scalar,
} from './group/types.js';

// Polynomials
export {
  evaluatePolynomial,
  generatePolynomial,
  lagrangeCoefficientAtZero,
  interpolateAtZero,
} from './polynomial/index.js';

export type { PolynomialPoint } from './polynomial/index.js';

// Randomness
export { systemRandom, createSeededRandom } from './utils/random.js';

export type { RandomSource } from './utils/random.js';

// =============================================================================
// Serialization
// =============================================================================

export {
  encodeShare,
  decodeShare,
  encodeShareSet,
  decodeShareSet,
  SerializedShareSchema,
  SerializedShareSetSchema,
} from './serialization/index.js';

export type { SerializedShare, SerializedShareSet } from './serialization/types.js';

// =============================================================================
// Configuration, Logging and Demo
// =============================================================================

export { loadConfig, VSSConfigSchema, LOG_LEVELS } from './config/index.js';

export type { VSSConfig } from './config/index.js';

export { createLogger } from './logger.js';

export type { Logger, LoggerOptions } from './logger.js';

export { runDemo } from './demo/index.js';

export type { DemoReport, DemoOptions } from './demo/index.js';
