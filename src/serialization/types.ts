/**
 * Wire types for Pedersen shares
 *
 * Scalars and points are hex-encoded for easy serialization and
 * transmission; the schemas validate shape only, and decoding checks the
 * cryptographic content.
 */

import { z } from 'zod';
import { CURVE_NAMES } from '../group/types.js';

const hex = z.string().regex(/^[0-9a-fA-F]+$/, 'Expected a hex string');

// =============================================================================
// Single Share
// =============================================================================

/**
 * Schema for one share, carrying its own copy of the commitments
 */
export const SerializedShareSchema = z.object({
  curve: z.enum(CURVE_NAMES),
  index: z.number().int().positive().max(Number.MAX_SAFE_INTEGER),
  value1: hex,
  value2: hex,
  commitments: z.array(hex).min(1),
});

export type SerializedShare = z.infer<typeof SerializedShareSchema>;

// =============================================================================
// Share Set
// =============================================================================

/**
 * Schema for every share of one sharing, with the commitments stored once
 */
export const SerializedShareSetSchema = z.object({
  version: z.literal(1),
  curve: z.enum(CURVE_NAMES),
  threshold: z.number().int().positive().max(Number.MAX_SAFE_INTEGER),
  totalShares: z.number().int().positive().max(Number.MAX_SAFE_INTEGER),
  commitments: z.array(hex).min(1),
  shares: z.array(z.object({
    index: z.number().int().positive().max(Number.MAX_SAFE_INTEGER),
    value1: hex,
    value2: hex,
  })).min(1),
}).refine(
  (data) => data.threshold <= data.totalShares,
  { message: 'Threshold cannot exceed total shares', path: ['threshold'] }
).refine(
  (data) => data.commitments.length === data.threshold,
  { message: 'Commitment count must equal the threshold', path: ['commitments'] }
);

export type SerializedShareSet = z.infer<typeof SerializedShareSetSchema>;
