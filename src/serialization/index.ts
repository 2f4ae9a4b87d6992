/**
 * JSON encoding of Pedersen shares
 *
 * A single share is self-contained (it carries the commitments), which suits
 * handing it to one participant. A share set stores the commitments once and
 * every decoded share references the same frozen array again.
 */

import type { ZodIssue } from 'zod';
import type { GroupContext } from '../group/types.js';
import { InvalidShareError } from '../pedersen/errors.js';
import type { PedersenCommitments, PedersenShare, PedersenSplitResult } from '../pedersen/types.js';
import {
  SerializedShareSchema,
  SerializedShareSetSchema,
  type SerializedShare,
  type SerializedShareSet,
} from './types.js';

// =============================================================================
// Internal Helpers
// =============================================================================

function describeIssues(issues: readonly ZodIssue[]): string {
  return issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

/**
 * Runs a decoder, turning its failure into an InvalidShareError
 */
function decodeField<T>(field: string, decode: () => T): T {
  try {
    return decode();
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new InvalidShareError(`Invalid ${field}: ${reason}`, { field });
  }
}

function assertCurve(expected: GroupContext, actual: string): void {
  if (actual !== expected.curve) {
    throw new InvalidShareError(
      `Share was encoded for ${actual}, expected ${expected.curve}`,
      { expected: expected.curve, actual }
    );
  }
}

function decodeCommitments(hexes: readonly string[], group: GroupContext): PedersenCommitments {
  return Object.freeze(
    hexes.map((hex, j) => decodeField(`commitment ${j}`, () => group.decodeElement(hex)))
  );
}

// =============================================================================
// Single Share
// =============================================================================

/**
 * Encodes a share with its commitments
 */
export function encodeShare(share: PedersenShare, group: GroupContext): SerializedShare {
  return {
    curve: group.curve,
    index: share.index,
    value1: group.encodeScalar(share.value1),
    value2: group.encodeScalar(share.value2),
    commitments: share.commitments.map((point) => group.encodeElement(point)),
  };
}

/**
 * Decodes and validates a share
 *
 * @param input - Parsed JSON (e.g. the result of `JSON.parse`)
 * @param group - Group the share must belong to
 * @throws InvalidShareError if the input is malformed or not on this curve
 */
export function decodeShare(input: unknown, group: GroupContext): PedersenShare {
  const parsed = SerializedShareSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidShareError(`Malformed share: ${describeIssues(parsed.error.issues)}`, {
      issues: parsed.error.issues,
    });
  }

  const data = parsed.data;
  assertCurve(group, data.curve);

  return Object.freeze({
    index: data.index,
    value1: decodeField('value1', () => group.decodeScalar(data.value1)),
    value2: decodeField('value2', () => group.decodeScalar(data.value2)),
    commitments: decodeCommitments(data.commitments, group),
  });
}

// =============================================================================
// Share Set
// =============================================================================

/**
 * Encodes all shares of a sharing, storing the commitments once
 */
export function encodeShareSet(result: PedersenSplitResult, group: GroupContext): SerializedShareSet {
  return {
    version: 1,
    curve: group.curve,
    threshold: result.threshold,
    totalShares: result.totalShares,
    commitments: result.commitments.map((point) => group.encodeElement(point)),
    shares: result.shares.map((share) => ({
      index: share.index,
      value1: group.encodeScalar(share.value1),
      value2: group.encodeScalar(share.value2),
    })),
  };
}

/**
 * Decodes a share set; every share references one commitments array
 *
 * @throws InvalidShareError if the input is malformed, not on this curve,
 *   or lists an index twice or beyond `totalShares`
 */
export function decodeShareSet(input: unknown, group: GroupContext): PedersenSplitResult {
  const parsed = SerializedShareSetSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidShareError(`Malformed share set: ${describeIssues(parsed.error.issues)}`, {
      issues: parsed.error.issues,
    });
  }

  const data = parsed.data;
  assertCurve(group, data.curve);

  const commitments = decodeCommitments(data.commitments, group);
  const seen = new Set<number>();
  const shares: PedersenShare[] = [];

  for (const entry of data.shares) {
    if (entry.index > data.totalShares) {
      throw new InvalidShareError(
        `Share index ${entry.index} exceeds total shares (${data.totalShares})`,
        { index: entry.index }
      );
    }
    if (seen.has(entry.index)) {
      throw new InvalidShareError(`Duplicate share index: ${entry.index}`, { index: entry.index });
    }
    seen.add(entry.index);

    shares.push(
      Object.freeze({
        index: entry.index,
        value1: decodeField(`value1 of share ${entry.index}`, () => group.decodeScalar(entry.value1)),
        value2: decodeField(`value2 of share ${entry.index}`, () => group.decodeScalar(entry.value2)),
        commitments,
      })
    );
  }

  return {
    shares: Object.freeze(shares),
    commitments,
    threshold: data.threshold,
    totalShares: data.totalShares,
  };
}

export type { SerializedShare, SerializedShareSet } from './types.js';
export { SerializedShareSchema, SerializedShareSetSchema } from './types.js';
