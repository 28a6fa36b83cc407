/**
 * Piece Verification
 *
 * SHA-1 verification of assembled pieces against the hashes listed in the
 * torrent metainfo.
 *
 * @module engine/piece/verifier
 */

import { createHash } from 'crypto';
import { HashMismatchError } from '../types.js';

/**
 * Result of a piece verification operation.
 */
export interface VerificationResult {
  pieceIndex: number;

  /** Whether the piece data matches the expected hash */
  valid: boolean;

  expectedHash: Buffer;

  /** The computed SHA-1 hash of the piece data */
  actualHash: Buffer;
}

/**
 * Computes the SHA-1 hash of the provided data.
 *
 * @example
 * ```typescript
 * computeSha1(Buffer.from('hello')).toString('hex');
 * // aaf4c61ddcc5e8a2dabede0f3b482cd9aea9434d
 * ```
 */
export function computeSha1(data: Buffer): Buffer {
  return createHash('sha1').update(data).digest();
}

/**
 * Asynchronously verifies a piece against its expected hash.
 *
 * Yields to the event loop before hashing so that a burst of completed
 * pieces does not starve socket handling.
 */
export async function verifyPieceAsync(
  pieceIndex: number,
  data: Buffer,
  expectedHash: Buffer
): Promise<VerificationResult> {
  await new Promise<void>((resolve) => setImmediate(resolve));

  const actualHash = computeSha1(data);
  return {
    pieceIndex,
    valid: actualHash.equals(expectedHash),
    expectedHash,
    actualHash,
  };
}

/**
 * Build the error describing a failed verification.
 */
export function toHashMismatch(result: VerificationResult): HashMismatchError {
  return new HashMismatchError(result.pieceIndex, result.expectedHash, result.actualHash);
}
