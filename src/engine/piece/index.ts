/**
 * Piece management: block state, rarest-first selection, verification.
 *
 * @module engine/piece
 */

export {
  BLOCK_SIZE,
  BlockStatus,
  PieceState,
  PieceStatus,
  allocateBitfield,
  bitfieldLength,
  bitfieldSet,
  countBits,
  hasBit,
  hasSpareBits,
  setBit,
} from './state.js';
export type { BlockState } from './state.js';

export { PieceAvailability } from './selector.js';

export { computeSha1, verifyPieceAsync } from './verifier.js';
export type { VerificationResult } from './verifier.js';

export { MAX_BLOCK_HOLDERS, PieceManager } from './manager.js';
export type {
  BlockAssignment,
  BlockCancel,
  BlockReceipt,
  PieceManagerEvents,
  PieceManagerOptions,
} from './manager.js';
