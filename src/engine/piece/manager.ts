/**
 * Piece Manager
 *
 * Authoritative piece/block completion table for one download:
 * - Assigns block requests to peers rarest-first
 * - Duplicates outstanding blocks to a second peer in endgame
 * - Assembles received blocks and verifies completed pieces
 * - Forwards each verified piece to storage exactly once
 *
 * All mutating calls are synchronous and run to completion on the event
 * loop, so the table has a single owner and two sessions can never observe
 * it mid-update. Asynchronous work (hashing, storage writes) re-enters the
 * table only through its own completion callbacks.
 *
 * @module engine/piece/manager
 */

import { TypedEventEmitter } from '../events.js';
import type { TorrentDescriptor } from '../torrent/parser.js';
import { pieceSize } from '../torrent/parser.js';
import { HashMismatchError, PiecewiseError, StorageError, type PieceSet, type Storage } from '../types.js';
import { PieceAvailability } from './selector.js';
import { BLOCK_SIZE, BlockStatus, PieceState, PieceStatus, allocateBitfield, setBit, type BlockState } from './state.js';
import { toHashMismatch, verifyPieceAsync, type VerificationResult } from './verifier.js';

// =============================================================================
// Constants
// =============================================================================

/** Default number of incomplete pieces below which endgame starts */
const DEFAULT_ENDGAME_THRESHOLD = 4;

/** Maximum peers holding the same block at once (endgame only) */
export const MAX_BLOCK_HOLDERS = 2;

// =============================================================================
// Types
// =============================================================================

/**
 * A block a peer should request.
 */
export interface BlockAssignment {
  pieceIndex: number;
  begin: number;
  length: number;

  /** Whether another peer already holds a request for this block */
  duplicate: boolean;
}

/**
 * An outstanding request made redundant by another peer's response.
 */
export interface BlockCancel {
  peer: string;
  pieceIndex: number;
  begin: number;
  length: number;
}

export type BlockReceipt =
  | { status: 'accepted'; cancels: BlockCancel[] }
  | { status: 'duplicate' }
  | { status: 'rejected'; reason: string };

export interface PieceManagerEvents {
  /** A piece passed verification and was handed to storage */
  pieceComplete: { pieceIndex: number };

  /** A piece failed verification and was reset; `contributors` supplied its blocks */
  hashMismatch: { error: HashMismatchError; contributors: string[] };

  /** Fewer than the endgame threshold of pieces remain incomplete */
  endgameStarted: { remainingPieces: number };

  /** Every piece is verified */
  downloadComplete: void;

  /** Storage rejected a verified piece; the download cannot complete */
  fatal: PiecewiseError;
}

export interface PieceManagerOptions {
  descriptor: TorrentDescriptor;
  storage: Storage;

  /** Block size in bytes (default: 16 KiB) */
  blockSize?: number;

  /** Endgame starts when fewer than this many pieces are incomplete (default: 4) */
  endgameThreshold?: number;

  /** Shared availability tracker; a private one is created if omitted */
  availability?: PieceAvailability;

  /** Clock used for request timestamps */
  now?: () => number;
}

// =============================================================================
// PieceManager Class
// =============================================================================

/**
 * Tracks and schedules the pieces of a single torrent.
 *
 * @example
 * ```typescript
 * const manager = new PieceManager({ descriptor, storage });
 *
 * const assignment = manager.nextBlockToRequest('10.0.0.1:6881', peerPieces);
 * if (assignment) {
 *   session.requestBlock(assignment);
 * }
 *
 * // Later, when the block arrives
 * const receipt = manager.reportBlockReceived('10.0.0.1:6881', 0, 0, data);
 * ```
 */
export class PieceManager extends TypedEventEmitter<PieceManagerEvents> {
  /** Piece availability across connected peers */
  readonly availability: PieceAvailability;

  private readonly pieceLength: number;
  private readonly totalLength: number;
  private readonly pieces: PieceState[];
  private readonly storage: Storage;
  private readonly endgameThreshold: number;
  private readonly now: () => number;

  /** Blocks each peer currently holds, keyed `${pieceIndex}:${blockIndex}` */
  private readonly requestsByPeer = new Map<string, Set<string>>();

  /** Outstanding verifications and storage writes */
  private readonly pending = new Set<Promise<void>>();

  private completedCount = 0;
  private completedBytes = 0;
  private endgame = false;
  private failure: PiecewiseError | null = null;

  constructor(options: PieceManagerOptions) {
    super();
    const { descriptor } = options;
    const blockSize = options.blockSize ?? BLOCK_SIZE;

    this.pieceLength = descriptor.pieceLength;
    this.totalLength = descriptor.totalLength;
    this.storage = options.storage;
    this.endgameThreshold = options.endgameThreshold ?? DEFAULT_ENDGAME_THRESHOLD;
    this.now = options.now ?? Date.now;
    this.pieces = descriptor.pieceHashes.map(
      (hash, index) => new PieceState(index, pieceSize(descriptor, index), hash, blockSize)
    );
    this.availability = options.availability ?? new PieceAvailability(this.pieces.length);
    this.endgame = this.pieces.length < this.endgameThreshold;
  }

  // ===========================================================================
  // Public Getters
  // ===========================================================================

  get pieceCount(): number {
    return this.pieces.length;
  }

  /** Whether endgame duplication is active */
  get isEndgame(): boolean {
    return this.endgame;
  }

  // ===========================================================================
  // Scheduling
  // ===========================================================================

  /**
   * Choose the next block a peer should request.
   *
   * Pieces the peer advertises and that are still pending are ranked by
   * availability (rarest first, lowest index on ties). The first Missing
   * block of the best-ranked piece is assigned; in endgame, if no Missing
   * block is available, a block already requested by another peer is
   * duplicated.
   *
   * @param peer - Key of the requesting peer
   * @param peerPieces - Pieces the peer advertises
   * @returns The assignment, or null if the peer has nothing useful
   */
  nextBlockToRequest(peer: string, peerPieces: PieceSet): BlockAssignment | null {
    const candidates: number[] = [];
    for (const piece of this.pieces) {
      if (piece.status === PieceStatus.Pending && peerPieces.has(piece.pieceIndex)) {
        candidates.push(piece.pieceIndex);
      }
    }
    const ranked = this.availability.rankRarestFirst(candidates);

    for (const pieceIndex of ranked) {
      const blockIndex = this.pieces[pieceIndex].firstMissing();
      if (blockIndex !== null) {
        return this.assign(peer, this.pieces[pieceIndex], blockIndex, false);
      }
    }

    if (this.endgame) {
      for (const pieceIndex of ranked) {
        const blockIndex = this.pieces[pieceIndex].firstDuplicable(peer, MAX_BLOCK_HOLDERS);
        if (blockIndex !== null) {
          return this.assign(peer, this.pieces[pieceIndex], blockIndex, true);
        }
      }
    }

    return null;
  }

  /**
   * Accept block data from a peer.
   *
   * The block is stored if it is still needed, whether or not this peer held
   * the request. Once every block of a piece is received, the piece is
   * verified asynchronously.
   *
   * @returns Whether the block was stored, and the redundant requests to cancel
   */
  reportBlockReceived(peer: string, pieceIndex: number, begin: number, data: Buffer): BlockReceipt {
    const piece = this.pieces[pieceIndex];
    if (piece === undefined) {
      return { status: 'rejected', reason: `piece index ${pieceIndex} out of range` };
    }

    const blockIndex = piece.blockIndexAt(begin);
    if (blockIndex === null) {
      return { status: 'rejected', reason: `offset ${begin} is not a block boundary of piece ${pieceIndex}` };
    }

    const expectedLength = piece.blockLength(blockIndex);
    if (data.length !== expectedLength) {
      return {
        status: 'rejected',
        reason: `block ${pieceIndex}:${begin} has ${data.length} bytes, expected ${expectedLength}`,
      };
    }

    if (piece.status !== PieceStatus.Pending || piece.getBlock(blockIndex).status === BlockStatus.Received) {
      this.untrack(peer, pieceIndex, blockIndex);
      return { status: 'duplicate' };
    }

    const others = piece.receive(blockIndex, peer, data);
    this.untrack(peer, pieceIndex, blockIndex);
    for (const other of others) {
      this.untrack(other, pieceIndex, blockIndex);
    }

    if (piece.isFullyReceived()) {
      this.verify(piece);
    }

    return {
      status: 'accepted',
      cancels: others.map((other) => ({ peer: other, pieceIndex, begin, length: expectedLength })),
    };
  }

  /**
   * Drop a peer's request that went unanswered. The block becomes Missing
   * again unless another peer still holds it.
   *
   * @returns true if the peer held the block
   */
  reportRequestTimedOut(peer: string, pieceIndex: number, begin: number): boolean {
    const piece = this.pieces[pieceIndex];
    const blockIndex = piece?.blockIndexAt(begin) ?? null;
    if (piece === undefined || blockIndex === null) {
      return false;
    }

    const released = piece.release(blockIndex, peer);
    this.untrack(peer, pieceIndex, blockIndex);
    return released;
  }

  /**
   * Release every block a peer holds. Called when its session ends.
   *
   * @returns Number of requests released
   */
  releaseAllFor(peer: string): number {
    const keys = this.requestsByPeer.get(peer);
    if (!keys) {
      return 0;
    }

    let released = 0;
    for (const key of keys) {
      const [pieceIndex, blockIndex] = key.split(':').map(Number);
      if (this.pieces[pieceIndex].release(blockIndex, peer)) {
        released++;
      }
    }
    this.requestsByPeer.delete(peer);
    return released;
  }

  // ===========================================================================
  // Queries
  // ===========================================================================

  /**
   * Fraction of the payload that is verified, between 0 and 1.
   */
  progress(): number {
    return this.completedBytes / this.totalLength;
  }

  isComplete(): boolean {
    return this.completedCount === this.pieces.length;
  }

  hasPiece(pieceIndex: number): boolean {
    return this.pieces[pieceIndex]?.status === PieceStatus.Complete;
  }

  /**
   * Whether the peer advertises any piece that is not yet complete.
   */
  canSupply(peerPieces: PieceSet): boolean {
    return this.pieces.some((piece) => piece.status !== PieceStatus.Complete && peerPieces.has(piece.pieceIndex));
  }

  /**
   * Indices of pieces that are not yet complete.
   */
  missingPieces(): number[] {
    return this.pieces.filter((piece) => piece.status !== PieceStatus.Complete).map((piece) => piece.pieceIndex);
  }

  pieceStatus(pieceIndex: number): PieceStatus {
    return this.getPiece(pieceIndex).status;
  }

  blockState(pieceIndex: number, begin: number): BlockState {
    const piece = this.getPiece(pieceIndex);
    const blockIndex = piece.blockIndexAt(begin);
    if (blockIndex === null) {
      throw new RangeError(`Offset ${begin} is not a block boundary of piece ${pieceIndex}`);
    }
    return piece.getBlock(blockIndex);
  }

  /**
   * Bitfield of verified pieces, as sent to peers.
   */
  getBitfield(): Buffer {
    const bitfield = allocateBitfield(this.pieces.length);
    for (const piece of this.pieces) {
      if (piece.status === PieceStatus.Complete) {
        setBit(bitfield, piece.pieceIndex);
      }
    }
    return bitfield;
  }

  /**
   * Wait for outstanding verifications and storage writes.
   *
   * @throws {PiecewiseError} If storage rejected a verified piece
   */
  async flush(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all(this.pending);
    }
    if (this.failure) {
      throw this.failure;
    }
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  private getPiece(pieceIndex: number): PieceState {
    const piece = this.pieces[pieceIndex];
    if (piece === undefined) {
      throw new RangeError(`Invalid piece index: ${pieceIndex}`);
    }
    return piece;
  }

  private assign(peer: string, piece: PieceState, blockIndex: number, duplicate: boolean): BlockAssignment {
    piece.request(blockIndex, peer, this.now());

    let keys = this.requestsByPeer.get(peer);
    if (!keys) {
      keys = new Set();
      this.requestsByPeer.set(peer, keys);
    }
    keys.add(`${piece.pieceIndex}:${blockIndex}`);

    return {
      pieceIndex: piece.pieceIndex,
      begin: piece.blockOffset(blockIndex),
      length: piece.blockLength(blockIndex),
      duplicate,
    };
  }

  private untrack(peer: string, pieceIndex: number, blockIndex: number): void {
    const keys = this.requestsByPeer.get(peer);
    if (!keys) {
      return;
    }
    keys.delete(`${pieceIndex}:${blockIndex}`);
    if (keys.size === 0) {
      this.requestsByPeer.delete(peer);
    }
  }

  private track(task: Promise<void>): void {
    const tracked = task.finally(() => {
      this.pending.delete(tracked);
    });
    this.pending.add(tracked);
  }

  private verify(piece: PieceState): void {
    piece.status = PieceStatus.Verifying;
    const data = piece.getData();

    this.track(
      verifyPieceAsync(piece.pieceIndex, data, piece.expectedHash).then((result) =>
        this.handleVerification(piece, data, result)
      )
    );
  }

  private handleVerification(piece: PieceState, data: Buffer, result: VerificationResult): void {
    if (!result.valid) {
      const contributors = piece.contributors();
      piece.reset();
      this.emit('hashMismatch', { error: toHashMismatch(result), contributors });
      return;
    }

    // The piece stays Verifying until storage accepts it
    this.track(
      this.storage.write(piece.pieceIndex * this.pieceLength, data).then(
        () => this.markComplete(piece),
        (err: unknown) => {
          this.failure = new StorageError(piece.pieceIndex, { cause: err });
          this.emit('fatal', this.failure);
        }
      )
    );
  }

  private markComplete(piece: PieceState): void {
    piece.complete();
    this.completedCount++;
    this.completedBytes += piece.length;

    this.emit('pieceComplete', { pieceIndex: piece.pieceIndex });
    this.checkEndgame();

    if (this.isComplete()) {
      this.emit('downloadComplete');
    }
  }

  private checkEndgame(): void {
    const remaining = this.pieces.length - this.completedCount;
    if (!this.endgame && remaining > 0 && remaining < this.endgameThreshold) {
      this.endgame = true;
      this.emit('endgameStarted', { remainingPieces: remaining });
    }
  }
}
