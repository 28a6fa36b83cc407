/**
 * Piece and block state tracking.
 *
 * A piece is divided into fixed-size blocks, the unit of network requests.
 * Each block is Missing, Requested by one or more peers, or Received; the
 * piece moves from Pending to Verifying once every block is Received, and
 * then to Complete or back to Pending.
 *
 * @module engine/piece/state
 */

import type { PieceSet } from '../types.js';

// =============================================================================
// Constants
// =============================================================================

/** Standard block size (16 KiB) */
export const BLOCK_SIZE = 16384;

// =============================================================================
// Types
// =============================================================================

export enum BlockStatus {
  Missing = 'missing',
  Requested = 'requested',
  Received = 'received',
}

export enum PieceStatus {
  Pending = 'pending',
  Verifying = 'verifying',
  Complete = 'complete',
}

/**
 * State of one block. A requested block maps each holding peer to the time
 * its request was issued; more than one holder only occurs in endgame.
 */
export type BlockState =
  | { status: BlockStatus.Missing }
  | { status: BlockStatus.Requested; holders: Map<string, number> }
  | { status: BlockStatus.Received; from: string };

// =============================================================================
// PieceState Class
// =============================================================================

/**
 * Download state of a single piece.
 *
 * @example
 * ```typescript
 * const piece = new PieceState(0, 32768, expectedHash);
 * piece.request(0, 'peer-a', Date.now());
 * piece.receive(0, 'peer-a', blockData);
 * ```
 */
export class PieceState {
  readonly pieceIndex: number;
  readonly length: number;
  readonly expectedHash: Buffer;
  readonly blockSize: number;
  readonly blockCount: number;

  status: PieceStatus = PieceStatus.Pending;

  private blocks: BlockState[];
  private data: Buffer | null = null;
  private receivedCount = 0;

  constructor(pieceIndex: number, length: number, expectedHash: Buffer, blockSize: number = BLOCK_SIZE) {
    if (length <= 0) {
      throw new RangeError(`Invalid piece length: ${length}`);
    }
    this.pieceIndex = pieceIndex;
    this.length = length;
    this.expectedHash = expectedHash;
    this.blockSize = blockSize;
    this.blockCount = Math.ceil(length / blockSize);
    this.blocks = Array.from({ length: this.blockCount }, (): BlockState => ({ status: BlockStatus.Missing }));
  }

  getBlock(blockIndex: number): BlockState {
    const block = this.blocks[blockIndex];
    if (block === undefined) {
      throw new RangeError(`Invalid block index ${blockIndex} for piece ${this.pieceIndex}`);
    }
    return block;
  }

  blockOffset(blockIndex: number): number {
    return blockIndex * this.blockSize;
  }

  /**
   * Length of a block; the last block may be shorter.
   */
  blockLength(blockIndex: number): number {
    return Math.min(this.blockSize, this.length - this.blockOffset(blockIndex));
  }

  /**
   * Map a byte offset within the piece to its block index.
   *
   * @returns The block index, or null if the offset is not a block boundary
   */
  blockIndexAt(begin: number): number | null {
    if (!Number.isInteger(begin) || begin < 0 || begin % this.blockSize !== 0) {
      return null;
    }
    const blockIndex = begin / this.blockSize;
    return blockIndex < this.blockCount ? blockIndex : null;
  }

  /**
   * Record a request for a block by a peer.
   */
  request(blockIndex: number, peer: string, now: number): void {
    const block = this.getBlock(blockIndex);
    if (block.status === BlockStatus.Received) {
      throw new Error(`Block ${blockIndex} of piece ${this.pieceIndex} is already received`);
    }
    if (block.status === BlockStatus.Requested) {
      block.holders.set(peer, now);
      return;
    }
    this.blocks[blockIndex] = { status: BlockStatus.Requested, holders: new Map([[peer, now]]) };
  }

  /**
   * Drop a peer's request for a block. The block reverts to Missing when no
   * holders remain.
   *
   * @returns true if the peer held the block
   */
  release(blockIndex: number, peer: string): boolean {
    const block = this.getBlock(blockIndex);
    if (block.status !== BlockStatus.Requested || !block.holders.delete(peer)) {
      return false;
    }
    if (block.holders.size === 0) {
      this.blocks[blockIndex] = { status: BlockStatus.Missing };
    }
    return true;
  }

  /**
   * Store a block's data.
   *
   * @returns Peers other than the sender that still held a request for the block
   * @throws {RangeError} If the data length does not match the block length
   */
  receive(blockIndex: number, peer: string, data: Buffer): string[] {
    const block = this.getBlock(blockIndex);
    const expected = this.blockLength(blockIndex);
    if (data.length !== expected) {
      throw new RangeError(
        `Block ${blockIndex} of piece ${this.pieceIndex} has ${data.length} bytes, expected ${expected}`
      );
    }
    if (block.status === BlockStatus.Received) {
      return [];
    }

    const others = block.status === BlockStatus.Requested ? [...block.holders.keys()].filter((p) => p !== peer) : [];

    if (this.data === null) {
      this.data = Buffer.alloc(this.length);
    }
    data.copy(this.data, this.blockOffset(blockIndex));
    this.blocks[blockIndex] = { status: BlockStatus.Received, from: peer };
    this.receivedCount++;
    return others;
  }

  /**
   * First Missing block by offset, or null.
   */
  firstMissing(): number | null {
    const index = this.blocks.findIndex((block) => block.status === BlockStatus.Missing);
    return index === -1 ? null : index;
  }

  /**
   * First Requested block that `peer` does not hold and that has fewer than
   * `maxHolders` holders, or null.
   */
  firstDuplicable(peer: string, maxHolders: number): number | null {
    const index = this.blocks.findIndex(
      (block) => block.status === BlockStatus.Requested && !block.holders.has(peer) && block.holders.size < maxHolders
    );
    return index === -1 ? null : index;
  }

  isFullyReceived(): boolean {
    return this.receivedCount === this.blockCount;
  }

  /**
   * Peers whose data makes up the received blocks.
   */
  contributors(): string[] {
    const peers = new Set<string>();
    for (const block of this.blocks) {
      if (block.status === BlockStatus.Received) {
        peers.add(block.from);
      }
    }
    return [...peers];
  }

  /**
   * The assembled piece data.
   *
   * @throws {Error} If any block is still outstanding
   */
  getData(): Buffer {
    if (this.data === null || !this.isFullyReceived()) {
      throw new Error(`Piece ${this.pieceIndex} is not fully received`);
    }
    return this.data;
  }

  /**
   * Return every block to Missing and discard the buffered data.
   */
  reset(): void {
    this.blocks = this.blocks.map((): BlockState => ({ status: BlockStatus.Missing }));
    this.data = null;
    this.receivedCount = 0;
    this.status = PieceStatus.Pending;
  }

  /**
   * Mark the piece Complete and release its buffered data.
   */
  complete(): void {
    this.status = PieceStatus.Complete;
    this.data = null;
  }
}

// =============================================================================
// Bitfield Utilities
// =============================================================================

/**
 * Bytes needed for a bitfield covering `pieceCount` pieces.
 */
export function bitfieldLength(pieceCount: number): number {
  return Math.ceil(pieceCount / 8);
}

/**
 * Allocate an empty bitfield. Bit 0 is the high bit of the first byte.
 */
export function allocateBitfield(pieceCount: number): Buffer {
  if (pieceCount < 0) {
    throw new RangeError('Piece count cannot be negative');
  }
  return Buffer.alloc(bitfieldLength(pieceCount));
}

export function hasBit(bitfield: Buffer, index: number): boolean {
  const byteIndex = index >> 3;
  if (index < 0 || byteIndex >= bitfield.length) {
    return false;
  }
  return (bitfield[byteIndex] & (0x80 >> (index & 7))) !== 0;
}

/**
 * @throws {RangeError} If the index is outside the bitfield
 */
export function setBit(bitfield: Buffer, index: number): void {
  const byteIndex = index >> 3;
  if (index < 0 || byteIndex >= bitfield.length) {
    throw new RangeError(`Bit index ${index} out of range`);
  }
  bitfield[byteIndex] |= 0x80 >> (index & 7);
}

export function countBits(bitfield: Buffer): number {
  let count = 0;
  for (const byte of bitfield) {
    let b = byte;
    while (b !== 0) {
      count += b & 1;
      b >>= 1;
    }
  }
  return count;
}

/**
 * Whether any bit beyond `pieceCount` is set in the final byte.
 */
export function hasSpareBits(bitfield: Buffer, pieceCount: number): boolean {
  const used = pieceCount & 7;
  if (used === 0 || bitfield.length === 0) {
    return false;
  }
  const spareMask = 0xff >> used;
  return (bitfield[bitfield.length - 1] & spareMask) !== 0;
}

/**
 * View a bitfield as a set of piece indices.
 */
export function bitfieldSet(bitfield: Buffer): PieceSet {
  return { has: (pieceIndex) => hasBit(bitfield, pieceIndex) };
}
