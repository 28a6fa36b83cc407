/**
 * Piece Selection
 *
 * Tracks how many connected peers advertise each piece and ranks pieces
 * rarest-first. Availability is fed from peers' bitfield and have messages
 * and is kept apart from the piece/block completion table.
 *
 * @module engine/piece/selector
 */

import { allocateBitfield, hasBit, setBit } from './state.js';

/**
 * Tracks piece availability across connected peers.
 *
 * @example
 * ```typescript
 * const availability = new PieceAvailability(100);
 * availability.addPeer('10.0.0.1:6881', peerBitfield);
 * availability.updatePeerHave('10.0.0.1:6881', 42);
 *
 * const ranked = availability.rankRarestFirst([3, 42, 7]);
 * ```
 */
export class PieceAvailability {
  readonly pieceCount: number;

  /** Count of peers that have each piece (indexed by piece index) */
  private readonly counts: number[];

  private readonly peerBitfields = new Map<string, Buffer>();

  constructor(pieceCount: number) {
    this.pieceCount = pieceCount;
    this.counts = new Array<number>(pieceCount).fill(0);
  }

  /**
   * Register a peer's bitfield, replacing any bitfield it announced before.
   */
  addPeer(peer: string, bitfield: Buffer): void {
    this.removePeer(peer);

    const copy = allocateBitfield(this.pieceCount);
    bitfield.copy(copy, 0, 0, copy.length);
    this.peerBitfields.set(peer, copy);

    for (let i = 0; i < this.pieceCount; i++) {
      if (hasBit(copy, i)) {
        this.counts[i]++;
      }
    }
  }

  /**
   * Forget a peer and every piece it advertised.
   */
  removePeer(peer: string): void {
    const bitfield = this.peerBitfields.get(peer);
    if (!bitfield) {
      return;
    }

    for (let i = 0; i < this.pieceCount; i++) {
      if (hasBit(bitfield, i)) {
        this.counts[i]--;
      }
    }
    this.peerBitfields.delete(peer);
  }

  /**
   * Record a HAVE announcement from a peer.
   */
  updatePeerHave(peer: string, pieceIndex: number): void {
    if (pieceIndex < 0 || pieceIndex >= this.pieceCount) {
      throw new RangeError(`Invalid piece index: ${pieceIndex}`);
    }

    let bitfield = this.peerBitfields.get(peer);
    if (!bitfield) {
      bitfield = allocateBitfield(this.pieceCount);
      this.peerBitfields.set(peer, bitfield);
    }

    if (!hasBit(bitfield, pieceIndex)) {
      setBit(bitfield, pieceIndex);
      this.counts[pieceIndex]++;
    }
  }

  /**
   * Number of tracked peers advertising a piece.
   */
  getAvailability(pieceIndex: number): number {
    return this.counts[pieceIndex] ?? 0;
  }

  /**
   * Whether any tracked peer advertises the piece.
   */
  isAvailable(pieceIndex: number): boolean {
    return this.getAvailability(pieceIndex) > 0;
  }

  hasPeer(peer: string): boolean {
    return this.peerBitfields.has(peer);
  }

  /**
   * Order pieces by availability (ascending), then by index (ascending).
   */
  rankRarestFirst(pieces: Iterable<number>): number[] {
    return [...pieces].sort((a, b) => {
      const byCount = this.getAvailability(a) - this.getAvailability(b);
      return byCount !== 0 ? byCount : a - b;
    });
  }
}
