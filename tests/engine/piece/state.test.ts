import { describe, it, expect, beforeEach } from 'vitest';
import {
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
} from '../../../src/engine/piece/state.js';

const HASH = Buffer.alloc(20, 0x5a);

// =============================================================================
// PieceState Tests
// =============================================================================

describe('PieceState', () => {
  let piece: PieceState;

  // 40000 bytes in 16 KiB blocks: 16384 + 16384 + 7232
  beforeEach(() => {
    piece = new PieceState(3, 40000, HASH);
  });

  describe('geometry', () => {
    it('should split the piece into blocks', () => {
      expect(piece.blockCount).toBe(3);
      expect(piece.blockSize).toBe(BLOCK_SIZE);
      expect(piece.blockOffset(2)).toBe(32768);
      expect(piece.blockLength(0)).toBe(16384);
      expect(piece.blockLength(2)).toBe(7232);
    });

    it('should map block boundaries to indices', () => {
      expect(piece.blockIndexAt(0)).toBe(0);
      expect(piece.blockIndexAt(32768)).toBe(2);
      expect(piece.blockIndexAt(100)).toBeNull();
      expect(piece.blockIndexAt(49152)).toBeNull();
      expect(piece.blockIndexAt(-16384)).toBeNull();
    });

    it('should support custom block sizes', () => {
      const small = new PieceState(0, 10, HASH, 4);
      expect(small.blockCount).toBe(3);
      expect(small.blockLength(2)).toBe(2);
    });

    it('should reject a non-positive length', () => {
      expect(() => new PieceState(0, 0, HASH)).toThrow(RangeError);
    });

    it('should start Pending with every block Missing', () => {
      expect(piece.status).toBe(PieceStatus.Pending);
      expect(piece.getBlock(1)).toEqual({ status: BlockStatus.Missing });
      expect(() => piece.getBlock(3)).toThrow(RangeError);
    });
  });

  describe('requests', () => {
    it('should record the requesting peer and time', () => {
      piece.request(0, 'peer-a', 1000);
      expect(piece.getBlock(0)).toEqual({ status: BlockStatus.Requested, holders: new Map([['peer-a', 1000]]) });
      expect(piece.firstMissing()).toBe(1);
    });

    it('should add a second holder to a requested block', () => {
      piece.request(0, 'peer-a', 1000);
      piece.request(0, 'peer-b', 2000);
      const block = piece.getBlock(0);
      expect(block.status === BlockStatus.Requested && [...block.holders.keys()]).toEqual(['peer-a', 'peer-b']);
    });

    it('should return a block to Missing when its last holder releases it', () => {
      piece.request(0, 'peer-a', 1000);
      piece.request(0, 'peer-b', 1000);

      expect(piece.release(0, 'peer-a')).toBe(true);
      expect(piece.getBlock(0).status).toBe(BlockStatus.Requested);
      expect(piece.release(0, 'peer-b')).toBe(true);
      expect(piece.getBlock(0)).toEqual({ status: BlockStatus.Missing });
    });

    it('should report false when releasing a block the peer does not hold', () => {
      piece.request(0, 'peer-a', 1000);
      expect(piece.release(0, 'peer-b')).toBe(false);
      expect(piece.release(1, 'peer-a')).toBe(false);
    });

    it('should refuse to request a received block', () => {
      piece.receive(0, 'peer-a', Buffer.alloc(16384));
      expect(() => piece.request(0, 'peer-b', 1000)).toThrow('already received');
    });

    it('should pick duplicable blocks the peer does not already hold', () => {
      piece.request(0, 'peer-a', 1000);
      piece.request(1, 'peer-b', 1000);
      piece.request(1, 'peer-c', 1000);

      expect(piece.firstDuplicable('peer-a', 2)).toBeNull();
      expect(piece.firstDuplicable('peer-b', 2)).toBe(0);
      expect(piece.firstDuplicable('peer-d', 3)).toBe(0);
    });
  });

  describe('receiving', () => {
    it('should store data and report other holders', () => {
      piece.request(1, 'peer-a', 1000);
      piece.request(1, 'peer-b', 1000);

      expect(piece.receive(1, 'peer-b', Buffer.alloc(16384, 1))).toEqual(['peer-a']);
      expect(piece.getBlock(1)).toEqual({ status: BlockStatus.Received, from: 'peer-b' });
    });

    it('should accept data nobody requested', () => {
      expect(piece.receive(2, 'peer-a', Buffer.alloc(7232))).toEqual([]);
      expect(piece.getBlock(2).status).toBe(BlockStatus.Received);
    });

    it('should ignore a second copy of a block', () => {
      piece.receive(0, 'peer-a', Buffer.alloc(16384, 1));
      expect(piece.receive(0, 'peer-b', Buffer.alloc(16384, 2))).toEqual([]);
      expect(piece.contributors()).toEqual(['peer-a']);
    });

    it('should reject data of the wrong length', () => {
      expect(() => piece.receive(2, 'peer-a', Buffer.alloc(16384))).toThrow(
        'Block 2 of piece 3 has 16384 bytes, expected 7232'
      );
    });

    it('should assemble the piece once every block arrives', () => {
      piece.receive(2, 'peer-b', Buffer.alloc(7232, 3));
      piece.receive(0, 'peer-a', Buffer.alloc(16384, 1));
      expect(piece.isFullyReceived()).toBe(false);
      expect(() => piece.getData()).toThrow('Piece 3 is not fully received');

      piece.receive(1, 'peer-a', Buffer.alloc(16384, 2));
      expect(piece.isFullyReceived()).toBe(true);

      const data = piece.getData();
      expect(data).toHaveLength(40000);
      expect(data[0]).toBe(1);
      expect(data[16384]).toBe(2);
      expect(data[39999]).toBe(3);
      expect(piece.contributors().sort()).toEqual(['peer-a', 'peer-b']);
    });
  });

  describe('reset and completion', () => {
    it('should return every block to Missing on reset', () => {
      piece.receive(0, 'peer-a', Buffer.alloc(16384));
      piece.request(1, 'peer-b', 1000);
      piece.status = PieceStatus.Verifying;

      piece.reset();

      expect(piece.status).toBe(PieceStatus.Pending);
      expect(piece.firstMissing()).toBe(0);
      expect([0, 1, 2].map((i) => piece.getBlock(i).status)).toEqual([
        BlockStatus.Missing,
        BlockStatus.Missing,
        BlockStatus.Missing,
      ]);
      expect(piece.isFullyReceived()).toBe(false);
    });

    it('should release buffered data on completion', () => {
      piece.receive(0, 'peer-a', Buffer.alloc(16384));
      piece.receive(1, 'peer-a', Buffer.alloc(16384));
      piece.receive(2, 'peer-a', Buffer.alloc(7232));

      piece.complete();

      expect(piece.status).toBe(PieceStatus.Complete);
      expect(() => piece.getData()).toThrow();
    });
  });
});

// =============================================================================
// Bitfield Tests
// =============================================================================

describe('bitfield utilities', () => {
  it('should size bitfields in whole bytes', () => {
    expect(bitfieldLength(0)).toBe(0);
    expect(bitfieldLength(8)).toBe(1);
    expect(bitfieldLength(9)).toBe(2);
    expect(allocateBitfield(17)).toEqual(Buffer.alloc(3));
    expect(() => allocateBitfield(-1)).toThrow(RangeError);
  });

  it('should store piece 0 in the high bit of the first byte', () => {
    const bitfield = allocateBitfield(16);
    setBit(bitfield, 0);
    setBit(bitfield, 9);
    expect(bitfield).toEqual(Buffer.from([0x80, 0x40]));
    expect(hasBit(bitfield, 0)).toBe(true);
    expect(hasBit(bitfield, 1)).toBe(false);
    expect(hasBit(bitfield, 9)).toBe(true);
  });

  it('should treat out-of-range reads as unset and reject out-of-range writes', () => {
    const bitfield = allocateBitfield(8);
    expect(hasBit(bitfield, 8)).toBe(false);
    expect(hasBit(bitfield, -1)).toBe(false);
    expect(() => setBit(bitfield, 8)).toThrow(RangeError);
  });

  it('should count set bits', () => {
    expect(countBits(Buffer.from([0xff, 0x81, 0x00]))).toBe(10);
  });

  it('should detect spare bits past the piece count', () => {
    expect(hasSpareBits(Buffer.from([0xff, 0xc0]), 10)).toBe(false);
    expect(hasSpareBits(Buffer.from([0xff, 0xe0]), 10)).toBe(true);
    expect(hasSpareBits(Buffer.from([0xff]), 8)).toBe(false);
  });

  it('should expose a bitfield as a piece set', () => {
    const set = bitfieldSet(Buffer.from([0x20]));
    expect(set.has(2)).toBe(true);
    expect(set.has(3)).toBe(false);
  });
});
