import { describe, it, expect, beforeEach } from 'vitest';
import type { DownloadConfig } from '../../../src/engine/config/defaults.js';
import { StaticDiscovery } from '../../../src/engine/discovery/peers.js';
import { MemoryStorage } from '../../../src/engine/disk/storage.js';
import type { Transport } from '../../../src/engine/peer/connection.js';
import { peerKey } from '../../../src/engine/peer/session.js';
import {
  DownloadCoordinator,
  generatePeerId,
  type DownloadCoordinatorOptions,
} from '../../../src/engine/session/coordinator.js';
import type { TorrentDescriptor } from '../../../src/engine/torrent/parser.js';
import { DownloadStalledError, PiecewiseError, TransportError, type PeerAddress } from '../../../src/engine/types.js';
import { buildSingleFileTorrent, makePayload } from '../../fixtures/torrents.js';
import { FakeSeeder, FakeTransport } from '../../fixtures/transport.js';

// =============================================================================
// Test Helpers
// =============================================================================

const PEER_A: PeerAddress = { host: '10.0.0.1', port: 6881 };
const PEER_B: PeerAddress = { host: '10.0.0.2', port: 6881 };

/** Short intervals so that each test runs in milliseconds on real timers */
const FAST: Partial<DownloadConfig> = {
  tickIntervalMs: 5,
  stallTimeoutMs: 40,
  blockSize: 16,
};

let payload: Buffer;
let descriptor: TorrentDescriptor;
let storage: MemoryStorage;
let transports: Map<string, Transport>;

function createCoordinator(options: Partial<DownloadCoordinatorOptions> = {}): DownloadCoordinator {
  return new DownloadCoordinator({
    descriptor,
    storage,
    config: FAST,
    peerId: Buffer.alloc(20, 0x50),
    createTransport: (address) => {
      const transport = transports.get(peerKey(address));
      if (!transport) {
        throw new Error(`No transport for ${peerKey(address)}`);
      }
      return transport;
    },
    ...options,
  });
}

function seeder(address: PeerAddress, options: { pieces?: number[]; corrupt?: boolean; silent?: boolean } = {}): FakeSeeder {
  const transport = new FakeSeeder({ descriptor, payload, ...options });
  transports.set(peerKey(address), transport);
  return transport;
}

beforeEach(() => {
  // 100 bytes in 32-byte pieces: four pieces, the last one 4 bytes
  payload = makePayload(100, 3);
  descriptor = buildSingleFileTorrent({ payload, pieceLength: 32 }).descriptor;
  storage = new MemoryStorage(payload.length);
  transports = new Map();
});

// =============================================================================
// Tests
// =============================================================================

describe('generatePeerId', () => {
  it('should produce a 20-byte id with the client prefix', () => {
    const id = generatePeerId();
    expect(id).toHaveLength(20);
    expect(id.subarray(0, 8).toString('ascii')).toBe('-PW0100-');
  });
});

describe('DownloadCoordinator', () => {
  describe('construction', () => {
    it('should reject a peer id of the wrong length', () => {
      expect(() => createCoordinator({ peerId: Buffer.alloc(5) })).toThrow('Peer id must be 20 bytes, got 5');
    });

    it('should reject an invalid configuration', () => {
      expect(() => createCoordinator({ config: { pipelineDepth: 0 } })).toThrow(RangeError);
    });

    it('should ignore peer addresses it has already seen', () => {
      const coordinator = createCoordinator();
      coordinator.addPeers([PEER_A, PEER_B, { host: '10.0.0.1', port: 6881 }]);
      coordinator.addPeers([PEER_B]);
      expect(coordinator.queuedPeers).toBe(2);
    });
  });

  describe('run()', () => {
    it('should download every piece from a single seeder', async () => {
      const peer = seeder(PEER_A);
      const coordinator = createCoordinator({ discovery: new StaticDiscovery([PEER_A]) });
      const completed: number[] = [];
      const connected: string[] = [];
      coordinator.on('pieceComplete', ({ pieceIndex }) => completed.push(pieceIndex));
      coordinator.on('peerConnected', ({ peer: key }) => connected.push(key));

      const result = await coordinator.run();

      expect(result).toEqual({ status: 'complete', progress: 1 });
      expect(storage.contents()).toEqual(payload);
      expect(storage.writes).toBe(4);
      expect([...completed].sort()).toEqual([0, 1, 2, 3]);
      expect(connected).toEqual(['10.0.0.1:6881']);
      // Seven blocks: three 32-byte pieces in two blocks, one 4-byte piece
      expect(peer.requests).toHaveLength(7);
      expect(peer.destroyed).toBe(true);
      expect(coordinator.activeSessions).toBe(0);
    });

    it('should combine pieces from peers with partial copies', async () => {
      const first = seeder(PEER_A, { pieces: [0, 1] });
      const second = seeder(PEER_B, { pieces: [2, 3] });
      const coordinator = createCoordinator();
      coordinator.addPeers([PEER_A, PEER_B]);

      const result = await coordinator.run();

      expect(result.status).toBe('complete');
      expect(storage.contents()).toEqual(payload);
      expect(first.requests.every((request) => request.pieceIndex <= 1)).toBe(true);
      expect(second.requests.every((request) => request.pieceIndex >= 2)).toBe(true);
    });

    it('should reject a second run', async () => {
      seeder(PEER_A);
      const coordinator = createCoordinator();
      coordinator.addPeers([PEER_A]);

      const running = coordinator.run();
      await expect(coordinator.run()).rejects.toThrow(new PiecewiseError('Download has already been started'));
      await running;
    });
  });

  describe('request scheduling', () => {
    it('should reassign blocks whose only holder never answers', async () => {
      // A deep pipeline lets the silent peer take every block before the other connects
      const config: Partial<DownloadConfig> = { ...FAST, pipelineDepth: 7, requestTimeoutMs: 20 };
      const silent = seeder(PEER_A, { silent: true });
      const honest = seeder(PEER_B);
      const coordinator = createCoordinator({ config });
      coordinator.addPeers([PEER_A]);
      coordinator.on('peerConnected', ({ peer }) => {
        if (peer === peerKey(PEER_A)) {
          coordinator.addPeers([PEER_B]);
        }
      });

      const result = await coordinator.run();

      expect(result).toEqual({ status: 'complete', progress: 1 });
      expect(storage.contents()).toEqual(payload);
      expect(silent.requests.length).toBeGreaterThanOrEqual(7);
      // Every timed-out request is cancelled on the wire
      expect(silent.cancels).toBeGreaterThanOrEqual(7);
      const served = new Set(honest.requests.map((request) => `${request.pieceIndex}:${request.begin}`));
      expect(served.size).toBe(7);
    });

    it('should keep at most pipelineDepth requests in flight per peer', async () => {
      const config: Partial<DownloadConfig> = { ...FAST, pipelineDepth: 3 };
      const silent = seeder(PEER_A, { silent: true });
      const coordinator = createCoordinator({ config });
      coordinator.addPeers([PEER_A]);
      const controller = new AbortController();
      coordinator.on('peerConnected', () => {
        // Several ticks pass before the abort
        setTimeout(() => controller.abort(), 30);
      });

      const result = await coordinator.run(controller.signal);

      expect(result).toEqual({ status: 'cancelled', progress: 0 });
      expect(silent.requests).toHaveLength(3);
      expect(silent.cancels).toBe(0);
    });
  });

  describe('connection limits', () => {
    it('should open at most maxConnections sessions and queue the rest', async () => {
      const config: Partial<DownloadConfig> = { ...FAST, maxConnections: 2 };
      const PEER_C: PeerAddress = { host: '10.0.0.3', port: 6881 };
      const PEER_D: PeerAddress = { host: '10.0.0.4', port: 6881 };
      const peers = [PEER_A, PEER_B, PEER_C, PEER_D].map((address) => seeder(address));
      const coordinator = createCoordinator({ config });
      coordinator.addPeers([PEER_A, PEER_B, PEER_C, PEER_D]);

      const observed: { active: number; queued: number }[] = [];
      coordinator.on('peerConnected', () => {
        observed.push({ active: coordinator.activeSessions, queued: coordinator.queuedPeers });
      });

      const result = await coordinator.run();

      expect(result.status).toBe('complete');
      expect(observed[0]).toEqual({ active: 2, queued: 2 });
      expect(observed.every(({ active }) => active <= 2)).toBe(true);
      // The first two finish the download, so the queued pair is never dialled
      expect(peers.map((peer) => peer.connected)).toEqual([true, true, false, false]);
    });
  });

  describe('cancellation', () => {
    it('should finish cancelled when the signal aborts', async () => {
      const peer = seeder(PEER_A, { silent: true });
      const coordinator = createCoordinator();
      coordinator.addPeers([PEER_A]);
      const controller = new AbortController();
      const disconnected: string[] = [];
      coordinator.on('peerConnected', () => controller.abort());
      coordinator.on('peerDisconnected', ({ reason }) => disconnected.push(reason));

      const result = await coordinator.run(controller.signal);

      expect(result).toEqual({ status: 'cancelled', progress: 0 });
      expect(disconnected).toEqual(['download cancelled']);
      expect(peer.destroyed).toBe(true);
    });

    it('should not connect when the signal has already aborted', async () => {
      seeder(PEER_A);
      const coordinator = createCoordinator();
      coordinator.addPeers([PEER_A]);
      const controller = new AbortController();
      controller.abort();

      const result = await coordinator.run(controller.signal);

      expect(result).toEqual({ status: 'cancelled', progress: 0 });
      expect(coordinator.activeSessions).toBe(0);
      expect(coordinator.queuedPeers).toBe(0);
    });
  });

  describe('stalls', () => {
    it('should fail when there are no peers at all', async () => {
      const coordinator = createCoordinator();
      const run = coordinator.run();

      await expect(run).rejects.toBeInstanceOf(DownloadStalledError);
      await expect(run).rejects.toThrow('Download stalled: no peer can supply the remaining 4 piece(s)');
    });

    it('should fail when no connected peer has the missing pieces', async () => {
      seeder(PEER_A, { pieces: [0, 1] });
      const coordinator = createCoordinator();
      coordinator.addPeers([PEER_A]);
      const completed: number[] = [];
      coordinator.on('pieceComplete', ({ pieceIndex }) => completed.push(pieceIndex));

      const error = await coordinator.run().catch((err: unknown) => err);

      expect(error).toBeInstanceOf(DownloadStalledError);
      expect(error).toHaveProperty('missingPieces', 2);
      expect([...completed].sort()).toEqual([0, 1]);
      expect(coordinator.progress()).toBe(0.64);
    });

    it('should fail after every peer refuses the connection', async () => {
      transports.set(peerKey(PEER_A), new FakeTransport(new TransportError('Connection failed: connect ECONNREFUSED')));
      const coordinator = createCoordinator();
      coordinator.addPeers([PEER_A]);
      const disconnected: string[] = [];
      coordinator.on('peerDisconnected', ({ reason }) => disconnected.push(reason));

      await expect(coordinator.run()).rejects.toBeInstanceOf(DownloadStalledError);
      expect(disconnected).toEqual(['Connection failed: connect ECONNREFUSED']);
    });
  });

  describe('corrupt peers', () => {
    it('should ban a peer that serves corrupt data and finish from another', async () => {
      // One block per piece, so every piece has a single contributor
      const config: Partial<DownloadConfig> = { ...FAST, blockSize: 32, maxHashFailuresPerPeer: 1 };
      seeder(PEER_A, { corrupt: true });
      const honest = seeder(PEER_B);
      const coordinator = createCoordinator({ config });
      coordinator.addPeers([PEER_A]);

      const banned: string[] = [];
      const mismatches: number[] = [];
      coordinator.on('hashMismatch', ({ pieceIndex }) => mismatches.push(pieceIndex));
      coordinator.on('peerBanned', ({ peer }) => {
        banned.push(peer);
        coordinator.addPeers([PEER_B]);
      });

      const result = await coordinator.run();

      expect(result.status).toBe('complete');
      expect(storage.contents()).toEqual(payload);
      expect(banned).toEqual(['10.0.0.1:6881']);
      expect(coordinator.isBanned('10.0.0.1:6881')).toBe(true);
      expect(coordinator.isBanned('10.0.0.2:6881')).toBe(false);
      expect(mismatches.length).toBeGreaterThan(0);
      expect(honest.requests.length).toBeGreaterThan(0);
    });
  });
});
