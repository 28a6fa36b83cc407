/**
 * Download Coordinator
 *
 * Runs one download: keeps a bounded pool of peer sessions open, feeds each
 * ready session block assignments from the piece manager up to the
 * pipelining depth, and routes session events (blocks, abandoned requests,
 * teardown) back into the piece table. Finishes when every piece is
 * verified, when the caller cancels, or when no peer can supply the rest.
 *
 * @module engine/session/coordinator
 */

import { randomBytes } from 'crypto';
import { mergeWithDefaults, type DownloadConfig } from '../config/defaults.js';
import { TypedEventEmitter } from '../events.js';
import { silentLogger, type Logger } from '../logging/logger.js';
import { PeerConnection, type Transport } from '../peer/connection.js';
import { PeerSession, peerKey } from '../peer/session.js';
import { PieceManager } from '../piece/manager.js';
import type { TorrentDescriptor } from '../torrent/parser.js';
import {
  DownloadStalledError,
  PiecewiseError,
  type PeerAddress,
  type PeerDiscovery,
  type Storage,
} from '../types.js';

// =============================================================================
// Types
// =============================================================================

export interface DownloadCoordinatorOptions {
  descriptor: TorrentDescriptor;
  storage: Storage;

  /** Polled for peer addresses when the download starts and periodically after */
  discovery?: PeerDiscovery;

  config?: Partial<DownloadConfig>;
  logger?: Logger;

  /** Our 20-byte peer id (generated if omitted) */
  peerId?: Buffer;

  /** Creates the byte stream for a peer (default: a TCP connection) */
  createTransport?: (address: PeerAddress, config: DownloadConfig) => Transport;

  now?: () => number;
}

export interface DownloadResult {
  status: 'complete' | 'cancelled';

  /** Verified fraction of the payload, between 0 and 1 */
  progress: number;
}

export interface DownloadCoordinatorEvents {
  /** A session completed its handshake */
  peerConnected: { peer: string };

  /** A session ended */
  peerDisconnected: { peer: string; reason: string };

  /** A peer contributed to too many corrupt pieces */
  peerBanned: { peer: string; failures: number };

  /** A piece was verified and handed to storage */
  pieceComplete: { pieceIndex: number; progress: number };

  /** A piece failed verification and will be downloaded again */
  hashMismatch: { pieceIndex: number; contributors: string[] };

  endgameStarted: { remainingPieces: number };
}

type Outcome = { status: DownloadResult['status'] } | { error: PiecewiseError };

const PEER_ID_PREFIX = '-PW0100-';

/**
 * Generate a peer id: client prefix followed by 12 random bytes.
 */
export function generatePeerId(): Buffer {
  return Buffer.concat([Buffer.from(PEER_ID_PREFIX, 'ascii'), randomBytes(12)]);
}

function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

// =============================================================================
// DownloadCoordinator Class
// =============================================================================

/**
 * Downloads one torrent from a set of peers.
 *
 * @example
 * ```typescript
 * const coordinator = new DownloadCoordinator({
 *   descriptor,
 *   storage: new FileStorage({ descriptor, downloadPath: './downloads' }),
 *   discovery: new StaticDiscovery([{ host: '10.0.0.2', port: 6881 }]),
 * });
 *
 * coordinator.on('pieceComplete', ({ progress }) => render(progress));
 * const result = await coordinator.run(controller.signal);
 * ```
 */
export class DownloadCoordinator extends TypedEventEmitter<DownloadCoordinatorEvents> {
  readonly config: DownloadConfig;
  readonly peerId: Buffer;

  private readonly descriptor: TorrentDescriptor;
  private readonly pieces: PieceManager;
  private readonly discovery: PeerDiscovery | null;
  private readonly logger: Logger;
  private readonly createTransport: (address: PeerAddress, config: DownloadConfig) => Transport;
  private readonly now: () => number;

  private readonly sessions = new Map<string, PeerSession>();

  /** Addresses waiting for a free connection slot */
  private readonly queue: PeerAddress[] = [];

  /** Every address ever queued; ended peers are not dialled again */
  private readonly known = new Set<string>();

  private readonly hashFailures = new Map<string, number>();
  private readonly banned = new Set<string>();

  /** Sessions whose requests expired during the current tick */
  private readonly slowThisTick = new Set<string>();

  private timer: ReturnType<typeof setInterval> | null = null;
  private signal: AbortSignal | null = null;
  private settle: { resolve: (result: DownloadResult) => void; reject: (error: Error) => void } | null = null;
  private started = false;
  private finished = false;
  private discovering = false;
  private lastDiscoveryAt = 0;
  private stalledSince: number | null = null;

  constructor(options: DownloadCoordinatorOptions) {
    super();
    this.config = mergeWithDefaults(options.config);
    this.descriptor = options.descriptor;
    this.discovery = options.discovery ?? null;
    this.logger = options.logger ?? silentLogger;
    this.peerId = options.peerId ?? generatePeerId();
    this.now = options.now ?? Date.now;
    this.createTransport =
      options.createTransport ??
      ((address, config) =>
        new PeerConnection({ host: address.host, port: address.port, connectTimeout: config.connectTimeoutMs }));

    if (this.peerId.length !== 20) {
      throw new RangeError(`Peer id must be 20 bytes, got ${this.peerId.length}`);
    }

    this.pieces = new PieceManager({
      descriptor: this.descriptor,
      storage: options.storage,
      blockSize: this.config.blockSize,
      endgameThreshold: this.config.endgameThreshold,
      now: this.now,
    });
    this.setupPieceHandlers();
  }

  // ===========================================================================
  // Public Getters
  // ===========================================================================

  /** Number of open sessions, including those still connecting */
  get activeSessions(): number {
    return this.sessions.size;
  }

  /** Addresses waiting for a connection slot */
  get queuedPeers(): number {
    return this.queue.length;
  }

  progress(): number {
    return this.pieces.progress();
  }

  isBanned(peer: string): boolean {
    return this.banned.has(peer);
  }

  // ===========================================================================
  // Public Methods
  // ===========================================================================

  /**
   * Queue peer addresses. Addresses already seen are ignored.
   */
  addPeers(addresses: Iterable<PeerAddress>): void {
    for (const address of addresses) {
      const key = peerKey(address);
      if (this.known.has(key)) {
        continue;
      }
      this.known.add(key);
      this.queue.push(address);
    }

    if (this.started && !this.finished) {
      this.openConnections();
    }
  }

  /**
   * Run the download to completion.
   *
   * Resolves with status 'complete' once every piece is verified and
   * stored, or 'cancelled' if `signal` aborts first. Either way every
   * session is closed and pending storage writes are awaited.
   *
   * @throws {DownloadStalledError} If no peer can supply the remaining pieces
   *   for `stallTimeoutMs`
   * @throws {StorageError} If storage rejects a verified piece
   */
  run(signal?: AbortSignal): Promise<DownloadResult> {
    if (this.started) {
      return Promise.reject(new PiecewiseError('Download has already been started'));
    }
    this.started = true;

    return new Promise<DownloadResult>((resolve, reject) => {
      this.settle = { resolve, reject };

      if (signal) {
        if (signal.aborted) {
          this.finish({ status: 'cancelled' });
          return;
        }
        this.signal = signal;
        signal.addEventListener('abort', this.handleAbort);
      }

      this.logger.info(
        `Starting download of ${this.descriptor.name} (${this.pieces.pieceCount} pieces, ${this.descriptor.totalLength} bytes)`
      );

      this.timer = setInterval(() => this.tick(), this.config.tickIntervalMs);
      this.pollDiscovery();
      this.openConnections();
    });
  }

  // ===========================================================================
  // Private Methods - Lifecycle
  // ===========================================================================

  private readonly handleAbort = (): void => {
    this.logger.info('Download cancelled');
    this.finish({ status: 'cancelled' });
  };

  private finish(outcome: Outcome): void {
    if (this.finished) {
      return;
    }
    this.finished = true;

    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.signal?.removeEventListener('abort', this.handleAbort);
    this.signal = null;

    const reason = 'error' in outcome ? 'download failed' : `download ${outcome.status}`;
    for (const session of [...this.sessions.values()]) {
      session.close(reason);
    }
    this.queue.length = 0;

    const settle = this.settle;
    this.settle = null;
    if (!settle) {
      return;
    }

    if ('error' in outcome) {
      this.logger.error(outcome.error.message);
      const fail = (): void => settle.reject(outcome.error);
      this.pieces.flush().then(fail, fail);
      return;
    }

    this.pieces.flush().then(
      () => settle.resolve({ status: outcome.status, progress: this.pieces.progress() }),
      (error: unknown) => settle.reject(toError(error))
    );
  }

  private tick(): void {
    if (this.finished) {
      return;
    }
    const now = this.now();

    this.slowThisTick.clear();
    for (const session of [...this.sessions.values()]) {
      session.tick();
    }

    if (now - this.lastDiscoveryAt >= this.config.discoveryIntervalMs) {
      this.pollDiscovery();
    }
    this.openConnections();

    for (const session of this.sessions.values()) {
      if (!this.slowThisTick.has(session.key)) {
        this.fill(session);
      }
    }

    this.checkStall(now);
  }

  /**
   * Fail the download once, for `stallTimeoutMs`, nothing could make
   * progress: no discovery in flight, no queued address, no session still
   * connecting and no ready session advertising a missing piece.
   */
  private checkStall(now: number): void {
    if (this.canProgress()) {
      this.stalledSince = null;
      return;
    }

    if (this.stalledSince === null) {
      this.stalledSince = now;
      this.logger.debug('No peer can supply the remaining pieces');
    } else if (now - this.stalledSince >= this.config.stallTimeoutMs) {
      this.finish({ error: new DownloadStalledError(this.pieces.missingPieces().length) });
    }
  }

  private canProgress(): boolean {
    if (this.discovering || this.queue.length > 0) {
      return true;
    }
    for (const session of this.sessions.values()) {
      if (!session.isReady || this.pieces.canSupply(session.pieces)) {
        return true;
      }
    }
    return false;
  }

  // ===========================================================================
  // Private Methods - Peers
  // ===========================================================================

  private pollDiscovery(): void {
    const discovery = this.discovery;
    if (!discovery || this.discovering) {
      return;
    }
    this.discovering = true;
    this.lastDiscoveryAt = this.now();

    discovery.discover().then(
      (addresses) => {
        this.discovering = false;
        if (!this.finished) {
          this.addPeers(addresses);
        }
      },
      (error: unknown) => {
        this.discovering = false;
        this.logger.warn(`Peer discovery failed: ${toError(error).message}`);
      }
    );
  }

  private openConnections(): void {
    while (this.sessions.size < this.config.maxConnections) {
      const address = this.queue.shift();
      if (address === undefined) {
        break;
      }
      this.openSession(address);
    }
  }

  private openSession(address: PeerAddress): void {
    const session = new PeerSession({
      address,
      transport: this.createTransport(address, this.config),
      infoHash: this.descriptor.infoHash,
      localPeerId: this.peerId,
      pieceCount: this.pieces.pieceCount,
      handshakeTimeoutMs: this.config.handshakeTimeoutMs,
      idleTimeoutMs: this.config.idleTimeoutMs,
      keepAliveIntervalMs: this.config.keepAliveIntervalMs,
      requestTimeoutMs: this.config.requestTimeoutMs,
      maxMessageLength: this.config.maxMessageLength,
      getBitfield: () => this.pieces.getBitfield(),
      now: this.now,
    });

    this.sessions.set(session.key, session);
    this.setupSessionHandlers(session);
    this.logger.debug(`Connecting to ${session.key}`);
    session.start();
  }

  private setupSessionHandlers(session: PeerSession): void {
    const peer = session.key;

    session.on('ready', () => {
      this.logger.debug(`Handshake complete with ${peer}`);
      this.emit('peerConnected', { peer });
    });

    session.on('availability', (update) => {
      if (update.kind === 'bitfield') {
        this.pieces.availability.addPeer(peer, update.bitfield);
      } else {
        this.pieces.availability.updatePeerHave(peer, update.pieceIndex);
      }
      session.setInterest(this.pieces.canSupply(session.pieces));
      this.fill(session);
    });

    session.on('unchoked', () => {
      this.fill(session);
    });

    session.on('block', ({ pieceIndex, begin, block }) => {
      const receipt = this.pieces.reportBlockReceived(peer, pieceIndex, begin, block);
      if (receipt.status === 'rejected') {
        this.logger.warn(`Closing ${peer}: ${receipt.reason}`);
        session.close(`protocol violation: ${receipt.reason}`);
        return;
      }
      if (receipt.status === 'accepted') {
        for (const cancel of receipt.cancels) {
          this.sessions.get(cancel.peer)?.cancelBlock(cancel);
        }
      }
      this.fill(session);
    });

    session.on('requestAbandoned', ({ request, reason }) => {
      this.pieces.reportRequestTimedOut(peer, request.pieceIndex, request.begin);
      if (reason === 'timeout') {
        this.logger.debug(`Request ${request.pieceIndex}:${request.begin} to ${peer} timed out`);
        this.slowThisTick.add(peer);
      }
    });

    session.on('ended', ({ reason }) => {
      const released = this.pieces.releaseAllFor(peer);
      this.pieces.availability.removePeer(peer);
      this.sessions.delete(peer);

      this.logger.debug(`Session ${peer} ended: ${reason}${released > 0 ? ` (${released} requests released)` : ''}`);
      this.emit('peerDisconnected', { peer, reason });

      if (!this.finished) {
        this.openConnections();
        if (released > 0) {
          this.fillAll();
        }
      }
    });
  }

  /**
   * Top up a session's request pipeline.
   */
  private fill(session: PeerSession): void {
    if (this.finished || !session.canRequest) {
      return;
    }

    const peerPieces = session.pieces;
    // Bounded by attempts so that a synchronously abandoned request cannot loop
    for (let attempt = session.inflightCount; attempt < this.config.pipelineDepth; attempt++) {
      if (!session.canRequest || session.inflightCount >= this.config.pipelineDepth) {
        break;
      }
      const assignment = this.pieces.nextBlockToRequest(session.key, peerPieces);
      if (!assignment) {
        break;
      }
      session.requestBlock({ pieceIndex: assignment.pieceIndex, begin: assignment.begin, length: assignment.length });
    }
  }

  private fillAll(): void {
    for (const session of [...this.sessions.values()]) {
      this.fill(session);
    }
  }

  // ===========================================================================
  // Private Methods - Piece Events
  // ===========================================================================

  private setupPieceHandlers(): void {
    this.pieces.on('pieceComplete', ({ pieceIndex }) => {
      const progress = this.pieces.progress();
      this.logger.debug(`Piece ${pieceIndex} verified (${(progress * 100).toFixed(1)}%)`);
      this.emit('pieceComplete', { pieceIndex, progress });

      for (const session of [...this.sessions.values()]) {
        session.announce(pieceIndex);
        if (!this.pieces.canSupply(session.pieces)) {
          session.setInterest(false);
        }
      }
    });

    this.pieces.on('hashMismatch', ({ error, contributors }) => {
      this.logger.warn(error.message);
      this.emit('hashMismatch', { pieceIndex: error.pieceIndex, contributors });

      for (const peer of contributors) {
        const failures = (this.hashFailures.get(peer) ?? 0) + 1;
        this.hashFailures.set(peer, failures);
        if (failures >= this.config.maxHashFailuresPerPeer && !this.banned.has(peer)) {
          this.banned.add(peer);
          this.logger.warn(`Banning ${peer} after ${failures} corrupt pieces`);
          this.emit('peerBanned', { peer, failures });
          this.sessions.get(peer)?.close('banned');
        }
      }
      this.fillAll();
    });

    this.pieces.on('endgameStarted', ({ remainingPieces }) => {
      this.logger.debug(`Entering endgame with ${remainingPieces} pieces left`);
      this.emit('endgameStarted', { remainingPieces });
      this.fillAll();
    });

    this.pieces.on('downloadComplete', () => {
      this.logger.info(`Download of ${this.descriptor.name} complete`);
      this.finish({ status: 'complete' });
    });

    this.pieces.on('fatal', (error) => {
      this.finish({ error });
    });
  }
}
