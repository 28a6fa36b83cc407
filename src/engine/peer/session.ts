/**
 * Peer Session
 *
 * Drives one peer's state machine: feeds it transport events, framed
 * messages, clock ticks and scheduling commands, and carries out the
 * actions it returns. The coordinator only ever interacts with a session
 * through its methods and events.
 *
 * @module engine/peer/session
 */

import { TypedEventEmitter } from '../events.js';
import { bitfieldSet } from '../piece/state.js';
import { ProtocolViolationError, type PeerAddress, type PieceSet, type PiecewiseError } from '../types.js';
import type { Transport } from './connection.js';
import {
  SessionStatus,
  initialSessionState,
  isTerminal,
  transition,
  type AbandonReason,
  type AvailabilityUpdate,
  type BlockRequest,
  type InflightRequest,
  type SessionAction,
  type SessionContext,
  type SessionEvent,
  type SessionState,
} from './machine.js';
import { encodeHandshake, encodeMessage } from './messages.js';
import { WireReader, type WireFrame } from './protocol.js';

// =============================================================================
// Types
// =============================================================================

export interface PeerSessionEvents {
  /** Handshake completed */
  ready: void;

  /** The peer lifted its choke */
  unchoked: void;

  /** The peer announced pieces */
  availability: AvailabilityUpdate;

  /** Block data arrived */
  block: { pieceIndex: number; begin: number; block: Buffer };

  /** A request will not be answered and its assignment must be released */
  requestAbandoned: { request: InflightRequest; reason: AbandonReason };

  /** The session reached Closed or Errored; emitted once */
  ended: { reason: string; error?: PiecewiseError };
}

export interface PeerSessionOptions extends SessionContext {
  address: PeerAddress;
  transport: Transport;
  localPeerId: Buffer;

  /** Largest accepted wire message */
  maxMessageLength?: number;

  /** Our verified pieces, sent once the handshake completes */
  getBitfield: () => Buffer;

  now?: () => number;
}

/**
 * Key identifying a peer address.
 */
export function peerKey(address: PeerAddress): string {
  return address.host.includes(':') ? `[${address.host}]:${address.port}` : `${address.host}:${address.port}`;
}

// =============================================================================
// PeerSession Class
// =============================================================================

/**
 * One connection to one peer.
 *
 * @example
 * ```typescript
 * const session = new PeerSession({ address, transport, infoHash, localPeerId, ... });
 * session.on('block', ({ pieceIndex, begin, block }) => { ... });
 * session.on('ended', ({ reason }) => console.log(`${session.key} ended: ${reason}`));
 * session.start();
 * ```
 */
export class PeerSession extends TypedEventEmitter<PeerSessionEvents> {
  readonly key: string;
  readonly address: PeerAddress;

  private readonly transport: Transport;
  private readonly context: SessionContext;
  private readonly localPeerId: Buffer;
  private readonly reader: WireReader;
  private readonly getBitfield: () => Buffer;
  private readonly now: () => number;

  private state: SessionState = initialSessionState();
  private started = false;
  private ended = false;

  constructor(options: PeerSessionOptions) {
    super();
    this.address = options.address;
    this.key = peerKey(options.address);
    this.transport = options.transport;
    this.localPeerId = options.localPeerId;
    this.reader = new WireReader(options.maxMessageLength);
    this.getBitfield = options.getBitfield;
    this.now = options.now ?? Date.now;
    this.context = {
      infoHash: options.infoHash,
      pieceCount: options.pieceCount,
      handshakeTimeoutMs: options.handshakeTimeoutMs,
      idleTimeoutMs: options.idleTimeoutMs,
      keepAliveIntervalMs: options.keepAliveIntervalMs,
      requestTimeoutMs: options.requestTimeoutMs,
    };
  }

  // ===========================================================================
  // Public Getters
  // ===========================================================================

  get status(): SessionStatus {
    return this.state.status;
  }

  get isEnded(): boolean {
    return isTerminal(this.state);
  }

  /** Handshake completed and the session has not ended */
  get isReady(): boolean {
    return this.state.status === SessionStatus.Ready;
  }

  /** Pieces the peer advertises (empty before the handshake) */
  get pieces(): PieceSet {
    return this.state.status === SessionStatus.Ready ? bitfieldSet(this.state.peer.bitfield) : new Set<number>();
  }

  get inflightCount(): number {
    return this.state.status === SessionStatus.Ready ? this.state.peer.inflight.size : 0;
  }

  /** Whether block requests may be sent now */
  get canRequest(): boolean {
    return this.state.status === SessionStatus.Ready && !this.state.peer.chokedByPeer && this.state.peer.amInterested;
  }

  // ===========================================================================
  // Public Methods
  // ===========================================================================

  /**
   * Open the transport and begin the handshake.
   */
  start(): void {
    if (this.started) {
      return;
    }
    this.started = true;

    this.transport.on('data', (chunk) => this.handleData(chunk));
    this.transport.on('error', (error) => this.dispatch({ type: 'transportError', error }));
    this.transport.on('close', () => this.dispatch({ type: 'transportClosed' }));

    this.transport.connect().then(
      () => this.dispatch({ type: 'connected', now: this.now() }),
      (error: unknown) => this.dispatch({ type: 'connectFailed', error: toError(error) })
    );
  }

  /**
   * Advance timers: handshake and idle timeouts, request expiry, keep-alives.
   */
  tick(): void {
    this.dispatch({ type: 'tick', now: this.now() });
  }

  /**
   * Request a block. If the session cannot send it, a `requestAbandoned`
   * event is emitted synchronously.
   */
  requestBlock(request: BlockRequest): void {
    this.dispatch({ type: 'request', request, now: this.now() });
  }

  /**
   * Withdraw an outstanding request.
   */
  cancelBlock(request: BlockRequest): void {
    this.dispatch({ type: 'cancel', request, now: this.now() });
  }

  setInterest(interested: boolean): void {
    this.dispatch({ type: 'setInterest', interested, now: this.now() });
  }

  /**
   * Tell the peer we now have a piece.
   */
  announce(pieceIndex: number): void {
    this.dispatch({ type: 'announce', pieceIndex, now: this.now() });
  }

  close(reason = 'closed locally'): void {
    this.dispatch({ type: 'close', reason });
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  private handleData(chunk: Buffer): void {
    if (this.isEnded) {
      return;
    }

    let frames: WireFrame[];
    try {
      frames = this.reader.push(chunk);
    } catch (err) {
      const error =
        err instanceof ProtocolViolationError ? err : new ProtocolViolationError(toError(err).message, this.key);
      this.dispatch({ type: 'protocolError', error });
      return;
    }

    for (const frame of frames) {
      if (frame.kind === 'handshake') {
        this.dispatch({ type: 'handshake', handshake: frame.handshake, ownBitfield: this.getBitfield(), now: this.now() });
      } else {
        this.dispatch({ type: 'message', message: frame.message, now: this.now() });
      }
    }
  }

  private dispatch(event: SessionEvent): void {
    if (isTerminal(this.state)) {
      if (event.type === 'request') {
        this.emit('requestAbandoned', { request: { ...event.request, requestedAt: event.now }, reason: 'unavailable' });
      }
      return;
    }

    const result = transition(this.state, event, this.context);
    this.state = result.state;

    for (const action of result.actions) {
      this.perform(action);
    }

    if (!this.ended && isTerminal(this.state)) {
      this.ended = true;
      const state = this.state;
      if (state.status === SessionStatus.Errored) {
        this.emit('ended', { reason: state.error.message, error: state.error });
      } else if (state.status === SessionStatus.Closed) {
        this.emit('ended', { reason: state.reason });
      }
    }
  }

  private perform(action: SessionAction): void {
    switch (action.type) {
      case 'sendHandshake':
        this.send(encodeHandshake(this.context.infoHash, this.localPeerId));
        break;
      case 'send':
        this.send(encodeMessage(action.message));
        break;
      case 'ready':
        this.emit('ready');
        break;
      case 'unchoked':
        this.emit('unchoked');
        break;
      case 'availability':
        this.emit('availability', action.update);
        break;
      case 'block':
        this.emit('block', { pieceIndex: action.pieceIndex, begin: action.begin, block: action.block });
        break;
      case 'requestAbandoned':
        this.emit('requestAbandoned', { request: action.request, reason: action.reason });
        break;
      case 'disconnect':
        this.transport.destroy();
        break;
    }
  }

  private send(data: Buffer): void {
    this.transport.write(data).catch((error: unknown) => {
      this.dispatch({ type: 'transportError', error: toError(error) });
    });
  }
}

function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
