/**
 * Peer session state machine.
 *
 * A session moves Connecting -> Handshaking -> Ready -> Closed, or to
 * Errored from any non-terminal state. `transition` is a pure function:
 * given the current state, an event and the fixed session context, it
 * returns the next state and the actions the driver must carry out
 * (send a message, report a block, drop the connection). Time only enters
 * through the `now` carried by events.
 *
 * @module engine/peer/machine
 */

import { bitfieldLength, hasSpareBits, setBit } from '../piece/state.js';
import { PiecewiseError, ProtocolViolationError, TimeoutError, TransportError } from '../types.js';
import { MessageType, type HandshakeMessage, type PeerMessage } from './messages.js';

// =============================================================================
// Types
// =============================================================================

export enum SessionStatus {
  Connecting = 'connecting',
  Handshaking = 'handshaking',
  Ready = 'ready',
  Closed = 'closed',
  Errored = 'errored',
}

export interface BlockRequest {
  pieceIndex: number;
  begin: number;
  length: number;
}

export interface InflightRequest extends BlockRequest {
  requestedAt: number;
}

/**
 * What a Ready session knows about its peer.
 */
export interface PeerView {
  remotePeerId: Buffer;

  /** Pieces the peer advertises */
  bitfield: Buffer;

  /** The peer refuses to serve our requests */
  chokedByPeer: boolean;

  /** We refuse to serve the peer's requests; never lifted, as we do not upload */
  peerChokedByUs: boolean;

  amInterested: boolean;
  peerInterested: boolean;

  /** Outstanding requests keyed `${pieceIndex}:${begin}` */
  inflight: ReadonlyMap<string, InflightRequest>;

  lastReceivedAt: number;
  lastSentAt: number;
}

export type SessionState =
  | { status: SessionStatus.Connecting }
  | { status: SessionStatus.Handshaking; startedAt: number }
  | { status: SessionStatus.Ready; peer: PeerView }
  | { status: SessionStatus.Closed; reason: string }
  | { status: SessionStatus.Errored; error: PiecewiseError };

/**
 * Fixed parameters of a session.
 */
export interface SessionContext {
  infoHash: Buffer;
  pieceCount: number;
  handshakeTimeoutMs: number;
  idleTimeoutMs: number;
  keepAliveIntervalMs: number;
  requestTimeoutMs: number;
}

export type AvailabilityUpdate = { kind: 'have'; pieceIndex: number } | { kind: 'bitfield'; bitfield: Buffer };

export type AbandonReason = 'timeout' | 'choked' | 'unavailable';

export type SessionEvent =
  | { type: 'connected'; now: number }
  | { type: 'connectFailed'; error: Error }
  | { type: 'handshake'; handshake: HandshakeMessage; ownBitfield: Buffer; now: number }
  | { type: 'message'; message: PeerMessage; now: number }
  | { type: 'tick'; now: number }
  | { type: 'request'; request: BlockRequest; now: number }
  | { type: 'cancel'; request: BlockRequest; now: number }
  | { type: 'setInterest'; interested: boolean; now: number }
  | { type: 'announce'; pieceIndex: number; now: number }
  | { type: 'protocolError'; error: ProtocolViolationError }
  | { type: 'transportError'; error: Error }
  | { type: 'transportClosed' }
  | { type: 'close'; reason: string };

export type SessionAction =
  | { type: 'sendHandshake' }
  | { type: 'send'; message: PeerMessage }
  | { type: 'ready' }
  | { type: 'unchoked' }
  | { type: 'availability'; update: AvailabilityUpdate }
  | { type: 'block'; pieceIndex: number; begin: number; block: Buffer }
  | { type: 'requestAbandoned'; request: InflightRequest; reason: AbandonReason }
  | { type: 'disconnect' };

export interface Transition {
  state: SessionState;
  actions: SessionAction[];
}

// =============================================================================
// Helpers
// =============================================================================

export function requestKey(pieceIndex: number, begin: number): string {
  return `${pieceIndex}:${begin}`;
}

export function initialSessionState(): SessionState {
  return { status: SessionStatus.Connecting };
}

export function isTerminal(state: SessionState): boolean {
  return state.status === SessionStatus.Closed || state.status === SessionStatus.Errored;
}

function stay(state: SessionState): Transition {
  return { state, actions: [] };
}

function errored(error: PiecewiseError): Transition {
  return { state: { status: SessionStatus.Errored, error }, actions: [{ type: 'disconnect' }] };
}

function closed(reason: string): Transition {
  return { state: { status: SessionStatus.Closed, reason }, actions: [{ type: 'disconnect' }] };
}

function toTransportError(error: Error): PiecewiseError {
  return error instanceof PiecewiseError ? error : new TransportError(error.message, { cause: error });
}

/**
 * Mutable working copy of a peer view for the duration of one transition.
 */
class ReadyStep {
  readonly peer: PeerView & { inflight: Map<string, InflightRequest> };
  readonly actions: SessionAction[] = [];

  constructor(peer: PeerView) {
    this.peer = { ...peer, inflight: new Map(peer.inflight) };
  }

  send(message: PeerMessage, now: number): void {
    this.actions.push({ type: 'send', message });
    this.peer.lastSentAt = now;
  }

  abandonAll(reason: AbandonReason): void {
    for (const request of this.peer.inflight.values()) {
      this.actions.push({ type: 'requestAbandoned', request, reason });
    }
    this.peer.inflight.clear();
  }

  done(): Transition {
    return { state: { status: SessionStatus.Ready, peer: this.peer }, actions: this.actions };
  }
}

// =============================================================================
// Transitions
// =============================================================================

function onHandshake(
  state: Extract<SessionState, { status: SessionStatus.Handshaking }>,
  event: Extract<SessionEvent, { type: 'handshake' }>,
  context: SessionContext
): Transition {
  if (!event.handshake.infoHash.equals(context.infoHash)) {
    return errored(new ProtocolViolationError('Handshake info hash does not match'));
  }

  const step = new ReadyStep({
    remotePeerId: event.handshake.peerId,
    bitfield: Buffer.alloc(bitfieldLength(context.pieceCount)),
    chokedByPeer: true,
    peerChokedByUs: true,
    amInterested: false,
    peerInterested: false,
    inflight: new Map(),
    lastReceivedAt: event.now,
    lastSentAt: state.startedAt,
  });
  step.actions.push({ type: 'ready' });
  if (event.ownBitfield.some((byte) => byte !== 0)) {
    step.send({ type: MessageType.Bitfield, bitfield: event.ownBitfield }, event.now);
  }
  return step.done();
}

function onMessage(peer: PeerView, message: PeerMessage, now: number, context: SessionContext): Transition {
  const step = new ReadyStep(peer);
  step.peer.lastReceivedAt = now;

  switch (message.type) {
    case 'keep-alive':
      break;

    case MessageType.Choke:
      step.peer.chokedByPeer = true;
      // A choking peer discards our pending requests
      step.abandonAll('choked');
      break;

    case MessageType.Unchoke:
      if (step.peer.chokedByPeer) {
        step.peer.chokedByPeer = false;
        step.actions.push({ type: 'unchoked' });
      }
      break;

    case MessageType.Interested:
      step.peer.peerInterested = true;
      break;

    case MessageType.NotInterested:
      step.peer.peerInterested = false;
      break;

    case MessageType.Have: {
      if (message.pieceIndex >= context.pieceCount) {
        return errored(new ProtocolViolationError(`Have for piece ${message.pieceIndex} out of range`));
      }
      const bitfield = Buffer.from(step.peer.bitfield);
      setBit(bitfield, message.pieceIndex);
      step.peer.bitfield = bitfield;
      step.actions.push({ type: 'availability', update: { kind: 'have', pieceIndex: message.pieceIndex } });
      break;
    }

    case MessageType.Bitfield: {
      const expected = bitfieldLength(context.pieceCount);
      if (message.bitfield.length !== expected) {
        return errored(
          new ProtocolViolationError(`Bitfield has ${message.bitfield.length} bytes, expected ${expected}`)
        );
      }
      if (hasSpareBits(message.bitfield, context.pieceCount)) {
        return errored(new ProtocolViolationError('Bitfield has spare bits set'));
      }
      step.peer.bitfield = Buffer.from(message.bitfield);
      step.actions.push({ type: 'availability', update: { kind: 'bitfield', bitfield: step.peer.bitfield } });
      break;
    }

    case MessageType.Request:
    case MessageType.Cancel:
      // The peer stays choked, so there is nothing to serve or withdraw
      break;

    case MessageType.Piece: {
      if (message.pieceIndex >= context.pieceCount) {
        return errored(new ProtocolViolationError(`Piece ${message.pieceIndex} out of range`));
      }
      step.peer.inflight.delete(requestKey(message.pieceIndex, message.begin));
      step.actions.push({
        type: 'block',
        pieceIndex: message.pieceIndex,
        begin: message.begin,
        block: message.block,
      });
      break;
    }
  }

  return step.done();
}

function onTick(peer: PeerView, now: number, context: SessionContext): Transition {
  if (now - peer.lastReceivedAt > context.idleTimeoutMs) {
    return closed('idle timeout');
  }

  const step = new ReadyStep(peer);
  for (const [key, request] of step.peer.inflight) {
    if (now - request.requestedAt > context.requestTimeoutMs) {
      step.peer.inflight.delete(key);
      step.actions.push({ type: 'requestAbandoned', request, reason: 'timeout' });
      step.send({ type: MessageType.Cancel, pieceIndex: request.pieceIndex, begin: request.begin, length: request.length }, now);
    }
  }

  if (now - step.peer.lastSentAt >= context.keepAliveIntervalMs) {
    step.send({ type: 'keep-alive' }, now);
  }

  return step.done();
}

function onRequest(peer: PeerView, request: BlockRequest, now: number): Transition {
  const step = new ReadyStep(peer);
  const key = requestKey(request.pieceIndex, request.begin);

  if (step.peer.chokedByPeer || step.peer.inflight.has(key)) {
    step.actions.push({ type: 'requestAbandoned', request: { ...request, requestedAt: now }, reason: 'unavailable' });
    return step.done();
  }

  step.peer.inflight.set(key, { ...request, requestedAt: now });
  step.send({ type: MessageType.Request, ...request }, now);
  return step.done();
}

function onCancel(peer: PeerView, request: BlockRequest, now: number): Transition {
  const step = new ReadyStep(peer);
  if (step.peer.inflight.delete(requestKey(request.pieceIndex, request.begin))) {
    step.send({ type: MessageType.Cancel, ...request }, now);
  }
  return step.done();
}

function onSetInterest(peer: PeerView, interested: boolean, now: number): Transition {
  const step = new ReadyStep(peer);
  if (step.peer.amInterested !== interested) {
    step.peer.amInterested = interested;
    step.send({ type: interested ? MessageType.Interested : MessageType.NotInterested }, now);
  }
  return step.done();
}

/**
 * Compute the next session state for an event.
 *
 * Events that make no sense in the current state (a request before the
 * session is Ready, anything after it has ended) leave the state unchanged,
 * except a request, which is handed back as abandoned.
 *
 * @example
 * ```typescript
 * let state = initialSessionState();
 * const { state: next, actions } = transition(state, { type: 'connected', now: 0 }, context);
 * // next.status === SessionStatus.Handshaking, actions: [{ type: 'sendHandshake' }]
 * ```
 */
export function transition(state: SessionState, event: SessionEvent, context: SessionContext): Transition {
  if (isTerminal(state)) {
    return stay(state);
  }

  switch (event.type) {
    case 'protocolError':
      return errored(event.error);
    case 'transportError':
      return errored(toTransportError(event.error));
    case 'transportClosed':
      return closed('connection closed by peer');
    case 'close':
      return closed(event.reason);
    default:
      break;
  }

  switch (state.status) {
    case SessionStatus.Connecting:
      if (event.type === 'connected') {
        return {
          state: { status: SessionStatus.Handshaking, startedAt: event.now },
          actions: [{ type: 'sendHandshake' }],
        };
      }
      if (event.type === 'connectFailed') {
        return errored(toTransportError(event.error));
      }
      break;

    case SessionStatus.Handshaking:
      if (event.type === 'handshake') {
        return onHandshake(state, event, context);
      }
      if (event.type === 'tick' && event.now - state.startedAt > context.handshakeTimeoutMs) {
        return errored(new TimeoutError(`No handshake within ${context.handshakeTimeoutMs}ms`));
      }
      if (event.type === 'message') {
        return errored(new ProtocolViolationError('Message received before handshake'));
      }
      break;

    case SessionStatus.Ready:
      switch (event.type) {
        case 'message':
          return onMessage(state.peer, event.message, event.now, context);
        case 'tick':
          return onTick(state.peer, event.now, context);
        case 'request':
          return onRequest(state.peer, event.request, event.now);
        case 'cancel':
          return onCancel(state.peer, event.request, event.now);
        case 'setInterest':
          return onSetInterest(state.peer, event.interested, event.now);
        case 'announce': {
          const step = new ReadyStep(state.peer);
          step.send({ type: MessageType.Have, pieceIndex: event.pieceIndex }, event.now);
          return step.done();
        }
        default:
          break;
      }
      break;
  }

  if (event.type === 'request') {
    return {
      state,
      actions: [{ type: 'requestAbandoned', request: { ...event.request, requestedAt: event.now }, reason: 'unavailable' }],
    };
  }
  return stay(state);
}
