/**
 * Peer Module
 *
 * Wire protocol codec, stream framing, the per-peer session state machine
 * and its driver.
 *
 * @module engine/peer
 */

export {
  HANDSHAKE_LENGTH,
  INFO_HASH_LENGTH,
  MESSAGE_LENGTH_PREFIX,
  MessageType,
  PEER_ID_LENGTH,
  PROTOCOL_STRING,
  decodeHandshake,
  encodeHandshake,
  encodeMessage,
  getMessageName,
  parseMessage,
} from './messages.js';
export type { HandshakeMessage, PeerMessage } from './messages.js';

export { DEFAULT_MAX_MESSAGE_LENGTH, WireReader } from './protocol.js';
export type { WireFrame } from './protocol.js';

export { SessionStatus, initialSessionState, isTerminal, requestKey, transition } from './machine.js';
export type {
  AbandonReason,
  AvailabilityUpdate,
  BlockRequest,
  InflightRequest,
  SessionAction,
  SessionContext,
  SessionEvent,
  SessionState,
} from './machine.js';

export { ConnectionState, PeerConnection } from './connection.js';
export type { PeerConnectionOptions, Transport, TransportEvents } from './connection.js';

export { PeerSession, peerKey } from './session.js';
export type { PeerSessionEvents, PeerSessionOptions } from './session.js';
