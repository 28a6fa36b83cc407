/**
 * Peer Wire Protocol Messages
 *
 * Serialization of the BEP-3 handshake and message stream. All multi-byte
 * integers are big-endian.
 *
 * Protocol overview:
 * - Handshake: 68 bytes (pstrlen + pstr + reserved + info_hash + peer_id)
 * - Messages: 4-byte length prefix + message id + payload
 * - Keep-alive: length = 0 (no message id or payload)
 *
 * @module engine/peer/messages
 */

import { ProtocolViolationError } from '../types.js';

// =============================================================================
// Constants
// =============================================================================

export const PROTOCOL_STRING = 'BitTorrent protocol';

export const PROTOCOL_STRING_LENGTH = 19;

/**
 * 1 (pstrlen) + 19 (pstr) + 8 (reserved) + 20 (info_hash) + 20 (peer_id)
 */
export const HANDSHAKE_LENGTH = 68;

export const RESERVED_LENGTH = 8;

export const INFO_HASH_LENGTH = 20;

export const PEER_ID_LENGTH = 20;

/** Length of the message length prefix */
export const MESSAGE_LENGTH_PREFIX = 4;

// =============================================================================
// Message Types
// =============================================================================

/**
 * Message ids. Keep-alive messages have no id (length = 0).
 */
export enum MessageType {
  Choke = 0,
  Unchoke = 1,
  Interested = 2,
  NotInterested = 3,
  Have = 4,
  Bitfield = 5,
  Request = 6,
  Piece = 7,
  Cancel = 8,
}

export interface HandshakeMessage {
  /** Reserved bytes for protocol extensions (8 bytes) */
  reserved: Buffer;

  /** SHA-1 hash of the torrent info dictionary (20 bytes) */
  infoHash: Buffer;

  peerId: Buffer;
}

export interface KeepAliveMessage {
  type: 'keep-alive';
}

export interface ChokeMessage {
  type: MessageType.Choke;
}

export interface UnchokeMessage {
  type: MessageType.Unchoke;
}

export interface InterestedMessage {
  type: MessageType.Interested;
}

export interface NotInterestedMessage {
  type: MessageType.NotInterested;
}

export interface HaveMessage {
  type: MessageType.Have;
  pieceIndex: number;
}

/**
 * High bit of the first byte is piece 0.
 */
export interface BitfieldMessage {
  type: MessageType.Bitfield;
  bitfield: Buffer;
}

export interface RequestMessage {
  type: MessageType.Request;
  pieceIndex: number;

  /** Byte offset within the piece */
  begin: number;
  length: number;
}

export interface PieceMessage {
  type: MessageType.Piece;
  pieceIndex: number;
  begin: number;
  block: Buffer;
}

export interface CancelMessage {
  type: MessageType.Cancel;
  pieceIndex: number;
  begin: number;
  length: number;
}

/**
 * Union type of all peer wire protocol messages (excluding handshake)
 */
export type PeerMessage =
  | KeepAliveMessage
  | ChokeMessage
  | UnchokeMessage
  | InterestedMessage
  | NotInterestedMessage
  | HaveMessage
  | BitfieldMessage
  | RequestMessage
  | PieceMessage
  | CancelMessage;

// =============================================================================
// Handshake
// =============================================================================

/**
 * Encode a handshake.
 *
 * @throws {RangeError} If a field has the wrong length
 *
 * @example
 * ```typescript
 * const handshake = encodeHandshake(descriptor.infoHash, localPeerId);
 * await connection.write(handshake);
 * ```
 */
export function encodeHandshake(infoHash: Buffer, peerId: Buffer, reserved?: Buffer): Buffer {
  if (infoHash.length !== INFO_HASH_LENGTH) {
    throw new RangeError(`Invalid infoHash length: expected ${INFO_HASH_LENGTH}, got ${infoHash.length}`);
  }
  if (peerId.length !== PEER_ID_LENGTH) {
    throw new RangeError(`Invalid peerId length: expected ${PEER_ID_LENGTH}, got ${peerId.length}`);
  }
  if (reserved !== undefined && reserved.length !== RESERVED_LENGTH) {
    throw new RangeError(`Invalid reserved length: expected ${RESERVED_LENGTH}, got ${reserved.length}`);
  }

  const buffer = Buffer.alloc(HANDSHAKE_LENGTH);
  let offset = buffer.writeUInt8(PROTOCOL_STRING_LENGTH, 0);
  offset += buffer.write(PROTOCOL_STRING, offset, 'ascii');
  reserved?.copy(buffer, offset);
  offset += RESERVED_LENGTH;
  offset += infoHash.copy(buffer, offset);
  peerId.copy(buffer, offset);
  return buffer;
}

/**
 * Decode a 68-byte handshake.
 *
 * @throws {ProtocolViolationError} If the length or protocol identifier is wrong
 */
export function decodeHandshake(data: Buffer): HandshakeMessage {
  if (data.length !== HANDSHAKE_LENGTH) {
    throw new ProtocolViolationError(`Invalid handshake length: expected ${HANDSHAKE_LENGTH}, got ${data.length}`);
  }

  const pstrlen = data.readUInt8(0);
  if (pstrlen !== PROTOCOL_STRING_LENGTH) {
    throw new ProtocolViolationError(`Invalid protocol string length: ${pstrlen}`);
  }

  let offset = 1;
  const protocolString = data.toString('latin1', offset, offset + pstrlen);
  if (protocolString !== PROTOCOL_STRING) {
    throw new ProtocolViolationError(`Invalid protocol string: "${protocolString}"`);
  }
  offset += pstrlen;

  const reserved = Buffer.from(data.subarray(offset, offset + RESERVED_LENGTH));
  offset += RESERVED_LENGTH;
  const infoHash = Buffer.from(data.subarray(offset, offset + INFO_HASH_LENGTH));
  offset += INFO_HASH_LENGTH;
  const peerId = Buffer.from(data.subarray(offset, offset + PEER_ID_LENGTH));

  return { reserved, infoHash, peerId };
}

// =============================================================================
// Message Encoding
// =============================================================================

function frame(type: MessageType, payloadLength: number): { buffer: Buffer; offset: number } {
  const buffer = Buffer.alloc(MESSAGE_LENGTH_PREFIX + 1 + payloadLength);
  buffer.writeUInt32BE(1 + payloadLength, 0);
  buffer.writeUInt8(type, MESSAGE_LENGTH_PREFIX);
  return { buffer, offset: MESSAGE_LENGTH_PREFIX + 1 };
}

function encodeBlockRef(type: MessageType, pieceIndex: number, begin: number, length: number): Buffer {
  const { buffer, offset } = frame(type, 12);
  buffer.writeUInt32BE(pieceIndex, offset);
  buffer.writeUInt32BE(begin, offset + 4);
  buffer.writeUInt32BE(length, offset + 8);
  return buffer;
}

/**
 * Encode a message including its length prefix.
 *
 * @example
 * ```typescript
 * encodeMessage({ type: MessageType.Request, pieceIndex: 1, begin: 0, length: 16384 });
 * // 17 bytes: 00 00 00 0d 06 00 00 00 01 00 00 00 00 00 00 40 00
 * ```
 */
export function encodeMessage(message: PeerMessage): Buffer {
  switch (message.type) {
    case 'keep-alive':
      return Buffer.alloc(MESSAGE_LENGTH_PREFIX);

    case MessageType.Choke:
    case MessageType.Unchoke:
    case MessageType.Interested:
    case MessageType.NotInterested:
      return frame(message.type, 0).buffer;

    case MessageType.Have: {
      const { buffer, offset } = frame(MessageType.Have, 4);
      buffer.writeUInt32BE(message.pieceIndex, offset);
      return buffer;
    }

    case MessageType.Bitfield: {
      const { buffer, offset } = frame(MessageType.Bitfield, message.bitfield.length);
      message.bitfield.copy(buffer, offset);
      return buffer;
    }

    case MessageType.Request:
    case MessageType.Cancel:
      return encodeBlockRef(message.type, message.pieceIndex, message.begin, message.length);

    case MessageType.Piece: {
      const { buffer, offset } = frame(MessageType.Piece, 8 + message.block.length);
      buffer.writeUInt32BE(message.pieceIndex, offset);
      buffer.writeUInt32BE(message.begin, offset + 4);
      message.block.copy(buffer, offset + 8);
      return buffer;
    }
  }
}

// =============================================================================
// Message Decoding
// =============================================================================

function expectPayload(type: MessageType, payload: Buffer, length: number): void {
  if (payload.length !== length) {
    throw new ProtocolViolationError(
      `Invalid ${getMessageName(type)} payload length: expected ${length}, got ${payload.length}`
    );
  }
}

function readBlockRef(payload: Buffer): { pieceIndex: number; begin: number; length: number } {
  return {
    pieceIndex: payload.readUInt32BE(0),
    begin: payload.readUInt32BE(4),
    length: payload.readUInt32BE(8),
  };
}

/**
 * Parse a message body (message id + payload, length prefix already
 * stripped). An empty body is a keep-alive.
 *
 * Payload views share memory with `body`.
 *
 * @throws {ProtocolViolationError} For unknown ids or malformed payloads
 */
export function parseMessage(body: Buffer): PeerMessage {
  if (body.length === 0) {
    return { type: 'keep-alive' };
  }

  const id = body.readUInt8(0);
  const payload = body.subarray(1);

  switch (id) {
    case MessageType.Choke:
      expectPayload(MessageType.Choke, payload, 0);
      return { type: MessageType.Choke };

    case MessageType.Unchoke:
      expectPayload(MessageType.Unchoke, payload, 0);
      return { type: MessageType.Unchoke };

    case MessageType.Interested:
      expectPayload(MessageType.Interested, payload, 0);
      return { type: MessageType.Interested };

    case MessageType.NotInterested:
      expectPayload(MessageType.NotInterested, payload, 0);
      return { type: MessageType.NotInterested };

    case MessageType.Have:
      expectPayload(MessageType.Have, payload, 4);
      return { type: MessageType.Have, pieceIndex: payload.readUInt32BE(0) };

    case MessageType.Bitfield:
      return { type: MessageType.Bitfield, bitfield: payload };

    case MessageType.Request:
      expectPayload(MessageType.Request, payload, 12);
      return { type: MessageType.Request, ...readBlockRef(payload) };

    case MessageType.Cancel:
      expectPayload(MessageType.Cancel, payload, 12);
      return { type: MessageType.Cancel, ...readBlockRef(payload) };

    case MessageType.Piece:
      if (payload.length < 8) {
        throw new ProtocolViolationError(`Invalid piece payload length: ${payload.length}`);
      }
      return {
        type: MessageType.Piece,
        pieceIndex: payload.readUInt32BE(0),
        begin: payload.readUInt32BE(4),
        block: payload.subarray(8),
      };

    default:
      throw new ProtocolViolationError(`Unknown message id: ${id}`);
  }
}

/**
 * Human-readable message name for logging.
 */
export function getMessageName(type: MessageType | 'keep-alive'): string {
  switch (type) {
    case 'keep-alive':
      return 'keep-alive';
    case MessageType.Choke:
      return 'choke';
    case MessageType.Unchoke:
      return 'unchoke';
    case MessageType.Interested:
      return 'interested';
    case MessageType.NotInterested:
      return 'not-interested';
    case MessageType.Have:
      return 'have';
    case MessageType.Bitfield:
      return 'bitfield';
    case MessageType.Request:
      return 'request';
    case MessageType.Piece:
      return 'piece';
    case MessageType.Cancel:
      return 'cancel';
  }
}
