/**
 * Wire stream framing.
 *
 * Turns the raw byte stream from a peer into a handshake followed by
 * length-prefixed messages. Data may arrive split or coalesced at any byte
 * boundary; incomplete frames are buffered until the rest arrives.
 *
 * @module engine/peer/protocol
 */

import { ProtocolViolationError } from '../types.js';
import {
  HANDSHAKE_LENGTH,
  MESSAGE_LENGTH_PREFIX,
  decodeHandshake,
  parseMessage,
  type HandshakeMessage,
  type PeerMessage,
} from './messages.js';

/** Default upper bound on a message length prefix: a 16 KiB block plus header, or a large bitfield */
export const DEFAULT_MAX_MESSAGE_LENGTH = 1024 * 1024 + 9;

export type WireFrame = { kind: 'handshake'; handshake: HandshakeMessage } | { kind: 'message'; message: PeerMessage };

/**
 * Incremental decoder for one connection's inbound stream.
 *
 * @example
 * ```typescript
 * const reader = new WireReader();
 * connection.on('data', (chunk) => {
 *   for (const frame of reader.push(chunk)) {
 *     handle(frame);
 *   }
 * });
 * ```
 */
export class WireReader {
  private buffer: Buffer = Buffer.alloc(0);
  private handshakeDone = false;
  private readonly maxMessageLength: number;

  constructor(maxMessageLength: number = DEFAULT_MAX_MESSAGE_LENGTH) {
    this.maxMessageLength = maxMessageLength;
  }

  /** Bytes received but not yet forming a complete frame */
  get bufferedBytes(): number {
    return this.buffer.length;
  }

  /**
   * Append received bytes and return every frame they complete.
   *
   * Returned messages own their memory; they do not alias later input.
   *
   * @throws {ProtocolViolationError} On a malformed handshake, unknown message
   *   id, bad payload or oversized length prefix. The reader must not be used
   *   after it throws.
   */
  push(chunk: Buffer): WireFrame[] {
    this.buffer = this.buffer.length === 0 ? Buffer.from(chunk) : Buffer.concat([this.buffer, chunk]);
    const frames: WireFrame[] = [];

    let offset = 0;
    for (;;) {
      const available = this.buffer.length - offset;

      if (!this.handshakeDone) {
        if (available < HANDSHAKE_LENGTH) {
          break;
        }
        const handshake = decodeHandshake(this.buffer.subarray(offset, offset + HANDSHAKE_LENGTH));
        frames.push({ kind: 'handshake', handshake });
        this.handshakeDone = true;
        offset += HANDSHAKE_LENGTH;
        continue;
      }

      if (available < MESSAGE_LENGTH_PREFIX) {
        break;
      }
      const length = this.buffer.readUInt32BE(offset);
      if (length > this.maxMessageLength) {
        throw new ProtocolViolationError(`Message length ${length} exceeds limit of ${this.maxMessageLength}`);
      }
      if (available < MESSAGE_LENGTH_PREFIX + length) {
        break;
      }

      const start = offset + MESSAGE_LENGTH_PREFIX;
      frames.push({ kind: 'message', message: parseMessage(this.buffer.subarray(start, start + length)) });
      offset = start + length;
    }

    this.buffer = offset === this.buffer.length ? Buffer.alloc(0) : Buffer.from(this.buffer.subarray(offset));
    return frames;
  }
}
