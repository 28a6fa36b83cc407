import { describe, it, expect, beforeEach } from 'vitest';
import { SessionStatus, type InflightRequest } from '../../../src/engine/peer/machine.js';
import { MessageType, encodeHandshake, encodeMessage, type PeerMessage } from '../../../src/engine/peer/messages.js';
import { PeerSession, peerKey, type PeerSessionEvents } from '../../../src/engine/peer/session.js';
import { ProtocolViolationError, TransportError } from '../../../src/engine/types.js';
import { FakeTransport } from '../../fixtures/transport.js';

// =============================================================================
// Test Helpers
// =============================================================================

const INFO_HASH = Buffer.alloc(20, 0x11);
const LOCAL_ID = Buffer.alloc(20, 0x4c);
const REMOTE_ID = Buffer.alloc(20, 0x52);

let clock: number;
let ownBitfield: Buffer;

function createSession(transport: FakeTransport): PeerSession {
  return new PeerSession({
    address: { host: '10.0.0.5', port: 6881 },
    transport,
    infoHash: INFO_HASH,
    localPeerId: LOCAL_ID,
    pieceCount: 10,
    handshakeTimeoutMs: 5000,
    idleTimeoutMs: 60000,
    keepAliveIntervalMs: 20000,
    requestTimeoutMs: 10000,
    getBitfield: () => ownBitfield,
    now: () => clock,
  });
}

/** Let the connect promise settle */
async function settle(): Promise<void> {
  await new Promise<void>((resolve) => setImmediate(resolve));
}

function message(msg: PeerMessage): Buffer {
  return encodeMessage(msg);
}

/**
 * Collect every event a session emits, in order.
 */
function record(session: PeerSession): Array<{ event: keyof PeerSessionEvents; payload?: unknown }> {
  const events: Array<{ event: keyof PeerSessionEvents; payload?: unknown }> = [];
  session.on('ready', () => events.push({ event: 'ready' }));
  session.on('unchoked', () => events.push({ event: 'unchoked' }));
  session.on('availability', (payload) => events.push({ event: 'availability', payload }));
  session.on('block', (payload) => events.push({ event: 'block', payload }));
  session.on('requestAbandoned', (payload) => events.push({ event: 'requestAbandoned', payload }));
  session.on('ended', (payload) => events.push({ event: 'ended', payload }));
  return events;
}

async function startReady(transport: FakeTransport): Promise<PeerSession> {
  const session = createSession(transport);
  session.start();
  await settle();
  transport.receive(encodeHandshake(INFO_HASH, REMOTE_ID));
  return session;
}

beforeEach(() => {
  clock = 1000;
  ownBitfield = Buffer.alloc(2);
});

// =============================================================================
// Tests
// =============================================================================

describe('peerKey', () => {
  it('should format IPv4 and hostnames as host:port', () => {
    expect(peerKey({ host: '10.0.0.5', port: 6881 })).toBe('10.0.0.5:6881');
    expect(peerKey({ host: 'peer.example', port: 51413 })).toBe('peer.example:51413');
  });

  it('should bracket IPv6 hosts', () => {
    expect(peerKey({ host: '::1', port: 6881 })).toBe('[::1]:6881');
  });
});

describe('PeerSession', () => {
  let transport: FakeTransport;

  beforeEach(() => {
    transport = new FakeTransport();
  });

  describe('handshake', () => {
    it('should send our handshake once connected', async () => {
      const session = createSession(transport);
      expect(session.status).toBe(SessionStatus.Connecting);

      session.start();
      await settle();

      expect(session.status).toBe(SessionStatus.Handshaking);
      expect(transport.written).toEqual([encodeHandshake(INFO_HASH, LOCAL_ID)]);
    });

    it('should become ready on a matching handshake', async () => {
      const session = createSession(transport);
      const events = record(session);
      session.start();
      await settle();

      transport.receive(encodeHandshake(INFO_HASH, REMOTE_ID));

      expect(session.status).toBe(SessionStatus.Ready);
      expect(session.isReady).toBe(true);
      expect(events).toEqual([{ event: 'ready' }]);
      // Nothing verified yet, so no bitfield is sent
      expect(transport.written).toHaveLength(1);
    });

    it('should accept a handshake split across chunks', async () => {
      const session = createSession(transport);
      session.start();
      await settle();

      const handshake = encodeHandshake(INFO_HASH, REMOTE_ID);
      for (const byte of handshake) {
        transport.receive(Buffer.from([byte]));
      }

      expect(session.isReady).toBe(true);
    });

    it('should send our bitfield when we have pieces', async () => {
      ownBitfield = Buffer.from([0x80, 0x00]);
      await startReady(transport);

      expect(transport.written[1]).toEqual(message({ type: MessageType.Bitfield, bitfield: Buffer.from([0x80, 0x00]) }));
    });

    it('should end with an error on a foreign info hash', async () => {
      const session = createSession(transport);
      const events = record(session);
      session.start();
      await settle();

      transport.receive(encodeHandshake(Buffer.alloc(20, 0x22), REMOTE_ID));

      expect(session.status).toBe(SessionStatus.Errored);
      expect(events).toHaveLength(1);
      expect(events[0].event).toBe('ended');
      expect(events[0].payload).toMatchObject({ reason: 'Handshake info hash does not match' });
      expect(transport.destroyed).toBe(true);
    });

    it('should end with an error when the handshake is late', async () => {
      const session = createSession(transport);
      const ended: PeerSessionEvents['ended'][] = [];
      session.on('ended', (payload) => ended.push(payload));
      session.start();
      await settle();

      clock = 6000;
      session.tick();
      expect(session.isEnded).toBe(false);

      clock = 6001;
      session.tick();
      expect(ended.map((e) => e.reason)).toEqual(['No handshake within 5000ms']);
    });
  });

  describe('messages', () => {
    it('should report the peer bitfield as availability', async () => {
      const session = await startReady(transport);
      const events = record(session);

      transport.receive(message({ type: MessageType.Bitfield, bitfield: Buffer.from([0xa0, 0x40]) }));

      expect(events).toEqual([
        { event: 'availability', payload: { kind: 'bitfield', bitfield: Buffer.from([0xa0, 0x40]) } },
      ]);
      expect([...session.pieces].sort((a, b) => a - b)).toEqual([0, 2, 9]);
    });

    it('should add have announcements to the peer pieces', async () => {
      const session = await startReady(transport);
      const events = record(session);

      transport.receive(message({ type: MessageType.Have, pieceIndex: 7 }));

      expect(events).toEqual([{ event: 'availability', payload: { kind: 'have', pieceIndex: 7 } }]);
      expect(session.pieces.has(7)).toBe(true);
    });

    it('should deliver several messages from one chunk in order', async () => {
      const session = await startReady(transport);
      const events = record(session);

      transport.receive(
        Buffer.concat([
          message({ type: MessageType.Have, pieceIndex: 1 }),
          message({ type: 'keep-alive' }),
          message({ type: MessageType.Unchoke }),
        ])
      );

      expect(events.map((e) => e.event)).toEqual(['availability', 'unchoked']);
    });
  });

  describe('requests', () => {
    const request = { pieceIndex: 2, begin: 16384, length: 16384 };

    it('should only request once interested and unchoked', async () => {
      const session = await startReady(transport);
      const events = record(session);

      session.setInterest(true);
      expect(transport.written[1]).toEqual(message({ type: MessageType.Interested }));
      expect(session.canRequest).toBe(false);

      session.requestBlock(request);
      expect(events).toEqual([
        { event: 'requestAbandoned', payload: { request: { ...request, requestedAt: 1000 }, reason: 'unavailable' } },
      ]);

      transport.receive(message({ type: MessageType.Unchoke }));
      expect(session.canRequest).toBe(true);

      session.requestBlock(request);
      expect(transport.written[2]).toEqual(message({ type: MessageType.Request, ...request }));
      expect(session.inflightCount).toBe(1);
    });

    it('should deliver block data and clear the request', async () => {
      const session = await startReady(transport);
      const events = record(session);
      session.setInterest(true);
      transport.receive(message({ type: MessageType.Unchoke }));
      session.requestBlock(request);

      const block = Buffer.alloc(16384, 0x09);
      transport.receive(message({ type: MessageType.Piece, pieceIndex: 2, begin: 16384, block }));

      expect(events.at(-1)).toEqual({ event: 'block', payload: { pieceIndex: 2, begin: 16384, block } });
      expect(session.inflightCount).toBe(0);
    });

    it('should abandon and cancel requests that time out', async () => {
      const session = await startReady(transport);
      const events = record(session);
      session.setInterest(true);
      transport.receive(message({ type: MessageType.Unchoke }));
      session.requestBlock(request);

      clock = 11001;
      session.tick();

      const abandoned: InflightRequest = { ...request, requestedAt: 1000 };
      expect(events.slice(-1)).toEqual([{ event: 'requestAbandoned', payload: { request: abandoned, reason: 'timeout' } }]);
      expect(transport.written.at(-1)).toEqual(message({ type: MessageType.Cancel, ...request }));
      expect(session.inflightCount).toBe(0);
    });

    it('should abandon every request when choked', async () => {
      const session = await startReady(transport);
      const events = record(session);
      session.setInterest(true);
      transport.receive(message({ type: MessageType.Unchoke }));
      session.requestBlock({ pieceIndex: 0, begin: 0, length: 16384 });
      session.requestBlock({ pieceIndex: 0, begin: 16384, length: 16384 });

      transport.receive(message({ type: MessageType.Choke }));

      const reasons = events.filter((e) => e.event === 'requestAbandoned').map((e) => e.payload);
      expect(reasons).toEqual([
        { request: { pieceIndex: 0, begin: 0, length: 16384, requestedAt: 1000 }, reason: 'choked' },
        { request: { pieceIndex: 0, begin: 16384, length: 16384, requestedAt: 1000 }, reason: 'choked' },
      ]);
      expect(session.canRequest).toBe(false);
    });

    it('should send a cancel for a withdrawn request', async () => {
      const session = await startReady(transport);
      session.setInterest(true);
      transport.receive(message({ type: MessageType.Unchoke }));
      session.requestBlock(request);

      session.cancelBlock(request);

      expect(transport.written.at(-1)).toEqual(message({ type: MessageType.Cancel, ...request }));
      expect(session.inflightCount).toBe(0);
    });

    it('should announce verified pieces', async () => {
      const session = await startReady(transport);
      session.announce(4);
      expect(transport.written.at(-1)).toEqual(message({ type: MessageType.Have, pieceIndex: 4 }));
    });
  });

  describe('teardown', () => {
    it('should end on garbage from the peer', async () => {
      const session = createSession(transport);
      const ended: PeerSessionEvents['ended'][] = [];
      session.on('ended', (payload) => ended.push(payload));
      session.start();
      await settle();

      transport.receive(Buffer.alloc(68, 0x13));

      expect(ended).toHaveLength(1);
      expect(ended[0].error).toBeInstanceOf(ProtocolViolationError);
      expect(session.status).toBe(SessionStatus.Errored);
    });

    it('should end on an unknown message id', async () => {
      const session = await startReady(transport);
      const ended: PeerSessionEvents['ended'][] = [];
      session.on('ended', (payload) => ended.push(payload));

      transport.receive(Buffer.from([0, 0, 0, 1, 42]));

      expect(ended.map((e) => e.reason)).toEqual(['Unknown message id: 42']);
    });

    it('should end when the connection cannot be opened', async () => {
      const failing = new FakeTransport(new TransportError('Connection failed: connect ECONNREFUSED'));
      const session = createSession(failing);
      const ended: PeerSessionEvents['ended'][] = [];
      session.on('ended', (payload) => ended.push(payload));

      session.start();
      await settle();

      expect(ended.map((e) => e.reason)).toEqual(['Connection failed: connect ECONNREFUSED']);
      expect(ended[0].error).toBeInstanceOf(TransportError);
    });

    it('should end when the peer closes the connection', async () => {
      const session = await startReady(transport);
      const ended: PeerSessionEvents['ended'][] = [];
      session.on('ended', (payload) => ended.push(payload));

      transport.emit('close', { hadError: false });

      expect(ended).toEqual([{ reason: 'connection closed by peer' }]);
      expect(session.status).toBe(SessionStatus.Closed);
    });

    it('should close locally and emit ended exactly once', async () => {
      const session = await startReady(transport);
      const ended: PeerSessionEvents['ended'][] = [];
      session.on('ended', (payload) => ended.push(payload));

      session.close('banned');
      session.close('again');
      transport.receive(message({ type: MessageType.Unchoke }));

      expect(ended).toEqual([{ reason: 'banned' }]);
      expect(transport.destroyed).toBe(true);
    });

    it('should hand back requests made after the session ended', async () => {
      const session = await startReady(transport);
      session.close();
      const abandoned: PeerSessionEvents['requestAbandoned'][] = [];
      session.on('requestAbandoned', (payload) => abandoned.push(payload));

      session.requestBlock({ pieceIndex: 1, begin: 0, length: 16384 });

      expect(abandoned).toEqual([
        { request: { pieceIndex: 1, begin: 0, length: 16384, requestedAt: 1000 }, reason: 'unavailable' },
      ]);
    });

    it('should close idle sessions', async () => {
      const session = await startReady(transport);
      clock = 61001;
      session.tick();
      expect(session.status).toBe(SessionStatus.Closed);
    });
  });
});
