/**
 * TCP Socket Wrapper for Peer Connections
 *
 * Event-driven TCP connection for peer communication, with a connect
 * timeout, write backpressure and clean disconnection. Sessions talk to it
 * through the `Transport` interface so that tests can substitute an
 * in-process peer.
 *
 * @module engine/peer/connection
 */

import * as net from 'net';
import { TypedEventEmitter, type EventListener } from '../events.js';
import { TimeoutError, TransportError } from '../types.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Events emitted by a transport.
 */
export interface TransportEvents {
  /** Emitted when data is received from the peer */
  data: Buffer;

  /** Emitted once when the connection is closed */
  close: { hadError: boolean };

  /** Emitted when an error occurs after the connection is established */
  error: Error;
}

/**
 * Byte stream to a single peer.
 */
export interface Transport {
  connect(): Promise<void>;
  write(data: Buffer): Promise<void>;
  destroy(): void;
  on<K extends keyof TransportEvents & string>(event: K, listener: EventListener<TransportEvents[K]>): this;
}

export interface PeerConnectionOptions {
  host: string;
  port: number;

  /** Connection timeout in milliseconds (default: 10000) */
  connectTimeout?: number;
}

export enum ConnectionState {
  Disconnected = 'disconnected',
  Connecting = 'connecting',
  Connected = 'connected',
  Closed = 'closed',
}

/** Default connection timeout in milliseconds */
const DEFAULT_CONNECT_TIMEOUT = 10000;

// =============================================================================
// PeerConnection Class
// =============================================================================

/**
 * TCP transport to a remote peer.
 *
 * @example
 * ```typescript
 * const conn = new PeerConnection({ host: '192.168.1.1', port: 6881 });
 *
 * conn.on('data', (data) => reader.push(data));
 * conn.on('error', (err) => console.error('Connection error:', err.message));
 *
 * await conn.connect();
 * await conn.write(handshake);
 * ```
 */
export class PeerConnection extends TypedEventEmitter<TransportEvents> implements Transport {
  private readonly host: string;
  private readonly port: number;
  private readonly connectTimeoutMs: number;

  private socket: net.Socket | null = null;
  private state: ConnectionState = ConnectionState.Disconnected;
  private hadError = false;

  /** Timer and rejection of a connect() still in progress */
  private pendingConnect: { timer: NodeJS.Timeout; reject: (error: Error) => void } | null = null;

  constructor(options: PeerConnectionOptions) {
    super();
    this.host = options.host;
    this.port = options.port;
    this.connectTimeoutMs = options.connectTimeout ?? DEFAULT_CONNECT_TIMEOUT;
  }

  get connectionState(): ConnectionState {
    return this.state;
  }

  /**
   * Establish the TCP connection.
   *
   * @throws {TimeoutError} If the connection is not established in time
   * @throws {TransportError} If the connection fails
   */
  connect(): Promise<void> {
    return new Promise((resolve, reject) => {
      if (this.state !== ConnectionState.Disconnected) {
        reject(new TransportError(`Cannot connect: connection is ${this.state}`));
        return;
      }

      this.state = ConnectionState.Connecting;
      const socket = new net.Socket();
      this.socket = socket;

      const timer = setTimeout(() => {
        this.failConnect(
          new TimeoutError(`Connection to ${this.host}:${this.port} timed out after ${this.connectTimeoutMs}ms`)
        );
      }, this.connectTimeoutMs);
      this.pendingConnect = { timer, reject };

      socket.once('connect', () => {
        this.settleConnect();
        this.state = ConnectionState.Connected;
        resolve();
      });

      socket.on('error', (error: Error) => {
        this.hadError = true;
        if (this.state === ConnectionState.Connecting) {
          this.failConnect(new TransportError(`Connection failed: ${error.message}`, { cause: error }));
        } else if (this.state === ConnectionState.Connected) {
          this.emit('error', new TransportError(error.message, { cause: error }));
        }
      });

      socket.on('data', (data: Buffer) => {
        this.emit('data', data);
      });

      socket.on('close', () => {
        if (this.state === ConnectionState.Connected) {
          this.state = ConnectionState.Closed;
          this.socket = null;
          this.emit('close', { hadError: this.hadError });
        }
      });

      socket.connect(this.port, this.host);
    });
  }

  /**
   * Send data to the peer, waiting for the socket to drain when its write
   * buffer is full.
   *
   * @throws {TransportError} If the connection is not established or the write fails
   */
  write(data: Buffer): Promise<void> {
    return new Promise((resolve, reject) => {
      const socket = this.socket;
      if (!socket || this.state !== ConnectionState.Connected) {
        reject(new TransportError('Cannot write: connection is not established'));
        return;
      }

      const flushed = socket.write(data, (error) => {
        if (error) {
          reject(new TransportError(`Write failed: ${error.message}`, { cause: error }));
        }
      });

      if (flushed) {
        resolve();
      } else {
        socket.once('drain', () => resolve());
      }
    });
  }

  /**
   * Immediately close the connection and release the socket. A connect()
   * still in progress rejects with a TransportError.
   */
  destroy(): void {
    const wasConnected = this.state === ConnectionState.Connected;
    this.cleanup();
    if (wasConnected) {
      this.emit('close', { hadError: this.hadError });
    }
  }

  /**
   * Stop the connect timer, returning the pending connect's rejection if any.
   */
  private settleConnect(): ((error: Error) => void) | null {
    const pending = this.pendingConnect;
    this.pendingConnect = null;
    if (!pending) {
      return null;
    }
    clearTimeout(pending.timer);
    return pending.reject;
  }

  private failConnect(error: Error): void {
    const reject = this.settleConnect();
    this.cleanup();
    reject?.(error);
  }

  private cleanup(): void {
    const reject = this.settleConnect();
    this.state = ConnectionState.Closed;
    if (this.socket) {
      this.socket.removeAllListeners();
      // Keep a no-op error listener so a late socket error is not thrown
      this.socket.on('error', () => {});
      this.socket.destroy();
      this.socket = null;
    }
    reject?.(new TransportError(`Connection to ${this.host}:${this.port} was closed while connecting`));
  }
}
