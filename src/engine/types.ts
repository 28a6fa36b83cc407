/**
 * Shared types and errors for the piecewise engine.
 *
 * @module engine/types
 */

// =============================================================================
// Collaborators
// =============================================================================

/**
 * Network address of a remote peer.
 */
export interface PeerAddress {
  host: string;
  port: number;
}

/**
 * Destination for verified piece data.
 *
 * Offsets are absolute positions within the torrent's concatenated payload;
 * mapping them onto individual files is the storage's concern.
 */
export interface Storage {
  write(offset: number, data: Buffer): Promise<void>;
  read(offset: number, length: number): Promise<Buffer>;
}

/**
 * Source of peer addresses. May be polled repeatedly and may return
 * addresses it has returned before.
 */
export interface PeerDiscovery {
  discover(): Promise<PeerAddress[]>;
}

/**
 * Anything that can answer "does the peer have piece N".
 */
export interface PieceSet {
  has(pieceIndex: number): boolean;
}

// =============================================================================
// Error Types
// =============================================================================

/**
 * Base error class for all engine errors.
 */
export class PiecewiseError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PiecewiseError';
  }
}

/**
 * Error thrown when bencoded input is not well-formed.
 */
export class MalformedEncodingError extends PiecewiseError {
  /** Byte offset in the input where decoding failed */
  readonly position: number;

  constructor(message: string, position: number) {
    super(message);
    this.name = 'MalformedEncodingError';
    this.position = position;
  }
}

/**
 * Error thrown when torrent metadata is invalid or cannot be parsed.
 */
export class InvalidMetainfoError extends PiecewiseError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'InvalidMetainfoError';
  }
}

/**
 * Error thrown when a peer violates the wire protocol.
 */
export class ProtocolViolationError extends PiecewiseError {
  /** The peer that caused the error, if known */
  readonly peer?: string;

  constructor(message: string, peer?: string) {
    super(message);
    this.name = 'ProtocolViolationError';
    this.peer = peer;
  }
}

/**
 * Error describing a completed piece whose SHA-1 does not match the metainfo.
 */
export class HashMismatchError extends PiecewiseError {
  readonly pieceIndex: number;
  readonly expectedHash: Buffer;
  readonly actualHash: Buffer;

  constructor(pieceIndex: number, expectedHash: Buffer, actualHash: Buffer) {
    super(
      `Piece ${pieceIndex} hash mismatch: expected ${expectedHash.toString('hex')}, got ${actualHash.toString('hex')}`
    );
    this.name = 'HashMismatchError';
    this.pieceIndex = pieceIndex;
    this.expectedHash = expectedHash;
    this.actualHash = actualHash;
  }
}

/**
 * Error thrown when a connection or handshake does not complete in time.
 */
export class TimeoutError extends PiecewiseError {
  constructor(message: string) {
    super(message);
    this.name = 'TimeoutError';
  }
}

/**
 * Error thrown when network/socket operations fail.
 */
export class TransportError extends PiecewiseError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransportError';
  }
}

/**
 * Error thrown when no connected or known peer can supply the remaining pieces.
 */
export class DownloadStalledError extends PiecewiseError {
  /** Number of pieces still missing when the download stalled */
  readonly missingPieces: number;

  constructor(missingPieces: number) {
    super(`Download stalled: no peer can supply the remaining ${missingPieces} piece(s)`);
    this.name = 'DownloadStalledError';
    this.missingPieces = missingPieces;
  }
}

/**
 * Error thrown when the storage collaborator rejects a verified piece.
 */
export class StorageError extends PiecewiseError {
  readonly pieceIndex: number;

  constructor(pieceIndex: number, options?: { cause?: unknown }) {
    const reason = options?.cause instanceof Error ? `: ${options.cause.message}` : '';
    super(`Failed to store piece ${pieceIndex}${reason}`, options);
    this.name = 'StorageError';
    this.pieceIndex = pieceIndex;
  }
}
