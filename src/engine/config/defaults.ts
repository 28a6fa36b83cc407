/**
 * Default configuration values for a download.
 *
 * @module engine/config/defaults
 */

import { BLOCK_SIZE } from '../piece/state.js';

/**
 * Tunables for the download coordinator, its peer sessions and the piece
 * manager. Durations are in milliseconds.
 */
export interface DownloadConfig {
  /** Maximum concurrently open peer connections */
  maxConnections: number;

  /** Maximum outstanding block requests per peer */
  pipelineDepth: number;

  /** Size of a block request in bytes */
  blockSize: number;

  /** Endgame starts when fewer than this many pieces are incomplete */
  endgameThreshold: number;

  /** A block request unanswered for this long is reassigned */
  requestTimeoutMs: number;

  /** Time allowed for the remote handshake to arrive */
  handshakeTimeoutMs: number;

  /** Time allowed for the TCP connection to be established */
  connectTimeoutMs: number;

  /** A session with no inbound traffic for this long is closed */
  idleTimeoutMs: number;

  /** A keep-alive is sent after this long without outbound traffic */
  keepAliveIntervalMs: number;

  /** Interval of the coordinator's housekeeping tick */
  tickIntervalMs: number;

  /** How long the download may be unable to progress before it fails */
  stallTimeoutMs: number;

  /** Interval at which the discovery collaborator is re-polled */
  discoveryIntervalMs: number;

  /** Hash mismatches attributed to one peer before it is banned */
  maxHashFailuresPerPeer: number;

  /** Largest accepted wire message (length prefix value) */
  maxMessageLength: number;
}

/**
 * Default download configuration.
 */
export const DEFAULT_DOWNLOAD_CONFIG: Readonly<DownloadConfig> = Object.freeze({
  maxConnections: 30,
  pipelineDepth: 5,
  blockSize: BLOCK_SIZE,
  endgameThreshold: 4,
  requestTimeoutMs: 30_000,
  handshakeTimeoutMs: 10_000,
  connectTimeoutMs: 10_000,
  idleTimeoutMs: 120_000,
  keepAliveIntervalMs: 60_000,
  tickIntervalMs: 1_000,
  stallTimeoutMs: 60_000,
  discoveryIntervalMs: 30_000,
  maxHashFailuresPerPeer: 3,
  // Room for a bitfield of eight million pieces
  maxMessageLength: 1024 * 1024 + 9,
});

/**
 * Merges a partial configuration with the default configuration.
 *
 * @param partialConfig - Partial configuration to merge
 * @returns Complete configuration with defaults applied
 * @throws {RangeError} If any resulting value is not a positive integer
 */
export function mergeWithDefaults(partialConfig?: Partial<DownloadConfig>): DownloadConfig {
  const config: DownloadConfig = { ...DEFAULT_DOWNLOAD_CONFIG, ...partialConfig };
  validateConfig(config);
  return config;
}

/**
 * Checks that every limit in a configuration is a positive integer.
 *
 * @throws {RangeError} Naming the first offending key
 */
export function validateConfig(config: DownloadConfig): void {
  for (const [key, value] of Object.entries(config)) {
    if (!Number.isInteger(value) || value <= 0) {
      throw new RangeError(`Invalid configuration: ${key} must be a positive integer, got ${String(value)}`);
    }
  }
}
