/**
 * Peer address sources.
 *
 * Tracker and DHT announces are outside this engine; peers reach the
 * coordinator through the `PeerDiscovery` interface. This module provides a
 * fixed-list source and parsers for the address formats trackers and users
 * supply.
 *
 * @module engine/discovery/peers
 */

import type { PeerAddress, PeerDiscovery } from '../types.js';

/** Bytes per peer in the compact format: 4 (IPv4) + 2 (port) */
const COMPACT_PEER_LENGTH = 6;

/**
 * Parse a `host:port` string. IPv6 hosts are written in brackets,
 * e.g. `[::1]:6881`.
 *
 * @throws {RangeError} If the string is not a valid address
 */
export function parsePeerAddress(value: string): PeerAddress {
  const match = /^(?:\[([^\]]+)\]|([^:]+)):(\d+)$/.exec(value.trim());
  if (!match) {
    throw new RangeError(`Invalid peer address '${value}' (expected host:port)`);
  }

  const host = match[1] ?? match[2];
  const port = Number(match[3]);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new RangeError(`Invalid port in peer address '${value}'`);
  }
  return { host, port };
}

/**
 * Parse the compact peer list format (BEP 23): 6 bytes per peer, an IPv4
 * address followed by a big-endian port.
 *
 * @throws {RangeError} If the length is not a multiple of 6
 */
export function parseCompactPeers(data: Buffer): PeerAddress[] {
  if (data.length % COMPACT_PEER_LENGTH !== 0) {
    throw new RangeError(`Compact peer list length ${data.length} is not a multiple of ${COMPACT_PEER_LENGTH}`);
  }

  const peers: PeerAddress[] = [];
  for (let offset = 0; offset < data.length; offset += COMPACT_PEER_LENGTH) {
    peers.push({
      host: `${data[offset]}.${data[offset + 1]}.${data[offset + 2]}.${data[offset + 3]}`,
      port: data.readUInt16BE(offset + 4),
    });
  }
  return peers;
}

/**
 * Discovery source that always returns the same addresses.
 */
export class StaticDiscovery implements PeerDiscovery {
  private readonly peers: PeerAddress[];

  constructor(peers: PeerAddress[]) {
    this.peers = [...peers];
  }

  async discover(): Promise<PeerAddress[]> {
    return [...this.peers];
  }
}
