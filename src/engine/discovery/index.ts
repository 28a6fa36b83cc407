/**
 * @module engine/discovery
 */

export { StaticDiscovery, parseCompactPeers, parsePeerAddress } from './peers.js';
