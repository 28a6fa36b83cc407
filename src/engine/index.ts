/**
 * Piecewise engine
 *
 * Bencode codec, metainfo parsing, the peer wire protocol, piece
 * management and the download coordinator.
 *
 * @module engine
 */

export const engineVersion = '0.1.0';

export * from './types.js';
export { TypedEventEmitter } from './events.js';
export type { EventArgs, EventListener } from './events.js';
export * from './bencode.js';
export * from './config/index.js';
export * from './logging/index.js';
export * from './torrent/index.js';
export * from './discovery/index.js';
export * from './peer/index.js';
export * from './piece/index.js';
export * from './disk/index.js';
export * from './session/index.js';
