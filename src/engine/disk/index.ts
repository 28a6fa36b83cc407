/**
 * Disk Module
 *
 * @module engine/disk
 */

export { FileStorage, MemoryStorage } from './storage.js';
export type { FileStorageOptions } from './storage.js';
