/**
 * Download configuration module.
 *
 * @module engine/config
 */

export { DEFAULT_DOWNLOAD_CONFIG, mergeWithDefaults, validateConfig } from './defaults.js';
export type { DownloadConfig } from './defaults.js';
