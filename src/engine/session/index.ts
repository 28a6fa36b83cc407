/**
 * Session Module
 *
 * @module engine/session
 */

export { DownloadCoordinator, generatePeerId } from './coordinator.js';
export type { DownloadCoordinatorEvents, DownloadCoordinatorOptions, DownloadResult } from './coordinator.js';
