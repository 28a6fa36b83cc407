/**
 * UI Components index
 *
 * @module ui/components
 */

export { PieceBar, pieceCells, type CellState, type PieceBarProps } from './PieceBar.js';
export { DownloadStatus, formatPercent, type DownloadPhase, type DownloadStatusProps } from './DownloadStatus.js';
