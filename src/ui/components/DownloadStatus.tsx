import React from 'react';
import { Box, Text } from 'ink';
import { formatBytes } from '../../cli/utils/output.js';
import { colors, type Color } from '../theme/index.js';
import { PieceBar } from './PieceBar.js';

export type DownloadPhase = 'connecting' | 'downloading' | 'complete' | 'cancelled' | 'failed';

export interface DownloadStatusProps {
  name: string;
  totalLength: number;

  /** Verified fraction of the payload, between 0 and 1 */
  progress: number;

  /** Whether each piece is verified, by piece index */
  pieces: readonly boolean[];

  /** Peers that completed the handshake */
  peers: number;
  endgame: boolean;
  phase: DownloadPhase;
}

const phaseColors: Record<DownloadPhase, Color> = {
  connecting: colors.muted,
  downloading: colors.secondary,
  complete: colors.success,
  cancelled: colors.warning,
  failed: colors.error,
};

/**
 * Percentage of the payload verified. 100% only once every byte is.
 */
export function formatPercent(progress: number): string {
  const percent = progress >= 1 ? 100 : Math.floor(Math.max(0, progress) * 100);
  return `${percent}%`;
}

/**
 * Live view of a running download.
 */
export const DownloadStatus: React.FC<DownloadStatusProps> = ({
  name,
  totalLength,
  progress,
  pieces,
  peers,
  endgame,
  phase,
}) => {
  const verified = pieces.filter(Boolean).length;

  return (
    <Box flexDirection="column">
      <Box>
        <Text bold>{name}</Text>
        <Text color={colors.muted}> ({formatBytes(totalLength)})</Text>
      </Box>
      <Box>
        <PieceBar pieces={pieces} />
        <Text> {formatPercent(progress).padStart(4)}</Text>
      </Box>
      <Box>
        <Text color={phaseColors[phase]}>{phase}</Text>
        <Text color={colors.muted}> | pieces </Text>
        <Text>
          {verified}/{pieces.length}
        </Text>
        <Text color={colors.muted}> | peers </Text>
        <Text>{peers}</Text>
        {endgame && phase === 'downloading' && <Text color={colors.warning}> | endgame</Text>}
      </Box>
    </Box>
  );
};
