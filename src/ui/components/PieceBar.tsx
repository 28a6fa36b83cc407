import React from 'react';
import { Box, Text } from 'ink';
import { colors, progressChars, type Color } from '../theme/index.js';

export type CellState = 'complete' | 'partial' | 'missing';

export interface PieceBarProps {
  /** Whether each piece is verified, by piece index */
  pieces: readonly boolean[];

  /** Cells in the bar (default: 30) */
  width?: number;
}

const glyphs: Record<CellState, string> = {
  complete: progressChars.filled,
  partial: progressChars.partial,
  missing: progressChars.empty,
};

const cellColors: Record<CellState, Color> = {
  complete: colors.primary,
  partial: colors.secondary,
  missing: colors.muted,
};

/**
 * Spread the pieces over `width` cells. With fewer pieces than cells a
 * piece spans several cells.
 */
export function pieceCells(pieces: readonly boolean[], width: number): CellState[] {
  const total = pieces.length;
  const cells: CellState[] = [];

  for (let cell = 0; cell < width; cell++) {
    if (total === 0) {
      cells.push('missing');
      continue;
    }
    const start = Math.floor((cell * total) / width);
    const end = Math.min(total, Math.max(start + 1, Math.floor(((cell + 1) * total) / width)));

    let verified = 0;
    for (let index = start; index < end; index++) {
      if (pieces[index]) verified++;
    }
    cells.push(verified === end - start ? 'complete' : verified > 0 ? 'partial' : 'missing');
  }
  return cells;
}

/**
 * Map of verified pieces across the payload.
 *
 * @example
 * <PieceBar pieces={[true, false, true, false]} width={4} />
 * // Output: "█░█░"
 */
export const PieceBar: React.FC<PieceBarProps> = ({ pieces, width = 30 }) => {
  const runs: { state: CellState; length: number }[] = [];
  for (const state of pieceCells(pieces, width)) {
    const last = runs[runs.length - 1];
    if (last && last.state === state) {
      last.length++;
    } else {
      runs.push({ state, length: 1 });
    }
  }

  return (
    <Box>
      {runs.map((run, index) => (
        <Text key={index} color={cellColors[run.state]}>
          {glyphs[run.state].repeat(run.length)}
        </Text>
      ))}
    </Box>
  );
};
