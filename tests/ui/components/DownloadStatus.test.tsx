import { describe, it, expect } from 'vitest';
import React from 'react';
import { render } from 'ink-testing-library';
import { DownloadStatus, formatPercent, type DownloadStatusProps } from '../../../src/ui/components/DownloadStatus.js';

function pieces(verified: number, total: number): boolean[] {
  return Array.from({ length: total }, (_, index) => index < verified);
}

function props(overrides: Partial<DownloadStatusProps> = {}): DownloadStatusProps {
  return {
    name: 'payload.bin',
    totalLength: 3 * 1024 * 1024,
    progress: 0.25,
    pieces: pieces(3, 12),
    peers: 2,
    endgame: false,
    phase: 'downloading',
    ...overrides,
  };
}

describe('DownloadStatus', () => {
  describe('formatPercent', () => {
    it('should round down until the payload is complete', () => {
      expect(formatPercent(0)).toBe('0%');
      expect(formatPercent(0.5)).toBe('50%');
      expect(formatPercent(0.999)).toBe('99%');
      expect(formatPercent(1)).toBe('100%');
    });
  });

  it('should show the name and size', () => {
    const { lastFrame } = render(<DownloadStatus {...props()} />);
    expect(lastFrame()).toContain('payload.bin');
    expect(lastFrame()).toContain('(3.0 MB)');
  });

  it('should show piece and peer counts', () => {
    const { lastFrame } = render(<DownloadStatus {...props()} />);
    expect(lastFrame()).toContain('3/12');
    expect(lastFrame()).toContain('peers');
    expect(lastFrame()).toContain('25%');
  });

  it('should flag endgame while downloading', () => {
    const { lastFrame } = render(<DownloadStatus {...props({ endgame: true })} />);
    expect(lastFrame()).toContain('endgame');
  });

  it('should show the final phase instead of endgame', () => {
    const { lastFrame } = render(
      <DownloadStatus {...props({ endgame: true, phase: 'complete', progress: 1, pieces: pieces(12, 12) })} />
    );
    expect(lastFrame()).toContain('complete');
    expect(lastFrame()).toContain('12/12');
    expect(lastFrame()).not.toContain('endgame');
    expect(lastFrame()).toContain('100%');
  });

  it('should update on rerender', () => {
    const { lastFrame, rerender } = render(<DownloadStatus {...props({ phase: 'connecting', peers: 0 })} />);
    expect(lastFrame()).toContain('connecting');

    rerender(<DownloadStatus {...props({ peers: 1 })} />);
    expect(lastFrame()).toContain('downloading');
  });
});
