import { describe, it, expect } from 'vitest';
import { formatTorrentInfo } from '../../src/cli/commands/info.js';
import {
  errorMessage,
  formatBytes,
  formatKeyValue,
  successMessage,
  warnMessage,
} from '../../src/cli/utils/output.js';
import { buildMultiFileTorrent, buildSingleFileTorrent, makePayload } from '../fixtures/torrents.js';

function row(key: string, value: string): string {
  return `${`${key}:`.padEnd(15)} ${value}`;
}

describe('CLI output', () => {
  describe('formatBytes', () => {
    it('should keep small values in bytes', () => {
      expect(formatBytes(0)).toBe('0 B');
      expect(formatBytes(100)).toBe('100 B');
      expect(formatBytes(1023)).toBe('1023 B');
    });

    it('should use binary units with one decimal', () => {
      expect(formatBytes(1536)).toBe('1.5 KB');
      expect(formatBytes(3 * 1024 * 1024)).toBe('3.0 MB');
      expect(formatBytes(5 * 1024 ** 3)).toBe('5.0 GB');
    });

    it('should stop at terabytes', () => {
      expect(formatBytes(2 * 1024 ** 5)).toBe('2048.0 TB');
    });
  });

  describe('formatKeyValue', () => {
    it('should align values after the key column', () => {
      expect(formatKeyValue('Name', 'x')).toBe('Name:           x');
      expect(formatKeyValue('Key', 'v', 6)).toBe('Key:   v');
    });
  });

  describe('messages', () => {
    it('should color status lines', () => {
      expect(successMessage('done')).toBe('\x1b[32m[OK] done\x1b[0m');
      expect(errorMessage('failed')).toBe('\x1b[31m[ERROR] failed\x1b[0m');
      expect(warnMessage('slow')).toBe('\x1b[33m[WARN] slow\x1b[0m');
    });
  });

  describe('formatTorrentInfo', () => {
    it('should describe a single-file torrent', () => {
      const { descriptor } = buildSingleFileTorrent({
        payload: makePayload(100),
        pieceLength: 32,
        announce: 'http://tracker.test/announce',
      });

      expect(formatTorrentInfo(descriptor)).toEqual([
        row('Name', 'payload.bin'),
        row('Info hash', descriptor.infoHash.toString('hex')),
        row('Tracker', 'http://tracker.test/announce'),
        row('Total size', '100 B (100 bytes)'),
        row('Piece length', '32 B'),
        row('Pieces', '4'),
        row('Private', 'no'),
        'Files (1):',
        '  payload.bin (100 B)',
      ]);
    });

    it('should list every file of a multi-file torrent', () => {
      const { descriptor } = buildMultiFileTorrent({
        name: 'bundle',
        pieceLength: 2048,
        files: [
          { path: ['one.txt'], content: Buffer.alloc(10) },
          { path: ['sub', 'two.bin'], content: Buffer.alloc(2048) },
        ],
      });
      const lines = formatTorrentInfo(descriptor);

      expect(lines[2]).toBe(row('Tracker', '(none)'));
      expect(lines.slice(-3)).toEqual(['Files (2):', '  bundle/one.txt (10 B)', '  bundle/sub/two.bin (2.0 KB)']);
    });
  });
});
