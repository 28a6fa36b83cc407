/**
 * Info command.
 *
 * Shows the contents of a .torrent file.
 *
 * @module cli/commands/info
 */

import { readFile } from 'fs/promises';
import { parseTorrentFile, pieceCount, type TorrentDescriptor } from '../../engine/torrent/index.js';
import { errorMessage, formatBytes, formatKeyValue } from '../utils/output.js';

export interface InfoCommandOptions {
  /** Path to the .torrent file */
  torrentPath: string;
}

/**
 * Render a descriptor as display lines.
 */
export function formatTorrentInfo(descriptor: TorrentDescriptor): string[] {
  const lines = [
    formatKeyValue('Name', descriptor.name),
    formatKeyValue('Info hash', descriptor.infoHash.toString('hex')),
    formatKeyValue('Tracker', descriptor.announce ?? '(none)'),
    formatKeyValue('Total size', `${formatBytes(descriptor.totalLength)} (${descriptor.totalLength} bytes)`),
    formatKeyValue('Piece length', formatBytes(descriptor.pieceLength)),
    formatKeyValue('Pieces', String(pieceCount(descriptor))),
    formatKeyValue('Private', descriptor.isPrivate ? 'yes' : 'no'),
  ];

  if (descriptor.comment !== undefined) {
    lines.push(formatKeyValue('Comment', descriptor.comment));
  }
  if (descriptor.createdBy !== undefined) {
    lines.push(formatKeyValue('Created by', descriptor.createdBy));
  }
  if (descriptor.creationDate !== undefined) {
    lines.push(formatKeyValue('Created', new Date(descriptor.creationDate * 1000).toISOString()));
  }

  lines.push(`Files (${descriptor.files.length}):`);
  for (const file of descriptor.files) {
    lines.push(`  ${file.relativePath} (${formatBytes(file.length)})`);
  }
  return lines;
}

/**
 * Print a torrent file's metadata.
 *
 * @returns Process exit code
 */
export async function runInfo(options: InfoCommandOptions): Promise<number> {
  try {
    const descriptor = parseTorrentFile(await readFile(options.torrentPath));
    console.log(formatTorrentInfo(descriptor).join('\n'));
    return 0;
  } catch (err) {
    console.error(errorMessage(err instanceof Error ? err.message : String(err)));
    return 1;
  }
}
