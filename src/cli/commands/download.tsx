/**
 * Download command.
 *
 * Downloads a torrent from peers given on the command line, writing its
 * files under the output directory, with a live Ink progress view.
 * Ctrl-C cancels.
 *
 * @module cli/commands/download
 */

import React from 'react';
import { render } from 'ink';
import { readFile } from 'fs/promises';
import { StaticDiscovery, parsePeerAddress } from '../../engine/discovery/index.js';
import { FileStorage } from '../../engine/disk/index.js';
import { createConsoleLogger, type LogLevel } from '../../engine/logging/index.js';
import { DownloadCoordinator } from '../../engine/session/index.js';
import { parseTorrentFile, pieceCount } from '../../engine/torrent/index.js';
import { PiecewiseError } from '../../engine/types.js';
import { DownloadStatus, type DownloadStatusProps } from '../../ui/components/index.js';
import { errorMessage, successMessage, warnMessage } from '../utils/output.js';

export interface DownloadCommandOptions {
  torrentPath: string;

  /** Peer addresses as host:port */
  peers: string[];

  /** Directory the files are written under */
  outputPath: string;

  maxConnections?: number;
  verbose?: boolean;
}

/**
 * Run a download in the foreground.
 *
 * @returns Process exit code
 */
export async function runDownload(options: DownloadCommandOptions): Promise<number> {
  let coordinator: DownloadCoordinator;
  let storage: FileStorage;
  let view: DownloadStatusProps;

  try {
    const descriptor = parseTorrentFile(await readFile(options.torrentPath));
    const peers = options.peers.map(parsePeerAddress);
    if (peers.length === 0) {
      console.error(errorMessage('At least one --peer is required'));
      return 1;
    }

    const level: LogLevel = options.verbose ? 'debug' : 'warn';
    storage = new FileStorage({ descriptor, downloadPath: options.outputPath });
    coordinator = new DownloadCoordinator({
      descriptor,
      storage,
      discovery: new StaticDiscovery(peers),
      logger: createConsoleLogger({ level }),
      config: options.maxConnections !== undefined ? { maxConnections: options.maxConnections } : undefined,
    });

    view = {
      name: descriptor.name,
      totalLength: descriptor.totalLength,
      progress: 0,
      pieces: new Array<boolean>(pieceCount(descriptor)).fill(false),
      peers: 0,
      endgame: false,
      phase: 'connecting',
    };
  } catch (err) {
    console.error(errorMessage(err instanceof Error ? err.message : String(err)));
    return 1;
  }

  const screen = render(<DownloadStatus {...view} />);
  const update = (changes: Partial<DownloadStatusProps>): void => {
    view = { ...view, ...changes };
    screen.rerender(<DownloadStatus {...view} />);
  };

  const connected = new Set<string>();
  coordinator.on('peerConnected', ({ peer }) => {
    connected.add(peer);
    update({ peers: connected.size, phase: 'downloading' });
  });
  coordinator.on('peerDisconnected', ({ peer }) => {
    connected.delete(peer);
    update({ peers: connected.size });
  });
  coordinator.on('pieceComplete', ({ pieceIndex, progress }) => {
    update({ progress, pieces: view.pieces.map((done, index) => done || index === pieceIndex) });
  });
  coordinator.on('endgameStarted', () => update({ endgame: true }));

  const controller = new AbortController();
  const onSigint = (): void => controller.abort();
  process.once('SIGINT', onSigint);

  try {
    const result = await coordinator.run(controller.signal);
    update({ progress: result.progress, phase: result.status });
    screen.unmount();

    if (result.status === 'cancelled') {
      console.log(warnMessage(`Cancelled at ${Math.floor(result.progress * 100)}%`));
      return 130;
    }
    console.log(successMessage(`Saved to ${options.outputPath}`));
    return 0;
  } catch (err) {
    update({ phase: 'failed' });
    screen.unmount();

    const message = err instanceof Error ? err.message : String(err);
    const hint = err instanceof PiecewiseError ? '' : ' (unexpected error)';
    console.error(errorMessage(message + hint));
    return 1;
  } finally {
    process.off('SIGINT', onSigint);
    await storage.close();
  }
}
