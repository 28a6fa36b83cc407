#!/usr/bin/env node
/**
 * CLI Entry Point
 *
 * Parses command-line arguments and routes to the command implementations.
 *
 * @module cli
 */

import meow from 'meow';
import { engineVersion } from '../engine/index.js';
import { runDownload } from './commands/download.js';
import { runInfo } from './commands/info.js';
import { errorMessage } from './utils/output.js';

// =============================================================================
// CLI Configuration
// =============================================================================

const cli = meow(
  `
  Usage
    $ piecewise <command> [options]

  Commands
    info <torrent>        Show the contents of a .torrent file
    download <torrent>    Download a torrent from the given peers

  Options
    --peer, -p            Peer address as host:port (repeatable)
    --output, -o          Directory to write files to (default: .)
    --max-connections     Maximum open peer connections
    --verbose             Log peer activity
    --version, -v         Show version
    --help, -h            Show help

  Examples
    $ piecewise info debian.torrent
    $ piecewise download debian.torrent -p 192.168.1.20:6881 -p 192.168.1.21:6881 -o ~/Downloads
`,
  {
    importMeta: import.meta,
    version: engineVersion,
    flags: {
      version: {
        type: 'boolean',
        shortFlag: 'v',
      },
      peer: {
        type: 'string',
        shortFlag: 'p',
        isMultiple: true,
      },
      output: {
        type: 'string',
        shortFlag: 'o',
        default: '.',
      },
      maxConnections: {
        type: 'number',
      },
      verbose: {
        type: 'boolean',
        default: false,
      },
    },
  }
);

// =============================================================================
// Command Routing
// =============================================================================

async function routeCommand(): Promise<number> {
  const [command, torrentPath] = cli.input;
  const flags = cli.flags;

  if (flags.version) {
    console.log(engineVersion);
    return 0;
  }

  if (!command) {
    cli.showHelp(0);
    return 0;
  }

  if (!torrentPath) {
    console.error(errorMessage('Missing torrent file path'));
    return 1;
  }

  switch (command.toLowerCase()) {
    case 'info':
    case 'show':
      return runInfo({ torrentPath });

    case 'download':
    case 'get':
      return runDownload({
        torrentPath,
        peers: flags.peer ?? [],
        outputPath: flags.output,
        maxConnections: flags.maxConnections,
        verbose: flags.verbose,
      });

    default:
      console.error(errorMessage(`Unknown command: ${command}`));
      return 1;
  }
}

routeCommand().then(
  (code) => process.exit(code),
  (err: unknown) => {
    console.error(errorMessage(err instanceof Error ? err.message : String(err)));
    process.exit(1);
  }
);
