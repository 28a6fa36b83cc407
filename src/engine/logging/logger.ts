/**
 * Engine logging.
 *
 * Components report through a small `Logger` interface so the embedding
 * application decides where messages go. The console logger writes one
 * `[level] message` line per call; the silent logger is the default.
 *
 * @module engine/logging/logger
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface ConsoleLoggerOptions {
  /** Minimum level that is written (default: 'info') */
  level?: LogLevel;

  /** Prefix prepended to every line, e.g. a peer address */
  prefix?: string;
}

/**
 * Create a logger that writes to the console.
 *
 * Errors go to stderr via `console.error`, warnings via `console.warn`,
 * everything else via `console.log`.
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const threshold = LEVEL_ORDER[options.level ?? 'info'];
  const prefix = options.prefix ? `${options.prefix} ` : '';

  const write = (level: LogLevel, message: string): void => {
    if (LEVEL_ORDER[level] < threshold) {
      return;
    }
    const line = `[${level}] ${prefix}${message}`;
    if (level === 'error') {
      console.error(line);
    } else if (level === 'warn') {
      console.warn(line);
    } else {
      console.log(line);
    }
  };

  return {
    debug: (message) => write('debug', message),
    info: (message) => write('info', message),
    warn: (message) => write('warn', message),
    error: (message) => write('error', message),
  };
}

/**
 * Logger that discards everything.
 */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
