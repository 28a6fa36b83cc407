/**
 * Text formatting for the command-line front end.
 *
 * @module cli/utils/output
 */

const BYTE_UNITS = ['B', 'KB', 'MB', 'GB', 'TB'] as const;

/**
 * Size in binary units, one decimal above bytes: "0 B", "1.5 KB", "3.0 MB".
 */
export function formatBytes(bytes: number): string {
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < BYTE_UNITS.length - 1) {
    value /= 1024;
    unit++;
  }
  return unit === 0 ? `${Math.round(value)} B` : `${value.toFixed(1)} ${BYTE_UNITS[unit]}`;
}

/**
 * "Key:" padded to a fixed column, then the value.
 */
export function formatKeyValue(key: string, value: string, keyWidth = 15): string {
  return `${`${key}:`.padEnd(keyWidth)} ${value}`;
}

// Status lines use raw ANSI escapes; Ink renders everything else
const statusLine =
  (tag: string, code: number) =>
  (message: string): string =>
    `\x1b[${code}m[${tag}] ${message}\x1b[0m`;

export const successMessage = statusLine('OK', 32);
export const errorMessage = statusLine('ERROR', 31);
export const warnMessage = statusLine('WARN', 33);
