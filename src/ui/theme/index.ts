/**
 * Colors and glyphs for the terminal views.
 *
 * @module ui/theme
 *
 * @example
 * ```tsx
 * <Text color={colors.primary}>{progressChars.filled.repeat(5)}</Text>
 * ```
 */

export const colors = {
  /** Filled progress and completed states */
  primary: 'green',

  /** Names and highlights */
  secondary: 'cyan',

  success: 'greenBright',
  warning: 'yellow',
  error: 'red',

  /** Labels and secondary text */
  muted: 'gray',
} as const;

export type Color = (typeof colors)[keyof typeof colors];

export const progressChars = {
  /** Every piece in the cell verified */
  filled: '█',

  /** Some pieces in the cell verified */
  partial: '▒',

  empty: '░',
} as const;
