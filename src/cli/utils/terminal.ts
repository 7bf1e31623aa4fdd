/**
 * Terminal Utilities for CLI Output Formatting
 *
 * ANSI escape code wrappers. In non-TTY environments the codes pass through
 * harmlessly.
 */

export const bold = (s: string): string => `\x1b[1m${s}\x1b[0m`;

export const dim = (s: string): string => `\x1b[2m${s}\x1b[0m`;

export const green = (s: string): string => `\x1b[32m${s}\x1b[0m`;

export const yellow = (s: string): string => `\x1b[33m${s}\x1b[0m`;

export const red = (s: string): string => `\x1b[31m${s}\x1b[0m`;

/**
 * Creates a horizontal separator line.
 */
export function formatSeparator(width: number = 50): string {
  return dim('─'.repeat(width));
}

/**
 * Formats a label/value pair for summaries.
 */
export function formatField(label: string, value: string | number): string {
  return `  ${dim(`${label}:`.padEnd(12))} ${value}`;
}
