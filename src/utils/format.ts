/**
 * Text formatting utilities
 */

const DEFAULT_MAX_LENGTH = 500;

/**
 * Cut long log text, marking the cut so it is not mistaken for the whole value.
 */
export function truncateText(text: string, maxLength = DEFAULT_MAX_LENGTH): string {
  if (text.length <= maxLength) return text;
  return `${text.slice(0, maxLength)}...<truncated>`;
}

/**
 * Fit a value into a fixed-width table cell, ending with `...` when cut.
 */
export function truncateCell(value: string, maxLength: number): string {
  if (value.length <= maxLength) return value;
  if (maxLength <= 3) return '.'.repeat(Math.max(maxLength, 0));
  return `${value.slice(0, maxLength - 3)}...`;
}

/**
 * Pad or cut a value to exactly `width` characters.
 */
export function fitColumn(value: string, width: number): string {
  return truncateCell(value, width).padEnd(width);
}
