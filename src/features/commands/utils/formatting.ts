/**
 * @fileoverview Formatting utilities for command output
 * @module features/commands/utils/formatting
 */

/**
 * Formats rows as left-aligned columns separated by two spaces. Trailing
 * whitespace is trimmed and the result ends with a newline.
 *
 * @example
 * ```typescript
 * formatTable(['NAME', 'ACCESS'], [['GOOGLE_API_KEY', 'granted']]);
 * // 'NAME            ACCESS\nGOOGLE_API_KEY  granted\n'
 * ```
 */
export function formatTable(headers: string[], rows: string[][]): string {
  const widths = headers.map((header, column) =>
    Math.max(header.length, ...rows.map((row) => (row[column] ?? '').length))
  );

  const formatRow = (cells: string[]): string =>
    widths
      .map((width, column) => (cells[column] ?? '').padEnd(width))
      .join('  ')
      .trimEnd();

  return `${[formatRow(headers), ...rows.map(formatRow)].join('\n')}\n`;
}

/**
 * Formats a token count with thousands separators, e.g. `1,048,576`.
 */
export function formatTokenCount(count: number): string {
  return count.toString().replace(/\B(?=(\d{3})+(?!\d))/g, ',');
}
