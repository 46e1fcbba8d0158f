/**
 * Plain-text table formatter for CLI output.
 * Rows are numbered from 1 and headers are shown in title case.
 */

import type { JsonValue } from '../types/utils.js';

const MAX_COLUMN_WIDTH = 60;

/**
 * "first_name" -> "First Name", "COUNT" -> "Count".
 */
export function prettyHeader(column: string): string {
  return column
    .replace(/_/g, ' ')
    .toLowerCase()
    .replace(/(^|[^a-z])([a-z])/g, (_match, prefix: string, letter: string) => prefix + letter.toUpperCase());
}

function formatValue(val: JsonValue | undefined): string {
  if (val === null || val === undefined) return 'NULL';
  if (typeof val === 'object') return JSON.stringify(val);
  return String(val);
}

function fit(val: string, width: number): string {
  return val.length > width ? val.slice(0, width - 1) + '…' : val.padEnd(width);
}

export function formatTable(columns: string[], rows: Array<Record<string, JsonValue>>): string {
  if (columns.length === 0) return '(no columns)';
  if (rows.length === 0) return '(0 rows)';

  const headers = ['#', ...columns.map(prettyHeader)];
  const cells = rows.map((row, index) => [
    String(index + 1),
    ...columns.map((col) => formatValue(row[col])),
  ]);

  // Calculate column widths
  const widths = headers.map((header) => header.length);
  for (const line of cells) {
    line.forEach((val, i) => {
      widths[i] = Math.min(Math.max(widths[i] ?? 0, val.length), MAX_COLUMN_WIDTH);
    });
  }

  const lines: string[] = [];
  lines.push(headers.map((header, i) => fit(header, widths[i] ?? header.length)).join(' | ').trimEnd());
  lines.push(widths.map((w) => '-'.repeat(w)).join('-+-'));
  for (const line of cells) {
    lines.push(line.map((val, i) => fit(val, widths[i] ?? val.length)).join(' | ').trimEnd());
  }

  return lines.join('\n');
}
