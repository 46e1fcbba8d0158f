/**
 * Text rendering of normalized payloads for the terminal.
 */

import type { NormalizedPayload, NormalizedRow } from '../types/models.js';
import type { JsonValue } from '../types/utils.js';
import { formatTable } from './table.js';

export type OutputFormat = 'table' | 'json';

export function parseOutputFormat(value: unknown): OutputFormat {
  if (value === undefined || value === 'table') return 'table';
  if (value === 'json') return 'json';
  throw new Error(`Unknown format "${String(value)}" (expected table or json)`);
}

function asObjectRows(columns: string[], rows: NormalizedRow[]): Array<Record<string, JsonValue>> {
  return rows.map((row) => {
    if (Array.isArray(row)) {
      const out: Record<string, JsonValue> = {};
      columns.forEach((column, i) => {
        out[column] = row[i] ?? null;
      });
      return out;
    }
    return row;
  });
}

/**
 * Render the result part of a payload.
 */
export function renderPayload(payload: NormalizedPayload, format: OutputFormat): string {
  if (format === 'json') {
    return JSON.stringify(payload, null, 2);
  }

  switch (payload.status) {
    case 'rows':
      return formatTable(payload.columns, asObjectRows(payload.columns, payload.rows));
    case 'empty':
      return payload.message;
    case 'mutation':
      return payload.message;
    case 'error':
      return `${payload.category}: ${payload.error_message}`;
  }
}
