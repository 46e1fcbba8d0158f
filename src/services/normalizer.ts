/**
 * Result normalization: turns executor output into a JSON-safe payload.
 */

import type {
  ExecutionResult,
  NormalizeOptions,
  NormalizedPayload,
  NormalizedRow,
} from '../types/models.js';
import { isRecord, type JsonObject, type JsonValue, type RowMapping } from '../types/utils.js';
import { columnsOf } from './database.js';

export const NO_RESULTS_MESSAGE = 'No results';

/**
 * Convert a driver value into something JSON.stringify round-trips.
 */
export function toJsonValue(value: unknown): JsonValue {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === 'string' || typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : String(value);
  }
  if (typeof value === 'bigint') {
    const asNumber = Number(value);
    return Number.isSafeInteger(asNumber) ? asNumber : value.toString();
  }
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value.toISOString();
  }
  if (value instanceof Uint8Array) {
    return Buffer.from(value).toString('base64');
  }
  if (Array.isArray(value)) {
    return value.map(toJsonValue);
  }
  if (isRecord(value)) {
    const out: JsonObject = {};
    for (const [key, nested] of Object.entries(value)) {
      out[key] = toJsonValue(nested);
    }
    return out;
  }
  return String(value);
}

function toRow(row: RowMapping, columns: string[], shape: 'objects' | 'tuples'): NormalizedRow {
  if (shape === 'tuples') {
    return columns.map((column) => toJsonValue(row[column]));
  }
  const out: JsonObject = {};
  for (const column of columns) {
    out[column] = toJsonValue(row[column]);
  }
  return out;
}

/**
 * Normalize an execution result.
 *
 * Every row carries the same columns in the same order; a column missing
 * from a row comes out as null. Zero rows is an `empty` payload, never an
 * error, and a failed execution never turns into an empty success.
 */
export function normalizeResult(
  result: ExecutionResult,
  options: NormalizeOptions = {}
): NormalizedPayload {
  if (!result.succeeded) {
    return {
      status: 'error',
      error_message: result.error_message ?? 'Query execution failed',
      category: result.category ?? 'DATABASE_FAILURE',
    };
  }

  if (result.statement_kind === 'mutation' || result.rows === null) {
    const affected = result.rows_affected ?? 0;
    return {
      status: 'mutation',
      rows_affected: affected,
      message: `Query executed successfully. ${affected} rows affected.`,
    };
  }

  const columns =
    result.columns && result.columns.length > 0 ? [...result.columns] : columnsOf(result.rows);

  if (result.rows.length === 0) {
    return {
      status: 'empty',
      columns,
      rows: [],
      row_count: 0,
      message: NO_RESULTS_MESSAGE,
    };
  }

  const shape = options.shape ?? 'objects';
  const rows = result.rows.map((row) => toRow(row, columns, shape));

  return {
    status: 'rows',
    columns,
    rows,
    row_count: rows.length,
  };
}
