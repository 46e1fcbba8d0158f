import { describe, it, expect } from 'vitest';
import { NO_RESULTS_MESSAGE, normalizeResult, toJsonValue } from '../normalizer.js';
import type { ExecutionResult } from '../../types/models.js';

function rowsResult(rows: Array<Record<string, unknown>>, columns: string[] | null = null): ExecutionResult {
  return {
    rows,
    succeeded: true,
    error_message: null,
    rows_affected: rows.length,
    duration_ms: 1.5,
    columns,
    statement_kind: 'rows',
    category: null,
  };
}

describe('toJsonValue', () => {
  it('converts driver values to JSON-safe values', () => {
    expect(toJsonValue(undefined)).toBeNull();
    expect(toJsonValue(new Date('2024-02-14T10:00:00.000Z'))).toBe('2024-02-14T10:00:00.000Z');
    expect(toJsonValue(new Date('not a date'))).toBeNull();
    expect(toJsonValue(12n)).toBe(12);
    expect(toJsonValue(2n ** 60n)).toBe('1152921504606846976');
    expect(toJsonValue(Buffer.from('hi'))).toBe('aGk=');
    expect(toJsonValue(Number.NaN)).toBe('NaN');
    expect(toJsonValue({ at: new Date(0), tags: ['a', undefined] })).toEqual({
      at: '1970-01-01T00:00:00.000Z',
      tags: ['a', null],
    });
  });
});

describe('normalizeResult', () => {
  it('gives every row the same keys in the same order', () => {
    const payload = normalizeResult(
      rowsResult([
        { first_name: 'Penelope', last_name: 'Guiness' },
        { last_name: 'Wahlberg', first_name: 'Nick' },
        { first_name: 'Ed' },
      ])
    );

    expect(payload.status).toBe('rows');
    if (payload.status !== 'rows') return;
    expect(payload.columns).toEqual(['first_name', 'last_name']);
    expect(payload.rows).toEqual([
      { first_name: 'Penelope', last_name: 'Guiness' },
      { first_name: 'Nick', last_name: 'Wahlberg' },
      { first_name: 'Ed', last_name: null },
    ]);
    for (const row of payload.rows) {
      expect(Object.keys(row)).toEqual(['first_name', 'last_name']);
    }
    expect(payload.row_count).toBe(3);
  });

  it('prefers the executor column order', () => {
    const payload = normalizeResult(rowsResult([{ b: 2, a: 1 }], ['a', 'b']));
    expect(payload.status === 'rows' && Object.keys(payload.rows[0] ?? {})).toEqual(['a', 'b']);
  });

  it('produces tuples on request', () => {
    const payload = normalizeResult(rowsResult([{ a: 1, b: 'x' }], ['a', 'b']), {
      shape: 'tuples',
    });
    expect(payload).toEqual({ status: 'rows', columns: ['a', 'b'], rows: [[1, 'x']], row_count: 1 });
  });

  it('marks zero rows as empty, not as an error', () => {
    expect(normalizeResult(rowsResult([], ['count']))).toEqual({
      status: 'empty',
      columns: ['count'],
      rows: [],
      row_count: 0,
      message: NO_RESULTS_MESSAGE,
    });
  });

  it('turns a failed execution into an error payload without rows', () => {
    const payload = normalizeResult({
      rows: null,
      succeeded: false,
      error_message: 'no such table: nope',
      rows_affected: null,
      duration_ms: 0.4,
      columns: null,
      statement_kind: null,
      category: 'DATABASE_FAILURE',
    });
    expect(payload).toEqual({
      status: 'error',
      error_message: 'no such table: nope',
      category: 'DATABASE_FAILURE',
    });
  });

  it('reports mutations by affected row count', () => {
    const payload = normalizeResult({
      rows: null,
      succeeded: true,
      error_message: null,
      rows_affected: 2,
      duration_ms: 0.8,
      columns: null,
      statement_kind: 'mutation',
      category: null,
    });
    expect(payload).toEqual({
      status: 'mutation',
      rows_affected: 2,
      message: 'Query executed successfully. 2 rows affected.',
    });
  });

  it('is stable across calls', () => {
    const result = rowsResult([{ z: 1, y: 2 }]);
    expect(JSON.stringify(normalizeResult(result))).toBe(JSON.stringify(normalizeResult(result)));
  });
});
