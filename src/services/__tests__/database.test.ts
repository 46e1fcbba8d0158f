import { describe, it, expect, vi } from 'vitest';
import pg from 'pg';
import { toJsonValue } from '../normalizer.js';
import {
  columnsOf,
  createKnex,
  parseInt8,
  toStatementOutcome,
  withConnection,
  type DatabaseClient,
  type PooledConnection,
} from '../database.js';

describe('parseInt8', () => {
  it('parses values that fit in a safe integer', () => {
    expect(parseInt8('200')).toBe(200);
    expect(parseInt8('-5')).toBe(-5);
  });

  it('keeps larger values as strings', () => {
    expect(parseInt8('9007199254740993')).toBe('9007199254740993');
  });
});

describe('createKnex', () => {
  it('keeps PostgreSQL dates and timestamps as the server text', async () => {
    const db = createKnex({ client: 'pg' });
    try {
      expect(toJsonValue(pg.types.getTypeParser(1082)('2006-02-14'))).toBe('2006-02-14');
      expect(toJsonValue(pg.types.getTypeParser(1114)('2006-02-15 09:57:20'))).toBe(
        '2006-02-15 09:57:20'
      );
      expect(toJsonValue(pg.types.getTypeParser(1184)('2006-02-15 09:57:20+00'))).toBe(
        '2006-02-15 09:57:20+00'
      );
      expect(pg.types.getTypeParser(20)('200')).toBe(200);
    } finally {
      await db.destroy();
    }
  });
});

describe('columnsOf', () => {
  it('collects keys in first-seen order', () => {
    expect(columnsOf([{ a: 1, b: 2 }, { b: 3, c: 4 }])).toEqual(['a', 'b', 'c']);
  });
});

describe('toStatementOutcome', () => {
  it('reads a PostgreSQL SELECT result, column order from fields', () => {
    const outcome = toStatementOutcome({
      command: 'SELECT',
      rowCount: 1,
      rows: [{ last_name: 'Guiness', first_name: 'Penelope' }],
      fields: [{ name: 'first_name' }, { name: 'last_name' }],
    });
    expect(outcome).toEqual({
      kind: 'rows',
      columns: ['first_name', 'last_name'],
      rows: [{ last_name: 'Guiness', first_name: 'Penelope' }],
    });
  });

  it('keeps the columns of a PostgreSQL SELECT with no rows', () => {
    expect(
      toStatementOutcome({ command: 'SELECT', rowCount: 0, rows: [], fields: [{ name: 'count' }] })
    ).toEqual({ kind: 'rows', columns: ['count'], rows: [] });
  });

  it('reads a PostgreSQL mutation', () => {
    expect(toStatementOutcome({ command: 'UPDATE', rowCount: 3, rows: [], fields: [] })).toEqual({
      kind: 'mutation',
      rowCount: 3,
    });
  });

  it('treats INSERT ... RETURNING as rows', () => {
    expect(
      toStatementOutcome({
        command: 'INSERT',
        rowCount: 1,
        rows: [{ category_id: 17 }],
        fields: [{ name: 'category_id' }],
      })
    ).toEqual({ kind: 'rows', columns: ['category_id'], rows: [{ category_id: 17 }] });
  });

  it('uses the last result of a multi-statement PostgreSQL call', () => {
    expect(
      toStatementOutcome([
        { command: 'SET', rowCount: null, rows: [], fields: [] },
        { command: 'SELECT', rowCount: 1, rows: [{ n: 1 }], fields: [{ name: 'n' }] },
      ])
    ).toEqual({ kind: 'rows', columns: ['n'], rows: [{ n: 1 }] });
  });

  it('collapses duplicate PostgreSQL field names', () => {
    const outcome = toStatementOutcome({
      command: 'SELECT',
      rowCount: 1,
      rows: [{ name: 'b' }],
      fields: [{ name: 'name' }, { name: 'name' }],
    });
    expect(outcome).toEqual({ kind: 'rows', columns: ['name'], rows: [{ name: 'b' }] });
  });

  it('reads SQLite reader rows', () => {
    expect(toStatementOutcome([{ x: 1 }, { x: 2 }])).toEqual({
      kind: 'rows',
      columns: ['x'],
      rows: [{ x: 1 }, { x: 2 }],
    });
  });

  it('reads an empty SQLite reader result', () => {
    expect(toStatementOutcome([])).toEqual({ kind: 'rows', columns: [], rows: [] });
  });

  it('reads SQLite writer changes', () => {
    expect(toStatementOutcome({ changes: 4, lastInsertRowid: 9 })).toEqual({
      kind: 'mutation',
      rowCount: 4,
    });
  });
});

describe('withConnection', () => {
  function fakeDatabase(connection: PooledConnection): DatabaseClient {
    return { acquireConnection: vi.fn(async () => connection) };
  }

  it('releases the connection after the work succeeds', async () => {
    const release = vi.fn(async () => {});
    const connection: PooledConnection = {
      runStatement: vi.fn(async () => ({ kind: 'mutation' as const, rowCount: 0 })),
      release,
    };

    const value = await withConnection(fakeDatabase(connection), async () => 'done');

    expect(value).toBe('done');
    expect(release).toHaveBeenCalledTimes(1);
  });

  it('releases the connection when the work throws', async () => {
    const release = vi.fn(async () => {});
    const connection: PooledConnection = {
      runStatement: vi.fn(async () => ({ kind: 'mutation' as const, rowCount: 0 })),
      release,
    };

    await expect(
      withConnection(fakeDatabase(connection), async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');
    expect(release).toHaveBeenCalledTimes(1);
  });

  it('keeps the work error when release also fails', async () => {
    const connection: PooledConnection = {
      runStatement: vi.fn(async () => ({ kind: 'mutation' as const, rowCount: 0 })),
      release: vi.fn(async () => {
        throw new Error('release failed');
      }),
    };

    await expect(
      withConnection(fakeDatabase(connection), async () => {
        throw new Error('work failed');
      })
    ).rejects.toThrow('work failed');
  });
});
