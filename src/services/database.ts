/**
 * Database service using Knex.js.
 * Supports PostgreSQL (production) and SQLite through better-sqlite3.
 */

import { knex, type Knex } from 'knex';
import pg from 'pg';
import { isRecord, type RowMapping } from '../types/utils.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';

/** PostgreSQL type OID for int8 / bigint (COUNT(*), SUM of integers). */
const INT8_OID = 20;

/** DATE, TIMESTAMP and TIMESTAMPTZ: kept as the server's text, never local-time Dates. */
const TEMPORAL_OIDS = [1082, 1114, 1184] as const;

/**
 * Parse an int8 column to a number when it is exactly representable.
 * Larger values stay strings so no precision is lost.
 */
export function parseInt8(value: string): number | string {
  const parsed = Number(value);
  return Number.isSafeInteger(parsed) ? parsed : value;
}

export interface StatementRows {
  kind: 'rows';
  columns: string[];
  rows: RowMapping[];
}

export interface StatementMutation {
  kind: 'mutation';
  rowCount: number;
}

/**
 * What one statement produced, independent of the driver.
 */
export type StatementOutcome = StatementRows | StatementMutation;

/**
 * A connection borrowed from the pool for the duration of one statement.
 */
export interface PooledConnection {
  runStatement(sql: string): Promise<StatementOutcome>;
  release(): Promise<void>;
}

export interface DatabaseClient {
  acquireConnection(): Promise<PooledConnection>;
}

/**
 * Union of row keys in first-seen order.
 */
export function columnsOf(rows: RowMapping[]): string[] {
  const seen = new Set<string>();
  for (const row of rows) {
    for (const key of Object.keys(row)) {
      seen.add(key);
    }
  }
  return [...seen];
}

function isPgResult(value: unknown): value is Record<string, unknown> & { rows: unknown[] } {
  return isRecord(value) && Array.isArray(value.rows) && 'command' in value;
}

function fieldNames(fields: unknown): string[] {
  if (!Array.isArray(fields)) {
    return [];
  }
  // Duplicate projection names collapse into one key of the row object
  const names = fields.flatMap((field) =>
    isRecord(field) && typeof field.name === 'string' ? [field.name] : []
  );
  return [...new Set(names)];
}

/**
 * Normalize the dialect-specific result of `knex.raw()`.
 *
 * Knex returns different result structures per dialect:
 * - PostgreSQL: `{ command, rows, rowCount, fields }`, or an array of those for
 *   multi-statement input (the last one wins)
 * - better-sqlite3: an array of rows for readers, `{ changes }` otherwise
 */
export function toStatementOutcome(result: unknown): StatementOutcome {
  if (Array.isArray(result) && result.length > 0 && result.every(isPgResult)) {
    return toStatementOutcome(result[result.length - 1]);
  }

  // PostgreSQL
  if (isPgResult(result)) {
    const columns = fieldNames(result.fields);
    if (columns.length > 0 || result.command === 'SELECT') {
      const rows = result.rows.filter(isRecord);
      return { kind: 'rows', columns: columns.length > 0 ? columns : columnsOf(rows), rows };
    }
    return {
      kind: 'mutation',
      rowCount: typeof result.rowCount === 'number' ? result.rowCount : 0,
    };
  }

  // SQLite reader statements
  if (Array.isArray(result)) {
    const rows = result.filter(isRecord);
    return { kind: 'rows', columns: columnsOf(rows), rows };
  }

  // SQLite writer statements
  if (isRecord(result) && typeof result.changes === 'number') {
    return { kind: 'mutation', rowCount: result.changes };
  }

  return { kind: 'mutation', rowCount: 0 };
}

/**
 * Create a Knex instance, registering PostgreSQL type parsers first.
 */
export function createKnex(config: Knex.Config): Knex {
  if (config.client === 'pg') {
    pg.types.setTypeParser(INT8_OID, parseInt8);
    for (const oid of TEMPORAL_OIDS) {
      pg.types.setTypeParser(oid, (value: string) => value);
    }
  }
  return knex(config);
}

/**
 * DatabaseClient over the Knex connection pool.
 * The pool itself belongs to Knex; this class only borrows and returns.
 */
export class KnexDatabase implements DatabaseClient {
  constructor(
    readonly db: Knex,
    private readonly log: Logger = defaultLogger
  ) {}

  async acquireConnection(): Promise<PooledConnection> {
    const connection: unknown = await this.db.client.acquireConnection();
    let released = false;

    return {
      runStatement: async (sql: string) => {
        const result: unknown = await this.db.raw(sql).connection(connection);
        return toStatementOutcome(result);
      },
      release: async () => {
        if (released) return;
        released = true;
        await this.db.client.releaseConnection(connection);
        this.log.debug('Released database connection');
      },
    };
  }

  /**
   * Close database connection pool.
   */
  async close(): Promise<void> {
    await this.db.destroy();
    this.log.info('Database connection closed');
  }
}

/**
 * Borrow a connection for one unit of work and release it on every exit path.
 */
export async function withConnection<T>(
  db: DatabaseClient,
  work: (connection: PooledConnection) => Promise<T>,
  log: Logger = defaultLogger
): Promise<T> {
  const connection = await db.acquireConnection();
  try {
    return await work(connection);
  } finally {
    try {
      await connection.release();
    } catch (error) {
      log.warn({ err: error }, 'Failed to release database connection');
    }
  }
}
