/**
 * Query execution.
 *
 * Runs a statement the validator already accepted, once, on a borrowed pooled
 * connection. Database errors become failed results at this boundary.
 * Statements run under the driver's autocommit; there is no explicit
 * transaction handling.
 */

import type { ErrorCategory, ExecutionResult } from '../types/models.js';
import { errorMessage } from '../types/utils.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';
import { withConnection, type DatabaseClient } from './database.js';

export interface SqlExecutor {
  execute(sqlText: string): Promise<ExecutionResult>;
}

function failedExecution(
  category: ErrorCategory,
  message: string,
  durationMs: number | null
): ExecutionResult {
  return {
    rows: null,
    succeeded: false,
    error_message: message,
    rows_affected: null,
    duration_ms: durationMs,
    columns: null,
    statement_kind: null,
    category,
  };
}

export class QueryExecutor implements SqlExecutor {
  constructor(
    private readonly db: DatabaseClient,
    private readonly log: Logger = defaultLogger
  ) {}

  /**
   * Execute one SQL statement and materialize its result.
   *
   * Row-returning statements report the number of rows returned as
   * `rows_affected`; mutations report the driver's affected-row count and
   * carry no rows.
   */
  async execute(sqlText: string): Promise<ExecutionResult> {
    const sql = sqlText.trim();
    if (!sql) {
      return failedExecution('EMPTY_INPUT', 'SQL query cannot be empty', null);
    }

    const startTime = performance.now();

    try {
      const outcome = await withConnection(
        this.db,
        (connection) => connection.runStatement(sql),
        this.log
      );
      const durationMs = performance.now() - startTime;

      if (outcome.kind === 'rows') {
        this.log.info(
          `Query returned ${outcome.rows.length} rows in ${durationMs.toFixed(1)}ms`
        );
        return {
          rows: outcome.rows,
          succeeded: true,
          error_message: null,
          rows_affected: outcome.rows.length,
          duration_ms: durationMs,
          columns: outcome.columns,
          statement_kind: 'rows',
          category: null,
        };
      }

      this.log.info(
        `Statement affected ${outcome.rowCount} rows in ${durationMs.toFixed(1)}ms`
      );
      return {
        rows: null,
        succeeded: true,
        error_message: null,
        rows_affected: outcome.rowCount,
        duration_ms: durationMs,
        columns: null,
        statement_kind: 'mutation',
        category: null,
      };
    } catch (error) {
      const durationMs = performance.now() - startTime;
      this.log.error(`SQL execution failed: ${errorMessage(error)}`);
      return failedExecution('DATABASE_FAILURE', errorMessage(error), durationMs);
    }
  }
}
