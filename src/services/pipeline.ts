/**
 * Query pipeline: Generator -> Validator -> Executor -> Normalizer.
 *
 * The pipeline owns no state beyond the schema context it was built with, so
 * one instance serves any number of concurrent requests.
 */

import type {
  ExecutionResult,
  ExplainResponse,
  GenerationResult,
  NormalizeOptions,
  NormalizedPayload,
  PipelineResponse,
  ResultShape,
  SchemaContext,
  SqlExecutionResponse,
  ValidationOutcome,
} from '../types/models.js';
import { errorMessage } from '../types/utils.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';
import type { SqlExecutor } from './executor.js';
import type { QueryGenerator } from './generator.js';
import { normalizeResult } from './normalizer.js';
import { validateSql } from './validator.js';

export interface PipelineDependencies {
  schemaContext: SchemaContext;
  generator: QueryGenerator;
  executor: SqlExecutor;
  validate?: (sql: string) => ValidationOutcome;
  logger?: Logger;
}

export interface RunOptions {
  includeExplanation?: boolean;
  shape?: ResultShape;
}

export class QueryPipeline {
  readonly schemaContext: SchemaContext;
  private readonly generator: QueryGenerator;
  private readonly executor: SqlExecutor;
  private readonly validator: (sql: string) => ValidationOutcome;
  private readonly log: Logger;

  constructor(deps: PipelineDependencies) {
    this.schemaContext = deps.schemaContext;
    this.generator = deps.generator;
    this.executor = deps.executor;
    this.validator = deps.validate ?? validateSql;
    this.log = deps.logger ?? defaultLogger;
  }

  /**
   * Generate SQL for a question. A generator that throws is reported as a
   * model failure.
   */
  async generate(text: string, wantExplanation = false): Promise<GenerationResult> {
    try {
      return await this.generator.generate({
        natural_language_text: text,
        schema_context: this.schemaContext,
        want_explanation: wantExplanation,
      });
    } catch (error) {
      this.log.error(`Query generator threw: ${errorMessage(error)}`);
      return {
        sql_text: '',
        explanation: null,
        is_valid: false,
        validation_message: `SQL generation failed: ${errorMessage(error)}`,
        category: 'MODEL_FAILURE',
      };
    }
  }

  validate(sqlText: string): ValidationOutcome {
    return this.validator(sqlText);
  }

  execute(sqlText: string): Promise<ExecutionResult> {
    return this.executor.execute(sqlText);
  }

  normalize(result: ExecutionResult, options?: NormalizeOptions): NormalizedPayload {
    return normalizeResult(result, options);
  }

  /**
   * Generate and validate without touching the database.
   */
  async explain(question: string, includeExplanation = true): Promise<ExplainResponse> {
    const generation = await this.generate(question, includeExplanation);
    return {
      natural_query: question,
      generation,
      validation: generation.sql_text ? this.validate(generation.sql_text) : null,
    };
  }

  /**
   * Full round trip for one question. Invalid SQL is never executed.
   */
  async run(question: string, options: RunOptions = {}): Promise<PipelineResponse> {
    const generation = await this.generate(question, options.includeExplanation ?? false);
    const validation = generation.sql_text ? this.validate(generation.sql_text) : null;

    if (validation !== null && !validation.passed) {
      return {
        natural_query: question,
        generation,
        validation,
        execution: null,
        result: { status: 'error', error_message: validation.reason, category: validation.category },
      };
    }

    if (!generation.is_valid) {
      return {
        natural_query: question,
        generation,
        validation,
        execution: null,
        result: {
          status: 'error',
          error_message: generation.validation_message ?? 'SQL generation failed',
          category: generation.category ?? 'MODEL_FAILURE',
        },
      };
    }

    const execution = await this.execute(generation.sql_text);
    return {
      natural_query: question,
      generation,
      validation,
      execution,
      result: this.normalize(execution, { shape: options.shape }),
    };
  }

  /**
   * Validate then execute caller-supplied SQL.
   */
  async executeSql(
    sqlText: string,
    options: NormalizeOptions = {}
  ): Promise<SqlExecutionResponse> {
    const validation = this.validate(sqlText);
    if (!validation.passed) {
      this.log.warn(`Rejected SQL (${validation.category}): ${validation.reason}`);
      return {
        validation,
        execution: null,
        result: {
          status: 'error',
          error_message: validation.reason,
          category: validation.category,
        },
      };
    }

    const execution = await this.execute(sqlText);
    return { validation, execution, result: this.normalize(execution, options) };
  }
}

export function createPipeline(deps: PipelineDependencies): QueryPipeline {
  return new QueryPipeline(deps);
}
