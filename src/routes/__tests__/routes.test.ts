import { afterEach, beforeEach, describe, it, expect, vi, type Mock } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { buildServer } from '../../server.js';
import { TableCatalog } from '../../services/catalog.js';
import type { SqlExecutor } from '../../services/executor.js';
import type { QueryGenerator } from '../../services/generator.js';
import { createPipeline } from '../../services/pipeline.js';
import { LLMError } from '../../types/errors.js';
import type { ExecutionResult, GenerationResult } from '../../types/models.js';
import { DVD_TABLES, fakeInspector } from '../../services/__tests__/fake-inspector.js';

const SCHEMA = 'CREATE TABLE actor (actor_id SERIAL PRIMARY KEY);';

function validGeneration(sql: string): GenerationResult {
  return {
    sql_text: sql,
    explanation: null,
    is_valid: true,
    validation_message: 'Basic syntax validation passed',
    category: null,
  };
}

const COUNT_RESULT: ExecutionResult = {
  rows: [{ count: 200 }],
  succeeded: true,
  error_message: null,
  rows_affected: 1,
  duration_ms: 2.5,
  columns: ['count'],
  statement_kind: 'rows',
  category: null,
};

const FAILED_RESULT: ExecutionResult = {
  rows: null,
  succeeded: false,
  error_message: 'connection refused',
  rows_affected: null,
  duration_ms: 0.3,
  columns: null,
  statement_kind: null,
  category: 'DATABASE_FAILURE',
};

describe('REST routes', () => {
  let fastify: FastifyInstance;
  let generate: Mock<QueryGenerator['generate']>;
  let execute: Mock<SqlExecutor['execute']>;

  beforeEach(async () => {
    generate = vi.fn<QueryGenerator['generate']>(async () =>
      validGeneration('SELECT COUNT(*) AS count FROM actor')
    );
    execute = vi.fn<SqlExecutor['execute']>(async () => COUNT_RESULT);
    fastify = await buildServer({
      pipeline: createPipeline({
        schemaContext: SCHEMA,
        generator: { generate },
        executor: { execute },
      }),
      catalog: new TableCatalog(fakeInspector(DVD_TABLES)),
      databaseClient: 'pg',
      maxQueryLength: 50,
    });
  });

  afterEach(async () => {
    await fastify.close();
  });

  describe('POST /query', () => {
    it('returns the full pipeline response', async () => {
      const response = await fastify.inject({
        method: 'POST',
        url: '/query',
        payload: { query: 'How many actors are there?' },
      });

      expect(response.statusCode).toBe(200);
      const body = response.json();
      expect(body.natural_query).toBe('How many actors are there?');
      expect(body.generation.sql_text).toBe('SELECT COUNT(*) AS count FROM actor');
      expect(body.result).toEqual({
        status: 'rows',
        columns: ['count'],
        rows: [{ count: 200 }],
        row_count: 1,
      });
      expect(generate).toHaveBeenCalledWith({
        natural_language_text: 'How many actors are there?',
        schema_context: SCHEMA,
        want_explanation: false,
      });
    });

    it('returns 400 for destructive SQL and does not execute it', async () => {
      generate.mockResolvedValueOnce({
        sql_text: 'DROP TABLE actor',
        explanation: null,
        is_valid: false,
        validation_message: 'Statement contains destructive keyword: DROP',
        category: 'DESTRUCTIVE_OPERATION',
      });

      const response = await fastify.inject({
        method: 'POST',
        url: '/query',
        payload: { query: 'drop the actors' },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json().result.category).toBe('DESTRUCTIVE_OPERATION');
      expect(execute).not.toHaveBeenCalled();
    });

    it('returns 502 when the model fails', async () => {
      generate.mockResolvedValueOnce({
        sql_text: '',
        explanation: null,
        is_valid: false,
        validation_message: 'SQL generation failed: timeout',
        category: 'MODEL_FAILURE',
      });

      const response = await fastify.inject({
        method: 'POST',
        url: '/query',
        payload: { query: 'How many actors?' },
      });

      expect(response.statusCode).toBe(502);
      expect(response.json().execution).toBeNull();
    });

    it('returns 500 when the database fails', async () => {
      execute.mockResolvedValueOnce(FAILED_RESULT);

      const response = await fastify.inject({
        method: 'POST',
        url: '/query',
        payload: { query: 'How many actors?' },
      });

      expect(response.statusCode).toBe(500);
      expect(response.json().result).toEqual({
        status: 'error',
        error_message: 'connection refused',
        category: 'DATABASE_FAILURE',
      });
    });

    it('rejects a body without a query', async () => {
      const response = await fastify.inject({ method: 'POST', url: '/query', payload: {} });
      expect(response.statusCode).toBe(400);
      expect(generate).not.toHaveBeenCalled();
    });

    it('rejects a question longer than the configured limit', async () => {
      const response = await fastify.inject({
        method: 'POST',
        url: '/query',
        payload: { query: 'x'.repeat(51) },
      });
      expect(response.statusCode).toBe(400);
    });
  });

  it('GET /query reads the question from the query string', async () => {
    const response = await fastify.inject({ method: 'GET', url: '/query?q=How%20many%20actors' });

    expect(response.statusCode).toBe(200);
    expect(response.json().natural_query).toBe('How many actors');
  });

  it('POST /generate does not execute', async () => {
    const response = await fastify.inject({
      method: 'POST',
      url: '/generate',
      payload: { query: 'How many actors?', include_explanation: true },
    });

    expect(response.statusCode).toBe(200);
    expect(response.json().sql_text).toBe('SELECT COUNT(*) AS count FROM actor');
    expect(generate.mock.calls[0]?.[0].want_explanation).toBe(true);
    expect(execute).not.toHaveBeenCalled();
  });

  it('POST /explain asks for an explanation by default and validates', async () => {
    const response = await fastify.inject({
      method: 'POST',
      url: '/explain',
      payload: { query: 'How many actors?' },
    });

    expect(response.statusCode).toBe(200);
    expect(generate.mock.calls[0]?.[0].want_explanation).toBe(true);
    expect(response.json().validation).toEqual({ passed: true, reason: null, category: null });
    expect(execute).not.toHaveBeenCalled();
  });

  describe('POST /validate', () => {
    it('accepts a SELECT', async () => {
      const response = await fastify.inject({
        method: 'POST',
        url: '/validate',
        payload: { sql: 'SELECT 1' },
      });
      expect(response.json()).toEqual({ passed: true, reason: null, category: null });
    });

    it('reports a rejected statement with status 200', async () => {
      const response = await fastify.inject({
        method: 'POST',
        url: '/validate',
        payload: { sql: 'TRUNCATE payment' },
      });
      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({
        passed: false,
        reason: 'Statement contains destructive keyword: TRUNCATE',
        category: 'DESTRUCTIVE_OPERATION',
      });
    });
  });

  describe('POST /execute', () => {
    it('validates and executes', async () => {
      const response = await fastify.inject({
        method: 'POST',
        url: '/execute',
        payload: { sql: 'SELECT COUNT(*) AS count FROM actor', shape: 'tuples' },
      });

      expect(response.statusCode).toBe(200);
      expect(response.json().result.rows).toEqual([[200]]);
      expect(execute).toHaveBeenCalledWith('SELECT COUNT(*) AS count FROM actor');
    });

    it('refuses empty SQL', async () => {
      const response = await fastify.inject({
        method: 'POST',
        url: '/execute',
        payload: { sql: '  ' },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json().result.category).toBe('EMPTY_INPUT');
      expect(execute).not.toHaveBeenCalled();
    });
  });

  describe('catalog', () => {
    it('GET /tables lists tables', async () => {
      const response = await fastify.inject({ method: 'GET', url: '/tables' });
      expect(response.json()).toEqual({
        tables: [
          { table_name: 'actor', column_count: 2 },
          { table_name: 'film', column_count: 4 },
          { table_name: 'language', column_count: 2 },
        ],
        total: 3,
      });
    });

    it('GET /tables/:table_name describes a table', async () => {
      const response = await fastify.inject({ method: 'GET', url: '/tables/actor' });
      expect(response.statusCode).toBe(200);
      expect(response.json().primary_keys).toEqual(['actor_id']);
    });

    it('GET /tables/:table_name returns 404 for unknown tables', async () => {
      const response = await fastify.inject({ method: 'GET', url: '/tables/nope' });
      expect(response.statusCode).toBe(404);
      expect(response.json()).toEqual({ error: 'Table not found' });
    });

    it('GET /schema returns the schema context', async () => {
      const response = await fastify.inject({ method: 'GET', url: '/schema' });
      expect(response.json()).toEqual({ ddl: SCHEMA });
    });
  });

  describe('utility', () => {
    it('GET /health reports ok when SELECT 1 succeeds', async () => {
      const response = await fastify.inject({ method: 'GET', url: '/health' });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({ status: 'ok', database: { client: 'pg', connected: true } });
      expect(execute).toHaveBeenCalledWith('SELECT 1');
    });

    it('GET /health returns 503 when the database is unreachable', async () => {
      execute.mockResolvedValueOnce(FAILED_RESULT);

      const response = await fastify.inject({ method: 'GET', url: '/health' });

      expect(response.statusCode).toBe(503);
      expect(response.json().database.error).toBe('connection refused');
    });

    it('GET /examples lists sample inputs', async () => {
      const response = await fastify.inject({ method: 'GET', url: '/examples' });
      const body = response.json();
      expect(body.natural_language_examples).toContain('How many actors are in the database?');
      expect(body.direct_sql_examples[0]).toBe('SELECT COUNT(*) AS count FROM actor;');
    });

    it('GET / describes the service', async () => {
      const response = await fastify.inject({ method: 'GET', url: '/' });
      expect(response.json().docs).toBe('/docs');
    });
  });

  it('maps an LLMError thrown outside the pipeline to 502', async () => {
    fastify.get('/boom', async () => {
      throw new LLMError('provider down', ['Retry later']);
    });

    const response = await fastify.inject({ method: 'GET', url: '/boom' });

    expect(response.statusCode).toBe(502);
    expect(response.json()).toEqual({
      error: 'LLMError',
      message: 'Language model service unavailable',
      suggestion: 'Retry later',
    });
  });
});
