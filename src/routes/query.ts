/**
 * Query endpoints for natural language database queries.
 */

import type { FastifyInstance } from 'fastify';
import type { QueryPipeline } from '../services/pipeline.js';
import { QueryRequestSchema, type QueryRequest, type ResultShape } from '../types/models.js';
import { statusForCategory, statusForPayload } from './status.js';

export interface QueryRouteOptions {
  pipeline: QueryPipeline;
  maxQueryLength: number;
}

export async function queryRoutes(fastify: FastifyInstance, opts: QueryRouteOptions) {
  const { pipeline, maxQueryLength } = opts;

  const QueryBodySchema = {
    type: 'object',
    properties: {
      query: { type: 'string', maxLength: maxQueryLength },
      include_explanation: { type: 'boolean', default: false },
      shape: { type: 'string', enum: ['objects', 'tuples'], default: 'objects' },
    },
    required: ['query'],
  };

  // POST /query - Main query endpoint
  fastify.post<{ Body: QueryRequest }>(
    '/query',
    {
      schema: {
        description: 'Translate a natural language question to SQL and run it',
        tags: ['Query'],
        body: QueryBodySchema,
      },
    },
    async (request, reply) => {
      const body = QueryRequestSchema.parse(request.body);
      const response = await pipeline.run(body.query, {
        includeExplanation: body.include_explanation,
        shape: body.shape,
      });
      reply.status(statusForPayload(response.result));
      return response;
    }
  );

  // GET /query - Convenience endpoint
  fastify.get<{ Querystring: { q: string; shape?: ResultShape } }>(
    '/query',
    {
      schema: {
        description: 'Translate and run a natural language question (GET)',
        tags: ['Query'],
        querystring: {
          type: 'object',
          properties: {
            q: { type: 'string', maxLength: maxQueryLength },
            shape: { type: 'string', enum: ['objects', 'tuples'] },
          },
          required: ['q'],
        },
      },
    },
    async (request, reply) => {
      const response = await pipeline.run(request.query.q, { shape: request.query.shape });
      reply.status(statusForPayload(response.result));
      return response;
    }
  );

  // POST /generate - SQL generation only, nothing is executed
  fastify.post<{ Body: QueryRequest }>(
    '/generate',
    {
      schema: {
        description: 'Generate SQL for a question without executing it',
        tags: ['Query'],
        body: QueryBodySchema,
      },
    },
    async (request, reply) => {
      const body = QueryRequestSchema.parse(request.body);
      const generation = await pipeline.generate(body.query, body.include_explanation);
      reply.status(statusForCategory(generation.category));
      return generation;
    }
  );

  // POST /explain - Generate and validate, with an explanation by default
  fastify.post<{ Body: QueryRequest }>(
    '/explain',
    {
      schema: {
        description: 'Generate and validate SQL for a question without executing it',
        tags: ['Query'],
        body: {
          ...QueryBodySchema,
          properties: {
            ...QueryBodySchema.properties,
            include_explanation: { type: 'boolean', default: true },
          },
        },
      },
    },
    async (request, reply) => {
      const body = QueryRequestSchema.parse(request.body);
      const response = await pipeline.explain(body.query, body.include_explanation);
      reply.status(statusForCategory(response.generation.category));
      return response;
    }
  );
}
