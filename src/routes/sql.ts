/**
 * Direct SQL endpoints. Validation always runs before execution.
 */

import type { FastifyInstance } from 'fastify';
import type { QueryPipeline } from '../services/pipeline.js';
import {
  SqlRequestSchema,
  ValidateRequestSchema,
  type SqlRequest,
  type ValidateRequest,
} from '../types/models.js';
import { statusForPayload } from './status.js';

export interface SqlRouteOptions {
  pipeline: QueryPipeline;
}

export async function sqlRoutes(fastify: FastifyInstance, opts: SqlRouteOptions) {
  const { pipeline } = opts;

  // POST /validate - Static check only
  fastify.post<{ Body: ValidateRequest }>(
    '/validate',
    {
      schema: {
        description: 'Check a SQL statement without running it',
        tags: ['SQL'],
        body: {
          type: 'object',
          properties: {
            sql: { type: 'string' },
          },
          required: ['sql'],
        },
      },
    },
    async (request) => {
      const body = ValidateRequestSchema.parse(request.body);
      return pipeline.validate(body.sql);
    }
  );

  // POST /execute - Validate, execute and normalize
  fastify.post<{ Body: SqlRequest }>(
    '/execute',
    {
      schema: {
        description: 'Validate and execute a SQL statement',
        tags: ['SQL'],
        body: {
          type: 'object',
          properties: {
            sql: { type: 'string' },
            description: { type: 'string' },
            shape: { type: 'string', enum: ['objects', 'tuples'], default: 'objects' },
          },
          required: ['sql'],
        },
      },
    },
    async (request, reply) => {
      const body = SqlRequestSchema.parse(request.body);
      if (body.description) {
        request.log.info(`Executing SQL: ${body.description}`);
      }
      const response = await pipeline.executeSql(body.sql, { shape: body.shape });
      reply.status(statusForPayload(response.result));
      return response;
    }
  );
}
