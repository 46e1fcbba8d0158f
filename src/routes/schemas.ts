/**
 * Schema and catalog endpoints.
 */

import type { FastifyInstance } from 'fastify';
import type { TableCatalog } from '../services/catalog.js';
import type { SchemaContext } from '../types/models.js';

export interface SchemaRouteOptions {
  catalog: TableCatalog;
  schemaContext: SchemaContext;
}

export async function schemaRoutes(fastify: FastifyInstance, opts: SchemaRouteOptions) {
  const { catalog, schemaContext } = opts;

  // GET /tables - List all tables
  fastify.get(
    '/tables',
    {
      schema: {
        description: 'List database tables',
        tags: ['Schema'],
        response: {
          200: {
            type: 'object',
            properties: {
              tables: {
                type: 'array',
                items: {
                  type: 'object',
                  properties: {
                    table_name: { type: 'string' },
                    column_count: { type: 'number' },
                  },
                },
              },
              total: { type: 'number' },
            },
          },
        },
      },
    },
    async () => {
      const tables = await catalog.listTables();
      return { tables, total: tables.length };
    }
  );

  // GET /tables/:table_name - Describe one table
  fastify.get<{ Params: { table_name: string } }>(
    '/tables/:table_name',
    {
      schema: {
        description: 'Get columns, primary keys and foreign keys of a table',
        tags: ['Schema'],
        params: {
          type: 'object',
          properties: {
            table_name: { type: 'string', description: 'Table name' },
          },
          required: ['table_name'],
        },
        response: {
          404: {
            type: 'object',
            properties: {
              error: { type: 'string' },
            },
          },
        },
      },
    },
    async (request, reply) => {
      const table = await catalog.describeTable(request.params.table_name);
      if (!table) {
        reply.status(404).send({ error: 'Table not found' });
        return;
      }
      return table;
    }
  );

  // GET /schema - The DDL the generator is grounded on
  fastify.get(
    '/schema',
    {
      schema: {
        description: 'Schema context used for SQL generation',
        tags: ['Schema'],
        response: {
          200: {
            type: 'object',
            properties: {
              ddl: { type: 'string' },
            },
          },
        },
      },
    },
    async () => ({ ddl: schemaContext })
  );
}
