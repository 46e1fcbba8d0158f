/**
 * Fastify server factory.
 */

import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import { ZodError } from 'zod';
import { createRuntime } from './bootstrap.js';
import type { Config } from './config.js';
import type { TableCatalog } from './services/catalog.js';
import type { QueryPipeline } from './services/pipeline.js';
import { LLMError, SchemaLoadError } from './types/errors.js';
import { applyLogLevel, buildLoggerOptions, logger, loggerConfig } from './utils/logger.js';
import { queryRoutes } from './routes/query.js';
import { schemaRoutes } from './routes/schemas.js';
import { sqlRoutes } from './routes/sql.js';
import { utilityRoutes } from './routes/utility.js';

export interface ServerDependencies {
  pipeline: QueryPipeline;
  catalog: TableCatalog;
  databaseClient: string;
  maxQueryLength: number;
  logLevel?: string;
}

/**
 * Create and configure the Fastify server. Nothing is listening yet.
 */
export async function buildServer(deps: ServerDependencies): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: deps.logLevel ? buildLoggerOptions(deps.logLevel) : loggerConfig,
  });

  await fastify.register(cors, {
    origin: '*',
  });

  await fastify.register(swagger, {
    openapi: {
      info: {
        title: 'NL2SQL API',
        description: 'Query the DVD rental database with natural language',
        version: '1.0.0',
      },
    },
  });

  await fastify.register(swaggerUi, {
    routePrefix: '/docs',
  });

  /**
   * Errors thrown outside the pipeline. Pipeline failures are regular
   * error-shaped responses and never reach this handler. Set before the
   * routes are registered so their contexts inherit it.
   */
  fastify.setErrorHandler((error, _request, reply) => {
    if (error.validation) {
      reply.status(400).send({
        error: 'ValidationError',
        message: error.message,
      });
    } else if (error instanceof ZodError) {
      reply.status(400).send({
        error: 'ValidationError',
        message: error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; '),
      });
    } else if (error instanceof LLMError) {
      reply.status(502).send({
        error: 'LLMError',
        message: 'Language model service unavailable',
        suggestion: error.suggestions[0],
      });
    } else if (error instanceof SchemaLoadError) {
      reply.status(500).send({
        error: 'SchemaLoadError',
        message: error.message,
      });
    } else {
      reply.log.error(error);
      reply.status(error.statusCode ?? 500).send({
        error: 'InternalServerError',
        message: error.message || 'An unexpected error occurred',
      });
    }
  });

  await fastify.register(queryRoutes, {
    pipeline: deps.pipeline,
    maxQueryLength: deps.maxQueryLength,
  });
  await fastify.register(sqlRoutes, { pipeline: deps.pipeline });
  await fastify.register(schemaRoutes, {
    catalog: deps.catalog,
    schemaContext: deps.pipeline.schemaContext,
  });
  await fastify.register(utilityRoutes, {
    pipeline: deps.pipeline,
    databaseClient: deps.databaseClient,
  });

  return fastify;
}

/**
 * Build the runtime and the server, then start listening.
 * SIGINT and SIGTERM close the server and the connection pool.
 */
export async function startServer(config: Config): Promise<FastifyInstance> {
  applyLogLevel(config.LOG_LEVEL);
  const runtime = await createRuntime(config);
  const fastify = await buildServer({
    pipeline: runtime.pipeline,
    catalog: runtime.catalog,
    databaseClient: runtime.databaseClient,
    maxQueryLength: config.MAX_QUERY_LENGTH,
    logLevel: config.LOG_LEVEL,
  });

  fastify.addHook('onClose', async () => {
    logger.info('Shutting down NL2SQL API server...');
    await runtime.close();
  });

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      fastify.close().then(
        () => process.exit(0),
        (err: unknown) => {
          logger.error({ err }, 'Error during shutdown');
          process.exit(1);
        }
      );
    });
  }

  await fastify.listen({ port: config.PORT, host: config.HOST });
  logger.info(`Server running at http://localhost:${config.PORT}`);
  logger.info(`API docs at http://localhost:${config.PORT}/docs`);
  return fastify;
}
