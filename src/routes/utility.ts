/**
 * Utility endpoints (service info, health, examples).
 */

import type { FastifyInstance } from 'fastify';
import type { QueryPipeline } from '../services/pipeline.js';

export interface UtilityRouteOptions {
  pipeline: QueryPipeline;
  databaseClient: string;
}

const NATURAL_LANGUAGE_EXAMPLES = [
  'How many actors are in the database?',
  'What are the five film categories with the most films?',
  'Which customers live in Canada?',
  'What is the average rental duration of a film?',
  'Which actor has appeared in the most films?',
  'Which films have the highest rental rate?',
  'How many rentals did each store process?',
];

const DIRECT_SQL_EXAMPLES = [
  'SELECT COUNT(*) AS count FROM actor;',
  'SELECT c.name, COUNT(*) AS film_count FROM category c JOIN film_category fc ON c.category_id = fc.category_id GROUP BY c.name ORDER BY film_count DESC LIMIT 5;',
  'SELECT title, rental_rate FROM film ORDER BY rental_rate DESC, title LIMIT 10;',
];

export async function utilityRoutes(fastify: FastifyInstance, opts: UtilityRouteOptions) {
  const { pipeline, databaseClient } = opts;

  // GET / - Root endpoint
  fastify.get('/', async () => {
    return {
      name: 'NL2SQL API',
      version: '1.0.0',
      description: 'Ask questions about the DVD rental database in plain English',
      docs: '/docs',
      endpoints: {
        'GET /health': 'Database connectivity check',
        'POST /query': 'Translate a question to SQL, run it and return the rows',
        'GET /query?q=': 'Same as POST /query',
        'POST /generate': 'Translate a question to SQL without running it',
        'POST /explain': 'Generate, explain and validate SQL without running it',
        'POST /validate': 'Check a SQL statement without running it',
        'POST /execute': 'Validate and run a SQL statement',
        'GET /tables': 'List tables',
        'GET /tables/:table_name': 'Describe a table',
        'GET /schema': 'Schema DDL used for generation',
        'GET /examples': 'Sample questions and SQL',
      },
    };
  });

  // GET /health - Round trip through the executor
  fastify.get('/health', async (_request, reply) => {
    const probe = await pipeline.execute('SELECT 1');
    if (!probe.succeeded) {
      reply.status(503);
      return {
        status: 'unhealthy',
        database: { client: databaseClient, connected: false, error: probe.error_message },
      };
    }
    return {
      status: 'ok',
      database: { client: databaseClient, connected: true },
    };
  });

  // GET /examples - Sample inputs for /query and /execute
  fastify.get('/examples', async () => {
    return {
      natural_language_examples: NATURAL_LANGUAGE_EXAMPLES,
      direct_sql_examples: DIRECT_SQL_EXAMPLES,
    };
  });
}
