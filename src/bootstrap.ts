/**
 * Wires configuration into a ready-to-use runtime: database pool, schema
 * context, model client and pipeline. Shared by the server and the CLI.
 */

import { SchemaInspector } from 'knex-schema-inspector';
import type { Config } from './config.js';
import { TableCatalog } from './services/catalog.js';
import { createKnex, KnexDatabase } from './services/database.js';
import { QueryExecutor } from './services/executor.js';
import { ModelQueryGenerator } from './services/generator.js';
import { AiSdkModelClient } from './services/llm.js';
import { createPipeline, type QueryPipeline } from './services/pipeline.js';
import {
  DatabaseSchemaContextProvider,
  FileSchemaContextProvider,
  loadSchemaContext,
  type SchemaContextProvider,
  type SchemaInspectorLike,
} from './services/schema-context.js';
import { logger } from './utils/logger.js';

export interface Runtime {
  pipeline: QueryPipeline;
  catalog: TableCatalog;
  databaseClient: string;
  close(): Promise<void>;
}

function databaseClientName(config: Config): string {
  return typeof config.KNEX_CONFIG.client === 'string' ? config.KNEX_CONFIG.client : 'custom';
}

/**
 * Build the runtime. The schema context is loaded exactly once here.
 *
 * @throws SchemaLoadError when the schema context cannot be loaded
 */
export async function createRuntime(config: Config): Promise<Runtime> {
  const db = createKnex(config.KNEX_CONFIG);
  const database = new KnexDatabase(db);
  const inspector: SchemaInspectorLike = SchemaInspector(db);
  const clientName = databaseClientName(config);

  const provider: SchemaContextProvider =
    config.SCHEMA_SOURCE === 'database'
      ? new DatabaseSchemaContextProvider(inspector, clientName)
      : new FileSchemaContextProvider(config.SCHEMA_DDL_PATH);

  let schemaContext: string;
  try {
    schemaContext = await loadSchemaContext(provider);
  } catch (error) {
    await database.close();
    throw error;
  }

  const model = new AiSdkModelClient(config.LLM_CONFIG);
  const pipeline = createPipeline({
    schemaContext,
    generator: new ModelQueryGenerator(model),
    executor: new QueryExecutor(database),
  });

  logger.info(
    `Pipeline ready (${config.LLM_CONFIG.provider}/${config.LLM_CONFIG.model}, ${clientName})`
  );

  return {
    pipeline,
    catalog: new TableCatalog(inspector),
    databaseClient: clientName,
    close: () => database.close(),
  };
}
