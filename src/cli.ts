#!/usr/bin/env node
/**
 * nl2sql CLI
 * Ask questions, check and run SQL, and start the REST server.
 */

import { cac } from 'cac';
import { loadConfig, loadDotenv, type Config } from './config.js';
import { createRuntime, type Runtime } from './bootstrap.js';
import { startServer } from './server.js';
import { validateSql } from './services/validator.js';
import { ConfigurationError, SchemaLoadError } from './types/errors.js';
import { errorMessage } from './types/utils.js';
import { applyLogLevel } from './utils/logger.js';
import * as logger from './cli/logger.js';
import { parseOutputFormat, renderPayload } from './cli/render.js';

const cli = cac('nl2sql');

cli.version('1.0.0');
cli.help();

/**
 * Report a fatal error and exit.
 */
function fail(message: string, error: unknown): never {
  if (error instanceof ConfigurationError) {
    logger.error(message, error.issues.join('; '));
  } else if (error instanceof SchemaLoadError) {
    logger.error(message, error.suggestions[0]);
  } else {
    logger.error(message, errorMessage(error));
  }
  process.exit(1);
}

function readConfig(): Config {
  loadDotenv();
  let config: Config;
  try {
    config = loadConfig();
  } catch (error) {
    fail('Invalid configuration', error);
  }
  applyLogLevel(config.LOG_LEVEL);
  return config;
}

/**
 * Run work against a runtime that is always closed afterwards.
 */
async function withRuntime<T>(work: (runtime: Runtime) => Promise<T>): Promise<T> {
  const config = readConfig();
  let runtime: Runtime;
  try {
    runtime = await createRuntime(config);
  } catch (error) {
    fail('Failed to initialize', error);
  }
  try {
    return await work(runtime);
  } finally {
    await runtime.close();
  }
}

/**
 * nl2sql ask <question>
 * Generate, validate, execute and print the result
 */
cli
  .command('ask <question>', 'Answer a natural language question')
  .option('--explain', 'Ask the model to explain the SQL')
  .option('--format <format>', 'Output format: table or json', { default: 'table' })
  .action(async (question: string, options: { explain?: boolean; format?: string }) => {
    const format = parseOutputFormat(options.format);
    const succeeded = await withRuntime(async (runtime) => {
      const spin = logger.spinner('Generating SQL...');
      const response = await runtime.pipeline.run(question, {
        includeExplanation: options.explain ?? false,
      });
      spin.stop();

      if (response.generation.sql_text) {
        logger.section('Generated SQL');
        logger.code(response.generation.sql_text, 'sql');
      }
      if (response.generation.explanation) {
        logger.info(response.generation.explanation);
      }

      logger.section('Result');
      if (response.result.status === 'error') {
        logger.error(renderPayload(response.result, 'table'));
        return false;
      }
      logger.plain(renderPayload(response.result, format));
      if (response.execution?.duration_ms != null) {
        logger.newline();
        logger.success(`Done in ${response.execution.duration_ms.toFixed(1)}ms`);
      }
      return true;
    });

    if (!succeeded) process.exit(1);
  });

/**
 * nl2sql validate <sql>
 * Static check only, no configuration needed
 */
cli
  .command('validate <sql>', 'Check a SQL statement without running it')
  .action((sql: string) => {
    const outcome = validateSql(sql);
    if (outcome.passed) {
      logger.success('Statement passed validation');
      return;
    }
    logger.error(`${outcome.category}: ${outcome.reason}`);
    process.exit(1);
  });

/**
 * nl2sql exec <sql>
 * Validate then execute a statement
 */
cli
  .command('exec <sql>', 'Validate and execute a SQL statement')
  .option('--format <format>', 'Output format: table or json', { default: 'table' })
  .action(async (sql: string, options: { format?: string }) => {
    const format = parseOutputFormat(options.format);
    const succeeded = await withRuntime(async (runtime) => {
      const response = await runtime.pipeline.executeSql(sql);
      if (response.result.status === 'error') {
        logger.error(renderPayload(response.result, 'table'));
        return false;
      }
      logger.plain(renderPayload(response.result, format));
      return true;
    });

    if (!succeeded) process.exit(1);
  });

/**
 * nl2sql schema
 * Print the schema context the generator sees
 */
cli
  .command('schema', 'Print the schema DDL used for generation')
  .action(async () => {
    await withRuntime(async (runtime) => {
      logger.plain(runtime.pipeline.schemaContext);
    });
  });

/**
 * nl2sql serve
 * Start the REST server
 */
cli
  .command('serve', 'Start the REST API server')
  .option('-p, --port <port>', 'Server port')
  .action(async (options: { port?: number }) => {
    logger.printBanner();
    logger.newline();
    const config = readConfig();
    try {
      await startServer(options.port ? { ...config, PORT: Number(options.port) } : config);
    } catch (error) {
      fail('Failed to start server', error);
    }
  });

// Parse CLI arguments
cli.parse(process.argv, { run: false });

try {
  await cli.runMatchedCommand();
} catch (error) {
  fail('Command failed', error);
}
