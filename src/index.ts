/**
 * NL2SQL Server - Main Entry Point
 */

import { loadConfig, loadDotenv } from './config.js';
import { startServer } from './server.js';
import { ConfigurationError, SchemaLoadError } from './types/errors.js';
import { logger } from './utils/logger.js';

loadDotenv();

try {
  await startServer(loadConfig());
} catch (err) {
  if (err instanceof ConfigurationError || err instanceof SchemaLoadError) {
    logger.fatal(err.message);
  } else {
    logger.fatal({ err }, 'Failed to start server');
  }
  process.exit(1);
}
