/**
 * Logging configuration using Pino.
 */

import { pino, type LoggerOptions } from 'pino';

const isTest = process.env.NODE_ENV === 'test';

/**
 * Pino options shared by the standalone logger and Fastify's request logger.
 */
export function buildLoggerOptions(level: string = process.env.LOG_LEVEL ?? 'INFO'): LoggerOptions {
  return {
    level: isTest ? 'silent' : level.toLowerCase(),
    transport:
      process.env.NODE_ENV !== 'production' && !isTest
        ? {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'SYS:standard',
              ignore: 'pid,hostname',
            },
          }
        : undefined,
  };
}

export const loggerConfig = buildLoggerOptions();

/**
 * Global logger instance configured with environment settings.
 */
export const logger = pino(loggerConfig);

/**
 * Apply the configured level once configuration has been loaded.
 */
export function applyLogLevel(level: string): void {
  logger.level = isTest ? 'silent' : level.toLowerCase();
}

export type { Logger } from 'pino';
