/**
 * Configuration management using Zod for validation.
 */

import { z } from 'zod';
import dotenv from 'dotenv';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import { existsSync } from 'fs';
import type { Knex } from 'knex';
import { ConfigurationError } from './types/errors.js';

// Get directory name in ES modules
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
export const rootDir = join(__dirname, '..');

/**
 * Load the .env file at the project root, if present.
 */
export function loadDotenv(): void {
  const envPath = join(rootDir, '.env');
  if (existsSync(envPath)) {
    dotenv.config({ path: envPath });
  }
}

export const LLM_PROVIDERS = ['anthropic', 'openai', 'google', 'bedrock'] as const;
export type LLMProvider = (typeof LLM_PROVIDERS)[number];

const DEFAULT_MODELS: Record<LLMProvider, string> = {
  anthropic: 'claude-sonnet-4-5-20250929',
  openai: 'gpt-4o',
  google: 'gemini-2.5-flash',
  bedrock: 'amazon.titan-text-express-v1',
};

/**
 * Configuration schema with validation and defaults.
 */
const ConfigSchema = z.object({
  // LLM Provider Configuration
  LLM_PROVIDER: z.enum(LLM_PROVIDERS).default('anthropic'),
  LLM_MODEL: z.string().optional(),
  LLM_MAX_TOKENS: z.coerce.number().int().positive().default(2048),

  // API Keys (provider-specific)
  ANTHROPIC_API_KEY: z.string().optional(),
  OPENAI_API_KEY: z.string().optional(),
  GOOGLE_API_KEY: z.string().optional(),
  AWS_REGION: z.string().default('us-east-1'),
  AWS_ACCESS_KEY_ID: z.string().optional(),
  AWS_SECRET_ACCESS_KEY: z.string().optional(),

  // Database Configuration
  DATABASE_TYPE: z.enum(['pg', 'sqlite3']).default('pg'),
  DATABASE_URL: z.string().optional(),
  DATABASE_PATH: z.string().optional(),

  // Schema context
  SCHEMA_SOURCE: z.enum(['file', 'database']).default('file'),
  SCHEMA_DDL_PATH: z.string().default(join(rootDir, 'schema', 'dvdrental.sql')),

  // Server Configuration
  LOG_LEVEL: z
    .enum(['DEBUG', 'INFO', 'WARN', 'ERROR', 'FATAL'])
    .default('INFO'),
  PORT: z.coerce.number().int().positive().default(8000),
  HOST: z.string().default('0.0.0.0'),
  MAX_QUERY_LENGTH: z.coerce.number().int().positive().default(500),
});

type BaseConfig = z.infer<typeof ConfigSchema>;

export interface LLMConfig {
  provider: LLMProvider;
  model: string;
  maxTokens: number;
  apiKey?: string;
  region?: string;
  accessKeyId?: string;
  secretAccessKey?: string;
}

/**
 * Resolved configuration with KNEX_CONFIG and LLM_CONFIG built from the raw variables.
 */
export interface Config {
  LOG_LEVEL: BaseConfig['LOG_LEVEL'];
  PORT: number;
  HOST: string;
  MAX_QUERY_LENGTH: number;
  SCHEMA_SOURCE: BaseConfig['SCHEMA_SOURCE'];
  SCHEMA_DDL_PATH: string;
  KNEX_CONFIG: Knex.Config;
  LLM_CONFIG: LLMConfig;
}

function buildKnexConfig(base: BaseConfig, issues: string[]): Knex.Config {
  switch (base.DATABASE_TYPE) {
    case 'sqlite3':
      if (!base.DATABASE_PATH) {
        issues.push('DATABASE_PATH is required when DATABASE_TYPE is sqlite3');
      }
      return {
        client: 'better-sqlite3',
        connection: {
          filename: base.DATABASE_PATH ?? '',
        },
        useNullAsDefault: true,
      };

    case 'pg':
      if (!base.DATABASE_URL) {
        issues.push('DATABASE_URL is required when DATABASE_TYPE is pg');
      }
      return {
        client: 'pg',
        connection: base.DATABASE_URL ?? '',
        pool: { min: 2, max: 10 },
      };
  }
}

function buildLLMConfig(base: BaseConfig, issues: string[]): LLMConfig {
  const llmConfig: LLMConfig = {
    provider: base.LLM_PROVIDER,
    model: base.LLM_MODEL ?? DEFAULT_MODELS[base.LLM_PROVIDER],
    maxTokens: base.LLM_MAX_TOKENS,
  };

  switch (base.LLM_PROVIDER) {
    case 'anthropic':
      if (!base.ANTHROPIC_API_KEY) {
        issues.push('ANTHROPIC_API_KEY is required when LLM_PROVIDER is anthropic');
      }
      return { ...llmConfig, apiKey: base.ANTHROPIC_API_KEY };
    case 'openai':
      if (!base.OPENAI_API_KEY) {
        issues.push('OPENAI_API_KEY is required when LLM_PROVIDER is openai');
      }
      return { ...llmConfig, apiKey: base.OPENAI_API_KEY };
    case 'google':
      if (!base.GOOGLE_API_KEY) {
        issues.push('GOOGLE_API_KEY is required when LLM_PROVIDER is google');
      }
      return { ...llmConfig, apiKey: base.GOOGLE_API_KEY };
    case 'bedrock':
      // Bedrock falls back to the default AWS credential chain when keys are absent
      return {
        ...llmConfig,
        region: base.AWS_REGION,
        accessKeyId: base.AWS_ACCESS_KEY_ID,
        secretAccessKey: base.AWS_SECRET_ACCESS_KEY,
      };
  }
}

/**
 * Parse and validate configuration from environment variables.
 *
 * @throws ConfigurationError listing every problem found
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = ConfigSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const base = parsed.data;
  const issues: string[] = [];
  const knexConfig = buildKnexConfig(base, issues);
  const llmConfig = buildLLMConfig(base, issues);

  if (issues.length > 0) {
    throw new ConfigurationError(issues);
  }

  return {
    LOG_LEVEL: base.LOG_LEVEL,
    PORT: base.PORT,
    HOST: base.HOST,
    MAX_QUERY_LENGTH: base.MAX_QUERY_LENGTH,
    SCHEMA_SOURCE: base.SCHEMA_SOURCE,
    SCHEMA_DDL_PATH: base.SCHEMA_DDL_PATH,
    KNEX_CONFIG: knexConfig,
    LLM_CONFIG: llmConfig,
  };
}
