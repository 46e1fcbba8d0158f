/**
 * Natural language to SQL generation.
 *
 * The generator is a strategy: the pipeline only sees `QueryGenerator`, and
 * the model transport behind it (Anthropic, OpenAI, Gemini, Bedrock, a test
 * stub) is chosen at construction time.
 */

import { z } from 'zod';
import type {
  ErrorCategory,
  GenerationRequest,
  GenerationResult,
  ValidationOutcome,
} from '../types/models.js';
import { errorMessage } from '../types/utils.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';
import type { LanguageModelClient } from './llm.js';
import { validateSql } from './validator.js';

export interface QueryGenerator {
  generate(request: GenerationRequest): Promise<GenerationResult>;
}

/**
 * Prompt for SQL generation. {schema}, {question} and {explanation_rule}
 * are substituted per request.
 */
const SQL_GENERATION_PROMPT = `You are an expert SQL query generator specialized in PostgreSQL.
You have complete knowledge of the database schema through the DDL below.

<schema>
{schema}
</schema>

<instructions>
- Produce exactly ONE PostgreSQL statement that answers the question
- Use only tables and columns that appear in the schema above
- Follow foreign key relationships when joining tables
- For database metadata questions use PostgreSQL system functions (e.g. current_database(), version())
- Do not wrap the SQL in markdown and do not add commentary around it
{explanation_rule}
</instructions>

<output_format>
Respond with a single JSON object and nothing else:
{output_example}
</output_format>

Question: {question}`;

const WITH_EXPLANATION_RULE =
  '- Add a short plain-English explanation of what the query does in the "explanation" field';
const WITHOUT_EXPLANATION_RULE = '- Do not include an explanation';

const WITH_EXPLANATION_EXAMPLE = '{"sql": "SELECT ...", "explanation": "..."}';
const WITHOUT_EXPLANATION_EXAMPLE = '{"sql": "SELECT ..."}';

/**
 * Expected JSON shape of the model's answer.
 */
const ModelResponseSchema = z.object({
  sql: z.string(),
  explanation: z.string().nullish(),
});

export interface ParsedModelResponse {
  sql: string;
  explanation: string | null;
}

/**
 * Thrown when the model answer cannot be read as a SQL statement.
 */
export class MalformedModelResponseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MalformedModelResponseError';
    Object.setPrototypeOf(this, MalformedModelResponseError.prototype);
  }
}

/**
 * Build the single prompt sent to the model for one request.
 */
export function buildGenerationPrompt(request: GenerationRequest): string {
  return SQL_GENERATION_PROMPT.replace('{schema}', () => request.schema_context)
    .replace(
      '{explanation_rule}',
      request.want_explanation ? WITH_EXPLANATION_RULE : WITHOUT_EXPLANATION_RULE
    )
    .replace(
      '{output_example}',
      request.want_explanation ? WITH_EXPLANATION_EXAMPLE : WITHOUT_EXPLANATION_EXAMPLE
    )
    .replace('{question}', () => request.natural_language_text.trim());
}

/**
 * Remove a surrounding markdown code fence (```json, ```sql or bare ```).
 */
export function stripCodeFences(text: string): string {
  return text
    .trim()
    .replace(/^```[a-zA-Z]*\s*\n?/, '')
    .replace(/\n?```$/, '')
    .trim();
}

/**
 * Read the model's answer.
 *
 * JSON answers must match `{ sql, explanation? }`. Plain-text answers are
 * accepted as the SQL itself, with an optional trailing "EXPLANATION:" part.
 *
 * @throws MalformedModelResponseError for empty or unreadable answers
 */
export function parseModelResponse(text: string): ParsedModelResponse {
  const cleaned = stripCodeFences(text);
  if (!cleaned) {
    throw new MalformedModelResponseError('Model returned an empty response');
  }

  if (cleaned.startsWith('{')) {
    let raw: unknown;
    try {
      raw = JSON.parse(cleaned);
    } catch (error) {
      throw new MalformedModelResponseError(
        `Model response is not valid JSON: ${errorMessage(error)}`
      );
    }

    const parsed = ModelResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new MalformedModelResponseError(
        `Model response does not match the expected shape: ${parsed.error.issues
          .map((issue) => `${issue.path.join('.') || '(root)'} ${issue.message}`)
          .join('; ')}`
      );
    }

    return {
      sql: stripCodeFences(parsed.data.sql),
      explanation: parsed.data.explanation?.trim() || null,
    };
  }

  const marker = cleaned.indexOf('EXPLANATION:');
  if (marker === -1) {
    return { sql: cleaned, explanation: null };
  }
  return {
    sql: stripCodeFences(cleaned.slice(0, marker)),
    explanation: cleaned.slice(marker + 'EXPLANATION:'.length).trim() || null,
  };
}

function failedGeneration(
  category: ErrorCategory,
  message: string,
  sqlText = ''
): GenerationResult {
  return {
    sql_text: sqlText,
    explanation: null,
    is_valid: false,
    validation_message: message,
    category,
  };
}

/**
 * Generator backed by a language model client.
 */
export class ModelQueryGenerator implements QueryGenerator {
  constructor(
    private readonly model: LanguageModelClient,
    private readonly validate: (sql: string) => ValidationOutcome = validateSql,
    private readonly log: Logger = defaultLogger
  ) {}

  /**
   * Generate one SQL statement for a natural language question.
   * Never throws: every failure comes back as an invalid result.
   */
  async generate(request: GenerationRequest): Promise<GenerationResult> {
    if (!request.natural_language_text.trim()) {
      return failedGeneration('EMPTY_INPUT', 'Natural language query cannot be empty');
    }

    let parsed: ParsedModelResponse;
    try {
      const responseText = await this.model.complete(buildGenerationPrompt(request));
      parsed = parseModelResponse(responseText);
    } catch (error) {
      this.log.error(`SQL generation failed: ${errorMessage(error)}`);
      return failedGeneration('MODEL_FAILURE', `SQL generation failed: ${errorMessage(error)}`);
    }

    this.log.info(`Generated SQL: ${parsed.sql}`);

    const outcome = this.validate(parsed.sql);
    const explanation = request.want_explanation ? parsed.explanation : null;

    if (!outcome.passed) {
      this.log.warn(`Generated SQL rejected (${outcome.category}): ${outcome.reason}`);
      return {
        ...failedGeneration(outcome.category, outcome.reason, parsed.sql),
        explanation,
      };
    }

    return {
      sql_text: parsed.sql,
      explanation,
      is_valid: true,
      validation_message: 'Basic syntax validation passed',
      category: null,
    };
  }
}
