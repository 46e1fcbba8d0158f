/**
 * Custom error classes.
 *
 * Pipeline stages never throw past their own boundary: these classes cover the
 * collaborators underneath them (model transport) and start-up failures.
 */

function formatSuggestions(message: string, suggestions: string[]): string {
  return `${message}\n\nSuggested fixes:\n${suggestions.map((s) => `  • ${s}`).join('\n')}`;
}

/**
 * Error thrown when a language model call fails.
 *
 * Common causes:
 * - Invalid or expired API key
 * - Rate limit or quota exceeded
 * - Network connectivity issues or provider outage
 *
 * The query generator converts this into a MODEL_FAILURE result.
 */
export class LLMError extends Error {
  public readonly suggestions: string[];

  constructor(message: string, suggestions?: string[]) {
    const suggestionList = suggestions ?? LLMError.getDefaultSuggestions();
    super(formatSuggestions(message, suggestionList));
    this.name = 'LLMError';
    this.suggestions = suggestionList;
    Object.setPrototypeOf(this, LLMError.prototype);
  }

  private static getDefaultSuggestions(): string[] {
    return [
      'Verify API key is correct (check ANTHROPIC_API_KEY, OPENAI_API_KEY, GOOGLE_API_KEY or AWS credentials)',
      'Check API quota and rate limits with your provider',
      'Ensure network connectivity to the LLM provider',
    ];
  }
}

/**
 * Error thrown when the schema context cannot be loaded at start-up.
 *
 * Nothing downstream can produce correct SQL without the schema, so this
 * aborts process initialization.
 */
export class SchemaLoadError extends Error {
  public readonly suggestions: string[];

  constructor(message: string, suggestions?: string[]) {
    const suggestionList = suggestions ?? SchemaLoadError.getDefaultSuggestions();
    super(formatSuggestions(message, suggestionList));
    this.name = 'SchemaLoadError';
    this.suggestions = suggestionList;
    Object.setPrototypeOf(this, SchemaLoadError.prototype);
  }

  private static getDefaultSuggestions(): string[] {
    return [
      'Check SCHEMA_DDL_PATH points at a readable, non-empty .sql file',
      'With SCHEMA_SOURCE=database, verify DATABASE_URL and that the user can read information_schema',
    ];
  }
}

/**
 * Error thrown when environment configuration is invalid.
 */
export class ConfigurationError extends Error {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super(`Configuration validation failed:\n${issues.map((i) => `  - ${i}`).join('\n')}`);
    this.name = 'ConfigurationError';
    this.issues = issues;
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}
