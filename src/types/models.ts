/**
 * Type definitions and Zod schemas for the query pipeline.
 * Wire-facing field names are snake_case.
 */

import { z } from 'zod';
import type { JsonObject, JsonValue, RowMapping } from './utils.js';

// ============================================================================
// ERROR TAXONOMY
// ============================================================================

export const ERROR_CATEGORIES = [
	'EMPTY_INPUT',
	'SYNTAX',
	'DESTRUCTIVE_OPERATION',
	'MODEL_FAILURE',
	'DATABASE_FAILURE',
] as const;

/**
 * Machine-checkable failure category shared by every stage.
 */
export type ErrorCategory = (typeof ERROR_CATEGORIES)[number];

/**
 * The subset of categories the static validator can produce.
 */
export type ValidationCategory = Extract<
	ErrorCategory,
	'EMPTY_INPUT' | 'SYNTAX' | 'DESTRUCTIVE_OPERATION'
>;

// ============================================================================
// PIPELINE VALUE OBJECTS
// ============================================================================

/**
 * DDL text grounding SQL generation. Loaded once, never mutated.
 */
export type SchemaContext = string;

export interface GenerationRequest {
	natural_language_text: string;
	schema_context: SchemaContext;
	want_explanation: boolean;
}

/**
 * Output of the query generator.
 * `sql_text` is non-empty whenever `is_valid` is true.
 */
export interface GenerationResult {
	sql_text: string;
	explanation: string | null;
	is_valid: boolean;
	validation_message: string | null;
	category: ErrorCategory | null;
}

/**
 * Outcome of the static pre-execution check.
 * `reason` and `category` are null exactly when `passed` is true.
 */
export type ValidationOutcome =
	| { passed: true; reason: null; category: null }
	| { passed: false; reason: string; category: ValidationCategory };

export type StatementKind = 'rows' | 'mutation';

export interface ExecutionResult {
	/** Null when the statement failed or was a mutation. */
	rows: RowMapping[] | null;
	succeeded: boolean;
	error_message: string | null;
	rows_affected: number | null;
	duration_ms: number | null;
	columns: string[] | null;
	statement_kind: StatementKind | null;
	category: ErrorCategory | null;
}

/**
 * Row layout of a normalized payload.
 */
export type ResultShape = 'objects' | 'tuples';

export interface NormalizeOptions {
	shape?: ResultShape;
}

export type NormalizedRow = JsonObject | JsonValue[];

export interface RowsPayload {
	status: 'rows';
	columns: string[];
	rows: NormalizedRow[];
	row_count: number;
}

/**
 * Zero matching rows. Distinct from a failure.
 */
export interface EmptyPayload {
	status: 'empty';
	columns: string[];
	rows: [];
	row_count: 0;
	message: string;
}

export interface MutationPayload {
	status: 'mutation';
	rows_affected: number;
	message: string;
}

export interface ErrorPayload {
	status: 'error';
	error_message: string;
	category: ErrorCategory;
}

export type NormalizedPayload =
	| RowsPayload
	| EmptyPayload
	| MutationPayload
	| ErrorPayload;

/**
 * Full round trip for one natural-language question.
 * Stages that never ran are null.
 */
export interface PipelineResponse {
	natural_query: string;
	generation: GenerationResult;
	validation: ValidationOutcome | null;
	execution: ExecutionResult | null;
	result: NormalizedPayload;
}

/**
 * Direct SQL round trip (validation gates execution).
 */
export interface SqlExecutionResponse {
	validation: ValidationOutcome;
	execution: ExecutionResult | null;
	result: NormalizedPayload;
}

export interface ExplainResponse {
	natural_query: string;
	generation: GenerationResult;
	validation: ValidationOutcome | null;
}

// ============================================================================
// REQUEST SCHEMAS
// ============================================================================

const ResultShapeSchema = z.enum(['objects', 'tuples']);

/**
 * Request model for natural language queries.
 */
export const QueryRequestSchema = z.object({
	query: z.string().describe('Natural language query'),
	include_explanation: z
		.boolean()
		.default(false)
		.describe('Ask the model for a short explanation of the SQL'),
	shape: ResultShapeSchema.default('objects').describe('Row layout of the result'),
});
export type QueryRequest = z.input<typeof QueryRequestSchema>;

/**
 * Request model for direct SQL execution.
 */
export const SqlRequestSchema = z.object({
	sql: z.string().describe('SQL statement to validate and execute'),
	description: z.string().optional().describe('Free-form note, logged only'),
	shape: ResultShapeSchema.default('objects'),
});
export type SqlRequest = z.input<typeof SqlRequestSchema>;

export const ValidateRequestSchema = z.object({
	sql: z.string().describe('SQL statement to check'),
});
export type ValidateRequest = z.infer<typeof ValidateRequestSchema>;

// ============================================================================
// CATALOG
// ============================================================================

export interface TableSummary {
	table_name: string;
	column_count: number;
}

export interface ColumnDescription {
	column_name: string;
	data_type: string;
	is_nullable: boolean;
	default_value: string | number | boolean | null;
	max_length: number | null;
}

export interface ForeignKeyDescription {
	column_name: string;
	foreign_table_name: string;
	foreign_column_name: string;
}

export interface TableDescription {
	table_name: string;
	columns: ColumnDescription[];
	primary_keys: string[];
	foreign_keys: ForeignKeyDescription[];
}
