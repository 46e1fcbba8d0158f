/**
 * Core type utilities.
 * These types replace 'any' usage for data crossing the database and HTTP boundaries.
 */

/**
 * Primitive JSON values.
 */
export type JsonPrimitive = string | number | boolean | null;

/**
 * Recursive JSON value type.
 * Replaces 'any' for data that must be serializable.
 */
export type JsonValue = JsonPrimitive | JsonObject | JsonArray;

/**
 * JSON object type - strictly typed alternative to Record<string, any>
 */
export interface JsonObject {
	[key: string]: JsonValue;
}

/**
 * JSON array type
 */
export interface JsonArray extends Array<JsonValue> {}

/**
 * One database result row as returned by the driver, before normalization.
 * Key order follows the statement's projection.
 */
export type RowMapping = Record<string, unknown>;

/**
 * Narrows an unknown driver value to a plain keyed object.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Extracts a readable message from anything thrown.
 */
export function errorMessage(error: unknown): string {
	if (error instanceof Error) {
		return error.message;
	}
	return String(error);
}
