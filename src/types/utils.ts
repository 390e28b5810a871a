/**
 * Core type utilities for runsift.
 * These types replace 'any' usage and provide strict type safety.
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
 * Sort direction for query results.
 */
export type SortDirection = "asc" | "desc";

/**
 * Narrows a JSON value to a plain object.
 */
export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Recursively freezes a value so shared fixtures cannot be mutated.
 */
export function deepFreeze<T>(value: T): Readonly<T> {
	if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
		Object.freeze(value);
		for (const child of Object.values(value)) {
			deepFreeze(child);
		}
	}
	return value;
}
