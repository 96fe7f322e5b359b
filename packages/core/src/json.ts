// ---------------------------------------------------------------------------
// JSON documents: the value model of the opaque JSON columns
// ---------------------------------------------------------------------------

/** Any value that survives a JSON round trip unchanged. */
export type JsonValue = string | number | boolean | null | JsonValue[] | JsonObject;

/** A JSON object with string keys. */
export interface JsonObject {
	[key: string]: JsonValue;
}

function isPlainObject(value: object): boolean {
	const proto = Object.getPrototypeOf(value);
	return proto === Object.prototype || proto === null;
}

function check(value: unknown, ancestors: Set<object>): boolean {
	if (value === null) return true;
	switch (typeof value) {
		case "string":
		case "boolean":
			return true;
		case "number":
			return Number.isFinite(value);
		case "object": {
			if (ancestors.has(value)) return false;
			if (!Array.isArray(value) && !isPlainObject(value)) return false;
			ancestors.add(value);
			const items: unknown[] = Array.isArray(value) ? value : Object.values(value);
			const ok = items.every((item) => check(item, ancestors));
			ancestors.delete(value);
			return ok;
		}
		default:
			return false;
	}
}

/**
 * Check whether a value is representable as JSON without loss.
 *
 * Rejects `undefined`, functions, symbols, bigints, non-finite numbers,
 * class instances (Date, Map, ...) and cyclic structures.
 */
export function isJsonValue(value: unknown): value is JsonValue {
	return check(value, new Set());
}

/** Check whether a value is a JSON object (not an array, not null). */
export function isJsonObject(value: unknown): value is JsonObject {
	return (
		typeof value === "object" && value !== null && !Array.isArray(value) && isJsonValue(value)
	);
}

/**
 * Normalise a JSON column read back from a database driver.
 *
 * Drivers return JSON either already parsed (pg JSONB, mysql2 JSON) or as
 * text; `null` and `undefined` both mean the column is empty. Returns
 * `undefined` for an empty column and throws a `SyntaxError` for text that
 * is not JSON.
 */
export function parseJsonColumn(raw: unknown): JsonValue | undefined {
	if (raw === null || raw === undefined) return undefined;
	const value: unknown = typeof raw === "string" ? JSON.parse(raw) : raw;
	if (!isJsonValue(value)) {
		throw new TypeError("Column value is not a JSON document");
	}
	return value;
}
