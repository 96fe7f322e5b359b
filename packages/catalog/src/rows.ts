import { isJsonObject, type JsonObject, parseJsonColumn } from "@sourcedeck/core";
import type { ConfigField, ConfigType } from "./entities";
import { CatalogError, toCause } from "./errors";

/** A result row as returned by pg or mysql2 */
export type Row = Record<string, unknown>;

function malformed(column: string, expected: string): CatalogError {
	return new CatalogError(`Column "${column}" is not ${expected}`, "INTERNAL");
}

export function readString(row: Row, column: string): string {
	const value = row[column];
	if (typeof value !== "string") throw malformed(column, "a string");
	return value;
}

export function readOptionalString(row: Row, column: string): string | undefined {
	const value = row[column];
	if (value === null || value === undefined) return undefined;
	if (typeof value !== "string") throw malformed(column, "a string");
	return value;
}

/** Integer ids; BIGINT columns arrive from pg as decimal strings. */
export function readInteger(row: Row, column: string): number {
	const value = row[column];
	const parsed = typeof value === "string" && /^-?\d+$/.test(value) ? Number(value) : value;
	if (typeof parsed !== "number" || !Number.isSafeInteger(parsed)) {
		throw malformed(column, "an integer");
	}
	return parsed;
}

/** Booleans; MySQL BOOLEAN is TINYINT(1) and arrives as 0 or 1. */
export function readBoolean(row: Row, column: string): boolean {
	const value = row[column];
	if (typeof value === "boolean") return value;
	if (value === 0 || value === 1) return value === 1;
	if (value === null || value === undefined) return false;
	throw malformed(column, "a boolean");
}

export function readJsonObject(row: Row, column: string): JsonObject | undefined {
	let value: unknown;
	try {
		value = parseJsonColumn(row[column]);
	} catch (error) {
		throw new CatalogError(`Column "${column}" is not valid JSON`, "INTERNAL", toCause(error));
	}
	if (value === undefined) return undefined;
	if (!isJsonObject(value)) throw malformed(column, "a JSON object");
	return value;
}

/** Read a JSON array of row objects, such as the output of `json_agg`. */
export function readRowArray(row: Row, column: string): Row[] {
	let value: unknown;
	try {
		value = parseJsonColumn(row[column]);
	} catch (error) {
		throw new CatalogError(`Column "${column}" is not valid JSON`, "INTERNAL", toCause(error));
	}
	if (value === undefined) return [];
	if (!Array.isArray(value)) throw malformed(column, "a JSON array");
	return value.map((item) => {
		if (!isJsonObject(item)) throw malformed(column, "an array of objects");
		return item;
	});
}

export function rowToConfigType(row: Row): ConfigType {
	return {
		id: readInteger(row, "id"),
		key: readString(row, "config_key"),
		displayName: readString(row, "display_name"),
		icon: readOptionalString(row, "icon"),
		color: readOptionalString(row, "color"),
		driver: readOptionalString(row, "driver"),
		defaultPort: readOptionalString(row, "default_port"),
		connectionTemplate: readOptionalString(row, "connection_template"),
		extraProperties: readJsonObject(row, "extra_properties"),
	};
}

export function rowToConfigField(row: Row): ConfigField {
	return {
		id: readInteger(row, "id"),
		configTypeId: readInteger(row, "config_type_id"),
		name: readString(row, "name"),
		label: readString(row, "label"),
		fieldType: readString(row, "field_type"),
		isRequired: readBoolean(row, "is_required"),
		defaultValue: readOptionalString(row, "default_value"),
		attributes: readJsonObject(row, "attributes"),
	};
}
