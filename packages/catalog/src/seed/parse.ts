import { Err, isJsonObject, type JsonObject, Ok, type Result } from "@sourcedeck/core";
import type { ConfigTypeSeed, NewFieldInput } from "../entities";
import { CatalogError } from "../errors";

const TYPE_KEYS = new Set([
	"key",
	"displayName",
	"icon",
	"color",
	"driver",
	"defaultPort",
	"connectionTemplate",
	"extraProperties",
	"fields",
]);

const FIELD_KEYS = new Set([
	"name",
	"label",
	"fieldType",
	"isRequired",
	"defaultValue",
	"attributes",
]);

/** Thrown inside the parser and turned into an Err at its boundary */
class SeedShapeError extends Error {}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function rejectUnknownKeys(obj: Record<string, unknown>, allowed: Set<string>, path: string): void {
	for (const key of Object.keys(obj)) {
		if (!allowed.has(key)) throw new SeedShapeError(`${path}.${key} is not a known property`);
	}
}

function requiredString(obj: Record<string, unknown>, key: string, path: string): string {
	const value = obj[key];
	if (typeof value !== "string") throw new SeedShapeError(`${path}.${key} must be a string`);
	return value;
}

/** `null` and a missing property both mean "absent". */
function optionalString(
	obj: Record<string, unknown>,
	key: string,
	path: string,
): string | undefined {
	const value = obj[key];
	if (value === undefined || value === null) return undefined;
	if (typeof value !== "string") throw new SeedShapeError(`${path}.${key} must be a string`);
	return value;
}

function optionalObject(
	obj: Record<string, unknown>,
	key: string,
	path: string,
): JsonObject | undefined {
	const value = obj[key];
	if (value === undefined || value === null) return undefined;
	if (!isJsonObject(value)) throw new SeedShapeError(`${path}.${key} must be a JSON object`);
	return value;
}

function parseField(value: unknown, path: string): NewFieldInput {
	if (!isRecord(value)) throw new SeedShapeError(`${path} must be an object`);
	rejectUnknownKeys(value, FIELD_KEYS, path);

	const isRequired = value.isRequired ?? false;
	if (typeof isRequired !== "boolean") {
		throw new SeedShapeError(`${path}.isRequired must be a boolean`);
	}
	return {
		name: requiredString(value, "name", path),
		label: requiredString(value, "label", path),
		fieldType: requiredString(value, "fieldType", path),
		isRequired,
		defaultValue: optionalString(value, "defaultValue", path),
		attributes: optionalObject(value, "attributes", path),
	};
}

function parseSeed(value: unknown, path: string): ConfigTypeSeed {
	if (!isRecord(value)) throw new SeedShapeError(`${path} must be an object`);
	rejectUnknownKeys(value, TYPE_KEYS, path);

	const fields = value.fields ?? [];
	if (!Array.isArray(fields)) throw new SeedShapeError(`${path}.fields must be an array`);

	return {
		key: requiredString(value, "key", path),
		displayName: requiredString(value, "displayName", path),
		icon: optionalString(value, "icon", path),
		color: optionalString(value, "color", path),
		driver: optionalString(value, "driver", path),
		defaultPort: optionalString(value, "defaultPort", path),
		connectionTemplate: optionalString(value, "connectionTemplate", path),
		extraProperties: optionalObject(value, "extraProperties", path),
		fields: fields.map((field: unknown, i) => parseField(field, `${path}.fields[${i}]`)),
	};
}

/**
 * Validate a parsed JSON document as a list of config type seeds.
 *
 * Checks the document's shape only; column lengths and duplicate names
 * are checked by the store when the seeds are written.
 */
export function parseCatalogSeeds(value: unknown): Result<ConfigTypeSeed[], CatalogError> {
	if (!Array.isArray(value)) {
		return Err(new CatalogError("Seed document must be an array", "CONSTRAINT_VIOLATION"));
	}
	try {
		return Ok(value.map((seed: unknown, i) => parseSeed(seed, `seeds[${i}]`)));
	} catch (error) {
		if (error instanceof SeedShapeError) {
			return Err(new CatalogError(error.message, "CONSTRAINT_VIOLATION"));
		}
		throw error;
	}
}
