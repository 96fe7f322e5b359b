import {
	checkMaxLength,
	checkRequired,
	ConstraintError,
	Err,
	isJsonObject,
	Ok,
	type Result,
} from "@sourcedeck/core";
import {
	COLUMN_LIMITS,
	type ConfigTypeSeed,
	type CreateConfigTypeInput,
	type NewFieldInput,
} from "./entities";
import { CatalogError, fieldNameExists } from "./errors";

/** Upper bound of the INTEGER id columns in both SQL dialects */
export const MAX_ROW_ID = 2_147_483_647;

function checkJsonObject(value: unknown, column: string): Result<void, ConstraintError> {
	if (value === undefined || isJsonObject(value)) return Ok(undefined);
	return Err(new ConstraintError(`${column} must be a JSON object`, column));
}

function firstFailure(checks: Array<Result<void, ConstraintError>>): Result<void, CatalogError> {
	for (const check of checks) {
		if (!check.ok) {
			return Err(new CatalogError(check.error.message, "CONSTRAINT_VIOLATION", check.error));
		}
	}
	return Ok(undefined);
}

/**
 * An id that cannot be stored in an id column names no row. Reported as
 * missing before the driver gets to reject it as out of range.
 */
export function checkRowId(
	id: number,
	notFound: (id: number) => CatalogError,
): Result<void, CatalogError> {
	if (Number.isSafeInteger(id) && id >= 1 && id <= MAX_ROW_ID) return Ok(undefined);
	return Err(notFound(id));
}

/** Check a config type input against the column constraints of `config_types`. */
export function validateConfigTypeInput(input: CreateConfigTypeInput): Result<void, CatalogError> {
	return firstFailure([
		checkRequired(input.key, COLUMN_LIMITS.key, "config_types.config_key"),
		checkRequired(input.displayName, COLUMN_LIMITS.displayName, "config_types.display_name"),
		checkMaxLength(input.icon, COLUMN_LIMITS.icon, "config_types.icon"),
		checkMaxLength(input.color, COLUMN_LIMITS.color, "config_types.color"),
		checkMaxLength(input.driver, COLUMN_LIMITS.driver, "config_types.driver"),
		checkMaxLength(input.defaultPort, COLUMN_LIMITS.defaultPort, "config_types.default_port"),
		checkJsonObject(input.extraProperties, "config_types.extra_properties"),
	]);
}

/** Check a field input against the column constraints of `config_fields`. */
export function validateFieldInput(input: NewFieldInput): Result<void, CatalogError> {
	return firstFailure([
		checkRequired(input.name, COLUMN_LIMITS.fieldName, "config_fields.name"),
		checkRequired(input.label, COLUMN_LIMITS.label, "config_fields.label"),
		checkRequired(input.fieldType, COLUMN_LIMITS.fieldType, "config_fields.field_type"),
		checkMaxLength(input.defaultValue, COLUMN_LIMITS.defaultValue, "config_fields.default_value"),
		checkJsonObject(input.attributes, "config_fields.attributes"),
	]);
}

/**
 * Check a whole seed before anything is written: the type, every field,
 * and that no two fields share a name.
 */
export function validateSeed(seed: ConfigTypeSeed): Result<void, CatalogError> {
	const typeCheck = validateConfigTypeInput(seed);
	if (!typeCheck.ok) return typeCheck;

	const names = new Set<string>();
	for (const field of seed.fields) {
		const fieldCheck = validateFieldInput(field);
		if (!fieldCheck.ok) return fieldCheck;
		if (names.has(field.name)) {
			return Err(fieldNameExists(seed.key, field.name));
		}
		names.add(field.name);
	}
	return Ok(undefined);
}
