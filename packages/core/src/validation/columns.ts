import { ConstraintError } from "../result/errors";
import { Err, Ok, type Result } from "../result/result";

/**
 * Length of a string in characters, as VARCHAR(n) counts them.
 *
 * Counts code points, so a surrogate pair is one character.
 */
export function charLength(value: string): number {
	return Array.from(value).length;
}

/** Fail when an optional string column exceeds `max` characters. */
export function checkMaxLength(
	value: string | undefined,
	max: number,
	column: string,
): Result<void, ConstraintError> {
	if (value === undefined) return Ok(undefined);
	const length = charLength(value);
	if (length > max) {
		return Err(
			new ConstraintError(`${column} exceeds ${max} characters (got ${length})`, column),
		);
	}
	return Ok(undefined);
}

/** Fail when a NOT NULL string column is missing, blank or longer than `max`. */
export function checkRequired(
	value: string | undefined,
	max: number,
	column: string,
): Result<void, ConstraintError> {
	if (value === undefined || value.trim().length === 0) {
		return Err(new ConstraintError(`${column} is required`, column));
	}
	return checkMaxLength(value, max, column);
}
