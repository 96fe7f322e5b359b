import { toError } from "@sourcedeck/core";
import { CatalogError, type DriverErrorClassifier, driverErrorCode, toCause } from "../errors";

/** SQLSTATE codes the catalog distinguishes */
const UNIQUE_VIOLATION = "23505";
const FOREIGN_KEY_VIOLATION = "23503";
const CONSTRAINT_STATES = new Set([
	"22001", // string_data_right_truncation
	"23502", // not_null_violation
	"22P02", // invalid_text_representation
]);

/** Name of the constraint a Postgres error reports, if any */
function violatedConstraint(error: unknown): string | undefined {
	if (typeof error === "object" && error !== null && "constraint" in error) {
		return typeof error.constraint === "string" ? error.constraint : undefined;
	}
	return undefined;
}

/**
 * Build a classifier for Postgres errors raised by one statement.
 *
 * `onDuplicate` and `onMissingParent` produce the error for a unique or
 * foreign-key violation (`onDuplicate` receives the violated constraint's
 * name); when omitted those violations stay unclassified.
 */
export function pgErrorClassifier(handlers: {
	onDuplicate?: (constraint: string | undefined) => CatalogError;
	onMissingParent?: () => CatalogError;
}): DriverErrorClassifier {
	return (error) => {
		const code = driverErrorCode(error);
		if (code === UNIQUE_VIOLATION) return handlers.onDuplicate?.(violatedConstraint(error));
		if (code === FOREIGN_KEY_VIOLATION) return handlers.onMissingParent?.();
		if (code !== undefined && CONSTRAINT_STATES.has(code)) {
			return new CatalogError(toError(error).message, "CONSTRAINT_VIOLATION", toCause(error));
		}
		return undefined;
	};
}
