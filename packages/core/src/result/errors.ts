/** Base error class for all SourceDeck errors */
export class SourceDeckError extends Error {
	readonly code: string;
	override readonly cause?: Error;

	constructor(message: string, code: string, cause?: Error) {
		super(message);
		this.name = this.constructor.name;
		this.code = code;
		this.cause = cause;
	}
}

/** Input failed a column constraint (required, length, JSON shape) */
export class ConstraintError extends SourceDeckError {
	/** Column or path that failed, e.g. "config_fields.label" */
	readonly column: string;

	constructor(message: string, column: string, cause?: Error) {
		super(message, "CONSTRAINT_VIOLATION", cause);
		this.column = column;
	}
}

/** Coerce an unknown thrown value into an Error instance. */
export function toError(err: unknown): Error {
	return err instanceof Error ? err : new Error(String(err));
}
