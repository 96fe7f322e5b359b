import type { SourceDeckError } from "./errors";

/** Discriminated union representing either success or failure */
export type Result<T, E = SourceDeckError> =
	| { ok: true; value: T }
	| { ok: false; error: E };

/** Create a successful Result */
export const Ok = <T>(value: T): Result<T, never> => ({ ok: true, value });

/** Create a failed Result */
export const Err = <E>(error: E): Result<never, E> => ({ ok: false, error });

/** Extract the value from a Result or throw the error */
export function unwrapOrThrow<T, E>(result: Result<T, E>): T {
	if (result.ok) {
		return result.value;
	}
	throw result.error;
}
