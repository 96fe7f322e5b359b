import { Err, Ok, type Result, SourceDeckError } from "@sourcedeck/core";

/** Error code for catalog operations */
export type CatalogErrorCode = "DUPLICATE_KEY" | "NOT_FOUND" | "CONSTRAINT_VIOLATION" | "INTERNAL";

/** Error type for all catalog operations */
export class CatalogError extends SourceDeckError {
	override readonly code: CatalogErrorCode;

	constructor(message: string, code: CatalogErrorCode, cause?: Error) {
		super(message, code, cause);
		this.code = code;
	}
}

/** Maps a driver error onto a catalog error, or returns undefined when it is not recognised */
export type DriverErrorClassifier = (error: unknown) => CatalogError | undefined;

/** Coerce an unknown thrown value into an Error instance. */
export function toCause(error: unknown): Error | undefined {
	return error instanceof Error ? error : undefined;
}

/** Read the `code` property drivers attach to their errors (SQLSTATE for pg, ER_* for mysql2). */
export function driverErrorCode(error: unknown): string | undefined {
	if (typeof error === "object" && error !== null && "code" in error) {
		return typeof error.code === "string" ? error.code : undefined;
	}
	return undefined;
}

/** Execute an async operation and wrap errors into a CatalogError Result. */
export async function wrapCatalog<T>(
	operation: () => Promise<T>,
	errorMessage: string,
	classify?: DriverErrorClassifier,
): Promise<Result<T, CatalogError>> {
	try {
		const value = await operation();
		return Ok(value);
	} catch (error) {
		if (error instanceof CatalogError) {
			return Err(error);
		}
		const classified = classify?.(error);
		if (classified) {
			return Err(classified);
		}
		return Err(new CatalogError(errorMessage, "INTERNAL", toCause(error)));
	}
}

export function configTypeKeyExists(key: string): CatalogError {
	return new CatalogError(`Config type with key "${key}" already exists`, "DUPLICATE_KEY");
}

export function configTypeNotFound(keyOrId: string | number): CatalogError {
	const label = typeof keyOrId === "string" ? `"${keyOrId}"` : String(keyOrId);
	return new CatalogError(`Config type ${label} not found`, "NOT_FOUND");
}

export function fieldNameExists(configType: string | number, name: string): CatalogError {
	const label = typeof configType === "string" ? `"${configType}"` : String(configType);
	return new CatalogError(
		`Config type ${label} already has a field named "${name}"`,
		"DUPLICATE_KEY",
	);
}

export function fieldNotFound(id: number): CatalogError {
	return new CatalogError(`Config field ${id} not found`, "NOT_FOUND");
}
