import type { Result } from "@sourcedeck/core";
import type {
	AddFieldInput,
	ConfigField,
	ConfigType,
	ConfigTypeSeed,
	ConfigTypeWithFields,
	CreateConfigTypeInput,
} from "./entities";
import type { CatalogError } from "./errors";

/**
 * Persistent catalog of config types and their form fields.
 *
 * Every method resolves to a `Result` and never rejects for expected
 * failures: `DUPLICATE_KEY`, `NOT_FOUND` and `CONSTRAINT_VIOLATION` come
 * back as `Err`, driver failures as `Err` with code `INTERNAL`.
 */
export interface CatalogStore {
	/** Create a config type. Fails with DUPLICATE_KEY when the key is taken. */
	createConfigType(input: CreateConfigTypeInput): Promise<Result<ConfigType, CatalogError>>;
	/** Append a field to a type. Fails with NOT_FOUND when the type does not exist. */
	addField(input: AddFieldInput): Promise<Result<ConfigField, CatalogError>>;
	/** Look a type up by key, with its fields in insertion order. */
	getConfigType(key: string): Promise<Result<ConfigTypeWithFields, CatalogError>>;
	/** Look a single field up by id. */
	getField(id: number): Promise<Result<ConfigField, CatalogError>>;
	/** All types without their fields, by id ascending. */
	listConfigTypes(): Promise<Result<ConfigType[], CatalogError>>;
	/** Delete a type and, atomically, all of its fields. NOT_FOUND for an unknown id. */
	deleteConfigType(id: number): Promise<Result<void, CatalogError>>;
	/** Create a type and all of its fields in one transaction; nothing persists on failure. */
	createConfigTypeWithFields(
		seed: ConfigTypeSeed,
	): Promise<Result<ConfigTypeWithFields, CatalogError>>;
	/** Release pooled connections. */
	close(): Promise<void>;
}
