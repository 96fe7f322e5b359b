export {
	type CatalogBackend,
	type CatalogDatabaseConfig,
	type CatalogDialect,
	createCatalogBackend,
	detectDialect,
} from "./backend";
export {
	type AddFieldInput,
	COLUMN_LIMITS,
	type ConfigField,
	type ConfigType,
	type ConfigTypeSeed,
	type ConfigTypeWithFields,
	type CreateConfigTypeInput,
	type FieldOption,
	type NewFieldInput,
} from "./entities";
export { CatalogError, type CatalogErrorCode, wrapCatalog } from "./errors";
export { fieldOptions } from "./fields";
export { MemoryCatalogStore } from "./memory";
export * from "./mysql";
export * from "./postgres";
export * from "./seed";
export type { CatalogStore } from "./store";
export {
	checkRowId,
	MAX_ROW_ID,
	validateConfigTypeInput,
	validateFieldInput,
	validateSeed,
} from "./validate";
