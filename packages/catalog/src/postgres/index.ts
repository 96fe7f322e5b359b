export { PgCatalogStore } from "./pg-catalog-store";
export { pgErrorClassifier } from "./pg-errors";
export {
	createPool,
	dropSchema,
	FIELD_NAME_CONSTRAINT,
	type PgPoolConfig,
	runMigrations,
} from "./pg-pool";
