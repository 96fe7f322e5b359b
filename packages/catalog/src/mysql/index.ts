export { MySqlCatalogStore } from "./mysql-catalog-store";
export {
	createMySqlPool,
	dropMySqlSchema,
	type MySqlPoolConfig,
	runMySqlMigrations,
} from "./mysql-pool";
