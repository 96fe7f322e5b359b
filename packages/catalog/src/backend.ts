import { Err, type Logger, Ok, type Result, silentLogger } from "@sourcedeck/core";
import { CatalogError, wrapCatalog } from "./errors";
import { MemoryCatalogStore } from "./memory";
import { createMySqlPool, dropMySqlSchema, MySqlCatalogStore, runMySqlMigrations } from "./mysql";
import { createPool, dropSchema, PgCatalogStore, runMigrations } from "./postgres";
import type { CatalogStore } from "./store";

export type CatalogDialect = "postgres" | "mysql" | "memory";

export interface CatalogDatabaseConfig {
	/** postgres://…, postgresql://…, mysql://… or memory: */
	readonly connectionString: string;
	readonly poolMax?: number;
	readonly idleTimeoutMs?: number;
	readonly connectionTimeoutMs?: number;
}

/** A store together with the schema operations of its database */
export interface CatalogBackend {
	readonly dialect: CatalogDialect;
	readonly store: CatalogStore;
	/** Create the catalog tables if missing */
	migrate(): Promise<Result<void, CatalogError>>;
	/** Drop the catalog tables (the memory backend empties itself) */
	reset(): Promise<Result<void, CatalogError>>;
	close(): Promise<void>;
}

/** Work out the database dialect from a connection URL's scheme. */
export function detectDialect(connectionString: string): Result<CatalogDialect, CatalogError> {
	const scheme = connectionString.slice(0, connectionString.indexOf(":") + 1).toLowerCase();
	switch (scheme) {
		case "postgres:":
		case "postgresql:":
			return Ok("postgres");
		case "mysql:":
			return Ok("mysql");
		case "memory:":
			return Ok("memory");
		default:
			return Err(
				new CatalogError(
					`Unsupported database URL "${scheme || connectionString}": expected postgres://, mysql:// or memory:`,
					"CONSTRAINT_VIOLATION",
				),
			);
	}
}

/**
 * Build the backend for a connection URL.
 *
 * Pools connect lazily, so this does no I/O; the first query does.
 */
export function createCatalogBackend(
	config: CatalogDatabaseConfig,
	logger: Logger = silentLogger,
): Result<CatalogBackend, CatalogError> {
	const dialect = detectDialect(config.connectionString);
	if (!dialect.ok) return dialect;

	const storeLogger = logger.child({ dialect: dialect.value });

	switch (dialect.value) {
		case "postgres": {
			const pool = createPool(config);
			const store = new PgCatalogStore(pool, storeLogger);
			const backend: CatalogBackend = {
				dialect: "postgres",
				store,
				migrate: () => wrapCatalog(() => runMigrations(pool), "Failed to run migrations"),
				reset: () => wrapCatalog(() => dropSchema(pool), "Failed to drop catalog tables"),
				close: () => store.close(),
			};
			return Ok(backend);
		}
		case "mysql": {
			const pool = createMySqlPool(config);
			const store = new MySqlCatalogStore(pool, storeLogger);
			const backend: CatalogBackend = {
				dialect: "mysql",
				store,
				migrate: () => wrapCatalog(() => runMySqlMigrations(pool), "Failed to run migrations"),
				reset: () => wrapCatalog(() => dropMySqlSchema(pool), "Failed to drop catalog tables"),
				close: () => store.close(),
			};
			return Ok(backend);
		}
		case "memory": {
			const store = new MemoryCatalogStore(storeLogger);
			const backend: CatalogBackend = {
				dialect: "memory",
				store,
				migrate: async () => Ok(undefined),
				reset: async () => {
					store.clear();
					return Ok(undefined);
				},
				close: () => store.close(),
			};
			return Ok(backend);
		}
	}
}
