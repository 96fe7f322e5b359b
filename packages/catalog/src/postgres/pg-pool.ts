import { Pool, type PoolConfig } from "pg";

export interface PgPoolConfig {
	readonly connectionString: string;
	readonly poolMax?: number;
	readonly idleTimeoutMs?: number;
	readonly connectionTimeoutMs?: number;
}

/** Create a pg Pool from configuration */
export function createPool(config: PgPoolConfig): Pool {
	const poolConfig: PoolConfig = {
		connectionString: config.connectionString,
		max: config.poolMax ?? 10,
		idleTimeoutMillis: config.idleTimeoutMs ?? 10_000,
		connectionTimeoutMillis: config.connectionTimeoutMs ?? 30_000,
	};
	return new Pool(poolConfig);
}

/** Composite unique constraint keeping field names unique within a type */
export const FIELD_NAME_CONSTRAINT = "uq_config_fields_type_name";

const INIT_SQL = `
CREATE TABLE IF NOT EXISTS config_types (
	id SERIAL PRIMARY KEY,
	config_key VARCHAR(50) NOT NULL UNIQUE,
	display_name VARCHAR(100) NOT NULL,
	icon VARCHAR(100),
	color VARCHAR(20),
	driver VARCHAR(100),
	default_port VARCHAR(10),
	connection_template TEXT,
	extra_properties JSONB
);

CREATE TABLE IF NOT EXISTS config_fields (
	id SERIAL PRIMARY KEY,
	config_type_id INTEGER NOT NULL REFERENCES config_types(id) ON DELETE CASCADE,
	name VARCHAR(100) NOT NULL,
	label VARCHAR(255) NOT NULL,
	field_type VARCHAR(50) NOT NULL,
	is_required BOOLEAN NOT NULL DEFAULT FALSE,
	default_value VARCHAR(255),
	attributes JSONB,
	CONSTRAINT ${FIELD_NAME_CONSTRAINT} UNIQUE (config_type_id, name)
);
`;

const DROP_SQL = `
DROP TABLE IF EXISTS config_fields;
DROP TABLE IF EXISTS config_types;
`;

/** Create the catalog tables if they do not exist */
export async function runMigrations(pool: Pool): Promise<void> {
	await pool.query(INIT_SQL);
}

/** Drop the catalog tables, fields first */
export async function dropSchema(pool: Pool): Promise<void> {
	await pool.query(DROP_SQL);
}
