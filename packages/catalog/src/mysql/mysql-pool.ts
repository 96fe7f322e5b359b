import { createPool, type Pool } from "mysql2/promise";

export interface MySqlPoolConfig {
	readonly connectionString: string;
	readonly poolMax?: number;
	readonly idleTimeoutMs?: number;
	readonly connectionTimeoutMs?: number;
}

/** Create a mysql2 pool from configuration */
export function createMySqlPool(config: MySqlPoolConfig): Pool {
	return createPool({
		uri: config.connectionString,
		connectionLimit: config.poolMax ?? 10,
		idleTimeout: config.idleTimeoutMs ?? 10_000,
		connectTimeout: config.connectionTimeoutMs ?? 30_000,
	});
}

// mysql2 runs one statement per call unless multipleStatements is enabled.
// Keys and field names compare byte for byte, as they do in Postgres.
const INIT_STATEMENTS = [
	`CREATE TABLE IF NOT EXISTS config_types (
		id INT AUTO_INCREMENT PRIMARY KEY,
		config_key VARCHAR(50) COLLATE utf8mb4_bin NOT NULL UNIQUE,
		display_name VARCHAR(100) NOT NULL,
		icon VARCHAR(100),
		color VARCHAR(20),
		driver VARCHAR(100),
		default_port VARCHAR(10),
		connection_template TEXT,
		extra_properties JSON COMMENT 'Extra properties such as file_extensions'
	) ENGINE=InnoDB DEFAULT CHARSET=utf8mb4`,
	`CREATE TABLE IF NOT EXISTS config_fields (
		id INT AUTO_INCREMENT PRIMARY KEY,
		config_type_id INT NOT NULL,
		name VARCHAR(100) COLLATE utf8mb4_bin NOT NULL,
		label VARCHAR(255) NOT NULL,
		field_type VARCHAR(50) NOT NULL,
		is_required BOOLEAN NOT NULL DEFAULT FALSE,
		default_value VARCHAR(255),
		attributes JSON COMMENT 'placeholder, help_text, min, max, options, ...',
		UNIQUE KEY uq_config_fields_type_name (config_type_id, name),
		FOREIGN KEY (config_type_id) REFERENCES config_types(id) ON DELETE CASCADE
	) ENGINE=InnoDB DEFAULT CHARSET=utf8mb4`,
];

const DROP_STATEMENTS = [
	"DROP TABLE IF EXISTS config_fields",
	"DROP TABLE IF EXISTS config_types",
];

/** Create the catalog tables if they do not exist */
export async function runMySqlMigrations(pool: Pool): Promise<void> {
	for (const statement of INIT_STATEMENTS) {
		await pool.query(statement);
	}
}

/** Drop the catalog tables, fields first */
export async function dropMySqlSchema(pool: Pool): Promise<void> {
	for (const statement of DROP_STATEMENTS) {
		await pool.query(statement);
	}
}
