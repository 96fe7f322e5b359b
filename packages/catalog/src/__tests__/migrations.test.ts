import type { Pool as MySqlPool } from "mysql2/promise";
import type { Pool } from "pg";
import { describe, expect, it } from "vitest";
import { dropMySqlSchema, runMySqlMigrations } from "../mysql/mysql-pool";
import { dropSchema, FIELD_NAME_CONSTRAINT, runMigrations } from "../postgres/pg-pool";
import { createMockMySqlPool, createMockPool } from "./test-helpers";

describe("Postgres migrations", () => {
	it("creates both tables with the cascade and the field-name constraint", async () => {
		const mock = createMockPool();
		await runMigrations(mock.pool as unknown as Pool);

		const [sql] = mock.statements();
		expect(sql).toContain("CREATE TABLE IF NOT EXISTS config_types");
		expect(sql).toContain("REFERENCES config_types(id) ON DELETE CASCADE");
		expect(sql).toContain(`CONSTRAINT ${FIELD_NAME_CONSTRAINT} UNIQUE (config_type_id, name)`);
	});

	it("drops fields before types", async () => {
		const mock = createMockPool();
		await dropSchema(mock.pool as unknown as Pool);

		const [sql] = mock.statements();
		expect(sql?.indexOf("config_fields")).toBeLessThan(sql?.indexOf("config_types") ?? -1);
	});
});

describe("MySQL migrations", () => {
	it("runs one statement per table", async () => {
		const mock = createMockMySqlPool();
		await runMySqlMigrations(mock.pool as unknown as MySqlPool);

		const statements = mock.controlStatements();
		expect(statements).toHaveLength(2);
		expect(statements[0]).toContain("CREATE TABLE IF NOT EXISTS config_types");
		expect(statements[1]).toContain("UNIQUE KEY uq_config_fields_type_name (config_type_id, name)");
		expect(statements[1]).toContain("ENGINE=InnoDB");
	});

	it("compares keys and field names case-sensitively", async () => {
		const mock = createMockMySqlPool();
		await runMySqlMigrations(mock.pool as unknown as MySqlPool);

		const [types, fields] = mock.controlStatements();
		expect(types).toContain("config_key VARCHAR(50) COLLATE utf8mb4_bin NOT NULL UNIQUE");
		expect(fields).toContain("name VARCHAR(100) COLLATE utf8mb4_bin NOT NULL");
	});

	it("drops fields before types", async () => {
		const mock = createMockMySqlPool();
		await dropMySqlSchema(mock.pool as unknown as MySqlPool);

		expect(mock.controlStatements()).toEqual([
			"DROP TABLE IF EXISTS config_fields",
			"DROP TABLE IF EXISTS config_types",
		]);
	});
});
