import { type Logger, type Result, silentLogger, toError } from "@sourcedeck/core";
import type { Pool, PoolConnection, ResultSetHeader, RowDataPacket } from "mysql2/promise";
import type {
	AddFieldInput,
	ConfigField,
	ConfigType,
	ConfigTypeSeed,
	ConfigTypeWithFields,
	CreateConfigTypeInput,
	NewFieldInput,
} from "../entities";
import {
	CatalogError,
	configTypeKeyExists,
	configTypeNotFound,
	type DriverErrorClassifier,
	driverErrorCode,
	fieldNameExists,
	fieldNotFound,
	toCause,
	wrapCatalog,
} from "../errors";
import { rowToConfigField, rowToConfigType } from "../rows";
import type { CatalogStore } from "../store";
import {
	checkRowId,
	validateConfigTypeInput,
	validateFieldInput,
	validateSeed,
} from "../validate";

type SqlParam = string | number | boolean | null;

type TransactionMode = "READ WRITE" | "READ ONLY";

const INSERT_TYPE_SQL = `INSERT INTO config_types
	(config_key, display_name, icon, color, driver, default_port, connection_template, extra_properties)
	VALUES (?, ?, ?, ?, ?, ?, ?, ?)`;

const INSERT_FIELD_SQL = `INSERT INTO config_fields
	(config_type_id, name, label, field_type, is_required, default_value, attributes)
	VALUES (?, ?, ?, ?, ?, ?, ?)`;

const CONSTRAINT_ERRORS = new Set(["ER_DATA_TOO_LONG", "ER_BAD_NULL_ERROR", "ER_INVALID_JSON_TEXT"]);

/** Map mysql2 error codes onto catalog errors for one statement */
function mysqlErrorClassifier(handlers: {
	onDuplicate?: (message: string) => CatalogError;
	onMissingParent?: () => CatalogError;
}): DriverErrorClassifier {
	return (error) => {
		const code = driverErrorCode(error);
		if (code === "ER_DUP_ENTRY") return handlers.onDuplicate?.(toError(error).message);
		if (code === "ER_NO_REFERENCED_ROW_2") return handlers.onMissingParent?.();
		if (code !== undefined && CONSTRAINT_ERRORS.has(code)) {
			return new CatalogError(toError(error).message, "CONSTRAINT_VIOLATION", toCause(error));
		}
		return undefined;
	};
}

function typeParams(input: CreateConfigTypeInput): SqlParam[] {
	return [
		input.key,
		input.displayName,
		input.icon ?? null,
		input.color ?? null,
		input.driver ?? null,
		input.defaultPort ?? null,
		input.connectionTemplate ?? null,
		input.extraProperties ? JSON.stringify(input.extraProperties) : null,
	];
}

function fieldParams(configTypeId: number, input: NewFieldInput): SqlParam[] {
	return [
		configTypeId,
		input.name,
		input.label,
		input.fieldType,
		input.isRequired ?? false,
		input.defaultValue ?? null,
		input.attributes ? JSON.stringify(input.attributes) : null,
	];
}

/** MySQL has no RETURNING; the entity is rebuilt from the input and the generated id. */
function toConfigType(id: number, input: CreateConfigTypeInput): ConfigType {
	return {
		id,
		key: input.key,
		displayName: input.displayName,
		icon: input.icon,
		color: input.color,
		driver: input.driver,
		defaultPort: input.defaultPort,
		connectionTemplate: input.connectionTemplate,
		extraProperties: input.extraProperties,
	};
}

function toConfigField(id: number, configTypeId: number, input: NewFieldInput): ConfigField {
	return {
		id,
		configTypeId,
		name: input.name,
		label: input.label,
		fieldType: input.fieldType,
		isRequired: input.isRequired ?? false,
		defaultValue: input.defaultValue,
		attributes: input.attributes,
	};
}

/**
 * MySQL-backed catalog store.
 *
 * Uses the mysql2/promise pool. Requires InnoDB for the cascading foreign
 * key and for transactional seeding.
 */
export class MySqlCatalogStore implements CatalogStore {
	constructor(
		private readonly pool: Pool,
		private readonly logger: Logger = silentLogger,
	) {}

	async createConfigType(input: CreateConfigTypeInput): Promise<Result<ConfigType, CatalogError>> {
		const valid = validateConfigTypeInput(input);
		if (!valid.ok) return valid;

		return wrapCatalog(
			async () => {
				const [result] = await this.pool.execute<ResultSetHeader>(
					INSERT_TYPE_SQL,
					typeParams(input),
				);
				const configType = toConfigType(result.insertId, input);
				this.logger.debug("config type created", { id: configType.id, key: configType.key });
				return configType;
			},
			"Failed to create config type",
			mysqlErrorClassifier({ onDuplicate: () => configTypeKeyExists(input.key) }),
		);
	}

	async addField(input: AddFieldInput): Promise<Result<ConfigField, CatalogError>> {
		const valid = validateFieldInput(input);
		if (!valid.ok) return valid;
		const parent = checkRowId(input.configTypeId, configTypeNotFound);
		if (!parent.ok) return parent;

		return wrapCatalog(
			async () => {
				const [result] = await this.pool.execute<ResultSetHeader>(
					INSERT_FIELD_SQL,
					fieldParams(input.configTypeId, input),
				);
				const field = toConfigField(result.insertId, input.configTypeId, input);
				this.logger.debug("config field added", {
					id: field.id,
					configTypeId: field.configTypeId,
					name: field.name,
				});
				return field;
			},
			"Failed to add config field",
			mysqlErrorClassifier({
				onDuplicate: () => fieldNameExists(input.configTypeId, input.name),
				onMissingParent: () => configTypeNotFound(input.configTypeId),
			}),
		);
	}

	async getConfigType(key: string): Promise<Result<ConfigTypeWithFields, CatalogError>> {
		return wrapCatalog(
			() =>
				// Both reads share the transaction's snapshot.
				this.transaction("READ ONLY", async (conn) => {
					const [types] = await conn.execute<RowDataPacket[]>(
						"SELECT * FROM config_types WHERE config_key = ?",
						[key],
					);
					const row = types[0];
					if (!row) throw configTypeNotFound(key);
					const configType = rowToConfigType(row);

					const [fields] = await conn.execute<RowDataPacket[]>(
						"SELECT * FROM config_fields WHERE config_type_id = ? ORDER BY id ASC",
						[configType.id],
					);
					return { ...configType, fields: fields.map(rowToConfigField) };
				}),
			"Failed to get config type",
		);
	}

	async getField(id: number): Promise<Result<ConfigField, CatalogError>> {
		const valid = checkRowId(id, fieldNotFound);
		if (!valid.ok) return valid;

		return wrapCatalog(async () => {
			const [rows] = await this.pool.execute<RowDataPacket[]>(
				"SELECT * FROM config_fields WHERE id = ?",
				[id],
			);
			const row = rows[0];
			if (!row) throw fieldNotFound(id);
			return rowToConfigField(row);
		}, "Failed to get config field");
	}

	async listConfigTypes(): Promise<Result<ConfigType[], CatalogError>> {
		return wrapCatalog(async () => {
			const [rows] = await this.pool.execute<RowDataPacket[]>(
				"SELECT * FROM config_types ORDER BY id ASC",
			);
			return rows.map(rowToConfigType);
		}, "Failed to list config types");
	}

	async deleteConfigType(id: number): Promise<Result<void, CatalogError>> {
		const valid = checkRowId(id, configTypeNotFound);
		if (!valid.ok) return valid;

		return wrapCatalog(async () => {
			const [result] = await this.pool.execute<ResultSetHeader>(
				"DELETE FROM config_types WHERE id = ?",
				[id],
			);
			if (result.affectedRows === 0) throw configTypeNotFound(id);
			this.logger.debug("config type deleted", { id });
		}, "Failed to delete config type");
	}

	async createConfigTypeWithFields(
		seed: ConfigTypeSeed,
	): Promise<Result<ConfigTypeWithFields, CatalogError>> {
		const valid = validateSeed(seed);
		if (!valid.ok) return valid;

		return wrapCatalog(
			() =>
				this.transaction("READ WRITE", async (conn) => {
					const [typeResult] = await conn.execute<ResultSetHeader>(
						INSERT_TYPE_SQL,
						typeParams(seed),
					);
					const configType = toConfigType(typeResult.insertId, seed);

					const fields: ConfigField[] = [];
					for (const field of seed.fields) {
						const [fieldResult] = await conn.execute<ResultSetHeader>(
							INSERT_FIELD_SQL,
							fieldParams(configType.id, field),
						);
						fields.push(toConfigField(fieldResult.insertId, configType.id, field));
					}

					this.logger.debug("config type created", {
						id: configType.id,
						key: configType.key,
						fields: fields.length,
					});
					return { ...configType, fields };
				}),
			`Failed to create config type "${seed.key}"`,
			mysqlErrorClassifier({
				onDuplicate: (message) =>
					message.includes("uq_config_fields_type_name")
						? new CatalogError(`Config type "${seed.key}" repeats a field name`, "DUPLICATE_KEY")
						: configTypeKeyExists(seed.key),
			}),
		);
	}

	async close(): Promise<void> {
		await this.pool.end();
	}

	/** Run `work` in a transaction on a pooled connection, rolling back on failure */
	private async transaction<T>(
		mode: TransactionMode,
		work: (conn: PoolConnection) => Promise<T>,
	): Promise<T> {
		const conn = await this.pool.getConnection();
		try {
			await conn.query(`START TRANSACTION ${mode}`);
			const value = await work(conn);
			await conn.query("COMMIT");
			return value;
		} catch (error) {
			// A failed rollback must not mask the original error.
			await conn.query("ROLLBACK").catch((rollbackError: unknown) => {
				this.logger.warn("rollback failed", { error: toError(rollbackError).message });
			});
			throw error;
		} finally {
			conn.release();
		}
	}
}
