import { type Logger, type Result, silentLogger, toError } from "@sourcedeck/core";
import type { Pool, PoolClient } from "pg";
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
	fieldNameExists,
	fieldNotFound,
	wrapCatalog,
} from "../errors";
import { type Row, readRowArray, rowToConfigField, rowToConfigType } from "../rows";
import type { CatalogStore } from "../store";
import {
	checkRowId,
	validateConfigTypeInput,
	validateFieldInput,
	validateSeed,
} from "../validate";
import { pgErrorClassifier } from "./pg-errors";
import { FIELD_NAME_CONSTRAINT } from "./pg-pool";

type SqlParam = string | number | boolean | null;

const INSERT_TYPE_SQL = `INSERT INTO config_types
	(config_key, display_name, icon, color, driver, default_port, connection_template, extra_properties)
	VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
	RETURNING *`;

const INSERT_FIELD_SQL = `INSERT INTO config_fields
	(config_type_id, name, label, field_type, is_required, default_value, attributes)
	VALUES ($1, $2, $3, $4, $5, $6, $7)
	RETURNING *`;

// Type row and fields come from one statement, hence one snapshot.
const SELECT_TYPE_WITH_FIELDS_SQL = `SELECT t.*,
	COALESCE(
		(SELECT json_agg(f ORDER BY f.id) FROM config_fields f WHERE f.config_type_id = t.id),
		'[]'::json
	) AS fields
	FROM config_types t
	WHERE t.config_key = $1`;

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

function firstRow(rows: Row[]): Row {
	const row = rows[0];
	if (!row) throw new Error("Statement returned no rows");
	return row;
}

/** Postgres-backed catalog store */
export class PgCatalogStore implements CatalogStore {
	constructor(
		private readonly pool: Pool,
		private readonly logger: Logger = silentLogger,
	) {}

	async createConfigType(input: CreateConfigTypeInput): Promise<Result<ConfigType, CatalogError>> {
		const valid = validateConfigTypeInput(input);
		if (!valid.ok) return valid;

		return wrapCatalog(
			async () => {
				const result = await this.pool.query<Row>(INSERT_TYPE_SQL, typeParams(input));
				const configType = rowToConfigType(firstRow(result.rows));
				this.logger.debug("config type created", { id: configType.id, key: configType.key });
				return configType;
			},
			"Failed to create config type",
			pgErrorClassifier({ onDuplicate: () => configTypeKeyExists(input.key) }),
		);
	}

	async addField(input: AddFieldInput): Promise<Result<ConfigField, CatalogError>> {
		const valid = validateFieldInput(input);
		if (!valid.ok) return valid;
		const parent = checkRowId(input.configTypeId, configTypeNotFound);
		if (!parent.ok) return parent;

		return wrapCatalog(
			async () => {
				const result = await this.pool.query<Row>(
					INSERT_FIELD_SQL,
					fieldParams(input.configTypeId, input),
				);
				const field = rowToConfigField(firstRow(result.rows));
				this.logger.debug("config field added", {
					id: field.id,
					configTypeId: field.configTypeId,
					name: field.name,
				});
				return field;
			},
			"Failed to add config field",
			pgErrorClassifier({
				onDuplicate: () => fieldNameExists(input.configTypeId, input.name),
				onMissingParent: () => configTypeNotFound(input.configTypeId),
			}),
		);
	}

	async getConfigType(key: string): Promise<Result<ConfigTypeWithFields, CatalogError>> {
		return wrapCatalog(async () => {
			const result = await this.pool.query<Row>(SELECT_TYPE_WITH_FIELDS_SQL, [key]);
			const row = result.rows[0];
			if (!row) throw configTypeNotFound(key);
			return {
				...rowToConfigType(row),
				fields: readRowArray(row, "fields").map(rowToConfigField),
			};
		}, "Failed to get config type");
	}

	async getField(id: number): Promise<Result<ConfigField, CatalogError>> {
		const valid = checkRowId(id, fieldNotFound);
		if (!valid.ok) return valid;

		return wrapCatalog(async () => {
			const result = await this.pool.query<Row>("SELECT * FROM config_fields WHERE id = $1", [id]);
			const row = result.rows[0];
			if (!row) throw fieldNotFound(id);
			return rowToConfigField(row);
		}, "Failed to get config field");
	}

	async listConfigTypes(): Promise<Result<ConfigType[], CatalogError>> {
		return wrapCatalog(async () => {
			const result = await this.pool.query<Row>("SELECT * FROM config_types ORDER BY id ASC");
			return result.rows.map(rowToConfigType);
		}, "Failed to list config types");
	}

	async deleteConfigType(id: number): Promise<Result<void, CatalogError>> {
		const valid = checkRowId(id, configTypeNotFound);
		if (!valid.ok) return valid;

		return wrapCatalog(async () => {
			// ON DELETE CASCADE removes the fields within the same statement.
			const result = await this.pool.query("DELETE FROM config_types WHERE id = $1", [id]);
			if (result.rowCount === 0) throw configTypeNotFound(id);
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
				this.transaction(async (client) => {
					const typeResult = await client.query<Row>(INSERT_TYPE_SQL, typeParams(seed));
					const configType = rowToConfigType(firstRow(typeResult.rows));

					const fields: ConfigField[] = [];
					for (const field of seed.fields) {
						const fieldResult = await client.query<Row>(
							INSERT_FIELD_SQL,
							fieldParams(configType.id, field),
						);
						fields.push(rowToConfigField(firstRow(fieldResult.rows)));
					}

					this.logger.debug("config type created", {
						id: configType.id,
						key: configType.key,
						fields: fields.length,
					});
					return { ...configType, fields };
				}),
			`Failed to create config type "${seed.key}"`,
			pgErrorClassifier({
				onDuplicate: (constraint) =>
					constraint === FIELD_NAME_CONSTRAINT
						? new CatalogError(`Config type "${seed.key}" repeats a field name`, "DUPLICATE_KEY")
						: configTypeKeyExists(seed.key),
			}),
		);
	}

	async close(): Promise<void> {
		await this.pool.end();
	}

	/** Run `work` inside BEGIN/COMMIT on a dedicated client, rolling back on failure */
	private async transaction<T>(work: (client: PoolClient) => Promise<T>): Promise<T> {
		const client = await this.pool.connect();
		try {
			await client.query("BEGIN");
			const value = await work(client);
			await client.query("COMMIT");
			return value;
		} catch (error) {
			// A failed rollback must not mask the original error.
			await client.query("ROLLBACK").catch((rollbackError: unknown) => {
				this.logger.warn("rollback failed", { error: toError(rollbackError).message });
			});
			throw error;
		} finally {
			client.release();
		}
	}
}
