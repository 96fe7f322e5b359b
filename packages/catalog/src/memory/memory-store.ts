import { Err, type Logger, Ok, type Result, silentLogger } from "@sourcedeck/core";
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
	type CatalogError,
	configTypeKeyExists,
	configTypeNotFound,
	fieldNameExists,
	fieldNotFound,
} from "../errors";
import type { CatalogStore } from "../store";
import {
	checkRowId,
	validateConfigTypeInput,
	validateFieldInput,
	validateSeed,
} from "../validate";

/**
 * In-process catalog store.
 *
 * Applies the same constraints as the SQL schema: unique keys, unique
 * field names per type, cascade deletes. Keys and names compare exactly,
 * as they do under the binary collation. Every operation completes
 * without yielding between its checks and its writes, so concurrent
 * callers never observe partial state. Stored documents are copied on
 * the way in and out.
 */
export class MemoryCatalogStore implements CatalogStore {
	private readonly types = new Map<number, ConfigType>();
	/** Map iteration order is insertion order, which is also id order */
	private readonly fields = new Map<number, ConfigField>();
	private nextTypeId = 1;
	private nextFieldId = 1;

	constructor(private readonly logger: Logger = silentLogger) {}

	async createConfigType(input: CreateConfigTypeInput): Promise<Result<ConfigType, CatalogError>> {
		const valid = validateConfigTypeInput(input);
		if (!valid.ok) return valid;
		if (this.findByKey(input.key)) return Err(configTypeKeyExists(input.key));

		const configType = this.insertType(input);
		this.logger.debug("config type created", { id: configType.id, key: configType.key });
		return Ok(structuredClone(configType));
	}

	async addField(input: AddFieldInput): Promise<Result<ConfigField, CatalogError>> {
		const valid = validateFieldInput(input);
		if (!valid.ok) return valid;
		const parent = checkRowId(input.configTypeId, configTypeNotFound);
		if (!parent.ok) return parent;
		if (!this.types.has(input.configTypeId)) {
			return Err(configTypeNotFound(input.configTypeId));
		}
		if (this.fieldsOf(input.configTypeId).some((f) => f.name === input.name)) {
			return Err(fieldNameExists(input.configTypeId, input.name));
		}

		const field = this.insertField(input.configTypeId, input);
		this.logger.debug("config field added", {
			id: field.id,
			configTypeId: field.configTypeId,
			name: field.name,
		});
		return Ok(structuredClone(field));
	}

	async getConfigType(key: string): Promise<Result<ConfigTypeWithFields, CatalogError>> {
		const configType = this.findByKey(key);
		if (!configType) return Err(configTypeNotFound(key));
		return Ok(structuredClone({ ...configType, fields: this.fieldsOf(configType.id) }));
	}

	async getField(id: number): Promise<Result<ConfigField, CatalogError>> {
		const valid = checkRowId(id, fieldNotFound);
		if (!valid.ok) return valid;
		const field = this.fields.get(id);
		if (!field) return Err(fieldNotFound(id));
		return Ok(structuredClone(field));
	}

	async listConfigTypes(): Promise<Result<ConfigType[], CatalogError>> {
		const list = [...this.types.values()].sort((a, b) => a.id - b.id);
		return Ok(structuredClone(list));
	}

	async deleteConfigType(id: number): Promise<Result<void, CatalogError>> {
		const valid = checkRowId(id, configTypeNotFound);
		if (!valid.ok) return valid;
		if (!this.types.has(id)) return Err(configTypeNotFound(id));

		let removed = 0;
		for (const field of [...this.fields.values()]) {
			if (field.configTypeId === id) {
				this.fields.delete(field.id);
				removed++;
			}
		}
		this.types.delete(id);
		this.logger.debug("config type deleted", { id, fields: removed });
		return Ok(undefined);
	}

	async createConfigTypeWithFields(
		seed: ConfigTypeSeed,
	): Promise<Result<ConfigTypeWithFields, CatalogError>> {
		// Every check runs before the first write, so a failure leaves nothing behind.
		const valid = validateSeed(seed);
		if (!valid.ok) return valid;
		if (this.findByKey(seed.key)) return Err(configTypeKeyExists(seed.key));

		const configType = this.insertType(seed);
		const fields = seed.fields.map((field) => this.insertField(configType.id, field));
		this.logger.debug("config type created", {
			id: configType.id,
			key: configType.key,
			fields: fields.length,
		});
		return Ok(structuredClone({ ...configType, fields }));
	}

	/** Remove every type and field. Ids keep counting up. */
	clear(): void {
		this.types.clear();
		this.fields.clear();
	}

	async close(): Promise<void> {}

	private findByKey(key: string): ConfigType | undefined {
		for (const configType of this.types.values()) {
			if (configType.key === key) return configType;
		}
		return undefined;
	}

	private fieldsOf(configTypeId: number): ConfigField[] {
		return [...this.fields.values()].filter((f) => f.configTypeId === configTypeId);
	}

	private insertType(input: CreateConfigTypeInput): ConfigType {
		const configType: ConfigType = {
			id: this.nextTypeId++,
			key: input.key,
			displayName: input.displayName,
			icon: input.icon,
			color: input.color,
			driver: input.driver,
			defaultPort: input.defaultPort,
			connectionTemplate: input.connectionTemplate,
			extraProperties: input.extraProperties && structuredClone(input.extraProperties),
		};
		this.types.set(configType.id, configType);
		return configType;
	}

	private insertField(configTypeId: number, input: NewFieldInput): ConfigField {
		const field: ConfigField = {
			id: this.nextFieldId++,
			configTypeId,
			name: input.name,
			label: input.label,
			fieldType: input.fieldType,
			isRequired: input.isRequired ?? false,
			defaultValue: input.defaultValue,
			attributes: input.attributes && structuredClone(input.attributes),
		};
		this.fields.set(field.id, field);
		return field;
	}
}
