import type { JsonObject } from "@sourcedeck/core";

/** A supported kind of external data source and its connection metadata */
export interface ConfigType {
	readonly id: number;
	/** Stable external identifier, unique across the catalog (e.g. "redshift") */
	readonly key: string;
	readonly displayName: string;
	readonly icon?: string;
	readonly color?: string;
	/** Connection driver identifier; absent for non-driver sources such as SFTP */
	readonly driver?: string;
	/** Kept as a string: it may be templated or omitted */
	readonly defaultPort?: string;
	/** Template with `{name}` placeholders, interpolated by consumers */
	readonly connectionTemplate?: string;
	readonly extraProperties?: JsonObject;
}

/** One form input belonging to a config type */
export interface ConfigField {
	readonly id: number;
	readonly configTypeId: number;
	/** Placeholder name in the connection template; unique within its type */
	readonly name: string;
	readonly label: string;
	/** By convention text, number, password, select, checkbox or textarea */
	readonly fieldType: string;
	readonly isRequired: boolean;
	readonly defaultValue?: string;
	/** placeholder, help_text, min, max, options, ... */
	readonly attributes?: JsonObject;
}

/** A config type together with its fields in insertion order */
export interface ConfigTypeWithFields extends ConfigType {
	readonly fields: readonly ConfigField[];
}

export interface CreateConfigTypeInput {
	readonly key: string;
	readonly displayName: string;
	readonly icon?: string;
	readonly color?: string;
	readonly driver?: string;
	readonly defaultPort?: string;
	readonly connectionTemplate?: string;
	readonly extraProperties?: JsonObject;
}

/** Field input without its owner, as it appears inside a seed */
export interface NewFieldInput {
	readonly name: string;
	readonly label: string;
	readonly fieldType: string;
	/** Defaults to false */
	readonly isRequired?: boolean;
	readonly defaultValue?: string;
	readonly attributes?: JsonObject;
}

export interface AddFieldInput extends NewFieldInput {
	readonly configTypeId: number;
}

/** A config type and all of its fields, created as one unit */
export interface ConfigTypeSeed extends CreateConfigTypeInput {
	readonly fields: readonly NewFieldInput[];
}

/** One entry of a select field's `options` attribute */
export interface FieldOption {
	readonly value: string;
	readonly label: string;
}

/** Maximum lengths of the VARCHAR columns */
export const COLUMN_LIMITS = {
	key: 50,
	displayName: 100,
	icon: 100,
	color: 20,
	driver: 100,
	defaultPort: 10,
	fieldName: 100,
	label: 255,
	fieldType: 50,
	defaultValue: 255,
} as const;
