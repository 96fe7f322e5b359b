import { Ok } from "@sourcedeck/core";
import { requireId } from "../args";
import { fatal, print, printDetails, printTable } from "../output";
import { withBackend } from "./run";

/**
 * `sourcedeck types list`: List config types in insertion order.
 */
export async function typesList(flags: Record<string, string>): Promise<void> {
	await withBackend(flags, async (backend) => {
		const types = await backend.store.listConfigTypes();
		if (!types.ok) return types;

		if (types.value.length === 0) {
			print("No config types found.");
			return Ok(undefined);
		}

		printTable(
			types.value.map((t) => ({
				id: t.id,
				key: t.key,
				name: t.displayName,
				driver: t.driver ?? "-",
				port: t.defaultPort ?? "-",
			})),
		);
		return Ok(undefined);
	});
}

/**
 * `sourcedeck types show <key>`: Show a config type and its fields.
 */
export async function typesShow(
	flags: Record<string, string>,
	positional: string[],
): Promise<void> {
	const key = positional[0];
	if (!key) {
		fatal("a config type key is required (sourcedeck types show <key>)");
	}

	await withBackend(flags, async (backend) => {
		const configType = await backend.store.getConfigType(key);
		if (!configType.ok) return configType;

		const t = configType.value;
		print(`Config type: ${t.key} (id ${t.id})`);
		printDetails([
			["Name", t.displayName],
			["Driver", t.driver],
			["Port", t.defaultPort],
			["Icon", t.icon],
			["Color", t.color],
			["Template", t.connectionTemplate],
			["Extra", t.extraProperties && JSON.stringify(t.extraProperties)],
		]);
		print("");
		printTable(
			t.fields.map((f) => ({
				id: f.id,
				name: f.name,
				label: f.label,
				type: f.fieldType,
				required: f.isRequired ? "yes" : "no",
				default: f.defaultValue ?? "-",
			})),
		);
		return Ok(undefined);
	});
}

/**
 * `sourcedeck types delete --id <n>`: Delete a config type and its fields.
 */
export async function typesDelete(flags: Record<string, string>): Promise<void> {
	const id = requireId(flags);

	await withBackend(flags, async (backend) => {
		const deleted = await backend.store.deleteConfigType(id);
		if (!deleted.ok) return deleted;
		print(`Deleted config type ${id}`);
		return Ok(undefined);
	});
}
