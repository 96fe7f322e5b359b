import { fieldOptions } from "@sourcedeck/catalog";
import { Ok } from "@sourcedeck/core";
import { requireId } from "../args";
import { print, printDetails } from "../output";
import { withBackend } from "./run";

/**
 * `sourcedeck fields get --id <n>`: Show one config field.
 */
export async function fieldsGet(flags: Record<string, string>): Promise<void> {
	const id = requireId(flags);

	await withBackend(flags, async (backend) => {
		const field = await backend.store.getField(id);
		if (!field.ok) return field;

		const f = field.value;
		print(`Field: ${f.name} (id ${f.id})`);
		printDetails([
			["Type id", f.configTypeId],
			["Label", f.label],
			["Kind", f.fieldType],
			["Required", f.isRequired ? "yes" : "no"],
			["Default", f.defaultValue],
		]);

		const options = fieldOptions(f);
		if (options.length > 0) {
			print("  Options:");
			for (const option of options) print(`    ${option.value}  ${option.label}`);
		}
		return Ok(undefined);
	});
}
