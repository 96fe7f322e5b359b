import { Ok } from "@sourcedeck/core";
import { print } from "../output";
import { withBackend } from "./run";

/**
 * `sourcedeck migrate`: Create the catalog tables. `--reset` drops them first.
 */
export async function migrate(flags: Record<string, string>): Promise<void> {
	await withBackend(flags, async (backend) => {
		if (flags.reset === "true") {
			const reset = await backend.reset();
			if (!reset.ok) return reset;
			print(`Dropped catalog tables (${backend.dialect})`);
		}

		const migrated = await backend.migrate();
		if (!migrated.ok) return migrated;
		print(`Catalog tables ready (${backend.dialect})`);
		return Ok(undefined);
	});
}
