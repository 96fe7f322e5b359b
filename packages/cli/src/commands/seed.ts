import { loadCatalogFile, loadReferenceCatalog, seedCatalog } from "@sourcedeck/catalog";
import { Ok } from "@sourcedeck/core";
import { optionalFlag } from "../args";
import { createCliLogger } from "../logger";
import { print } from "../output";
import { withBackend } from "./run";

/**
 * `sourcedeck seed`: Load the reference catalog, or the seeds in `--file`.
 *
 * Types whose key already exists are skipped unless `--strict` is given.
 */
export async function seed(flags: Record<string, string>): Promise<void> {
	const file = optionalFlag(flags, "file", "path");

	await withBackend(flags, async (backend) => {
		const seeds = file ? await loadCatalogFile(file) : loadReferenceCatalog();
		if (!seeds.ok) return seeds;

		const report = await seedCatalog(backend.store, seeds.value, {
			skipExisting: flags.strict !== "true",
			logger: createCliLogger(),
		});
		if (!report.ok) return report;

		const { created, skipped } = report.value;
		print(`Seeded ${created.length} config type(s), skipped ${skipped.length}`);
		for (const key of created) print(`  + ${key}`);
		for (const key of skipped) print(`  = ${key}`);
		return Ok(undefined);
	});
}
