import { Err, type Logger, Ok, type Result, silentLogger } from "@sourcedeck/core";
import type { ConfigTypeSeed } from "../entities";
import { type CatalogError, configTypeKeyExists } from "../errors";
import type { CatalogStore } from "../store";

export interface SeedOptions {
	/** Skip seeds whose key already exists instead of failing. Defaults to true. */
	readonly skipExisting?: boolean;
	readonly logger?: Logger;
}

/** Outcome of a seed run, keys in seed order */
export interface SeedReport {
	readonly created: string[];
	readonly skipped: string[];
}

/**
 * Write seeds into a store, one transaction per config type.
 *
 * A failing seed leaves none of its own rows behind; seeds written before
 * it stay. The first failure other than a skipped duplicate ends the run.
 */
export async function seedCatalog(
	store: CatalogStore,
	seeds: readonly ConfigTypeSeed[],
	options: SeedOptions = {},
): Promise<Result<SeedReport, CatalogError>> {
	const skipExisting = options.skipExisting ?? true;
	const logger = (options.logger ?? silentLogger).child({ component: "seed" });
	const created: string[] = [];
	const skipped: string[] = [];

	for (const seed of seeds) {
		const result = await store.createConfigTypeWithFields(seed);
		if (result.ok) {
			created.push(seed.key);
			logger.info("config type seeded", { key: seed.key, fields: result.value.fields.length });
			continue;
		}
		if (result.error.code === "DUPLICATE_KEY" && skipExisting && isKeyClash(result.error, seed)) {
			skipped.push(seed.key);
			logger.info("config type already present, skipped", { key: seed.key });
			continue;
		}
		logger.error("seeding failed", { key: seed.key, error: result.error.message });
		return Err(result.error);
	}

	logger.info("seed complete", { created: created.length, skipped: skipped.length });
	return Ok({ created, skipped });
}

/** A DUPLICATE_KEY on the type's own key, as opposed to a repeated field name */
function isKeyClash(error: CatalogError, seed: ConfigTypeSeed): boolean {
	return error.message === configTypeKeyExists(seed.key).message;
}
