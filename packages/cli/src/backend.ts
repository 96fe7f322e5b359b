import { type CatalogBackend, createCatalogBackend } from "@sourcedeck/catalog";
import { loadConfig } from "./config";
import { createCliLogger } from "./logger";
import { fatal } from "./output";

/** Resolve the database URL from --url, SOURCEDECK_DATABASE_URL, then the config file. */
export function resolveDatabaseUrl(flags: Record<string, string>): string {
	// An empty variable counts as unset.
	const url = flags.url || process.env.SOURCEDECK_DATABASE_URL || loadConfig().databaseUrl;
	if (!url || url === "true") {
		fatal("--url is required (or set SOURCEDECK_DATABASE_URL, or run 'sourcedeck use --url <url>')");
	}
	return url;
}

/** Open the catalog backend for this invocation, or die. */
export function openBackend(flags: Record<string, string>): CatalogBackend {
	const backend = createCatalogBackend(
		{ connectionString: resolveDatabaseUrl(flags) },
		createCliLogger(),
	);
	if (!backend.ok) fatal(backend.error.message);
	return backend.value;
}
