import type { CatalogBackend, CatalogError } from "@sourcedeck/catalog";
import type { Result } from "@sourcedeck/core";
import { openBackend } from "../backend";
import { fatal } from "../output";

/**
 * Run one command against the catalog backend.
 *
 * The backend is closed before an error is reported, so pools never keep
 * the process alive.
 */
export async function withBackend(
	flags: Record<string, string>,
	work: (backend: CatalogBackend) => Promise<Result<void, CatalogError>>,
): Promise<void> {
	const backend = openBackend(flags);
	const result = await work(backend).finally(() => backend.close());
	if (!result.ok) fatal(result.error.message);
}
