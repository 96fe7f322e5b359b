import { readFile } from "node:fs/promises";
import { Err, type Result } from "@sourcedeck/core";
import type { ConfigTypeSeed } from "../entities";
import { CatalogError, driverErrorCode, toCause } from "../errors";
import { parseCatalogSeeds } from "./parse";
import referenceCatalog from "./reference-catalog.json";

/** Keys of the bundled reference config types, in seed order */
export const REFERENCE_KEYS = ["redshift", "mssql_local", "azure_sql", "file_system", "sftp"] as const;

/** The bundled reference catalog: Redshift, SQL Server (local), Azure SQL, File System, SFTP. */
export function loadReferenceCatalog(): Result<ConfigTypeSeed[], CatalogError> {
	return parseCatalogSeeds(referenceCatalog);
}

/** Read and validate a seed document from a JSON file. */
export async function loadCatalogFile(
	path: string,
): Promise<Result<ConfigTypeSeed[], CatalogError>> {
	let text: string;
	try {
		text = await readFile(path, "utf-8");
	} catch (error) {
		const code = driverErrorCode(error) === "ENOENT" ? "NOT_FOUND" : "INTERNAL";
		return Err(new CatalogError(`Cannot read seed file ${path}`, code, toCause(error)));
	}

	let document: unknown;
	try {
		document = JSON.parse(text);
	} catch (error) {
		return Err(
			new CatalogError(`Seed file ${path} is not valid JSON`, "CONSTRAINT_VIOLATION", toCause(error)),
		);
	}
	return parseCatalogSeeds(document);
}
