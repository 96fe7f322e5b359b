import { detectDialect } from "@sourcedeck/catalog";
import { requireFlag } from "../args";
import { getConfigFile, loadConfig, saveConfig } from "../config";
import { fatal, print } from "../output";

/**
 * `sourcedeck use --url <url>`: Store the default database URL in ~/.sourcedeck/config.json.
 */
export function use(flags: Record<string, string>): void {
	const url = requireFlag(flags, "url");
	const dialect = detectDialect(url);
	if (!dialect.ok) {
		fatal(dialect.error.message);
	}

	const config = loadConfig();
	config.databaseUrl = url;
	saveConfig(config);
	print(`Default database set (${dialect.value}) in ${getConfigFile()}`);
}
