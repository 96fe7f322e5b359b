import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import { toError } from "@sourcedeck/core";
import { warn } from "./output";

/** CLI configuration stored at ~/.sourcedeck/config.json */
export interface CliConfig {
	/** Default catalog database URL (postgres://, mysql:// or memory:) */
	databaseUrl?: string;
}

const CONFIG_DIR = join(homedir(), ".sourcedeck");
const CONFIG_FILE = join(CONFIG_DIR, "config.json");

/** Load the CLI configuration file. Returns empty config if not found or unreadable. */
export function loadConfig(): CliConfig {
	if (!existsSync(CONFIG_FILE)) return {};

	let parsed: unknown;
	try {
		parsed = JSON.parse(readFileSync(CONFIG_FILE, "utf-8"));
	} catch (error) {
		warn(`Ignoring ${CONFIG_FILE}: ${toError(error).message}`);
		return {};
	}

	const config: CliConfig = {};
	if (typeof parsed === "object" && parsed !== null && "databaseUrl" in parsed) {
		if (typeof parsed.databaseUrl === "string") config.databaseUrl = parsed.databaseUrl;
	}
	return config;
}

/** Save the CLI configuration file. Creates ~/.sourcedeck/ if it does not exist. */
export function saveConfig(config: CliConfig): void {
	if (!existsSync(CONFIG_DIR)) {
		mkdirSync(CONFIG_DIR, { recursive: true });
	}
	writeFileSync(CONFIG_FILE, `${JSON.stringify(config, null, "\t")}\n`, "utf-8");
}

/** Get the config file path. */
export function getConfigFile(): string {
	return CONFIG_FILE;
}
