import { isLogLevel, Logger } from "@sourcedeck/core";

/**
 * Logger for CLI runs. Writes JSON lines to stderr so stdout carries only
 * command output; the level comes from SOURCEDECK_LOG_LEVEL.
 */
export function createCliLogger(env: NodeJS.ProcessEnv = process.env): Logger {
	const level = env.SOURCEDECK_LOG_LEVEL ?? "info";
	return new Logger(isLogLevel(level) ? level : "info", { service: "sourcedeck-cli" }, (line) =>
		process.stderr.write(`${line}\n`),
	);
}
