import { fatal } from "./output";

/** Parsed command-line arguments. */
export interface ParsedArgs {
	/** The command path (e.g. ["types", "show"]) */
	command: string[];
	/** Named flags (e.g. --file becomes { file: "value" }) */
	flags: Record<string, string>;
	/** Positional arguments after the command */
	positional: string[];
}

/** Commands made of a noun and a verb */
const TWO_WORD_COMMANDS = new Set([
	"types list",
	"types show",
	"types delete",
	"fields get",
]);

/** Whether an argument looks like a flag rather than a value. */
function isFlag(arg: string): boolean {
	return arg.startsWith("-");
}

/**
 * Parse process.argv into structured command, flags, and positional args.
 *
 * Supports:
 * - `--flag value` style options
 * - `--flag=value` style options
 * - Commands and subcommands before flags
 * - Positional arguments mixed with flags
 */
export function parseArgs(argv: string[]): ParsedArgs {
	// Skip node binary and script path
	const args = argv.slice(2);

	const command: string[] = [];
	const flags: Record<string, string> = {};
	const positional: string[] = [];

	let i = 0;

	// Consume the first non-flag word as the command
	const first = args[0];
	if (first !== undefined && !isFlag(first)) {
		command.push(first);
		i++;

		const second = args[1];
		if (second !== undefined && TWO_WORD_COMMANDS.has(`${first} ${second}`)) {
			command.push(second);
			i++;
		}
	}

	// Parse remaining as flags and positional args
	for (; i < args.length; i++) {
		const arg = args[i];
		if (arg === undefined) break;
		const next = args[i + 1];

		if (arg.startsWith("--")) {
			const equalIdx = arg.indexOf("=");
			if (equalIdx !== -1) {
				// --flag=value
				flags[arg.slice(2, equalIdx)] = arg.slice(equalIdx + 1);
			} else if (next !== undefined && !isFlag(next)) {
				// --flag value
				flags[arg.slice(2)] = next;
				i++;
			} else {
				flags[arg.slice(2)] = "true";
			}
		} else if (isFlag(arg) && arg.length === 2) {
			// Short flag: -h
			if (next !== undefined && !isFlag(next)) {
				flags[arg.slice(1)] = next;
				i++;
			} else {
				flags[arg.slice(1)] = "true";
			}
		} else {
			positional.push(arg);
		}
	}

	return { command, flags, positional };
}

/** Get a required flag value, printing an error and exiting if missing. */
export function requireFlag(flags: Record<string, string>, name: string): string {
	const value = flags[name];
	if (value === undefined || value === "true") {
		fatal(`--${name} is required`);
	}
	return value;
}

/** Get an optional flag that takes a value. Given bare, it is an error. */
export function optionalFlag(
	flags: Record<string, string>,
	name: string,
	valueName: string,
): string | undefined {
	const value = flags[name];
	if (value === "true") {
		fatal(`--${name} requires a ${valueName}`);
	}
	return value;
}

/** Get a required positive integer flag such as `--id`. */
export function requireId(flags: Record<string, string>, name = "id"): number {
	const value = requireFlag(flags, name);
	const id = Number(value);
	if (!/^\d+$/.test(value) || !Number.isSafeInteger(id) || id < 1) {
		fatal(`--${name} must be a positive integer (got "${value}")`);
	}
	return id;
}
