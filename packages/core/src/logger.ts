// ---------------------------------------------------------------------------
// Structured Logger: minimal JSON-lines logger
// ---------------------------------------------------------------------------

/** Supported log levels, ordered by severity. */
export type LogLevel = "debug" | "info" | "warn" | "error";

/** A single structured log entry. */
export interface LogEntry {
	level: LogLevel;
	msg: string;
	ts: string;
	[key: string]: unknown;
}

/** Numeric severity values for level comparison. */
const LEVEL_VALUE: Record<LogLevel, number> = {
	debug: 0,
	info: 1,
	warn: 2,
	error: 3,
};

/** Narrow an arbitrary string (e.g. an env var) to a log level. */
export function isLogLevel(value: string): value is LogLevel {
	return value in LEVEL_VALUE;
}

/**
 * Structured logger that writes one JSON object per line.
 *
 * Supports level filtering and child loggers with bound context.
 *
 * @example
 * ```ts
 * const logger = new Logger("info");
 * const seedLogger = logger.child({ component: "seed" });
 * seedLogger.info("config type created", { key: "redshift", fields: 7 });
 * // => {"level":"info","msg":"config type created","ts":"...","component":"seed","key":"redshift","fields":7}
 * ```
 */
export class Logger {
	private readonly minLevel: LogLevel;
	private readonly bindings: Record<string, unknown>;

	/** Output function. Defaults to stdout; tests pass their own. */
	private readonly writeFn: (line: string) => void;

	constructor(
		minLevel: LogLevel = "info",
		bindings: Record<string, unknown> = {},
		writeFn?: (line: string) => void,
	) {
		this.minLevel = minLevel;
		this.bindings = bindings;
		this.writeFn = writeFn ?? ((line) => process.stdout.write(`${line}\n`));
	}

	/** Log at debug level. */
	debug(msg: string, data?: Record<string, unknown>): void {
		this.log("debug", msg, data);
	}

	/** Log at info level. */
	info(msg: string, data?: Record<string, unknown>): void {
		this.log("info", msg, data);
	}

	/** Log at warn level. */
	warn(msg: string, data?: Record<string, unknown>): void {
		this.log("warn", msg, data);
	}

	/** Log at error level. */
	error(msg: string, data?: Record<string, unknown>): void {
		this.log("error", msg, data);
	}

	/** Create a child logger that merges `bindings` into every entry. */
	child(bindings: Record<string, unknown>): Logger {
		return new Logger(this.minLevel, { ...this.bindings, ...bindings }, this.writeFn);
	}

	private log(level: LogLevel, msg: string, data?: Record<string, unknown>): void {
		if (LEVEL_VALUE[level] < LEVEL_VALUE[this.minLevel]) return;

		const entry: LogEntry = {
			level,
			msg,
			ts: new Date().toISOString(),
			...this.bindings,
			...data,
		};

		this.writeFn(JSON.stringify(entry));
	}
}

/** Logger that drops every entry. Used when no logger is injected. */
export const silentLogger = new Logger("error", {}, () => {});
