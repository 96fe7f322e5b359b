/** Print a message to stdout. */
export function print(message: string): void {
	process.stdout.write(`${message}\n`);
}

/** Print an error to stderr and exit with code 1. */
export function fatal(message: string): never {
	process.stderr.write(`Error: ${message}\n`);
	process.exit(1);
}

/** Print a warning to stderr. */
export function warn(message: string): void {
	process.stderr.write(`Warning: ${message}\n`);
}

type Cell = string | number | boolean | undefined;

/** Print a key-value table to stdout. Columns follow the keys of the first row. */
export function printTable(rows: Array<Record<string, Cell>>): void {
	const first = rows[0];
	if (!first) {
		print("(none)");
		return;
	}

	const keys = Object.keys(first);
	const widths = keys.map((key) =>
		Math.max(key.length, ...rows.map((row) => String(row[key] ?? "").length)),
	);
	const line = (cells: string[]) =>
		cells.map((cell, i) => cell.padEnd(widths[i] ?? 0)).join("  ").trimEnd();

	print(line(keys));
	print(line(widths.map((w) => "-".repeat(w))));
	for (const row of rows) {
		print(line(keys.map((key) => String(row[key] ?? ""))));
	}
}

/** Print aligned `Label: value` lines, skipping empty values. */
export function printDetails(entries: Array<[label: string, value: Cell]>): void {
	const present = entries.filter(([, value]) => value !== undefined && value !== "");
	const width = Math.max(0, ...present.map(([label]) => label.length + 1));
	for (const [label, value] of present) {
		print(`  ${`${label}:`.padEnd(width)} ${String(value)}`);
	}
}
