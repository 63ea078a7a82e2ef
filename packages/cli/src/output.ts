import type { Logger } from "@viewgen/core";

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

/**
 * Logger for core calls. Warnings and errors always reach stderr;
 * debug and info only with `--verbose`.
 */
export function createCliLogger(verbose: boolean): Logger {
	return (level, message) => {
		if (level === "warn" || level === "error") {
			warn(message);
		} else if (verbose) {
			process.stderr.write(`[${level}] ${message}\n`);
		}
	};
}

/** Print a key-value table to stdout. */
export function printTable(rows: Array<Record<string, string | number | boolean | undefined>>): void {
	const [firstRow] = rows;
	if (firstRow === undefined) {
		print("(none)");
		return;
	}

	const keys = Object.keys(firstRow);
	const widths = keys.map((key) =>
		Math.max(key.length, ...rows.map((row) => String(row[key] ?? "").length)),
	);
	const cell = (text: string, i: number) => text.padEnd(widths[i] ?? 0);

	// Header
	print(keys.map(cell).join("  ").trimEnd());
	print(widths.map((w) => "-".repeat(w)).join("  "));

	for (const row of rows) {
		print(
			keys
				.map((key, i) => cell(String(row[key] ?? ""), i))
				.join("  ")
				.trimEnd(),
		);
	}
}
