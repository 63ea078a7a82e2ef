/** Parsed command-line arguments. */
export interface ParsedArgs {
	/** The command (e.g. ["batch"]); empty when none was given */
	command: string[];
	/** Named flags (e.g. --out becomes { out: "value" }) */
	flags: Record<string, string>;
	/** Positional arguments after the command */
	positional: string[];
}

/** Flags that never take a value, so a following word stays positional. */
const BOOLEAN_FLAGS = new Set([
	"help",
	"h",
	"version",
	"v",
	"stdout",
	"verbose",
	"remember",
	"escape-quotes",
]);

/**
 * Parse process.argv into structured command, flags, and positional args.
 *
 * Supports:
 * - `--flag value` style options
 * - `--flag=value` style options
 * - `-x` short flags
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
	if (first !== undefined && !first.startsWith("-")) {
		command.push(first);
		i++;
	}

	while (i < args.length) {
		const arg = args[i] ?? "";

		if (arg.startsWith("--") || (arg.startsWith("-") && arg.length === 2)) {
			const body = arg.startsWith("--") ? arg.slice(2) : arg.slice(1);
			const equalIdx = body.indexOf("=");
			if (equalIdx !== -1) {
				// --flag=value
				flags[body.slice(0, equalIdx)] = body.slice(equalIdx + 1);
			} else {
				const nextArg = args[i + 1];
				if (!BOOLEAN_FLAGS.has(body) && nextArg !== undefined && !nextArg.startsWith("-")) {
					flags[body] = nextArg;
					i++;
				} else {
					flags[body] = "true";
				}
			}
		} else {
			positional.push(arg);
		}
		i++;
	}

	return { command, flags, positional };
}

/** Whether a boolean flag was set. */
export function hasFlag(flags: Record<string, string>, name: string): boolean {
	return flags[name] === "true";
}
