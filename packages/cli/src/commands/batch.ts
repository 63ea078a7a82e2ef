import {
	assemble,
	type BatchInput,
	DEFAULT_OUTPUT_FILE,
	flatMapResult,
	renderTfvars,
	type ViewGenError,
} from "@viewgen/core";
import { hasFlag } from "../args";
import { loadConfig } from "../config";
import { loadInputFile, writeOutput } from "../files";
import { createCliLogger, fatal, print } from "../output";
import { resolveCatalog } from "./shared";

/**
 * `viewgen batch <input.json>` — Generate from a JSON input document.
 *
 * Writes to --out (or the configured/default filename), or to stdout
 * with --stdout.
 */
export function batch(flags: Record<string, string>, positional: string[]): void {
	const [inputPath] = positional;
	if (inputPath === undefined) {
		fatal("Usage: viewgen batch <input.json>");
	}

	const config = loadConfig();
	const catalog = resolveCatalog(flags, config);
	const escape = hasFlag(flags, "escape-quotes");
	const logger = createCliLogger(hasFlag(flags, "verbose"));

	const rendered = flatMapResult<BatchInput, string, ViewGenError>(
		loadInputFile(inputPath, logger),
		({ input, filters }) =>
			renderTfvars(assemble(input, filters, { catalog, escapeLiterals: escape, logger }), {
				escapeStrings: escape,
			}),
	);
	if (!rendered.ok) {
		fatal(rendered.error.message);
	}

	if (hasFlag(flags, "stdout")) {
		print(rendered.value);
		return;
	}

	const outputFile = flags.out ?? config.outputFile ?? DEFAULT_OUTPUT_FILE;
	const written = writeOutput(outputFile, rendered.value);
	if (!written.ok) {
		fatal(written.error.message);
	}
	print(`Generated ${outputFile} successfully!`);
}
