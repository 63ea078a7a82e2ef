import { assemble, DEFAULT_OUTPUT_FILE, renderTfvars } from "@viewgen/core";
import { hasFlag } from "../args";
import { collectInput } from "../collect";
import { getConfigFile, loadConfig, saveConfig } from "../config";
import { writeOutput } from "../files";
import { createCliLogger, fatal, print, printTable } from "../output";
import { askText, createReadlinePrompter, type Prompter } from "../prompt";
import { summarizeFilters } from "../summary";
import { resolveCatalog } from "./shared";

/**
 * `viewgen generate` — Ask for the inputs interactively and write the
 * Terraform variables file.
 */
export async function generate(
	flags: Record<string, string>,
	prompter: Prompter = createReadlinePrompter(),
): Promise<void> {
	const config = loadConfig();
	const catalog = resolveCatalog(flags, config);
	const escape = hasFlag(flags, "escape-quotes");
	const logger = createCliLogger(hasFlag(flags, "verbose"));

	try {
		print("=== Terraform.tfvars Interactive Generator ===");
		print("");

		const { input, filters } = await collectInput(prompter, config);

		print("");
		print("=== Generating Source Datasets Configuration ===");
		print("Using predefined datasets and tables structure...");
		const assembled = assemble(input, filters, { catalog, escapeLiterals: escape, logger });
		printTable(summarizeFilters(assembled));

		const rendered = renderTfvars(assembled, { escapeStrings: escape });
		if (!rendered.ok) {
			fatal(rendered.error.message);
		}

		const outputFile =
			flags.out ??
			(await askText(prompter, "Output filename", {
				default: config.outputFile ?? DEFAULT_OUTPUT_FILE,
			}));

		const written = writeOutput(outputFile, rendered.value);
		if (!written.ok) {
			fatal(written.error.message);
		}

		if (hasFlag(flags, "remember")) {
			saveConfig({
				...config,
				projectId: input.projectId,
				region: input.region,
				viewPrefix: input.viewPrefix,
			});
			print(`Saved defaults to ${getConfigFile()}`);
		}

		print("");
		print(`Generated ${outputFile} successfully!`);
	} finally {
		prompter.close();
	}
}
