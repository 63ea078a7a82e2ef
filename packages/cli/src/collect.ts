import {
	DEFAULT_MONTHS_BACK,
	DEFAULT_REGION,
	DEFAULT_VIEW_PREFIX,
	FILTER_COLUMN_DESCRIPTIONS,
	FILTER_COLUMN_NAMES,
	type BatchInput,
	buildFilterValueSet,
	type OutputDatasetSpec,
	toClientKey,
} from "@viewgen/core";
import { print } from "./output";
import { askPositiveInt, askText, askYesNo, type Prompter } from "./prompt";

/** Answers offered as defaults, usually from ~/.viewgen/config.json */
export interface PromptDefaults {
	projectId?: string;
	region?: string;
	viewPrefix?: string;
}

/** Ask for one value list per filter column. */
export async function collectFilterValues(prompter: Prompter): Promise<Record<string, string>> {
	print("");
	print("=== Global Filter Values ===");
	print("These values will be used for filtering across all applicable tables.");
	print("You can specify multiple values separated by commas.");
	print("Leave empty if not needed.");
	print("");

	const raw: Record<string, string> = {};
	for (const column of FILTER_COLUMN_NAMES) {
		raw[column] = await askText(
			prompter,
			`${column} (${FILTER_COLUMN_DESCRIPTIONS[column]}) - comma separated for multiple`,
			{ required: false },
		);
	}
	return raw;
}

/** Ask for the primary output dataset and any additional ones. */
export async function collectOutputDatasets(
	prompter: Prompter,
	clientName: string,
): Promise<OutputDatasetSpec[]> {
	print("");
	print("=== Output Dataset Configuration ===");
	print(`Using client name '${clientName}' as dataset key`);

	const primaryKey = await askText(prompter, "Dataset key", { default: toClientKey(clientName) });
	const specs: OutputDatasetSpec[] = [
		{ key: primaryKey, monthsBack: await askPositiveInt(prompter, "Months back", DEFAULT_MONTHS_BACK) },
	];
	const used = new Set([primaryKey]);

	while (await askYesNo(prompter, "Add another output dataset?", false)) {
		let key = await askText(prompter, "Dataset key (e.g., 'analytics', 'finance')");
		while (used.has(key)) {
			print(`Dataset key '${key}' is already used. Choose another.`);
			key = await askText(prompter, "Dataset key (e.g., 'analytics', 'finance')");
		}
		used.add(key);
		specs.push({ key, monthsBack: await askPositiveInt(prompter, "Months back", DEFAULT_MONTHS_BACK) });
	}
	return specs;
}

/**
 * Run the interactive question flow and return a completed input record
 * with its filter values.
 */
export async function collectInput(
	prompter: Prompter,
	defaults: PromptDefaults = {},
): Promise<BatchInput> {
	const projectId = await askText(prompter, "GCP Project ID", { default: defaults.projectId });
	const region = await askText(prompter, "Region", { default: defaults.region ?? DEFAULT_REGION });
	const viewPrefix = await askText(prompter, "View prefix", {
		default: defaults.viewPrefix ?? DEFAULT_VIEW_PREFIX,
	});
	const clientName = await askText(prompter, "Client name");

	const filters = buildFilterValueSet(await collectFilterValues(prompter));
	const outputDatasets = await collectOutputDatasets(prompter, clientName);

	return {
		input: { projectId, region, viewPrefix, clientName, outputDatasets },
		filters,
	};
}
