import type { Config } from "@viewgen/core";

/** One row per generated view with the filters it applies. */
export function summarizeFilters(config: Config): Array<Record<string, string>> {
	const rows: Array<Record<string, string>> = [];
	for (const [datasetName, dataset] of config.sourceDatasetsConfig) {
		for (const [tableKey, table] of dataset.tables) {
			const filters = table.filterColumns.map((f) => `${f.columnName} ${f.condition}`);
			rows.push({
				dataset: datasetName,
				table: tableKey,
				filters: filters.length > 0 ? filters.join("; ") : "(none)",
			});
		}
	}
	return rows;
}
