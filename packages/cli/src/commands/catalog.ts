import { loadConfig } from "../config";
import { print, printTable } from "../output";
import { resolveCatalog } from "./shared";

/** `viewgen catalog` — Show source datasets and per-table filter columns. */
export function catalog(flags: Record<string, string>): void {
	const active = resolveCatalog(flags, loadConfig());

	print("Source datasets:");
	printTable(
		[...active.sourceDatasets].map(([name, dataset]) => ({
			dataset: name,
			description: dataset.description,
			tables: dataset.tables.join(", "),
			project: dataset.sourceProjectId ?? "",
		})),
	);

	print("");
	print("Table filters:");
	printTable(
		[...active.tableFilters].map(([table, columns]) => ({
			table,
			columns: columns.join(", "),
		})),
	);
}
