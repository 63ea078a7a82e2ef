import { FILTER_COLUMN_NAMES, type FilterColumnName, isFilterColumnName } from "../filters/types";
import { isNonEmptyString, isRecord } from "../guards";
import { CatalogError } from "../result/errors";
import { Err, Ok, type Result } from "../result/result";
import type { Catalog, SourceDatasetDefinition } from "./types";

/**
 * Validate a catalog document (typically parsed JSON) and build a {@link Catalog}.
 *
 * Expected shape:
 * ```json
 * {
 *   "tableFilters": { "orders": ["client_id", "status"] },
 *   "sourceDatasets": {
 *     "raw_lake": { "description": "Raw data lake", "tables": ["orders"], "sourceProjectId": "lake-prod" }
 *   }
 * }
 * ```
 *
 * Object key order becomes map order, except that integer-like keys such as
 * `"2024"` always come first in ascending order. Use non-numeric names where
 * emission order matters. A table may list each filter column once.
 */
export function validateCatalog(doc: unknown): Result<Catalog, CatalogError> {
	if (!isRecord(doc)) {
		return Err(new CatalogError("Catalog must be an object"));
	}

	if (!isRecord(doc.tableFilters)) {
		return Err(new CatalogError("Catalog tableFilters must be an object"));
	}

	const tableFilters = new Map<string, readonly FilterColumnName[]>();
	for (const [table, columns] of Object.entries(doc.tableFilters)) {
		if (!Array.isArray(columns)) {
			return Err(new CatalogError(`Table "${table}" filter columns must be an array`));
		}
		const names: FilterColumnName[] = [];
		for (const column of columns) {
			if (typeof column !== "string" || !isFilterColumnName(column)) {
				return Err(
					new CatalogError(
						`Table "${table}" has unknown filter column ${JSON.stringify(column)}; expected one of: ${FILTER_COLUMN_NAMES.join(", ")}`,
					),
				);
			}
			if (names.includes(column)) {
				return Err(
					new CatalogError(`Table "${table}" lists filter column "${column}" more than once`),
				);
			}
			names.push(column);
		}
		tableFilters.set(table, names);
	}

	if (!isRecord(doc.sourceDatasets)) {
		return Err(new CatalogError("Catalog sourceDatasets must be an object"));
	}

	const sourceDatasets = new Map<string, SourceDatasetDefinition>();
	for (const [name, entry] of Object.entries(doc.sourceDatasets)) {
		if (!isRecord(entry)) {
			return Err(new CatalogError(`Source dataset "${name}" must be an object`));
		}
		if (typeof entry.description !== "string") {
			return Err(new CatalogError(`Source dataset "${name}" must have a description`));
		}
		if (!Array.isArray(entry.tables)) {
			return Err(new CatalogError(`Source dataset "${name}" tables must be an array`));
		}

		const tables: string[] = [];
		for (const table of entry.tables) {
			if (!isNonEmptyString(table)) {
				return Err(
					new CatalogError(`Source dataset "${name}" tables must contain non-empty strings`),
				);
			}
			tables.push(table);
		}

		const definition: SourceDatasetDefinition = { description: entry.description, tables };
		if (entry.sourceProjectId !== undefined) {
			if (!isNonEmptyString(entry.sourceProjectId)) {
				return Err(
					new CatalogError(`Source dataset "${name}" sourceProjectId must be a non-empty string`),
				);
			}
			definition.sourceProjectId = entry.sourceProjectId;
		}
		sourceDatasets.set(name, definition);
	}

	return Ok({ tableFilters, sourceDatasets });
}
