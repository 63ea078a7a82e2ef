import { DEFAULT_CATALOG } from "../catalog/defaults";
import type { Catalog } from "../catalog/types";
import { DEFAULT_FILTER_OPERATOR, type FilterColumn, type FilterValueSet } from "./types";

/** Options for {@link resolveFilters} and {@link formatCondition}. */
export interface ResolveOptions {
	/** Catalog consulted for table → column mappings. Defaults to {@link DEFAULT_CATALOG}. */
	catalog?: Catalog;
	/**
	 * Double embedded single quotes in literals.
	 *
	 * Off by default: existing output leaves values untouched, so a value
	 * containing `'` yields a broken condition unless this is enabled.
	 */
	escapeLiterals?: boolean;
}

function quoteLiteral(value: string, escape: boolean): string {
	return `'${escape ? value.replace(/'/g, "''") : value}'`;
}

/**
 * Format a WHERE condition for a list of literals.
 *
 * One value yields an equality (`= 'a'`), more than one an IN-list
 * (`IN ('a', 'b')`) in the given order.
 */
export function formatCondition(
	values: readonly string[],
	options: Pick<ResolveOptions, "escapeLiterals"> = {},
): string {
	const escape = options.escapeLiterals ?? false;
	const [only] = values;
	if (values.length === 1 && only !== undefined) {
		return `= ${quoteLiteral(only, escape)}`;
	}
	return `IN (${values.map((v) => quoteLiteral(v, escape)).join(", ")})`;
}

/**
 * Resolve the filter columns that apply to a table.
 *
 * Walks the table's applicable columns in catalog order and emits one
 * {@link FilterColumn} for each that has values in `globalFilters`.
 * Tables missing from the catalog and columns without values are skipped
 * silently so that catalog drift never breaks generation.
 *
 * @param tableName - Source table name
 * @param globalFilters - User-supplied values per column
 * @returns Ordered filter columns, possibly empty
 */
export function resolveFilters(
	tableName: string,
	globalFilters: FilterValueSet,
	options: ResolveOptions = {},
): FilterColumn[] {
	const catalog = options.catalog ?? DEFAULT_CATALOG;
	const applicable = catalog.tableFilters.get(tableName) ?? [];

	const filters: FilterColumn[] = [];
	for (const columnName of applicable) {
		const values = globalFilters.get(columnName);
		if (values === undefined || values.length === 0) continue;

		filters.push({
			columnName,
			condition: formatCondition(values, options),
			operator: DEFAULT_FILTER_OPERATOR,
		});
	}
	return filters;
}
