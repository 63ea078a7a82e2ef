export { formatCondition, type ResolveOptions, resolveFilters } from "./resolver";
export {
	DEFAULT_FILTER_OPERATOR,
	FILTER_COLUMN_DESCRIPTIONS,
	FILTER_COLUMN_NAMES,
	type FilterColumn,
	type FilterColumnName,
	type FilterOperator,
	type FilterValueSet,
	isFilterColumnName,
} from "./types";
export { buildFilterValueSet, type RawFilterInput, splitFilterValues } from "./values";
