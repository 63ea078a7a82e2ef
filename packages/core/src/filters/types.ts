/** Columns that accept global filter values, in prompt order. */
export const FILTER_COLUMN_NAMES = [
	"account_name",
	"client_id",
	"user_id",
	"status",
	"region",
] as const;

/** A recognised filter column name */
export type FilterColumnName = (typeof FILTER_COLUMN_NAMES)[number];

/** Human-readable hint shown when prompting for each column */
export const FILTER_COLUMN_DESCRIPTIONS: Readonly<Record<FilterColumnName, string>> = {
	account_name: "Account name filter",
	client_id: "Client ID filter",
	user_id: "User ID filter",
	status: "Status filter (e.g., 'active', 'completed')",
	region: "Region filter",
};

/** How a filter combines with the preceding one. Only AND is produced today. */
export type FilterOperator = "AND" | "OR";

/** The operator every resolved filter carries */
export const DEFAULT_FILTER_OPERATOR: FilterOperator = "AND";

/** A single WHERE-clause fragment applied to a generated view */
export interface FilterColumn {
	columnName: FilterColumnName;
	/** `= 'v'` or `IN ('v1', 'v2')` */
	condition: string;
	operator: FilterOperator;
}

/**
 * Global filter values keyed by column.
 *
 * A column is present only when at least one non-empty value was supplied.
 * Values keep the order the user entered them in.
 */
export type FilterValueSet = ReadonlyMap<FilterColumnName, readonly string[]>;

/** Type guard for {@link FilterColumnName}. */
export function isFilterColumnName(name: string): name is FilterColumnName {
	return (FILTER_COLUMN_NAMES as readonly string[]).includes(name);
}
