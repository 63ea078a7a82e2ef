import type { FilterColumnName } from "../filters/types";
import type { Catalog, SourceDatasetDefinition } from "./types";

/** Built-in catalog of source datasets and per-table filter columns. */
export const DEFAULT_CATALOG: Catalog = {
	tableFilters: new Map<string, readonly FilterColumnName[]>([
		["users", ["account_name", "user_id", "status"]],
		["transactions", ["client_id", "status", "region"]],
		["events", ["account_name", "user_id"]],
		["orders", ["client_id", "status"]],
		["logs", ["account_name", "region"]],
	]),
	sourceDatasets: new Map<string, SourceDatasetDefinition>([
		[
			"raw_lake",
			{
				description: "Raw data lake",
				tables: ["users", "transactions", "events", "orders", "logs"],
			},
		],
		[
			"analytics_raw",
			{
				description: "Raw analytics data",
				tables: ["user_behavior", "conversion_events", "page_tracking"],
			},
		],
		[
			"transaction_raw",
			{
				description: "Raw transaction data",
				tables: ["payments", "refunds", "invoices"],
			},
		],
	]),
};
