import type { FilterColumnName } from "../filters/types";

/** A predefined source dataset and the tables it contributes */
export interface SourceDatasetDefinition {
	description: string;
	/** Table names, in the order they are emitted */
	tables: readonly string[];
	/** Project that owns the dataset, when it differs from the target project */
	sourceProjectId?: string;
}

/**
 * Static dataset/table/column relationships used to generate filters
 * without per-table input.
 */
export interface Catalog {
	/** Table name → columns that may filter it, in emission order */
	tableFilters: ReadonlyMap<string, readonly FilterColumnName[]>;
	/** Source dataset name → definition, in emission order */
	sourceDatasets: ReadonlyMap<string, SourceDatasetDefinition>;
}
