import type { FilterColumn } from "../filters/types";

/** One generated view over a source table */
export interface TableConfig {
	sourceTableId: string;
	/** Defaults to `sourceTableId` */
	viewName: string;
	filterColumns: readonly FilterColumn[];
	/** Raw SQL appended to the WHERE clause; omitted from output when empty */
	additionalWhere?: string;
	description?: string;
}

/** An origin dataset whose tables get filtered views */
export interface SourceDatasetConfig {
	/** Key into `outputDatasetsConfig`; not checked against it */
	targetDatasetKey: string;
	description: string;
	tables: ReadonlyMap<string, TableConfig>;
	sourceProjectId?: string;
}

/** A destination dataset holding generated views */
export interface OutputDatasetConfig {
	datasetId: string;
	description: string;
	monthsBack: number;
	labels: ReadonlyMap<string, string>;
}

/** Root configuration handed to the renderer */
export interface Config {
	projectId: string;
	region: string;
	viewPrefix: string;
	outputDatasetsConfig: ReadonlyMap<string, OutputDatasetConfig>;
	sourceDatasetsConfig: ReadonlyMap<string, SourceDatasetConfig>;
}

/** A requested output dataset */
export interface OutputDatasetSpec {
	/** Dataset key. The primary entry falls back to the client key when unset. */
	key?: string;
	/** Defaults to {@link DEFAULT_MONTHS_BACK} */
	monthsBack?: number;
}

/** Completed user input, as collected by the prompt or batch layer */
export interface UserInputRecord {
	projectId: string;
	region: string;
	viewPrefix: string;
	clientName: string;
	/** The first entry is the primary (client) dataset */
	outputDatasets: readonly OutputDatasetSpec[];
}

export const DEFAULT_REGION = "asia-northeast1";
export const DEFAULT_VIEW_PREFIX = "filtered_";
export const DEFAULT_MONTHS_BACK = 18;
export const DEFAULT_OUTPUT_FILE = "terraform.tfvars";
