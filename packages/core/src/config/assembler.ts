import { DEFAULT_CATALOG } from "../catalog/defaults";
import type { Catalog } from "../catalog/types";
import { resolveFilters } from "../filters/resolver";
import type { FilterValueSet } from "../filters/types";
import { isPositiveInteger } from "../guards";
import { type Logger, noopLogger } from "../logger";
import { InputError } from "../result/errors";
import { toClientKey, toClientLabel, titleCase } from "./naming";
import {
	type Config,
	DEFAULT_MONTHS_BACK,
	type OutputDatasetConfig,
	type SourceDatasetConfig,
	type TableConfig,
	type UserInputRecord,
} from "./types";

/** Options for {@link assemble}. */
export interface AssembleOptions {
	/** Catalog of source datasets and filter columns. Defaults to {@link DEFAULT_CATALOG}. */
	catalog?: Catalog;
	/** Passed through to the filter resolver. */
	escapeLiterals?: boolean;
	logger?: Logger;
}

/** Build the output dataset entry for one key. */
export function buildOutputDataset(
	key: string,
	clientName: string,
	monthsBack: number = DEFAULT_MONTHS_BACK,
): OutputDatasetConfig {
	return {
		datasetId: `${key}_filtered`,
		description: `${titleCase(key)} filtered views for ${clientName}`,
		monthsBack,
		labels: new Map([
			["environment", "production"],
			["client", toClientLabel(clientName)],
			["team", key],
		]),
	};
}

/**
 * Build source dataset entries for every dataset in the catalog.
 *
 * Each table gets a view of the same name with the filters resolved from
 * `globalFilters`. All datasets point at `targetDatasetKey`.
 */
export function buildSourceDatasets(
	targetDatasetKey: string,
	globalFilters: FilterValueSet,
	options: AssembleOptions = {},
): Map<string, SourceDatasetConfig> {
	const catalog = options.catalog ?? DEFAULT_CATALOG;
	const logger = options.logger ?? noopLogger;

	const datasets = new Map<string, SourceDatasetConfig>();
	for (const [datasetName, definition] of catalog.sourceDatasets) {
		const tables = new Map<string, TableConfig>();
		for (const tableName of definition.tables) {
			const filterColumns = resolveFilters(tableName, globalFilters, {
				catalog,
				escapeLiterals: options.escapeLiterals,
			});
			logger("debug", `Resolved ${filterColumns.length} filter(s) for ${datasetName}.${tableName}`, {
				dataset: datasetName,
				table: tableName,
				filters: filterColumns.length,
			});

			tables.set(tableName, {
				sourceTableId: tableName,
				viewName: tableName,
				filterColumns,
				additionalWhere: "",
				description: `${tableName} filtered view`,
			});
		}

		const dataset: SourceDatasetConfig = {
			targetDatasetKey,
			description: definition.description,
			tables,
		};
		if (definition.sourceProjectId !== undefined) {
			dataset.sourceProjectId = definition.sourceProjectId;
		}
		datasets.set(datasetName, dataset);
	}
	return datasets;
}

/**
 * Merge user input with the catalog into a complete {@link Config}.
 *
 * The first output dataset is the primary one; its key falls back to the
 * client key. A repeated key replaces the earlier entry in place. Source
 * datasets always target the client key, whatever the primary key is.
 *
 * Throws {@link InputError} when the record breaks its preconditions: no
 * output datasets, a secondary dataset without a key, or a `monthsBack`
 * that is not a positive integer.
 *
 * @param input - Completed user input (integers already parsed)
 * @param globalFilters - Filter values applied to every matching table
 */
export function assemble(
	input: UserInputRecord,
	globalFilters: FilterValueSet,
	options: AssembleOptions = {},
): Config {
	const logger = options.logger ?? noopLogger;
	const clientKey = toClientKey(input.clientName);

	if (input.outputDatasets.length === 0) {
		throw new InputError("At least one output dataset is required");
	}

	const outputDatasetsConfig = new Map<string, OutputDatasetConfig>();
	input.outputDatasets.forEach((spec, index) => {
		const key = spec.key ?? (index === 0 ? clientKey : undefined);
		if (key === undefined || key.length === 0) {
			throw new InputError(`Output dataset at index ${index} must have a key`);
		}
		if (spec.monthsBack !== undefined && !isPositiveInteger(spec.monthsBack)) {
			throw new InputError(`Output dataset "${key}" monthsBack must be a positive integer`);
		}
		if (outputDatasetsConfig.has(key)) {
			logger("warn", `Output dataset "${key}" defined more than once; keeping the last`);
		}
		outputDatasetsConfig.set(key, buildOutputDataset(key, input.clientName, spec.monthsBack));
	});

	logger("debug", `Assembled ${outputDatasetsConfig.size} output dataset(s)`, {
		client: clientKey,
	});

	return {
		projectId: input.projectId,
		region: input.region,
		viewPrefix: input.viewPrefix,
		outputDatasetsConfig,
		sourceDatasetsConfig: buildSourceDatasets(clientKey, globalFilters, options),
	};
}
