import type {
	Config,
	OutputDatasetConfig,
	SourceDatasetConfig,
	TableConfig,
} from "../config/types";
import { DEFAULT_FILTER_OPERATOR, type FilterColumn } from "../filters/types";
import { isNonEmptyString, isPositiveInteger } from "../guards";
import { RenderError } from "../result/errors";
import { Err, Ok, type Result, unwrapOrThrow } from "../result/result";

/** Options for {@link renderTfvars}. */
export interface RenderOptions {
	/**
	 * Escape `\` and `"` inside quoted strings.
	 *
	 * Off by default to keep output identical to earlier releases; with it
	 * off, a value containing `"` produces an unparsable file.
	 */
	escapeStrings?: boolean;
}

const INDENT = "  ";

function pad(depth: number): string {
	return INDENT.repeat(depth);
}

/** Check the fields the renderer cannot do without. */
export function checkRenderable(config: Config): Result<void, RenderError> {
	if (!isNonEmptyString(config.projectId)) {
		return Err(new RenderError("project_id is required"));
	}
	if (!isNonEmptyString(config.region)) {
		return Err(new RenderError("region is required"));
	}
	if (!isNonEmptyString(config.viewPrefix)) {
		return Err(new RenderError("view_prefix is required"));
	}
	if (config.outputDatasetsConfig.size === 0) {
		return Err(new RenderError("At least one output dataset is required"));
	}

	for (const [key, dataset] of config.outputDatasetsConfig) {
		if (!isNonEmptyString(dataset.datasetId)) {
			return Err(new RenderError(`Output dataset "${key}" dataset_id is required`));
		}
		if (!isPositiveInteger(dataset.monthsBack)) {
			return Err(new RenderError(`Output dataset "${key}" months_back must be a positive integer`));
		}
	}

	for (const [name, dataset] of config.sourceDatasetsConfig) {
		if (!isNonEmptyString(dataset.targetDatasetKey)) {
			return Err(new RenderError(`Source dataset "${name}" target_dataset_key is required`));
		}
		for (const [tableKey, table] of dataset.tables) {
			if (!isNonEmptyString(table.sourceTableId)) {
				return Err(new RenderError(`Table "${name}.${tableKey}" source_table_id is required`));
			}
			if (!isNonEmptyString(table.viewName)) {
				return Err(new RenderError(`Table "${name}.${tableKey}" view_name is required`));
			}
		}
	}

	return Ok(undefined);
}

class TfvarsWriter {
	readonly lines: string[] = [];

	constructor(private readonly escapeStrings: boolean) {}

	quote(value: string): string {
		const body = this.escapeStrings ? value.replace(/\\/g, "\\\\").replace(/"/g, '\\"') : value;
		return `"${body}"`;
	}

	line(depth: number, text: string): void {
		this.lines.push(`${pad(depth)}${text}`);
	}

	blank(): void {
		this.lines.push("");
	}

	basics(config: Config): void {
		this.line(0, "# GCP Configuration");
		this.line(0, `project_id = ${this.quote(config.projectId)}`);
		this.line(0, `region     = ${this.quote(config.region)}`);
		this.blank();
		this.line(0, "# View Configuration");
		this.line(0, `view_prefix = ${this.quote(config.viewPrefix)}`);
		this.blank();
	}

	outputDataset(key: string, dataset: OutputDatasetConfig): void {
		this.line(1, `${this.quote(key)} = {`);
		this.line(2, `dataset_id  = ${this.quote(dataset.datasetId)}`);
		this.line(2, `description = ${this.quote(dataset.description)}`);
		this.line(2, `months_back = ${dataset.monthsBack}`);
		this.line(2, "labels = {");
		for (const [labelKey, labelValue] of dataset.labels) {
			this.line(3, `${labelKey} = ${this.quote(labelValue)}`);
		}
		this.line(2, "}");
		this.line(1, "}");
		this.blank();
	}

	filterColumn(filter: FilterColumn): void {
		this.line(5, "{");
		this.line(6, `column_name = ${this.quote(filter.columnName)}`);
		this.line(6, `condition   = ${this.quote(filter.condition)}`);
		if (filter.operator !== DEFAULT_FILTER_OPERATOR) {
			this.line(6, `operator    = ${this.quote(filter.operator)}`);
		}
		this.line(5, "}");
	}

	table(key: string, table: TableConfig): void {
		this.line(3, `${this.quote(key)} = {`);
		this.line(4, `source_table_id = ${this.quote(table.sourceTableId)}`);
		this.line(4, `view_name      = ${this.quote(table.viewName)}`);
		this.line(4, "filter_columns = [");
		for (const filter of table.filterColumns) {
			this.filterColumn(filter);
		}
		this.line(4, "]");
		if (table.additionalWhere) {
			this.line(4, `additional_where = ${this.quote(table.additionalWhere)}`);
		}
		if (table.description) {
			this.line(4, `description     = ${this.quote(table.description)}`);
		}
		this.line(3, "}");
		this.blank();
	}

	sourceDataset(name: string, dataset: SourceDatasetConfig): void {
		this.line(1, `${this.quote(name)} = {`);
		this.line(2, `target_dataset_key = ${this.quote(dataset.targetDatasetKey)}`);
		if (dataset.sourceProjectId !== undefined) {
			this.line(2, `source_project_id  = ${this.quote(dataset.sourceProjectId)}`);
		}
		this.line(2, `description        = ${this.quote(dataset.description)}`);
		this.line(2, "tables = {");
		for (const [tableKey, table] of dataset.tables) {
			this.table(tableKey, table);
		}
		this.line(2, "}");
		this.line(1, "}");
		this.blank();
	}
}

/**
 * Serialise a {@link Config} as Terraform variables.
 *
 * Map entries are emitted in insertion order. Optional fields are omitted
 * rather than written empty. The config is not modified.
 *
 * @returns Ok(text) or Err(RenderError) when a required field is missing;
 *   never partial text
 */
export function renderTfvars(config: Config, options: RenderOptions = {}): Result<string, RenderError> {
	const check = checkRenderable(config);
	if (!check.ok) return check;

	const out = new TfvarsWriter(options.escapeStrings ?? false);
	out.basics(config);

	out.line(0, "# Output Datasets Configuration");
	out.line(0, "output_datasets_config = {");
	for (const [key, dataset] of config.outputDatasetsConfig) {
		out.outputDataset(key, dataset);
	}
	out.line(0, "}");
	out.blank();

	out.line(0, "# Source Datasets and Tables Configuration");
	out.line(0, "source_datasets_config = {");
	for (const [name, dataset] of config.sourceDatasetsConfig) {
		out.sourceDataset(name, dataset);
	}
	out.line(0, "}");

	return Ok(out.lines.join("\n"));
}

/** Throwing variant of {@link renderTfvars}. */
export function render(config: Config, options?: RenderOptions): string {
	return unwrapOrThrow(renderTfvars(config, options));
}
