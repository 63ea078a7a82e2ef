export {
	type AssembleOptions,
	assemble,
	buildOutputDataset,
	buildSourceDatasets,
} from "./assembler";
export { titleCase, toClientKey, toClientLabel } from "./naming";
export {
	type Config,
	DEFAULT_MONTHS_BACK,
	DEFAULT_OUTPUT_FILE,
	DEFAULT_REGION,
	DEFAULT_VIEW_PREFIX,
	type OutputDatasetConfig,
	type OutputDatasetSpec,
	type SourceDatasetConfig,
	type TableConfig,
	type UserInputRecord,
} from "./types";
export {
	type BatchInput,
	parseBatchInput,
	validateFilterInput,
	validateUserInput,
} from "./validate";
