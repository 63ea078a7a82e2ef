export { DEFAULT_CATALOG } from "./defaults";
export type { Catalog, SourceDatasetDefinition } from "./types";
export { validateCatalog } from "./validate";
