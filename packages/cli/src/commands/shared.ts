import { type Catalog, DEFAULT_CATALOG } from "@viewgen/core";
import type { CliConfig } from "../config";
import { loadCatalogFile } from "../files";
import { fatal } from "../output";

/** Resolve the catalog from --catalog, then config, then the built-in one. */
export function resolveCatalog(flags: Record<string, string>, config: CliConfig): Catalog {
	const path = flags.catalog ?? config.catalogPath;
	if (path === undefined) return DEFAULT_CATALOG;

	const catalog = loadCatalogFile(path);
	if (!catalog.ok) {
		fatal(catalog.error.message);
	}
	return catalog.value;
}
