import { readFileSync, writeFileSync } from "node:fs";
import {
	type BatchInput,
	type Catalog,
	CatalogError,
	Err,
	InputError,
	type Logger,
	Ok,
	OutputError,
	parseBatchInput,
	type Result,
	toError,
	validateCatalog,
} from "@viewgen/core";

/** Read and parse a JSON file. */
export function readJsonFile(path: string): Result<unknown, Error> {
	try {
		return Ok(JSON.parse(readFileSync(path, "utf-8")));
	} catch (err) {
		return Err(toError(err));
	}
}

/** Load a catalog JSON file and validate it. */
export function loadCatalogFile(path: string): Result<Catalog, CatalogError> {
	const doc = readJsonFile(path);
	if (!doc.ok) {
		return Err(new CatalogError(`Cannot read catalog ${path}: ${doc.error.message}`, doc.error));
	}
	return validateCatalog(doc.value);
}

/** Load a batch input JSON file and validate it. */
export function loadInputFile(path: string, logger?: Logger): Result<BatchInput, InputError> {
	const doc = readJsonFile(path);
	if (!doc.ok) {
		return Err(new InputError(`Cannot read input ${path}: ${doc.error.message}`, doc.error));
	}
	const parsed = parseBatchInput(doc.value, logger);
	if (!parsed.ok) {
		return Err(new InputError(`Invalid input ${path}: ${parsed.error.message}`, parsed.error));
	}
	return parsed;
}

/** Write rendered output, replacing any existing file. */
export function writeOutput(path: string, content: string): Result<void, OutputError> {
	try {
		writeFileSync(path, content, "utf-8");
		return Ok(undefined);
	} catch (err) {
		const error = toError(err);
		return Err(new OutputError(`Error writing file ${path}: ${error.message}`, error));
	}
}
