import type { FilterValueSet } from "../filters/types";
import { buildFilterValueSet } from "../filters/values";
import { isNonEmptyString, isPositiveInteger, isRecord } from "../guards";
import type { Logger } from "../logger";
import { InputError } from "../result/errors";
import { Err, Ok, type Result } from "../result/result";
import { toClientKey } from "./naming";
import {
	DEFAULT_REGION,
	DEFAULT_VIEW_PREFIX,
	type OutputDatasetSpec,
	type UserInputRecord,
} from "./types";

/** A batch input document after validation */
export interface BatchInput {
	input: UserInputRecord;
	filters: FilterValueSet;
}

function optionalString(
	doc: Record<string, unknown>,
	field: string,
	fallback: string,
): Result<string, InputError> {
	const value = doc[field];
	if (value === undefined) return Ok(fallback);
	if (!isNonEmptyString(value)) {
		return Err(new InputError(`${field} must be a non-empty string`));
	}
	return Ok(value.trim());
}

/**
 * A keyless first entry is keyed by `clientKey` when assembled, so it takes
 * part in duplicate detection under that key.
 */
function validateOutputDatasets(
	value: unknown,
	clientKey: string,
): Result<OutputDatasetSpec[], InputError> {
	if (value === undefined) return Ok([{}]);
	if (!Array.isArray(value) || value.length === 0) {
		return Err(new InputError("outputDatasets must be a non-empty array"));
	}

	const specs: OutputDatasetSpec[] = [];
	const seen = new Set<string>();
	for (let i = 0; i < value.length; i++) {
		const entry: unknown = value[i];
		if (!isRecord(entry)) {
			return Err(new InputError(`Output dataset at index ${i} must be an object`));
		}

		const { key, monthsBack } = entry;
		const spec: OutputDatasetSpec = {};
		if (key !== undefined) {
			if (!isNonEmptyString(key)) {
				return Err(new InputError(`Output dataset at index ${i} key must be a non-empty string`));
			}
			spec.key = key.trim();
		} else if (i > 0) {
			return Err(new InputError(`Output dataset at index ${i} must have a key`));
		}

		const effectiveKey = spec.key ?? clientKey;
		if (seen.has(effectiveKey)) {
			return Err(new InputError(`Duplicate output dataset key: "${effectiveKey}"`));
		}
		seen.add(effectiveKey);

		if (monthsBack !== undefined) {
			if (!isPositiveInteger(monthsBack)) {
				return Err(
					new InputError(`Output dataset at index ${i} monthsBack must be a positive integer`),
				);
			}
			spec.monthsBack = monthsBack;
		}
		specs.push(spec);
	}
	return Ok(specs);
}

/**
 * Validate the user-input portion of a batch document.
 *
 * `projectId` and `clientName` are required; `region` and `viewPrefix` fall
 * back to their defaults; `outputDatasets` defaults to a single primary
 * entry keyed by the client.
 */
export function validateUserInput(doc: unknown): Result<UserInputRecord, InputError> {
	if (!isRecord(doc)) {
		return Err(new InputError("Input must be an object"));
	}

	const { projectId, clientName } = doc;
	if (!isNonEmptyString(projectId)) {
		return Err(new InputError("projectId is required"));
	}
	if (!isNonEmptyString(clientName)) {
		return Err(new InputError("clientName is required"));
	}

	const region = optionalString(doc, "region", DEFAULT_REGION);
	if (!region.ok) return region;
	const viewPrefix = optionalString(doc, "viewPrefix", DEFAULT_VIEW_PREFIX);
	if (!viewPrefix.ok) return viewPrefix;
	const outputDatasets = validateOutputDatasets(doc.outputDatasets, toClientKey(clientName.trim()));
	if (!outputDatasets.ok) return outputDatasets;

	return Ok({
		projectId: projectId.trim(),
		region: region.value,
		viewPrefix: viewPrefix.value,
		clientName: clientName.trim(),
		outputDatasets: outputDatasets.value,
	});
}

/**
 * Validate a `filters` object: each member is comma-separated text or an
 * array of strings. Unknown columns are ignored.
 */
export function validateFilterInput(
	doc: unknown,
	logger?: Logger,
): Result<FilterValueSet, InputError> {
	if (doc === undefined) return Ok(new Map());
	if (!isRecord(doc)) {
		return Err(new InputError("filters must be an object"));
	}

	const raw: Record<string, string | string[]> = {};
	for (const [column, value] of Object.entries(doc)) {
		if (typeof value === "string") {
			raw[column] = value;
		} else if (Array.isArray(value) && value.every((v): v is string => typeof v === "string")) {
			raw[column] = value;
		} else {
			return Err(new InputError(`filters.${column} must be a string or an array of strings`));
		}
	}
	return Ok(buildFilterValueSet(raw, logger));
}

/** Validate a whole batch document: user input plus its `filters` member. */
export function parseBatchInput(doc: unknown, logger?: Logger): Result<BatchInput, InputError> {
	const input = validateUserInput(doc);
	if (!input.ok) return input;

	const filters = validateFilterInput(isRecord(doc) ? doc.filters : undefined, logger);
	if (!filters.ok) return filters;

	return Ok({ input: input.value, filters: filters.value });
}
