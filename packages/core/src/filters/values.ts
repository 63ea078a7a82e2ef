import type { Logger } from "../logger";
import { FILTER_COLUMN_NAMES, type FilterColumnName, type FilterValueSet, isFilterColumnName } from "./types";

/** Raw per-column input: comma-separated text or an explicit list. */
export type RawFilterInput = Readonly<Record<string, string | readonly string[] | undefined>>;

/** Split comma-separated text into trimmed, non-empty values. */
export function splitFilterValues(text: string): string[] {
	return text
		.split(",")
		.map((v) => v.trim())
		.filter((v) => v.length > 0);
}

/**
 * Build a {@link FilterValueSet} from raw per-column input.
 *
 * Entries are emitted in {@link FILTER_COLUMN_NAMES} order. Columns with no
 * non-empty value are omitted and unrecognised column names are ignored.
 */
export function buildFilterValueSet(raw: RawFilterInput, logger?: Logger): FilterValueSet {
	for (const name of Object.keys(raw)) {
		if (!isFilterColumnName(name)) {
			logger?.("warn", `Ignoring unknown filter column "${name}"`);
		}
	}

	const set = new Map<FilterColumnName, readonly string[]>();
	for (const column of FILTER_COLUMN_NAMES) {
		const entry = raw[column];
		if (entry === undefined) continue;

		const values =
			typeof entry === "string"
				? splitFilterValues(entry)
				: entry.map((v) => v.trim()).filter((v) => v.length > 0);

		if (values.length > 0) {
			set.set(column, values);
		}
	}
	return set;
}
