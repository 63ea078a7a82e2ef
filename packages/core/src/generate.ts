import { type AssembleOptions, assemble } from "./config/assembler";
import type { UserInputRecord } from "./config/types";
import type { FilterValueSet } from "./filters/types";
import { type RenderOptions, render } from "./render/tfvars";

/** Options for {@link generate}. */
export interface GenerateOptions extends AssembleOptions, RenderOptions {}

/**
 * Assemble and render in one pass.
 *
 * Pure: the same input, filters and catalog always produce the same text.
 */
export function generate(
	input: UserInputRecord,
	globalFilters: FilterValueSet,
	options: GenerateOptions = {},
): string {
	return render(assemble(input, globalFilters, options), options);
}
