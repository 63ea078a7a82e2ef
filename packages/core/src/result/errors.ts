/** Base error class for all viewgen errors */
export class ViewGenError extends Error {
	readonly code: string;
	override readonly cause?: Error;

	constructor(message: string, code: string, cause?: Error) {
		super(message);
		this.name = this.constructor.name;
		this.code = code;
		this.cause = cause;
	}
}

/** User input record is incomplete or malformed */
export class InputError extends ViewGenError {
	constructor(message: string, cause?: Error) {
		super(message, "INVALID_INPUT", cause);
	}
}

/** Catalog document failed structural validation */
export class CatalogError extends ViewGenError {
	constructor(message: string, cause?: Error) {
		super(message, "INVALID_CATALOG", cause);
	}
}

/** Config violates a rendering precondition */
export class RenderError extends ViewGenError {
	constructor(message: string, cause?: Error) {
		super(message, "RENDER_FAILED", cause);
	}
}

/** Rendered output could not be written */
export class OutputError extends ViewGenError {
	constructor(message: string, cause?: Error) {
		super(message, "OUTPUT_FAILED", cause);
	}
}

/** Coerce an unknown thrown value into an Error instance. */
export function toError(err: unknown): Error {
	return err instanceof Error ? err : new Error(String(err));
}
