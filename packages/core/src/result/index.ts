export {
	CatalogError,
	InputError,
	OutputError,
	RenderError,
	toError,
	ViewGenError,
} from "./errors";
export { Err, flatMapResult, Ok, type Result, unwrapOrThrow } from "./result";
