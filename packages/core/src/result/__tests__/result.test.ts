import { describe, expect, it } from "vitest";
import {
	CatalogError,
	Err,
	flatMapResult,
	InputError,
	Ok,
	OutputError,
	RenderError,
	toError,
	unwrapOrThrow,
	ViewGenError,
} from "../../result";

describe("Result", () => {
	it("Ok/Err have correct discriminants", () => {
		const ok = Ok(42);
		const err = Err(new ViewGenError("fail", "TEST"));

		expect(ok.ok).toBe(true);
		if (ok.ok) expect(ok.value).toBe(42);
		expect(err.ok).toBe(false);
		if (!err.ok) expect(err.error).toBeInstanceOf(ViewGenError);
	});

	it("flatMapResult chains correctly", () => {
		const chained = flatMapResult(Ok(10), (v) => Ok(v.toString()));
		expect(chained.ok).toBe(true);
		if (chained.ok) expect(chained.value).toBe("10");

		const err = Err(new ViewGenError("fail", "TEST"));
		const chainedErr = flatMapResult(err, (v: number) => Ok(v.toString()));
		expect(chainedErr.ok).toBe(false);
	});

	it("unwrapOrThrow returns value on Ok, throws on Err", () => {
		expect(unwrapOrThrow(Ok(42))).toBe(42);
		expect(() => unwrapOrThrow(Err(new RenderError("boom")))).toThrow("boom");
	});

	it("all errors are instanceof ViewGenError", () => {
		expect(new InputError("input")).toBeInstanceOf(ViewGenError);
		expect(new CatalogError("catalog")).toBeInstanceOf(ViewGenError);
		expect(new RenderError("render")).toBeInstanceOf(ViewGenError);
		expect(new OutputError("output")).toBeInstanceOf(ViewGenError);
	});

	it("error codes and names are set", () => {
		expect(new InputError("").code).toBe("INVALID_INPUT");
		expect(new CatalogError("").code).toBe("INVALID_CATALOG");
		expect(new RenderError("").code).toBe("RENDER_FAILED");
		expect(new OutputError("").code).toBe("OUTPUT_FAILED");
		expect(new RenderError("").name).toBe("RenderError");
	});

	it("toError wraps non-Error values", () => {
		const original = new Error("x");
		expect(toError(original)).toBe(original);
		expect(toError("plain").message).toBe("plain");
	});
});
