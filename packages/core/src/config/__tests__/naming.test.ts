import { describe, expect, it } from "vitest";
import { titleCase, toClientKey, toClientLabel } from "../naming";

describe("toClientKey", () => {
	it("lowercases and replaces spaces and hyphens", () => {
		expect(toClientKey("Acme Co")).toBe("acme_co");
		expect(toClientKey("Big-Corp Ltd")).toBe("big_corp_ltd");
	});
});

describe("toClientLabel", () => {
	it("replaces spaces but keeps hyphens", () => {
		expect(toClientLabel("Big-Corp Ltd")).toBe("big-corp_ltd");
	});
});

describe("titleCase", () => {
	it("capitalises every run of letters", () => {
		expect(titleCase("acme_co")).toBe("Acme_Co");
		expect(titleCase("finance")).toBe("Finance");
	});

	it("treats digits as word breaks", () => {
		expect(titleCase("q4report")).toBe("Q4Report");
	});

	it("lowercases the rest of each word", () => {
		expect(titleCase("ACME co")).toBe("Acme Co");
	});
});
