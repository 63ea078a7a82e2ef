import { PassThrough } from "node:stream";
import { InputError } from "@viewgen/core";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { collectInput } from "../collect";
import { askPositiveInt, askText, askYesNo, createReadlinePrompter } from "../prompt";
import { ScriptedPrompter } from "./helpers";

describe("prompt", () => {
	let mockStdout: string[];

	beforeEach(() => {
		mockStdout = [];
		vi.spyOn(process.stdout, "write").mockImplementation((data) => {
			mockStdout.push(String(data));
			return true;
		});
	});

	afterEach(() => {
		vi.restoreAllMocks();
	});

	describe("askText", () => {
		it("returns the trimmed answer", async () => {
			const prompter = new ScriptedPrompter(["  demo-project  "]);
			expect(await askText(prompter, "GCP Project ID")).toBe("demo-project");
			expect(prompter.questions).toEqual(["GCP Project ID: "]);
		});

		it("falls back to the default on an empty answer", async () => {
			const prompter = new ScriptedPrompter([""]);
			expect(await askText(prompter, "Region", { default: "asia-northeast1" })).toBe("asia-northeast1");
			expect(prompter.questions).toEqual(["Region (default: asia-northeast1): "]);
		});

		it("returns an empty string for optional questions", async () => {
			const prompter = new ScriptedPrompter(["   "]);
			expect(await askText(prompter, "status", { required: false })).toBe("");
		});

		it("re-asks required questions until answered", async () => {
			const prompter = new ScriptedPrompter(["", " ", "Acme Co"]);
			expect(await askText(prompter, "Client name")).toBe("Acme Co");
			expect(prompter.questions).toHaveLength(3);
			expect(mockStdout).toEqual([
				"This field is required. Please enter a value.\n",
				"This field is required. Please enter a value.\n",
			]);
		});
	});

	describe("askYesNo", () => {
		it("accepts y, yes, n and no in any case", async () => {
			const prompter = new ScriptedPrompter(["Y", "yes", "N", "No"]);
			expect(await askYesNo(prompter, "More?")).toBe(true);
			expect(await askYesNo(prompter, "More?")).toBe(true);
			expect(await askYesNo(prompter, "More?")).toBe(false);
			expect(await askYesNo(prompter, "More?")).toBe(false);
		});

		it("uses the default on an empty answer and shows it in the hint", async () => {
			const prompter = new ScriptedPrompter(["", ""]);
			expect(await askYesNo(prompter, "More?", true)).toBe(true);
			expect(await askYesNo(prompter, "More?")).toBe(false);
			expect(prompter.questions).toEqual(["More? (Y/n): ", "More? (y/N): "]);
		});

		it("re-asks on anything else", async () => {
			const prompter = new ScriptedPrompter(["maybe", "y"]);
			expect(await askYesNo(prompter, "More?")).toBe(true);
			expect(mockStdout).toEqual(["Please enter 'y' or 'n'.\n"]);
		});
	});

	describe("askPositiveInt", () => {
		it("uses the default", async () => {
			const prompter = new ScriptedPrompter([""]);
			expect(await askPositiveInt(prompter, "Months back", 18)).toBe(18);
			expect(prompter.questions).toEqual(["Months back (default: 18): "]);
		});

		it("re-asks until a positive whole number is given", async () => {
			const prompter = new ScriptedPrompter(["abc", "0", "-3", "2.5", "24"]);
			expect(await askPositiveInt(prompter, "Months back", 18)).toBe(24);
			expect(mockStdout).toHaveLength(4);
			expect(mockStdout[0]).toBe("Please enter a positive whole number.\n");
		});
	});

	describe("createReadlinePrompter", () => {
		function pipe(text: string) {
			const input = new PassThrough();
			const sink = new PassThrough();
			const written: string[] = [];
			sink.on("data", (chunk) => written.push(String(chunk)));
			input.end(text);
			return { prompter: createReadlinePrompter(input, sink), written };
		}

		it("answers each question with the next piped line", async () => {
			const { prompter, written } = pipe("demo-project\n\n\nAcme Co\n\n\n\nactive\n\n\n\nn\n");

			const collected = await collectInput(prompter);
			prompter.close();

			expect(collected.input).toEqual({
				projectId: "demo-project",
				region: "asia-northeast1",
				viewPrefix: "filtered_",
				clientName: "Acme Co",
				outputDatasets: [{ key: "acme_co", monthsBack: 18 }],
			});
			expect([...collected.filters]).toEqual([["status", ["active"]]]);
			expect(written.join("")).toMatch(/^GCP Project ID: Region \(default: asia-northeast1\): /);
		});

		it("rejects with InputError once the input ends", async () => {
			const { prompter } = pipe("demo-project\n");

			await expect(collectInput(prompter)).rejects.toBeInstanceOf(InputError);
			await expect(prompter.ask("Region: ")).rejects.toThrow(
				"Input ended before all questions were answered",
			);
			prompter.close();
		});
	});
});
