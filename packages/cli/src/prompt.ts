import { createInterface } from "node:readline";
import { InputError } from "@viewgen/core";
import { print } from "./output";

/** Line-oriented question/answer channel. */
export interface Prompter {
	ask(question: string): Promise<string>;
	close(): void;
}

interface PendingAnswer {
	resolve: (line: string) => void;
	reject: (error: Error) => void;
}

const INPUT_ENDED = "Input ended before all questions were answered";

/**
 * Prompter reading answers line by line from `input`.
 *
 * Lines that arrive before they are asked for are queued, so piped answers
 * are consumed one per question. Once the input ends, every unanswered
 * question rejects with an {@link InputError}.
 */
export function createReadlinePrompter(
	input: NodeJS.ReadableStream = process.stdin,
	output: NodeJS.WritableStream = process.stdout,
): Prompter {
	const rl = createInterface({ input, terminal: false });
	const queued: string[] = [];
	const pending: PendingAnswer[] = [];
	let ended = false;

	rl.on("line", (line) => {
		const waiter = pending.shift();
		if (waiter) {
			waiter.resolve(line);
		} else {
			queued.push(line);
		}
	});

	rl.on("close", () => {
		ended = true;
		for (const waiter of pending.splice(0)) {
			waiter.reject(new InputError(INPUT_ENDED));
		}
	});

	return {
		ask(question) {
			output.write(question);
			const line = queued.shift();
			if (line !== undefined) return Promise.resolve(line);
			if (ended) return Promise.reject(new InputError(INPUT_ENDED));
			return new Promise((resolve, reject) => {
				pending.push({ resolve, reject });
			});
		},
		close: () => rl.close(),
	};
}

export interface TextQuestionOptions {
	/** Re-ask on an empty answer unless a default exists. Default true. */
	required?: boolean;
	default?: string;
}

/**
 * Ask for a line of text.
 *
 * An empty answer takes the default; without one it returns `""` for optional
 * questions and re-asks for required ones.
 */
export async function askText(
	prompter: Prompter,
	question: string,
	options: TextQuestionOptions = {},
): Promise<string> {
	const required = options.required ?? true;
	const fallback = options.default;
	const prompt = fallback ? `${question} (default: ${fallback}): ` : `${question}: `;

	for (;;) {
		const value = (await prompter.ask(prompt)).trim();
		if (value) return value;
		if (fallback) return fallback;
		if (!required) return "";
		print("This field is required. Please enter a value.");
	}
}

/** Ask a y/n question; an empty answer takes the default. */
export async function askYesNo(
	prompter: Prompter,
	question: string,
	fallback = false,
): Promise<boolean> {
	const hint = fallback ? "Y/n" : "y/N";
	for (;;) {
		const response = (await prompter.ask(`${question} (${hint}): `)).trim().toLowerCase();
		if (response === "y" || response === "yes") return true;
		if (response === "n" || response === "no") return false;
		if (!response) return fallback;
		print("Please enter 'y' or 'n'.");
	}
}

/** Ask until the answer is a positive whole number. */
export async function askPositiveInt(
	prompter: Prompter,
	question: string,
	fallback: number,
): Promise<number> {
	for (;;) {
		const answer = await askText(prompter, question, { default: String(fallback) });
		const value = /^\d+$/.test(answer) ? Number.parseInt(answer, 10) : Number.NaN;
		if (Number.isSafeInteger(value) && value > 0) return value;
		print("Please enter a positive whole number.");
	}
}
