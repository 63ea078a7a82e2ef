import type { Prompter } from "../prompt";

/** Prompter that replays canned answers and records the questions asked. */
export class ScriptedPrompter implements Prompter {
	readonly questions: string[] = [];
	closed = false;

	constructor(private readonly answers: string[]) {}

	async ask(question: string): Promise<string> {
		this.questions.push(question);
		const answer = this.answers.shift();
		if (answer === undefined) {
			throw new Error(`No scripted answer for: ${question}`);
		}
		return answer;
	}

	close(): void {
		this.closed = true;
	}

	get remaining(): number {
		return this.answers.length;
	}
}

/** Thrown by the mocked process.exit so tests can observe fatal exits. */
export class ExitError extends Error {
	constructor(readonly code: string | number | null | undefined) {
		super(`process.exit(${code})`);
	}
}
