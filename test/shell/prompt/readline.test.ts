// CHANGE: Tests for readline-backed prompts over in-memory streams
// WHY: Ctrl+C and end of input must surface as OperatorCancelled, never as an empty answer
// PURITY: SHELL - PassThrough streams stand in for the terminal

import { PassThrough } from "node:stream";

import { Effect, Either } from "effect";
import { afterEach, describe, expect, it } from "vitest";

import {
	openPromptSession,
	type PromptSession,
} from "../../../src/shell/prompt/readline.js";

const tick = (): Promise<void> =>
	new Promise((resolve) => {
		setImmediate(resolve);
	});

const sessions: PromptSession[] = [];

const open = (terminal: boolean) => {
	const input = new PassThrough();
	const output = new PassThrough();
	output.resume();
	const session = openPromptSession(input, output, terminal);
	sessions.push(session);
	return { input, output, session };
};

afterEach(() => {
	for (const session of sessions.splice(0)) session.close();
});

describe("openPromptSession", () => {
	it("resolves with the typed line", async () => {
		const { input, session } = open(false);
		const answer = Effect.runPromise(session.ask("Disk number: ", "disk"));
		await tick();
		input.write("4\n");
		expect(await answer).toBe("4");
	});

	it("asks successive questions on the same session", async () => {
		const { input, session } = open(false);
		const first = Effect.runPromise(session.ask("Disk number: ", "disk"));
		await tick();
		input.write("2\n");
		expect(await first).toBe("2");

		const second = Effect.runPromise(
			session.ask("Wipe mode (Fast/Full): ", "mode"),
		);
		await tick();
		input.write("full\n");
		expect(await second).toBe("full");
	});

	it("cancels on end of input", async () => {
		const { input, session } = open(false);
		const answer = Effect.runPromise(
			Effect.either(session.ask("Label: ", "label")),
		);
		await tick();
		input.end();
		const result = await answer;
		expect(Either.isLeft(result) && result.left).toMatchObject({
			_tag: "OperatorCancelled",
			stage: "label",
		});
	});

	it("cancels on Ctrl+C in terminal mode", async () => {
		const { input, session } = open(true);
		const answer = Effect.runPromise(
			Effect.either(session.ask("Press ENTER to continue...", "confirm")),
		);
		await tick();
		input.write("\u0003");
		const result = await answer;
		expect(Either.isLeft(result) && result.left).toMatchObject({
			_tag: "OperatorCancelled",
			stage: "confirm",
		});
	});

	it("fails immediately once closed", async () => {
		const { session } = open(false);
		session.close();
		const result = await Effect.runPromise(
			Effect.either(session.ask("Disk number: ", "disk")),
		);
		expect(Either.isLeft(result)).toBe(true);
	});
});
