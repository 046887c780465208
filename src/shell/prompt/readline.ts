// CHANGE: Interactive prompts over node:readline as an Effect service
// WHY: Omitted inputs and the confirmation gate block on operator input; Ctrl+C or EOF must abort cleanly
// PURITY: SHELL (terminal I/O)
// EFFECT: Effect<string, OperatorCancelled>
// INVARIANT: after close, every ask fails with OperatorCancelled
// COMPLEXITY: O(1) per prompt

import * as readline from "node:readline";

import { Effect } from "effect";

import { OperatorCancelled } from "../../core/errors.js";

export type PromptStage = OperatorCancelled["stage"];

/**
 * Asks the operator one question at a time.
 */
export interface Prompter {
	readonly ask: (
		question: string,
		stage: PromptStage,
	) => Effect.Effect<string, OperatorCancelled>;
}

/**
 * Prompter bound to a readline interface that must be closed when done.
 */
export interface PromptSession extends Prompter {
	readonly close: () => void;
}

/**
 * Opens a readline-backed prompt session.
 *
 * @param input - usually process.stdin
 * @param output - usually process.stdout
 * @param terminal - raw keypress handling; defaults to whether output is a TTY
 *
 * @pure false
 */
export function openPromptSession(
	input: NodeJS.ReadableStream = process.stdin,
	output: NodeJS.WritableStream = process.stdout,
	terminal?: boolean,
): PromptSession {
	const rl = readline.createInterface({
		input,
		output,
		...(terminal === undefined ? {} : { terminal }),
	});
	let closed = false;
	rl.on("close", () => {
		closed = true;
	});
	// Ctrl+C in raw mode arrives here instead of as a process signal.
	rl.on("SIGINT", () => {
		output.write("\n");
		rl.close();
	});

	const ask = (
		question: string,
		stage: PromptStage,
	): Effect.Effect<string, OperatorCancelled> =>
		Effect.async<string, OperatorCancelled>((resume) => {
			if (closed) {
				resume(Effect.fail(new OperatorCancelled({ stage })));
				return;
			}
			const onClose = (): void => {
				resume(Effect.fail(new OperatorCancelled({ stage })));
			};
			rl.once("close", onClose);
			rl.question(question, (answer) => {
				rl.off("close", onClose);
				resume(Effect.succeed(answer));
			});
			return Effect.sync(() => {
				rl.off("close", onClose);
			});
		});

	return {
		ask,
		close: () => {
			if (!closed) rl.close();
		},
	};
}
