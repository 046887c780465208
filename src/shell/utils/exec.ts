// CHANGE: execAsync wrapped as an Effect with a typed ExecError
// WHY: Short-lived helper commands (disk enumeration) share one error path
// PURITY: SHELL (executes external commands)
// EFFECT: Effect<string, ExecError, never>
// INVARIANT: ∀ command: execCommand(command) → stdout ∨ ExecError
// COMPLEXITY: O(1) time, O(n) space where n = stdout length

import { Effect } from "effect";

import { ExecError } from "../../core/errors.js";
import { exec, promisify } from "./node-mods.js";

const execAsync = promisify(exec);

/**
 * Execute a shell command and return its stdout.
 *
 * @param command - Shell command to execute
 * @param options - Optional execution options
 * @returns Effect with stdout or ExecError
 *
 * @pure false (executes external command)
 * @effect Effect<string, ExecError, never>
 * @invariant command.length > 0 → (stdout ∨ ExecError)
 */
export function execCommand(
	command: string,
	options: { readonly timeout?: number; readonly maxBuffer?: number } = {},
): Effect.Effect<string, ExecError> {
	return Effect.tryPromise({
		try: () => execAsync(command, { ...options, windowsHide: true }),
		catch: (error) =>
			new ExecError({
				command,
				detail: error instanceof Error ? error.message : String(error),
			}),
	}).pipe(Effect.map(({ stdout }) => String(stdout)));
}
