// CHANGE: Wire real SHELL services into the APP flow
// WHY: main owns the prompt session's lifetime; BIN stays a one-liner around it
// PURITY: APP (no process.exit; only composition)
// INVARIANT: the readline session is closed on every exit path
// COMPLEXITY: O(1)

import { Effect } from "effect";

import { runReset } from "./app/runReset.js";
import type { ExitCode } from "./core/models.js";
import { loadResetConfig } from "./shell/config/loader.js";
import { runScript } from "./shell/diskpart/runner.js";
import { listDisks } from "./shell/disks/enumerate.js";
import { consoleOutput } from "./shell/output/console.js";
import { openPromptSession } from "./shell/prompt/readline.js";

/**
 * Entry for programmatic usage (without terminating process).
 *
 * @param args - command-line arguments after the script name
 * @returns Effect<ExitCode, never>
 */
export function main(args: readonly string[]): Effect.Effect<ExitCode, never> {
	return Effect.acquireUseRelease(
		Effect.sync(() => openPromptSession()),
		(session) =>
			runReset(args, {
				platform: process.platform,
				prompter: session,
				output: consoleOutput,
				loadConfig: (explicitPath) => loadResetConfig(explicitPath),
				listDisks,
				runScript: (command, script, sink) => runScript(command, script, sink),
			}),
		(session) => Effect.sync(() => session.close()),
	);
}
