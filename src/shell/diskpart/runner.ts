// CHANGE: Pipe a rendered script into diskpart and wait for it to exit
// WHY: The whole destructive sequence goes in as one stdin block; output is streamed verbatim and captured
// PURITY: SHELL (spawns a process)
// EFFECT: Effect<DispatchResult, ExecError>
// INVARIANT: stdin is written exactly once and then closed
// COMPLEXITY: O(n) where n = script length + output length

import { Effect } from "effect";

import { ExecError } from "../../core/errors.js";
import type { DispatchResult } from "../../core/models.js";
import { spawn } from "../utils/node-mods.js";

/**
 * The parts of a child process the runner touches.
 */
export interface ChildHandle {
	readonly stdin: NodeJS.WritableStream;
	readonly stdout: NodeJS.ReadableStream;
	readonly stderr: NodeJS.ReadableStream;
	on(event: "error", listener: (error: Error) => void): this;
	on(event: "close", listener: (code: number | null) => void): this;
}

export type Spawner = (command: string) => ChildHandle;

/**
 * Receives utility output as it arrives.
 */
export interface OutputSink {
	readonly stdout: (chunk: string) => void;
	readonly stderr: (chunk: string) => void;
}

export const spawnProcess: Spawner = (command) =>
	spawn(command, [], { stdio: ["pipe", "pipe", "pipe"], windowsHide: true });

/**
 * Runs `command`, writes `script` to its stdin and resolves when it exits.
 *
 * @param command - utility executable (diskpart)
 * @param script - full script text
 * @param sink - live output forwarding
 * @param spawner - process factory; tests pass an in-process fake
 *
 * @pure false
 * @effect Effect<DispatchResult, ExecError>
 * @postcondition ExecError only when the process could not be started
 */
export function runScript(
	command: string,
	script: string,
	sink: OutputSink,
	spawner: Spawner = spawnProcess,
): Effect.Effect<DispatchResult, ExecError> {
	return Effect.async<DispatchResult, ExecError>((resume) => {
		let stdout = "";
		let stderr = "";
		let settled = false;

		const settle = (
			outcome: Effect.Effect<DispatchResult, ExecError>,
		): void => {
			if (settled) return;
			settled = true;
			resume(outcome);
		};

		let child: ChildHandle;
		try {
			child = spawner(command);
		} catch (error) {
			settle(
				Effect.fail(
					new ExecError({
						command,
						detail: error instanceof Error ? error.message : String(error),
					}),
				),
			);
			return;
		}

		child.stdout.setEncoding("utf8");
		child.stderr.setEncoding("utf8");
		child.stdout.on("data", (chunk: string) => {
			stdout += chunk;
			sink.stdout(chunk);
		});
		child.stderr.on("data", (chunk: string) => {
			stderr += chunk;
			sink.stderr(chunk);
		});

		// EPIPE when the utility exits before reading everything; its exit code reports the failure.
		child.stdin.on("error", (error: Error) => {
			stderr += `stdin: ${error.message}\n`;
		});

		child.on("error", (error) => {
			settle(Effect.fail(new ExecError({ command, detail: error.message })));
		});
		child.on("close", (code) => {
			settle(Effect.succeed({ exitCode: code, stdout, stderr }));
		});

		child.stdin.end(script, "utf8");
	});
}
