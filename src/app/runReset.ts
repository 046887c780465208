// CHANGE: Application layer orchestration of the reset flow
// WHY: APP composes pure CORE logic with SHELL services passed in as values; no process.exit here
// PURITY: APP
// EFFECT: Effect<ExitCode, never>
// INVARIANT: runScript is reached only after the confirmation prompt resolves
// INVARIANT: each omitted input is prompted exactly once, in the order disk → mode → label
// COMPLEXITY: O(n) where n = number of disks listed

import { Effect } from "effect";

import {
	completionLine,
	computeExitCode,
	dispatchSucceeded,
} from "../core/decision.js";
import { formatDiskTable } from "../core/disks.js";
import {
	type AppError,
	type ConfigError,
	type ExecError,
	UnsupportedPlatform,
} from "../core/errors.js";
import { describeError } from "../core/format/messages.js";
import type {
	CLIOptions,
	DiskInfo,
	DispatchResult,
	ExitCode,
	ResetConfig,
	ResetRequest,
} from "../core/models.js";
import { normalizeLabel, parseDiskNumber, parseMode } from "../core/request.js";
import { buildScript, renderScript } from "../core/script.js";
import { CONFIRM_PROMPT, reportLines, warningLines } from "../core/warning.js";
import { parseCLIArgs, USAGE } from "../shell/config/cli.js";
import type { OutputSink } from "../shell/diskpart/runner.js";
import type { Output } from "../shell/output/console.js";
import type { Prompter } from "../shell/prompt/readline.js";

/**
 * Effects the flow depends on.
 */
export interface ResetServices {
	readonly platform: string;
	readonly prompter: Prompter;
	readonly output: Output;
	readonly loadConfig: (
		explicitPath: string | undefined,
	) => Effect.Effect<ResetConfig, ConfigError>;
	readonly listDisks: (
		powershell: string,
	) => Effect.Effect<readonly DiskInfo[], ExecError>;
	readonly runScript: (
		command: string,
		script: string,
		sink: OutputSink,
	) => Effect.Effect<DispatchResult, ExecError>;
}

/**
 * Prints the advisory disk table; a failed listing only warns.
 *
 * @pure false (console output)
 */
function showDisks(
	services: ResetServices,
	config: ResetConfig,
): Effect.Effect<void, never> {
	const { output } = services;
	return services.listDisks(config.powershellCommand).pipe(
		Effect.map((disks) => {
			output.info("🔍 Available disks:");
			if (disks.length === 0) {
				output.info("  (none found)");
			} else {
				for (const line of formatDiskTable(disks)) output.info(`  ${line}`);
			}
			output.info("");
		}),
		Effect.catchAll((error) =>
			Effect.sync(() => {
				output.warn(`⚠️  Could not list disks: ${error.detail}`);
			}),
		),
	);
}

/**
 * Uses the supplied value or asks for it.
 */
const valueOrPrompt = (
	prompter: Prompter,
	supplied: string | undefined,
	question: string,
	stage: "disk" | "mode" | "label",
): Effect.Effect<string, AppError> =>
	supplied === undefined
		? prompter.ask(question, stage)
		: Effect.succeed(supplied);

/**
 * Collects and validates the request. Disk and mode are rejected as soon as
 * they are known, before later prompts.
 */
function acquireRequest(
	options: CLIOptions,
	services: ResetServices,
	config: ResetConfig,
): Effect.Effect<ResetRequest, AppError> {
	const { prompter } = services;
	return Effect.gen(function* () {
		const diskInput = yield* valueOrPrompt(
			prompter,
			options.disk,
			"Disk number: ",
			"disk",
		);
		const diskNumber = yield* parseDiskNumber(diskInput);

		const modeInput = yield* valueOrPrompt(
			prompter,
			options.mode,
			"Wipe mode (Fast/Full): ",
			"mode",
		);
		const mode = yield* parseMode(modeInput);

		const labelInput = yield* valueOrPrompt(
			prompter,
			options.label,
			`Volume label [${config.defaultLabel}]: `,
			"label",
		);

		return {
			diskNumber,
			mode,
			label: normalizeLabel(labelInput, config.defaultLabel),
		};
	});
}

/**
 * The gated, destructive part: warn, confirm, dispatch, report.
 */
function confirmAndDispatch(
	request: ResetRequest,
	services: ResetServices,
	config: ResetConfig,
): Effect.Effect<ExitCode, AppError> {
	const { output } = services;
	return Effect.gen(function* () {
		for (const line of warningLines(request)) output.warn(line);
		yield* services.prompter.ask(CONFIRM_PROMPT, "confirm");

		const script = renderScript(buildScript(request));
		output.info(`🔧 Running ${config.diskpartCommand}...`);
		const result = yield* services.runScript(
			config.diskpartCommand,
			script,
			output.raw,
		);

		output.info("");
		const headline = completionLine(result);
		if (dispatchSucceeded(result)) {
			output.info(headline);
		} else {
			output.error(headline);
		}
		for (const line of reportLines(request)) output.info(line);
		return computeExitCode(result);
	});
}

/**
 * Whole flow with typed failures.
 *
 * @effect Effect<ExitCode, AppError>
 */
export function resetFlow(
	args: readonly string[],
	services: ResetServices,
): Effect.Effect<ExitCode, AppError> {
	return Effect.gen(function* () {
		const options = yield* parseCLIArgs(args);
		if (options.help) {
			for (const line of USAGE) services.output.info(line);
			return 0 as const;
		}

		if (services.platform !== "win32") {
			return yield* Effect.fail(
				new UnsupportedPlatform({ platform: services.platform }),
			);
		}

		const config = yield* services.loadConfig(options.configPath);
		yield* showDisks(services, config);
		const request = yield* acquireRequest(options, services, config);
		return yield* confirmAndDispatch(request, services, config);
	});
}

/**
 * Runs the reset and returns ExitCode as value (no process.exit).
 *
 * @param args - command-line arguments after the script name
 * @param services - shell implementations
 * @returns Effect<ExitCode, never>
 *
 * @pure false (coordinates effects), but does not terminate the process
 * @invariant ExitCode ∈ {0,1}
 * @postcondition any AppError → one message on stderr and 1
 */
export function runReset(
	args: readonly string[],
	services: ResetServices,
): Effect.Effect<ExitCode, never> {
	return resetFlow(args, services).pipe(
		Effect.catchAll((error) =>
			Effect.sync((): ExitCode => {
				services.output.error(describeError(error));
				return 1;
			}),
		),
	);
}
