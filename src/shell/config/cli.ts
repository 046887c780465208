// CHANGE: Positional CLI parsing for disk, label and mode
// WHY: Every supplied value skips its prompt; every omitted one is asked for later
// PURITY: SHELL (reads process.argv by default)
// INVARIANT: positional order is disk → label → mode; "" counts as omitted
// COMPLEXITY: O(n) where n = |args|

import { Either } from "effect";

import { InvalidArgument } from "../../core/errors.js";
import type { CLIOptions } from "../../core/models.js";

interface ArgState {
	readonly positionals: readonly string[];
	readonly configPath: string | undefined;
	readonly help: boolean;
	readonly skipNext: boolean;
}

type FlagHandler = (
	args: readonly string[],
	index: number,
	current: ArgState,
) => Either.Either<ArgState, InvalidArgument>;

const helpHandler: FlagHandler = (_args, _index, current) =>
	Either.right({ ...current, help: true, skipNext: false });

const flagHandlers: Readonly<Record<string, FlagHandler | undefined>> = {
	"--help": helpHandler,
	"-h": helpHandler,
	"--config": (args, index, current) => {
		const value = args[index + 1];
		if (value === undefined || value.length === 0) {
			return Either.left(
				new InvalidArgument({
					argument: "--config",
					detail: "expects a file path",
				}),
			);
		}
		return Either.right({ ...current, configPath: value, skipNext: true });
	},
};

function processArgument(
	arg: string,
	args: readonly string[],
	index: number,
	current: ArgState,
): Either.Either<ArgState, InvalidArgument> {
	const handler = flagHandlers[arg];
	if (handler !== undefined) return handler(args, index, current);

	if (arg.startsWith("-") && arg.length > 1 && !/^-\d/u.test(arg)) {
		return Either.left(
			new InvalidArgument({ argument: arg, detail: "unknown option" }),
		);
	}

	return Either.right({
		...current,
		positionals: [...current.positionals, arg],
		skipNext: false,
	});
}

const presentOrUndefined = (value: string | undefined): string | undefined =>
	value === undefined || value.trim().length === 0 ? undefined : value;

/**
 * Parses command-line arguments.
 *
 * @param args - arguments after the script name
 * @returns options, or InvalidArgument for an unknown flag
 *
 * @example
 * ```ts
 * // Command: usb-reset 3 MYDRIVE full
 * parseCLIArgs(["3", "MYDRIVE", "full"]);
 * // Right({ disk: "3", label: "MYDRIVE", mode: "full", help: false })
 * ```
 */
export function parseCLIArgs(
	args: readonly string[] = process.argv.slice(2),
): Either.Either<CLIOptions, InvalidArgument> {
	let state: ArgState = {
		positionals: [],
		configPath: undefined,
		help: false,
		skipNext: false,
	};

	for (let i = 0; i < args.length; i++) {
		const arg: string = args.at(i) ?? "";
		const result = processArgument(arg, args, i, state);
		if (Either.isLeft(result)) return Either.left(result.left);
		state = result.right;
		if (state.skipNext) i++;
	}

	const extra = state.positionals[3];
	if (extra !== undefined) {
		return Either.left(
			new InvalidArgument({ argument: extra, detail: "unexpected argument" }),
		);
	}

	const [disk, label, mode] = state.positionals.map(presentOrUndefined);
	// exactOptionalPropertyTypes: absent fields are left out rather than set to undefined
	return Either.right({
		help: state.help,
		...(disk === undefined ? {} : { disk }),
		...(label === undefined ? {} : { label }),
		...(mode === undefined ? {} : { mode }),
		...(state.configPath === undefined ? {} : { configPath: state.configPath }),
	});
}

export const USAGE: readonly string[] = [
	"Usage: usb-reset [disk] [label] [mode] [--config <file>]",
	"",
	"  disk    disk number as listed by Get-Disk",
	'  label   FAT32 volume label, up to 11 characters (default "USB")',
	"  mode    fast | full",
	"",
	"Omitted values are asked for interactively.",
];
