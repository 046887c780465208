// CHANGE: Typed domain error ADT for the reset flow using Effect.Data
// WHY: Errors are explicit variants in Effect signatures instead of thrown exceptions
// SOURCE: https://effect.website/docs/data-types/data
// PURITY: CORE
// INVARIANT: Errors are values (no throw), discriminated by `_tag`
// COMPLEXITY: O(1)

import { Data } from "effect";

/**
 * Unknown flag or a flag missing its value.
 *
 * @invariant argument.length > 0
 */
export class InvalidArgument extends Data.TaggedError("InvalidArgument")<{
	readonly argument: string;
	readonly detail: string;
}> {}

/**
 * Disk number is not a non-negative integer.
 */
export class InvalidDiskNumber extends Data.TaggedError("InvalidDiskNumber")<{
	readonly input: string;
}> {}

/**
 * Wipe mode is neither Fast nor Full.
 */
export class InvalidMode extends Data.TaggedError("InvalidMode")<{
	readonly input: string;
}> {}

/**
 * Operator interrupted a prompt (Ctrl+C or end of input).
 *
 * @invariant raised before any command reaches the partitioning utility
 */
export class OperatorCancelled extends Data.TaggedError("OperatorCancelled")<{
	readonly stage: "disk" | "mode" | "label" | "confirm";
}> {}

/**
 * The host has no diskpart.
 */
export class UnsupportedPlatform extends Data.TaggedError(
	"UnsupportedPlatform",
)<{
	readonly platform: string;
}> {}

/**
 * Configuration file exists but cannot be used.
 *
 * @invariant detail.length > 0
 */
export class ConfigError extends Data.TaggedError("ConfigError")<{
	readonly path: string;
	readonly detail: string;
}> {}

/**
 * External command could not be started or failed to run.
 *
 * @invariant command.length > 0 ∧ detail.length > 0
 */
export class ExecError extends Data.TaggedError("Exec")<{
	readonly command: string;
	readonly detail: string;
}> {}

/**
 * Union of all errors the reset flow can fail with.
 */
export type AppError =
	| InvalidArgument
	| InvalidDiskNumber
	| InvalidMode
	| OperatorCancelled
	| UnsupportedPlatform
	| ConfigError
	| ExecError;
