// CHANGE: Pure decision from the utility's result to exit code and completion text
// WHY: A failed wipe must never be reported as DONE
// PURITY: CORE
// FORMAT THEOREM: ∀r ∈ DispatchResult: computeExitCode(r) = 0 ↔ r.exitCode = 0 ∧ ¬diskpartReportedError(r)
// INVARIANT: No side effects, deterministic mapping DispatchResult → ExitCode
// COMPLEXITY: O(n) where n = |stdout| + |stderr|

import { pipe } from "effect";

import type { DispatchResult, ExitCode } from "./models.js";

// diskpart keeps reading stdin after a failed command and still exits 0,
// so failures are only visible in its output.
const DISKPART_ERROR_MARKERS: readonly string[] = [
	"diskpart has encountered an error",
	"virtual disk service error",
	"there is no disk selected",
	"is not a valid disk",
	"the disk you specified is not valid",
];

/**
 * Whether diskpart printed one of its error lines.
 *
 * @pure true
 *
 * @example
 * ```ts
 * diskpartReportedError({ exitCode: 0, stdout: "There is no disk selected.\r\n", stderr: "" }); // true
 * ```
 */
export const diskpartReportedError = (result: DispatchResult): boolean => {
	const text = `${result.stdout}\n${result.stderr}`.toLowerCase();
	return DISKPART_ERROR_MARKERS.some((marker) => text.includes(marker));
};

/**
 * Whether the partitioning utility reported success.
 *
 * @pure true
 */
export const dispatchSucceeded = (result: DispatchResult): boolean =>
	result.exitCode === 0 && !diskpartReportedError(result);

/**
 * Computes the process exit code from the dispatch result.
 *
 * @pure true
 * @invariant exitCode ∈ {0,1}
 *
 * @example
 * ```ts
 * computeExitCode({ exitCode: 0, stdout: "", stderr: "" }); // 0
 * computeExitCode({ exitCode: 2, stdout: "", stderr: "" }); // 1
 * ```
 */
export const computeExitCode = (result: DispatchResult): ExitCode =>
	pipe(result, dispatchSucceeded, (ok): ExitCode => (ok ? 0 : 1));

const failureCause = (result: DispatchResult): string =>
	result.exitCode === null
		? "diskpart exited with a signal"
		: result.exitCode === 0
			? "diskpart reported an error"
			: `diskpart exited with code ${result.exitCode}`;

/**
 * Headline printed after the utility exits.
 *
 * @pure true
 */
export const completionLine = (result: DispatchResult): string =>
	dispatchSucceeded(result)
		? "✅ DONE"
		: `❌ FAILED: ${failureCause(result)}; the disk may be partially wiped`;
