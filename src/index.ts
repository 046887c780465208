// CHANGE: Public API entry point for library consumers
// WHY: Export APP orchestration and CORE utilities; SHELL internals stay behind ResetServices
// PURITY: Re-exports only (meta-module)
// INVARIANT: All exports are either pure functions, typed interfaces or the APP entry
// COMPLEXITY: O(1) - module resolution only

// ═══════════════════════════════════════════════════════════════════════════════
// MAIN ORCHESTRATOR (Programmatic Entry Point)
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Reset flow with injectable services.
 *
 * @example
 * ```typescript
 * import { Effect } from "effect";
 * import { runReset } from "usb-reset";
 *
 * const exitCode = await Effect.runPromise(runReset(["3", "MYDRIVE", "full"], services));
 * ```
 */
export { type ResetServices, resetFlow, runReset } from "./app/runReset.js";
export { main } from "./main.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export type {
	CLIOptions,
	DiskInfo,
	DispatchResult,
	ExitCode,
	ResetConfig,
	ResetRequest,
	WipeMode,
} from "./core/models.js";
export {
	type AppError,
	ConfigError,
	ExecError,
	InvalidArgument,
	InvalidDiskNumber,
	InvalidMode,
	OperatorCancelled,
	UnsupportedPlatform,
} from "./core/errors.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE PURE FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

export {
	DEFAULT_LABEL,
	MAX_LABEL_LENGTH,
	normalizeLabel,
	parseDiskNumber,
	parseMode,
} from "./core/request.js";
export { buildScript, cleanCommand, renderScript } from "./core/script.js";
export {
	completionLine,
	computeExitCode,
	diskpartReportedError,
} from "./core/decision.js";
