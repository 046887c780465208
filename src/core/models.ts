// CHANGE: Functional Core domain models for a disk reset
// WHY: CORE holds only immutable data and pure functions; SHELL and APP depend on it, never the reverse
// PURITY: CORE
// INVARIANT: CORE defines no effects; data is immutable
// COMPLEXITY: O(1)

/**
 * Exit code for the reset process.
 *
 * @remarks
 * - @pure true
 * - @invariant exitCode ∈ {0, 1}
 */
export type ExitCode = 0 | 1;

/**
 * How the disk is wiped before re-partitioning.
 *
 * - `Fast` removes the partition table only; data stays recoverable.
 * - `Full` overwrites every sector; slow.
 */
export type WipeMode = "Fast" | "Full";

/**
 * Validated parameters of one reset invocation.
 *
 * @remarks
 * - @invariant Number.isSafeInteger(diskNumber) ∧ diskNumber ≥ 0
 * - @invariant 1 ≤ label.length ≤ 11
 */
export interface ResetRequest {
	readonly diskNumber: number;
	readonly label: string;
	readonly mode: WipeMode;
}

/**
 * One row of the advisory disk listing.
 */
export interface DiskInfo {
	readonly number: number;
	readonly friendlyName: string;
	readonly sizeBytes: number;
	readonly busType: string;
}

/**
 * Outcome of piping a script into the partitioning utility.
 *
 * @remarks
 * - @invariant exitCode is null only when the process was killed by a signal
 */
export interface DispatchResult {
	readonly exitCode: number | null;
	readonly stdout: string;
	readonly stderr: string;
}

/**
 * Settings read from the optional configuration file.
 */
export interface ResetConfig {
	readonly diskpartCommand: string;
	readonly powershellCommand: string;
	readonly defaultLabel: string;
}

export const DEFAULT_CONFIG: ResetConfig = {
	diskpartCommand: "diskpart",
	powershellCommand: "powershell.exe",
	defaultLabel: "USB",
};

/**
 * Parsed command line.
 *
 * @remarks
 * - Absent fields are prompted for; an empty positional counts as absent.
 */
export interface CLIOptions {
	readonly disk?: string;
	readonly label?: string;
	readonly mode?: string;
	readonly configPath?: string;
	readonly help: boolean;
}
