// CHANGE: Pure construction of the diskpart command script
// WHY: The destructive command sequence is data; building it apart from dispatch keeps it checkable
// PURITY: CORE
// FORMAT THEOREM: ∀ r ∈ ResetRequest: |{l ∈ buildScript(r) : l ∈ {"clean", "clean all"}}| = 1
// INVARIANT: Command order is fixed; only disk number, clean variant and label vary
// COMPLEXITY: O(1)

import { match } from "ts-pattern";

import type { ResetRequest, WipeMode } from "./models.js";

/** diskpart reads CRLF-terminated lines. */
export const SCRIPT_EOL = "\r\n";

/**
 * Clean command for a wipe mode.
 *
 * @pure true
 */
export const cleanCommand = (mode: WipeMode): string =>
	match(mode)
		.with("Fast", () => "clean")
		.with("Full", () => "clean all")
		.exhaustive();

/**
 * Ordered diskpart commands for a reset.
 *
 * @pure true
 * @invariant result.length = 8 ∧ result[2] = cleanCommand(request.mode)
 *
 * @example
 * ```ts
 * buildScript({ diskNumber: 3, label: "MYDRIVE", mode: "Full" });
 * // ["select disk 3", "attributes disk clear readonly", "clean all", ...]
 * ```
 */
export const buildScript = (request: ResetRequest): readonly string[] => [
	`select disk ${request.diskNumber}`,
	"attributes disk clear readonly",
	cleanCommand(request.mode),
	"convert mbr",
	"create partition primary",
	`format fs=fat32 quick label="${request.label}"`,
	"assign",
	"exit",
];

/**
 * Joins script lines into the single block written to stdin.
 *
 * @pure true
 * @postcondition result ends with SCRIPT_EOL
 */
export const renderScript = (lines: readonly string[]): string =>
	lines.map((line) => `${line}${SCRIPT_EOL}`).join("");
