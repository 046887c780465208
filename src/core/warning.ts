// CHANGE: Pure text for the confirmation gate and the post-run report
// WHY: Keep all wording in CORE; SHELL only prints lines
// PURITY: CORE
// INVARIANT: Fast and Full warnings never share a banner line
// COMPLEXITY: O(1)

import { match } from "ts-pattern";

import type { ResetRequest, WipeMode } from "./models.js";

interface ModeWording {
	readonly banner: string;
	readonly consequence: string;
}

const modeWording = (mode: WipeMode): ModeWording =>
	match(mode)
		.with("Full", () => ({
			banner: "🔥🔥🔥 FULL WIPE 🔥🔥🔥",
			consequence:
				"Full mode overwrites ALL sectors with zeros. This is slow and NOTHING can be recovered afterwards.",
		}))
		.with("Fast", () => ({
			banner: "⚠️  FAST WIPE ⚠️",
			consequence:
				"Fast mode removes partitions only. Data remains recoverable with forensic tools.",
		}))
		.exhaustive();

/**
 * Warning block shown before the confirmation prompt.
 *
 * @pure true
 */
export const warningLines = (request: ResetRequest): readonly string[] => {
	const wording = modeWording(request.mode);
	return [
		"",
		wording.banner,
		`ALL DATA ON DISK ${request.diskNumber} WILL BE DESTROYED.`,
		wording.consequence,
		`New volume: FAT32, label "${request.label}"`,
		"",
	];
};

export const CONFIRM_PROMPT = "Press ENTER to continue or Ctrl+C to abort...";

/**
 * Lines summarizing what was applied.
 *
 * @pure true
 */
export const reportLines = (request: ResetRequest): readonly string[] => [
	`Mode:  ${request.mode}`,
	`Label: ${request.label}`,
];
