// CHANGE: One-line operator messages for every AppError variant
// WHY: APP maps failures to text in one place; exhaustive match keeps new variants from slipping through
// PURITY: CORE
// INVARIANT: ∀ e ∈ AppError: describeError(e).length > 0
// COMPLEXITY: O(1)

import { match } from "ts-pattern";

import type { AppError } from "../errors.js";

/**
 * Text printed when the flow stops on an error.
 *
 * @pure true
 *
 * @example
 * ```ts
 * describeError(new InvalidMode({ input: "slow" }));
 * // '❌ Invalid mode "slow": expected Fast or Full'
 * ```
 */
export const describeError = (error: AppError): string =>
	match(error)
		.with(
			{ _tag: "InvalidArgument" },
			(e) => `❌ ${e.argument}: ${e.detail} (see --help)`,
		)
		.with(
			{ _tag: "InvalidDiskNumber" },
			(e) =>
				`❌ Invalid disk number "${e.input}": expected a non-negative integer`,
		)
		.with(
			{ _tag: "InvalidMode" },
			(e) => `❌ Invalid mode "${e.input}": expected Fast or Full`,
		)
		.with(
			{ _tag: "OperatorCancelled" },
			(e) => `🛑 Aborted at the ${e.stage} prompt. Nothing was sent to diskpart.`,
		)
		.with(
			{ _tag: "UnsupportedPlatform" },
			(e) =>
				`❌ Unsupported platform "${e.platform}": diskpart is only available on Windows`,
		)
		.with({ _tag: "ConfigError" }, (e) => `❌ Config ${e.path}: ${e.detail}`)
		.with({ _tag: "Exec" }, (e) => `❌ Failed to run ${e.command}: ${e.detail}`)
		.exhaustive();
