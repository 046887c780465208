// CHANGE: Pure parsing of the three reset inputs
// WHY: Arguments and interactive answers go through the same validation before the confirmation gate
// PURITY: CORE
// INVARIANT: ∀ input: parse*(input) is Right(valid) ∨ Left(typed error); never throws
// COMPLEXITY: O(n) where n = |input|

import { Either } from "effect";
import { match } from "ts-pattern";

import { InvalidDiskNumber, InvalidMode } from "./errors.js";
import type { WipeMode } from "./models.js";

export const DEFAULT_LABEL = "USB";

/** FAT32 volume labels hold at most 11 bytes. */
export const MAX_LABEL_LENGTH = 11;

// Characters FAT rejects in a volume label.
const FORBIDDEN_LABEL_CHARS = new Set(Array.from('*?.,;:/\\|+=<>[]"'));

// Printable ASCII only: one byte per character in any OEM code page.
const isLabelChar = (char: string): boolean => {
	const code = char.codePointAt(0) ?? 0;
	return code >= 0x20 && code <= 0x7e && !FORBIDDEN_LABEL_CHARS.has(char);
};

const DIGITS_ONLY = /^\d+$/u;

/**
 * Parses a disk number.
 *
 * @param input - raw text from argv or a prompt
 * @returns Right(n) for decimal digits (surrounding whitespace ignored)
 *
 * @pure true
 * @invariant Right(n) → Number.isSafeInteger(n) ∧ n ≥ 0
 *
 * @example
 * ```ts
 * parseDiskNumber(" 3 "); // Right(3)
 * parseDiskNumber("-1");  // Left(InvalidDiskNumber)
 * ```
 */
export const parseDiskNumber = (
	input: string,
): Either.Either<number, InvalidDiskNumber> => {
	const trimmed = input.trim();
	if (!DIGITS_ONLY.test(trimmed)) {
		return Either.left(new InvalidDiskNumber({ input }));
	}
	const value = Number.parseInt(trimmed, 10);
	return Number.isSafeInteger(value)
		? Either.right(value)
		: Either.left(new InvalidDiskNumber({ input }));
};

/**
 * Parses a wipe mode, case-insensitively.
 *
 * @pure true
 * @invariant Right(m) → m ∈ {"Fast", "Full"}
 */
export const parseMode = (
	input: string,
): Either.Either<WipeMode, InvalidMode> =>
	match(input.trim().toLowerCase())
		.with("fast", (): Either.Either<WipeMode, InvalidMode> =>
			Either.right("Fast"),
		)
		.with("full", (): Either.Either<WipeMode, InvalidMode> =>
			Either.right("Full"),
		)
		.otherwise(() => Either.left(new InvalidMode({ input })));

/**
 * Normalizes a volume label for FAT32.
 *
 * Drops forbidden, control and non-ASCII characters, trims, truncates to
 * 11 characters and falls back when nothing is left.
 *
 * @param input - raw label; may be empty
 * @param fallback - label used when input normalizes to nothing
 *
 * @pure true
 * @invariant 1 ≤ result.length ≤ MAX_LABEL_LENGTH when fallback is valid
 * @complexity O(n)
 *
 * @example
 * ```ts
 * normalizeLabel("   ");            // "USB"
 * normalizeLabel("my.backup.disk"); // "mybackupdis"
 * ```
 */
export const normalizeLabel = (
	input: string,
	fallback: string = DEFAULT_LABEL,
): string => {
	const cleaned = Array.from(input).filter(isLabelChar).join("").trim();
	const truncated = Array.from(cleaned)
		.slice(0, MAX_LABEL_LENGTH)
		.join("")
		.trimEnd();
	return truncated.length > 0 ? truncated : fallback;
};
