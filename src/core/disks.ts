// CHANGE: Decode and tabulate the disk enumeration
// WHY: The listing is advisory output; decoding stays pure so SHELL only runs the command
// PURITY: CORE
// INVARIANT: Rows that lack a numeric Number are skipped, never guessed
// COMPLEXITY: O(n) where n = number of disks

import type { DiskInfo } from "./models.js";

/**
 * Type representing any valid JSON value.
 */
type JSONValue =
	| string
	| number
	| boolean
	| null
	| ReadonlyArray<JSONValue>
	| { readonly [key: string]: JSONValue };

type JSONObject = { readonly [key: string]: JSONValue };

function isJSONObject(value: JSONValue): value is JSONObject {
	return value !== null && typeof value === "object" && !Array.isArray(value);
}

function textOf(value: JSONValue | undefined, fallback: string): string {
	if (typeof value === "string" && value.trim().length > 0) return value.trim();
	if (typeof value === "number") return String(value);
	return fallback;
}

function toDiskInfo(value: JSONValue): DiskInfo | null {
	if (!isJSONObject(value)) return null;
	const number = value["Number"];
	if (typeof number !== "number" || !Number.isInteger(number)) return null;
	const size = value["Size"];
	return {
		number,
		friendlyName: textOf(value["FriendlyName"], "(unnamed)"),
		sizeBytes: typeof size === "number" && size >= 0 ? size : 0,
		busType: textOf(value["BusType"], "Unknown"),
	};
}

/**
 * Decodes `ConvertTo-Json` output of the disk listing.
 *
 * PowerShell emits a bare object for one disk and an array for several;
 * empty output means no disks.
 *
 * @param text - raw stdout
 * @returns disks sorted by number, or null when stdout is not JSON
 *
 * @pure true
 */
export function decodeDiskList(text: string): readonly DiskInfo[] | null {
	const trimmed = text.trim();
	if (trimmed.length === 0) return [];

	let parsed: JSONValue;
	try {
		parsed = JSON.parse(trimmed) as JSONValue;
	} catch {
		return null;
	}

	const items: ReadonlyArray<JSONValue> = Array.isArray(parsed)
		? parsed
		: [parsed];
	return items
		.map(toDiskInfo)
		.filter((disk): disk is DiskInfo => disk !== null)
		.sort((a, b) => a.number - b.number);
}

const GIB = 1024 ** 3;

/**
 * Human-readable size in GiB with one decimal.
 *
 * @pure true
 * @example formatSize(16_106_127_360) // "15.0 GB"
 */
export const formatSize = (bytes: number): string =>
	`${(bytes / GIB).toFixed(1)} GB`;

/**
 * Fixed-width table of disks.
 *
 * @pure true
 * @postcondition result.length = disks.length + 2 (header and rule)
 */
export function formatDiskTable(disks: readonly DiskInfo[]): readonly string[] {
	const rows = disks.map((disk) => [
		String(disk.number),
		disk.friendlyName,
		formatSize(disk.sizeBytes),
		disk.busType,
	]);
	const header = ["Disk", "Name", "Size", "Bus"];
	const widths = header.map((title, column) =>
		Math.max(title.length, ...rows.map((row) => (row[column] ?? "").length)),
	);
	const render = (cells: readonly string[]): string =>
		cells
			.map((cell, column) => cell.padEnd(widths[column] ?? 0))
			.join("  ")
			.trimEnd();
	return [
		render(header),
		render(widths.map((width) => "-".repeat(width))),
		...rows.map(render),
	];
}
