// CHANGE: Optional JSON configuration for the utility commands and default label
// WHY: Hosts where diskpart or PowerShell live under another name can point at them without code changes
// PURITY: SHELL (reads the file system)
// EFFECT: Effect<ResetConfig, ConfigError>
// INVARIANT: Missing default file → DEFAULT_CONFIG; explicit path must exist
// COMPLEXITY: O(n) where n = file size

import { Effect } from "effect";

import { ConfigError } from "../../core/errors.js";
import { DEFAULT_CONFIG, type ResetConfig } from "../../core/models.js";
import { normalizeLabel } from "../../core/request.js";
import { fs, path } from "../utils/node-mods.js";

export const DEFAULT_CONFIG_FILE = "usb-reset.config.json";

/**
 * Type representing any valid JSON value.
 *
 * @invariant Must be serializable to JSON
 */
export type JSONValue =
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

const CONFIG_KEYS: readonly (keyof ResetConfig)[] = [
	"diskpartCommand",
	"powershellCommand",
	"defaultLabel",
];

/**
 * Validates parsed JSON against the config shape.
 *
 * @returns the merged config, or a message naming the first bad key
 *
 * @pure true
 */
export function decodeResetConfig(
	value: JSONValue,
): { readonly config: ResetConfig } | { readonly problem: string } {
	if (!isJSONObject(value)) {
		return { problem: "top-level value must be an object" };
	}

	const unknownKey = Object.keys(value).find(
		(key) => !CONFIG_KEYS.some((known) => known === key),
	);
	if (unknownKey !== undefined) {
		return { problem: `unknown key "${unknownKey}"` };
	}

	let config: ResetConfig = DEFAULT_CONFIG;
	for (const key of CONFIG_KEYS) {
		const field = value[key];
		if (field === undefined) continue;
		if (typeof field !== "string" || field.trim().length === 0) {
			return { problem: `"${key}" must be a non-empty string` };
		}
		config = { ...config, [key]: field.trim() };
	}

	return {
		config: {
			...config,
			defaultLabel: normalizeLabel(
				config.defaultLabel,
				DEFAULT_CONFIG.defaultLabel,
			),
		},
	};
}

/**
 * Loads the configuration.
 *
 * @param explicitPath - value of --config; when absent the default file is optional
 * @param cwd - directory the default file is looked up in
 *
 * @pure false (file I/O)
 * @effect Effect<ResetConfig, ConfigError>
 */
export function loadResetConfig(
	explicitPath: string | undefined,
	cwd: string = process.cwd(),
): Effect.Effect<ResetConfig, ConfigError> {
	const configPath = path.resolve(cwd, explicitPath ?? DEFAULT_CONFIG_FILE);

	return Effect.gen(function* () {
		if (explicitPath === undefined && !fs.existsSync(configPath)) {
			return DEFAULT_CONFIG;
		}

		const raw = yield* Effect.try({
			try: () => fs.readFileSync(configPath, "utf8"),
			catch: (error) =>
				new ConfigError({
					path: configPath,
					detail: error instanceof Error ? error.message : String(error),
				}),
		});

		const parsed = yield* Effect.try({
			try: () => JSON.parse(raw) as JSONValue,
			catch: () =>
				new ConfigError({ path: configPath, detail: "file is not valid JSON" }),
		});

		const decoded = decodeResetConfig(parsed);
		if ("problem" in decoded) {
			return yield* Effect.fail(
				new ConfigError({ path: configPath, detail: decoded.problem }),
			);
		}
		return decoded.config;
	});
}
