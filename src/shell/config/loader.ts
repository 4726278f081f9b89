// CHANGE: Load input locations from defaults and an optional syscall-cruncher.config.json
// REF: historical layout: "Unikraft - Syscall Status.xls" beside a to_aggregate/ folder
// PURITY: SHELL
// EFFECT: Effect<CruncherConfig, ConfigError>
// INVARIANT: Missing config file ⇒ defaults; present but invalid ⇒ ConfigError
// COMPLEXITY: O(1)

import * as fs from "node:fs";
import * as path from "node:path";
import { Effect } from "effect";

import { ConfigError } from "../../core/errors.js";
import type {
	CruncherConfig,
	JSONObject,
	JSONValue,
	SheetSelector,
} from "../../core/types/index.js";
import { isJSONObject } from "../../core/types/index.js";

export const CONFIG_FILE_NAME = "syscall-cruncher.config.json";

/**
 * Historical input names, relative to the working directory.
 */
export const DEFAULT_SHEET_PATH = "Unikraft - Syscall Status.xls";
export const DEFAULT_SHEET: SheetSelector = 0;
export const DEFAULT_APPLICATIONS_DIR = "to_aggregate";

interface ConfigOverrides {
	readonly sheetPath?: string;
	readonly sheet?: SheetSelector;
	readonly applicationsDir?: string;
}

/**
 * Applies overrides and resolves paths against `cwd`.
 *
 * @pure true
 */
export function resolveConfig(
	cwd: string,
	overrides: ConfigOverrides = {},
): CruncherConfig {
	return {
		sheetPath: path.resolve(cwd, overrides.sheetPath ?? DEFAULT_SHEET_PATH),
		sheet: overrides.sheet ?? DEFAULT_SHEET,
		applicationsDir: path.resolve(
			cwd,
			overrides.applicationsDir ?? DEFAULT_APPLICATIONS_DIR,
		),
	};
}

function readStringField(
	json: JSONObject,
	key: "sheetPath" | "applicationsDir",
): string | undefined | Error {
	const value = json[key];
	if (value === undefined) return undefined;
	if (typeof value !== "string") return new Error(`${key} must be a string`);
	return value;
}

function readSheetField(json: JSONObject): SheetSelector | undefined | Error {
	const value = json["sheet"];
	if (value === undefined) return undefined;
	if (typeof value === "string") return value;
	if (typeof value === "number" && Number.isInteger(value) && value >= 0) {
		return value;
	}
	return new Error("sheet must be a sheet name or a non-negative integer");
}

/**
 * Validates the config file contents.
 *
 * @pure true
 * @returns Overrides, or an Error describing the first invalid field
 */
export function parseConfigOverrides(json: JSONValue): ConfigOverrides | Error {
	if (!isJSONObject(json)) {
		return new Error("config must be a JSON object");
	}
	const sheetPath = readStringField(json, "sheetPath");
	const applicationsDir = readStringField(json, "applicationsDir");
	const sheet = readSheetField(json);
	for (const field of [sheetPath, applicationsDir, sheet]) {
		if (field instanceof Error) return field;
	}
	return {
		...(typeof sheetPath === "string" ? { sheetPath } : {}),
		...(typeof applicationsDir === "string" ? { applicationsDir } : {}),
		...(sheet === undefined || sheet instanceof Error ? {} : { sheet }),
	};
}

/**
 * Loads the cruncher configuration for a working directory.
 *
 * @param cwd Directory holding the optional config file and relative inputs
 *
 * @pure false - reads the filesystem
 * @effect Effect<CruncherConfig, ConfigError>
 */
export function loadCruncherConfig(
	cwd: string = process.cwd(),
): Effect.Effect<CruncherConfig, ConfigError> {
	const configPath = path.join(cwd, CONFIG_FILE_NAME);
	return Effect.gen(function* () {
		if (!fs.existsSync(configPath)) {
			return resolveConfig(cwd);
		}
		const json = yield* Effect.try({
			try: () => JSON.parse(fs.readFileSync(configPath, "utf8")) as JSONValue,
			catch: (error) =>
				new ConfigError({
					path: configPath,
					detail: error instanceof Error ? error.message : String(error),
				}),
		});
		const overrides = parseConfigOverrides(json);
		if (overrides instanceof Error) {
			return yield* Effect.fail(
				new ConfigError({ path: configPath, detail: overrides.message }),
			);
		}
		return resolveConfig(cwd, overrides);
	});
}
