// CHANGE: Settings file loading and merge with command-line flags
// WHY: Precedence is flag > settings file > built-in default, decided in one place
// PURITY: SHELL (filesystem, home directory)
// EFFECT: Effect<ResolvedSettings, ConfigError>
// INVARIANT: Relative paths in the settings file are resolved against the file's directory
// COMPLEXITY: O(size of settings file)

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";

import { Effect, Option } from "effect";

import { ConfigError } from "../../core/errors.js";
import { DEFAULT_DECIMAL_PLACES } from "../../core/expression/display.js";
import {
	type CalculatorSettings,
	type CLIOptions,
	DEFAULT_AUTOSAVE_EVERY,
	MAX_DECIMAL_PLACES,
} from "../../core/models.js";

export const CONFIG_FILE_NAME = "ratiocalc.config.json";

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

function isJSONObject(
	value: JSONValue,
): value is { readonly [key: string]: JSONValue } {
	return value !== null && typeof value === "object" && !Array.isArray(value);
}

function isString(value: JSONValue): value is string {
	return typeof value === "string";
}

function isCount(value: JSONValue, max: number): value is number {
	return typeof value === "number" && Number.isSafeInteger(value) && value >= 0 && value <= max;
}

/** Settings file contents; every field is optional. */
export interface SettingsFile {
	readonly decimalPlaces?: number;
	readonly autosaveEvery?: number;
	readonly historyFile?: string;
}

export interface ResolvedSettings {
	readonly settings: CalculatorSettings;
	/** Settings file that was read, if any. */
	readonly configFile: Option.Option<string>;
}

export interface SettingsEnvironment {
	readonly cwd: string;
	readonly homeDir: string;
}

const invalidConfig = (detail: string): ConfigError =>
	new ConfigError({ reason: "InvalidConfig", detail });

export const defaultHistoryFile = (homeDir: string): string =>
	path.join(homeDir, ".ratiocalc", "history.bin");

/**
 * Validate parsed settings JSON.
 *
 * @pure true
 * @returns Left for a non-object document, unknown keys or out-of-range values
 */
export function validateSettingsFile(
	parsed: JSONValue,
	baseDir: string,
): Effect.Effect<SettingsFile, ConfigError> {
	if (!isJSONObject(parsed)) {
		return Effect.fail(invalidConfig("expected a JSON object"));
	}
	let result: SettingsFile = {};
	for (const [key, value] of Object.entries(parsed)) {
		if (key === "decimalPlaces" && isCount(value, MAX_DECIMAL_PLACES)) {
			result = { ...result, decimalPlaces: value };
		} else if (key === "autosaveEvery" && isCount(value, Number.MAX_SAFE_INTEGER)) {
			result = { ...result, autosaveEvery: value };
		} else if (key === "historyFile" && isString(value) && value.length > 0) {
			result = { ...result, historyFile: path.resolve(baseDir, value) };
		} else {
			return Effect.fail(invalidConfig(`unsupported value for "${key}"`));
		}
	}
	return Effect.succeed(result);
}

/**
 * Read and validate a settings file.
 *
 * @returns None when `required` is false and the file does not exist
 */
export function loadSettingsFile(
	configPath: string,
	required: boolean,
): Effect.Effect<Option.Option<SettingsFile>, ConfigError> {
	return Effect.gen(function* () {
		if (!required && !fs.existsSync(configPath)) return Option.none();
		const parsed = yield* Effect.try({
			try: (): JSONValue => JSON.parse(fs.readFileSync(configPath, "utf8")),
			catch: (error) =>
				invalidConfig(
					`${configPath}: ${error instanceof Error ? error.message : String(error)}`,
				),
		});
		const file = yield* validateSettingsFile(parsed, path.dirname(configPath)).pipe(
			Effect.mapError((error) => invalidConfig(`${configPath}: ${error.detail}`)),
		);
		return Option.some(file);
	});
}

/**
 * Merge flags, the settings file and defaults.
 *
 * @pure true
 */
export const mergeSettings = (
	cli: CLIOptions,
	file: SettingsFile,
	homeDir: string,
	cwd: string,
): CalculatorSettings => ({
	decimalPlaces: cli.decimalPlaces ?? file.decimalPlaces ?? DEFAULT_DECIMAL_PLACES,
	autosaveEvery: cli.autosaveEvery ?? file.autosaveEvery ?? DEFAULT_AUTOSAVE_EVERY,
	historyFile:
		cli.historyPath === undefined
			? (file.historyFile ?? defaultHistoryFile(homeDir))
			: path.resolve(cwd, cli.historyPath),
});

/**
 * Resolve the effective settings for a run.
 *
 * `--config` makes the settings file mandatory; otherwise `ratiocalc.config.json`
 * in the working directory is used when present.
 */
export function resolveSettings(
	cli: CLIOptions,
	env: SettingsEnvironment = { cwd: process.cwd(), homeDir: os.homedir() },
): Effect.Effect<ResolvedSettings, ConfigError> {
	const configPath = path.resolve(env.cwd, cli.configPath ?? CONFIG_FILE_NAME);
	return loadSettingsFile(configPath, cli.configPath !== undefined).pipe(
		Effect.map((file) => ({
			settings: mergeSettings(
				cli,
				Option.getOrElse(file, (): SettingsFile => ({})),
				env.homeDir,
				env.cwd,
			),
			configFile: Option.map(file, () => configPath),
		})),
	);
}
