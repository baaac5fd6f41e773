// CHANGE: Calculator-wide value types shared by CORE, SHELL and APP
// PURITY: CORE
// INVARIANT: All fields are immutable; settings are validated before they reach this type
// COMPLEXITY: O(1)

/**
 * Exit code for the calculator process.
 *
 * @remarks
 * - @pure true
 * - @invariant exitCode ∈ {0, 1}
 */
export type ExitCode = 0 | 1;

/**
 * Effective settings after merging defaults, the settings file and flags.
 *
 * @invariant decimalPlaces ∈ [0, MAX_DECIMAL_PLACES]; autosaveEvery ≥ 0 (0 disables autosave)
 */
export interface CalculatorSettings {
	readonly decimalPlaces: number;
	readonly autosaveEvery: number;
	readonly historyFile: string;
}

export const MAX_DECIMAL_PLACES = 1000;

export const DEFAULT_AUTOSAVE_EVERY = 1;

/**
 * Parsed command line.
 *
 * Absent optional fields fall back to the settings file, then to defaults.
 */
export interface CLIOptions {
	readonly configPath?: string;
	readonly historyPath?: string;
	readonly decimalPlaces?: number;
	readonly autosaveEvery?: number;
	readonly printFilePaths: boolean;
	readonly help: boolean;
	/** Evaluated in order without starting the interactive prompt. */
	readonly expressions: readonly string[];
}

/**
 * Outcome of a calculator run used to decide the exit code.
 *
 * @remarks
 * - @pure true
 * - @invariant state is immutable
 */
export interface DecisionState {
	readonly failedInputs: number;
	readonly saveFailed: boolean;
}
