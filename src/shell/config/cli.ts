// CHANGE: Command-line parsing for the calculator
// WHY: Flags select the history file and display settings; positional arguments are expressions
// PURITY: SHELL (reads process.argv by default)
// INVARIANT: Arguments after "--" are always expressions, even when they start with "--"
// COMPLEXITY: O(n) in argument count

import { Either } from "effect";

import { ConfigError } from "../../core/errors.js";
import { type CLIOptions, MAX_DECIMAL_PLACES } from "../../core/models.js";

type ParseState = CLIOptions;

type Parsed<A> = Either.Either<A, ConfigError>;

const invalidArgument = (detail: string): ConfigError =>
	new ConfigError({ reason: "InvalidArgument", detail });

const parseCount = (flag: string, raw: string, max: number): Parsed<number> => {
	const value = /^\d+$/u.test(raw) ? Number.parseInt(raw, 10) : Number.NaN;
	return Number.isSafeInteger(value) && value <= max
		? Either.right(value)
		: Either.left(
				invalidArgument(`${flag} expects an integer between 0 and ${max}, got "${raw}"`),
			);
};

/** Flags that consume the following argument. */
type ValueFlagHandler = (state: ParseState, value: string) => Parsed<ParseState>;

const valueHandlers: Readonly<Record<string, ValueFlagHandler | undefined>> = {
	"--history": (state, value) => Either.right({ ...state, historyPath: value }),
	"--config": (state, value) => Either.right({ ...state, configPath: value }),
	"--decimal-places": (state, value) =>
		Either.map(parseCount("--decimal-places", value, MAX_DECIMAL_PLACES), (n) => ({
			...state,
			decimalPlaces: n,
		})),
	"--autosave-every": (state, value) =>
		Either.map(
			parseCount("--autosave-every", value, Number.MAX_SAFE_INTEGER),
			(n) => ({ ...state, autosaveEvery: n }),
		),
};

const booleanHandlers: Readonly<
	Record<string, ((state: ParseState) => ParseState) | undefined>
> = {
	"--print-file-paths": (state) => ({ ...state, printFilePaths: true }),
	"--help": (state) => ({ ...state, help: true }),
	"-h": (state) => ({ ...state, help: true }),
};

const INITIAL_STATE: ParseState = {
	printFilePaths: false,
	help: false,
	expressions: [],
};

/**
 * Parse command-line arguments.
 *
 * @param args - Arguments without the node executable and script path
 * @returns Left(ConfigError InvalidArgument) for unknown flags, missing or malformed values
 *
 * @example
 * ```ts
 * // Command: ratiocalc --decimal-places 3 "1/3" "x = 2"
 * parseCLIArgs(); // Right({ decimalPlaces: 3, expressions: ["1/3", "x = 2"], ... })
 * ```
 */
export function parseCLIArgs(
	args: readonly string[] = process.argv.slice(2),
): Parsed<CLIOptions> {
	let state = INITIAL_STATE;
	for (let i = 0; i < args.length; i++) {
		const arg = args[i] ?? "";
		if (arg.length === 0) continue;
		if (arg === "--") {
			return Either.right({
				...state,
				expressions: [...state.expressions, ...args.slice(i + 1)],
			});
		}
		const valueHandler = valueHandlers[arg];
		if (valueHandler !== undefined) {
			const value = args[i + 1];
			if (value === undefined) {
				return Either.left(invalidArgument(`${arg} expects a value`));
			}
			const next = valueHandler(state, value);
			if (Either.isLeft(next)) return Either.left(next.left);
			state = next.right;
			i++;
			continue;
		}
		const booleanHandler = booleanHandlers[arg];
		if (booleanHandler !== undefined) {
			state = booleanHandler(state);
			continue;
		}
		if (arg.startsWith("--")) {
			return Either.left(invalidArgument(`Unknown option ${arg}`));
		}
		state = { ...state, expressions: [...state.expressions, arg] };
	}
	return Either.right(state);
}

export const USAGE: readonly string[] = [
	"Usage: ratiocalc [options] [expression ...]",
	"",
	"Without expressions an interactive prompt is started.",
	"",
	"Options:",
	"  --history <file>          history file to load and save",
	"  --config <file>           settings file (default: ./ratiocalc.config.json)",
	`  --decimal-places <n>      digits shown after the point (0-${MAX_DECIMAL_PLACES})`,
	"  --autosave-every <n>      save after every n entries (0 saves only on exit)",
	"  --print-file-paths        print the settings and history paths",
	"  -h, --help                show this text",
];
