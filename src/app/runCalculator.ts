// CHANGE: Application orchestration for one calculator run
// WHY: Enforce FCIS: APP composes CORE evaluation with SHELL settings and history
// PURITY: APP (no process.exit; output through effect Console)
// EFFECT: Effect<ExitCode>
// INVARIANT: History is saved before the run returns, whichever way input ended
// COMPLEXITY: O(n) in input lines

import { Console, Effect, Option } from "effect";

import { computeExitCode } from "../core/decision.js";
import { describeError } from "../core/errors.js";
import type { CLIOptions, ExitCode } from "../core/models.js";
import { parseCLIArgs, USAGE } from "../shell/config/cli.js";
import { type ResolvedSettings, resolveSettings } from "../shell/config/settings.js";
import { runPrompt } from "../shell/terminal/prompt.js";
import { type Calculator, openCalculator } from "./calculator.js";
import { HELP_TEXT, handleLine } from "./repl.js";

const PROMPT = "> ";
const SUCCESS: ExitCode = 0;

const printLines = (lines: readonly string[]): Effect.Effect<void> =>
	Effect.forEach(lines, (line) => Console.log(line), { discard: true });

/**
 * Evaluate positional expressions in order.
 *
 * @returns number of failed inputs
 */
function evaluateAll(
	calculator: Calculator,
	expressions: readonly string[],
): Effect.Effect<number> {
	return Effect.reduce(expressions, 0, (failed, expression) =>
		handleLine(calculator, expression).pipe(
			Effect.tap((outcome) =>
				outcome.failed ? Console.error(outcome.lines.join("\n")) : printLines(outcome.lines),
			),
			Effect.map((outcome) => (outcome.failed ? failed + 1 : failed)),
		),
	);
}

/** Read lines from the terminal until `:quit` or end of input. */
function interactive(calculator: Calculator): Effect.Effect<number> {
	return Effect.gen(function* () {
		yield* Console.log(`Type :help for commands. History: ${calculator.settings.historyFile}`);
		yield* runPrompt(PROMPT, (line) =>
			handleLine(calculator, line).pipe(
				Effect.tap((outcome) => printLines(outcome.lines)),
				Effect.map((outcome) => !outcome.quit),
			),
		);
		return 0;
	});
}

const describePaths = (resolved: ResolvedSettings): readonly string[] => [
	`config: ${Option.getOrElse(resolved.configFile, () => "(none)")}`,
	`history: ${resolved.settings.historyFile}`,
];

/**
 * Orchestrates one run and returns ExitCode as value (no process.exit).
 *
 * @returns 1 when arguments or settings are invalid, an expression failed,
 *          or the history could not be written; otherwise 0
 *
 * @pure false (coordinates effects), but does not terminate the process
 */
export function runCalculator(cliOptions: CLIOptions): Effect.Effect<ExitCode> {
	return Effect.gen(function* () {
		if (cliOptions.help) {
			yield* printLines([...USAGE, "", ...HELP_TEXT]);
			return SUCCESS;
		}
		const resolved = yield* resolveSettings(cliOptions);
		if (cliOptions.printFilePaths) {
			yield* printLines(describePaths(resolved));
		}
		const calculator = yield* openCalculator(resolved.settings);
		const failedInputs =
			cliOptions.expressions.length > 0
				? yield* evaluateAll(calculator, cliOptions.expressions)
				: yield* interactive(calculator);
		const saved = yield* calculator.close();
		return computeExitCode({ failedInputs, saveFailed: !saved });
	}).pipe(
		Effect.catchAll((error) =>
			Console.error(`❌ ${describeError(error)}`).pipe(Effect.as<ExitCode>(1)),
		),
	);
}

/**
 * Main entry point: parse argv and delegate to runCalculator.
 *
 * @returns Effect<ExitCode>
 */
export function main(args?: readonly string[]): Effect.Effect<ExitCode> {
	return parseCLIArgs(args).pipe(
		Effect.flatMap(runCalculator),
		Effect.catchAll((error) =>
			Console.error(`❌ ${describeError(error)}\n${USAGE.join("\n")}`).pipe(
				Effect.as<ExitCode>(1),
			),
		),
	);
}
