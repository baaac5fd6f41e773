// CHANGE: Interactive command interpreter on top of the Calculator
// WHY: Keep line interpretation testable without a terminal
// PURITY: APP (returns output lines as values; printing happens in runCalculator)
// EFFECT: Effect<ReplOutcome>
// INVARIANT: Commands start with ':'; every other line is an expression
// COMPLEXITY: O(h) for history listings, otherwise one evaluation

import { Effect, Option } from "effect";
import { match, P } from "ts-pattern";

import { describeError } from "../core/errors.js";
import type { HistoryEntry, Session } from "../core/history/model.js";
import { isInteger } from "../core/number/rational.js";
import type { Calculator, DisplayableResult } from "./calculator.js";

export interface ReplOutcome {
	readonly lines: readonly string[];
	/** Stop reading input. */
	readonly quit: boolean;
	/** The line was an expression or command that failed. */
	readonly failed: boolean;
}

export const HELP_TEXT: readonly string[] = [
	"Enter an expression such as 2 + 3 * 4, 2^(1/2) or x = 5.",
	":history [session]   list entries (all sessions by default)",
	":sessions            list sessions, oldest first",
	":vars                list variables",
	":reinsert <id>       show the input of a past entry",
	":save                write the history file now",
	":help                show this text",
	":quit                save and leave",
];

const ok = (lines: readonly string[]): ReplOutcome => ({
	lines,
	quit: false,
	failed: false,
});

const failure = (line: string): ReplOutcome => ({
	lines: [line],
	quit: false,
	failed: true,
});

/** `14`, or `0.333333... (1/3)` when the value is not an integer. */
export const formatResult = (result: DisplayableResult): string =>
	isInteger(result.value) || result.precisionLoss
		? result.text
		: `${result.text} (${result.fraction})`;

const formatEntry = (calculator: Calculator, entry: HistoryEntry): string => {
	const shown =
		entry.outcome._tag === "Value"
			? calculator.display(entry.outcome.value)
			: `error: ${entry.outcome.message}`;
	return `${entry.id}  ${entry.input} = ${shown}`;
};

const formatSession = (session: Session): string =>
	`${session.id}  ${new Date(session.startedAt).toISOString()}  ${session.entries.length} entries`;

function runCommand(
	calculator: Calculator,
	command: string,
	argument: string | undefined,
): Effect.Effect<ReplOutcome> {
	return match({ command, argument })
		.with({ command: P.union("quit", "q", "exit") }, () =>
			Effect.succeed<ReplOutcome>({ lines: [], quit: true, failed: false }),
		)
		.with({ command: P.union("help", "h") }, () => Effect.succeed(ok(HELP_TEXT)))
		.with({ command: "history" }, ({ argument: sessionId }) =>
			Effect.succeed(
				ok(
					calculator
						.historyEntries(sessionId)
						.map((entry) => formatEntry(calculator, entry)),
				),
			),
		)
		.with({ command: "sessions" }, () =>
			Effect.succeed(ok(calculator.sessions().map(formatSession))),
		)
		.with({ command: "vars" }, () =>
			Effect.succeed(
				ok(
					calculator
						.variables()
						.map(([name, value]) => `${name} = ${calculator.display(value)}`),
				),
			),
		)
		.with({ command: "reinsert", argument: P.string }, ({ argument: id }) =>
			Effect.succeed(
				Option.match(calculator.reinsert(id), {
					onNone: () => failure(`No entry with id ${id}`),
					onSome: (input) => ok([input]),
				}),
			),
		)
		.with({ command: "reinsert" }, () =>
			Effect.succeed(failure("Usage: :reinsert <id>")),
		)
		.with({ command: "save" }, () =>
			calculator.save().pipe(
				Effect.as(ok([`Saved to ${calculator.settings.historyFile}`])),
				Effect.catchAll((error) => Effect.succeed(failure(describeError(error)))),
			),
		)
		.otherwise(() => Effect.succeed(failure(`Unknown command :${command}`)));
}

/**
 * Interpret one input line.
 *
 * @example
 * ```ts
 * yield* handleLine(calculator, "2^3^2"); // { lines: ["512"], quit: false, failed: false }
 * yield* handleLine(calculator, "1/0");   // { lines: ["Error: Division by zero"], failed: true, ... }
 * ```
 */
export function handleLine(
	calculator: Calculator,
	line: string,
): Effect.Effect<ReplOutcome> {
	const trimmed = line.trim();
	if (trimmed.startsWith(":")) {
		const [command = "", argument] = trimmed.slice(1).split(/\s+/u);
		return runCommand(calculator, command, argument);
	}
	return calculator.evaluate(line).pipe(
		Effect.map((result) =>
			ok(Option.match(result, { onNone: () => [], onSome: (r) => [formatResult(r)] })),
		),
		Effect.catchAll((error) =>
			Effect.succeed(failure(`Error: ${describeError(error)}`)),
		),
	);
}
