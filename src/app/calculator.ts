// CHANGE: Calculator facade composing the expression engine with the history store
// WHY: Collaborators (REPL, CLI, programmatic users) see one object instead of tokenizer/parser/store plumbing
// PURITY: APP
// EFFECT: Effect<Calculator> | Effect<Option<DisplayableResult>, EngineError>
// INVARIANT: A failed evaluation appends nothing and leaves the variable table unchanged
// INVARIANT: An autosave failure is reported and never turns a successful evaluation into a failure
// COMPLEXITY: O(|input|) per evaluation plus bigint arithmetic

import { Console, Effect, Option } from "effect";

import {
	describeError,
	type EngineError,
	type LoadError,
	type SaveError,
} from "../core/errors.js";
import {
	DEFAULT_DECIMAL_PLACES,
	formatFraction,
	renderDecimal,
} from "../core/expression/display.js";
import { evaluate } from "../core/expression/evaluator.js";
import { parseSource } from "../core/expression/parser.js";
import type { HistoryEntry, Session } from "../core/history/model.js";
import { type CalculatorSettings, DEFAULT_AUTOSAVE_EVERY } from "../core/models.js";
import type { Rational } from "../core/number/rational.js";
import type { VariableSnapshot } from "../core/variables/table.js";
import { HistoryStore } from "../shell/history/store.js";

/** A successful evaluation, ready to show. */
export interface DisplayableResult {
	readonly entry: HistoryEntry;
	readonly value: Rational;
	/** Decimal rendering, `...`-suffixed when incomplete. */
	readonly text: string;
	readonly fraction: string;
	readonly precisionLoss: boolean;
	readonly truncated: boolean;
}

export interface CalculatorOptions {
	readonly historyFile: string;
	readonly decimalPlaces?: number;
	readonly autosaveEvery?: number;
	readonly now?: () => number;
	readonly generateId?: () => string;
}

export interface Calculator {
	readonly settings: CalculatorSettings;
	/** Why the previous history was discarded, if it was. */
	readonly loadError: Option.Option<LoadError>;
	evaluate(text: string): Effect.Effect<Option.Option<DisplayableResult>, EngineError>;
	historyEntries(sessionId?: string): readonly HistoryEntry[];
	sessions(): readonly Session[];
	latestSession(): Session;
	/** Original input of a past entry; nothing is evaluated or recorded. */
	reinsert(entryId: string): Option.Option<string>;
	variables(): VariableSnapshot;
	/** Display a stored value with the current settings. */
	display(value: Rational): string;
	save(): Effect.Effect<void, SaveError>;
	/**
	 * Save pending entries and report a failure.
	 *
	 * @returns false when the final save failed
	 */
	close(): Effect.Effect<boolean>;
}

const reportSaveFailure = (error: SaveError): Effect.Effect<void> =>
	Console.warn(`⚠️  ${describeError(error)}`);

function evaluateLine(
	store: HistoryStore,
	settings: CalculatorSettings,
	text: string,
): Effect.Effect<Option.Option<DisplayableResult>, EngineError> {
	return Effect.gen(function* () {
		if (text.trim().length === 0) return Option.none();
		const expression = yield* parseSource(text);
		const value = yield* evaluate(expression, store.variables.scope());
		const entry = store.append(text, value);
		if (
			settings.autosaveEvery > 0 &&
			store.unsavedCount >= settings.autosaveEvery
		) {
			yield* store.save().pipe(Effect.catchAll(reportSaveFailure));
		}
		const rendering = renderDecimal(value, settings.decimalPlaces);
		return Option.some({
			entry,
			value,
			text: rendering.text,
			fraction: formatFraction(value),
			precisionLoss: value.inexact,
			truncated: rendering.truncated,
		});
	});
}

/**
 * Open the history file and return a ready calculator.
 *
 * @effect Effect<Calculator> (load problems are reported through `loadError`)
 *
 * @example
 * ```ts
 * const calculator = yield* openCalculator({ historyFile: "/tmp/history.bin" });
 * const result = yield* calculator.evaluate("2 + 3 * 4"); // Some({ text: "14", ... })
 * ```
 */
export function openCalculator(options: CalculatorOptions): Effect.Effect<Calculator> {
	const settings: CalculatorSettings = {
		decimalPlaces: options.decimalPlaces ?? DEFAULT_DECIMAL_PLACES,
		autosaveEvery: options.autosaveEvery ?? DEFAULT_AUTOSAVE_EVERY,
		historyFile: options.historyFile,
	};
	return HistoryStore.open({
		path: options.historyFile,
		...(options.now === undefined ? {} : { now: options.now }),
		...(options.generateId === undefined ? {} : { generateId: options.generateId }),
	}).pipe(
		Effect.map(
			(store): Calculator => ({
				settings,
				loadError: store.loadError,
				evaluate: (text) => evaluateLine(store, settings, text),
				historyEntries: (sessionId) => store.entries(sessionId),
				sessions: () => store.sessions(),
				latestSession: () => store.latestSession(),
				reinsert: (entryId) =>
					Option.map(store.findEntry(entryId), (entry) => entry.input),
				variables: () => store.variables.snapshot(),
				display: (value) => renderDecimal(value, settings.decimalPlaces).text,
				save: () => store.save(),
				close: () =>
					store.unsavedCount === 0
						? Effect.succeed(true)
						: store.save().pipe(
								Effect.as(true),
								Effect.catchAll((error) =>
									reportSaveFailure(error).pipe(Effect.as(false)),
								),
							),
			}),
		),
	);
}
