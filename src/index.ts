// CHANGE: Public API entry point for library consumers
// WHY: Export the Calculator facade, CORE value types and pure utilities; keep SHELL internals private
// PURITY: Re-exports only (meta-module)
// INVARIANT: All exports are either pure functions, typed interfaces or APP entry points
// COMPLEXITY: O(1) - module resolution only

// ═══════════════════════════════════════════════════════════════════════════════
// CALCULATOR (Programmatic Entry Point)
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Calculator bound to a history file.
 *
 * @example
 * ```typescript
 * import { Effect, Option } from "effect";
 * import { openCalculator } from "ratiocalc";
 *
 * const program = Effect.gen(function* () {
 *   const calculator = yield* openCalculator({ historyFile: "./history.bin" });
 *   const result = yield* calculator.evaluate("x = 2^(1/2)");
 *   yield* calculator.close();
 *   return Option.map(result, (r) => r.text); // Some("1.414213...")
 * });
 * ```
 */
export {
	type Calculator,
	type CalculatorOptions,
	type DisplayableResult,
	openCalculator,
} from "./app/calculator.js";
export { handleLine, type ReplOutcome } from "./app/repl.js";
export { runCalculator } from "./app/runCalculator.js";
export { main } from "./main.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE TYPES (Immutable Domain Models)
// ═══════════════════════════════════════════════════════════════════════════════

export type { Expression } from "./core/expression/ast.js";
export type { Token } from "./core/expression/token.js";
export type {
	EntryOutcome,
	HistoryContainer,
	HistoryEntry,
	Session,
} from "./core/history/model.js";
export type { CalculatorSettings, CLIOptions, ExitCode } from "./core/models.js";
export type { Rational } from "./core/number/rational.js";
export type { VariableSnapshot } from "./core/variables/table.js";

// ═══════════════════════════════════════════════════════════════════════════════
// ERRORS
// ═══════════════════════════════════════════════════════════════════════════════

export {
	type CalculatorError,
	ConfigError,
	describeError,
	type EngineError,
	EvalError,
	LexError,
	LoadError,
	ParseError,
	SaveError,
} from "./core/errors.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE PURE FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

export { computeExitCode } from "./core/decision.js";
export {
	formatFraction,
	formatNumber,
	renderDecimal,
} from "./core/expression/display.js";
export { evaluate, type EvaluationScope } from "./core/expression/evaluator.js";
export { parse, parseSource } from "./core/expression/parser.js";
export { tokenize } from "./core/expression/tokenizer.js";
export {
	add,
	compare,
	divide,
	fraction,
	fromInteger,
	multiply,
	parseDecimal,
	power,
	sign,
	subtract,
	toFractionString,
} from "./core/number/rational.js";
export { nthRoot, ROOT_PRECISION_DIGITS, rationalPower } from "./core/number/root.js";
export { validateVariableName, VariableTable } from "./core/variables/table.js";

// ═══════════════════════════════════════════════════════════════════════════════
// HISTORY PERSISTENCE
// ═══════════════════════════════════════════════════════════════════════════════

export { HistoryStore, type HistoryStoreOptions } from "./shell/history/store.js";
export { loadHistory, saveHistory } from "./shell/history/file.js";
