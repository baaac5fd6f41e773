// CHANGE: Typed domain error ADT for the calculator core using Effect.Data
// WHY: Lex/parse/eval/load/save failures are values in signatures, never exceptions
// PURITY: CORE
// INVARIANT: Errors are values (no throw), discriminated by `_tag` and `reason`
// COMPLEXITY: O(1)

import { Data } from "effect";
import { match } from "ts-pattern";

/**
 * Unexpected character while scanning source text.
 *
 * @pure true (Data class)
 * @invariant 0 <= position < |source|
 */
export class LexError extends Data.TaggedError("LexError")<{
	readonly reason: "UnrecognizedCharacter";
	readonly position: number;
	readonly character: string;
}> {}

export type ParseErrorReason =
	| "UnmatchedParen"
	| "TrailingInput"
	| "EmptyExpression"
	| "UnexpectedToken"
	| "NestingTooDeep";

/**
 * Token sequence does not form a single expression.
 *
 * @pure true (Data class)
 */
export class ParseError extends Data.TaggedError("ParseError")<{
	readonly reason: ParseErrorReason;
	readonly position: number;
	readonly detail: string;
}> {}

export type EvalErrorReason =
	| "DivisionByZero"
	| "InvalidExponent"
	| "ComplexResult"
	| "UndefinedVariable"
	| "InvalidName"
	| "ReservedName";

/**
 * Evaluation of a well-formed expression failed.
 *
 * @pure true (Data class)
 * @invariant name is present for UndefinedVariable, InvalidName, ReservedName
 */
export class EvalError extends Data.TaggedError("EvalError")<{
	readonly reason: EvalErrorReason;
	readonly name?: string;
	readonly detail?: string;
}> {}

export type LoadErrorReason = "Corrupt" | "IncompatibleVersion" | "Io";

/**
 * History container could not be read.
 *
 * @pure true (Data class)
 * @invariant version is present for IncompatibleVersion
 */
export class LoadError extends Data.TaggedError("LoadError")<{
	readonly reason: LoadErrorReason;
	readonly detail: string;
	readonly path?: string;
	readonly version?: number;
}> {}

/**
 * History container could not be written.
 *
 * @pure true (Data class)
 */
export class SaveError extends Data.TaggedError("SaveError")<{
	readonly reason: "Io";
	readonly detail: string;
	readonly path: string;
}> {}

/**
 * Command-line flag or settings file rejected before the calculator starts.
 *
 * @pure true (Data class)
 */
export class ConfigError extends Data.TaggedError("ConfigError")<{
	readonly reason: "InvalidArgument" | "InvalidConfig";
	readonly detail: string;
}> {}

/** Errors an `evaluate` call can report for a single input line. */
export type EngineError = LexError | ParseError | EvalError;

export type CalculatorError = EngineError | LoadError | SaveError | ConfigError;

const describeEvalError = (error: EvalError): string =>
	match(error.reason)
		.with("DivisionByZero", () => "Division by zero")
		.with("InvalidExponent", () => `Invalid exponent: ${error.detail ?? ""}`)
		.with("ComplexResult", () => "Result is a complex number")
		.with(
			"UndefinedVariable",
			() => `Undefined variable "${error.name ?? ""}"`,
		)
		.with("InvalidName", () => `Invalid variable name "${error.name ?? ""}"`)
		.with(
			"ReservedName",
			() => `"${error.name ?? ""}" is a reserved function name`,
		)
		.exhaustive();

/**
 * Render a one-line human message for any calculator error.
 *
 * @pure true
 * @invariant result.length > 0
 */
export const describeError = (error: CalculatorError): string =>
	match(error)
		.with(
			{ _tag: "LexError" },
			(e) => `Unrecognized character '${e.character}' at ${e.position + 1}`,
		)
		.with({ _tag: "ParseError" }, (e) =>
			match(e.reason)
				.with("EmptyExpression", () => "Empty expression")
				.with("UnmatchedParen", () => `Unmatched parenthesis at ${e.position + 1}`)
				.with("TrailingInput", () => `Unexpected ${e.detail} at ${e.position + 1}`)
				.with("UnexpectedToken", () => `Expected a value but found ${e.detail}`)
				.with(
					"NestingTooDeep",
					() => `Expression nested too deeply at ${e.position + 1}: ${e.detail}`,
				)
				.exhaustive(),
		)
		.with({ _tag: "EvalError" }, describeEvalError)
		.with({ _tag: "LoadError" }, (e) =>
			match(e.reason)
				.with("Corrupt", () => `History file is corrupt: ${e.detail}`)
				.with(
					"IncompatibleVersion",
					() => `History file version ${e.version ?? "?"} is not supported`,
				)
				.with("Io", () => `Could not read history: ${e.detail}`)
				.exhaustive(),
		)
		.with({ _tag: "SaveError" }, (e) => `Could not save history: ${e.detail}`)
		.with({ _tag: "ConfigError", reason: "InvalidArgument" }, (e) => e.detail)
		.with(
			{ _tag: "ConfigError", reason: "InvalidConfig" },
			(e) => `Invalid configuration: ${e.detail}`,
		)
		.exhaustive();
