// CHANGE: Specs for user-facing error messages
// WHY: Messages are printed verbatim by the REPL and the command line
// PURITY: CORE

import { describe, expect, it } from "vitest";

import {
	type CalculatorError,
	ConfigError,
	describeError,
	EvalError,
	LexError,
	LoadError,
	ParseError,
	SaveError,
} from "../../src/core/errors.js";

describe("describeError", () => {
	it.each<[CalculatorError, string]>([
		[
			new LexError({ reason: "UnrecognizedCharacter", position: 0, character: "$" }),
			"Unrecognized character '$' at 1",
		],
		[
			new ParseError({ reason: "EmptyExpression", position: 0, detail: "end of expression" }),
			"Empty expression",
		],
		[
			new ParseError({ reason: "UnmatchedParen", position: 4, detail: "(" }),
			"Unmatched parenthesis at 5",
		],
		[
			new ParseError({ reason: "TrailingInput", position: 2, detail: "number 3" }),
			"Unexpected number 3 at 3",
		],
		[
			new ParseError({ reason: "UnexpectedToken", position: 2, detail: "end of expression" }),
			"Expected a value but found end of expression",
		],
		[
			new ParseError({ reason: "NestingTooDeep", position: 100, detail: "more than 100 levels" }),
			"Expression nested too deeply at 101: more than 100 levels",
		],
		[new EvalError({ reason: "DivisionByZero" }), "Division by zero"],
		[
			new EvalError({ reason: "InvalidExponent", detail: "exponent must be an integer" }),
			"Invalid exponent: exponent must be an integer",
		],
		[new EvalError({ reason: "ComplexResult" }), "Result is a complex number"],
		[new EvalError({ reason: "UndefinedVariable", name: "y" }), 'Undefined variable "y"'],
		[new EvalError({ reason: "InvalidName", name: "1x" }), 'Invalid variable name "1x"'],
		[new EvalError({ reason: "ReservedName", name: "sqrt" }), '"sqrt" is a reserved function name'],
		[
			new LoadError({ reason: "Corrupt", detail: "trailing bytes" }),
			"History file is corrupt: trailing bytes",
		],
		[
			new LoadError({ reason: "IncompatibleVersion", detail: "newer", version: 7 }),
			"History file version 7 is not supported",
		],
		[new LoadError({ reason: "Io", detail: "EACCES" }), "Could not read history: EACCES"],
		[
			new SaveError({ reason: "Io", detail: "ENOSPC", path: "/tmp/h.bin" }),
			"Could not save history: ENOSPC",
		],
		[
			new ConfigError({ reason: "InvalidArgument", detail: "Unknown option --x" }),
			"Unknown option --x",
		],
		[
			new ConfigError({ reason: "InvalidConfig", detail: "expected a JSON object" }),
			"Invalid configuration: expected a JSON object",
		],
	])("%s", (error, message): void => {
		expect(describeError(error)).toBe(message);
	});
});
