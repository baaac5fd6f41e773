// CHANGE: Lazy, restartable tokenizer producing Either<Token, LexError>
// WHY: Parser pulls tokens on demand; a failed scan ends the sequence with a typed error
// PURITY: CORE
// FORMAT THEOREM: ∀ src: tokens(src) is finite and ends with exactly one `end` or one Left
// INVARIANT: Each call to [Symbol.iterator]() restarts scanning at offset 0
// COMPLEXITY: O(n) where n = |source|

import { Either } from "effect";

import { LexError } from "../errors.js";
import type { Operator, Token } from "./token.js";

export type LexResult = Either.Either<Token, LexError>;

// Sticky patterns match only at `lastIndex`, so scanning never copies the source.
const NUMBER_PATTERN = /(?:\d+(?:\.\d*)?|\.\d+)/uy;
const IDENTIFIER_PATTERN = /[A-Za-z_][A-Za-z0-9_]*/uy;
const WHITESPACE_PATTERN = /\s+/uy;

const matchAt = (pattern: RegExp, source: string, pos: number): string | null => {
	pattern.lastIndex = pos;
	return pattern.exec(source)?.[0] ?? null;
};

const OPERATORS: ReadonlySet<string> = new Set<Operator>([
	"+",
	"-",
	"*",
	"/",
	"^",
	"√",
]);

const isOperator = (ch: string): ch is Operator => OPERATORS.has(ch);

const singleCharToken = (ch: string, start: number): Token | null => {
	const span = { start, end: start + 1 };
	if (isOperator(ch)) return { kind: "operator", op: ch, span };
	if (ch === "(") return { kind: "lparen", span };
	if (ch === ")") return { kind: "rparen", span };
	if (ch === "=") return { kind: "assign", span };
	return null;
};

function* scan(source: string): Generator<LexResult, void, undefined> {
	let pos = 0;
	while (pos < source.length) {
		const ws = matchAt(WHITESPACE_PATTERN, source, pos);
		if (ws !== null) {
			pos += ws.length;
			continue;
		}

		const text = matchAt(NUMBER_PATTERN, source, pos);
		if (text !== null) {
			yield Either.right({
				kind: "number",
				text,
				span: { start: pos, end: pos + text.length },
			});
			pos += text.length;
			continue;
		}

		const name = matchAt(IDENTIFIER_PATTERN, source, pos);
		if (name !== null) {
			yield Either.right({
				kind: "identifier",
				name,
				span: { start: pos, end: pos + name.length },
			});
			pos += name.length;
			continue;
		}

		const ch = source.charAt(pos);
		const token = singleCharToken(ch, pos);
		if (token === null) {
			const codePoint = source.codePointAt(pos);
			yield Either.left(
				new LexError({
					reason: "UnrecognizedCharacter",
					position: pos,
					character:
						codePoint === undefined ? ch : String.fromCodePoint(codePoint),
				}),
			);
			return;
		}
		yield Either.right(token);
		pos += 1;
	}
	yield Either.right({
		kind: "end",
		span: { start: source.length, end: source.length },
	});
}

/**
 * Tokenize source text lazily.
 *
 * @returns Iterable whose every iteration rescans `source` from the start
 *
 * @example
 * ```ts
 * [...tokenize("x = 2")].map(Either.map((t) => t.kind));
 * // [Right(identifier), Right(assign), Right(number), Right(end)]
 * ```
 */
export const tokenize = (source: string): Iterable<LexResult> => ({
	[Symbol.iterator]: () => scan(source),
});
