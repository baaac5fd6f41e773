// CHANGE: Precedence-climbing parser from token stream to Expression tree
// WHY: Replace string-splitting by operator with a single left-to-right pass over tokens
// PURITY: CORE
// FORMAT THEOREM: parse(tokens) = Right(e) ⇒ the token stream is consumed up to `end`
// INVARIANT: Binding (high → low): primary, unary, {^, √} (right-assoc), {*, /}, {+, -}, top-level `=`
// INVARIANT: nesting depth (parentheses, prefix operators, right-assoc chains) ≤ MAX_NESTING_DEPTH
// COMPLEXITY: O(n) time, O(d) stack where d = nesting depth

import { Either, Option } from "effect";

import { type LexError, ParseError, type ParseErrorReason } from "../errors.js";
import { fromInteger, parseDecimal } from "../number/rational.js";
import { type Expression, ROOT_FUNCTIONS } from "./ast.js";
import { describeToken, type Token } from "./token.js";
import { type LexResult, tokenize } from "./tokenizer.js";

export type ParseFailure = LexError | ParseError;
type Parsed<A> = Either.Either<A, ParseFailure>;

/** Deepest nesting of parentheses, prefix operators and `^`/`√` chains accepted. */
export const MAX_NESTING_DEPTH = 100;

/**
 * Buffered cursor over a lazy token sequence.
 *
 * @invariant once the sequence is exhausted `peek` keeps returning `end`
 */
class TokenCursor {
	private readonly iterator: Iterator<LexResult>;
	private readonly buffer: LexResult[] = [];
	private lastOffset = 0;
	private nesting = 0;
	openParens = 0;

	constructor(tokens: Iterable<LexResult>) {
		this.iterator = tokens[Symbol.iterator]();
	}

	private pull(): LexResult {
		const step = this.iterator.next();
		if (step.done === true) {
			return Either.right({
				kind: "end",
				span: { start: this.lastOffset, end: this.lastOffset },
			});
		}
		if (Either.isRight(step.value)) this.lastOffset = step.value.right.span.end;
		return step.value;
	}

	peek(offset = 0): LexResult {
		while (this.buffer.length <= offset) this.buffer.push(this.pull());
		return this.buffer[offset] ?? this.pull();
	}

	next(): LexResult {
		const token = this.peek();
		this.buffer.shift();
		return token;
	}

	/** Run `inner` one nesting level deeper, failing past MAX_NESTING_DEPTH. */
	nested<A>(position: number, inner: () => Parsed<A>): Parsed<A> {
		if (this.nesting >= MAX_NESTING_DEPTH) {
			return fail("NestingTooDeep", position, `more than ${MAX_NESTING_DEPTH} levels`);
		}
		this.nesting += 1;
		const result = inner();
		this.nesting -= 1;
		return result;
	}
}

const fail = (
	reason: ParseErrorReason,
	position: number,
	detail: string,
): Parsed<never> => Either.left(new ParseError({ reason, position, detail }));

const isOperator = (token: Token, ...ops: readonly string[]): boolean =>
	token.kind === "operator" && ops.includes(token.op);

function parseParenthesized(cursor: TokenCursor, open: Token): Parsed<Expression> {
	return cursor.nested(open.span.start, () =>
		Either.gen(function* () {
			cursor.openParens += 1;
			const inner = yield* parseAdditive(cursor);
			const close = yield* cursor.next();
			cursor.openParens -= 1;
			if (close.kind === "rparen") return inner;
			if (close.kind === "end") {
				return yield* fail("UnmatchedParen", open.span.start, "missing ')'");
			}
			return yield* fail("TrailingInput", close.span.start, describeToken(close));
		}),
	);
}

function parseIdentifier(
	cursor: TokenCursor,
	token: Extract<Token, { kind: "identifier" }>,
): Parsed<Expression> {
	return Either.gen(function* () {
		const degree = ROOT_FUNCTIONS.get(token.name);
		if (degree === undefined) {
			return { kind: "variable", name: token.name } satisfies Expression;
		}
		const open = yield* cursor.next();
		if (open.kind !== "lparen") {
			return yield* fail(
				"UnexpectedToken",
				open.span.start,
				`${describeToken(open)} after ${token.name}`,
			);
		}
		const radicand = yield* parseParenthesized(cursor, open);
		return {
			kind: "root",
			degree: { kind: "literal", value: fromInteger(degree) },
			radicand,
		} satisfies Expression;
	});
}

function parsePrimary(cursor: TokenCursor): Parsed<Expression> {
	return Either.gen(function* () {
		const token = yield* cursor.next();
		switch (token.kind) {
			case "number": {
				const value = parseDecimal(token.text);
				if (Option.isNone(value)) {
					return yield* fail("UnexpectedToken", token.span.start, describeToken(token));
				}
				return { kind: "literal", value: value.value } satisfies Expression;
			}
			case "identifier":
				return yield* parseIdentifier(cursor, token);
			case "lparen":
				return yield* parseParenthesized(cursor, token);
			case "rparen":
				if (cursor.openParens === 0) {
					return yield* fail("UnmatchedParen", token.span.start, "unexpected ')'");
				}
				return yield* fail("UnexpectedToken", token.span.start, describeToken(token));
			case "operator":
			case "assign":
			case "end":
				return yield* fail("UnexpectedToken", token.span.start, describeToken(token));
			default: {
				const _exhaustive: never = token;
				return _exhaustive;
			}
		}
	});
}

function parseUnary(cursor: TokenCursor): Parsed<Expression> {
	return Either.gen(function* () {
		const token = yield* cursor.peek();
		const prefixed = () => cursor.nested(token.span.start, () => parseUnary(cursor));
		if (isOperator(token, "-")) {
			cursor.next();
			return { kind: "unary", op: "-", operand: yield* prefixed() } satisfies Expression;
		}
		if (isOperator(token, "+")) {
			cursor.next();
			return yield* prefixed();
		}
		if (isOperator(token, "√")) {
			cursor.next();
			const radicand = yield* prefixed();
			return {
				kind: "root",
				degree: { kind: "literal", value: fromInteger(2n) },
				radicand,
			} satisfies Expression;
		}
		return yield* parsePrimary(cursor);
	});
}

function parsePower(cursor: TokenCursor): Parsed<Expression> {
	return Either.gen(function* () {
		const base = yield* parseUnary(cursor);
		const token = yield* cursor.peek();
		const rest = () => cursor.nested(token.span.start, () => parsePower(cursor));
		if (isOperator(token, "^")) {
			cursor.next();
			const right = yield* rest();
			return { kind: "binary", op: "^", left: base, right } satisfies Expression;
		}
		if (isOperator(token, "√")) {
			cursor.next();
			const radicand = yield* rest();
			return { kind: "root", degree: base, radicand } satisfies Expression;
		}
		return base;
	});
}

function parseMultiplicative(cursor: TokenCursor): Parsed<Expression> {
	return Either.gen(function* () {
		let left = yield* parsePower(cursor);
		for (;;) {
			const token = yield* cursor.peek();
			if (token.kind !== "operator" || (token.op !== "*" && token.op !== "/")) {
				return left;
			}
			cursor.next();
			const right = yield* parsePower(cursor);
			left = { kind: "binary", op: token.op, left, right };
		}
	});
}

function parseAdditive(cursor: TokenCursor): Parsed<Expression> {
	return Either.gen(function* () {
		let left = yield* parseMultiplicative(cursor);
		for (;;) {
			const token = yield* cursor.peek();
			if (token.kind !== "operator" || (token.op !== "+" && token.op !== "-")) {
				return left;
			}
			cursor.next();
			const right = yield* parseMultiplicative(cursor);
			left = { kind: "binary", op: token.op, left, right };
		}
	});
}

function parseStatement(cursor: TokenCursor): Parsed<Expression> {
	return Either.gen(function* () {
		const first = yield* cursor.peek();
		const second = cursor.peek(1);
		if (
			first.kind === "identifier" &&
			Either.isRight(second) &&
			second.right.kind === "assign"
		) {
			cursor.next();
			cursor.next();
			const value = yield* parseAdditive(cursor);
			return { kind: "assignment", name: first.name, value } satisfies Expression;
		}
		return yield* parseAdditive(cursor);
	});
}

/**
 * Parse a token sequence into a single expression.
 *
 * @returns Left(LexError) for scanning failures, Left(ParseError) for grammar failures
 * @pure true
 */
export function parse(tokens: Iterable<LexResult>): Parsed<Expression> {
	return Either.gen(function* () {
		const cursor = new TokenCursor(tokens);
		const first = yield* cursor.peek();
		if (first.kind === "end") {
			return yield* fail("EmptyExpression", first.span.start, "empty input");
		}
		const expression = yield* parseStatement(cursor);
		const tail = yield* cursor.peek();
		if (tail.kind === "rparen") {
			return yield* fail("UnmatchedParen", tail.span.start, "unexpected ')'");
		}
		if (tail.kind !== "end") {
			return yield* fail("TrailingInput", tail.span.start, describeToken(tail));
		}
		return expression;
	});
}

/** Tokenize and parse source text in one step. */
export const parseSource = (source: string): Parsed<Expression> =>
	parse(tokenize(source));
