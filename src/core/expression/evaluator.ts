// CHANGE: Exact evaluator over the expression tree
// WHY: Replace token-simplification with a total fold that returns a Number or a typed EvalError
// PURITY: CORE (mutation only through the injected scope, only for a successful assignment)
// FORMAT THEOREM: evaluate(e, s) = Left(_) ⇒ scope s is unchanged
// INVARIANT: +, -, * never lose precision; only roots introduce the inexact flag
// COMPLEXITY: O(|e|) node visits plus bigint arithmetic; stack depth follows nesting, not chain length

import { Either, Option } from "effect";
import { match } from "ts-pattern";

import { EvalError } from "../errors.js";
import {
	add,
	divide,
	multiply,
	negate,
	type Rational,
	subtract,
} from "../number/rational.js";
import { nthRoot, rationalPower } from "../number/root.js";
import type { Expression } from "./ast.js";
import type { BinaryOperator } from "./token.js";

/**
 * Variable access granted to the evaluator.
 *
 * @remarks
 * - `lookup` is read-only
 * - `assign` validates the name and is the only write path
 */
export interface EvaluationScope {
	readonly lookup: (name: string) => Option.Option<Rational>;
	readonly assign: (name: string, value: Rational) => Either.Either<void, EvalError>;
}

type Evaluated = Either.Either<Rational, EvalError>;

const applyBinary = (
	op: BinaryOperator,
	left: Rational,
	right: Rational,
): Evaluated =>
	match(op)
		.with("+", () => Either.right(add(left, right)))
		.with("-", () => Either.right(subtract(left, right)))
		.with("*", () => Either.right(multiply(left, right)))
		.with("/", () => divide(left, right))
		.with("^", () => rationalPower(left, right))
		.exhaustive();

type BinaryNode = Extract<Expression, { kind: "binary" }>;

/**
 * Fold a left-nested run of binary nodes (`1 + 2 - 3 * ...`) in a loop, so a
 * long sum or product does not grow the stack. Operands are still evaluated
 * left to right.
 */
function evaluateChain(root: BinaryNode, scope: EvaluationScope): Evaluated {
	const spine: BinaryNode[] = [];
	let node: Expression = root;
	while (node.kind === "binary") {
		spine.push(node);
		node = node.left;
	}
	const leftmost = node;
	return Either.gen(function* () {
		let accumulated = yield* evaluate(leftmost, scope);
		for (const step of spine.reverse()) {
			const right = yield* evaluate(step.right, scope);
			accumulated = yield* applyBinary(step.op, accumulated, right);
		}
		return accumulated;
	});
}

/**
 * Evaluate an expression to an exact rational.
 *
 * @param expression - Parsed tree
 * @param scope - Variable table accessor
 * @returns Right(value) or Left(EvalError)
 *
 * @example
 * ```ts
 * evaluate(parsed("x = 2 + 2"), scope); // Right(4), scope now maps x → 4
 * ```
 */
export function evaluate(expression: Expression, scope: EvaluationScope): Evaluated {
	switch (expression.kind) {
		case "literal":
			return Either.right(expression.value);
		case "variable":
			return Option.match(scope.lookup(expression.name), {
				onNone: () =>
					Either.left(
						new EvalError({ reason: "UndefinedVariable", name: expression.name }),
					),
				onSome: (value) => Either.right(value),
			});
		case "unary":
			return Either.map(evaluate(expression.operand, scope), negate);
		case "binary":
			return evaluateChain(expression, scope);
		case "root":
			return Either.gen(function* () {
				const degree = yield* evaluate(expression.degree, scope);
				const radicand = yield* evaluate(expression.radicand, scope);
				return yield* nthRoot(radicand, degree);
			});
		case "assignment":
			return Either.gen(function* () {
				const value = yield* evaluate(expression.value, scope);
				yield* scope.assign(expression.name, value);
				return value;
			});
		default: {
			const _exhaustive: never = expression;
			return _exhaustive;
		}
	}
}
