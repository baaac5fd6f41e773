// CHANGE: Variable table with validated, case-sensitive names
// WHY: The evaluator writes through `set`, persistence reads through `snapshot`/`restore`
// PURITY: CORE (instance-local mutable state, no I/O)
// INVARIANT: ∀ name ∈ table: isValidName(name) ∧ ¬reserved(name); last assignment wins
// COMPLEXITY: O(1) get/set, O(n) snapshot/restore

import { Either, Option } from "effect";

import { EvalError } from "../errors.js";
import { ROOT_FUNCTIONS } from "../expression/ast.js";
import type { EvaluationScope } from "../expression/evaluator.js";
import type { Rational } from "../number/rational.js";

const NAME_PATTERN = /^[A-Za-z][A-Za-z0-9_]*$/u;

/** Names that belong to built-in functions and can never hold a value. */
export const RESERVED_NAMES: ReadonlySet<string> = new Set(ROOT_FUNCTIONS.keys());

export type VariableBinding = readonly [name: string, value: Rational];

/** Immutable copy of a table, in insertion order. */
export type VariableSnapshot = ReadonlyArray<VariableBinding>;

/**
 * Check a candidate variable name.
 *
 * @pure true
 * @returns Left(ReservedName) for built-in function names, Left(InvalidName) for grammar violations
 */
export const validateVariableName = (
	name: string,
): Either.Either<string, EvalError> => {
	if (RESERVED_NAMES.has(name)) {
		return Either.left(new EvalError({ reason: "ReservedName", name }));
	}
	if (!NAME_PATTERN.test(name)) {
		return Either.left(new EvalError({ reason: "InvalidName", name }));
	}
	return Either.right(name);
};

export class VariableTable {
	private readonly entries = new Map<string, Rational>();

	get(name: string): Option.Option<Rational> {
		return Option.fromNullable(this.entries.get(name));
	}

	set(name: string, value: Rational): Either.Either<void, EvalError> {
		return Either.map(validateVariableName(name), (valid) => {
			this.entries.set(valid, value);
		});
	}

	remove(name: string): boolean {
		return this.entries.delete(name);
	}

	has(name: string): boolean {
		return this.entries.has(name);
	}

	get size(): number {
		return this.entries.size;
	}

	names(): readonly string[] {
		return [...this.entries.keys()];
	}

	snapshot(): VariableSnapshot {
		return [...this.entries.entries()].map(([name, value]) => [name, value] as const);
	}

	/**
	 * Replace the whole table with a snapshot.
	 *
	 * @invariant all-or-nothing: on Left the table is left as it was
	 */
	restore(snapshot: VariableSnapshot): Either.Either<void, EvalError> {
		for (const [name] of snapshot) {
			const checked = validateVariableName(name);
			if (Either.isLeft(checked)) return Either.left(checked.left);
		}
		this.entries.clear();
		for (const [name, value] of snapshot) this.entries.set(name, value);
		return Either.right(undefined);
	}

	/** Adapter consumed by `evaluate`. */
	scope(): EvaluationScope {
		return {
			lookup: (name) => this.get(name),
			assign: (name, value) => this.set(name, value),
		};
	}
}
