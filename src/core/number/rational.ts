// CHANGE: Exact rational number type over bigint
// WHY: Every evaluator result must be exact until display; floating point is never used
// PURITY: CORE
// INVARIANT: ∀ r: gcd(|r.numerator|, r.denominator) = 1 ∧ r.denominator > 0
// INVARIANT: inexact(a ∘ b) = inexact(a) ∨ inexact(b)
// COMPLEXITY: O(log² max(|n|, d)) per operation (bigint gcd)

import { Either, Option } from "effect";

import { EvalError } from "../errors.js";

/**
 * Rational value in lowest terms. The sign lives on the numerator.
 *
 * @remarks
 * - @pure true
 * - @invariant denominator > 0n, zero is 0/1
 * - `inexact` marks a truncated approximation of an irrational value
 */
export interface Rational {
	readonly numerator: bigint;
	readonly denominator: bigint;
	readonly inexact: boolean;
}

/** Largest integer exponent magnitude accepted by `power`. */
export const MAX_EXPONENT = 100_000n;

/**
 * Largest numerator or denominator, in bits, a power or a truncated root may
 * produce. Checked before any bigint exponentiation runs.
 */
export const MAX_RESULT_BITS = 1_000_000;

const abs = (n: bigint): bigint => (n < 0n ? -n : n);

export const bitLength = (n: bigint): number => abs(n).toString(2).length;

export const gcd = (a: bigint, b: bigint): bigint => {
	let x = abs(a);
	let y = abs(b);
	while (y !== 0n) {
		[x, y] = [y, x % y];
	}
	return x;
};

/**
 * Build a rational from a non-zero denominator, reducing to lowest terms.
 *
 * @precondition denominator !== 0n
 */
export const normalize = (
	numerator: bigint,
	denominator: bigint,
	inexact: boolean,
): Rational => {
	if (numerator === 0n) return { numerator: 0n, denominator: 1n, inexact };
	const divisor = gcd(numerator, denominator);
	const signFix = denominator < 0n ? -1n : 1n;
	return {
		numerator: (signFix * numerator) / divisor,
		denominator: (signFix * denominator) / divisor,
		inexact,
	};
};

export const ZERO: Rational = { numerator: 0n, denominator: 1n, inexact: false };
export const ONE: Rational = { numerator: 1n, denominator: 1n, inexact: false };

export const fromInteger = (value: bigint | number): Rational => ({
	numerator: BigInt(value),
	denominator: 1n,
	inexact: false,
});

/**
 * Build `numerator / denominator` in lowest terms.
 *
 * @returns Left(DivisionByZero) when denominator is zero
 */
export const fraction = (
	numerator: bigint,
	denominator: bigint,
	inexact = false,
): Either.Either<Rational, EvalError> =>
	denominator === 0n
		? Either.left(new EvalError({ reason: "DivisionByZero" }))
		: Either.right(normalize(numerator, denominator, inexact));

const DECIMAL_LITERAL = /^(\d*)(?:\.(\d*))?$/u;

/**
 * Parse an unsigned decimal literal (`12`, `1.5`, `.5`, `3.`) exactly.
 *
 * @pure true
 * @returns None when the text is not a literal
 */
export const parseDecimal = (text: string): Option.Option<Rational> => {
	const m = DECIMAL_LITERAL.exec(text);
	if (m === null) return Option.none();
	const whole = m[1] ?? "";
	const frac = m[2] ?? "";
	if (whole.length === 0 && frac.length === 0) return Option.none();
	const digits = `${whole}${frac}`;
	return Option.some(
		normalize(BigInt(digits), 10n ** BigInt(frac.length), false),
	);
};

export const sign = (r: Rational): -1 | 0 | 1 =>
	r.numerator === 0n ? 0 : r.numerator < 0n ? -1 : 1;

export const isInteger = (r: Rational): boolean => r.denominator === 1n;

export const isZero = (r: Rational): boolean => r.numerator === 0n;

export const negate = (r: Rational): Rational => ({
	numerator: -r.numerator,
	denominator: r.denominator,
	inexact: r.inexact,
});

export const add = (a: Rational, b: Rational): Rational =>
	normalize(
		a.numerator * b.denominator + b.numerator * a.denominator,
		a.denominator * b.denominator,
		a.inexact || b.inexact,
	);

export const subtract = (a: Rational, b: Rational): Rational => add(a, negate(b));

export const multiply = (a: Rational, b: Rational): Rational =>
	normalize(
		a.numerator * b.numerator,
		a.denominator * b.denominator,
		a.inexact || b.inexact,
	);

export const divide = (
	a: Rational,
	b: Rational,
): Either.Either<Rational, EvalError> =>
	fraction(
		a.numerator * b.denominator,
		a.denominator * b.numerator,
		a.inexact || b.inexact,
	);

/**
 * Raise to an integer power by bigint exponentiation.
 *
 * A base in lowest terms stays in lowest terms under powers, so no gcd runs
 * on the result.
 *
 * @returns Left(DivisionByZero) for 0^-n
 * @returns Left(InvalidExponent) when |exponent| > MAX_EXPONENT or the result would exceed MAX_RESULT_BITS
 * @complexity O(log |exponent|) multiplications
 */
export const power = (
	base: Rational,
	exponent: bigint,
	inexact = base.inexact,
): Either.Either<Rational, EvalError> => {
	if (abs(exponent) > MAX_EXPONENT) {
		return Either.left(
			new EvalError({
				reason: "InvalidExponent",
				detail: `exponent ${exponent} exceeds ${MAX_EXPONENT}`,
			}),
		);
	}
	// x >= 2^(bits - 1), so x^e has at least (bits - 1) * e bits.
	const widest = Math.max(bitLength(base.numerator), bitLength(base.denominator));
	if ((widest - 1) * Number(abs(exponent)) > MAX_RESULT_BITS) {
		return Either.left(
			new EvalError({
				reason: "InvalidExponent",
				detail: `result would exceed ${MAX_RESULT_BITS} bits`,
			}),
		);
	}
	if (exponent >= 0n) {
		return Either.right({
			numerator: base.numerator ** exponent,
			denominator: base.denominator ** exponent,
			inexact,
		});
	}
	if (base.numerator === 0n) {
		return Either.left(new EvalError({ reason: "DivisionByZero" }));
	}
	const magnitude = -exponent;
	const signFix = base.numerator < 0n ? -1n : 1n;
	return Either.right({
		numerator: (signFix * base.denominator) ** magnitude,
		denominator: abs(base.numerator) ** magnitude,
		inexact,
	});
};

/** Exact ordering; the inexact flag does not participate. */
export const compare = (a: Rational, b: Rational): -1 | 0 | 1 => {
	const left = a.numerator * b.denominator;
	const right = b.numerator * a.denominator;
	return left === right ? 0 : left < right ? -1 : 1;
};

export const equals = (a: Rational, b: Rational): boolean =>
	a.numerator === b.numerator && a.denominator === b.denominator;

/** Render as `p/q` (or `p` for integers), prefixed with `~` when inexact. */
export const toFractionString = (r: Rational): string => {
	const body = isInteger(r)
		? r.numerator.toString()
		: `${r.numerator.toString()}/${r.denominator.toString()}`;
	return r.inexact ? `~${body}` : body;
};
