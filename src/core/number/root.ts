// CHANGE: n-th roots and fractional exponents over exact rationals
// WHY: Roots are the only operation whose result may leave the rationals
// PURITY: CORE
// INVARIANT: exact(root(p/q, n)) ↔ p = a^n ∧ q = b^n for integers a, b
// INVARIANT: ¬exact ⇒ |result| ≤ |true root| < |result| + 10^-ROOT_PRECISION_DIGITS
// COMPLEXITY: O(log(n) · M(bits)) using Newton iteration on bigint

import { Either } from "effect";

import { EvalError } from "../errors.js";
import {
	bitLength,
	isInteger,
	MAX_RESULT_BITS,
	normalize,
	power,
	type Rational,
	sign,
} from "./rational.js";

/**
 * Number of decimal digits kept when a root is not rational.
 * Results are truncated toward zero at this scale and flagged inexact.
 */
export const ROOT_PRECISION_DIGITS = 32;

const ROOT_SCALE = 10n ** BigInt(ROOT_PRECISION_DIGITS);
const ROOT_SCALE_BITS = bitLength(ROOT_SCALE);

/** Largest root degree accepted; the truncated root scales with 10^(digits·degree). */
export const MAX_ROOT_DEGREE = 1_000n;

/**
 * Floor of the k-th root of a non-negative integer.
 *
 * @precondition n >= 0n ∧ k >= 1n
 * @postcondition r^k <= n < (r+1)^k
 */
export const integerRoot = (n: bigint, k: bigint): bigint => {
	if (n < 2n || k === 1n) return n;
	// Start above the root; Newton then decreases monotonically to the floor.
	let x = 1n << BigInt(Math.ceil(bitLength(n) / Number(k)));
	for (;;) {
		const y = ((k - 1n) * x + n / x ** (k - 1n)) / k;
		if (y >= x) return x;
		x = y;
	}
};

export interface RootResult {
	readonly value: Rational;
	/** Whether the root itself was computed without truncation. */
	readonly exact: boolean;
}

const invalidDegree = (detail: string): EvalError =>
	new EvalError({ reason: "InvalidExponent", detail });

const rootOfMagnitude = (
	numerator: bigint,
	denominator: bigint,
	degree: bigint,
	inexact: boolean,
): Either.Either<RootResult, EvalError> => {
	// The truncated root works on numerator · 10^(digits·degree).
	const widest = Math.max(bitLength(numerator), bitLength(denominator));
	if (widest + Number(degree) * ROOT_SCALE_BITS > MAX_RESULT_BITS) {
		return Either.left(
			invalidDegree(`root of degree ${degree} would exceed ${MAX_RESULT_BITS} bits`),
		);
	}
	const p = integerRoot(numerator, degree);
	const q = integerRoot(denominator, degree);
	if (p ** degree === numerator && q ** degree === denominator) {
		return Either.right({
			value: { numerator: p, denominator: q, inexact },
			exact: true,
		});
	}
	const scaled = (numerator * ROOT_SCALE ** degree) / denominator;
	const truncated = integerRoot(scaled, degree);
	return Either.right({
		value: normalize(truncated, ROOT_SCALE, true),
		exact: false,
	});
};

/**
 * Root of the given integer degree.
 *
 * @returns Left(ComplexResult) for an even degree over a negative radicand
 * @returns Left(InvalidExponent) when degree is not a positive integer or the operand is too wide to scale
 */
export const rootOf = (
	radicand: Rational,
	degree: bigint,
): Either.Either<RootResult, EvalError> => {
	if (degree < 1n) return Either.left(invalidDegree(`root degree ${degree}`));
	if (degree > MAX_ROOT_DEGREE) {
		return Either.left(
			invalidDegree(`root degree ${degree} exceeds ${MAX_ROOT_DEGREE}`),
		);
	}
	const negative = sign(radicand) < 0;
	if (negative && degree % 2n === 0n) {
		return Either.left(new EvalError({ reason: "ComplexResult" }));
	}
	const magnitude = negative ? -radicand.numerator : radicand.numerator;
	const result = rootOfMagnitude(
		magnitude,
		radicand.denominator,
		degree,
		radicand.inexact,
	);
	if (!negative) return result;
	return Either.map(result, ({ exact, value }) => ({
		exact,
		value: { ...value, numerator: -value.numerator },
	}));
};

/**
 * Root whose degree is itself a computed value.
 *
 * @pure true
 */
export const nthRoot = (
	radicand: Rational,
	degree: Rational,
): Either.Either<Rational, EvalError> => {
	if (!isInteger(degree) || degree.inexact) {
		return Either.left(invalidDegree("root degree must be an exact integer"));
	}
	return Either.map(rootOf(radicand, degree.numerator), ({ value }) => value);
};

/**
 * Exponentiation with a rational exponent.
 *
 * Integer exponents are exact. For p/q the q-th root of the base must be
 * exact; otherwise the power is rejected as InvalidExponent.
 */
export const rationalPower = (
	base: Rational,
	exponent: Rational,
): Either.Either<Rational, EvalError> => {
	const inexact = base.inexact || exponent.inexact;
	if (isInteger(exponent)) return power(base, exponent.numerator, inexact);
	if (exponent.inexact) {
		return Either.left(invalidDegree("approximate fractional exponent"));
	}
	return Either.flatMap(rootOf(base, exponent.denominator), (root) =>
		root.exact
			? power(root.value, exponent.numerator, inexact)
			: Either.left(
					invalidDegree(
						`${exponent.numerator}/${exponent.denominator} power has no exact value`,
					),
				),
	);
};
