// CHANGE: Shared helpers for building rationals and unwrapping Either in tests
// WHY: Keep assertions about exact values short and typed
// PURITY: CORE (test support)

import { Either } from "effect";

import { normalize, type Rational } from "../../src/core/number/rational.js";

/** Rational in lowest terms from plain numbers. */
export const q = (
	numerator: bigint | number,
	denominator: bigint | number = 1,
	inexact = false,
): Rational => normalize(BigInt(numerator), BigInt(denominator), inexact);

export function valueOf<A, E>(either: Either.Either<A, E>): A {
	if (Either.isLeft(either)) {
		throw new Error(`expected Right, got Left(${String(either.left)})`);
	}
	return either.right;
}

export function errorOf<A, E>(either: Either.Either<A, E>): E {
	if (Either.isRight(either)) {
		throw new Error(`expected Left, got Right(${String(either.right)})`);
	}
	return either.left;
}
