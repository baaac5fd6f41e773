// CHANGE: Specs for n-th roots and fractional exponents
// WHY: Roots decide between exact results and flagged, truncated approximations
// FORMAT THEOREM: ∀ n ≥ 0, k ≥ 1: r = integerRoot(n, k) ⇒ r^k ≤ n < (r + 1)^k
// PURITY: CORE
// INVARIANT: exact roots never carry the inexact flag
// COMPLEXITY: O(log n) Newton steps per assertion

import fc from "fast-check";
import { describe, expect, it } from "vitest";

import { MAX_RESULT_BITS } from "../../../src/core/number/rational.js";
import {
	integerRoot,
	MAX_ROOT_DEGREE,
	nthRoot,
	ROOT_PRECISION_DIGITS,
	rationalPower,
	rootOf,
} from "../../../src/core/number/root.js";
import { errorOf, q, valueOf } from "../../utils/values.js";

const SQRT_2_DIGITS = 141421356237309504880168872420969n;

describe("integerRoot", () => {
	it.each([
		[0n, 2n, 0n],
		[1n, 5n, 1n],
		[26n, 3n, 2n],
		[27n, 3n, 3n],
		[99n, 2n, 9n],
		[7n, 1n, 7n],
		[10n ** 40n, 2n, 10n ** 20n],
	])("integerRoot(%s, %s) = %s", (n, k, expected) => {
		expect(integerRoot(n, k)).toBe(expected);
	});

	it("returns the floor of the real root", () => {
		fc.assert(
			fc.property(
				fc.bigInt({ min: 0n, max: 10n ** 30n }),
				fc.bigInt({ min: 1n, max: 6n }),
				(n, k) => {
					const r = integerRoot(n, k);
					expect(r ** k <= n).toBe(true);
					expect((r + 1n) ** k > n).toBe(true);
				},
			),
		);
	});
});

describe("rootOf", () => {
	it("is exact when numerator and denominator are perfect powers", () => {
		expect(valueOf(rootOf(q(9, 4), 2n))).toEqual({ value: q(3, 2), exact: true });
		expect(valueOf(rootOf(q(-8), 3n))).toEqual({ value: q(-2), exact: true });
	});

	it("truncates an irrational root and flags it", () => {
		expect(ROOT_PRECISION_DIGITS).toBe(32);
		expect(valueOf(rootOf(q(2), 2n))).toEqual({
			value: { numerator: SQRT_2_DIGITS, denominator: 10n ** 32n, inexact: true },
			exact: false,
		});
	});

	it("negates the root of a negative radicand for odd degrees", () => {
		const { value } = valueOf(rootOf(q(-2), 3n));
		expect(value.numerator < 0n).toBe(true);
		expect(value.inexact).toBe(true);
	});

	it("rejects even roots of negative values", () => {
		expect(errorOf(rootOf(q(-4), 2n)).reason).toBe("ComplexResult");
	});

	it("rejects degrees outside 1..MAX_ROOT_DEGREE", () => {
		expect(errorOf(rootOf(q(2), 0n)).reason).toBe("InvalidExponent");
		expect(errorOf(rootOf(q(2), MAX_ROOT_DEGREE + 1n)).reason).toBe(
			"InvalidExponent",
		);
	});
});

describe("nthRoot", () => {
	it("accepts an exact integer degree", () => {
		expect(valueOf(nthRoot(q(8), q(3)))).toEqual(q(2));
	});

	it("rejects fractional or approximate degrees", () => {
		expect(errorOf(nthRoot(q(8), q(3, 2))).reason).toBe("InvalidExponent");
		expect(errorOf(nthRoot(q(8), q(3, 1, true))).reason).toBe("InvalidExponent");
	});
});

describe("rationalPower", () => {
	it.each([
		[q(4), q(1, 2), q(2)],
		[q(8), q(2, 3), q(4)],
		[q(4), q(-1, 2), q(1, 2)],
		[q(-8), q(1, 3), q(-2)],
		[q(27, 8), q(2, 3), q(9, 4)],
		[q(2), q(-2), q(1, 4)],
	])("%o ^ %o is exact", (base, exponent, expected) => {
		expect(valueOf(rationalPower(base, exponent))).toEqual(expected);
	});

	it("rejects a root whose scaled operand would be too wide", () => {
		const error = errorOf(rootOf(q(2n ** 999_990n), 2n));
		expect(error.reason).toBe("InvalidExponent");
		expect(error.detail).toBe(`root of degree 2 would exceed ${MAX_RESULT_BITS} bits`);
		expect(errorOf(rootOf(q(1, 2n ** 999_990n), 2n)).reason).toBe("InvalidExponent");
		expect(valueOf(rootOf(q(2n ** 200_000n), 2n)).value).toEqual(q(2n ** 100_000n));
	});

	it("rejects a fractional power without an exact value", () => {
		const error = errorOf(rationalPower(q(2), q(1, 2)));
		expect(error.reason).toBe("InvalidExponent");
		expect(error.detail).toBe("1/2 power has no exact value");
	});

	it("rejects even roots of negative bases", () => {
		expect(errorOf(rationalPower(q(-4), q(1, 2))).reason).toBe("ComplexResult");
	});

	it("rejects approximate fractional exponents", () => {
		expect(errorOf(rationalPower(q(4), q(1, 2, true))).reason).toBe(
			"InvalidExponent",
		);
	});

	it("keeps an approximate base approximate", () => {
		expect(valueOf(rationalPower(q(3, 2, true), q(2))).inexact).toBe(true);
		expect(valueOf(rationalPower(q(3), q(2, 1, true)))).toEqual(q(9, 1, true));
	});
});
