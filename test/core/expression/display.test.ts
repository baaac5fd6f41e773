// CHANGE: Specs for decimal rendering with the truncation marker
// WHY: Display truncates toward zero and must say so whenever digits are missing
// FORMAT THEOREM: formatNumber(r, k) ends with "..." ↔ r.inexact ∨ r has more than k decimals
// PURITY: CORE
// COMPLEXITY: O(k) per assertion

import { describe, expect, it } from "vitest";

import {
	DEFAULT_DECIMAL_PLACES,
	formatFraction,
	formatNumber,
	renderDecimal,
	TRUNCATION_MARKER,
} from "../../../src/core/expression/display.js";
import { q } from "../../utils/values.js";

describe("formatNumber", () => {
	it.each([
		[q(14), 6, "14"],
		[q(-3), 6, "-3"],
		[q(5, 4), 6, "1.25"],
		[q(1, 3), 6, "0.333333..."],
		[q(-1, 3), 6, "-0.333333..."],
		[q(2, 3), 2, "0.66..."],
		[q(1, 8), 2, "0.12..."],
		[q(1, 8), 3, "0.125"],
		[q(7, 2), 0, "3..."],
		[q(-7, 2), 0, "-3..."],
		[q(1, 1_000_000), 6, "0.000001"],
		[q(1, 10_000_000), 6, "0..."],
		[q(3, 1, true), 6, "3..."],
	])("%o with %i places renders %s", (value, places, expected) => {
		expect(formatNumber(value, places)).toBe(expected);
	});

	it("shows six places by default", () => {
		expect(DEFAULT_DECIMAL_PLACES).toBe(6);
		expect(TRUNCATION_MARKER).toBe("...");
	});

	it("marks an exact-looking approximation", () => {
		expect(renderDecimal(q(1, 2, true), 6)).toEqual({ text: "0.5...", truncated: true });
		expect(renderDecimal(q(1, 2), 6)).toEqual({ text: "0.5", truncated: false });
	});

	it("renders the square root of two truncated", () => {
		const sqrt2 = {
			numerator: 141421356237309504880168872420969n,
			denominator: 10n ** 32n,
			inexact: true,
		};
		expect(formatNumber(sqrt2, 6)).toBe("1.414213...");
		expect(formatNumber(sqrt2, 10)).toBe("1.4142135623...");
	});
});

describe("formatFraction", () => {
	it("renders p/q and integers", () => {
		expect(formatFraction(q(3, 2))).toBe("3/2");
		expect(formatFraction(q(-4))).toBe("-4");
		expect(formatFraction(q(1, 3, true))).toBe("~1/3");
	});
});
