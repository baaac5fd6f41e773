// CHANGE: Decimal rendering of exact rationals with a truncation marker
// PURITY: CORE
// FORMAT THEOREM: formatNumber(r, k) ends with TRUNCATION_MARKER ↔ r.inexact ∨ r ≠ truncate(r, k)
// INVARIANT: Display never rounds; digits beyond k places are cut toward zero
// COMPLEXITY: O(k + log |r|)

import { type Rational, toFractionString } from "../number/rational.js";

export const TRUNCATION_MARKER = "...";

export const DEFAULT_DECIMAL_PLACES = 6;

export interface DecimalRendering {
	readonly text: string;
	/** True when the printed digits are not the complete exact value. */
	readonly truncated: boolean;
}

/**
 * Render `r` as a decimal with at most `decimalPlaces` fractional digits.
 *
 * @precondition decimalPlaces is a non-negative integer
 *
 * @example
 * ```ts
 * renderDecimal(normalize(1n, 3n, false), 6).text; // "0.333333..."
 * renderDecimal(normalize(5n, 4n, false), 6).text; // "1.25"
 * ```
 */
export const renderDecimal = (
	r: Rational,
	decimalPlaces: number,
): DecimalRendering => {
	const negative = r.numerator < 0n;
	const magnitude = negative ? -r.numerator : r.numerator;
	const whole = magnitude / r.denominator;
	const places = BigInt(Math.max(0, Math.trunc(decimalPlaces)));
	const shifted = (magnitude % r.denominator) * 10n ** places;
	const scaled = shifted / r.denominator;
	const exact = shifted % r.denominator === 0n;
	const fractionDigits =
		places === 0n
			? ""
			: scaled.toString().padStart(Number(places), "0").replace(/0+$/u, "");
	const body =
		fractionDigits.length > 0 ? `${whole}.${fractionDigits}` : whole.toString();
	const signed = negative ? `-${body}` : body;
	const truncated = r.inexact || !exact;
	return { text: truncated ? `${signed}${TRUNCATION_MARKER}` : signed, truncated };
};

export const formatNumber = (r: Rational, decimalPlaces: number): string =>
	renderDecimal(r, decimalPlaces).text;

/** `p/q` form of the exact value, `~` prefixed when precision was lost. */
export const formatFraction = (r: Rational): string => toFractionString(r);
