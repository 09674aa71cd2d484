/**
 * Float Utilities
 *
 * Shortest round-trip formatting and strict literal parsing.
 */

import { ParseFloatError } from "../errors.js";

const FLOAT_LITERAL = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;

/**
 * Shortest decimal text that parses back to the same double
 *
 * Negative zero keeps its sign. Callers reject non-finite values first.
 */
export function formatF64(value: number): string {
	if (Object.is(value, -0)) return "-0";
	return String(value);
}

/**
 * Shortest decimal text that rounds back to the same single-precision value
 *
 * Callers reject values that round to a non-finite single first.
 */
export function formatF32(value: number): string {
	const single = Math.fround(value);
	if (Object.is(single, -0)) return "-0";
	// 9 significant digits always identify a binary32 value
	for (let precision = 1; precision < 9; precision++) {
		const candidate = Number(single.toPrecision(precision));
		if (Math.fround(candidate) === single) return String(candidate);
	}
	return String(Number(single.toPrecision(9)));
}

/**
 * Parse a decimal float literal
 *
 * @param literal - Digits with optional sign, fraction and exponent
 * @param offset - Position of the literal in the input, for errors
 * @throws ParseFloatError when the literal is empty or malformed
 */
export function parseFloatLiteral(literal: string, offset?: number): number {
	if (literal.length === 0) {
		throw new ParseFloatError(literal, "empty", offset);
	}
	if (!FLOAT_LITERAL.test(literal)) {
		throw new ParseFloatError(literal, "invalid", offset);
	}
	return Number(literal);
}
