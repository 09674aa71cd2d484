/**
 * Integer Utilities
 *
 * Widths, bounds and literal parsing for the fixed-width integer kinds.
 */

import { CustomError, ParseIntError } from "../errors.js";

export type IntegerKind =
	| "i8"
	| "i16"
	| "i32"
	| "i64"
	| "i128"
	| "u8"
	| "u16"
	| "u32"
	| "u64"
	| "u128";

export interface IntegerBounds {
	signed: boolean;
	min: bigint;
	max: bigint;
}

const signedBounds = (bits: bigint): IntegerBounds => ({
	signed: true,
	min: -(1n << (bits - 1n)),
	max: (1n << (bits - 1n)) - 1n,
});

const unsignedBounds = (bits: bigint): IntegerBounds => ({
	signed: false,
	min: 0n,
	max: (1n << bits) - 1n,
});

export const INTEGER_BOUNDS: Record<IntegerKind, IntegerBounds> = {
	i8: signedBounds(8n),
	i16: signedBounds(16n),
	i32: signedBounds(32n),
	i64: signedBounds(64n),
	i128: signedBounds(128n),
	u8: unsignedBounds(8n),
	u16: unsignedBounds(16n),
	u32: unsignedBounds(32n),
	u64: unsignedBounds(64n),
	u128: unsignedBounds(128n),
};

const isDigit = (ch: string): boolean => ch >= "0" && ch <= "9";

/**
 * Parse a decimal integer literal into the range of `kind`
 *
 * Accepts an optional leading `+`, and a leading `-` for signed kinds only.
 *
 * @param literal - Decimal text, without quotes
 * @param kind - Target integer kind
 * @param offset - Position of the literal in the input, for errors
 * @throws ParseIntError when the literal is empty, has a bad digit or overflows
 */
export function parseInteger(
	literal: string,
	kind: IntegerKind,
	offset?: number,
): bigint {
	const bounds = INTEGER_BOUNDS[kind];
	let start = 0;
	let negative = false;
	if (literal.length > 1 && (literal[0] === "+" || literal[0] === "-")) {
		negative = literal[0] === "-";
		start = 1;
	}
	if (literal.length === 0) {
		throw new ParseIntError(literal, "empty", offset);
	}
	if (negative && !bounds.signed) {
		throw new ParseIntError(literal, "invalid_digit", offset);
	}
	for (let i = start; i < literal.length; i++) {
		if (!isDigit(literal.charAt(i))) {
			throw new ParseIntError(literal, "invalid_digit", offset);
		}
	}
	const magnitude = BigInt(literal.slice(start));
	const value = negative ? -magnitude : magnitude;
	if (value > bounds.max) {
		throw new ParseIntError(literal, "pos_overflow", offset);
	}
	if (value < bounds.min) {
		throw new ParseIntError(literal, "neg_overflow", offset);
	}
	return value;
}

/**
 * Check that a value is an integer inside the range of `kind`
 *
 * @throws CustomError when it is not
 */
export function checkInteger(value: number | bigint, kind: IntegerKind): void {
	if (typeof value === "number" && !Number.isInteger(value)) {
		throw new CustomError(`invalid value: ${value} is not an integer (${kind})`);
	}
	const bounds = INTEGER_BOUNDS[kind];
	const big = BigInt(value);
	if (big < bounds.min || big > bounds.max) {
		throw new CustomError(`invalid value: ${value} is out of range for ${kind}`);
	}
}
