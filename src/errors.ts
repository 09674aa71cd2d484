/**
 * Codec Error Classes
 *
 * Closed set of failure kinds shared by the decoder and the encoder.
 * Every error is terminal for the call that raised it.
 */

/**
 * Error codes, one per failure kind
 */
export const TerseJsonErrorCodes = {
	UNEXPECTED_END: "unexpected_end",
	UNEXPECTED_TOKEN: "unexpected_token",
	INVALID_UNICODE_ESCAPE: "invalid_unicode_escape",
	UNEXPECTED_UNICODE_ESCAPE: "unexpected_unicode_escape",
	BASE64: "base64",
	UTF8: "utf8",
	PARSE_INT: "parse_int",
	PARSE_FLOAT: "parse_float",
	NOT_A_NUMBER: "not_a_number",
	DEPTH_LIMIT: "depth_limit",
	CUSTOM: "custom",
} as const;

export type TerseJsonErrorCode =
	(typeof TerseJsonErrorCodes)[keyof typeof TerseJsonErrorCodes];

const at = (offset: number | undefined): string =>
	offset === undefined ? "" : ` at offset ${offset}`;

/**
 * Base class for all codec errors
 *
 * @param code - Error code (from TerseJsonErrorCodes)
 * @param message - Human-readable error message
 * @param offset - Character offset into the decoded text, when known
 */
export class TerseJsonError extends Error {
	readonly code: TerseJsonErrorCode;
	readonly offset?: number;

	constructor(
		code: TerseJsonErrorCode,
		message: string,
		offset?: number,
		options?: ErrorOptions,
	) {
		super(message, options);
		this.name = "TerseJsonError";
		this.code = code;
		this.offset = offset;
	}
}

/**
 * Thrown when the input ends where another token is required
 */
export class UnexpectedEndError extends TerseJsonError {
	constructor(offset?: number) {
		super(
			TerseJsonErrorCodes.UNEXPECTED_END,
			`unexpected end of input${at(offset)}`,
			offset,
		);
		this.name = "UnexpectedEndError";
	}
}

/**
 * Thrown when a character does not fit the grammar at a decision point
 *
 * @param token - The offending character
 */
export class UnexpectedTokenError extends TerseJsonError {
	readonly token: string;

	constructor(token: string, offset?: number) {
		super(
			TerseJsonErrorCodes.UNEXPECTED_TOKEN,
			`unexpected token ${JSON.stringify(token)}${at(offset)}`,
			offset,
		);
		this.name = "UnexpectedTokenError";
		this.token = token;
	}
}

/**
 * Thrown when `\u` is not followed by four hexadecimal digits
 */
export class InvalidUnicodeEscapeError extends TerseJsonError {
	constructor(offset?: number) {
		super(
			TerseJsonErrorCodes.INVALID_UNICODE_ESCAPE,
			`invalid unicode escape sequence${at(offset)}`,
			offset,
		);
		this.name = "InvalidUnicodeEscapeError";
	}
}

/**
 * Thrown when a `\u` escape names a code point that is not a character
 *
 * @param codePoint - The escaped value (a lone surrogate)
 */
export class UnexpectedUnicodeEscapeError extends TerseJsonError {
	readonly codePoint: number;

	constructor(codePoint: number, offset?: number) {
		super(
			TerseJsonErrorCodes.UNEXPECTED_UNICODE_ESCAPE,
			`unexpected unicode escape \\u${codePoint.toString(16).padStart(4, "0")}${at(offset)}`,
			offset,
		);
		this.name = "UnexpectedUnicodeEscapeError";
		this.codePoint = codePoint;
	}
}

/**
 * Thrown when a byte string is not valid URL-safe base64
 */
export class Base64DecodeError extends TerseJsonError {
	constructor(reason: string, offset?: number) {
		super(
			TerseJsonErrorCodes.BASE64,
			`base64 decode error: ${reason}${at(offset)}`,
			offset,
		);
		this.name = "Base64DecodeError";
	}
}

/**
 * Thrown when raw input bytes are not valid UTF-8
 */
export class Utf8DecodeError extends TerseJsonError {
	constructor(cause?: unknown) {
		super(TerseJsonErrorCodes.UTF8, "input is not valid UTF-8", undefined, {
			cause,
		});
		this.name = "Utf8DecodeError";
	}
}

export type ParseIntErrorKind =
	| "empty"
	| "invalid_digit"
	| "pos_overflow"
	| "neg_overflow";

const parseIntReasons: Record<ParseIntErrorKind, string> = {
	empty: "cannot parse integer from empty string",
	invalid_digit: "invalid digit found in string",
	pos_overflow: "number too large to fit in target type",
	neg_overflow: "number too small to fit in target type",
};

/**
 * Thrown when an integer literal cannot be parsed into its target width
 *
 * @param literal - The text that was parsed
 * @param kind - Why parsing failed
 */
export class ParseIntError extends TerseJsonError {
	readonly literal: string;
	readonly kind: ParseIntErrorKind;

	constructor(literal: string, kind: ParseIntErrorKind, offset?: number) {
		super(
			TerseJsonErrorCodes.PARSE_INT,
			`parse int error: ${parseIntReasons[kind]}${at(offset)}`,
			offset,
		);
		this.name = "ParseIntError";
		this.literal = literal;
		this.kind = kind;
	}
}

export type ParseFloatErrorKind = "empty" | "invalid";

/**
 * Thrown when a float literal is empty or malformed
 */
export class ParseFloatError extends TerseJsonError {
	readonly literal: string;
	readonly kind: ParseFloatErrorKind;

	constructor(literal: string, kind: ParseFloatErrorKind, offset?: number) {
		super(
			TerseJsonErrorCodes.PARSE_FLOAT,
			kind === "empty"
				? `parse float error: cannot parse float from empty string${at(offset)}`
				: `parse float error: invalid float literal ${JSON.stringify(literal)}${at(offset)}`,
			offset,
		);
		this.name = "ParseFloatError";
		this.literal = literal;
		this.kind = kind;
	}
}

/**
 * Thrown when encoding NaN or an infinity
 */
export class NotANumberError extends TerseJsonError {
	readonly value: number;

	constructor(value: number) {
		super(TerseJsonErrorCodes.NOT_A_NUMBER, `cannot encode ${value}`);
		this.name = "NotANumberError";
		this.value = value;
	}
}

/**
 * Thrown when nesting exceeds the configured depth limit
 *
 * @param limit - The configured maximum depth
 */
export class DepthLimitError extends TerseJsonError {
	readonly limit: number;

	constructor(limit: number, offset?: number) {
		super(
			TerseJsonErrorCodes.DEPTH_LIMIT,
			`nesting exceeds the depth limit of ${limit}${at(offset)}`,
			offset,
		);
		this.name = "DepthLimitError";
		this.limit = limit;
	}
}

/**
 * Free-form error raised by a wire type (missing field, invalid type, ...)
 */
export class CustomError extends TerseJsonError {
	constructor(message: string) {
		super(TerseJsonErrorCodes.CUSTOM, message);
		this.name = "CustomError";
	}
}

/**
 * Build the error raised when a visitor has no callback for a value kind
 *
 * @param unexpected - Kind of value found in the input
 * @param expecting - What the visitor expected
 */
export function invalidType(unexpected: string, expecting: string): CustomError {
	return new CustomError(`invalid type: ${unexpected}, expected ${expecting}`);
}
