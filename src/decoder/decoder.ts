/**
 * Decoder
 *
 * Walks a complete text buffer left to right and feeds what it finds to the
 * visitors of the type being built. Its only state is a cursor into the input
 * and the current nesting depth.
 */

import {
	DepthLimitError,
	InvalidUnicodeEscapeError,
	UnexpectedEndError,
	UnexpectedTokenError,
	UnexpectedUnicodeEscapeError,
	Utf8DecodeError,
} from "../errors.js";
import { type DecoderOptions, resolveDecoderOptions } from "../options.js";
import type { Deserialize, Deserializer, Visitor } from "../traversal.js";
import { decodeBase64Url } from "../utils/base64.js";
import { parseFloatLiteral } from "../utils/float.js";
import {
	INTEGER_BOUNDS,
	type IntegerKind,
	parseInteger,
} from "../utils/integer.js";
import { CommaSeparated, TaggedVariantAccess } from "./access.js";
import { type StrSlice, singleChar, UnitVariantAccess } from "./key.js";
import {
	visitBigInt,
	visitBool,
	visitBorrowedStr,
	visitBytes,
	visitChar,
	visitEnum,
	visitMap,
	visitNewtypeStruct,
	visitNone,
	visitNumber,
	visitSeq,
	visitSome,
	visitStr,
	visitUnit,
} from "./visit.js";

const SIMPLE_ESCAPES = new Map<string, string>([
	['"', '"'],
	["\\", "\\"],
	["/", "/"],
	["b", "\b"],
	["f", "\f"],
	["n", "\n"],
	["r", "\r"],
	["t", "\t"],
]);

const BOOL_LITERALS: ReadonlyArray<readonly [string, boolean]> = [
	["1", true],
	["0", false],
	["true", true],
	["false", false],
];

const QUOTE = 0x22;
const BACKSLASH = 0x5c;

const isWhitespace = (code: number): boolean =>
	code === 0x20 || code === 0x09 || code === 0x0a || code === 0x0d;

const isDigit = (code: number): boolean => code >= 0x30 && code <= 0x39;

const isSignedDigit = (code: number): boolean =>
	isDigit(code) || code === 0x2d;

// digits - + . e E
const isFloatChar = (code: number): boolean =>
	isDigit(code) ||
	code === 0x2d ||
	code === 0x2b ||
	code === 0x2e ||
	code === 0x65 ||
	code === 0x45;

const hexValue = (code: number): number => {
	if (code >= 0x30 && code <= 0x39) return code - 0x30;
	if (code >= 0x61 && code <= 0x66) return code - 0x61 + 10;
	if (code >= 0x41 && code <= 0x46) return code - 0x41 + 10;
	return -1;
};

export class Decoder implements Deserializer {
	private pos = 0;
	private depth = 0;
	private readonly maxDepth: number;

	constructor(
		private readonly input: string,
		options?: DecoderOptions,
	) {
		this.maxDepth = resolveDecoderOptions(options).maxDepth;
	}

	/** Current position in the input */
	get offset(): number {
		return this.pos;
	}

	/**
	 * Check that only whitespace follows the top-level value
	 */
	end(): void {
		this.skipWhitespace();
		if (this.pos < this.input.length) {
			throw new UnexpectedTokenError(this.charAt(this.pos), this.pos);
		}
	}

	// ===========================================================================
	// Cursor primitives
	// ===========================================================================

	skipWhitespace(): void {
		while (
			this.pos < this.input.length &&
			isWhitespace(this.input.charCodeAt(this.pos))
		) {
			this.pos++;
		}
	}

	peekChar(): string {
		if (this.pos >= this.input.length) {
			throw new UnexpectedEndError(this.pos);
		}
		return this.charAt(this.pos);
	}

	expectChar(expected: string): void {
		const ch = this.peekChar();
		if (ch !== expected) {
			throw new UnexpectedTokenError(ch, this.pos);
		}
		this.pos += ch.length;
	}

	private charAt(index: number): string {
		return String.fromCodePoint(this.input.codePointAt(index) ?? 0);
	}

	private expectLiteral(literal: string): void {
		for (let i = 0; i < literal.length; i++) {
			const index = this.pos + i;
			if (index >= this.input.length) {
				throw new UnexpectedEndError(index);
			}
			if (this.input[index] !== literal[i]) {
				throw new UnexpectedTokenError(this.charAt(index), index);
			}
		}
		this.pos += literal.length;
	}

	private scan(accept: (code: number) => boolean): string {
		const start = this.pos;
		while (
			this.pos < this.input.length &&
			accept(this.input.charCodeAt(this.pos))
		) {
			this.pos++;
		}
		return this.input.slice(start, this.pos);
	}

	private enter(): void {
		if (this.depth >= this.maxDepth) {
			throw new DepthLimitError(this.maxDepth, this.pos);
		}
		this.depth++;
	}

	private leave(): void {
		this.depth--;
	}

	// ===========================================================================
	// Lexical classes
	// ===========================================================================

	/**
	 * Parse a quoted string
	 *
	 * Without escapes the result is a slice of the input; the first escape
	 * switches to an owned copy seeded with the prefix scanned so far.
	 */
	parseString(): StrSlice {
		this.skipWhitespace();
		const offset = this.pos;
		this.expectChar('"');
		const input = this.input;
		let runStart = this.pos;
		let owned: string | undefined;
		for (;;) {
			if (this.pos >= input.length) {
				throw new UnexpectedEndError(this.pos);
			}
			const code = input.charCodeAt(this.pos);
			if (code === QUOTE) {
				const run = input.slice(runStart, this.pos);
				this.pos++;
				return owned === undefined
					? { value: run, borrowed: true, offset }
					: { value: owned + run, borrowed: false, offset };
			}
			if (code === BACKSLASH) {
				owned = (owned ?? "") + input.slice(runStart, this.pos);
				this.pos++;
				owned += this.parseEscape();
				runStart = this.pos;
				continue;
			}
			this.pos++;
		}
	}

	private parseEscape(): string {
		const ch = this.peekChar();
		const simple = SIMPLE_ESCAPES.get(ch);
		if (simple !== undefined) {
			this.pos++;
			return simple;
		}
		if (ch === "u") {
			this.pos++;
			return this.parseUnicodeEscape();
		}
		throw new UnexpectedTokenError(ch, this.pos);
	}

	private parseUnicodeEscape(): string {
		// back at the backslash
		const start = this.pos - 2;
		const unit = this.readHex4(start);
		if (unit >= 0xdc00 && unit <= 0xdfff) {
			throw new UnexpectedUnicodeEscapeError(unit, start);
		}
		if (unit < 0xd800 || unit > 0xdbff) {
			return String.fromCharCode(unit);
		}
		if (!this.input.startsWith("\\u", this.pos)) {
			throw new UnexpectedUnicodeEscapeError(unit, start);
		}
		this.pos += 2;
		const low = this.readHex4(this.pos - 2);
		if (low < 0xdc00 || low > 0xdfff) {
			throw new UnexpectedUnicodeEscapeError(unit, start);
		}
		return String.fromCharCode(unit, low);
	}

	private readHex4(escapeOffset: number): number {
		let value = 0;
		for (let i = 0; i < 4; i++) {
			if (this.pos >= this.input.length) {
				throw new UnexpectedEndError(this.pos);
			}
			const digit = hexValue(this.input.charCodeAt(this.pos));
			if (digit < 0) {
				throw new InvalidUnicodeEscapeError(escapeOffset);
			}
			value = (value << 4) | digit;
			this.pos++;
		}
		return value;
	}

	private parseBool(): boolean {
		this.skipWhitespace();
		for (const [literal, value] of BOOL_LITERALS) {
			if (this.input.startsWith(literal, this.pos)) {
				this.pos += literal.length;
				return value;
			}
		}
		throw new UnexpectedTokenError(this.peekChar(), this.pos);
	}

	/** Bare decimal literal (8 to 32-bit kinds) */
	private parseNarrow(kind: IntegerKind): number {
		this.skipWhitespace();
		const start = this.pos;
		const literal = this.scan(
			INTEGER_BOUNDS[kind].signed ? isSignedDigit : isDigit,
		);
		return Number(parseInteger(literal, kind, start));
	}

	/** Quoted decimal literal (64 and 128-bit kinds) */
	private parseWide(kind: IntegerKind): bigint {
		const slice = this.parseString();
		return parseInteger(slice.value, kind, slice.offset);
	}

	/** Float literal; `null` stands for NaN */
	private parseFloat(): number {
		this.skipWhitespace();
		if (this.input.startsWith("null", this.pos)) {
			this.pos += 4;
			return Number.NaN;
		}
		const start = this.pos;
		return parseFloatLiteral(this.scan(isFloatChar), start);
	}

	// ===========================================================================
	// Deserializer
	// ===========================================================================

	deserializeAny<V>(visitor: Visitor<V>): V {
		this.skipWhitespace();
		const ch = this.peekChar();
		switch (ch) {
			case "n":
				return this.deserializeUnit(visitor);
			case "t":
			case "f":
				return this.deserializeBool(visitor);
			case '"':
				return this.deserializeStr(visitor);
			case "[":
				return this.deserializeSeq(visitor);
			case "{":
				return this.deserializeMap(visitor);
			default:
				if (ch === "-" || isDigit(ch.charCodeAt(0))) {
					return this.deserializeF64(visitor);
				}
				throw new UnexpectedTokenError(ch, this.pos);
		}
	}

	deserializeBool<V>(visitor: Visitor<V>): V {
		return visitBool(visitor, this.parseBool());
	}

	deserializeI8<V>(visitor: Visitor<V>): V {
		return visitNumber(visitor, this.parseNarrow("i8"));
	}

	deserializeI16<V>(visitor: Visitor<V>): V {
		return visitNumber(visitor, this.parseNarrow("i16"));
	}

	deserializeI32<V>(visitor: Visitor<V>): V {
		return visitNumber(visitor, this.parseNarrow("i32"));
	}

	deserializeI64<V>(visitor: Visitor<V>): V {
		return visitBigInt(visitor, this.parseWide("i64"));
	}

	deserializeI128<V>(visitor: Visitor<V>): V {
		return visitBigInt(visitor, this.parseWide("i128"));
	}

	deserializeU8<V>(visitor: Visitor<V>): V {
		return visitNumber(visitor, this.parseNarrow("u8"));
	}

	deserializeU16<V>(visitor: Visitor<V>): V {
		return visitNumber(visitor, this.parseNarrow("u16"));
	}

	deserializeU32<V>(visitor: Visitor<V>): V {
		return visitNumber(visitor, this.parseNarrow("u32"));
	}

	deserializeU64<V>(visitor: Visitor<V>): V {
		return visitBigInt(visitor, this.parseWide("u64"));
	}

	deserializeU128<V>(visitor: Visitor<V>): V {
		return visitBigInt(visitor, this.parseWide("u128"));
	}

	deserializeF32<V>(visitor: Visitor<V>): V {
		return visitNumber(visitor, Math.fround(this.parseFloat()));
	}

	deserializeF64<V>(visitor: Visitor<V>): V {
		return visitNumber(visitor, this.parseFloat());
	}

	deserializeChar<V>(visitor: Visitor<V>): V {
		const slice = this.parseString();
		if (slice.value.length === 0) {
			throw new UnexpectedTokenError('"', slice.offset + 1);
		}
		return visitChar(visitor, singleChar(slice));
	}

	deserializeStr<V>(visitor: Visitor<V>): V {
		const slice = this.parseString();
		return slice.borrowed
			? visitBorrowedStr(visitor, slice.value)
			: visitStr(visitor, slice.value);
	}

	deserializeBytes<V>(visitor: Visitor<V>): V {
		const slice = this.parseString();
		return visitBytes(visitor, decodeBase64Url(slice.value, slice.offset));
	}

	deserializeOption<V>(visitor: Visitor<V>): V {
		this.skipWhitespace();
		if (this.peekChar() === "n") {
			this.expectLiteral("null");
			return visitNone(visitor);
		}
		return visitSome(visitor, this);
	}

	deserializeUnit<V>(visitor: Visitor<V>): V {
		this.skipWhitespace();
		this.expectLiteral("null");
		return visitUnit(visitor);
	}

	deserializeNewtypeStruct<V>(_name: string, visitor: Visitor<V>): V {
		return visitNewtypeStruct(visitor, this);
	}

	deserializeSeq<V>(visitor: Visitor<V>): V {
		this.skipWhitespace();
		this.expectChar("[");
		this.enter();
		const value = visitSeq(visitor, new CommaSeparated(this, "]"));
		this.skipWhitespace();
		this.expectChar("]");
		this.leave();
		return value;
	}

	deserializeTuple<V>(_length: number, visitor: Visitor<V>): V {
		return this.deserializeSeq(visitor);
	}

	deserializeMap<V>(visitor: Visitor<V>): V {
		this.skipWhitespace();
		this.expectChar("{");
		this.enter();
		const value = visitMap(visitor, new CommaSeparated(this, "}"));
		this.skipWhitespace();
		this.expectChar("}");
		this.leave();
		return value;
	}

	deserializeStruct<V>(
		_name: string,
		_fields: readonly string[],
		visitor: Visitor<V>,
	): V {
		return this.deserializeMap(visitor);
	}

	deserializeEnum<V>(
		_name: string,
		_variants: readonly string[],
		visitor: Visitor<V>,
	): V {
		this.skipWhitespace();
		const ch = this.peekChar();
		if (ch === '"') {
			return visitEnum(visitor, new UnitVariantAccess(this.parseString()));
		}
		if (ch !== "{") {
			throw new UnexpectedTokenError(ch, this.pos);
		}
		this.pos++;
		this.enter();
		const value = visitEnum(visitor, new TaggedVariantAccess(this));
		this.skipWhitespace();
		this.expectChar("}");
		this.leave();
		return value;
	}

	deserializeIdentifier<V>(visitor: Visitor<V>): V {
		return this.deserializeStr(visitor);
	}

	deserializeIgnoredAny<V>(visitor: Visitor<V>): V {
		return this.deserializeAny(visitor);
	}
}

const utf8 = new TextDecoder("utf-8", { fatal: true });

/**
 * Decode a value of the given wire type from text
 *
 * @param text - Complete encoded document
 * @param type - Wire type that builds the value
 * @param options - Decoder options (depth limit)
 * @throws TerseJsonError on malformed input or a type mismatch
 *
 * @example
 * ```ts
 * const Point = t.struct("Point", { x: t.i32, y: t.i32 });
 * decode('{"x":1,"y":-2}', Point); // { x: 1, y: -2 }
 * ```
 */
export function decode<T>(
	text: string,
	type: Deserialize<T>,
	options?: DecoderOptions,
): T {
	const decoder = new Decoder(text, options);
	const value = type.deserialize(decoder);
	decoder.end();
	return value;
}

/**
 * Decode a value from UTF-8 bytes
 *
 * @throws Utf8DecodeError when the bytes are not valid UTF-8
 */
export function decodeBytes<T>(
	bytes: Uint8Array,
	type: Deserialize<T>,
	options?: DecoderOptions,
): T {
	let text: string;
	try {
		text = utf8.decode(bytes);
	} catch (err) {
		throw new Utf8DecodeError(err);
	}
	return decode(text, type, options);
}
