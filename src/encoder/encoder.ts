/**
 * Encoder
 *
 * Receives a value traversal and appends its encoded fragments to an output
 * sink. It never looks ahead and never rolls back: a failure halfway through a
 * compound leaves a truncated document in the sink.
 */

import { CustomError, DepthLimitError, NotANumberError } from "../errors.js";
import { type EncoderOptions, resolveEncoderOptions } from "../options.js";
import type {
	Serialize,
	SerializeSeq,
	SerializeStruct,
	Serializer,
} from "../traversal.js";
import { encodeBase64Url } from "../utils/base64.js";
import { formatF32, formatF64 } from "../utils/float.js";
import { checkInteger, type IntegerKind } from "../utils/integer.js";
import { Compound } from "./compound.js";
import { type OutputSink, StringSink } from "./sink.js";

const ESCAPES = new Map<string, string>([
	['"', '\\"'],
	["\\", "\\\\"],
	["/", "\\/"],
	["\b", "\\b"],
	["\f", "\\f"],
	["\n", "\\n"],
	["\r", "\\r"],
	["\t", "\\t"],
]);

const NEEDS_ESCAPE =
	/["\\/\u0000-\u001f\u007f]|[\ud800-\udbff](?![\udc00-\udfff])|(?<![\ud800-\udbff])[\udc00-\udfff]/g;

const hex4 = (code: number): string => code.toString(16).padStart(4, "0");

/**
 * Quote a string, escaping quote, backslash, slash and control characters
 *
 * @throws CustomError when the string holds a lone surrogate
 */
export function quoteString(value: string): string {
	const escaped = value.replace(NEEDS_ESCAPE, (ch) => {
		const simple = ESCAPES.get(ch);
		if (simple !== undefined) return simple;
		const code = ch.charCodeAt(0);
		if (code >= 0xd800 && code <= 0xdfff) {
			throw new CustomError(
				`invalid value: string contains a lone surrogate \\u${hex4(code)}`,
			);
		}
		return `\\u${hex4(code)}`;
	});
	return `"${escaped}"`;
}

export class Encoder implements Serializer {
	private depth = 0;
	private readonly maxDepth: number;

	constructor(
		private readonly sink: OutputSink,
		options?: EncoderOptions,
	) {
		this.maxDepth = resolveEncoderOptions(options).maxDepth;
	}

	write(fragment: string): void {
		this.sink.write(fragment);
	}

	enter(levels = 1): void {
		if (this.depth + levels > this.maxDepth) {
			throw new DepthLimitError(this.maxDepth);
		}
		this.depth += levels;
	}

	leave(levels = 1): void {
		this.depth -= levels;
	}

	private narrow(value: number, kind: IntegerKind): void {
		checkInteger(value, kind);
		this.write(String(value));
	}

	private wide(value: bigint, kind: IntegerKind): void {
		checkInteger(value, kind);
		this.write(`"${value}"`);
	}

	serializeBool(value: boolean): void {
		this.write(value ? "1" : "0");
	}

	serializeI8(value: number): void {
		this.narrow(value, "i8");
	}

	serializeI16(value: number): void {
		this.narrow(value, "i16");
	}

	serializeI32(value: number): void {
		this.narrow(value, "i32");
	}

	serializeI64(value: bigint): void {
		this.wide(value, "i64");
	}

	serializeI128(value: bigint): void {
		this.wide(value, "i128");
	}

	serializeU8(value: number): void {
		this.narrow(value, "u8");
	}

	serializeU16(value: number): void {
		this.narrow(value, "u16");
	}

	serializeU32(value: number): void {
		this.narrow(value, "u32");
	}

	serializeU64(value: bigint): void {
		this.wide(value, "u64");
	}

	serializeU128(value: bigint): void {
		this.wide(value, "u128");
	}

	serializeF32(value: number): void {
		// finite doubles past the single range round to infinity
		const single = Math.fround(value);
		if (!Number.isFinite(single)) throw new NotANumberError(single);
		this.write(formatF32(single));
	}

	serializeF64(value: number): void {
		if (!Number.isFinite(value)) throw new NotANumberError(value);
		this.write(formatF64(value));
	}

	serializeChar(value: string): void {
		if (Array.from(value).length !== 1) {
			throw new CustomError(
				`invalid value: string ${JSON.stringify(value)}, expected a character`,
			);
		}
		this.serializeStr(value);
	}

	serializeStr(value: string): void {
		this.write(quoteString(value));
	}

	serializeBytes(value: Uint8Array): void {
		this.write(`"${encodeBase64Url(value)}"`);
	}

	serializeNone(): void {
		this.serializeUnit();
	}

	serializeSome<T>(value: T, type: Serialize<T>): void {
		type.serialize(value, this);
	}

	serializeUnit(): void {
		this.write("null");
	}

	serializeUnitVariant(_name: string, _index: number, variant: string): void {
		this.serializeStr(variant);
	}

	serializeNewtypeStruct<T>(_name: string, value: T, type: Serialize<T>): void {
		type.serialize(value, this);
	}

	serializeNewtypeVariant<T>(
		_name: string,
		_index: number,
		variant: string,
		value: T,
		type: Serialize<T>,
	): void {
		this.enter();
		this.write("{");
		this.serializeStr(variant);
		this.write(":");
		type.serialize(value, this);
		this.write("}");
		this.leave();
	}

	serializeSeq(_length?: number): SerializeSeq {
		this.enter();
		this.write("[");
		return new Compound(this, "]");
	}

	serializeTuple(length: number): SerializeSeq {
		return this.serializeSeq(length);
	}

	serializeTupleVariant(
		_name: string,
		_index: number,
		variant: string,
		_length: number,
	): SerializeSeq {
		this.enter(2);
		this.write("{");
		this.serializeStr(variant);
		this.write(":[");
		return new Compound(this, "]}", 2);
	}

	serializeMap(_length?: number): Compound {
		this.enter();
		this.write("{");
		return new Compound(this, "}");
	}

	serializeStruct(_name: string, length: number): SerializeStruct {
		return this.serializeMap(length);
	}

	serializeStructVariant(
		_name: string,
		_index: number,
		variant: string,
		_length: number,
	): SerializeStruct {
		this.enter(2);
		this.write("{");
		this.serializeStr(variant);
		this.write(":{");
		return new Compound(this, "}}", 2);
	}
}

/**
 * Encode a value into a caller-supplied sink
 */
export function encodeInto<T>(
	value: T,
	type: Serialize<T>,
	sink: OutputSink,
	options?: EncoderOptions,
): void {
	type.serialize(value, new Encoder(sink, options));
}

/**
 * Encode a value of the given wire type to text
 *
 * @param value - Value to encode
 * @param type - Wire type that describes the value
 * @param options - Encoder options (depth limit)
 * @throws TerseJsonError when the value cannot be encoded (NaN, out of range, ...)
 *
 * @example
 * ```ts
 * encode({ int: 1, seq: ["a", "b"] }, Test); // '{"int":1,"seq":["a","b"]}'
 * ```
 */
export function encode<T>(
	value: T,
	type: Serialize<T>,
	options?: EncoderOptions,
): string {
	const sink = new StringSink();
	encodeInto(value, type, sink, options);
	return sink.toString();
}

const textEncoder = new TextEncoder();

/**
 * Encode a value to UTF-8 bytes
 */
export function encodeBytes<T>(
	value: T,
	type: Serialize<T>,
	options?: EncoderOptions,
): Uint8Array<ArrayBuffer> {
	return new Uint8Array(textEncoder.encode(encode(value, type, options)));
}
