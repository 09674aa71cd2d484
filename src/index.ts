/**
 * terse-json
 *
 * Compact JSON-derived encoding for structured data: booleans as `1`/`0`,
 * 64 and 128-bit integers as quoted decimals, bytes as URL-safe base64 and
 * externally tagged variants.
 *
 * @example
 * ```ts
 * import { decode, encode, t } from "terse-json";
 *
 * const Test = t.struct("Test", { int: t.u32, seq: t.array(t.string) });
 *
 * encode({ int: 1, seq: ["a", "b"] }, Test); // '{"int":1,"seq":["a","b"]}'
 * decode('{"int":1,"seq":["a","b"]}', Test); // { int: 1, seq: ["a", "b"] }
 * ```
 */

// Decoder
export {
	CommaSeparated,
	Decoder,
	decode,
	decodeBytes,
	IgnoredAny,
	KeyDecoder,
	type StrSlice,
	TaggedVariantAccess,
	UnitVariantAccess,
} from "./decoder/index.js";
// Encoder
export {
	Compound,
	Encoder,
	encode,
	encodeBytes,
	encodeInto,
	KeySerializer,
	type OutputSink,
	quoteString,
	StringSink,
} from "./encoder/index.js";
// Errors
export {
	Base64DecodeError,
	CustomError,
	DepthLimitError,
	InvalidUnicodeEscapeError,
	invalidType,
	NotANumberError,
	ParseFloatError,
	type ParseFloatErrorKind,
	ParseIntError,
	type ParseIntErrorKind,
	TerseJsonError,
	type TerseJsonErrorCode,
	TerseJsonErrorCodes,
	UnexpectedEndError,
	UnexpectedTokenError,
	UnexpectedUnicodeEscapeError,
	Utf8DecodeError,
} from "./errors.js";
// Options
export {
	type DecoderOptions,
	DecoderOptionsSchema,
	defaultDecoderOptions,
	defaultEncoderOptions,
	type EncoderOptions,
	EncoderOptionsSchema,
	resolveDecoderOptions,
	resolveEncoderOptions,
} from "./options.js";
// Wire types
export * as t from "./schema.js";
export type { Infer, WireType, WireValue } from "./schema.js";
// Traversal contract
export type {
	Deserialize,
	Deserializer,
	EnumAccess,
	MapAccess,
	Next,
	SeqAccess,
	Serialize,
	SerializeMap,
	SerializeSeq,
	SerializeStruct,
	Serializer,
	VariantAccess,
	Visitor,
} from "./traversal.js";
