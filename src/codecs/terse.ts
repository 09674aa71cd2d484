/**
 * Terse JSON Codecs
 *
 * Zod codecs over the terse encoding. The untyped variants carry dynamic
 * values through `t.unknown`; `createTypedCodec` is driven by a wire type, so
 * bigints, bytes, maps and variants keep their wire shapes.
 *
 * @example
 * ```ts
 * import { createTypedCodec } from "terse-json/codecs";
 *
 * const Reading = t.struct("Reading", { id: t.u64, ok: t.bool });
 * const ReadingCodec = createTypedCodec(
 *   z.object({ id: z.bigint(), ok: z.boolean() }),
 *   Reading,
 * );
 *
 * ReadingCodec.encode({ id: 7n, ok: true }); // '{"id":"7","ok":1}'
 * ReadingCodec.decode('{"id":"7","ok":1}'); // { id: 7n, ok: true }
 * ```
 */

import * as z from "zod";
import { decode, decodeBytes } from "../decoder/index.js";
import { encode, encodeBytes } from "../encoder/index.js";
import type { DecoderOptions, EncoderOptions } from "../options.js";
import { unknown, type WireType } from "../schema.js";
import {
	type BinaryCodec,
	type CodecOptions,
	createBinaryCodecFactory,
	createStringCodecFactory,
	readOrIssue,
	type StringCodec,
} from "./factory.js";

const FORMAT = "terse_json";

/**
 * Factory for string codecs over dynamic values
 */
export const createTerseJsonCodec = createStringCodecFactory({
	name: FORMAT,
	write: (value) => encode(value, unknown),
	read: (text) => decode(text, unknown),
});

/**
 * Codec for unknown values
 *
 * The decoded value is `unknown` and should be validated separately.
 */
export const TerseJsonCodec = createTerseJsonCodec(z.unknown());

/**
 * Factory for binary (UTF-8) codecs over dynamic values
 */
export const createTerseJsonBinaryCodec = createBinaryCodecFactory({
	name: FORMAT,
	write: (value) => encodeBytes(value, unknown),
	read: (bytes) => decodeBytes(bytes, unknown),
});

export const TerseJsonBinaryCodec = createTerseJsonBinaryCodec(z.unknown());

/**
 * Options for typed codecs
 */
export interface TypedCodecOptions extends CodecOptions {
	decoder?: DecoderOptions;
	encoder?: EncoderOptions;
}

/**
 * Create a string codec driven by a wire type
 *
 * Decoding builds the schema's input with the wire type, then parses it with
 * the schema; encoding writes the schema's input back with the wire type.
 *
 * @param type - Wire type for the schema's input values
 */
export function createTypedCodec<T extends z.ZodType>(
	schema: T,
	type: WireType<z.input<T>>,
	options?: TypedCodecOptions,
): StringCodec<T> {
	return z.codec(z.string(), schema, {
		decode: readOrIssue(
			(text: string) => decode(text, type, options?.decoder),
			FORMAT,
			options,
		),
		encode: (value) => encode(value, type, options?.encoder),
	});
}

/**
 * Binary counterpart of `createTypedCodec`, over UTF-8 bytes
 */
export function createTypedBinaryCodec<T extends z.ZodType>(
	schema: T,
	type: WireType<z.input<T>>,
	options?: TypedCodecOptions,
): BinaryCodec<T> {
	return z.codec(z.instanceof(Uint8Array), schema, {
		decode: readOrIssue(
			(bytes: Uint8Array<ArrayBuffer>) =>
				decodeBytes(bytes, type, options?.decoder),
			FORMAT,
			options,
		),
		encode: (value) => encodeBytes(value, type, options?.encoder),
	});
}
