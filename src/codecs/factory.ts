/**
 * Codec Factories
 *
 * Zod codecs pair a wire format with schema validation: decoding reads the
 * wire data, then the schema checks the result; encoding runs the other way.
 * A failed read never throws out of `safeDecode`; it becomes a single
 * `invalid_format` issue naming the format.
 *
 * @example
 * ```ts
 * const PointCodec = createTerseJsonCodec(z.object({ x: z.number(), y: z.number() }));
 * const encoded = PointCodec.encode({ x: 1, y: 2 }); // '{"x":1,"y":2}'
 *
 * const result = PointCodec.safeDecode("{");
 * if (!result.success) {
 *   console.error(result.error.issues[0]?.message); // unexpected end of input at offset 1
 * }
 * ```
 */

import type { LiteralUnion } from "type-fest";
import * as z from "zod";

/**
 * Known zod string formats, open to any other name
 */
export type FormatName = LiteralUnion<z.core.$ZodStringFormats, string>;

/**
 * Zod codec between text and the schema's values
 */
export type StringCodec<T extends z.ZodType = z.ZodType> = z.ZodCodec<
	z.ZodString,
	T
>;

/**
 * Zod codec between bytes and the schema's values
 */
export type BinaryCodec<T extends z.ZodType = z.ZodType> = z.ZodCodec<
	z.ZodCustom<Uint8Array<ArrayBuffer>, Uint8Array<ArrayBuffer>>,
	T
>;

export interface CodecOptions {
	/** Replaces the thrown error's message in decode issues */
	errorMessage?: string;
}

/**
 * Reads and writes one wire representation
 */
export interface WireFormat<TEncoded> {
	name: FormatName;
	write(value: unknown): TEncoded;
	read(data: TEncoded): unknown;
}

/**
 * Decode half of a codec
 *
 * Runs `read` and reports a thrown error as an `invalid_format` issue on the
 * parse context, with the caller's message when one is configured.
 */
export function readOrIssue<TEncoded, TDecoded>(
	read: (data: TEncoded) => TDecoded,
	formatName: FormatName,
	options?: CodecOptions,
): (data: TEncoded, ctx: Pick<z.core.ParsePayload, "issues">) => TDecoded {
	return (data, ctx) => {
		try {
			return read(data);
		} catch (err) {
			ctx.issues.push({
				code: "invalid_format",
				format: formatName,
				input: String(data),
				message:
					options?.errorMessage ??
					(err instanceof Error ? err.message : `Invalid ${formatName}`),
			});
			return z.NEVER;
		}
	};
}

/**
 * Codec factory over a text format
 *
 * @example
 * ```ts
 * const createUpperCodec = createStringCodecFactory({
 *   name: "upper",
 *   write: (value) => String(value).toUpperCase(),
 *   read: (text) => text.toLowerCase(),
 * });
 * createUpperCodec(z.string()).encode("abc"); // "ABC"
 * ```
 */
export function createStringCodecFactory(format: WireFormat<string>) {
	return <T extends z.ZodType>(
		schema: T,
		options?: CodecOptions,
	): StringCodec<T> =>
		z.codec(z.string(), schema, {
			decode: readOrIssue(
				(text: string) => format.read(text) as z.util.MaybeAsync<z.input<T>>,
				format.name,
				options,
			),
			encode: (value) => format.write(value),
		});
}

/**
 * Codec factory over a binary format
 */
export function createBinaryCodecFactory(
	format: WireFormat<Uint8Array<ArrayBuffer>>,
) {
	return <T extends z.ZodType>(
		schema: T,
		options?: CodecOptions,
	): BinaryCodec<T> =>
		z.codec(z.instanceof(Uint8Array), schema, {
			decode: readOrIssue(
				(bytes: Uint8Array<ArrayBuffer>) =>
					format.read(bytes) as z.util.MaybeAsync<z.input<T>>,
				format.name,
				options,
			),
			encode: (value) => format.write(value),
		});
}

/**
 * Whether a codec encodes to text
 */
export function isStringCodec(
	codec: z.ZodCodec<z.ZodType, z.ZodType>,
): codec is StringCodec {
	return codec._zod.def.in._zod.def.type === "string";
}

/**
 * Whether a codec encodes to bytes
 */
export function isBinaryCodec(
	codec: z.ZodCodec<z.ZodType, z.ZodType>,
): codec is BinaryCodec {
	return !isStringCodec(codec);
}
