/**
 * Codec Options
 *
 * Tunables for the decoder and the encoder, with defaults.
 */

import * as z from "zod";

/**
 * Options for decoding
 */
export interface DecoderOptions {
	/** Maximum nesting of arrays, objects and object-form variants */
	maxDepth?: number;
}

/**
 * Options for encoding
 */
export interface EncoderOptions {
	/** Maximum nesting of compounds; also stops cyclic values */
	maxDepth?: number;
}

/**
 * Default decoder options
 */
export const defaultDecoderOptions: Required<DecoderOptions> = {
	maxDepth: 128,
};

/**
 * Default encoder options
 */
export const defaultEncoderOptions: Required<EncoderOptions> = {
	maxDepth: 128,
};

export const DecoderOptionsSchema = z.object({
	maxDepth: z.number().int().positive().optional(),
});

export const EncoderOptionsSchema = z.object({
	maxDepth: z.number().int().positive().optional(),
});

/**
 * Validate decoder options and fill in defaults
 *
 * @throws ZodError when an option is out of range
 */
export function resolveDecoderOptions(
	options?: DecoderOptions,
): Required<DecoderOptions> {
	const parsed = DecoderOptionsSchema.parse(options ?? {});
	return {
		maxDepth: parsed.maxDepth ?? defaultDecoderOptions.maxDepth,
	};
}

/**
 * Validate encoder options and fill in defaults
 *
 * @throws ZodError when an option is out of range
 */
export function resolveEncoderOptions(
	options?: EncoderOptions,
): Required<EncoderOptions> {
	const parsed = EncoderOptionsSchema.parse(options ?? {});
	return {
		maxDepth: parsed.maxDepth ?? defaultEncoderOptions.maxDepth,
	};
}
