/**
 * Zod Codecs
 *
 * Zod-based codecs for serialization with built-in validation.
 *
 * - Factory functions for creating custom codecs
 * - Terse JSON codecs, string and binary, dynamic or driven by a wire type
 */

// Core types and factories
export {
	type BinaryCodec,
	type CodecOptions,
	createBinaryCodecFactory,
	createStringCodecFactory,
	type FormatName,
	isBinaryCodec,
	isStringCodec,
	readOrIssue,
	type StringCodec,
	type WireFormat,
} from "./factory.js";

// Terse JSON codecs
export {
	createTerseJsonBinaryCodec,
	createTerseJsonCodec,
	createTypedBinaryCodec,
	createTypedCodec,
	TerseJsonBinaryCodec,
	TerseJsonCodec,
	type TypedCodecOptions,
} from "./terse.js";
