/**
 * Map Key Decoding
 *
 * Object keys are always quoted on the wire. A key deserializer reads the
 * target kind back out of the already-parsed key text, so `Map<number, V>`
 * and friends round-trip.
 */

import { CustomError, invalidType } from "../errors.js";
import type {
	Deserialize,
	Deserializer,
	EnumAccess,
	VariantAccess,
	Visitor,
} from "../traversal.js";
import { decodeBase64Url } from "../utils/base64.js";
import { parseFloatLiteral } from "../utils/float.js";
import { type IntegerKind, parseInteger } from "../utils/integer.js";
import {
	visitBigInt,
	visitBool,
	visitBorrowedStr,
	visitBytes,
	visitChar,
	visitEnum,
	visitNewtypeStruct,
	visitNumber,
	visitSome,
	visitStr,
} from "./visit.js";

/**
 * Contents of a quoted string taken from the input
 */
export interface StrSlice {
	value: string;
	/** True when the value is a plain slice of the input (no escapes) */
	borrowed: boolean;
	/** Offset of the opening quote */
	offset: number;
}

/**
 * Exactly one code point, or an error naming the offending string
 */
export function singleChar(slice: StrSlice): string {
	const chars = Array.from(slice.value);
	if (chars.length !== 1) {
		throw new CustomError(
			`invalid value: string ${JSON.stringify(slice.value)}, expected a character`,
		);
	}
	return chars[0];
}

/**
 * Enum access for a variant written as a bare string tag
 */
export class UnitVariantAccess implements EnumAccess, VariantAccess {
	constructor(private readonly tag: StrSlice) {}

	variant<T>(seed: Deserialize<T>): [T, VariantAccess] {
		return [seed.deserialize(new KeyDecoder(this.tag)), this];
	}

	unitVariant(): void {}

	newtypeVariant<T>(_seed: Deserialize<T>): T {
		throw invalidType("unit variant", "newtype variant");
	}

	tupleVariant<V>(_length: number, visitor: Visitor<V>): V {
		throw invalidType("unit variant", visitor.expecting);
	}

	structVariant<V>(_fields: readonly string[], visitor: Visitor<V>): V {
		throw invalidType("unit variant", visitor.expecting);
	}
}

/**
 * Deserializer over a single parsed key
 */
export class KeyDecoder implements Deserializer {
	constructor(private readonly key: StrSlice) {}

	private str<V>(visitor: Visitor<V>): V {
		return this.key.borrowed
			? visitBorrowedStr(visitor, this.key.value)
			: visitStr(visitor, this.key.value);
	}

	private narrow<V>(kind: IntegerKind, visitor: Visitor<V>): V {
		return visitNumber(
			visitor,
			Number(parseInteger(this.key.value, kind, this.key.offset)),
		);
	}

	private wide<V>(kind: IntegerKind, visitor: Visitor<V>): V {
		return visitBigInt(
			visitor,
			parseInteger(this.key.value, kind, this.key.offset),
		);
	}

	private notAKey<V>(visitor: Visitor<V>): V {
		throw invalidType(
			`map key ${JSON.stringify(this.key.value)}`,
			visitor.expecting,
		);
	}

	deserializeAny<V>(visitor: Visitor<V>): V {
		return this.str(visitor);
	}

	deserializeBool<V>(visitor: Visitor<V>): V {
		switch (this.key.value) {
			case "1":
			case "true":
				return visitBool(visitor, true);
			case "0":
			case "false":
				return visitBool(visitor, false);
			default:
				throw new CustomError(
					`invalid value: map key ${JSON.stringify(this.key.value)}, expected a boolean`,
				);
		}
	}

	deserializeI8<V>(visitor: Visitor<V>): V {
		return this.narrow("i8", visitor);
	}

	deserializeI16<V>(visitor: Visitor<V>): V {
		return this.narrow("i16", visitor);
	}

	deserializeI32<V>(visitor: Visitor<V>): V {
		return this.narrow("i32", visitor);
	}

	deserializeI64<V>(visitor: Visitor<V>): V {
		return this.wide("i64", visitor);
	}

	deserializeI128<V>(visitor: Visitor<V>): V {
		return this.wide("i128", visitor);
	}

	deserializeU8<V>(visitor: Visitor<V>): V {
		return this.narrow("u8", visitor);
	}

	deserializeU16<V>(visitor: Visitor<V>): V {
		return this.narrow("u16", visitor);
	}

	deserializeU32<V>(visitor: Visitor<V>): V {
		return this.narrow("u32", visitor);
	}

	deserializeU64<V>(visitor: Visitor<V>): V {
		return this.wide("u64", visitor);
	}

	deserializeU128<V>(visitor: Visitor<V>): V {
		return this.wide("u128", visitor);
	}

	deserializeF32<V>(visitor: Visitor<V>): V {
		return visitNumber(
			visitor,
			Math.fround(parseFloatLiteral(this.key.value, this.key.offset)),
		);
	}

	deserializeF64<V>(visitor: Visitor<V>): V {
		return visitNumber(
			visitor,
			parseFloatLiteral(this.key.value, this.key.offset),
		);
	}

	deserializeChar<V>(visitor: Visitor<V>): V {
		return visitChar(visitor, singleChar(this.key));
	}

	deserializeStr<V>(visitor: Visitor<V>): V {
		return this.str(visitor);
	}

	deserializeBytes<V>(visitor: Visitor<V>): V {
		return visitBytes(
			visitor,
			decodeBase64Url(this.key.value, this.key.offset),
		);
	}

	deserializeOption<V>(visitor: Visitor<V>): V {
		return visitSome(visitor, this);
	}

	deserializeUnit<V>(visitor: Visitor<V>): V {
		return this.notAKey(visitor);
	}

	deserializeNewtypeStruct<V>(_name: string, visitor: Visitor<V>): V {
		return visitNewtypeStruct(visitor, this);
	}

	deserializeSeq<V>(visitor: Visitor<V>): V {
		return this.notAKey(visitor);
	}

	deserializeTuple<V>(_length: number, visitor: Visitor<V>): V {
		return this.notAKey(visitor);
	}

	deserializeMap<V>(visitor: Visitor<V>): V {
		return this.notAKey(visitor);
	}

	deserializeStruct<V>(
		_name: string,
		_fields: readonly string[],
		visitor: Visitor<V>,
	): V {
		return this.notAKey(visitor);
	}

	deserializeEnum<V>(
		_name: string,
		_variants: readonly string[],
		visitor: Visitor<V>,
	): V {
		return visitEnum(visitor, new UnitVariantAccess(this.key));
	}

	deserializeIdentifier<V>(visitor: Visitor<V>): V {
		return this.str(visitor);
	}

	deserializeIgnoredAny<V>(visitor: Visitor<V>): V {
		return this.str(visitor);
	}
}
