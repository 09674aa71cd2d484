/**
 * Visitor dispatch with the "invalid type" fallback for missing callbacks
 */

import { invalidType } from "../errors.js";
import type {
	Deserializer,
	EnumAccess,
	MapAccess,
	SeqAccess,
	Visitor,
} from "../traversal.js";

export function visitBool<V>(visitor: Visitor<V>, value: boolean): V {
	if (visitor.visitBool) return visitor.visitBool(value);
	throw invalidType(`boolean \`${value}\``, visitor.expecting);
}

export function visitNumber<V>(visitor: Visitor<V>, value: number): V {
	if (visitor.visitNumber) return visitor.visitNumber(value);
	throw invalidType(`number \`${value}\``, visitor.expecting);
}

export function visitBigInt<V>(visitor: Visitor<V>, value: bigint): V {
	if (visitor.visitBigInt) return visitor.visitBigInt(value);
	throw invalidType(`integer \`${value}\``, visitor.expecting);
}

export function visitStr<V>(visitor: Visitor<V>, value: string): V {
	if (visitor.visitStr) return visitor.visitStr(value);
	throw invalidType(`string ${JSON.stringify(value)}`, visitor.expecting);
}

export function visitBorrowedStr<V>(visitor: Visitor<V>, value: string): V {
	if (visitor.visitBorrowedStr) return visitor.visitBorrowedStr(value);
	return visitStr(visitor, value);
}

export function visitChar<V>(visitor: Visitor<V>, value: string): V {
	if (visitor.visitChar) return visitor.visitChar(value);
	return visitStr(visitor, value);
}

export function visitBytes<V>(visitor: Visitor<V>, value: Uint8Array): V {
	if (visitor.visitBytes) return visitor.visitBytes(value);
	throw invalidType("byte array", visitor.expecting);
}

export function visitUnit<V>(visitor: Visitor<V>): V {
	if (visitor.visitUnit) return visitor.visitUnit();
	throw invalidType("unit value", visitor.expecting);
}

export function visitNone<V>(visitor: Visitor<V>): V {
	if (visitor.visitNone) return visitor.visitNone();
	throw invalidType("Option value", visitor.expecting);
}

export function visitSome<V>(visitor: Visitor<V>, de: Deserializer): V {
	if (visitor.visitSome) return visitor.visitSome(de);
	throw invalidType("Option value", visitor.expecting);
}

export function visitNewtypeStruct<V>(visitor: Visitor<V>, de: Deserializer): V {
	if (visitor.visitNewtypeStruct) return visitor.visitNewtypeStruct(de);
	throw invalidType("newtype struct", visitor.expecting);
}

export function visitSeq<V>(visitor: Visitor<V>, seq: SeqAccess): V {
	if (visitor.visitSeq) return visitor.visitSeq(seq);
	throw invalidType("sequence", visitor.expecting);
}

export function visitMap<V>(visitor: Visitor<V>, map: MapAccess): V {
	if (visitor.visitMap) return visitor.visitMap(map);
	throw invalidType("map", visitor.expecting);
}

export function visitEnum<V>(visitor: Visitor<V>, data: EnumAccess): V {
	if (visitor.visitEnum) return visitor.visitEnum(data);
	throw invalidType("enum", visitor.expecting);
}
