/**
 * Map Key Encoding
 *
 * Object keys are always quoted: strings as themselves, numbers and booleans
 * as their quoted wire text. Compound keys cannot be written.
 */

import { CustomError, NotANumberError } from "../errors.js";
import type {
	Serialize,
	SerializeMap,
	SerializeSeq,
	SerializeStruct,
	Serializer,
} from "../traversal.js";
import { formatF32, formatF64 } from "../utils/float.js";
import { checkInteger, type IntegerKind } from "../utils/integer.js";
import type { Encoder } from "./encoder.js";

const keyMustBeAString = (): CustomError =>
	new CustomError("key must be a string");

export class KeySerializer implements Serializer {
	constructor(private readonly encoder: Encoder) {}

	private quoted(text: string): void {
		this.encoder.write(`"${text}"`);
	}

	private narrow(value: number, kind: IntegerKind): void {
		checkInteger(value, kind);
		this.quoted(String(value));
	}

	serializeBool(value: boolean): void {
		this.quoted(value ? "1" : "0");
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
		this.encoder.serializeI64(value);
	}

	serializeI128(value: bigint): void {
		this.encoder.serializeI128(value);
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
		this.encoder.serializeU64(value);
	}

	serializeU128(value: bigint): void {
		this.encoder.serializeU128(value);
	}

	serializeF32(value: number): void {
		// finite doubles past the single range round to infinity
		const single = Math.fround(value);
		if (!Number.isFinite(single)) throw new NotANumberError(single);
		this.quoted(formatF32(single));
	}

	serializeF64(value: number): void {
		if (!Number.isFinite(value)) throw new NotANumberError(value);
		this.quoted(formatF64(value));
	}

	serializeChar(value: string): void {
		this.encoder.serializeChar(value);
	}

	serializeStr(value: string): void {
		this.encoder.serializeStr(value);
	}

	serializeBytes(value: Uint8Array): void {
		this.encoder.serializeBytes(value);
	}

	serializeNone(): void {
		throw keyMustBeAString();
	}

	serializeSome<T>(value: T, type: Serialize<T>): void {
		type.serialize(value, this);
	}

	serializeUnit(): void {
		throw keyMustBeAString();
	}

	serializeUnitVariant(_name: string, _index: number, variant: string): void {
		this.encoder.serializeStr(variant);
	}

	serializeNewtypeStruct<T>(_name: string, value: T, type: Serialize<T>): void {
		type.serialize(value, this);
	}

	serializeNewtypeVariant(): void {
		throw keyMustBeAString();
	}

	serializeSeq(): SerializeSeq {
		throw keyMustBeAString();
	}

	serializeTuple(): SerializeSeq {
		throw keyMustBeAString();
	}

	serializeTupleVariant(): SerializeSeq {
		throw keyMustBeAString();
	}

	serializeMap(): SerializeMap {
		throw keyMustBeAString();
	}

	serializeStruct(): SerializeStruct {
		throw keyMustBeAString();
	}

	serializeStructVariant(): SerializeStruct {
		throw keyMustBeAString();
	}
}
