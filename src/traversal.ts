/**
 * Traversal Contract
 *
 * The interfaces a structured type implements to describe itself to the
 * encoder (`Serialize`) and to build itself from the decoder (`Deserialize`).
 * The engines only ever see values through these interfaces.
 */

// =============================================================================
// Encoding side
// =============================================================================

/**
 * Describes a value of type T to a serializer
 */
export interface Serialize<T> {
	serialize(value: T, serializer: Serializer): void;
}

/**
 * Open sequence, tuple or tuple variant
 */
export interface SerializeSeq {
	element<T>(value: T, type: Serialize<T>): void;
	end(): void;
}

/**
 * Open map; every `key` call is followed by exactly one `value` call
 */
export interface SerializeMap {
	key<K>(key: K, type: Serialize<K>): void;
	value<V>(value: V, type: Serialize<V>): void;
	end(): void;
}

/**
 * Open struct or struct variant
 */
export interface SerializeStruct {
	field<T>(name: string, value: T, type: Serialize<T>): void;
	end(): void;
}

/**
 * Sink for a value traversal, one method per data model kind
 */
export interface Serializer {
	serializeBool(value: boolean): void;
	serializeI8(value: number): void;
	serializeI16(value: number): void;
	serializeI32(value: number): void;
	serializeI64(value: bigint): void;
	serializeI128(value: bigint): void;
	serializeU8(value: number): void;
	serializeU16(value: number): void;
	serializeU32(value: number): void;
	serializeU64(value: bigint): void;
	serializeU128(value: bigint): void;
	serializeF32(value: number): void;
	serializeF64(value: number): void;
	serializeChar(value: string): void;
	serializeStr(value: string): void;
	serializeBytes(value: Uint8Array): void;
	serializeNone(): void;
	serializeSome<T>(value: T, type: Serialize<T>): void;
	serializeUnit(): void;
	serializeUnitVariant(name: string, index: number, variant: string): void;
	serializeNewtypeStruct<T>(name: string, value: T, type: Serialize<T>): void;
	serializeNewtypeVariant<T>(
		name: string,
		index: number,
		variant: string,
		value: T,
		type: Serialize<T>,
	): void;
	/** @param length - Element count, when known up front */
	serializeSeq(length?: number): SerializeSeq;
	serializeTuple(length: number): SerializeSeq;
	serializeTupleVariant(
		name: string,
		index: number,
		variant: string,
		length: number,
	): SerializeSeq;
	serializeMap(length?: number): SerializeMap;
	serializeStruct(name: string, length: number): SerializeStruct;
	serializeStructVariant(
		name: string,
		index: number,
		variant: string,
		length: number,
	): SerializeStruct;
}

// =============================================================================
// Decoding side
// =============================================================================

/**
 * Builds a value of type T from a deserializer
 */
export interface Deserialize<T> {
	deserialize(deserializer: Deserializer): T;
}

/**
 * Result of pulling the next element out of a compound
 */
export type Next<T> = { done: true } | { done: false; value: T };

export interface SeqAccess {
	nextElement<T>(seed: Deserialize<T>): Next<T>;
}

export interface MapAccess {
	nextKey<K>(seed: Deserialize<K>): Next<K>;
	nextValue<V>(seed: Deserialize<V>): V;
}

export interface EnumAccess {
	/** Decode the variant tag and return the access for its payload */
	variant<T>(seed: Deserialize<T>): [T, VariantAccess];
}

export interface VariantAccess {
	unitVariant(): void;
	newtypeVariant<T>(seed: Deserialize<T>): T;
	tupleVariant<V>(length: number, visitor: Visitor<V>): V;
	structVariant<V>(fields: readonly string[], visitor: Visitor<V>): V;
}

/**
 * Receives whatever the deserializer found in the input
 *
 * Callbacks are optional; a deserializer that finds a kind the visitor has
 * no callback for raises an "invalid type" error naming `expecting`.
 */
export interface Visitor<V> {
	/** What the visitor expects, for error messages */
	readonly expecting: string;
	visitBool?(value: boolean): V;
	/** Narrow integers and floats */
	visitNumber?(value: number): V;
	/** 64 and 128-bit integers */
	visitBigInt?(value: bigint): V;
	/** Falls back to `visitStr` */
	visitChar?(value: string): V;
	visitStr?(value: string): V;
	/** A slice of the input taken without escape processing; falls back to `visitStr` */
	visitBorrowedStr?(value: string): V;
	visitBytes?(value: Uint8Array): V;
	visitNone?(): V;
	visitSome?(deserializer: Deserializer): V;
	visitUnit?(): V;
	visitNewtypeStruct?(deserializer: Deserializer): V;
	visitSeq?(seq: SeqAccess): V;
	visitMap?(map: MapAccess): V;
	visitEnum?(data: EnumAccess): V;
}

/**
 * Source of a value traversal, one method per data model kind
 */
export interface Deserializer {
	/** Let the input decide the kind */
	deserializeAny<V>(visitor: Visitor<V>): V;
	deserializeBool<V>(visitor: Visitor<V>): V;
	deserializeI8<V>(visitor: Visitor<V>): V;
	deserializeI16<V>(visitor: Visitor<V>): V;
	deserializeI32<V>(visitor: Visitor<V>): V;
	deserializeI64<V>(visitor: Visitor<V>): V;
	deserializeI128<V>(visitor: Visitor<V>): V;
	deserializeU8<V>(visitor: Visitor<V>): V;
	deserializeU16<V>(visitor: Visitor<V>): V;
	deserializeU32<V>(visitor: Visitor<V>): V;
	deserializeU64<V>(visitor: Visitor<V>): V;
	deserializeU128<V>(visitor: Visitor<V>): V;
	deserializeF32<V>(visitor: Visitor<V>): V;
	deserializeF64<V>(visitor: Visitor<V>): V;
	deserializeChar<V>(visitor: Visitor<V>): V;
	deserializeStr<V>(visitor: Visitor<V>): V;
	deserializeBytes<V>(visitor: Visitor<V>): V;
	deserializeOption<V>(visitor: Visitor<V>): V;
	deserializeUnit<V>(visitor: Visitor<V>): V;
	deserializeNewtypeStruct<V>(name: string, visitor: Visitor<V>): V;
	deserializeSeq<V>(visitor: Visitor<V>): V;
	deserializeTuple<V>(length: number, visitor: Visitor<V>): V;
	deserializeMap<V>(visitor: Visitor<V>): V;
	deserializeStruct<V>(
		name: string,
		fields: readonly string[],
		visitor: Visitor<V>,
	): V;
	deserializeEnum<V>(
		name: string,
		variants: readonly string[],
		visitor: Visitor<V>,
	): V;
	/** Struct field names and variant tags */
	deserializeIdentifier<V>(visitor: Visitor<V>): V;
	/** Consume and discard the next value */
	deserializeIgnoredAny<V>(visitor: Visitor<V>): V;
}
