/**
 * Wire Type Definitions
 *
 * Builders for values that know how to describe themselves to the encoder
 * and build themselves from the decoder. Each builder returns a `WireType`,
 * and the TypeScript type of the value is inferred from the definition.
 *
 * @example
 * ```ts
 * const Test = t.struct("Test", { int: t.u32, seq: t.array(t.string) });
 * type Test = t.Infer<typeof Test>; // { int: number; seq: string[] }
 * ```
 */

import { IgnoredAny } from "./decoder/access.js";
import { CustomError } from "./errors.js";
import type {
	Deserialize,
	Deserializer,
	SerializeSeq,
	SerializeStruct,
	Serializer,
	Visitor,
} from "./traversal.js";

/**
 * A value type with both halves of the traversal contract
 */
export interface WireType<T> {
	/** Display name, used in error messages */
	readonly name: string;
	serialize(value: T, serializer: Serializer): void;
	deserialize(deserializer: Deserializer): T;
	/** Value a struct field takes when its key is absent */
	missing?(): T;
}

/**
 * Infer the value type of a wire type
 *
 * @typeParam W - A WireType to extract the value type from
 */
export type Infer<W> = W extends WireType<infer T> ? T : never;

/**
 * Dynamic value, as produced by `unknown`
 */
export type WireValue =
	| null
	| boolean
	| number
	| string
	| WireValue[]
	| { [key: string]: WireValue };

// =============================================================================
// Shared seeds and guards
// =============================================================================

const identifierVisitor: Visitor<string> = {
	expecting: "an identifier",
	visitStr: (value) => value,
};

/** Struct field names and variant tags */
const identifier: Deserialize<string> = {
	deserialize: (de) => de.deserializeIdentifier(identifierVisitor),
};

const ignored: Deserialize<null> = {
	deserialize: (de) => de.deserializeIgnoredAny(IgnoredAny),
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

const isList = (value: unknown): value is readonly unknown[] =>
	Array.isArray(value);

const quotedList = (names: readonly string[]): string =>
	names.map((name) => `\`${name}\``).join(", ");

// =============================================================================
// Primitives
// =============================================================================

function primitive<T>(
	name: string,
	serialize: (value: T, serializer: Serializer) => void,
	deserialize: (deserializer: Deserializer) => T,
): WireType<T> {
	return { name, serialize, deserialize };
}

const numbers = (expecting: string): Visitor<number> => ({
	expecting,
	visitNumber: (value) => value,
});

const bigints = (expecting: string): Visitor<bigint> => ({
	expecting,
	visitBigInt: (value) => value,
});

const strings = (expecting: string): Visitor<string> => ({
	expecting,
	visitStr: (value) => value,
});

const boolVisitor: Visitor<boolean> = {
	expecting: "a boolean",
	visitBool: (value) => value,
};

const bytesVisitor: Visitor<Uint8Array> = {
	expecting: "a byte array",
	visitBytes: (value) => value,
};

const unitVisitor: Visitor<null> = {
	expecting: "unit",
	visitUnit: () => null,
};

export const bool = primitive<boolean>(
	"bool",
	(value, s) => s.serializeBool(value),
	(de) => de.deserializeBool(boolVisitor),
);

const i8Visitor = numbers("i8");
export const i8 = primitive<number>(
	"i8",
	(value, s) => s.serializeI8(value),
	(de) => de.deserializeI8(i8Visitor),
);

const i16Visitor = numbers("i16");
export const i16 = primitive<number>(
	"i16",
	(value, s) => s.serializeI16(value),
	(de) => de.deserializeI16(i16Visitor),
);

const i32Visitor = numbers("i32");
export const i32 = primitive<number>(
	"i32",
	(value, s) => s.serializeI32(value),
	(de) => de.deserializeI32(i32Visitor),
);

const i64Visitor = bigints("i64");
export const i64 = primitive<bigint>(
	"i64",
	(value, s) => s.serializeI64(value),
	(de) => de.deserializeI64(i64Visitor),
);

const i128Visitor = bigints("i128");
export const i128 = primitive<bigint>(
	"i128",
	(value, s) => s.serializeI128(value),
	(de) => de.deserializeI128(i128Visitor),
);

const u8Visitor = numbers("u8");
export const u8 = primitive<number>(
	"u8",
	(value, s) => s.serializeU8(value),
	(de) => de.deserializeU8(u8Visitor),
);

const u16Visitor = numbers("u16");
export const u16 = primitive<number>(
	"u16",
	(value, s) => s.serializeU16(value),
	(de) => de.deserializeU16(u16Visitor),
);

const u32Visitor = numbers("u32");
export const u32 = primitive<number>(
	"u32",
	(value, s) => s.serializeU32(value),
	(de) => de.deserializeU32(u32Visitor),
);

const u64Visitor = bigints("u64");
export const u64 = primitive<bigint>(
	"u64",
	(value, s) => s.serializeU64(value),
	(de) => de.deserializeU64(u64Visitor),
);

const u128Visitor = bigints("u128");
export const u128 = primitive<bigint>(
	"u128",
	(value, s) => s.serializeU128(value),
	(de) => de.deserializeU128(u128Visitor),
);

const f32Visitor = numbers("f32");
export const f32 = primitive<number>(
	"f32",
	(value, s) => s.serializeF32(value),
	(de) => de.deserializeF32(f32Visitor),
);

const f64Visitor = numbers("f64");
export const f64 = primitive<number>(
	"f64",
	(value, s) => s.serializeF64(value),
	(de) => de.deserializeF64(f64Visitor),
);

const charVisitor = strings("a character");
export const char = primitive<string>(
	"char",
	(value, s) => s.serializeChar(value),
	(de) => de.deserializeChar(charVisitor),
);

const stringVisitor = strings("a string");
export const string = primitive<string>(
	"string",
	(value, s) => s.serializeStr(value),
	(de) => de.deserializeStr(stringVisitor),
);

export const bytes = primitive<Uint8Array>(
	"bytes",
	(value, s) => s.serializeBytes(value),
	(de) => de.deserializeBytes(bytesVisitor),
);

export const unit = primitive<null>(
	"unit",
	(_value, s) => s.serializeUnit(),
	(de) => de.deserializeUnit(unitVisitor),
);

// =============================================================================
// Dynamic values
// =============================================================================

const wireValue: Deserialize<WireValue> = {
	deserialize: (de) => de.deserializeAny(wireValueVisitor),
};

const wireValueVisitor: Visitor<WireValue> = {
	expecting: "any value",
	visitBool: (value) => value,
	visitNumber: (value) => value,
	visitStr: (value) => value,
	visitUnit: () => null,
	visitNone: () => null,
	visitSome: (de) => de.deserializeAny(wireValueVisitor),
	visitSeq(seq) {
		const out: WireValue[] = [];
		for (;;) {
			const next = seq.nextElement(wireValue);
			if (next.done) return out;
			out.push(next.value);
		}
	},
	visitMap(map) {
		const entries: Array<[string, WireValue]> = [];
		for (;;) {
			const key = map.nextKey(identifier);
			if (key.done) return Object.fromEntries(entries);
			entries.push([key.value, map.nextValue(wireValue)]);
		}
	},
};

function serializeUnknown(value: unknown, s: Serializer): void {
	switch (typeof value) {
		case "boolean":
			s.serializeBool(value);
			return;
		case "number":
			s.serializeF64(value);
			return;
		case "bigint":
			if (value < 0n) s.serializeI128(value);
			else s.serializeU128(value);
			return;
		case "string":
			s.serializeStr(value);
			return;
	}
	if (value === null || value === undefined) {
		s.serializeUnit();
		return;
	}
	if (value instanceof Uint8Array) {
		s.serializeBytes(value);
		return;
	}
	if (isList(value)) {
		const seq = s.serializeSeq(value.length);
		for (const element of value) seq.element(element, unknown);
		seq.end();
		return;
	}
	if (value instanceof Map) {
		const entries: Map<unknown, unknown> = value;
		const map = s.serializeMap(entries.size);
		for (const [key, item] of entries) {
			map.key(key, unknown);
			map.value(item, unknown);
		}
		map.end();
		return;
	}
	if (isRecord(value)) {
		const entries = Object.entries(value);
		const map = s.serializeMap(entries.length);
		for (const [key, item] of entries) {
			map.key(key, string);
			map.value(item, unknown);
		}
		map.end();
		return;
	}
	throw new CustomError(`invalid value: cannot encode a ${typeof value}`);
}

/**
 * Any value, chosen by its runtime shape when encoding and by the input when
 * decoding
 *
 * Booleans are written as `1`/`0` and numbers as f64, so a boolean comes
 * back as a number.
 */
export const unknown: WireType<unknown> = {
	name: "unknown",
	serialize: serializeUnknown,
	deserialize: (de) => wireValue.deserialize(de),
};

// =============================================================================
// Combinators
// =============================================================================

/**
 * `null` or a value of the inner type; an absent struct field reads as `null`
 */
export function option<T>(inner: WireType<T>): WireType<T | null> {
	const visitor: Visitor<T | null> = {
		expecting: `option of ${inner.name}`,
		visitNone: () => null,
		visitSome: (de) => inner.deserialize(de),
	};
	return {
		name: `option<${inner.name}>`,
		serialize(value, s) {
			if (value === null) s.serializeNone();
			else s.serializeSome<T>(value, inner);
		},
		deserialize: (de) => de.deserializeOption(visitor),
		missing: () => null,
	};
}

/**
 * Variable-length sequence
 */
export function array<T>(item: WireType<T>): WireType<T[]> {
	const visitor: Visitor<T[]> = {
		expecting: `a sequence of ${item.name}`,
		visitSeq(seq) {
			const out: T[] = [];
			for (;;) {
				const next = seq.nextElement(item);
				if (next.done) return out;
				out.push(next.value);
			}
		},
	};
	return {
		name: `${item.name}[]`,
		serialize(value, s) {
			const seq = s.serializeSeq(value.length);
			for (const element of value) seq.element(element, item);
			seq.end();
		},
		deserialize: (de) => de.deserializeSeq(visitor),
	};
}

type AnyWireType = WireType<unknown>;

export type InferTuple<T extends readonly AnyWireType[]> = {
	-readonly [K in keyof T]: Infer<T[K]>;
};

function tupleVisitor(
	expecting: string,
	items: readonly AnyWireType[],
): Visitor<unknown[]> {
	return {
		expecting,
		visitSeq(seq) {
			const out: unknown[] = [];
			for (const item of items) {
				const next = seq.nextElement(item);
				if (next.done) {
					throw new CustomError(
						`invalid length ${out.length}, expected ${expecting}`,
					);
				}
				out.push(next.value);
			}
			return out;
		},
	};
}

function writeElements(
	seq: SerializeSeq,
	items: readonly AnyWireType[],
	value: readonly unknown[],
): void {
	if (value.length !== items.length) {
		throw new CustomError(
			`invalid length ${value.length}, expected a tuple of size ${items.length}`,
		);
	}
	items.forEach((item, index) => seq.element(value[index], item));
	seq.end();
}

/**
 * Fixed-length heterogeneous sequence; the input must hold exactly as many
 * elements as there are item types
 */
export function tuple<T extends readonly AnyWireType[]>(
	...items: T
): WireType<InferTuple<T>> {
	const visitor = tupleVisitor(`a tuple of size ${items.length}`, items);
	return {
		name: `(${items.map((item) => item.name).join(", ")})`,
		serialize(value, s) {
			writeElements(s.serializeTuple(items.length), items, value);
		},
		deserialize: (de) =>
			de.deserializeTuple(items.length, visitor) as InferTuple<T>,
	};
}

/**
 * Map with typed keys; keys are string-encoded on the wire
 */
export function map<K, V>(
	key: WireType<K>,
	value: WireType<V>,
): WireType<Map<K, V>> {
	const visitor: Visitor<Map<K, V>> = {
		expecting: `a map of ${key.name} to ${value.name}`,
		visitMap(access) {
			const out = new Map<K, V>();
			for (;;) {
				const next = access.nextKey(key);
				if (next.done) return out;
				out.set(next.value, access.nextValue(value));
			}
		},
	};
	return {
		name: `map<${key.name}, ${value.name}>`,
		serialize(entries, s) {
			const out = s.serializeMap(entries.size);
			for (const [k, v] of entries) {
				out.key(k, key);
				out.value(v, value);
			}
			out.end();
		},
		deserialize: (de) => de.deserializeMap(visitor),
	};
}

/**
 * Map with string keys, as a plain object
 */
export function record<V>(value: WireType<V>): WireType<Record<string, V>> {
	const visitor: Visitor<Record<string, V>> = {
		expecting: `a map of string to ${value.name}`,
		visitMap(access) {
			const entries: Array<[string, V]> = [];
			for (;;) {
				const next = access.nextKey(string);
				if (next.done) return Object.fromEntries(entries);
				entries.push([next.value, access.nextValue(value)]);
			}
		},
	};
	return {
		name: `record<${value.name}>`,
		serialize(entries, s) {
			const pairs = Object.entries(entries);
			const out = s.serializeMap(pairs.length);
			for (const [k, v] of pairs) {
				out.key(k, string);
				out.value(v, value);
			}
			out.end();
		},
		deserialize: (de) => de.deserializeMap(visitor),
	};
}

export type StructFields = Record<string, AnyWireType>;

export type InferStruct<F extends StructFields> = {
	-readonly [K in keyof F]: Infer<F[K]>;
};

export interface StructOptions {
	/**
	 * What to do with keys that name no field (default: "ignore")
	 *
	 * - ignore: skip the value
	 * - warn: skip the value and log a warning
	 * - deny: fail with a CustomError
	 */
	unknownFields?: "ignore" | "warn" | "deny";
}

function structVisitor(
	name: string,
	fields: StructFields,
	options: StructOptions,
): Visitor<Record<string, unknown>> {
	const names = Object.keys(fields);
	const policy = options.unknownFields ?? "ignore";
	return {
		expecting: `struct ${name}`,
		visitMap(access) {
			const seen = new Map<string, unknown>();
			for (;;) {
				const next = access.nextKey(identifier);
				if (next.done) break;
				const key = next.value;
				const field: AnyWireType | undefined = Object.hasOwn(fields, key)
					? fields[key]
					: undefined;
				if (field === undefined) {
					if (policy === "deny") {
						throw new CustomError(
							`unknown field \`${key}\`, expected one of ${quotedList(names)}`,
						);
					}
					if (policy === "warn") {
						console.warn(`Unknown field '${key}' in struct ${name}`);
					}
					access.nextValue(ignored);
					continue;
				}
				if (seen.has(key)) {
					throw new CustomError(`duplicate field \`${key}\``);
				}
				seen.set(key, access.nextValue(field));
			}
			const entries: Array<[string, unknown]> = [];
			for (const field of names) {
				if (seen.has(field)) {
					entries.push([field, seen.get(field)]);
					continue;
				}
				const type = fields[field];
				if (type.missing === undefined) {
					throw new CustomError(`missing field \`${field}\``);
				}
				entries.push([field, type.missing()]);
			}
			return Object.fromEntries(entries);
		},
	};
}

function writeFields(
	out: SerializeStruct,
	fields: StructFields,
	value: Readonly<Record<string, unknown>>,
): void {
	for (const [field, type] of Object.entries(fields)) {
		out.field(field, value[field], type);
	}
	out.end();
}

/**
 * Named record of fields, written as an object in declaration order
 *
 * Absent `option` fields decode as `null`; any other absent field fails.
 */
export function struct<F extends StructFields>(
	name: string,
	fields: F,
	options: StructOptions = {},
): WireType<InferStruct<F>> {
	const names = Object.keys(fields);
	const visitor = structVisitor(name, fields, options);
	return {
		name,
		serialize(value, s) {
			writeFields(s.serializeStruct(name, names.length), fields, value);
		},
		deserialize: (de) =>
			de.deserializeStruct(name, names, visitor) as InferStruct<F>,
	};
}

/**
 * Named wrapper around a single value; transparent on the wire
 */
export function newtype<T>(name: string, inner: WireType<T>): WireType<T> {
	const visitor: Visitor<T> = {
		expecting: `newtype struct ${name}`,
		visitNewtypeStruct: (de) => inner.deserialize(de),
	};
	return {
		name,
		serialize: (value, s) => s.serializeNewtypeStruct(name, value, inner),
		deserialize: (de) => de.deserializeNewtypeStruct(name, visitor),
	};
}

// =============================================================================
// Enumerations
// =============================================================================

export interface UnitVariant {
	readonly kind: "unit";
}

export interface NewtypeVariant<T> {
	readonly kind: "newtype";
	readonly type: WireType<T>;
}

export interface TupleVariant<T extends readonly AnyWireType[]> {
	readonly kind: "tuple";
	readonly items: T;
}

export interface StructVariant<F extends StructFields> {
	readonly kind: "struct";
	readonly fields: F;
}

export type VariantDef =
	| UnitVariant
	| NewtypeVariant<unknown>
	| TupleVariant<readonly AnyWireType[]>
	| StructVariant<StructFields>;

/**
 * Payload shapes for `enumeration` cases
 */
export const variant = {
	unit: (): UnitVariant => ({ kind: "unit" }),
	newtype: <T>(type: WireType<T>): NewtypeVariant<T> => ({
		kind: "newtype",
		type,
	}),
	tuple: <T extends readonly AnyWireType[]>(
		...items: T
	): TupleVariant<T> => ({ kind: "tuple", items }),
	struct: <F extends StructFields>(fields: F): StructVariant<F> => ({
		kind: "struct",
		fields,
	}),
};

type InferPayload<D> =
	D extends NewtypeVariant<infer T>
		? T
		: D extends TupleVariant<infer I>
			? InferTuple<I>
			: D extends StructVariant<infer F>
				? InferStruct<F>
				: never;

/**
 * Tagged union of an enumeration's cases: `{ tag }` for unit cases,
 * `{ tag, value }` for the others
 */
export type InferEnum<C extends Record<string, VariantDef>> = {
	[K in keyof C & string]: C[K] extends UnitVariant
		? { tag: K }
		: { tag: K; value: InferPayload<C[K]> };
}[keyof C & string];

const payloadOf = (value: { tag: string }): unknown =>
	"value" in value ? value.value : undefined;

/**
 * Closed set of named cases, each with its own payload shape
 *
 * Unit cases are written as `"Tag"`, the others as `{"Tag": payload}`.
 *
 * @example
 * ```ts
 * const Shape = t.enumeration("Shape", {
 *   Empty: t.variant.unit(),
 *   Circle: t.variant.newtype(t.f64),
 *   Rect: t.variant.struct({ w: t.f64, h: t.f64 }),
 * });
 * encode({ tag: "Circle", value: 2 }, Shape); // '{"Circle":2}'
 * ```
 */
export function enumeration<C extends Record<string, VariantDef>>(
	name: string,
	cases: C,
): WireType<InferEnum<C>> {
	const tags = Object.keys(cases);
	const lookup = (tag: string): VariantDef => {
		const def: VariantDef | undefined = Object.hasOwn(cases, tag)
			? cases[tag]
			: undefined;
		if (def === undefined) {
			throw new CustomError(
				`unknown variant \`${tag}\`, expected one of ${quotedList(tags)}`,
			);
		}
		return def;
	};

	const visitor: Visitor<InferEnum<C>> = {
		expecting: `enum ${name}`,
		visitEnum(data) {
			const [tag, access] = data.variant(identifier);
			const def = lookup(tag);
			let value: unknown;
			switch (def.kind) {
				case "unit":
					access.unitVariant();
					return { tag } as InferEnum<C>;
				case "newtype":
					value = access.newtypeVariant(def.type);
					break;
				case "tuple":
					value = access.tupleVariant(
						def.items.length,
						tupleVisitor(
							`tuple variant ${name}::${tag} of size ${def.items.length}`,
							def.items,
						),
					);
					break;
				case "struct":
					value = access.structVariant(
						Object.keys(def.fields),
						structVisitor(`${name}::${tag}`, def.fields, {}),
					);
					break;
			}
			return { tag, value } as InferEnum<C>;
		},
	};

	return {
		name,
		serialize(value, s) {
			const tag: string = value.tag;
			const def = lookup(tag);
			const index = tags.indexOf(tag);
			const payload = payloadOf(value);
			switch (def.kind) {
				case "unit":
					s.serializeUnitVariant(name, index, tag);
					return;
				case "newtype":
					s.serializeNewtypeVariant(name, index, tag, payload, def.type);
					return;
				case "tuple":
					if (!isList(payload)) {
						throw new CustomError(
							`invalid value: ${name}::${tag} expects a tuple payload`,
						);
					}
					writeElements(
						s.serializeTupleVariant(name, index, tag, def.items.length),
						def.items,
						payload,
					);
					return;
				case "struct":
					if (!isRecord(payload)) {
						throw new CustomError(
							`invalid value: ${name}::${tag} expects a struct payload`,
						);
					}
					writeFields(
						s.serializeStructVariant(
							name,
							index,
							tag,
							Object.keys(def.fields).length,
						),
						def.fields,
						payload,
					);
					return;
			}
		},
		deserialize: (de) => de.deserializeEnum(name, tags, visitor),
	};
}

/**
 * Defer building a wire type until first use, for recursive definitions
 *
 * @example
 * ```ts
 * interface Tree { label: string; children: Tree[] }
 * const Tree: t.WireType<Tree> = t.struct("Tree", {
 *   label: t.string,
 *   children: t.array(t.lazy(() => Tree)),
 * });
 * ```
 */
export function lazy<T>(get: () => WireType<T>): WireType<T> {
	let resolved: WireType<T> | undefined;
	const resolve = (): WireType<T> => {
		resolved ??= get();
		return resolved;
	};
	return {
		name: "lazy",
		serialize: (value, s) => resolve().serialize(value, s),
		deserialize: (de) => resolve().deserialize(de),
	};
}
