/**
 * Compound Cursors for Decoding
 *
 * Comma placement inside `[...]` and `{...}`, the object form of variants,
 * and the visitor that skips values it does not need.
 */

import { UnexpectedTokenError } from "../errors.js";
import type {
	Deserialize,
	EnumAccess,
	MapAccess,
	Next,
	SeqAccess,
	VariantAccess,
	Visitor,
} from "../traversal.js";
import type { Decoder } from "./decoder.js";
import { KeyDecoder } from "./key.js";

/**
 * Elements of a sequence or entries of a map, separated by commas
 *
 * The closing bracket is left for the caller to consume once the cursor
 * reports exhaustion.
 */
export class CommaSeparated implements SeqAccess, MapAccess {
	private first = true;

	constructor(
		private readonly de: Decoder,
		private readonly close: "]" | "}",
	) {}

	private hasNext(): boolean {
		this.de.skipWhitespace();
		if (this.de.peekChar() === this.close) {
			return false;
		}
		if (!this.first) {
			this.de.expectChar(",");
			this.de.skipWhitespace();
			const next = this.de.peekChar();
			if (next === this.close) {
				throw new UnexpectedTokenError(next, this.de.offset);
			}
		}
		this.first = false;
		return true;
	}

	nextElement<T>(seed: Deserialize<T>): Next<T> {
		if (!this.hasNext()) return { done: true };
		return { done: false, value: seed.deserialize(this.de) };
	}

	nextKey<K>(seed: Deserialize<K>): Next<K> {
		if (!this.hasNext()) return { done: true };
		const key = new KeyDecoder(this.de.parseString());
		return { done: false, value: seed.deserialize(key) };
	}

	nextValue<V>(seed: Deserialize<V>): V {
		this.de.skipWhitespace();
		this.de.expectChar(":");
		return seed.deserialize(this.de);
	}
}

/**
 * Variant written as `{"Tag": payload}`; the caller consumes the braces
 */
export class TaggedVariantAccess implements EnumAccess, VariantAccess {
	constructor(private readonly de: Decoder) {}

	variant<T>(seed: Deserialize<T>): [T, VariantAccess] {
		const tag = seed.deserialize(new KeyDecoder(this.de.parseString()));
		this.de.skipWhitespace();
		this.de.expectChar(":");
		return [tag, this];
	}

	unitVariant(): void {
		this.de.skipWhitespace();
		throw new UnexpectedTokenError(this.de.peekChar(), this.de.offset);
	}

	newtypeVariant<T>(seed: Deserialize<T>): T {
		return seed.deserialize(this.de);
	}

	tupleVariant<V>(_length: number, visitor: Visitor<V>): V {
		return this.de.deserializeSeq(visitor);
	}

	structVariant<V>(_fields: readonly string[], visitor: Visitor<V>): V {
		return this.de.deserializeMap(visitor);
	}
}

const ignored: Deserialize<null> = {
	deserialize: (de) => de.deserializeIgnoredAny(IgnoredAny),
};

/**
 * Accepts any value and walks all of it, so its tokens are consumed
 */
export const IgnoredAny: Visitor<null> = {
	expecting: "anything at all",
	visitBool: () => null,
	visitNumber: () => null,
	visitBigInt: () => null,
	visitStr: () => null,
	visitBytes: () => null,
	visitUnit: () => null,
	visitNone: () => null,
	visitSome: (de) => de.deserializeIgnoredAny(IgnoredAny),
	visitNewtypeStruct: (de) => de.deserializeIgnoredAny(IgnoredAny),
	visitSeq(seq) {
		for (;;) {
			if (seq.nextElement(ignored).done) return null;
		}
	},
	visitMap(map) {
		while (!map.nextKey(ignored).done) {
			map.nextValue(ignored);
		}
		return null;
	},
};
