/**
 * Compound Cursor for Encoding
 *
 * One per open bracket: writes the separator before every element after the
 * first, and the closing bracket(s) on `end`.
 */

import type {
	Serialize,
	SerializeMap,
	SerializeSeq,
	SerializeStruct,
} from "../traversal.js";
import type { Encoder } from "./encoder.js";
import { KeySerializer } from "./key.js";

export class Compound implements SerializeSeq, SerializeMap, SerializeStruct {
	private first = true;

	/**
	 * @param close - Closing text (`]`, `}`, or `]}`/`}}` for variants)
	 * @param levels - Nesting levels to release on `end`
	 */
	constructor(
		private readonly encoder: Encoder,
		private readonly close: string,
		private readonly levels = 1,
	) {}

	private separate(): void {
		if (this.first) {
			this.first = false;
			return;
		}
		this.encoder.write(",");
	}

	element<T>(value: T, type: Serialize<T>): void {
		this.separate();
		type.serialize(value, this.encoder);
	}

	key<K>(key: K, type: Serialize<K>): void {
		this.separate();
		type.serialize(key, new KeySerializer(this.encoder));
	}

	value<V>(value: V, type: Serialize<V>): void {
		this.encoder.write(":");
		type.serialize(value, this.encoder);
	}

	field<T>(name: string, value: T, type: Serialize<T>): void {
		this.separate();
		this.encoder.serializeStr(name);
		this.encoder.write(":");
		type.serialize(value, this.encoder);
	}

	end(): void {
		this.encoder.write(this.close);
		this.encoder.leave(this.levels);
	}
}
