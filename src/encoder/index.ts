/**
 * Encoder Exports
 */

export { Compound } from "./compound.js";
export {
	Encoder,
	encode,
	encodeBytes,
	encodeInto,
	quoteString,
} from "./encoder.js";
export { KeySerializer } from "./key.js";
export { type OutputSink, StringSink } from "./sink.js";
