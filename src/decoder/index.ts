/**
 * Decoder Exports
 */

export { CommaSeparated, IgnoredAny, TaggedVariantAccess } from "./access.js";
export { Decoder, decode, decodeBytes } from "./decoder.js";
export { KeyDecoder, type StrSlice, UnitVariantAccess } from "./key.js";
