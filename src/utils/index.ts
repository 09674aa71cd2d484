/**
 * Utility Exports
 */

export { decodeBase64Url, encodeBase64Url } from "./base64.js";
export { formatF32, formatF64, parseFloatLiteral } from "./float.js";
export {
	checkInteger,
	INTEGER_BOUNDS,
	type IntegerBounds,
	type IntegerKind,
	parseInteger,
} from "./integer.js";
