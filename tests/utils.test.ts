import { describe } from "vitest";
import { CustomError, ParseIntError } from "../src/errors.js";
import {
	checkInteger,
	decodeBase64Url,
	encodeBase64Url,
	formatF32,
	formatF64,
	INTEGER_BOUNDS,
	parseFloatLiteral,
	parseInteger,
} from "../src/utils/index.js";

describe("parseInteger", (it) => {
	it("should parse within the bounds of each kind", ({ expect }) => {
		expect(parseInteger("127", "i8")).toBe(127n);
		expect(parseInteger("-128", "i8")).toBe(-128n);
		expect(parseInteger("+5", "u16")).toBe(5n);
		expect(parseInteger("0", "u128")).toBe(0n);
	});

	it("should classify failures", ({ expect }) => {
		expect(() => parseInteger("", "i32")).toThrow(
			new ParseIntError("", "empty"),
		);
		expect(() => parseInteger("-", "i32")).toThrow(
			new ParseIntError("-", "invalid_digit"),
		);
		expect(() => parseInteger("12a", "i32")).toThrow(
			new ParseIntError("12a", "invalid_digit"),
		);
		expect(() => parseInteger("-1", "u8")).toThrow(
			new ParseIntError("-1", "invalid_digit"),
		);
		expect(() => parseInteger("128", "i8")).toThrow(
			new ParseIntError("128", "pos_overflow"),
		);
		expect(() => parseInteger("-129", "i8")).toThrow(
			new ParseIntError("-129", "neg_overflow"),
		);
	});

	it("should expose the bounds", ({ expect }) => {
		expect(INTEGER_BOUNDS.u64.max).toBe(18446744073709551615n);
		expect(INTEGER_BOUNDS.i16.min).toBe(-32768n);
		expect(INTEGER_BOUNDS.u8.signed).toBe(false);
	});
});

describe("checkInteger", (it) => {
	it("should accept values in range", ({ expect }) => {
		expect(() => checkInteger(255, "u8")).not.toThrow();
		expect(() => checkInteger(-1n, "i64")).not.toThrow();
	});

	it("should reject out-of-range and fractional values", ({ expect }) => {
		expect(() => checkInteger(-1, "u32")).toThrow(
			new CustomError("invalid value: -1 is out of range for u32"),
		);
		expect(() => checkInteger(Number.NaN, "i8")).toThrow(
			new CustomError("invalid value: NaN is not an integer (i8)"),
		);
	});
});

describe("Float formatting", (it) => {
	it("should format doubles", ({ expect }) => {
		expect(formatF64(3)).toBe("3");
		expect(formatF64(-0)).toBe("-0");
		expect(formatF64(1.25e-7)).toBe("1.25e-7");
	});

	it("should format singles with their own shortest digits", ({ expect }) => {
		expect(formatF32(Math.fround(0.1))).toBe("0.1");
		expect(formatF32(Math.fround(3.14159))).toBe("3.14159");
		expect(formatF32(-0)).toBe("-0");
	});

	it("should parse literals", ({ expect }) => {
		expect(parseFloatLiteral("1e-3")).toBe(0.001);
		expect(parseFloatLiteral(".5")).toBe(0.5);
		expect(() => parseFloatLiteral("1e")).toThrow(
			'parse float error: invalid float literal "1e"',
		);
		expect(() => parseFloatLiteral("--1")).toThrow(
			'parse float error: invalid float literal "--1"',
		);
	});
});

describe("URL-safe base64", (it) => {
	it("should pad to a multiple of four", ({ expect }) => {
		expect(encodeBase64Url(new Uint8Array([1]))).toBe("AQ==");
		expect(encodeBase64Url(new Uint8Array([1, 2]))).toBe("AQI=");
		expect(encodeBase64Url(new Uint8Array([1, 2, 3]))).toBe("AQID");
	});

	it("should encode a view into a larger buffer", ({ expect }) => {
		const view = new Uint8Array([9, 1, 2, 3, 9]).subarray(1, 4);
		expect(encodeBase64Url(view)).toBe("AQID");
	});

	it("should reject malformed input", ({ expect }) => {
		expect(() => decodeBase64Url("AQ=")).toThrow(
			"base64 decode error: invalid padding",
		);
		expect(() => decodeBase64Url("A")).toThrow(
			"base64 decode error: invalid length",
		);
		expect(() => decodeBase64Url("AQ.=")).toThrow(
			"base64 decode error: invalid character",
		);
	});

	it("should decode into a fresh buffer", ({ expect }) => {
		const bytes = decodeBase64Url("AQID");
		expect(bytes).toEqual(new Uint8Array([1, 2, 3]));
		expect(bytes.byteOffset).toBe(0);
		expect(bytes.buffer.byteLength).toBe(3);
	});
});
