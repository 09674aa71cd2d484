import { describe } from "vitest";
import {
	Encoder,
	encode,
	encodeBytes,
	encodeInto,
	type OutputSink,
	quoteString,
	StringSink,
} from "../src/encoder/index.js";
import {
	CustomError,
	DepthLimitError,
	NotANumberError,
} from "../src/errors.js";
import * as t from "../src/schema.js";
import type { Serialize } from "../src/traversal.js";

const Test = t.struct("Test", { int: t.u32, seq: t.array(t.string) });

class RecordingSink implements OutputSink {
	readonly fragments: string[] = [];

	write(fragment: string): void {
		this.fragments.push(fragment);
	}
}

describe("encode", (it) => {
	it("should encode a struct with no whitespace", ({ expect }) => {
		expect(encode({ int: 1, seq: ["a", "b"] }, Test)).toBe(
			'{"int":1,"seq":["a","b"]}',
		);
	});

	it("should write fields in declaration order", ({ expect }) => {
		const Pair = t.struct("Pair", { b: t.u8, a: t.u8 });
		expect(encode({ a: 1, b: 2 }, Pair)).toBe('{"b":2,"a":1}');
	});

	it("should encode booleans as 1 and 0", ({ expect }) => {
		expect(encode(true, t.bool)).toBe("1");
		expect(encode(false, t.bool)).toBe("0");
	});

	it("should encode unit and none as null", ({ expect }) => {
		expect(encode(null, t.unit)).toBe("null");
		expect(encode(null, t.option(t.u8))).toBe("null");
		expect(encode(3, t.option(t.u8))).toBe("3");
	});
});

describe("Integers", (it) => {
	it("should write narrow integers bare and wide integers quoted", ({
		expect,
	}) => {
		expect(encode(4294967295, t.u32)).toBe("4294967295");
		expect(encode(18446744073709551615n, t.u64)).toBe(
			'"18446744073709551615"',
		);
		expect(encode(-5n, t.i128)).toBe('"-5"');
	});

	it("should reject values outside the range", ({ expect }) => {
		expect(() => encode(256, t.u8)).toThrow(
			new CustomError("invalid value: 256 is out of range for u8"),
		);
		expect(() => encode(-1n, t.u64)).toThrow(
			new CustomError("invalid value: -1 is out of range for u64"),
		);
	});

	it("should reject non-integers", ({ expect }) => {
		expect(() => encode(1.5, t.i32)).toThrow(
			new CustomError("invalid value: 1.5 is not an integer (i32)"),
		);
	});
});

describe("Floats", (it) => {
	it("should write the shortest round-trip form", ({ expect }) => {
		expect(encode(1.5, t.f64)).toBe("1.5");
		expect(encode(0.1, t.f64)).toBe("0.1");
		expect(encode(1e21, t.f64)).toBe("1e+21");
		expect(encode(-0, t.f64)).toBe("-0");
	});

	it("should write f32 values with single-precision digits", ({ expect }) => {
		expect(encode(0.1, t.f32)).toBe("0.1");
		expect(encode(16777217, t.f32)).toBe("16777216");
	});

	it("should refuse NaN and infinities", ({ expect }) => {
		expect(() => encode(Number.NaN, t.f64)).toThrow(NotANumberError);
		expect(() => encode(Number.NaN, t.f64)).toThrow("cannot encode NaN");
		expect(() => encode(Number.POSITIVE_INFINITY, t.f32)).toThrow(
			"cannot encode Infinity",
		);
	});

	it("should refuse doubles that overflow a single", ({ expect }) => {
		expect(() => encode(1e39, t.f32)).toThrow(
			new NotANumberError(Number.POSITIVE_INFINITY),
		);
		expect(() => encode(-1e39, t.f32)).toThrow("cannot encode -Infinity");
		expect(() => encode(new Map([[1e39, 1]]), t.map(t.f32, t.u8))).toThrow(
			new NotANumberError(Number.POSITIVE_INFINITY),
		);
		expect(encode(1e39, t.f64)).toBe("1e+39");
	});
});

describe("Strings", (it) => {
	it("should escape quote, backslash, slash and controls", ({ expect }) => {
		expect(quoteString('a"b\\c/d')).toBe('"a\\"b\\\\c\\/d"');
		expect(quoteString("\b\f\n\r\t")).toBe('"\\b\\f\\n\\r\\t"');
		expect(quoteString("\u0001\u001f\u007f")).toBe('"\\u0001\\u001f\\u007f"');
	});

	it("should write non-ASCII text as is", ({ expect }) => {
		expect(encode("héllo ☃ 😀", t.string)).toBe(
			'"héllo ☃ 😀"',
		);
	});

	it("should reject a lone surrogate", ({ expect }) => {
		expect(() => encode("a\ud800", t.string)).toThrow(
			new CustomError(
				"invalid value: string contains a lone surrogate \\ud800",
			),
		);
	});

	it("should encode a char", ({ expect }) => {
		expect(encode("é", t.char)).toBe('"é"');
		expect(() => encode("ab", t.char)).toThrow(
			new CustomError('invalid value: string "ab", expected a character'),
		);
	});
});

describe("Bytes", (it) => {
	it("should write URL-safe base64 with padding", ({ expect }) => {
		const bytes = new TextEncoder().encode("bytes test");
		expect(encode(bytes, t.bytes)).toBe('"Ynl0ZXMgdGVzdA=="');
		expect(encode(new Uint8Array([0xfb, 0xff]), t.bytes)).toBe('"-_8="');
		expect(encode(new Uint8Array(0), t.bytes)).toBe('""');
	});
});

describe("Map keys", (it) => {
	it("should quote integer and boolean keys", ({ expect }) => {
		const scores = new Map([
			[1, "a"],
			[20, "b"],
		]);
		expect(encode(scores, t.map(t.u32, t.string))).toBe('{"1":"a","20":"b"}');
		expect(encode(new Map([[true, 7]]), t.map(t.bool, t.u8))).toBe('{"1":7}');
		expect(encode(new Map([[9n, 1]]), t.map(t.u64, t.u8))).toBe('{"9":1}');
	});

	it("should write unit variant keys as their tag", ({ expect }) => {
		const Color = t.enumeration("Color", {
			Red: t.variant.unit(),
			Blue: t.variant.unit(),
		});
		const palette = new Map<t.Infer<typeof Color>, number>([
			[{ tag: "Blue" }, 2],
		]);
		expect(encode(palette, t.map(Color, t.u8))).toBe('{"Blue":2}');
	});

	it("should reject compound keys", ({ expect }) => {
		const grid = new Map([[[1, 2], 3]]);
		expect(() => encode(grid, t.map(t.array(t.u8), t.u8))).toThrow(
			new CustomError("key must be a string"),
		);
	});
});

describe("Depth limit", (it) => {
	it("should stop a cyclic value", ({ expect }) => {
		const cycle: unknown[] = [];
		cycle.push(cycle);
		expect(() => encode(cycle, t.unknown)).toThrow(new DepthLimitError(128));
	});

	it("should honour a configured limit", ({ expect }) => {
		const Nested = t.array(t.array(t.u8));
		expect(encode([[1]], Nested, { maxDepth: 2 })).toBe("[[1]]");
		expect(() => encode([[1]], Nested, { maxDepth: 1 })).toThrow(
			DepthLimitError,
		);
	});
});

describe("Sinks", (it) => {
	it("should write fragments in order", ({ expect }) => {
		const sink = new RecordingSink();
		encodeInto([1, 2], t.array(t.u8), sink);
		expect(sink.fragments).toEqual(["[", "1", ",", "2", "]"]);
	});

	it("should leave a truncated document on failure", ({ expect }) => {
		const sink = new StringSink();
		expect(() =>
			encodeInto([1, Number.NaN], t.array(t.f64), sink),
		).toThrow(NotANumberError);
		expect(sink.toString()).toBe("[1,");
	});

	it("should encode to UTF-8 bytes", ({ expect }) => {
		expect(encodeBytes("hé", t.string)).toEqual(
			new Uint8Array([0x22, 0x68, 0xc3, 0xa9, 0x22]),
		);
	});
});

describe("Encoder", (it) => {
	it("should drive compounds by hand", ({ expect }) => {
		const sink = new StringSink();
		const encoder = new Encoder(sink);
		const seq = encoder.serializeSeq();
		seq.element(1, t.u8);
		seq.element("x", t.string);
		seq.end();
		expect(sink.toString()).toBe('[1,"x"]');
	});

	it("should accept a hand-written Serialize", ({ expect }) => {
		interface Point {
			x: number;
			y: number;
		}
		const PointType: Serialize<Point> = {
			serialize(value, serializer) {
				const out = serializer.serializeStruct("Point", 2);
				out.field("x", value.x, t.i32);
				out.field("y", value.y, t.i32);
				out.end();
			},
		};
		expect(encode({ x: 1, y: -2 }, PointType)).toBe('{"x":1,"y":-2}');
	});
});
