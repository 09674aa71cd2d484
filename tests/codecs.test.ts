import { describe } from "vitest";
import * as z from "zod";
import {
	createStringCodecFactory,
	createTerseJsonBinaryCodec,
	createTerseJsonCodec,
	createTypedBinaryCodec,
	createTypedCodec,
	isBinaryCodec,
	isStringCodec,
	readOrIssue,
	TerseJsonBinaryCodec,
	TerseJsonCodec,
} from "../src/codecs/index.js";
import { decode } from "../src/decoder/index.js";
import * as t from "../src/schema.js";

describe("TerseJsonCodec", (it) => {
	it("should encode dynamic values", ({ expect }) => {
		expect(TerseJsonCodec.encode({ ok: true, n: [1, 2] })).toBe(
			'{"ok":1,"n":[1,2]}',
		);
	});

	it("should decode dynamic values", ({ expect }) => {
		expect(TerseJsonCodec.decode('{"a":"b","c":null}')).toEqual({
			a: "b",
			c: null,
		});
	});

	it("should turn decode errors into issues", ({ expect }) => {
		const result = TerseJsonCodec.safeDecode("{");
		expect(result.success).toBe(false);
		if (!result.success) {
			expect(result.error.issues[0]?.code).toBe("invalid_format");
			expect(result.error.issues[0]?.message).toBe(
				"unexpected end of input at offset 1",
			);
		}
	});

	it("should use a custom error message", ({ expect }) => {
		const codec = createTerseJsonCodec(z.unknown(), {
			errorMessage: "bad payload",
		});
		const result = codec.safeDecode("[1,]");
		expect(result.success).toBe(false);
		if (!result.success) {
			expect(result.error.issues[0]?.message).toBe("bad payload");
		}
	});

	it("should validate against the schema", ({ expect }) => {
		const codec = createTerseJsonCodec(z.object({ count: z.number() }));
		expect(codec.decode('{"count":3}')).toEqual({ count: 3 });
		expect(codec.safeDecode('{"count":"3"}').success).toBe(false);
	});
});

describe("TerseJsonBinaryCodec", (it) => {
	it("should encode to UTF-8 bytes", ({ expect }) => {
		expect(TerseJsonBinaryCodec.encode([1, "é"])).toEqual(
			new Uint8Array([0x5b, 0x31, 0x2c, 0x22, 0xc3, 0xa9, 0x22, 0x5d]),
		);
	});

	it("should decode UTF-8 bytes", ({ expect }) => {
		const codec = createTerseJsonBinaryCodec(z.array(z.string()));
		const bytes = new Uint8Array(new TextEncoder().encode('["x","y"]'));
		expect(codec.decode(bytes)).toEqual(["x", "y"]);
	});

	it("should report invalid UTF-8", ({ expect }) => {
		const result = TerseJsonBinaryCodec.safeDecode(
			new Uint8Array([0x22, 0xff, 0x22]),
		);
		expect(result.success).toBe(false);
		if (!result.success) {
			expect(result.error.issues[0]?.message).toBe("input is not valid UTF-8");
		}
	});
});

describe("createTypedCodec", (it) => {
	const Reading = t.struct("Reading", {
		id: t.u64,
		ok: t.bool,
		raw: t.bytes,
	});
	const ReadingSchema = z.object({
		id: z.bigint(),
		ok: z.boolean(),
		raw: z.custom<Uint8Array>((value) => value instanceof Uint8Array),
	});
	const ReadingCodec = createTypedCodec(ReadingSchema, Reading);

	it("should encode with the wire type", ({ expect }) => {
		expect(
			ReadingCodec.encode({ id: 7n, ok: true, raw: new Uint8Array([0xff]) }),
		).toBe('{"id":"7","ok":1,"raw":"_w=="}');
	});

	it("should decode with the wire type and validate", ({ expect }) => {
		expect(ReadingCodec.decode('{"id":"7","ok":0,"raw":"_w=="}')).toEqual({
			id: 7n,
			ok: false,
			raw: new Uint8Array([0xff]),
		});
	});

	it("should run schema refinements after decoding", ({ expect }) => {
		const Positive = createTypedCodec(z.number().positive(), t.i32);
		expect(Positive.decode("5")).toBe(5);
		expect(Positive.safeDecode("-5").success).toBe(false);
	});

	it("should pass decoder options through", ({ expect }) => {
		const Nested = createTypedCodec(
			z.array(z.array(z.number())),
			t.array(t.array(t.u8)),
			{ decoder: { maxDepth: 1 } },
		);
		const result = Nested.safeDecode("[[1]]");
		expect(result.success).toBe(false);
		if (!result.success) {
			expect(result.error.issues[0]?.message).toBe(
				"nesting exceeds the depth limit of 1 at offset 2",
			);
		}
	});

	it("should encode and decode bytes with the wire type", ({ expect }) => {
		const ReadingBytes = createTypedBinaryCodec(ReadingSchema, Reading);
		const bytes = ReadingBytes.encode({
			id: 1n,
			ok: true,
			raw: new Uint8Array(0),
		});
		expect(new TextDecoder().decode(bytes)).toBe('{"id":"1","ok":1,"raw":""}');
		expect(ReadingBytes.decode(bytes)).toEqual({
			id: 1n,
			ok: true,
			raw: new Uint8Array(0),
		});
	});
});

describe("Codec factories", (it) => {
	it("should wrap any string serializer", ({ expect }) => {
		const createUpperCodec = createStringCodecFactory({
			name: "upper",
			write: (value) => String(value).toUpperCase(),
			read: (text) => text.toLowerCase(),
		});
		const codec = createUpperCodec(z.string());
		expect(codec.encode("abc")).toBe("ABC");
		expect(codec.decode("ABC")).toBe("abc");
	});

	it("should report the format of a failed read", ({ expect }) => {
		const createStrictCodec = createStringCodecFactory({
			name: "strict",
			write: String,
			read: () => {
				throw "not an error";
			},
		});
		const result = createStrictCodec(z.string()).safeDecode("abc");
		expect(result.success).toBe(false);
		if (!result.success) {
			expect(result.error.issues[0]?.code).toBe("invalid_format");
			expect(result.error.issues[0]?.message).toBe("Invalid strict");
		}
	});

	it("should collect read failures on the parse context", ({ expect }) => {
		const read = readOrIssue((text: string) => decode(text, t.u8), "terse_json");
		const ctx: Pick<z.core.ParsePayload, "issues"> = { issues: [] };
		expect(read("7", ctx)).toBe(7);
		expect(ctx.issues).toEqual([]);
		read("300", ctx);
		expect(ctx.issues).toEqual([
			{
				code: "invalid_format",
				format: "terse_json",
				input: "300",
				message:
					"parse int error: number too large to fit in target type at offset 0",
			},
		]);
	});

	it("should tell string codecs from binary codecs", ({ expect }) => {
		expect(isStringCodec(TerseJsonCodec)).toBe(true);
		expect(isBinaryCodec(TerseJsonCodec)).toBe(false);
		expect(isBinaryCodec(TerseJsonBinaryCodec)).toBe(true);
	});
});
