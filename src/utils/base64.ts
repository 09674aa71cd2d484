/**
 * URL-safe Base64
 *
 * Encodes with `=` padding; decodes padded or unpadded input and rejects
 * characters outside the URL-safe alphabet and non-canonical trailing bits.
 */

import { Base64DecodeError } from "../errors.js";

const URL_SAFE = /^[A-Za-z0-9_-]*$/;

export function encodeBase64Url(bytes: Uint8Array): string {
	const text = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength)
		.toString("base64url");
	const padding = (4 - (text.length % 4)) % 4;
	return text + "=".repeat(padding);
}

/**
 * @param offset - Position of the encoded text in the input, for errors
 * @throws Base64DecodeError on anything but canonical URL-safe base64
 */
export function decodeBase64Url(
	text: string,
	offset?: number,
): Uint8Array<ArrayBuffer> {
	const body = text.replace(/={1,2}$/, "");
	if (body.length !== text.length && text.length % 4 !== 0) {
		throw new Base64DecodeError("invalid padding", offset);
	}
	if (!URL_SAFE.test(body)) {
		throw new Base64DecodeError("invalid character", offset);
	}
	if (body.length % 4 === 1) {
		throw new Base64DecodeError("invalid length", offset);
	}
	const decoded = Buffer.from(body, "base64url");
	if (decoded.toString("base64url") !== body) {
		throw new Base64DecodeError("invalid last symbol", offset);
	}
	const bytes = new Uint8Array(decoded.byteLength);
	bytes.set(decoded);
	return bytes;
}
