import { randomBytes } from "node:crypto";

/**
 * Time-ordered UUID (RFC 9562 version 7): 48-bit millisecond timestamp,
 * version and variant bits, 74 random bits.
 */
export function uuid7(now: number = Date.now()): string {
	const bytes = randomBytes(16);
	let timestamp = Math.max(0, Math.floor(now));
	for (let index = 5; index >= 0; index -= 1) {
		bytes[index] = timestamp % 256;
		timestamp = Math.floor(timestamp / 256);
	}
	bytes[6] = 0x70 | (bytes[6] & 0x0f);
	bytes[8] = 0x80 | (bytes[8] & 0x3f);

	const hex = bytes.toString("hex");
	return `${hex.slice(0, 8)}-${hex.slice(8, 12)}-${hex.slice(12, 16)}-${hex.slice(16, 20)}-${hex.slice(20)}`;
}

/**
 * Millisecond timestamp encoded in a UUIDv7
 */
export function uuid7Timestamp(id: string): number {
	return parseInt(id.replace(/-/g, "").slice(0, 12), 16);
}
