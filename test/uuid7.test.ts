import { describe, expect, it } from "vitest";
import { uuid7, uuid7Timestamp } from "../lib/utils/uuid7.js";

describe("uuid7", () => {
	it("has the version 7 layout", () => {
		expect(uuid7()).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-7[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
	});

	it("encodes the millisecond timestamp in the first 48 bits", () => {
		const id = uuid7(1_700_000_000_123);

		expect(id.slice(0, 13)).toBe("018bcfe5-687b");
		expect(uuid7Timestamp(id)).toBe(1_700_000_000_123);
	});

	it("sorts by creation time", () => {
		const earlier = uuid7(1_000);
		const later = uuid7(2_000);
		expect(earlier < later).toBe(true);
	});
});
