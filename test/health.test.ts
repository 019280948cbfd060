import { describe, expect, it } from "vitest";
import { compareRanked, healthScore } from "../lib/pool/health.js";
import { Profile } from "../lib/pool/profile.js";
import type { PushPayload } from "../lib/types.js";

const STALE_AFTER = 120_000;

function makeProfile(id: string, overrides: Partial<PushPayload> = {}, tokens = 0, at = 0): Profile {
	const profile = new Profile(id, { maxSize: 10, lifetimeMs: 110_000 });
	profile.merge(
		{
			cookies: {},
			authToken: "",
			cfClearance: "",
			primaryTokens: Array.from({ length: tokens }, (_, index) => ({
				token: `v3-placeholder-${id}-${index}-padding`,
				action: "chat_submit",
				ageMs: 0,
			})),
			...overrides,
		},
		at,
	);
	return profile;
}

describe("healthScore", () => {
	it("adds up tokens, freshness and session material", () => {
		const profile = makeProfile("a", { authToken: "test-auth", cfClearance: "test-cf" }, 2);

		expect(healthScore(profile, 0, STALE_AFTER)).toBe(70);
		expect(healthScore(profile, 60_000, STALE_AFTER)).toBe(55);
	});

	it("increases with pool size", () => {
		const fewer = makeProfile("a", {}, 1);
		const more = makeProfile("b", {}, 3);
		expect(healthScore(more, 0, STALE_AFTER)).toBeGreaterThan(healthScore(fewer, 0, STALE_AFTER));
	});

	it("increases with push recency", () => {
		const older = makeProfile("a", {}, 1, 0);
		const newer = makeProfile("b", {}, 1, 30_000);
		expect(healthScore(newer, 40_000, STALE_AFTER)).toBeGreaterThan(healthScore(older, 40_000, STALE_AFTER));
	});

	it("increases with auth material", () => {
		const without = makeProfile("a", {}, 1);
		const withAuth = makeProfile("b", { authToken: "test-auth" }, 1);
		expect(healthScore(withAuth, 0, STALE_AFTER)).toBeGreaterThan(healthScore(without, 0, STALE_AFTER));
	});

	it("decreases with recent upstream errors", () => {
		const profile = makeProfile("a", { authToken: "test-auth" }, 2);
		const before = healthScore(profile, 0, STALE_AFTER);
		profile.recordError(0);
		expect(healthScore(profile, 0, STALE_AFTER)).toBeLessThan(before);
	});

	it("gives stale profiles no freshness credit", () => {
		const profile = makeProfile("a");
		expect(healthScore(profile, STALE_AFTER * 2, STALE_AFTER)).toBe(0);
	});
});

describe("compareRanked", () => {
	it("orders by score, then by profile id", () => {
		const ranked = [
			{ profile: makeProfile("c"), score: 10 },
			{ profile: makeProfile("b"), score: 20 },
			{ profile: makeProfile("a"), score: 10 },
		].sort(compareRanked);

		expect(ranked.map((entry) => entry.profile.id)).toEqual(["b", "a", "c"]);
	});
});
