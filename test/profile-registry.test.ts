import { describe, expect, it } from "vitest";
import { ModelCatalog } from "../lib/models/model-catalog.js";
import { ProfileRegistry } from "../lib/pool/profile-registry.js";
import type { PushPayload } from "../lib/types.js";
import { uuid7Timestamp } from "../lib/utils/uuid7.js";

function tokens(prefix: string, count: number) {
	return Array.from({ length: count }, (_, index) => ({
		token: `v3-placeholder-${prefix}-${index}-padding`,
		action: "chat_submit",
		ageMs: 0,
	}));
}

function push(profileId: string | undefined, overrides: Partial<PushPayload> = {}): PushPayload {
	return {
		profileId,
		cookies: { "arena-user-id": "user-placeholder-0001" },
		authToken: "test-auth-token",
		cfClearance: "test-clearance",
		primaryTokens: [],
		...overrides,
	};
}

function createRegistry(start = 1_000_000) {
	const clock = { now: start };
	const registry = new ProfileRegistry({
		poolMax: 10,
		credentialLifetimeMs: 110_000,
		staleAfterMs: 120_000,
		now: () => clock.now,
	});
	return { registry, clock };
}

describe("ProfileRegistry", () => {
	it("assigns a time-ordered id to pushes without one", async () => {
		const { registry } = createRegistry();
		const result = await registry.ingestPush(push(undefined));

		expect(result.assigned).toBe(true);
		expect(uuid7Timestamp(result.profileId)).toBe(1_000_000);
		expect(registry.get(result.profileId)).toBeDefined();
	});

	it("reports need_tokens while the pool is under half full", async () => {
		const { registry } = createRegistry();

		const low = await registry.ingestPush(push("a", { primaryTokens: tokens("a", 4) }));
		expect(low).toEqual({ profileId: "a", assigned: false, poolMax: 10, needTokens: true, tokenCount: 4 });

		const enough = await registry.ingestPush(push("a", { primaryTokens: tokens("b", 1) }));
		expect(enough.needTokens).toBe(false);
		expect(enough.tokenCount).toBe(5);
	});

	it("ranks active profiles by health and drops stale ones", async () => {
		const { registry, clock } = createRegistry();
		await registry.ingestPush(push("small", { primaryTokens: tokens("s", 1) }));
		await registry.ingestPush(push("large", { primaryTokens: tokens("l", 3) }));

		expect(registry.listActive().map(({ profile }) => profile.id)).toEqual(["large", "small"]);

		clock.now += 120_000;
		expect(registry.listActive()).toEqual([]);
		expect(registry.isActive("large")).toBe(false);
	});

	it("registers pushed models with the catalog", async () => {
		const clock = { now: 0 };
		const catalog = new ModelCatalog();
		const registry = new ProfileRegistry({ catalog, now: () => clock.now });

		await registry.ingestPush(push("a", { models: [{ name: "gpt-4o", id: "model-1", category: "text" }] }));

		expect(catalog.list()).toEqual([{ name: "gpt-4o", id: "model-1", category: "text", profiles: ["a"] }]);
	});

	it("counts upstream errors against a profile", async () => {
		const { registry } = createRegistry();
		await registry.ingestPush(push("a"));
		registry.recordError("a");
		registry.recordError("missing");

		expect(registry.status()[0].recent_errors).toBe(1);
	});

	it("sweeps expired credentials across profiles", async () => {
		const { registry, clock } = createRegistry();
		await registry.ingestPush(push("a", { primaryTokens: tokens("a", 2) }));
		await registry.ingestPush(push("b", { primaryTokens: tokens("b", 1) }));

		clock.now += 110_000;
		expect(await registry.sweepExpired()).toBe(3);
	});

	it("produces a status snapshot sorted by profile id", async () => {
		const { registry, clock } = createRegistry();
		await registry.ingestPush(push("b", { primaryTokens: tokens("b", 2) }));
		await registry.ingestPush(push("a", { authToken: "", cfClearance: "" }));
		clock.now += 3_000;

		const [first, second] = registry.status();
		expect(first).toEqual({
			profile_id: "a",
			active: true,
			health: 29.25,
			tokens: 0,
			has_fallback_token: false,
			has_auth: false,
			has_cf_clearance: false,
			last_push_ago_s: 3,
			push_count: 1,
			recent_errors: 0,
			models: 0,
			cookies: ["arena-user-id"],
		});
		expect(second.profile_id).toBe("b");
		expect(second.tokens).toBe(2);
		expect(registry.size).toBe(2);
	});
});
