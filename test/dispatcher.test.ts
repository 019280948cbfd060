import { describe, expect, it, vi } from "vitest";
import { ERROR_MESSAGES } from "../lib/constants.js";
import { Dispatcher } from "../lib/dispatch/dispatcher.js";
import { ServiceUnavailableError } from "../lib/errors.js";
import { ProfileRegistry } from "../lib/pool/profile-registry.js";
import type { PushPayload } from "../lib/types.js";

vi.mock("../lib/logger.js", () => ({
	__esModule: true,
	logRequest: vi.fn(),
	logWarn: vi.fn(),
}));

function tokens(prefix: string, count: number) {
	return Array.from({ length: count }, (_, index) => ({
		token: `v3-placeholder-${prefix}-${index}-padding`,
		action: "chat_submit",
		ageMs: 0,
	}));
}

function push(profileId: string, overrides: Partial<PushPayload> = {}): PushPayload {
	return { profileId, cookies: {}, authToken: "", cfClearance: "", primaryTokens: [], ...overrides };
}

function setup() {
	const clock = { now: 1_000_000 };
	const registry = new ProfileRegistry({ poolMax: 10, now: () => clock.now });
	const dispatcher = new Dispatcher(registry, () => clock.now);
	return { registry, dispatcher, clock };
}

describe("Dispatcher", () => {
	it("rejects when no profile is active", async () => {
		const { dispatcher } = setup();

		expect(dispatcher.hasActiveProfile()).toBe(false);
		await expect(dispatcher.acquire({ requestId: "req-1" })).rejects.toThrow(
			new ServiceUnavailableError(ERROR_MESSAGES.NO_ACTIVE_PROFILE),
		);
	});

	it("takes a credential from the healthiest profile", async () => {
		const { registry, dispatcher } = setup();
		await registry.ingestPush(push("small", { primaryTokens: tokens("s", 1) }));
		await registry.ingestPush(push("large", { primaryTokens: tokens("l", 2) }));

		const lease = await dispatcher.acquire({ requestId: "req-1" });

		expect(lease.profile.id).toBe("large");
		expect(lease.credential.value).toBe("v3-placeholder-l-0-padding");
		expect(lease.attempts).toBe(1);
		expect(registry.get("large")?.pool.size()).toBe(1);
	});

	it("moves on when the best ranked profile is exhausted", async () => {
		const { registry, dispatcher } = setup();
		// auth material outranks a single token, but there is nothing to take
		await registry.ingestPush(push("empty", { authToken: "test-auth", cfClearance: "test-cf" }));
		await registry.ingestPush(push("stocked", { primaryTokens: tokens("t", 1) }));

		const lease = await dispatcher.acquire({ requestId: "req-1" });

		expect(lease.profile.id).toBe("stocked");
		expect(lease.attempts).toBe(2);
	});

	it("only considers the profiles it is given", async () => {
		const { registry, dispatcher } = setup();
		await registry.ingestPush(push("a", { primaryTokens: tokens("a", 3) }));
		await registry.ingestPush(push("b", { primaryTokens: tokens("b", 1) }));

		const lease = await dispatcher.acquire({ requestId: "req-1", profileIds: ["b"] });
		expect(lease.profile.id).toBe("b");

		await expect(dispatcher.acquire({ requestId: "req-2", profileIds: ["missing"] })).rejects.toThrow(
			ERROR_MESSAGES.NO_PROFILE_FOR_MODEL,
		);
	});

	it("reports exhaustion when every pool is empty", async () => {
		const { registry, dispatcher } = setup();
		await registry.ingestPush(push("a"));
		await registry.ingestPush(push("b"));

		await expect(dispatcher.acquire({ requestId: "req-1" })).rejects.toThrow(ERROR_MESSAGES.POOLS_EXHAUSTED);
	});

	it("hands each credential to at most one of many concurrent requests", async () => {
		const { registry, dispatcher } = setup();
		await registry.ingestPush(push("a", { primaryTokens: tokens("a", 2) }));
		await registry.ingestPush(push("b", { primaryTokens: tokens("b", 1) }));

		const results = await Promise.allSettled(
			Array.from({ length: 5 }, (_, index) => dispatcher.acquire({ requestId: `req-${index}` })),
		);

		const values = results.flatMap((result) => (result.status === "fulfilled" ? [result.value.credential.value] : []));
		expect(values).toHaveLength(3);
		expect(new Set(values).size).toBe(3);
		expect(results.filter((result) => result.status === "rejected")).toHaveLength(2);
	});

	it("stops dispatching to profiles that went stale", async () => {
		const { registry, dispatcher, clock } = setup();
		await registry.ingestPush(push("a", { primaryTokens: tokens("a", 1) }));
		clock.now += 120_000;

		await expect(dispatcher.acquire({ requestId: "req-1" })).rejects.toThrow(ERROR_MESSAGES.NO_ACTIVE_PROFILE);
	});
});
