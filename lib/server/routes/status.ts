import { Hono } from "hono";
import { SERVICE_VERSION } from "../../constants.js";
import type { ProfileStatus } from "../../types.js";
import { requireApiKey } from "../auth.js";
import type { BridgeContext, BridgeEnv } from "../context.js";

export interface StatusSnapshot {
	status: "ok";
	version: string;
	pool_max: number;
	active_profiles: number;
	total_profiles: number;
	total_tokens: number;
	models: number;
	profiles: ProfileStatus[];
}

/**
 * Per-profile diagnostics plus totals
 */
export function buildStatusSnapshot(ctx: BridgeContext): StatusSnapshot {
	const profiles = ctx.registry.status(ctx.now());
	const active = profiles.filter((profile) => profile.active);
	return {
		status: "ok",
		version: SERVICE_VERSION,
		pool_max: ctx.registry.poolMax,
		active_profiles: active.length,
		total_profiles: profiles.length,
		total_tokens: active.reduce((sum, profile) => sum + profile.tokens, 0),
		models: ctx.catalog.list().length,
		profiles,
	};
}

export function createStatusRoutes(ctx: BridgeContext): Hono<BridgeEnv> {
	const routes = new Hono<BridgeEnv>();

	const health = () => ({
		status: "ok",
		version: SERVICE_VERSION,
		active_profiles: ctx.registry.listActive(ctx.now()).length,
	});

	routes.get("/", (c) => c.json(health()));
	routes.get("/health", (c) => c.json(health()));
	routes.get("/admin/status", requireApiKey(ctx.config.apiKeys), (c) => c.json(buildStatusSnapshot(ctx)));

	return routes;
}
