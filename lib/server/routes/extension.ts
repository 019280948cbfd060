import { Hono } from "hono";
import { LOG_STAGES } from "../../constants.js";
import { logInfo, logRequest } from "../../logger.js";
import { requireExtensionSecret } from "../auth.js";
import type { BridgeContext, BridgeEnv } from "../context.js";
import { parsePushBody, readJsonBody } from "../schemas.js";
import { buildStatusSnapshot } from "./status.js";

/**
 * Channel the browser extensions use to hand over session material and
 * challenge tokens.
 */
export function createExtensionRoutes(ctx: BridgeContext): Hono<BridgeEnv> {
	const routes = new Hono<BridgeEnv>();
	const guard = requireExtensionSecret(ctx.config.extensionSecret);

	routes.post("/v1/extension/push", guard, async (c) => {
		const requestId = c.get("requestId");
		// validated before the registry is touched: a malformed push leaves its profile as it was
		const payload = parsePushBody(await readJsonBody(c.req));
		const result = await ctx.registry.ingestPush(payload);

		logRequest(LOG_STAGES.PUSH, {
			requestId,
			profileId: result.profileId,
			offeredTokens: payload.primaryTokens.length,
			fallbackOffered: payload.fallbackToken !== undefined,
			models: payload.models?.length ?? 0,
			tokenCount: result.tokenCount,
			needTokens: result.needTokens,
		});
		if (result.assigned) {
			logInfo("Registered new profile", { requestId, profileId: result.profileId });
		}

		return c.json({
			status: "ok",
			pool_max: result.poolMax,
			profile_id: result.profileId,
			need_tokens: result.needTokens,
			v3_count: result.tokenCount,
		});
	});

	routes.get("/v1/extension/status", guard, (c) => c.json(buildStatusSnapshot(ctx)));

	return routes;
}
