import { Hono } from "hono";
import { ERROR_MESSAGES } from "../../constants.js";
import { ModelNotFoundError, ServiceUnavailableError } from "../../errors.js";
import { logDebug, logInfo, logWarn } from "../../logger.js";
import { buildUpstreamRequest } from "../../request/request-builder.js";
import { collectChatCompletion, streamChatCompletion, type UpstreamExchange } from "../../request/response-handler.js";
import { createIdleTimeout, sendUpstreamRequest } from "../../request/upstream-client.js";
import { requireApiKey } from "../auth.js";
import type { BridgeContext, BridgeEnv } from "../context.js";
import { parseChatRequest, readJsonBody } from "../schemas.js";

/**
 * POST /v1/chat/completions
 *
 * Admission comes before everything that touches the upstream: with no active
 * profile the request is refused without a credential being consumed. One
 * credential is taken per request and never retried.
 */
export function createChatRoutes(ctx: BridgeContext): Hono<BridgeEnv> {
	const routes = new Hono<BridgeEnv>();

	routes.post("/v1/chat/completions", requireApiKey(ctx.config.apiKeys), async (c) => {
		const requestId = c.get("requestId");
		const request = parseChatRequest(await readJsonBody(c.req));

		if (!ctx.dispatcher.hasActiveProfile()) {
			throw new ServiceUnavailableError(ERROR_MESSAGES.NO_ACTIVE_PROFILE);
		}

		const resolution = ctx.catalog.resolve(request.model);
		if (!resolution.found) {
			logWarn("Unknown model requested", { requestId, model: request.model });
			throw new ModelNotFoundError(request.model, resolution.available);
		}
		const model = resolution.entry;
		if (!resolution.exact) {
			logInfo("Resolved model by similarity", { requestId, requested: request.model, resolved: model.name });
		}

		const lease = await ctx.dispatcher.acquire({ requestId, profileIds: model.profiles });
		const profileId = lease.profile.id;
		const upstream = buildUpstreamRequest({
			session: lease.profile,
			credential: lease.credential,
			messages: request.messages,
			model,
			baseUrl: ctx.config.upstreamBaseUrl,
			now: ctx.now(),
		});

		const cancellation = new AbortController();
		const clientSignal = c.req.raw.signal;
		const onClientAbort = () => cancellation.abort(clientSignal.reason);
		clientSignal.addEventListener("abort", onClientAbort, { once: true });
		const timeout = createIdleTimeout(ctx.config.upstreamTimeoutMs, cancellation.signal);
		// only a client disconnect or stream cancel aborts this controller
		const clientGone = () => cancellation.signal.aborted;
		const recordFailure = () => ctx.registry.recordError(profileId);

		let response: Response;
		try {
			response = await sendUpstreamRequest(upstream, {
				requestId,
				profileId,
				signal: timeout.signal,
				fetchImpl: ctx.fetchImpl,
			});
		} catch (error) {
			timeout.clear();
			clientSignal.removeEventListener("abort", onClientAbort);
			if (clientGone()) {
				logDebug("Client disconnected before the upstream answered", { requestId, profileId });
			} else {
				recordFailure();
			}
			throw error;
		}

		const exchange: UpstreamExchange = {
			response,
			timeout,
			translation: {
				id: `chatcmpl-${upstream.evaluationId}`,
				created: Math.floor(ctx.now() / 1000),
				model: model.name,
				reasoningMode: ctx.config.reasoningMode,
			},
			requestId,
			profileId,
			cancel: () => cancellation.abort(),
			clientGone,
			onFailure: recordFailure,
		};

		if (request.stream) {
			return streamChatCompletion(c, exchange);
		}
		try {
			return c.json(await collectChatCompletion(exchange));
		} finally {
			clientSignal.removeEventListener("abort", onClientAbort);
		}
	});

	return routes;
}
