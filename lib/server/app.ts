import { randomUUID } from "node:crypto";
import { Hono, type MiddlewareHandler } from "hono";
import { cors } from "hono/cors";
import { BRIDGE_HEADERS } from "../constants.js";
import { BridgeError, internalErrorBody, toErrorMessage, type ErrorBody } from "../errors.js";
import { logDebug, logError, logWarn } from "../logger.js";
import type { BridgeContext, BridgeEnv } from "./context.js";
import { createChatRoutes } from "./routes/chat.js";
import { createExtensionRoutes } from "./routes/extension.js";
import { createModelRoutes } from "./routes/models.js";
import { createStatusRoutes } from "./routes/status.js";

const INCOMING_REQUEST_ID = /^[\w.:-]{1,128}$/;

/**
 * Tags every request with an id (the caller's X-Request-Id when usable) and
 * echoes it on the response, error responses included.
 */
function requestIdMiddleware(): MiddlewareHandler<BridgeEnv> {
	return async (c, next) => {
		const incoming = c.req.header(BRIDGE_HEADERS.REQUEST_ID);
		const requestId = incoming && INCOMING_REQUEST_ID.test(incoming) ? incoming : randomUUID();
		const startedAt = Date.now();
		c.set("requestId", requestId);

		await next();

		c.res.headers.set(BRIDGE_HEADERS.REQUEST_ID, requestId);
		logDebug(`${c.req.method} ${c.req.path} ${c.res.status}`, {
			requestId,
			durationMs: Date.now() - startedAt,
		});
	};
}

function jsonError(body: ErrorBody, status: number, requestId: string | undefined): Response {
	const headers = new Headers({ "content-type": "application/json; charset=utf-8" });
	if (requestId) {
		headers.set(BRIDGE_HEADERS.REQUEST_ID, requestId);
	}
	return new Response(JSON.stringify(body), { status, headers });
}

/**
 * HTTP surface: OpenAI-compatible routes, the extension push channel and
 * status endpoints.
 */
export function createApp(ctx: BridgeContext): Hono<BridgeEnv> {
	const app = new Hono<BridgeEnv>();

	app.use("*", requestIdMiddleware());
	app.use("*", cors());

	app.route("/", createStatusRoutes(ctx));
	app.route("/", createExtensionRoutes(ctx));
	app.route("/", createModelRoutes(ctx));
	app.route("/", createChatRoutes(ctx));

	app.notFound((c) => {
		const error = new BridgeError(`No route for ${c.req.method} ${c.req.path}`, {
			status: 404,
			type: "not_found_error",
			code: "route_not_found",
		});
		return jsonError(error.toBody(), error.status, c.get("requestId"));
	});

	app.onError((error, c) => {
		const requestId = c.get("requestId");
		if (error instanceof BridgeError) {
			const log = error.status >= 500 ? logError : logWarn;
			log(`${c.req.method} ${c.req.path} failed: ${error.message}`, {
				requestId,
				status: error.status,
				code: error.code,
			});
			return jsonError(error.toBody(), error.status, requestId);
		}
		logError(`Unhandled error on ${c.req.method} ${c.req.path}`, {
			requestId,
			error: toErrorMessage(error),
			stack: error.stack,
		});
		return jsonError(internalErrorBody(), 500, requestId);
	});

	return app;
}
