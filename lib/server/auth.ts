import { timingSafeEqual } from "node:crypto";
import type { MiddlewareHandler } from "hono";
import { BRIDGE_HEADERS, ERROR_MESSAGES } from "../constants.js";
import { UnauthorizedError } from "../errors.js";
import { logWarn } from "../logger.js";
import type { BridgeEnv } from "./context.js";

function safeEqual(a: string, b: string): boolean {
	const left = Buffer.from(a);
	const right = Buffer.from(b);
	return left.length === right.length && timingSafeEqual(left, right);
}

/**
 * Client key from `Authorization: Bearer <key>` or `x-api-key`
 */
export function extractApiKey(headers: { get(name: string): string | null | undefined }): string | undefined {
	const authorization = headers.get("authorization");
	if (authorization) {
		const match = /^Bearer\s+(.+)$/i.exec(authorization.trim());
		if (match) {
			return match[1].trim();
		}
	}
	return headers.get(BRIDGE_HEADERS.API_KEY)?.trim() || undefined;
}

/**
 * Guards the OpenAI surface. An empty key list leaves it open.
 */
export function requireApiKey(keys: readonly string[]): MiddlewareHandler<BridgeEnv> {
	return async (c, next) => {
		if (keys.length === 0) {
			return next();
		}
		const presented = extractApiKey(c.req.raw.headers);
		if (!presented || !keys.some((key) => safeEqual(key, presented))) {
			logWarn("Rejected client request: bad API key", { requestId: c.get("requestId"), path: c.req.path });
			throw new UnauthorizedError(ERROR_MESSAGES.INVALID_API_KEY);
		}
		return next();
	};
}

/**
 * Guards the extension endpoints. Without a configured secret they are open.
 */
export function requireExtensionSecret(secret: string | undefined): MiddlewareHandler<BridgeEnv> {
	return async (c, next) => {
		if (!secret) {
			return next();
		}
		const presented = c.req.header(BRIDGE_HEADERS.EXTENSION_SECRET);
		if (!presented || !safeEqual(secret, presented)) {
			logWarn("Rejected extension request: bad secret", { requestId: c.get("requestId"), path: c.req.path });
			throw new UnauthorizedError(ERROR_MESSAGES.INVALID_EXTENSION_SECRET);
		}
		return next();
	};
}
