#!/usr/bin/env node
/**
 * arena-bridge
 *
 * OpenAI-compatible chat completions on top of browser sessions of a chat
 * platform. Browser extensions push cookies, auth tokens and short-lived
 * challenge tokens; the bridge pools them per profile and spends one token
 * per request on the healthiest profile.
 *
 * INTENDED USE: personal use with accounts you own. You are responsible for
 * complying with the terms of the platform you connect to.
 *
 * @license GPL-3.0-only
 *
 * @example
 * ```sh
 * PORT=9090 API_KEYS=test-key arena-bridge
 * curl -H "Authorization: Bearer test-key" http://localhost:9090/v1/models
 * ```
 */

import { realpathSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { serve, type ServerType } from "@hono/node-server";
import { loadServerConfig } from "./lib/config.js";
import { SERVICE_NAME, SERVICE_VERSION } from "./lib/constants.js";
import { toErrorMessage } from "./lib/errors.js";
import { configureLogger, logDebug, logError, logInfo } from "./lib/logger.js";
import { createApp } from "./lib/server/app.js";
import { createBridgeContext, type BridgeContext } from "./lib/server/context.js";
import type { ServerConfig } from "./lib/types.js";

export { createApp } from "./lib/server/app.js";
export { createBridgeContext } from "./lib/server/context.js";
export { loadServerConfig } from "./lib/config.js";
export type { ServerConfig } from "./lib/types.js";

export interface RunningBridge {
	context: BridgeContext;
	server: ServerType;
	/** Stop the sweep timer and close the listener */
	close(): Promise<void>;
}

/**
 * Start the HTTP server and the periodic credential sweep
 */
export function startServer(config: ServerConfig = loadServerConfig()): RunningBridge {
	configureLogger({ logging: config.logging });

	const context = createBridgeContext(config);
	const app = createApp(context);

	const server = serve({ fetch: app.fetch, port: config.port, hostname: config.host }, (info) => {
		logInfo(`${SERVICE_NAME} ${SERVICE_VERSION} listening on http://${config.host}:${info.port}`, {
			poolMax: config.poolMax,
			apiKeys: config.apiKeys.length,
			extensionSecret: config.extensionSecret !== undefined,
			upstream: config.upstreamBaseUrl,
		});
	});

	const sweep = setInterval(() => {
		context.registry
			.sweepExpired()
			.then((removed) => {
				if (removed > 0) {
					logDebug("Expired credentials swept", { removed });
				}
			})
			.catch((error: unknown) => {
				logError("Credential sweep failed", { error: toErrorMessage(error) });
			});
	}, config.sweepIntervalMs);
	sweep.unref();

	const close = () =>
		new Promise<void>((resolve, reject) => {
			clearInterval(sweep);
			server.close((error) => (error ? reject(error) : resolve()));
		});

	return { context, server, close };
}

function isEntryPoint(): boolean {
	const entry = process.argv[1];
	if (!entry) return false;
	try {
		return realpathSync(entry) === fileURLToPath(import.meta.url);
	} catch (error) {
		logDebug("Could not resolve entry point", { entry, error: toErrorMessage(error) });
		return false;
	}
}

if (isEntryPoint()) {
	const bridge = startServer();
	const shutdown = (signal: NodeJS.Signals) => {
		logInfo(`Received ${signal}, shutting down`);
		bridge
			.close()
			.then(() => process.exit(0))
			.catch((error: unknown) => {
				logError("Shutdown failed", { error: toErrorMessage(error) });
				process.exit(1);
			});
	};
	process.once("SIGINT", shutdown);
	process.once("SIGTERM", shutdown);
}
