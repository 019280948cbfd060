import { Dispatcher } from "../dispatch/dispatcher.js";
import { ModelCatalog } from "../models/model-catalog.js";
import { ProfileRegistry } from "../pool/profile-registry.js";
import type { FetchLike } from "../request/upstream-client.js";
import type { ServerConfig } from "../types.js";

/** Hono environment shared by every route */
export type BridgeEnv = {
	Variables: {
		requestId: string;
	};
};

/**
 * Process-wide state handed to the routes
 */
export interface BridgeContext {
	config: ServerConfig;
	registry: ProfileRegistry;
	catalog: ModelCatalog;
	dispatcher: Dispatcher;
	fetchImpl: FetchLike;
	now: () => number;
}

export interface BridgeContextOverrides {
	fetchImpl?: FetchLike;
	now?: () => number;
}

export function createBridgeContext(config: ServerConfig, overrides: BridgeContextOverrides = {}): BridgeContext {
	const now = overrides.now ?? Date.now;
	// the catalog only unions models of profiles the registry still considers active
	const catalog: ModelCatalog = new ModelCatalog({
		matchFloor: config.modelMatchFloor,
		isContributorActive: (profileId: string): boolean => registry.isActive(profileId),
	});
	const registry: ProfileRegistry = new ProfileRegistry({
		poolMax: config.poolMax,
		credentialLifetimeMs: config.credentialLifetimeMs,
		staleAfterMs: config.profileStaleMs,
		catalog,
		now,
	});

	return {
		config,
		registry,
		catalog,
		dispatcher: new Dispatcher(registry, now),
		fetchImpl: overrides.fetchImpl ?? ((input, init) => fetch(input, init)),
		now,
	};
}
