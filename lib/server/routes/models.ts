import { Hono } from "hono";
import { MODEL_OWNER, PLACEHOLDER_MODEL_ID } from "../../constants.js";
import { requireApiKey } from "../auth.js";
import type { BridgeContext, BridgeEnv } from "../context.js";

export interface OpenAIModel {
	id: string;
	object: "model";
	created: number;
	owned_by: string;
}

function toOpenAIModel(id: string): OpenAIModel {
	return { id, object: "model", created: 0, owned_by: MODEL_OWNER };
}

export function createModelRoutes(ctx: BridgeContext): Hono<BridgeEnv> {
	const routes = new Hono<BridgeEnv>();

	routes.get("/v1/models", requireApiKey(ctx.config.apiKeys), (c) => {
		const names = ctx.catalog.names();
		const data = names.length > 0 ? names.map(toOpenAIModel) : [toOpenAIModel(PLACEHOLDER_MODEL_ID)];
		return c.json({ object: "list", data });
	});

	return routes;
}
