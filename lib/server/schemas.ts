import { z, type ZodError } from "zod";
import { ERROR_MESSAGES } from "../constants.js";
import { InvalidRequestError, MalformedPushError } from "../errors.js";
import { logWarn } from "../logger.js";
import { categorize } from "../models/model-catalog.js";
import type { ChatRequest, ModelInfo, PushPayload, PushedToken } from "../types.js";

/** Action the extension tags primary tokens with when it sends none */
export const DEFAULT_TOKEN_ACTION = "chat_submit";

const PushedTokenSchema = z.object({
	token: z.string(),
	action: z.string().optional(),
	age_ms: z.number().nonnegative().optional(),
});

const UpstreamModelSchema = z.object({
	id: z.string().min(1),
	publicName: z.string().min(1),
	capabilities: z
		.object({
			inputCapabilities: z.array(z.string()).default([]),
			outputCapabilities: z.array(z.string()).default([]),
		})
		.default({}),
});

const NormalizedModelSchema = z.object({
	name: z.string().min(1),
	id: z.string().min(1).optional(),
	category: z.enum(["text", "vision", "image"]).optional(),
});

export const PushBodySchema = z.object({
	profile_id: z.string().min(1).max(128).optional(),
	cookies: z.record(z.string()),
	auth_token: z.string(),
	cf_clearance: z.string(),
	v3_tokens: z.array(PushedTokenSchema),
	v2_token: PushedTokenSchema.nullish(),
	// entries are checked one by one in toModelInfos
	models: z.array(z.unknown()).nullish(),
});

const PushedModelSchema = z.union([UpstreamModelSchema, NormalizedModelSchema]);

export type PushBody = z.infer<typeof PushBodySchema>;

const ContentPartSchema = z.object({
	type: z.string(),
	text: z.string().optional(),
});

const ChatMessageSchema = z.object({
	role: z.string().min(1),
	content: z.union([z.string(), z.array(ContentPartSchema), z.null()]).optional(),
});

export const ChatRequestSchema = z.object({
	model: z.string().min(1),
	messages: z.array(ChatMessageSchema).min(1),
	stream: z.boolean().optional(),
});

/**
 * Zod issues as `path: message` lines
 */
export function formatIssues(error: ZodError): string[] {
	return error.issues.map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`);
}

function toPushedToken(raw: z.infer<typeof PushedTokenSchema>): PushedToken {
	return { token: raw.token, action: raw.action || DEFAULT_TOKEN_ACTION, ageMs: raw.age_ms ?? 0 };
}

/**
 * Catalog entries from a push. Entries that do not validate are dropped with
 * a warning; upstream entries that produce neither text nor images are left
 * out.
 */
export function toModelInfos(models: readonly unknown[]): ModelInfo[] {
	const result: ModelInfo[] = [];
	for (const [index, raw] of models.entries()) {
		const parsed = PushedModelSchema.safeParse(raw);
		if (!parsed.success) {
			logWarn("Dropping invalid model entry from push", {
				index,
				issues: formatIssues(parsed.error),
			});
			continue;
		}
		const model = parsed.data;
		if ("publicName" in model) {
			const { inputCapabilities, outputCapabilities } = model.capabilities;
			if (!outputCapabilities.includes("text") && !outputCapabilities.includes("image")) {
				continue;
			}
			result.push({
				name: model.publicName,
				id: model.id,
				category: categorize(inputCapabilities, outputCapabilities),
			});
		} else {
			result.push({ name: model.name, id: model.id ?? model.name, category: model.category ?? "text" });
		}
	}
	return result;
}

/**
 * Validate a push body. Throws MalformedPushError listing every problem.
 */
export function parsePushBody(body: unknown): PushPayload {
	const parsed = PushBodySchema.safeParse(body);
	if (!parsed.success) {
		throw new MalformedPushError("Malformed push payload", formatIssues(parsed.error));
	}
	const data = parsed.data;
	return {
		profileId: data.profile_id,
		cookies: data.cookies,
		authToken: data.auth_token,
		cfClearance: data.cf_clearance,
		primaryTokens: data.v3_tokens.map(toPushedToken),
		fallbackToken: data.v2_token ? toPushedToken(data.v2_token) : undefined,
		models: data.models ? toModelInfos(data.models) : undefined,
	};
}

/**
 * Validate a chat completion request body
 */
export function parseChatRequest(body: unknown): ChatRequest {
	const parsed = ChatRequestSchema.safeParse(body);
	if (!parsed.success) {
		throw new InvalidRequestError("Invalid chat completion request", formatIssues(parsed.error));
	}
	return {
		model: parsed.data.model,
		messages: parsed.data.messages.map((message) => ({ role: message.role, content: message.content ?? null })),
		stream: parsed.data.stream ?? false,
	};
}

/**
 * Request body as JSON; InvalidRequestError when it does not parse
 */
export async function readJsonBody(request: { json(): Promise<unknown> }): Promise<unknown> {
	try {
		return await request.json();
	} catch {
		throw new InvalidRequestError(ERROR_MESSAGES.INVALID_JSON);
	}
}
