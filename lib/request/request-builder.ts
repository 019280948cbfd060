/**
 * Outbound request assembly: turns a dispatched lease and an OpenAI chat
 * request into a create-evaluation call on the upstream platform.
 */

import { UPSTREAM_COOKIES, UPSTREAM_PATHS, UPSTREAM_USER_AGENT } from "../constants.js";
import type { ChatMessage, Credential, ModelInfo, UpstreamPayload, UpstreamRequest } from "../types.js";
import { uuid7 } from "../utils/uuid7.js";

export interface SessionMaterial {
	cookies: Record<string, string>;
	authToken: string;
	cfClearance: string;
}

export interface BuildUpstreamRequestInput {
	session: SessionMaterial;
	credential: Credential;
	messages: ChatMessage[];
	model: ModelInfo;
	baseUrl: string;
	now?: number;
}

/**
 * Text of a message; multimodal content keeps its text parts only
 */
export function messageText(message: ChatMessage): string {
	const { content } = message;
	if (typeof content === "string") {
		return content;
	}
	if (Array.isArray(content)) {
		return content
			.filter((part) => part.type === "text" && typeof part.text === "string")
			.map((part) => part.text)
			.join("\n");
	}
	return "";
}

/**
 * Flatten an OpenAI message list into the single prompt the upstream takes.
 *
 * System messages lead, joined by newlines and separated from the rest by a
 * blank line. One remaining message goes as plain text; a conversation is
 * rendered as `<|role|>` blocks.
 */
export function flattenTranscript(messages: ChatMessage[]): string {
	const system = messages.filter((message) => message.role === "system").map(messageText);
	const turns = messages.filter((message) => message.role !== "system");

	let body: string;
	if (turns.length === 1) {
		body = messageText(turns[0]);
	} else {
		body = turns.map((message) => `<|${message.role || "user"}|>\n${messageText(message)}`).join("\n");
	}

	if (system.length === 0) {
		return body;
	}
	const header = system.join("\n");
	return body ? `${header}\n\n${body}` : header;
}

/**
 * Cookie jar as one `cookie` header value. cf_clearance is added when the
 * jar lacks it.
 */
export function buildCookieHeader(cookies: Record<string, string>, cfClearance = ""): string {
	const jar = { ...cookies };
	if (cfClearance && !jar[UPSTREAM_COOKIES.CF_CLEARANCE]) {
		jar[UPSTREAM_COOKIES.CF_CLEARANCE] = cfClearance;
	}
	return Object.entries(jar)
		.filter(([name]) => name.length > 0)
		.map(([name, value]) => `${name}=${value}`)
		.join("; ");
}

/**
 * Upstream user id: the dedicated cookie, else the first long value of a
 * cookie whose name mentions "user"
 */
export function resolveUserId(cookies: Record<string, string>): string | undefined {
	const direct = cookies[UPSTREAM_COOKIES.USER_ID];
	if (direct) {
		return direct;
	}
	for (const [name, value] of Object.entries(cookies)) {
		if (name.toLowerCase().includes("user") && value.length > 20) {
			return value;
		}
	}
	return undefined;
}

/**
 * Creates headers for upstream requests
 */
export function createUpstreamHeaders(session: SessionMaterial, baseUrl: string): Headers {
	const headers = new Headers({
		accept: "*/*",
		"content-type": "application/json",
		origin: baseUrl,
		referer: `${baseUrl}/?mode=direct`,
		"user-agent": UPSTREAM_USER_AGENT,
	});
	const cookie = buildCookieHeader(session.cookies, session.cfClearance);
	if (cookie) {
		headers.set("cookie", cookie);
	}
	if (session.authToken) {
		headers.set("authorization", `Bearer ${session.authToken}`);
	}
	return headers;
}

export function buildUpstreamRequest(input: BuildUpstreamRequestInput): UpstreamRequest {
	const now = input.now ?? Date.now();
	const baseUrl = input.baseUrl.replace(/\/+$/, "");
	const evaluationId = uuid7(now);

	const payload: UpstreamPayload = {
		id: evaluationId,
		mode: "direct",
		modelAId: input.model.id,
		userMessageId: uuid7(now),
		modelAMessageId: uuid7(now),
		userMessage: {
			content: flattenTranscript(input.messages),
			experimental_attachments: [],
			metadata: {},
		},
		modality: input.model.category === "image" ? "image" : "chat",
	};

	const userId = resolveUserId(input.session.cookies);
	if (userId) {
		payload.userId = userId;
	}

	if (input.credential.kind === "fallback") {
		payload.recaptchaV2Token = input.credential.value;
		payload.recaptchaV3Token = null;
	} else {
		payload.recaptchaV3Token = input.credential.value;
	}

	return {
		url: `${baseUrl}${UPSTREAM_PATHS.CREATE_EVALUATION}`,
		headers: createUpstreamHeaders(input.session, baseUrl),
		payload,
		evaluationId,
	};
}
