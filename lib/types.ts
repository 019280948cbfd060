/**
 * Server configuration, merged from defaults, ~/.arena-bridge/config.json and env
 */
export interface ServerConfig {
	port: number;
	host: string;
	/** Client API keys; empty means the OpenAI surface is open */
	apiKeys: string[];
	/** Shared secret the extensions present on push; undefined disables the check */
	extensionSecret?: string;
	poolMax: number;
	credentialLifetimeMs: number;
	profileStaleMs: number;
	sweepIntervalMs: number;
	upstreamTimeoutMs: number;
	upstreamBaseUrl: string;
	reasoningMode: ReasoningMode;
	modelMatchFloor: number;
	logging: LoggingConfig;
}

export interface LoggingConfig {
	/** When true, persist detailed request logs regardless of env var */
	enableRequestLogging?: boolean;
	/** When true, enable debug logging regardless of env var */
	debug?: boolean;
	/** Override max bytes before rolling log rotation */
	logMaxBytes?: number;
	/** Override number of rotated log files to keep */
	logMaxFiles?: number;
	/** Override rolling log queue length */
	logQueueMax?: number;
}

/**
 * Where reasoning deltas go in OpenAI output.
 * "field" uses delta.reasoning_content, "inline" folds them into content.
 */
export type ReasoningMode = "field" | "inline";

/**
 * Perishable anti-automation token. Primary tokens queue up; a profile holds
 * at most one fallback token, used only when the queue is empty.
 */
export interface Credential {
	value: string;
	action: string;
	kind: "primary" | "fallback";
	mintedAt: number;
	expiresAt: number;
}

export type TakeResult = { success: true; credential: Credential } | { success: false; reason: "exhausted" };

export type ModelCategory = "text" | "vision" | "image";

export interface ModelInfo {
	/** Public name clients request */
	name: string;
	/** Upstream model id */
	id: string;
	category: ModelCategory;
}

export interface CatalogEntry extends ModelInfo {
	/** Profiles whose latest push reported this model */
	profiles: string[];
}

export type ModelResolution =
	| { found: true; entry: CatalogEntry; exact: boolean }
	| { found: false; available: string[] };

/**
 * Incoming token with its age at the moment the extension pushed it
 */
export interface PushedToken {
	token: string;
	action: string;
	ageMs: number;
}

/**
 * Push body after validation at the ingress boundary
 */
export interface PushPayload {
	profileId?: string;
	cookies: Record<string, string>;
	authToken: string;
	cfClearance: string;
	primaryTokens: PushedToken[];
	fallbackToken?: PushedToken;
	models?: ModelInfo[];
}

export interface PushResult {
	profileId: string;
	/** True when the server generated profileId for this push */
	assigned: boolean;
	poolMax: number;
	needTokens: boolean;
	tokenCount: number;
}

export interface ProfileStatus {
	profile_id: string;
	active: boolean;
	health: number;
	tokens: number;
	has_fallback_token: boolean;
	has_auth: boolean;
	has_cf_clearance: boolean;
	last_push_ago_s: number | null;
	push_count: number;
	recent_errors: number;
	models: number;
	cookies: string[];
}

/**
 * OpenAI chat message as accepted on /v1/chat/completions
 */
export interface ChatMessage {
	role: string;
	content: string | ContentPart[] | null;
	[key: string]: unknown;
}

export interface ContentPart {
	type: string;
	text?: string;
	[key: string]: unknown;
}

export interface ChatRequest {
	model: string;
	messages: ChatMessage[];
	stream: boolean;
}

/**
 * Body posted to the upstream create-evaluation endpoint
 */
export interface UpstreamPayload {
	id: string;
	mode: "direct";
	modelAId: string;
	userMessageId: string;
	modelAMessageId: string;
	userMessage: {
		content: string;
		experimental_attachments: unknown[];
		metadata: Record<string, unknown>;
	};
	modality: "chat" | "image";
	userId?: string;
	recaptchaV3Token?: string | null;
	recaptchaV2Token?: string;
}

export interface UpstreamRequest {
	url: string;
	headers: Headers;
	payload: UpstreamPayload;
	evaluationId: string;
}

/**
 * One parsed line of the upstream stream
 */
export type StreamFrame =
	| { type: "text"; text: string }
	| { type: "reasoning"; text: string }
	| { type: "heartbeat" }
	| { type: "attachment"; urls: string[] }
	| { type: "terminal"; finishReason: FinishReason; usage?: Usage }
	| { type: "error"; message: string };

export type FinishReason = "stop" | "length" | "content_filter" | "tool_calls";

export interface Usage {
	prompt_tokens: number;
	completion_tokens: number;
	total_tokens: number;
}

export interface ChunkDelta {
	content?: string;
	reasoning_content?: string;
}

export interface ChatCompletionChunk {
	id: string;
	object: "chat.completion.chunk";
	created: number;
	model: string;
	choices: Array<{
		index: number;
		delta: ChunkDelta;
		finish_reason: FinishReason | null;
	}>;
	/** Present on the final chunk when the upstream reported usage */
	usage?: Usage;
}

export interface ChatCompletion {
	id: string;
	object: "chat.completion";
	created: number;
	model: string;
	choices: Array<{
		index: number;
		message: { role: "assistant"; content: string; reasoning_content?: string };
		finish_reason: FinishReason;
	}>;
	usage: Usage;
}

/**
 * Identifiers shared by every chunk of one completion
 */
export interface TranslationContext {
	id: string;
	created: number;
	model: string;
	reasoningMode: ReasoningMode;
}
