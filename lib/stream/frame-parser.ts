import { FRAME_PREFIXES, UPSTREAM_ERROR_SENTINEL } from "../constants.js";
import type { FinishReason, StreamFrame, Usage } from "../types.js";

/**
 * Parse one upstream line (`<prefix>:<json>`) into a frame.
 * Blank, unknown and malformed lines yield null and are skipped.
 */
export function parseFrame(line: string): StreamFrame | null {
	const trimmed = line.trim();
	const separator = trimmed.indexOf(":");
	if (separator < 1 || separator > 2) {
		return null;
	}
	const prefix = trimmed.slice(0, separator);
	const raw = trimmed.slice(separator + 1);

	switch (prefix) {
		case FRAME_PREFIXES.TEXT: {
			const text = parseJson(raw);
			if (typeof text !== "string") return null;
			if (text === UPSTREAM_ERROR_SENTINEL) {
				return { type: "error", message: "Upstream reported a generation error" };
			}
			return { type: "text", text };
		}
		case FRAME_PREFIXES.REASONING: {
			const text = parseJson(raw);
			return typeof text === "string" ? { type: "reasoning", text } : null;
		}
		case FRAME_PREFIXES.TERMINAL:
			return parseTerminal(raw);
		case FRAME_PREFIXES.HEARTBEAT_OR_ATTACHMENT:
			return parseAttachment(raw);
		case FRAME_PREFIXES.ERROR:
			return { type: "error", message: describeError(raw) };
		default:
			return null;
	}
}

/**
 * Frames of a line sequence, in order
 */
export async function* parseFrames(lines: AsyncIterable<string>): AsyncGenerator<StreamFrame, void, undefined> {
	for await (const line of lines) {
		const frame = parseFrame(line);
		if (frame) {
			yield frame;
		}
	}
}

function parseJson(raw: string): unknown {
	if (raw.length === 0) return undefined;
	try {
		return JSON.parse(raw);
	} catch {
		return undefined;
	}
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseTerminal(raw: string): StreamFrame {
	const data = parseJson(raw);
	if (!isRecord(data)) {
		return { type: "terminal", finishReason: "stop" };
	}
	const usage = normalizeUsage(data.usage);
	return {
		type: "terminal",
		finishReason: mapFinishReason(data.finishReason),
		...(usage ? { usage } : {}),
	};
}

function parseAttachment(raw: string): StreamFrame | null {
	if (raw.includes("heartbeat")) {
		return { type: "heartbeat" };
	}
	const data = parseJson(raw);
	if (!Array.isArray(data)) {
		return null;
	}
	const urls = data
		.map((item) => (isRecord(item) && typeof item.image === "string" ? item.image : ""))
		.filter((url) => url.length > 0);
	return urls.length > 0 ? { type: "attachment", urls } : { type: "heartbeat" };
}

function describeError(raw: string): string {
	const data = parseJson(raw);
	if (typeof data === "string") return data;
	if (isRecord(data) && typeof data.message === "string") return data.message;
	if (data !== undefined) return JSON.stringify(data);
	return raw || "Upstream reported an error";
}

/**
 * Upstream finish reasons to OpenAI's
 */
export function mapFinishReason(reason: unknown): FinishReason {
	switch (reason) {
		case "length":
			return "length";
		case "content-filter":
		case "content_filter":
			return "content_filter";
		case "tool-calls":
		case "tool_calls":
			return "tool_calls";
		default:
			return "stop";
	}
}

/**
 * Usage in either snake_case or camelCase; null when neither token count is present
 */
export function normalizeUsage(raw: unknown): Usage | null {
	if (!isRecord(raw)) return null;
	const prompt = toCount(raw.prompt_tokens ?? raw.promptTokens);
	const completion = toCount(raw.completion_tokens ?? raw.completionTokens);
	if (prompt === undefined && completion === undefined) {
		return null;
	}
	const total = toCount(raw.total_tokens ?? raw.totalTokens);
	return {
		prompt_tokens: prompt ?? 0,
		completion_tokens: completion ?? 0,
		total_tokens: total ?? (prompt ?? 0) + (completion ?? 0),
	};
}

function toCount(value: unknown): number | undefined {
	return typeof value === "number" && Number.isFinite(value) && value >= 0 ? Math.floor(value) : undefined;
}
