import { ERROR_MESSAGES } from "../constants.js";
import { type BridgeError, UpstreamError } from "../errors.js";
import type { ChatCompletion, ChatCompletionChunk, ChunkDelta, StreamFrame, TranslationContext, Usage } from "../types.js";

export type TranslationEvent =
	| { type: "chunk"; chunk: ChatCompletionChunk }
	| { type: "done"; chunk: ChatCompletionChunk }
	| { type: "error"; error: BridgeError };

const ZERO_USAGE: Usage = { prompt_tokens: 0, completion_tokens: 0, total_tokens: 0 };

/**
 * Markdown for generated images, one per line
 */
export function attachmentMarkdown(urls: readonly string[]): string {
	return urls.map((url) => `![image](${url})`).join("\n");
}

function deltaFor(frame: StreamFrame, ctx: TranslationContext, afterContent: boolean): ChunkDelta | null {
	switch (frame.type) {
		case "text":
			return { content: frame.text };
		case "reasoning":
			return ctx.reasoningMode === "inline" ? { content: frame.text } : { reasoning_content: frame.text };
		case "attachment":
			return { content: `${afterContent ? "\n" : ""}${attachmentMarkdown(frame.urls)}` };
		default:
			return null;
	}
}

/**
 * OpenAI chunk for one frame. Heartbeats and errors have none.
 * `afterContent` starts attachment markdown on a new line.
 */
export function frameToChunk(
	frame: StreamFrame,
	ctx: TranslationContext,
	afterContent = false,
): ChatCompletionChunk | null {
	const base = {
		id: ctx.id,
		object: "chat.completion.chunk" as const,
		created: ctx.created,
		model: ctx.model,
	};

	if (frame.type === "terminal") {
		return {
			...base,
			choices: [{ index: 0, delta: {}, finish_reason: frame.finishReason }],
			...(frame.usage ? { usage: frame.usage } : {}),
		};
	}

	const delta = deltaFor(frame, ctx, afterContent);
	if (!delta) {
		return null;
	}
	return { ...base, choices: [{ index: 0, delta, finish_reason: null }] };
}

/**
 * Chunk events in frame order, closed by exactly one `done` or `error`.
 * Frames after the terminal marker are ignored.
 */
export async function* translateFrames(
	frames: AsyncIterable<StreamFrame>,
	ctx: TranslationContext,
): AsyncGenerator<TranslationEvent, void, undefined> {
	let afterContent = false;
	for await (const frame of frames) {
		if (frame.type === "error") {
			yield { type: "error", error: new UpstreamError(frame.message) };
			return;
		}
		const chunk = frameToChunk(frame, ctx, afterContent);
		if (!chunk) continue;
		if (chunk.choices[0]?.delta.content) afterContent = true;
		if (frame.type === "terminal") {
			yield { type: "done", chunk };
			return;
		}
		yield { type: "chunk", chunk };
	}
	yield { type: "error", error: new UpstreamError(ERROR_MESSAGES.STREAM_INCOMPLETE) };
}

/**
 * One chat.completion from the whole frame sequence. Throws UpstreamError on
 * an error marker or a stream that ends without a terminal marker.
 */
export async function aggregateFrames(
	frames: AsyncIterable<StreamFrame>,
	ctx: TranslationContext,
): Promise<ChatCompletion> {
	let content = "";
	let reasoning = "";

	for await (const event of translateFrames(frames, ctx)) {
		if (event.type === "error") {
			throw event.error;
		}
		const [choice] = event.chunk.choices;
		content += choice?.delta.content ?? "";
		reasoning += choice?.delta.reasoning_content ?? "";

		if (event.type === "done") {
			return {
				id: ctx.id,
				object: "chat.completion",
				created: ctx.created,
				model: ctx.model,
				choices: [
					{
						index: 0,
						message: {
							role: "assistant",
							content,
							...(reasoning ? { reasoning_content: reasoning } : {}),
						},
						finish_reason: choice?.finish_reason ?? "stop",
					},
				],
				usage: event.chunk.usage ?? { ...ZERO_USAGE },
			};
		}
	}
	// translateFrames always closes with done or error
	throw new UpstreamError(ERROR_MESSAGES.STREAM_INCOMPLETE);
}
