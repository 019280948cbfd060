import type { Context } from "hono";
import { streamSSE } from "hono/streaming";
import { ERROR_MESSAGES, LOG_STAGES } from "../constants.js";
import { BridgeError, UpstreamError, UpstreamTimeoutError, toErrorMessage } from "../errors.js";
import { logDebug, logError, logRequest } from "../logger.js";
import { parseFrames } from "../stream/frame-parser.js";
import { readLines } from "../stream/line-reader.js";
import { aggregateFrames, translateFrames, type TranslationEvent } from "../stream/translator.js";
import type { ChatCompletion, TranslationContext } from "../types.js";
import type { IdleTimeout } from "./upstream-client.js";

export interface UpstreamExchange {
	response: Response;
	timeout: IdleTimeout;
	translation: TranslationContext;
	requestId: string;
	profileId: string;
	/** Aborts the upstream call; invoked when the client goes away */
	cancel: () => void;
	/** True once the client has left; failures after that are not the upstream's */
	clientGone?: () => boolean;
	/** Runs once when the exchange fails after the response arrived */
	onFailure?: (error: BridgeError) => void;
}

/**
 * Failure while reading the upstream body, as a BridgeError
 */
function toStreamError(error: unknown, timeout: IdleTimeout): BridgeError {
	if (error instanceof BridgeError) return error;
	const reason: unknown = timeout.signal.reason;
	if (reason instanceof UpstreamTimeoutError) return reason;
	return new UpstreamError(`Upstream stream failed: ${toErrorMessage(error)}`);
}

/**
 * Translation events of an upstream body. Read failures surface as a final
 * error event rather than a throw.
 */
async function* upstreamEvents(exchange: UpstreamExchange): AsyncGenerator<TranslationEvent, void, undefined> {
	const { response, timeout, translation } = exchange;
	if (!response.body) {
		yield { type: "error", error: new UpstreamError("Upstream response has no body") };
		return;
	}
	try {
		const frames = parseFrames(readLines(response.body, timeout.touch));
		yield* translateFrames(frames, translation);
	} catch (error) {
		yield { type: "error", error: toStreamError(error, timeout) };
	}
}

function reportFailure(exchange: UpstreamExchange, error: BridgeError): void {
	const context = { requestId: exchange.requestId, profileId: exchange.profileId };
	if (exchange.clientGone?.()) {
		logDebug("Client disconnected, upstream read stopped", { ...context, reason: error.message });
		return;
	}
	logError(`Upstream stream failed: ${error.message}`, { ...context, code: error.code });
	logRequest(LOG_STAGES.ERROR_RESPONSE, { ...context, status: error.status, error: error.message });
	exchange.onFailure?.(error);
}

/**
 * Relay the upstream stream as OpenAI SSE.
 *
 * The first event is read before anything is sent: an immediate failure is
 * thrown for the JSON error path. After that an error goes out as an SSE
 * `error` event and the stream closes without `[DONE]`.
 */
export async function streamChatCompletion(c: Context, exchange: UpstreamExchange): Promise<Response> {
	const events = upstreamEvents(exchange);
	const first = await events.next();

	if (first.done) {
		exchange.timeout.clear();
		const error = new UpstreamError(ERROR_MESSAGES.STREAM_INCOMPLETE);
		reportFailure(exchange, error);
		throw error;
	}
	const head: TranslationEvent = first.value;
	if (head.type === "error") {
		exchange.timeout.clear();
		await events.return(undefined);
		reportFailure(exchange, head.error);
		throw head.error;
	}

	return streamSSE(c, async (stream) => {
		stream.onAbort(() => {
			logDebug("Client disconnected, aborting upstream", { requestId: exchange.requestId });
			exchange.cancel();
		});

		try {
			let event: TranslationEvent | undefined = head;
			while (event && !stream.aborted) {
				if (event.type === "error") {
					reportFailure(exchange, event.error);
					await stream.writeSSE({ event: "error", data: JSON.stringify(event.error.toBody()) });
					return;
				}
				await stream.writeSSE({ data: JSON.stringify(event.chunk) });
				if (event.type === "done") {
					await stream.writeSSE({ data: "[DONE]" });
					return;
				}
				const next = await events.next();
				event = next.done ? undefined : next.value;
			}
		} finally {
			exchange.timeout.clear();
			await events.return(undefined);
		}
	});
}

/**
 * Drain the upstream stream into one chat.completion
 */
export async function collectChatCompletion(exchange: UpstreamExchange): Promise<ChatCompletion> {
	const { response, timeout, translation } = exchange;
	try {
		if (!response.body) {
			throw new UpstreamError("Upstream response has no body");
		}
		const frames = parseFrames(readLines(response.body, timeout.touch));
		return await aggregateFrames(frames, translation);
	} catch (error) {
		const failure = toStreamError(error, timeout);
		reportFailure(exchange, failure);
		throw failure;
	} finally {
		timeout.clear();
	}
}
