import { ERROR_MESSAGES, LOG_STAGES, UPSTREAM_DEFAULTS } from "../constants.js";
import { UpstreamError, UpstreamTimeoutError, toErrorMessage } from "../errors.js";
import { logDebug, logError, logRequest } from "../logger.js";
import type { UpstreamRequest } from "../types.js";

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface IdleTimeout {
	signal: AbortSignal;
	/** Restart the countdown; call whenever upstream bytes arrive */
	touch(): void;
	/** Stop the countdown for good */
	clear(): void;
	readonly timedOut: boolean;
}

/**
 * Abort signal that fires after `ms` without a touch(), or as soon as the
 * parent signal aborts.
 */
export function createIdleTimeout(ms: number, parent?: AbortSignal): IdleTimeout {
	const controller = new AbortController();
	let timer: ReturnType<typeof setTimeout> | undefined;
	let timedOut = false;
	let cleared = false;

	const onParentAbort = () => {
		clear();
		controller.abort(parent?.reason);
	};

	const arm = () => {
		if (timer) clearTimeout(timer);
		timer = setTimeout(() => {
			timedOut = true;
			clear();
			controller.abort(new UpstreamTimeoutError(ERROR_MESSAGES.UPSTREAM_TIMEOUT));
		}, ms);
	};

	function clear(): void {
		if (cleared) return;
		cleared = true;
		if (timer) clearTimeout(timer);
		parent?.removeEventListener("abort", onParentAbort);
	}

	if (parent?.aborted) {
		onParentAbort();
	} else {
		parent?.addEventListener("abort", onParentAbort, { once: true });
		arm();
	}

	return {
		signal: controller.signal,
		touch: () => {
			if (!cleared) arm();
		},
		clear,
		get timedOut() {
			return timedOut;
		},
	};
}

export interface SendUpstreamOptions {
	requestId: string;
	profileId: string;
	signal: AbortSignal;
	fetchImpl?: FetchLike;
}

/**
 * POST the request and return the streaming response. Non-2xx responses and
 * transport failures become UpstreamError; an aborted idle timer becomes
 * UpstreamTimeoutError.
 */
export async function sendUpstreamRequest(request: UpstreamRequest, options: SendUpstreamOptions): Promise<Response> {
	const fetchImpl = options.fetchImpl ?? fetch;
	const context = { requestId: options.requestId, profileId: options.profileId };

	logRequest(LOG_STAGES.UPSTREAM_REQUEST, {
		...context,
		url: request.url,
		evaluationId: request.evaluationId,
		modelId: request.payload.modelAId,
		modality: request.payload.modality,
		credentialKind: request.payload.recaptchaV2Token ? "fallback" : "primary",
	});

	let response: Response;
	try {
		response = await fetchImpl(request.url, {
			method: "POST",
			headers: request.headers,
			body: JSON.stringify(request.payload),
			signal: options.signal,
			redirect: "follow",
		});
	} catch (error) {
		const reason = options.signal.aborted ? options.signal.reason : undefined;
		if (reason instanceof UpstreamTimeoutError) {
			logError("Upstream timed out before responding", context);
			throw reason;
		}
		if (options.signal.aborted) {
			logDebug("Upstream request cancelled", { ...context, reason: toErrorMessage(reason) });
			throw new UpstreamError("Upstream request cancelled");
		}
		logError("Upstream request failed", { ...context, error: toErrorMessage(error) });
		throw new UpstreamError(`Upstream request failed: ${toErrorMessage(error)}`);
	}

	logRequest(LOG_STAGES.UPSTREAM_RESPONSE, {
		...context,
		status: response.status,
		ok: response.ok,
	});

	if (!response.ok) {
		const raw = await response.text().catch((error: unknown) => `<unreadable body: ${toErrorMessage(error)}>`);
		const preview = raw.slice(0, UPSTREAM_DEFAULTS.ERROR_BODY_PREVIEW);
		logRequest(LOG_STAGES.ERROR_RESPONSE, { ...context, status: response.status, body: preview });
		logError(`Upstream returned ${response.status}`, { ...context, body: preview });
		throw new UpstreamError(`Upstream returned ${response.status}: ${preview.slice(0, 200)}`, response.status);
	}

	return response;
}
