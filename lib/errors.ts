/**
 * Error taxonomy for the bridge. Every rejected path throws one of these;
 * the HTTP layer renders them as OpenAI-style error bodies.
 */

export type BridgeErrorType =
	| "authentication_error"
	| "invalid_request_error"
	| "not_found_error"
	| "service_unavailable"
	| "upstream_error"
	| "internal_error";

export interface ErrorBody {
	error: {
		message: string;
		type: BridgeErrorType;
		code: string;
		[key: string]: unknown;
	};
}

export class BridgeError extends Error {
	readonly status: number;
	readonly type: BridgeErrorType;
	readonly code: string;
	readonly details: Record<string, unknown>;

	constructor(
		message: string,
		options: { status: number; type: BridgeErrorType; code: string; details?: Record<string, unknown> },
	) {
		super(message);
		this.name = "BridgeError";
		this.status = options.status;
		this.type = options.type;
		this.code = options.code;
		this.details = options.details ?? {};
	}

	toBody(): ErrorBody {
		return {
			error: {
				...this.details,
				message: this.message,
				type: this.type,
				code: this.code,
			},
		};
	}
}

export class UnauthorizedError extends BridgeError {
	constructor(message: string) {
		super(message, { status: 401, type: "authentication_error", code: "unauthorized" });
		this.name = "UnauthorizedError";
	}
}

export class InvalidRequestError extends BridgeError {
	constructor(message: string, issues?: string[]) {
		super(message, {
			status: 400,
			type: "invalid_request_error",
			code: "invalid_request",
			details: issues ? { issues } : undefined,
		});
		this.name = "InvalidRequestError";
	}
}

/** Rejected push; the target profile is left untouched */
export class MalformedPushError extends BridgeError {
	constructor(message: string, issues?: string[]) {
		super(message, {
			status: 400,
			type: "invalid_request_error",
			code: "malformed_push",
			details: issues ? { issues } : undefined,
		});
		this.name = "MalformedPushError";
	}
}

export class ModelNotFoundError extends BridgeError {
	readonly available: string[];

	constructor(model: string, available: string[]) {
		super(`Model '${model}' not found`, {
			status: 404,
			type: "not_found_error",
			code: "model_not_found",
			details: { available },
		});
		this.name = "ModelNotFoundError";
		this.available = available;
	}
}

export class ServiceUnavailableError extends BridgeError {
	constructor(message: string) {
		super(message, { status: 503, type: "service_unavailable", code: "service_unavailable" });
		this.name = "ServiceUnavailableError";
	}
}

/**
 * Error marker in the upstream stream, or a non-2xx upstream response.
 * Never retried: the credential it consumed cannot be replayed.
 */
export class UpstreamError extends BridgeError {
	readonly upstreamStatus?: number;

	constructor(message: string, upstreamStatus?: number) {
		super(message, {
			status: 502,
			type: "upstream_error",
			code: "upstream_error",
			details: upstreamStatus !== undefined ? { upstream_status: upstreamStatus } : undefined,
		});
		this.name = "UpstreamError";
		this.upstreamStatus = upstreamStatus;
	}
}

export class UpstreamTimeoutError extends BridgeError {
	constructor(message: string) {
		super(message, { status: 504, type: "upstream_error", code: "upstream_timeout" });
		this.name = "UpstreamTimeoutError";
	}
}

export function toErrorMessage(error: unknown): string {
	if (error instanceof Error && error.message) {
		return error.message;
	}
	return String(error);
}

/**
 * Body for anything thrown that is not a BridgeError
 */
export function internalErrorBody(message = "Internal server error"): ErrorBody {
	return { error: { message, type: "internal_error", code: "internal_error" } };
}
