/**
 * Constants used throughout the bridge
 * Centralized for easy maintenance and configuration
 */

/** Service identifier for logging and error messages */
export const SERVICE_NAME = "arena-bridge";

/** Reported by /health */
export const SERVICE_VERSION = "1.0.0";

/** Default upstream origin */
export const UPSTREAM_BASE_URL = "https://arena.ai";

/** URL path segments on the upstream platform */
export const UPSTREAM_PATHS = {
	CREATE_EVALUATION: "/nextjs-api/stream/create-evaluation",
} as const;

/** Browser identity presented to the upstream platform */
export const UPSTREAM_USER_AGENT =
	"Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/131.0.0.0 Safari/537.36";

/** Cookie names the upstream platform sets */
export const UPSTREAM_COOKIES = {
	AUTH: "arena-auth-prod-v1",
	USER_ID: "arena-user-id",
	CF_CLEARANCE: "cf_clearance",
} as const;

/** HTTP headers read or written by the bridge */
export const BRIDGE_HEADERS = {
	EXTENSION_SECRET: "X-Extension-Secret",
	REQUEST_ID: "X-Request-Id",
	API_KEY: "x-api-key",
} as const;

/** Credential pool and profile defaults */
export const POOL_DEFAULTS = {
	/** Maximum number of primary credentials held per profile */
	MAX_SIZE: 10,
	/** Credential lifetime, kept under the upstream's ~120s token lifetime */
	CREDENTIAL_LIFETIME_MS: 110_000,
	/** A profile without a push for this long is inactive */
	PROFILE_STALE_MS: 120_000,
	/** Periodic expiry sweep */
	SWEEP_INTERVAL_MS: 10_000,
	/** Tokens shorter than this are rejected on ingest */
	MIN_TOKEN_LENGTH: 20,
	/** Upstream failures older than this no longer affect health */
	ERROR_WINDOW_MS: 5 * 60 * 1000,
} as const;

/** Upstream call defaults */
export const UPSTREAM_DEFAULTS = {
	/** Abort after this long without bytes from the upstream */
	IDLE_TIMEOUT_MS: 120_000,
	/** Upstream error bodies are truncated to this many characters in logs and errors */
	ERROR_BODY_PREVIEW: 500,
} as const;

/** Lowest similarity accepted by fuzzy model resolution */
export const DEFAULT_MODEL_MATCH_FLOOR = 0.6;

/** Listed by /v1/models while no profile has reported a catalog */
export const PLACEHOLDER_MODEL_ID = "waiting-for-extension";

/** owned_by value in the OpenAI model list */
export const MODEL_OWNER = "arena.ai";

/** Line prefixes of the upstream stream */
export const FRAME_PREFIXES = {
	TEXT: "a0",
	REASONING: "ag",
	TERMINAL: "ad",
	HEARTBEAT_OR_ATTACHMENT: "a2",
	ERROR: "a3",
} as const;

/** Text payload the upstream sends in place of content when generation failed */
export const UPSTREAM_ERROR_SENTINEL = "hasArenaError";

/** Error messages */
export const ERROR_MESSAGES = {
	NO_ACTIVE_PROFILE: "No active profile. Open the chat platform in a browser with the extension installed.",
	POOLS_EXHAUSTED: "All active profiles are out of challenge tokens. Retry shortly.",
	NO_PROFILE_FOR_MODEL: "No active profile has reported this model",
	INVALID_API_KEY: "Invalid or missing API key",
	INVALID_EXTENSION_SECRET: "Invalid or missing extension secret",
	INVALID_JSON: "Request body is not valid JSON",
	STREAM_INCOMPLETE: "Upstream stream ended before completion",
	UPSTREAM_TIMEOUT: "Upstream did not respond in time",
} as const;

/** Log stages for request logging */
export const LOG_STAGES = {
	PUSH: "push",
	DISPATCH: "dispatch",
	UPSTREAM_REQUEST: "upstream-request",
	UPSTREAM_RESPONSE: "upstream-response",
	ERROR_RESPONSE: "error-response",
} as const;
