import { z } from "zod";
import { DEFAULT_MODEL_MATCH_FLOOR, POOL_DEFAULTS, UPSTREAM_BASE_URL, UPSTREAM_DEFAULTS } from "./constants.js";
import { logWarn } from "./logger.js";
import type { ServerConfig } from "./types.js";
import { getDataPath, readFileIfExists } from "./utils/file-system-utils.js";

type Env = Record<string, string | undefined>;

const positiveInt = z.coerce.number().int().positive();

const LoggingSchema = z
	.object({
		enableRequestLogging: z.boolean().optional(),
		debug: z.boolean().optional(),
		logMaxBytes: positiveInt.optional(),
		logMaxFiles: positiveInt.optional(),
		logQueueMax: positiveInt.optional(),
	})
	.strict();

/** Every key optional: partial configs come from the file and from env */
const ConfigOverridesSchema = z
	.object({
		port: z.coerce.number().int().min(0).max(65535),
		host: z.string().min(1),
		apiKeys: z.array(z.string().min(1)),
		extensionSecret: z.string().min(1),
		poolMax: positiveInt,
		credentialLifetimeMs: positiveInt,
		profileStaleMs: positiveInt,
		sweepIntervalMs: positiveInt,
		upstreamTimeoutMs: positiveInt,
		upstreamBaseUrl: z.string().url(),
		reasoningMode: z.enum(["field", "inline"]),
		modelMatchFloor: z.coerce.number().min(0).max(1),
		logging: LoggingSchema,
	})
	.partial();

type ConfigOverrides = z.infer<typeof ConfigOverridesSchema>;

/**
 * Default server configuration
 */
function getDefaultConfig(): ServerConfig {
	return {
		port: 9090,
		host: "0.0.0.0",
		apiKeys: [],
		poolMax: POOL_DEFAULTS.MAX_SIZE,
		credentialLifetimeMs: POOL_DEFAULTS.CREDENTIAL_LIFETIME_MS,
		profileStaleMs: POOL_DEFAULTS.PROFILE_STALE_MS,
		sweepIntervalMs: POOL_DEFAULTS.SWEEP_INTERVAL_MS,
		upstreamTimeoutMs: UPSTREAM_DEFAULTS.IDLE_TIMEOUT_MS,
		upstreamBaseUrl: UPSTREAM_BASE_URL,
		reasoningMode: "field",
		modelMatchFloor: DEFAULT_MODEL_MATCH_FLOOR,
		logging: {},
	};
}

let cachedServerConfig: ServerConfig | undefined;

export function getConfigPath(env: Env = process.env): string {
	return env.ARENA_BRIDGE_CONFIG || getDataPath("config.json");
}

/**
 * Load server configuration: defaults, then the JSON config file, then env.
 * Invalid sources are logged and skipped key by key.
 *
 * @returns Server configuration
 */
export function loadServerConfig(options: { forceReload?: boolean; env?: Env } = {}): ServerConfig {
	const { forceReload, env = process.env } = options;

	if (forceReload) {
		cachedServerConfig = undefined;
	}

	if (cachedServerConfig) {
		return cachedServerConfig;
	}

	const defaults = getDefaultConfig();
	const fileOverrides = readConfigFile(getConfigPath(env));
	const envOverrides = validateOverrides(readEnvOverrides(env), "environment");

	cachedServerConfig = {
		...defaults,
		...fileOverrides,
		...envOverrides,
		logging: {
			...defaults.logging,
			...fileOverrides.logging,
			...envOverrides.logging,
		},
	};
	return cachedServerConfig;
}

function readConfigFile(path: string): ConfigOverrides {
	try {
		const fileContent = readFileIfExists(path);
		if (!fileContent) {
			return {};
		}
		return validateOverrides(JSON.parse(fileContent), path);
	} catch (error) {
		logWarn("Failed to load config file", {
			path,
			error: error instanceof Error ? error.message : String(error),
		});
		return {};
	}
}

/**
 * Validate a partial config; keys that fail validation are dropped so the
 * remaining ones still apply.
 */
function validateOverrides(raw: unknown, source: string): ConfigOverrides {
	const parsed = ConfigOverridesSchema.safeParse(raw);
	if (parsed.success) {
		return parsed.data;
	}

	const rejected = new Set(parsed.error.issues.map((issue) => String(issue.path[0] ?? "")));
	logWarn("Ignoring invalid configuration values", {
		source,
		keys: [...rejected],
		issues: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
	});

	if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
		return {};
	}
	const retained = Object.fromEntries(Object.entries(raw).filter(([key]) => !rejected.has(key)));
	const retry = ConfigOverridesSchema.safeParse(retained);
	return retry.success ? retry.data : {};
}

function readEnvOverrides(env: Env): Record<string, unknown> {
	const overrides: Record<string, unknown> = {};
	const assign = (key: keyof ConfigOverrides, value: unknown) => {
		if (value !== undefined && value !== "") {
			overrides[key] = value;
		}
	};

	assign("port", env.PORT);
	assign("host", env.HOST);
	assign("extensionSecret", env.EXTENSION_SECRET);
	assign("poolMax", env.POOL_MAX);
	assign("credentialLifetimeMs", env.TOKEN_LIFETIME_MS);
	assign("profileStaleMs", env.PROFILE_STALE_MS);
	assign("sweepIntervalMs", env.SWEEP_INTERVAL_MS);
	assign("upstreamTimeoutMs", env.UPSTREAM_TIMEOUT_MS);
	assign("upstreamBaseUrl", env.UPSTREAM_BASE_URL);
	assign("reasoningMode", env.REASONING_MODE);
	assign("modelMatchFloor", env.MODEL_MATCH_FLOOR);
	if (env.API_KEYS !== undefined) {
		const keys = parseApiKeys(env.API_KEYS);
		if (keys.length > 0) {
			overrides.apiKeys = keys;
		}
	}

	const logging: Record<string, unknown> = {};
	if (env.DEBUG !== undefined && env.DEBUG !== "") {
		logging.debug = !["0", "false", "no", "off"].includes(env.DEBUG.trim().toLowerCase());
	}
	if (env.ENABLE_REQUEST_LOGGING !== undefined && env.ENABLE_REQUEST_LOGGING !== "") {
		logging.enableRequestLogging = env.ENABLE_REQUEST_LOGGING === "1";
	}
	if (Object.keys(logging).length > 0) {
		overrides.logging = logging;
	}

	return overrides;
}

/**
 * Split a comma-separated key list, dropping blanks
 */
export function parseApiKeys(raw: string): string[] {
	return raw
		.split(",")
		.map((key) => key.trim())
		.filter((key) => key.length > 0);
}
