import { writeFile } from "node:fs/promises";
import { join } from "node:path";
import { SERVICE_NAME } from "./constants.js";
import { toErrorMessage } from "./errors.js";
import type { LoggingConfig } from "./types.js";
import { ensureDirectory, getDataPath } from "./utils/file-system-utils.js";
import { RollingLogWriter } from "./utils/rolling-log.js";

const IS_TEST_ENV = process.env.NODE_ENV === "test" || process.env.VITEST === "true";
const LOG_DIR = getDataPath("logs");

export type LogLevel = "debug" | "info" | "warn" | "error";

type LogEntry = {
	timestamp: string;
	service: string;
	level: LogLevel;
	message: string;
	extra?: Record<string, unknown>;
};

/** Flags start from the environment; configureLogger() layers config on top */
const state = {
	requestLogging: process.env.ENABLE_REQUEST_LOGGING === "1",
	debug: isTruthyFlag(process.env.DEBUG),
	announced: false,
	sequence: 0,
};

const rollingLog = new RollingLogWriter(
	join(LOG_DIR, `${SERVICE_NAME}.log`),
	{
		maxBytes: getEnvNumber("LOG_MAX_BYTES", 5 * 1024 * 1024),
		maxFiles: getEnvNumber("LOG_MAX_FILES", 5),
		maxQueue: getEnvNumber("LOG_QUEUE_MAX", 1000),
	},
	(message, extra) => logToConsole("warn", message, extra),
);

export function isLoggingEnabled(): boolean {
	return state.requestLogging;
}

export function isDebugEnabled(): boolean {
	return state.debug;
}

function persistEnabled(): boolean {
	return state.requestLogging || state.debug;
}

/**
 * Apply the logging section of the server config and announce the active
 * mode once.
 */
export function configureLogger(options: { logging?: LoggingConfig } = {}): void {
	const logging = options.logging;
	if (logging) {
		state.requestLogging = logging.enableRequestLogging ?? state.requestLogging;
		state.debug = logging.debug ?? state.debug;
		const limits = rollingLog.getLimits();
		rollingLog.setLimits({
			maxBytes: positiveOr(logging.logMaxBytes, limits.maxBytes),
			maxFiles: positiveOr(logging.logMaxFiles, limits.maxFiles),
			maxQueue: positiveOr(logging.logQueueMax, limits.maxQueue),
		});
	}

	if (state.announced || !persistEnabled()) {
		return;
	}
	state.announced = true;
	if (state.requestLogging) {
		ensureDirectory(LOG_DIR);
		emit("info", "Request logging enabled", { logDir: LOG_DIR });
	} else {
		emit("debug", "Debug logging enabled");
	}
}

/**
 * Record one stage of a request. Each stage is also written as its own JSON
 * file when request logging or debug is on.
 */
export function logRequest(stage: string, data: Record<string, unknown>): void {
	state.sequence += 1;
	const payload = {
		timestamp: new Date().toISOString(),
		sequence: state.sequence,
		stage,
		...data,
	};
	const path = persistEnabled() ? persistRequestStage(stage, state.sequence, payload) : undefined;
	emit("debug", `request.${stage}`, {
		stage,
		sequence: state.sequence,
		requestId: data.requestId,
		profileId: data.profileId,
		path,
	});
}

export function logDebug(message: string, data?: unknown): void {
	emit("debug", message, normalizeExtra(data));
}

export function logInfo(message: string, data?: unknown): void {
	emit("info", message, normalizeExtra(data));
}

export function logWarn(message: string, data?: unknown): void {
	emit("warn", message, normalizeExtra(data));
}

export function logError(message: string, data?: unknown): void {
	emit("error", message, normalizeExtra(data));
}

export function flushRollingLogsForTest(): Promise<void> {
	return rollingLog.flush();
}

function emit(level: LogLevel, message: string, extra?: Record<string, unknown>): void {
	const cleaned = dropEmpty(extra);
	if (persistEnabled()) {
		const entry: LogEntry = {
			timestamp: new Date().toISOString(),
			service: SERVICE_NAME,
			level,
			message,
			extra: cleaned,
		};
		rollingLog.write(`${JSON.stringify(entry)}\n`);
	}
	logToConsole(level, message, cleaned);
}

/**
 * `<iso time> [LEVEL] [service] message {extra}` on the console.
 *
 * Warnings and errors always print. Info prints outside of tests; debug only
 * when the debug flag is on.
 */
function logToConsole(level: LogLevel, message: string, extra?: Record<string, unknown>): void {
	const visible =
		level === "warn" ||
		level === "error" ||
		(!IS_TEST_ENV && (level === "info" || (level === "debug" && state.debug)));
	if (!visible) {
		return;
	}

	const line = `${new Date().toISOString()} [${level.toUpperCase()}] [${SERVICE_NAME}] ${message}`;
	const output = extra ? `${line} ${stringifyExtra(extra)}` : line;
	switch (level) {
		case "error":
			console.error(output);
			break;
		case "warn":
			console.warn(output);
			break;
		default:
			console.log(output);
	}
}

function stringifyExtra(extra: Record<string, unknown>): string {
	try {
		return JSON.stringify(extra);
	} catch (error) {
		// circular or BigInt values
		return `[unserializable: ${toErrorMessage(error)}]`;
	}
}

function persistRequestStage(stage: string, sequence: number, payload: Record<string, unknown>): string | undefined {
	const filename = join(LOG_DIR, `request-${sequence}-${stage}.json`);
	try {
		ensureDirectory(LOG_DIR);
	} catch (error) {
		logToConsole("warn", "Failed to prepare request log", { stage, error: toErrorMessage(error) });
		return undefined;
	}
	void writeFile(filename, JSON.stringify(payload, null, 2), "utf8").catch((error: unknown) => {
		logToConsole("warn", "Failed to persist request log", { stage, error: toErrorMessage(error) });
	});
	return filename;
}

function normalizeExtra(data?: unknown): Record<string, unknown> | undefined {
	if (data === undefined) return undefined;
	if (isRecord(data)) return data;
	return { detail: data };
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function dropEmpty(extra?: Record<string, unknown>): Record<string, unknown> | undefined {
	if (!extra) return undefined;
	const entries = Object.entries(extra).filter(([, value]) => value !== undefined && value !== null);
	return entries.length > 0 ? Object.fromEntries(entries) : undefined;
}

function positiveOr(value: number | undefined, fallback: number): number {
	return typeof value === "number" && Number.isFinite(value) && value > 0 ? value : fallback;
}

function isTruthyFlag(value: string | undefined): boolean {
	if (!value) return false;
	return !["0", "false", "no", "off"].includes(value.trim().toLowerCase());
}

function getEnvNumber(name: string, fallback: number): number {
	const raw = process.env[name];
	return positiveOr(raw ? Number(raw) : undefined, fallback);
}
