import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { getConfigPath, loadServerConfig, parseApiKeys } from "../lib/config.js";
import * as logger from "../lib/logger.js";

vi.mock("../lib/logger.js", () => ({
	__esModule: true,
	logWarn: vi.fn(),
}));

let workDir: string;

function envWith(values: Record<string, string> = {}): Record<string, string> {
	return { ARENA_BRIDGE_CONFIG: join(workDir, "missing.json"), ...values };
}

function writeConfig(content: string): string {
	const path = join(workDir, "config.json");
	writeFileSync(path, content, "utf8");
	return path;
}

beforeEach(() => {
	workDir = mkdtempSync(join(tmpdir(), "bridge-config-"));
	vi.mocked(logger.logWarn).mockClear();
});

afterEach(() => {
	rmSync(workDir, { recursive: true, force: true });
});

describe("loadServerConfig", () => {
	it("returns defaults when neither file nor env set anything", () => {
		expect(loadServerConfig({ forceReload: true, env: envWith() })).toEqual({
			port: 9090,
			host: "0.0.0.0",
			apiKeys: [],
			poolMax: 10,
			credentialLifetimeMs: 110_000,
			profileStaleMs: 120_000,
			sweepIntervalMs: 10_000,
			upstreamTimeoutMs: 120_000,
			upstreamBaseUrl: "https://arena.ai",
			reasoningMode: "field",
			modelMatchFloor: 0.6,
			logging: {},
		});
		expect(logger.logWarn).not.toHaveBeenCalled();
	});

	it("reads overrides from the environment", () => {
		const config = loadServerConfig({
			forceReload: true,
			env: envWith({
				PORT: "8080",
				API_KEYS: " key-one, ,key-two ",
				EXTENSION_SECRET: "test-secret",
				POOL_MAX: "4",
				REASONING_MODE: "inline",
				DEBUG: "0",
				ENABLE_REQUEST_LOGGING: "1",
			}),
		});

		expect(config.port).toBe(8080);
		expect(config.apiKeys).toEqual(["key-one", "key-two"]);
		expect(config.extensionSecret).toBe("test-secret");
		expect(config.poolMax).toBe(4);
		expect(config.reasoningMode).toBe("inline");
		expect(config.logging).toEqual({ debug: false, enableRequestLogging: true });
	});

	it("drops invalid env values and keeps the valid ones", () => {
		const config = loadServerConfig({
			forceReload: true,
			env: envWith({ POOL_MAX: "lots", HOST: "127.0.0.1" }),
		});

		expect(config.poolMax).toBe(10);
		expect(config.host).toBe("127.0.0.1");
		expect(logger.logWarn).toHaveBeenCalledWith(
			"Ignoring invalid configuration values",
			expect.objectContaining({ source: "environment", keys: ["poolMax"] }),
		);
	});

	it("layers env over the config file over defaults", () => {
		const path = writeConfig(JSON.stringify({ port: 7000, reasoningMode: "inline", logging: { logMaxFiles: 3 } }));

		const config = loadServerConfig({
			forceReload: true,
			env: { ARENA_BRIDGE_CONFIG: path, PORT: "7100", DEBUG: "1" },
		});

		expect(config.port).toBe(7100);
		expect(config.reasoningMode).toBe("inline");
		expect(config.logging).toEqual({ logMaxFiles: 3, debug: true });
	});

	it("ignores a config file that is not JSON", () => {
		const path = writeConfig("{ port: ");

		const config = loadServerConfig({ forceReload: true, env: { ARENA_BRIDGE_CONFIG: path } });

		expect(config.port).toBe(9090);
		expect(logger.logWarn).toHaveBeenCalledWith(
			"Failed to load config file",
			expect.objectContaining({ path }),
		);
	});

	it("caches the loaded config until a forced reload", () => {
		const first = loadServerConfig({ forceReload: true, env: envWith() });

		expect(loadServerConfig({ env: envWith({ PORT: "1234" }) })).toBe(first);
		expect(loadServerConfig({ forceReload: true, env: envWith({ PORT: "1234" }) }).port).toBe(1234);
	});
});

describe("getConfigPath", () => {
	it("prefers ARENA_BRIDGE_CONFIG", () => {
		expect(getConfigPath({ ARENA_BRIDGE_CONFIG: "/etc/bridge.json" })).toBe("/etc/bridge.json");
		expect(getConfigPath({})).toMatch(/\.arena-bridge[\\/]config\.json$/);
	});
});

describe("parseApiKeys", () => {
	it("splits on commas and drops blanks", () => {
		expect(parseApiKeys("a,b , ,c")).toEqual(["a", "b", "c"]);
		expect(parseApiKeys("")).toEqual([]);
	});
});
