import { POOL_DEFAULTS, UPSTREAM_COOKIES } from "../constants.js";
import type { ModelInfo, PushPayload } from "../types.js";
import { Mutex } from "../utils/mutex.js";
import { CredentialPool, type CredentialPoolOptions } from "./credential-pool.js";

export interface MergeOutcome {
	acceptedTokens: number;
	acceptedFallback: boolean;
	modelsChanged: boolean;
}

/**
 * One upstream account: its session material, challenge tokens and the
 * models it reported. Mutated only under `lock`.
 */
export class Profile {
	readonly id: string;
	readonly pool: CredentialPool;
	readonly lock = new Mutex();
	cookies: Record<string, string> = {};
	authToken = "";
	cfClearance = "";
	models: ModelInfo[] = [];
	lastPushAt = 0;
	pushCount = 0;
	private errorTimestamps: number[] = [];

	constructor(id: string, poolOptions: CredentialPoolOptions) {
		this.id = id;
		this.pool = new CredentialPool(poolOptions);
	}

	/**
	 * Fold a push into this profile. Call under `lock`.
	 */
	merge(payload: PushPayload, now: number): MergeOutcome {
		this.lastPushAt = now;
		this.pushCount += 1;

		this.cookies = mergeCookies(this.cookies, payload.cookies);

		const authToken = payload.authToken || reassembleCookie(this.cookies, UPSTREAM_COOKIES.AUTH);
		if (authToken) {
			this.authToken = authToken;
		}
		const cfClearance = payload.cfClearance || this.cookies[UPSTREAM_COOKIES.CF_CLEARANCE] || "";
		if (cfClearance) {
			this.cfClearance = cfClearance;
		}

		const acceptedTokens = this.pool.add(payload.primaryTokens, now);
		const acceptedFallback = payload.fallbackToken ? this.pool.setFallback(payload.fallbackToken, now) : false;

		let modelsChanged = false;
		if (payload.models && payload.models.length > 0) {
			this.models = payload.models;
			modelsChanged = true;
		}

		return { acceptedTokens, acceptedFallback, modelsChanged };
	}

	recordError(now: number): void {
		this.errorTimestamps.push(now);
		this.pruneErrors(now);
	}

	/** Upstream failures within the error window */
	recentErrors(now: number): number {
		this.pruneErrors(now);
		return this.errorTimestamps.length;
	}

	hasAuth(): boolean {
		return this.authToken.length > 0;
	}

	hasClearance(): boolean {
		return this.cfClearance.length > 0;
	}

	private pruneErrors(now: number): void {
		const cutoff = now - POOL_DEFAULTS.ERROR_WINDOW_MS;
		this.errorTimestamps = this.errorTimestamps.filter((timestamp) => timestamp > cutoff);
	}
}

const FRAGMENT_NAME = /^(.+)\.(\d+)$/;

/**
 * Additive cookie merge: incoming empty values never clear existing ones.
 * A cookie pushed as `name.0`, `name.1`, ... replaces whatever was stored
 * under `name` and its older fragments.
 */
export function mergeCookies(
	current: Record<string, string>,
	incoming: Record<string, string>,
): Record<string, string> {
	const merged = { ...current };
	for (const base of fragmentedNames(incoming)) {
		for (const name of Object.keys(merged)) {
			if (name === base || FRAGMENT_NAME.exec(name)?.[1] === base) {
				delete merged[name];
			}
		}
	}
	for (const [name, value] of Object.entries(incoming)) {
		if (value === "" && merged[name]) {
			continue;
		}
		merged[name] = value;
	}
	return merged;
}

/** Cookies that arrive split into fragments without their whole value */
function fragmentedNames(cookies: Record<string, string>): Set<string> {
	const names = new Set<string>();
	for (const [name, value] of Object.entries(cookies)) {
		const base = FRAGMENT_NAME.exec(name)?.[1];
		if (base && value !== "" && !cookies[base]) {
			names.add(base);
		}
	}
	return names;
}

/**
 * Value of a cookie the browser may have split into `name.0`, `name.1`, ...
 * The unfragmented cookie wins when present.
 */
export function reassembleCookie(cookies: Record<string, string>, name: string): string {
	const whole = cookies[name];
	if (whole) {
		return whole;
	}
	const fragments: string[] = [];
	for (let index = 0; cookies[`${name}.${index}`] !== undefined; index += 1) {
		fragments.push(cookies[`${name}.${index}`]);
	}
	return fragments.join("");
}
