import { POOL_DEFAULTS } from "../constants.js";
import type { ModelCatalog } from "../models/model-catalog.js";
import type { ProfileStatus, PushPayload, PushResult } from "../types.js";
import { uuid7 } from "../utils/uuid7.js";
import { compareRanked, healthScore, type RankedProfile } from "./health.js";
import { Profile } from "./profile.js";

export interface ProfileRegistryOptions {
	poolMax?: number;
	credentialLifetimeMs?: number;
	staleAfterMs?: number;
	catalog?: ModelCatalog;
	now?: () => number;
}

/**
 * Identity-keyed store of every known profile. Process-wide, in memory,
 * rebuilt from pushes after a restart.
 */
export class ProfileRegistry {
	readonly poolMax: number;
	readonly credentialLifetimeMs: number;
	readonly staleAfterMs: number;
	private readonly profiles = new Map<string, Profile>();
	private readonly catalog?: ModelCatalog;
	private readonly now: () => number;

	constructor(options: ProfileRegistryOptions = {}) {
		this.poolMax = options.poolMax ?? POOL_DEFAULTS.MAX_SIZE;
		this.credentialLifetimeMs = options.credentialLifetimeMs ?? POOL_DEFAULTS.CREDENTIAL_LIFETIME_MS;
		this.staleAfterMs = options.staleAfterMs ?? POOL_DEFAULTS.PROFILE_STALE_MS;
		this.catalog = options.catalog;
		this.now = options.now ?? Date.now;
	}

	/**
	 * Merge a validated push into its profile, creating the profile (and its
	 * id, when the push carries none) on first sight. lastPushAt moves even
	 * when nothing else in the payload is new.
	 */
	async ingestPush(payload: PushPayload): Promise<PushResult> {
		const assigned = !payload.profileId;
		const profileId = payload.profileId ?? uuid7(this.now());
		const profile = this.getOrCreate(profileId);

		return profile.lock.runExclusive(() => {
			const now = this.now();
			const outcome = profile.merge(payload, now);
			if (outcome.modelsChanged) {
				this.catalog?.register(profile.id, profile.models, now);
			}
			const tokenCount = profile.pool.size(now);
			return {
				profileId,
				assigned,
				poolMax: this.poolMax,
				needTokens: tokenCount < this.poolMax / 2,
				tokenCount,
			};
		});
	}

	get(profileId: string): Profile | undefined {
		return this.profiles.get(profileId);
	}

	isActive(profileId: string, now: number = this.now()): boolean {
		const profile = this.profiles.get(profileId);
		return profile !== undefined && this.isProfileActive(profile, now);
	}

	/**
	 * Active profiles with their health, best first
	 */
	listActive(now: number = this.now()): RankedProfile[] {
		const ranked: RankedProfile[] = [];
		for (const profile of this.profiles.values()) {
			if (this.isProfileActive(profile, now)) {
				ranked.push({ profile, score: this.healthScore(profile, now) });
			}
		}
		return ranked.sort(compareRanked);
	}

	healthScore(profile: Profile, now: number = this.now()): number {
		return healthScore(profile, now, this.staleAfterMs);
	}

	recordError(profileId: string): void {
		this.profiles.get(profileId)?.recordError(this.now());
	}

	/**
	 * Expire credentials in every pool. Returns the number removed.
	 */
	async sweepExpired(): Promise<number> {
		const removed = await Promise.all(
			[...this.profiles.values()].map((profile) =>
				profile.lock.runExclusive(() => profile.pool.sweepExpired(this.now())),
			),
		);
		return removed.reduce((total, count) => total + count, 0);
	}

	status(now: number = this.now()): ProfileStatus[] {
		return [...this.profiles.values()]
			.map((profile) => ({
				profile_id: profile.id,
				active: this.isProfileActive(profile, now),
				health: this.healthScore(profile, now),
				tokens: profile.pool.size(now),
				has_fallback_token: profile.pool.hasFallback(now),
				has_auth: profile.hasAuth(),
				has_cf_clearance: profile.hasClearance(),
				last_push_ago_s: profile.lastPushAt > 0 ? Math.round((now - profile.lastPushAt) / 100) / 10 : null,
				push_count: profile.pushCount,
				recent_errors: profile.recentErrors(now),
				models: profile.models.length,
				cookies: Object.keys(profile.cookies).sort(),
			}))
			.sort((a, b) => (a.profile_id < b.profile_id ? -1 : a.profile_id > b.profile_id ? 1 : 0));
	}

	get size(): number {
		return this.profiles.size;
	}

	private getOrCreate(profileId: string): Profile {
		let profile = this.profiles.get(profileId);
		if (!profile) {
			profile = new Profile(profileId, {
				maxSize: this.poolMax,
				lifetimeMs: this.credentialLifetimeMs,
			});
			this.profiles.set(profileId, profile);
		}
		return profile;
	}

	private isProfileActive(profile: Profile, now: number): boolean {
		return profile.lastPushAt > 0 && now - profile.lastPushAt < this.staleAfterMs;
	}
}
