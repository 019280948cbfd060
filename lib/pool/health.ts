import type { Profile } from "./profile.js";

/**
 * Selection weights. Only the ordering they produce matters; see
 * healthScore for the monotonicity every set of weights must keep.
 */
export const HEALTH_WEIGHTS = {
	perCredential: 10,
	fallbackCredential: 4,
	freshness: 30,
	auth: 15,
	clearance: 5,
	perRecentError: 20,
} as const;

export interface RankedProfile {
	profile: Profile;
	score: number;
}

/**
 * Derived dispatch ranking for one profile.
 *
 * Increases with pool size, push recency and auth material; decreases with
 * upstream failures in the error window. Profiles past staleAfterMs get no
 * freshness credit.
 */
export function healthScore(profile: Profile, now: number, staleAfterMs: number): number {
	const ageMs = Math.max(0, now - profile.lastPushAt);
	const freshness = staleAfterMs > 0 ? Math.max(0, 1 - ageMs / staleAfterMs) : 0;

	let score = profile.pool.size(now) * HEALTH_WEIGHTS.perCredential;
	if (profile.pool.hasFallback(now)) score += HEALTH_WEIGHTS.fallbackCredential;
	score += freshness * HEALTH_WEIGHTS.freshness;
	if (profile.hasAuth()) score += HEALTH_WEIGHTS.auth;
	if (profile.hasClearance()) score += HEALTH_WEIGHTS.clearance;
	score -= profile.recentErrors(now) * HEALTH_WEIGHTS.perRecentError;

	return Math.round(score * 100) / 100;
}

/**
 * Highest score first; equal scores fall back to profile id so the order is
 * deterministic.
 */
export function compareRanked(a: RankedProfile, b: RankedProfile): number {
	if (a.score !== b.score) {
		return b.score - a.score;
	}
	return a.profile.id < b.profile.id ? -1 : a.profile.id > b.profile.id ? 1 : 0;
}
