import { ERROR_MESSAGES, LOG_STAGES } from "../constants.js";
import { ServiceUnavailableError } from "../errors.js";
import { logRequest, logWarn } from "../logger.js";
import type { Profile } from "../pool/profile.js";
import type { ProfileRegistry } from "../pool/profile-registry.js";
import type { Credential } from "../types.js";

export interface Lease {
	profile: Profile;
	credential: Credential;
	/** Candidates tried before this one came through */
	attempts: number;
}

export interface AcquireOptions {
	requestId: string;
	/** Restrict candidates to these profiles (those that reported the model) */
	profileIds?: readonly string[];
}

/**
 * Admission control: picks the healthiest active profile that still holds a
 * credential and takes it. A taken credential is never handed back.
 */
export class Dispatcher {
	constructor(
		private readonly registry: ProfileRegistry,
		private readonly now: () => number = Date.now,
	) {}

	/**
	 * True when at least one profile could be dispatched to right now
	 */
	hasActiveProfile(): boolean {
		return this.registry.listActive(this.now()).length > 0;
	}

	async acquire(options: AcquireOptions): Promise<Lease> {
		const active = this.registry.listActive(this.now());
		if (active.length === 0) {
			logWarn("Rejecting request: no active profile", { requestId: options.requestId });
			throw new ServiceUnavailableError(ERROR_MESSAGES.NO_ACTIVE_PROFILE);
		}

		const allowed = options.profileIds ? new Set(options.profileIds) : undefined;
		const candidates = allowed ? active.filter(({ profile }) => allowed.has(profile.id)) : active;
		if (candidates.length === 0) {
			logWarn("Rejecting request: no active profile serves the model", { requestId: options.requestId });
			throw new ServiceUnavailableError(ERROR_MESSAGES.NO_PROFILE_FOR_MODEL);
		}

		for (const [index, { profile, score }] of candidates.entries()) {
			const result = await profile.lock.runExclusive(() => profile.pool.take(this.now()));
			if (result.success) {
				logRequest(LOG_STAGES.DISPATCH, {
					requestId: options.requestId,
					profileId: profile.id,
					health: score,
					credentialKind: result.credential.kind,
					attempts: index + 1,
				});
				return { profile, credential: result.credential, attempts: index + 1 };
			}
			logWarn("Profile pool exhausted, trying next candidate", {
				requestId: options.requestId,
				profileId: profile.id,
			});
		}

		throw new ServiceUnavailableError(ERROR_MESSAGES.POOLS_EXHAUSTED);
	}
}
