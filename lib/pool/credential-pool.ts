import { POOL_DEFAULTS } from "../constants.js";
import type { Credential, PushedToken, TakeResult } from "../types.js";

export interface CredentialPoolOptions {
	maxSize: number;
	lifetimeMs: number;
	minTokenLength?: number;
}

/**
 * Perishable challenge tokens for one profile.
 *
 * Primary tokens are kept oldest-first and bounded by maxSize; overflow drops
 * the oldest. A single fallback slot is handed out only when no primary
 * token is left. Every value that leaves the pool is remembered until its
 * expiry so a re-push of the same token is ignored.
 *
 * The pool itself is synchronous; callers serialize access through the
 * owning profile's lock.
 */
export class CredentialPool {
	private readonly queue: Credential[] = [];
	private fallback: Credential | undefined;
	private readonly spent = new Map<string, number>();
	private readonly maxSize: number;
	private readonly lifetimeMs: number;
	private readonly minTokenLength: number;

	constructor(options: CredentialPoolOptions) {
		this.maxSize = Math.max(1, Math.floor(options.maxSize));
		this.lifetimeMs = options.lifetimeMs;
		this.minTokenLength = options.minTokenLength ?? POOL_DEFAULTS.MIN_TOKEN_LENGTH;
	}

	/**
	 * Merge pushed primary tokens. Returns how many were accepted.
	 */
	add(tokens: PushedToken[], now: number): number {
		this.sweepExpired(now);
		let accepted = 0;

		for (const token of tokens) {
			const credential = this.toCredential(token, "primary", now);
			if (!credential || this.isKnown(credential.value)) {
				continue;
			}
			this.insertOrdered(credential);
			accepted += 1;
		}

		while (this.queue.length > this.maxSize) {
			const evicted = this.queue.shift();
			if (evicted) {
				this.markSpent(evicted);
			}
		}

		return accepted;
	}

	/**
	 * Replace the fallback token. Returns false when the token was rejected.
	 */
	setFallback(token: PushedToken, now: number): boolean {
		const credential = this.toCredential(token, "fallback", now);
		if (!credential || this.isKnown(credential.value)) {
			return false;
		}
		if (this.fallback) {
			this.markSpent(this.fallback);
		}
		this.fallback = credential;
		return true;
	}

	/**
	 * Remove and return the oldest unexpired credential.
	 */
	take(now: number): TakeResult {
		this.sweepExpired(now);

		const next = this.queue.shift() ?? this.takeFallback();
		if (!next) {
			return { success: false, reason: "exhausted" };
		}
		this.markSpent(next);
		return { success: true, credential: next };
	}

	/**
	 * Drop credentials with now >= expiresAt. Returns how many were removed.
	 */
	sweepExpired(now: number): number {
		let removed = 0;
		// Ordered by mintedAt with a shared lifetime, so expiry order matches queue order.
		while (this.queue.length > 0 && this.queue[0].expiresAt <= now) {
			this.queue.shift();
			removed += 1;
		}
		if (this.fallback && this.fallback.expiresAt <= now) {
			this.fallback = undefined;
			removed += 1;
		}
		for (const [value, expiresAt] of this.spent) {
			if (expiresAt <= now) {
				this.spent.delete(value);
			}
		}
		return removed;
	}

	/** Unexpired primary tokens */
	size(now?: number): number {
		if (now === undefined) {
			return this.queue.length;
		}
		return this.queue.filter((credential) => credential.expiresAt > now).length;
	}

	hasFallback(now?: number): boolean {
		if (!this.fallback) return false;
		return now === undefined || this.fallback.expiresAt > now;
	}

	get capacity(): number {
		return this.maxSize;
	}

	private takeFallback(): Credential | undefined {
		const fallback = this.fallback;
		this.fallback = undefined;
		return fallback;
	}

	private toCredential(token: PushedToken, kind: Credential["kind"], now: number): Credential | undefined {
		const value = token.token.trim();
		if (value.length < this.minTokenLength) {
			return undefined;
		}
		const ageMs = Math.max(0, token.ageMs);
		if (ageMs >= this.lifetimeMs) {
			return undefined;
		}
		const mintedAt = now - ageMs;
		return {
			value,
			action: token.action,
			kind,
			mintedAt,
			expiresAt: mintedAt + this.lifetimeMs,
		};
	}

	private isKnown(value: string): boolean {
		return (
			this.spent.has(value) ||
			this.fallback?.value === value ||
			this.queue.some((credential) => credential.value === value)
		);
	}

	private insertOrdered(credential: Credential): void {
		let index = this.queue.length;
		while (index > 0 && this.queue[index - 1].mintedAt > credential.mintedAt) {
			index -= 1;
		}
		this.queue.splice(index, 0, credential);
	}

	private markSpent(credential: Credential): void {
		this.spent.set(credential.value, credential.expiresAt);
	}
}
