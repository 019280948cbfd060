import { DEFAULT_MODEL_MATCH_FLOOR } from "../constants.js";
import type { CatalogEntry, ModelCategory, ModelInfo, ModelResolution } from "../types.js";
import { similarity } from "./similarity.js";

export interface ModelCatalogOptions {
	/** Lowest similarity a fuzzy match may have */
	matchFloor?: number;
	/** Contributions from profiles failing this check are left out of the union */
	isContributorActive?: (profileId: string) => boolean;
}

interface Contribution {
	models: ModelInfo[];
	registeredAt: number;
}

/**
 * Union of the models reported by each profile, keyed by public name.
 */
export class ModelCatalog {
	private readonly contributions = new Map<string, Contribution>();
	private readonly matchFloor: number;
	private readonly isContributorActive: (profileId: string) => boolean;

	constructor(options: ModelCatalogOptions = {}) {
		this.matchFloor = options.matchFloor ?? DEFAULT_MODEL_MATCH_FLOOR;
		this.isContributorActive = options.isContributorActive ?? (() => true);
	}

	/**
	 * Replace the models contributed by one profile
	 */
	register(profileId: string, models: ModelInfo[], registeredAt: number = Date.now()): void {
		this.contributions.set(profileId, { models: [...models], registeredAt });
	}

	forget(profileId: string): void {
		this.contributions.delete(profileId);
	}

	/**
	 * Union across active contributors, sorted by name. On a category or id
	 * conflict the most recent registration wins.
	 */
	list(): CatalogEntry[] {
		const ordered = [...this.contributions.entries()]
			.filter(([profileId]) => this.isContributorActive(profileId))
			.sort(([, a], [, b]) => a.registeredAt - b.registeredAt);

		const byName = new Map<string, CatalogEntry>();
		for (const [profileId, contribution] of ordered) {
			for (const model of contribution.models) {
				const existing = byName.get(model.name);
				const profiles = existing ? [...existing.profiles, profileId] : [profileId];
				byName.set(model.name, { ...model, profiles });
			}
		}

		return [...byName.values()].sort((a, b) => compareNames(a.name, b.name));
	}

	names(): string[] {
		return this.list().map((entry) => entry.name);
	}

	/**
	 * Exact case-sensitive match first, then the most similar name at or above
	 * the floor; ties go to the lexicographically first name.
	 */
	resolve(requested: string): ModelResolution {
		const entries = this.list();
		const exact = entries.find((entry) => entry.name === requested);
		if (exact) {
			return { found: true, entry: exact, exact: true };
		}

		let best: { entry: CatalogEntry; score: number } | undefined;
		for (const entry of entries) {
			const score = similarity(requested, entry.name);
			if (score < this.matchFloor) continue;
			// entries are name-sorted, so keeping the first of equal scores is the lexicographic tie-break
			if (!best || score > best.score) {
				best = { entry, score };
			}
		}

		if (best) {
			return { found: true, entry: best.entry, exact: false };
		}
		return { found: false, available: entries.map((entry) => entry.name) };
	}
}

function compareNames(a: string, b: string): number {
	return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Upstream capability lists to a catalog category: image output wins, then
 * image input, else text.
 */
export function categorize(inputCapabilities: string[], outputCapabilities: string[]): ModelCategory {
	if (outputCapabilities.includes("image")) return "image";
	if (inputCapabilities.includes("image")) return "vision";
	return "text";
}
