/**
 * Lower-case and strip everything but letters and digits, so "GPT-4o",
 * "gpt 4o" and "gpt_4o" compare equal.
 */
export function normalizeModelName(name: string): string {
	return name.toLowerCase().replace(/[^\p{L}\p{N}]+/gu, "");
}

/**
 * Similarity of two model names in [0, 1].
 *
 * 1 for equal normalized names; containment scores 0.5 plus half the length
 * ratio; anything else scores by edit distance.
 */
export function similarity(a: string, b: string): number {
	const left = normalizeModelName(a);
	const right = normalizeModelName(b);
	if (left.length === 0 || right.length === 0) {
		return 0;
	}
	if (left === right) {
		return 1;
	}

	const shorter = left.length <= right.length ? left : right;
	const longer = shorter === left ? right : left;
	if (longer.includes(shorter)) {
		return 0.5 + 0.5 * (shorter.length / longer.length);
	}

	return 1 - levenshtein(left, right) / longer.length;
}

export function levenshtein(a: string, b: string): number {
	if (a === b) return 0;
	if (a.length === 0) return b.length;
	if (b.length === 0) return a.length;

	let previous = Array.from({ length: b.length + 1 }, (_, index) => index);
	for (let i = 1; i <= a.length; i += 1) {
		const current = [i];
		for (let j = 1; j <= b.length; j += 1) {
			const cost = a[i - 1] === b[j - 1] ? 0 : 1;
			current[j] = Math.min(previous[j] + 1, current[j - 1] + 1, previous[j - 1] + cost);
		}
		previous = current;
	}
	return previous[b.length];
}
