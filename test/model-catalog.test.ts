import { describe, expect, it } from "vitest";
import { ModelCatalog, categorize } from "../lib/models/model-catalog.js";
import { levenshtein, normalizeModelName, similarity } from "../lib/models/similarity.js";
import type { ModelInfo } from "../lib/types.js";

function model(name: string, id = `${name}-id`): ModelInfo {
	return { name, id, category: "text" };
}

describe("similarity", () => {
	it("normalizes case and punctuation", () => {
		expect(normalizeModelName("GPT-4o Mini")).toBe("gpt4omini");
		expect(similarity("gpt-4o", "GPT 4o")).toBe(1);
	});

	it("scores containment by length ratio", () => {
		// "claude3" inside "claude3opus"
		expect(similarity("claude-3", "claude-3-opus")).toBeCloseTo(0.5 + 0.5 * (7 / 11), 10);
	});

	it("falls back to edit distance", () => {
		expect(levenshtein("kitten", "sitting")).toBe(3);
		expect(similarity("abcd", "abce")).toBe(0.75);
	});

	it("scores empty names as unrelated", () => {
		expect(similarity("", "gpt")).toBe(0);
		expect(similarity("---", "gpt")).toBe(0);
	});
});

describe("ModelCatalog", () => {
	it("resolves exact names first", () => {
		const catalog = new ModelCatalog();
		catalog.register("p1", [model("gpt-4o"), model("gpt-4o-mini")], 1);

		const resolution = catalog.resolve("gpt-4o");
		expect(resolution.found && resolution.exact).toBe(true);
		expect(resolution.found && resolution.entry.name).toBe("gpt-4o");
	});

	it("resolves near misses to the most similar name", () => {
		const catalog = new ModelCatalog();
		catalog.register("p1", [model("gpt-4o"), model("gpt-4o-mini"), model("claude-3-opus")], 1);

		const resolution = catalog.resolve("GPT4o");
		expect(resolution).toMatchObject({ found: true, exact: false, entry: { name: "gpt-4o" } });
	});

	it("ignores case, spaces and dashes when matching", () => {
		const catalog = new ModelCatalog();
		catalog.register("p1", [model("GPT-4o"), model("GPT-4o-mini"), model("claude-3-opus")], 1);

		const resolution = catalog.resolve("gpt 4o");
		expect(resolution).toMatchObject({ found: true, exact: false, entry: { name: "GPT-4o" } });
	});

	it("breaks similarity ties by name", () => {
		const catalog = new ModelCatalog();
		catalog.register("p1", [model("model-ac"), model("model-ab")], 1);

		for (let attempt = 0; attempt < 3; attempt += 1) {
			const resolution = catalog.resolve("model-a");
			expect(resolution.found && resolution.entry.name).toBe("model-ab");
		}
	});

	it("returns every known name when nothing is close enough", () => {
		const catalog = new ModelCatalog();
		catalog.register("p1", [model("zeta"), model("alpha")], 1);

		expect(catalog.resolve("completely-different")).toEqual({ found: false, available: ["alpha", "zeta"] });
	});

	it("honors a custom match floor", () => {
		const catalog = new ModelCatalog({ matchFloor: 0.9 });
		catalog.register("p1", [model("abcd")], 1);

		expect(catalog.resolve("abce").found).toBe(false);
	});

	it("unions contributions and lets the latest registration win", () => {
		const catalog = new ModelCatalog();
		catalog.register("p2", [model("shared", "id-new"), model("only-p2")], 2);
		catalog.register("p1", [model("shared", "id-old")], 1);

		expect(catalog.list()).toEqual([
			{ name: "only-p2", id: "only-p2-id", category: "text", profiles: ["p2"] },
			{ name: "shared", id: "id-new", category: "text", profiles: ["p1", "p2"] },
		]);
	});

	it("leaves out inactive contributors", () => {
		const active = new Set(["p1"]);
		const catalog = new ModelCatalog({ isContributorActive: (id) => active.has(id) });
		catalog.register("p1", [model("one")], 1);
		catalog.register("p2", [model("two")], 2);

		expect(catalog.names()).toEqual(["one"]);
		active.add("p2");
		expect(catalog.names()).toEqual(["one", "two"]);
		catalog.forget("p2");
		expect(catalog.names()).toEqual(["one"]);
	});
});

describe("categorize", () => {
	it("prefers image output, then image input", () => {
		expect(categorize(["text"], ["image"])).toBe("image");
		expect(categorize(["text", "image"], ["text"])).toBe("vision");
		expect(categorize(["text"], ["text"])).toBe("text");
	});
});
