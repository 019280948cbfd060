import { describe, expect, it } from "vitest";
import { Mutex } from "../lib/utils/mutex.js";

function deferred(): { promise: Promise<void>; resolve: () => void } {
	let resolve: () => void = () => {};
	const promise = new Promise<void>((done) => {
		resolve = done;
	});
	return { promise, resolve };
}

describe("Mutex", () => {
	it("runs tasks one at a time in arrival order", async () => {
		const mutex = new Mutex();
		const gate = deferred();
		const order: string[] = [];

		const first = mutex.runExclusive(async () => {
			order.push("first:start");
			await gate.promise;
			order.push("first:end");
			return 1;
		});
		const second = mutex.runExclusive(() => {
			order.push("second");
			return 2;
		});

		await Promise.resolve();
		expect(mutex.queued).toBe(2);
		expect(order).toEqual(["first:start"]);

		gate.resolve();
		await expect(Promise.all([first, second])).resolves.toEqual([1, 2]);
		expect(order).toEqual(["first:start", "first:end", "second"]);
		expect(mutex.queued).toBe(0);
	});

	it("releases the lock when a task rejects", async () => {
		const mutex = new Mutex();

		await expect(
			mutex.runExclusive(() => {
				throw new Error("task failed");
			}),
		).rejects.toThrow("task failed");
		await expect(mutex.runExclusive(() => "next")).resolves.toBe("next");
		expect(mutex.queued).toBe(0);
	});
});
