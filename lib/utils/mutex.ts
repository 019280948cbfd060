/**
 * Promise-chain lock. Callers queue behind each other in arrival order; a
 * rejected task releases the lock like a resolved one.
 */
export class Mutex {
	private tail: Promise<void> = Promise.resolve();
	private pending = 0;

	runExclusive<T>(task: () => T | Promise<T>): Promise<T> {
		this.pending += 1;
		const run = this.tail.then(task);
		this.tail = run.then(
			() => this.release(),
			() => this.release(),
		);
		return run;
	}

	/** Number of tasks queued or running */
	get queued(): number {
		return this.pending;
	}

	private release(): void {
		this.pending -= 1;
	}
}
