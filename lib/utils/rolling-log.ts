import { appendFile, rename, rm, stat } from "node:fs/promises";
import { dirname } from "node:path";
import { ensureDirectory } from "./file-system-utils.js";

export interface RollingLogLimits {
	/** Rotate once the file would grow past this */
	maxBytes: number;
	/** Rotated generations kept next to the live file (`.1` … `.maxFiles`) */
	maxFiles: number;
	/** Lines buffered while a write is in flight; the oldest are dropped beyond it */
	maxQueue: number;
}

export type RollingLogWarn = (message: string, extra: Record<string, unknown>) => void;

/**
 * Append-only JSON-lines file with size-based rotation. Lines are queued and
 * written in batches by one flush at a time.
 */
export class RollingLogWriter {
	private readonly queue: string[] = [];
	private limits: RollingLogLimits;
	private flushing = false;
	private scheduled = false;
	private overflowReported = false;
	private pending: Promise<void> | undefined;
	private size = 0;
	private sizeKnown = false;

	constructor(
		readonly filePath: string,
		limits: RollingLogLimits,
		private readonly warn: RollingLogWarn,
	) {
		this.limits = limits;
	}

	setLimits(limits: Partial<RollingLogLimits>): void {
		this.limits = { ...this.limits, ...limits };
	}

	getLimits(): RollingLogLimits {
		return { ...this.limits };
	}

	write(line: string): void {
		if (this.queue.length >= this.limits.maxQueue) {
			this.queue.shift();
			if (!this.overflowReported) {
				this.overflowReported = true;
				this.warn("Rolling log queue overflow; dropping oldest entries", {
					maxQueueLength: this.limits.maxQueue,
				});
			}
		}
		this.queue.push(line);
		this.schedule();
	}

	/** Resolves once everything queued so far has been written */
	async flush(): Promise<void> {
		this.schedule();
		if (this.pending) {
			await this.pending;
		}
	}

	private schedule(): void {
		if (this.scheduled || this.flushing) {
			return;
		}
		this.scheduled = true;
		this.pending = Promise.resolve()
			.then(() => this.drain())
			.catch((error: unknown) => this.warn("Failed to flush rolling logs", { error: describe(error) }));
	}

	private async drain(): Promise<void> {
		if (this.flushing) return;
		this.flushing = true;
		this.scheduled = false;

		try {
			if (this.queue.length > 0) {
				ensureDirectory(dirname(this.filePath));
			}
			while (this.queue.length > 0) {
				const batch = this.queue.splice(0, this.queue.length).join("");
				const bytes = Buffer.byteLength(batch, "utf8");
				await this.rotateIfNeeded(bytes);
				await appendFile(this.filePath, batch, "utf8");
				this.size += bytes;
			}
		} catch (error) {
			this.warn("Failed to write rolling log", { error: describe(error) });
		} finally {
			this.flushing = false;
			if (this.queue.length > 0) {
				this.schedule();
			} else {
				this.overflowReported = false;
			}
		}
	}

	private async rotateIfNeeded(incomingBytes: number): Promise<void> {
		if (!this.sizeKnown) {
			this.size = await this.currentFileSize();
			this.sizeKnown = true;
		}
		if (this.size + incomingBytes <= this.limits.maxBytes) {
			return;
		}

		const { maxFiles } = this.limits;
		await rm(`${this.filePath}.${maxFiles}`, { force: true });
		for (let generation = maxFiles - 1; generation >= 1; generation -= 1) {
			await renameIfPresent(`${this.filePath}.${generation}`, `${this.filePath}.${generation + 1}`);
		}
		await renameIfPresent(this.filePath, `${this.filePath}.1`);
		this.size = 0;
	}

	private async currentFileSize(): Promise<number> {
		try {
			return (await stat(this.filePath)).size;
		} catch (error) {
			if (errorCode(error) !== "ENOENT") {
				this.warn("Failed to stat rolling log", { error: describe(error) });
			}
			return 0;
		}
	}
}

async function renameIfPresent(source: string, target: string): Promise<void> {
	try {
		await rename(source, target);
	} catch (error) {
		if (errorCode(error) !== "ENOENT") {
			throw error;
		}
	}
}

function errorCode(error: unknown): string | undefined {
	if (typeof error === "object" && error !== null && "code" in error && typeof error.code === "string") {
		return error.code;
	}
	return undefined;
}

function describe(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}
