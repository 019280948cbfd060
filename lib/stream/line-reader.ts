import { toErrorMessage } from "../errors.js";
import { logDebug } from "../logger.js";

/**
 * Reassembles lines from arbitrarily split text. Accepts `\n` and `\r\n`.
 */
export class LineBuffer {
	private pending = "";

	/** Complete lines contained in everything pushed so far */
	push(text: string): string[] {
		this.pending += text;
		const parts = this.pending.split("\n");
		this.pending = parts.pop() ?? "";
		return parts.map(stripCarriageReturn);
	}

	/** Trailing unterminated line, if any */
	flush(): string[] {
		const rest = stripCarriageReturn(this.pending);
		this.pending = "";
		return rest.length > 0 ? [rest] : [];
	}
}

function stripCarriageReturn(line: string): string {
	return line.endsWith("\r") ? line.slice(0, -1) : line;
}

/**
 * Lines of a byte stream, decoded as UTF-8. `onRead` runs after every
 * network read (used to keep idle timers alive). Cancelling the iteration
 * cancels the underlying stream.
 */
export async function* readLines(
	body: ReadableStream<Uint8Array>,
	onRead?: () => void,
): AsyncGenerator<string, void, undefined> {
	const reader = body.getReader();
	const decoder = new TextDecoder();
	const buffer = new LineBuffer();
	let finished = false;

	try {
		while (true) {
			const { done, value } = await reader.read();
			if (done) break;
			onRead?.();
			yield* buffer.push(decoder.decode(value, { stream: true }));
		}
		yield* buffer.push(decoder.decode());
		yield* buffer.flush();
		finished = true;
	} finally {
		if (!finished) {
			await reader.cancel().catch((error: unknown) => {
				logDebug("Failed to cancel upstream body", { error: toErrorMessage(error) });
			});
		}
		reader.releaseLock();
	}
}
