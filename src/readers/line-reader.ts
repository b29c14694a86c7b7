import { createReadStream } from "node:fs";
import { UnreadableInputError } from "../utils/errors.js";

/** Where history text comes from. `pathHint` helps format detection when there is no path. */
export type HistorySource =
	| { path: string }
	| { text: string; pathHint?: string }
	| { stream: AsyncIterable<Uint8Array | string>; pathHint?: string };

export function sourceName(source: HistorySource): string | undefined {
	if ("path" in source) return source.path;
	return source.pathHint;
}

async function* openChunks(source: HistorySource): AsyncGenerator<Uint8Array | string> {
	if ("text" in source) {
		yield source.text;
		return;
	}
	if ("stream" in source) {
		yield* source.stream;
		return;
	}
	try {
		yield* createReadStream(source.path);
	} catch (err) {
		throw new UnreadableInputError(
			`Cannot read history file ${source.path}: ${err instanceof Error ? err.message : String(err)}`,
			err,
		);
	}
}

/**
 * Stream physical lines out of a source. Bytes are decoded as strict UTF-8;
 * any invalid sequence aborts with UnreadableInputError. Line terminators are
 * removed, a trailing `\r` is kept for the reconstructor to strip.
 */
export async function* readLines(source: HistorySource): AsyncGenerator<string> {
	const decoder = new TextDecoder("utf-8", { fatal: true });
	let pending = "";

	const decode = (chunk: Uint8Array | string, stream: boolean): string => {
		if (typeof chunk === "string") return chunk;
		try {
			return decoder.decode(chunk, { stream });
		} catch (err) {
			throw new UnreadableInputError(
				`History ${sourceName(source) ?? "input"} is not valid UTF-8 text`,
				err,
			);
		}
	};

	for await (const chunk of openChunks(source)) {
		pending += decode(chunk, true);
		let start = 0;
		let newline = pending.indexOf("\n", start);
		while (newline !== -1) {
			yield pending.slice(start, newline);
			start = newline + 1;
			newline = pending.indexOf("\n", start);
		}
		pending = pending.slice(start);
	}

	pending += decode(new Uint8Array(0), false);
	if (pending.length > 0) yield pending;
}

/** First `limit` non-empty lines. Stops reading (and closes the source) once it has them. */
export async function sampleLines(lines: AsyncIterable<string>, limit: number): Promise<string[]> {
	const sample: string[] = [];
	if (limit <= 0) return sample;
	for await (const line of lines) {
		if (!line.trim()) continue;
		sample.push(line);
		if (sample.length >= limit) break;
	}
	return sample;
}

/**
 * Read up to `limit` non-empty lines for format detection, then hand back a
 * line sequence that replays them ahead of the rest of the source. Callers
 * that never iterate `lines` must `close()` instead.
 */
export async function peekLines(
	lines: AsyncIterable<string>,
	limit: number,
): Promise<{ sample: string[]; lines: AsyncGenerator<string>; close: () => Promise<void> }> {
	const iterator = lines[Symbol.asyncIterator]();
	const buffered: string[] = [];
	const sample: string[] = [];
	let exhausted = false;

	while (sample.length < limit) {
		const next = await iterator.next();
		if (next.done) {
			exhausted = true;
			break;
		}
		buffered.push(next.value);
		if (next.value.trim()) sample.push(next.value);
	}

	async function* replay(): AsyncGenerator<string> {
		try {
			yield* buffered;
			if (exhausted) return;
			while (true) {
				const next = await iterator.next();
				if (next.done) return;
				yield next.value;
			}
		} finally {
			// Closes the source when the consumer stops early.
			await iterator.return?.();
		}
	}

	const close = async () => {
		await iterator.return?.();
	};

	return { sample, lines: replay(), close };
}

/** True when the line ends in a backslash that is not itself escaped. */
export function endsWithContinuation(line: string): boolean {
	let backslashes = 0;
	for (let i = line.length - 1; i >= 0 && line[i] === "\\"; i--) {
		backslashes++;
	}
	return backslashes % 2 === 1;
}
