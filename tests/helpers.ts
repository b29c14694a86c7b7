export async function collect<T>(items: AsyncIterable<T>): Promise<T[]> {
	const out: T[] = [];
	for await (const item of items) out.push(item);
	return out;
}

export async function* chunks<T extends Uint8Array | string>(...parts: T[]): AsyncGenerator<T> {
	for (const part of parts) yield part;
}

/** A string stream that records whether it was closed. */
export function trackedStream(parts: string[]): { stream: AsyncGenerator<string>; state: { closed: boolean } } {
	const state = { closed: false };
	async function* stream(): AsyncGenerator<string> {
		try {
			for (const part of parts) yield part;
		} finally {
			state.closed = true;
		}
	}
	return { stream: stream(), state };
}
