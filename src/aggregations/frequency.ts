import type { CanonicalCommand } from "../types/entry.js";
import type { FrequencyFilter, FrequencyTable } from "../types/ranking.js";

/** Count every command in the sequence. Each occurrence adds exactly one. */
export async function aggregateCommands(
	commands: Iterable<CanonicalCommand> | AsyncIterable<CanonicalCommand>,
): Promise<FrequencyTable> {
	const table: FrequencyTable = new Map();
	for await (const command of commands) {
		table.set(command, (table.get(command) ?? 0) + 1);
	}
	return table;
}

/**
 * Drop ignored commands and those not seen more than `moreThan` times.
 * Returns a new table; the input is left as is.
 */
export function filterTable(table: FrequencyTable, filter?: FrequencyFilter): FrequencyTable {
	const ignore = new Set(filter?.ignore ?? []);
	const moreThan = filter?.moreThan ?? 0;
	const filtered: FrequencyTable = new Map();
	for (const [command, count] of table) {
		if (ignore.has(command)) continue;
		if (count <= moreThan) continue;
		filtered.set(command, count);
	}
	return filtered;
}

export function totalCount(table: FrequencyTable): number {
	let total = 0;
	for (const count of table.values()) total += count;
	return total;
}
