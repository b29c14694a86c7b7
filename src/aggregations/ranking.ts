import type { FrequencyTable, RankedEntry, RankOptions } from "../types/ranking.js";
import { totalCount } from "./frequency.js";

/** Count descending, then name ascending by code unit so output is reproducible. */
export function compareRanked(
	a: { command: string; count: number },
	b: { command: string; count: number },
): number {
	if (a.count !== b.count) return b.count - a.count;
	if (a.command < b.command) return -1;
	if (a.command > b.command) return 1;
	return 0;
}

/**
 * Order a filtered table into ranked entries.
 *
 * Percentages are taken over the whole table. The cap is applied afterwards,
 * so a truncated list keeps the figures of the full ranking.
 */
export function rankCommands(table: FrequencyTable, options?: RankOptions): RankedEntry[] {
	const total = totalCount(table);
	if (total === 0) return [];

	const sorted = [...table]
		.map(([command, count]) => ({ command, count }))
		.sort(compareRanked);

	let remaining = total;
	const ranked: RankedEntry[] = sorted.map(({ command, count }) => {
		const entry: RankedEntry = {
			command,
			count,
			percentage: (100 * count) / total,
			inverseCumulativePercentage: (100 * remaining) / total,
		};
		remaining -= count;
		return entry;
	});

	if (options?.all || options?.limit === undefined) return ranked;
	return ranked.slice(0, Math.max(0, options.limit));
}
