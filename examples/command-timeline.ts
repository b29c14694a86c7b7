#!/usr/bin/env tsx
/**
 * command-timeline.ts: Export when commands were run, as JSON.
 *
 * Usage:
 *   npm run example:timeline -- [--file PATH] [--top N]
 *
 * Needs a history with timestamps (zsh extended, fish, tcsh, or bash with
 * HISTTIMEFORMAT). Outputs an hour-of-day distribution, the busiest days
 * and the top commands per hour.
 */

import { createHistoryRanker, normalizeEntry } from "../src/index.js";
import { resolveHistoryFile } from "../src/utils/paths.js";

const args = process.argv.slice(2);
function getArg(name: string, fallback: string): string {
	const idx = args.indexOf(name);
	return idx !== -1 ? (args[idx + 1] ?? fallback) : fallback;
}

const top = Number.parseInt(getArg("--top", "3"), 10);

function toLocalDate(epochSeconds: number): string {
	const d = new Date(epochSeconds * 1000);
	const month = String(d.getMonth() + 1).padStart(2, "0");
	const day = String(d.getDate()).padStart(2, "0");
	return `${d.getFullYear()}-${month}-${day}`;
}

async function main() {
	const file = getArg("--file", "") || resolveHistoryFile().path;
	if (!file) {
		console.error("No history file found; pass --file");
		process.exit(1);
	}

	const ranker = createHistoryRanker();
	const hourBuckets = Array.from({ length: 24 }, () => 0);
	const byHour = new Map<number, Map<string, number>>();
	const byDate = new Map<string, number>();
	let untimed = 0;

	for await (const entry of ranker.entries({ path: file })) {
		if (entry.timestamp === undefined) {
			untimed++;
			continue;
		}
		const hour = new Date(entry.timestamp * 1000).getHours();
		hourBuckets[hour]++;
		const date = toLocalDate(entry.timestamp);
		byDate.set(date, (byDate.get(date) ?? 0) + 1);

		const counts = byHour.get(hour) ?? new Map<string, number>();
		for (const command of normalizeEntry(entry.command)) {
			counts.set(command, (counts.get(command) ?? 0) + 1);
		}
		byHour.set(hour, counts);
	}

	const busiestDays = [...byDate.entries()]
		.sort((a, b) => b[1] - a[1])
		.slice(0, 5)
		.map(([date, entries]) => ({ date, entries }));

	const topByHour = [...byHour.entries()]
		.sort((a, b) => a[0] - b[0])
		.map(([hour, counts]) => ({
			hour,
			commands: [...counts.entries()]
				.sort((a, b) => b[1] - a[1] || (a[0] < b[0] ? -1 : 1))
				.slice(0, top)
				.map(([command, count]) => ({ command, count })),
		}));

	console.log(
		JSON.stringify(
			{
				file,
				format: await ranker.detect({ path: file }),
				untimedEntries: untimed,
				hourDistribution: hourBuckets,
				peakHour: hourBuckets.indexOf(Math.max(...hourBuckets)),
				busiestDays,
				topByHour,
			},
			null,
			2,
		),
	);
}

main().catch((err) => {
	console.error(err instanceof Error ? err.message : err);
	process.exit(1);
});
