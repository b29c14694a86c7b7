import type { RankedEntry } from "../types/ranking.js";

export const SCHEMA_VERSION = "1.0";

export interface BarOptions {
	/** Bar width in cells; 0 draws no bar. */
	size: number;
	showPercentage: boolean;
	showCumulative: boolean;
}

const UNFILLED = "░";
const CUMULATIVE = "▓";
const FILLED = "█";

/**
 * Draw one bar. `█` is the command's own share, `▓` the share of every
 * command ranked below it, `░` the rest.
 */
export function renderBar(entry: RankedEntry, options: BarOptions): string {
	const { size } = options;
	if (size <= 0 || (!options.showPercentage && !options.showCumulative)) return "";

	const share = entry.percentage / 100;
	const below = (entry.inverseCumulativePercentage - entry.percentage) / 100;
	let filled = 0;
	let semifilled = 0;

	if (options.showPercentage) filled = Math.min(size, Math.round(share * size));
	if (options.showCumulative) {
		const cumulative = options.showPercentage ? below : entry.inverseCumulativePercentage / 100;
		semifilled = Math.min(size - filled, Math.max(0, Math.round(cumulative * size)));
	}
	const unfilled = size - filled - semifilled;
	return `│${UNFILLED.repeat(unfilled)}${CUMULATIVE.repeat(semifilled)}${FILLED.repeat(filled)}│`;
}

/** Plain-text report: count, optional bar, percentage and command per line. */
export function renderText(entries: readonly RankedEntry[], bar: BarOptions): string {
	if (entries.length === 0) return "";

	// reduce, not Math.max(...rows): `-a` reports can outgrow the argument limit.
	const countWidth = entries.reduce((width, e) => Math.max(width, String(e.count).length), 0);
	const percentages = entries.map((e) => `${e.percentage.toFixed(2)}%`);
	const percentageWidth = percentages.reduce((width, p) => Math.max(width, p.length), 0);
	const padding = "   ";

	const lines = entries.map((entry, i) => {
		let line = String(entry.count).padStart(countWidth) + padding;
		if (bar.size > 0) {
			const drawn = renderBar(entry, bar);
			if (drawn) line += `${drawn} `;
		}
		return `${line}${percentages[i].padStart(percentageWidth)}${padding}${entry.command}`;
	});

	return `${lines.join("\n")}\n`;
}

function csvField(value: string): string {
	if (!/[",\r\n]/.test(value)) return value;
	return `"${value.replace(/"/g, '""')}"`;
}

export function renderCsv(entries: readonly RankedEntry[]): string {
	const rows = ["command,count,percentage,inverse_cumulative_percentage"];
	for (const entry of entries) {
		rows.push(
			[
				csvField(entry.command),
				String(entry.count),
				entry.percentage.toFixed(2),
				entry.inverseCumulativePercentage.toFixed(2),
			].join(","),
		);
	}
	return `${rows.join("\n")}\n`;
}

export interface JsonOptions {
	/** Data only, without the envelope. */
	raw: boolean;
	pretty: boolean;
	generatedAt?: string;
}

export function renderJson(entries: readonly RankedEntry[], options: JsonOptions): string {
	const payload = options.raw
		? entries
		: {
			schemaVersion: SCHEMA_VERSION,
			command: "rank",
			generatedAt: options.generatedAt ?? new Date().toISOString(),
			data: entries,
		};
	return `${JSON.stringify(payload, null, options.pretty ? 2 : 0)}\n`;
}
