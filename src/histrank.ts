import type { CanonicalCommand, RawEntry } from "./types/entry.js";
import type { HistoryFormat } from "./types/format.js";
import type { FrequencyTable, RankedEntry } from "./types/ranking.js";

import { DETECTION_SAMPLE_LINES, detectFormat } from "./readers/format-detector.js";
import {
	type HistorySource,
	peekLines,
	readLines,
	sampleLines,
	sourceName,
} from "./readers/line-reader.js";
import { reconstructEntries } from "./readers/history-reader.js";

import { DEFAULT_WRAPPERS, firstWord, normalizeEntry } from "./parsers/normalizer.js";

import { aggregateCommands, filterTable } from "./aggregations/frequency.js";
import { rankCommands } from "./aggregations/ranking.js";

import { createChildLogger } from "./utils/logger.js";

const log = createChildLogger("ranker");

export const DEFAULT_LIMIT = 25;

export interface RankerConfig {
	/** Force a history format instead of detecting it. */
	format?: HistoryFormat;
	/** Commands left out of the report. */
	ignore?: string[];
	/** Report only commands seen more than this many times. Defaults to 0. */
	moreThan?: number;
	/** Entries in the ranked report. Defaults to 25. */
	limit?: number;
	/** Report every command, ignoring `limit`. */
	all?: boolean;
	/** Wrapper commands stripped from the front of each segment. Defaults to sudo, doas. */
	wrappers?: string[];
	/**
	 * Treat the input as a plain word list: count the first word of every
	 * non-empty line with no wrapper stripping or pipe splitting.
	 */
	rawInput?: boolean;
}

export interface HistoryRanker {
	/** Sample the source and pick its format. */
	detect(source: HistorySource): Promise<HistoryFormat>;
	/** Streaming: logical entries one at a time */
	entries(source: HistorySource): AsyncGenerator<RawEntry>;
	/** Streaming: head commands, one per pipeline segment */
	commands(source: HistorySource): AsyncGenerator<CanonicalCommand>;
	/** Frequency table after ignore and threshold filters */
	count(source: HistorySource): Promise<FrequencyTable>;
	/** Full pipeline: ranked report, capped unless `all` */
	rank(source: HistorySource): Promise<RankedEntry[]>;
}

async function openEntries(
	source: HistorySource,
	override: HistoryFormat | undefined,
): Promise<{ format: HistoryFormat; entries: AsyncGenerator<RawEntry> }> {
	const { sample, lines, close } = await peekLines(readLines(source), DETECTION_SAMPLE_LINES);
	let format: HistoryFormat;
	try {
		format = detectFormat(sample, { override, pathHint: sourceName(source) });
	} catch (err) {
		await close();
		throw err;
	}
	log.debug({ source: sourceName(source), format, overridden: !!override }, "history format selected");
	return { format, entries: reconstructEntries(lines, format) };
}

/** Create a ranker. Every call re-reads its source from the start. */
export function createHistoryRanker(config?: RankerConfig): HistoryRanker {
	const wrappers = new Set(config?.wrappers ?? DEFAULT_WRAPPERS);

	async function* entries(source: HistorySource): AsyncGenerator<RawEntry> {
		const opened = await openEntries(source, config?.format);
		yield* opened.entries;
	}

	async function* commands(source: HistorySource): AsyncGenerator<CanonicalCommand> {
		if (config?.rawInput) {
			for await (const line of readLines(source)) {
				const word = firstWord(line);
				if (word !== undefined) yield word;
			}
			return;
		}

		let entryCount = 0;
		let commandCount = 0;
		for await (const entry of entries(source)) {
			entryCount++;
			for (const command of normalizeEntry(entry.command, { wrappers })) {
				commandCount++;
				yield command;
			}
		}
		log.debug({ entries: entryCount, commands: commandCount }, "history parsed");
	}

	async function count(source: HistorySource): Promise<FrequencyTable> {
		const table = await aggregateCommands(commands(source));
		return filterTable(table, {
			ignore: config?.ignore,
			moreThan: config?.moreThan,
		});
	}

	return {
		async detect(source: HistorySource): Promise<HistoryFormat> {
			if (config?.format) return config.format;
			const sample = await sampleLines(readLines(source), DETECTION_SAMPLE_LINES);
			return detectFormat(sample, { pathHint: sourceName(source) });
		},

		entries,
		commands,
		count,

		async rank(source: HistorySource): Promise<RankedEntry[]> {
			const table = await count(source);
			return rankCommands(table, {
				limit: config?.limit ?? DEFAULT_LIMIT,
				all: config?.all,
			});
		},
	};
}
