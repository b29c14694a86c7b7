import type { RawEntry } from "../types/entry.js";
import type { HistoryFormat } from "../types/format.js";
import { reconstructFishEntries } from "./fish-reader.js";
import { TCSH_TIMESTAMP, ZSH_METADATA_PREFIX } from "./format-detector.js";
import { endsWithContinuation } from "./line-reader.js";

type LineSource = Iterable<string> | AsyncIterable<string>;

/** Bash HISTTIMEFORMAT writes `#<epoch>` above each command. */
const BASH_TIMESTAMP = /^#(\d+)\s*$/;

/**
 * Turn physical lines into logical history entries for the given format.
 * The sequence is lazy and single-pass; empty entries are never yielded.
 */
export function reconstructEntries(lines: LineSource, format: HistoryFormat): AsyncGenerator<RawEntry> {
	switch (format) {
		case "fish":
			return reconstructFishEntries(lines);
		case "zsh-extended":
			return reconstructShellEntries(lines, stripZshMetadata);
		case "tcsh":
			return reconstructShellEntries(lines, timestampComment(TCSH_TIMESTAMP));
		case "plain":
		case "powershell":
			return reconstructShellEntries(lines, timestampComment(BASH_TIMESTAMP));
	}
}

interface LineMeta {
	/** Text left after metadata removal; null when the line carries no command. */
	text: string | null;
	timestamp?: number;
	duration?: number;
}

type MetadataStripper = (line: string) => LineMeta;

function stripZshMetadata(line: string): LineMeta {
	const match = ZSH_METADATA_PREFIX.exec(line);
	if (match) {
		return {
			text: line.slice(match[0].length),
			timestamp: Number(match[1]),
			duration: Number(match[2]),
		};
	}
	// ": 1700000000:0" with the command cut off
	if (/^: \d+:\d+\s*$/.test(line)) return { text: null };
	return { text: line };
}

function timestampComment(pattern: RegExp): MetadataStripper {
	return (line) => {
		const match = pattern.exec(line.trim());
		if (match) return { text: null, timestamp: Number(match[1]) };
		return { text: line };
	};
}

async function* reconstructShellEntries(
	lines: LineSource,
	stripMetadata: MetadataStripper,
): AsyncGenerator<RawEntry> {
	let lineNumber = 0;
	let current: RawEntry | null = null;
	let pendingTimestamp: number | undefined;

	for await (const physical of lines) {
		lineNumber++;
		const raw = physical.endsWith("\r") ? physical.slice(0, -1) : physical;

		// Continuation lines are taken verbatim, metadata only starts an entry.
		const meta: LineMeta = current ? { text: raw } : stripMetadata(raw);
		if (meta.text === null) {
			if (meta.timestamp !== undefined) pendingTimestamp = meta.timestamp;
			continue;
		}

		const continues = endsWithContinuation(meta.text);
		const text = continues ? meta.text.slice(0, -1) : meta.text;

		if (current) {
			current.command += text;
		} else {
			current = { command: text, line: lineNumber };
			const timestamp = meta.timestamp ?? pendingTimestamp;
			if (timestamp !== undefined) current.timestamp = timestamp;
			if (meta.duration !== undefined) current.duration = meta.duration;
			pendingTimestamp = undefined;
		}

		if (!continues) {
			if (current.command.trim()) yield current;
			current = null;
		}
	}

	// File ended mid-continuation
	if (current?.command.trim()) yield current;
}
