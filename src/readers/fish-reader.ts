import type { RawEntry } from "../types/entry.js";
import { createChildLogger } from "../utils/logger.js";
import { endsWithContinuation } from "./line-reader.js";

const log = createChildLogger("fish-reader");

interface FishRecord {
	line: number;
	/** Raw (still escaped) command value; undefined for records without `cmd`. */
	cmd?: string;
	when?: number;
	/** Inside a `paths:` list; its items are not command text. */
	inPaths: boolean;
}

/**
 * Undo fish's history escaping: `\\` is a backslash, `\n` a newline.
 * Any other backslash sequence is kept as written.
 */
export function unescapeFishValue(value: string): string {
	return value.replace(/\\([\\n])/g, (_match, ch: string) => (ch === "n" ? "\n" : "\\"));
}

function toEntry(record: FishRecord): RawEntry | null {
	if (record.cmd === undefined) return null;
	const command = unescapeFishValue(record.cmd);
	if (!command.trim()) return null;
	const entry: RawEntry = { command, line: record.line };
	if (record.when !== undefined) entry.timestamp = record.when;
	return entry;
}

/**
 * Parse fish_history, a YAML-like list of records:
 *
 *   - cmd: git push
 *     when: 1700000000
 *     paths:
 *       - src/index.ts
 *
 * One record is buffered at a time. Records without `cmd` are skipped.
 */
export async function* reconstructFishEntries(
	lines: Iterable<string> | AsyncIterable<string>,
): AsyncGenerator<RawEntry> {
	let lineNumber = 0;
	let record: FishRecord | null = null;
	let skipped = 0;

	const flush = (): RawEntry | null => {
		if (!record) return null;
		const entry = toEntry(record);
		if (!entry) skipped++;
		record = null;
		return entry;
	};

	for await (const physical of lines) {
		lineNumber++;
		const line = physical.endsWith("\r") ? physical.slice(0, -1) : physical;
		if (!line.trim()) continue;

		if (line.startsWith("- ")) {
			const entry = flush();
			if (entry) yield entry;

			record = { line: lineNumber, inPaths: false };
			const field = /^- cmd:(?: (.*))?$/.exec(line);
			if (field) record.cmd = field[1] ?? "";
			continue;
		}

		// Text before the first record belongs to nothing.
		if (!record) continue;

		const trimmed = line.trimStart();
		const indent = line.length - trimmed.length;

		if (indent > 0 && trimmed.startsWith("when:")) {
			const when = Number.parseInt(trimmed.slice("when:".length).trim(), 10);
			if (Number.isFinite(when)) record.when = when;
			record.inPaths = false;
			continue;
		}
		if (indent > 0 && trimmed.startsWith("paths:")) {
			record.inPaths = true;
			continue;
		}
		if (record.inPaths && trimmed.startsWith("- ")) continue;

		// Indented text after a `cmd` ending in a backslash continues the command.
		if (indent > 0 && record.cmd !== undefined && endsWithContinuation(record.cmd)) {
			record.cmd = `${record.cmd.slice(0, -1).trimEnd()} ${trimmed}`;
			continue;
		}

		log.debug({ line: lineNumber }, "ignoring unrecognised fish history line");
	}

	const entry = flush();
	if (entry) yield entry;

	if (skipped > 0) {
		log.debug({ skipped }, "skipped fish records without a command");
	}
}
