import type { CanonicalCommand, PipelineSegment, Token } from "../types/entry.js";
import { tokenize } from "./tokenizer.js";

/** Privilege-escalation prefixes that never count as commands themselves. */
export const DEFAULT_WRAPPERS: readonly string[] = ["sudo", "doas"];

const ASSIGNMENT = /^[A-Za-z_][A-Za-z0-9_]*=/;

export interface NormalizeOptions {
	/** Wrapper names to peel. Defaults to sudo and doas. */
	wrappers?: Iterable<string>;
}

/** `NAME=value` where `NAME=` itself was typed bare; `"A=1"` and `A\=1` are plain words. */
export function isAssignment(token: Token): boolean {
	const match = ASSIGNMENT.exec(token.text);
	if (!match) return false;
	return token.quotedFrom === undefined || token.quotedFrom >= match[0].length;
}

/**
 * Reduce one pipeline segment to its head command: drop leading `NAME=value`
 * assignments and wrapper commands (in any order, nested), plus a `--` that
 * directly follows a wrapper. Returns undefined when nothing is left.
 */
export function normalizeSegment(
	segment: PipelineSegment,
	options?: NormalizeOptions,
): CanonicalCommand | undefined {
	const wrappers = new Set(options?.wrappers ?? DEFAULT_WRAPPERS);
	let i = 0;

	while (i < segment.length) {
		const token = segment[i];
		if (isAssignment(token)) {
			i++;
		} else if (wrappers.has(token.text)) {
			i++;
			if (segment[i]?.text === "--") i++;
		} else {
			break;
		}
	}

	const head = segment[i];
	if (!head || !head.text) return undefined;
	return head.text;
}

/** Tokenize an entry and normalize every pipeline segment in order. */
export function normalizeEntry(entry: string, options?: NormalizeOptions): CanonicalCommand[] {
	const wrappers = new Set(options?.wrappers ?? DEFAULT_WRAPPERS);
	const commands: CanonicalCommand[] = [];
	for (const segment of tokenize(entry)) {
		const command = normalizeSegment(segment, { wrappers });
		if (command !== undefined) commands.push(command);
	}
	return commands;
}

/**
 * First whitespace-separated word of a line, with no shell awareness at all.
 * Used when the input is an arbitrary word list rather than a history file.
 */
export function firstWord(line: string): CanonicalCommand | undefined {
	const word = line.trim().split(/\s+/, 1)[0];
	return word ? word : undefined;
}
