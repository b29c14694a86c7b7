import type { PipelineSegment, Token } from "../types/entry.js";

/**
 * Lexer state. Quote context and a pending backslash are folded into one
 * value so every transition is a single `switch` arm.
 */
export type ScanState =
	| "unquoted"
	| "unquoted-escape"
	| "single-quoted"
	| "double-quoted"
	| "double-quoted-escape";

/** Logical OR, kept as a word so it never starts a new segment. */
export const OR_OPERATOR = "||";

function isBlank(ch: string): boolean {
	return ch === " " || ch === "\t" || ch === "\n" || ch === "\r";
}

/**
 * Split one history entry into pipeline segments of words.
 *
 * Single left-to-right scan with one character of lookahead. Understands
 * single and double quotes, backslash escapes, `|` and `|&` as pipeline
 * boundaries and `||` as a plain word. Unterminated quotes run to the end of
 * the entry. Segments without words are dropped.
 */
export function tokenize(entry: string): PipelineSegment[] {
	const segments: PipelineSegment[] = [];
	let segment: Token[] = [];
	let text = "";
	let quoted = false;
	let quotedFrom: number | undefined;
	// A word has started even if it is still empty, e.g. after `""`.
	let inWord = false;
	let state: ScanState = "unquoted";

	const endWord = () => {
		if (inWord) {
			const token: Token = { text, quoted };
			if (quotedFrom !== undefined) token.quotedFrom = quotedFrom;
			segment.push(token);
		}
		text = "";
		quoted = false;
		quotedFrom = undefined;
		inWord = false;
	};

	const protect = () => {
		if (quotedFrom === undefined) quotedFrom = text.length;
	};

	const endSegment = () => {
		endWord();
		if (segment.length > 0) segments.push(segment);
		segment = [];
	};

	for (let i = 0; i < entry.length; i++) {
		const ch = entry[i];

		switch (state) {
			case "unquoted":
				if (ch === "\\") {
					state = "unquoted-escape";
					inWord = true;
					protect();
				} else if (ch === "'") {
					state = "single-quoted";
					inWord = true;
					quoted = true;
					protect();
				} else if (ch === '"') {
					state = "double-quoted";
					inWord = true;
					quoted = true;
					protect();
				} else if (ch === "|") {
					const next = entry[i + 1];
					if (next === "|") {
						endWord();
						segment.push({ text: OR_OPERATOR, quoted: false });
						i++;
					} else {
						if (next === "&") i++;
						endSegment();
					}
				} else if (isBlank(ch)) {
					endWord();
				} else {
					text += ch;
					inWord = true;
				}
				break;

			case "unquoted-escape":
				text += ch;
				state = "unquoted";
				break;

			case "single-quoted":
				if (ch === "'") {
					state = "unquoted";
				} else {
					text += ch;
				}
				break;

			case "double-quoted":
				if (ch === "\\") {
					state = "double-quoted-escape";
				} else if (ch === '"') {
					state = "unquoted";
				} else {
					text += ch;
				}
				break;

			case "double-quoted-escape":
				if (ch !== '"' && ch !== "\\") text += "\\";
				text += ch;
				state = "double-quoted";
				break;
		}
	}

	switch (state) {
		case "unquoted-escape":
			// Lone trailing backslash: nothing to escape.
			if (!text) inWord = false;
			break;
		case "double-quoted-escape":
			text += "\\";
			break;
		case "single-quoted":
		case "double-quoted":
			// Unterminated quote runs to the end; drop the word if it is empty.
			if (!text) inWord = false;
			break;
		case "unquoted":
			break;
	}

	endSegment();
	return segments;
}
