/** One logical command line as the user typed it. */
export interface RawEntry {
	command: string;
	/** 1-based physical line the entry starts on. */
	line: number;
	/** Epoch seconds, when the format records it. */
	timestamp?: number;
	/** Seconds the command ran (zsh extended history only). */
	duration?: number;
}

export interface Token {
	text: string;
	/** True when any part of the word was inside quotes. */
	quoted: boolean;
	/** Offset of the first quoted or backslash-escaped character; absent for a bare word. */
	quotedFrom?: number;
}

/** Tokens between two unquoted pipe operators. */
export type PipelineSegment = Token[];

/** Head command of a pipeline segment, the unit that gets counted. */
export type CanonicalCommand = string;
