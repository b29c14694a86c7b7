import { basename } from "node:path";
import type { HistoryFormat } from "../types/format.js";
import { SUPPORTED_FORMATS } from "../types/format.js";
import { UnknownFormatError } from "../utils/errors.js";

/** Non-empty lines inspected before a format is chosen. */
export const DETECTION_SAMPLE_LINES = 64;

export const FISH_RECORD_START = /^- cmd:(?: |$)/;
export const ZSH_METADATA_PREFIX = /^: (\d+):(\d+);/;
export const TCSH_TIMESTAMP = /^#\+(\d+)\s*$/;

// Control characters that never appear in a text history: NUL, C0 except
// tab/newline/carriage return, DEL.
const BINARY_CONTENT = /[\u0000-\u0008\u000b\u000c\u000e-\u001a\u001c-\u001f\u007f]/;

const FORMAT_ALIASES: Record<string, HistoryFormat> = {
	bash: "plain",
	ash: "plain",
	sh: "plain",
	zsh: "zsh-extended",
	pwsh: "powershell",
	csh: "tcsh",
};

export interface DetectOptions {
	/** Explicit user choice; beats every heuristic. */
	override?: HistoryFormat;
	/** Path of the history file, used only to recognise PowerShell. */
	pathHint?: string;
}

export function isHistoryFormat(value: string): value is HistoryFormat {
	return SUPPORTED_FORMATS.some((format) => format === value);
}

/** Resolve a user-supplied format name or alias. */
export function parseHistoryFormat(name: string): HistoryFormat {
	const key = name.trim().toLowerCase();
	if (isHistoryFormat(key)) return key;
	const alias = FORMAT_ALIASES[key];
	if (alias) return alias;
	throw new UnknownFormatError(
		`Unknown history format: ${name}. Use: ${SUPPORTED_FORMATS.join(", ")}`,
	);
}

export function isPowerShellPath(path: string): boolean {
	return (
		basename(path).toLowerCase() === "consolehost_history.txt" ||
		/[\\/]psreadline[\\/]/i.test(path)
	);
}

/**
 * Pick the history grammar for a sample of the file's first lines.
 * Explicit override > fish record > zsh metadata > tcsh timestamps >
 * PowerShell path hint > plain lines.
 */
export function detectFormat(sample: readonly string[], options?: DetectOptions): HistoryFormat {
	if (options?.override) return options.override;

	const lines = sample.filter((line) => line.trim());

	if (lines.some((line) => BINARY_CONTENT.test(line))) {
		throw new UnknownFormatError(
			"Input does not look like a text shell history; pass an explicit format to read it anyway",
		);
	}

	if (lines.length > 0 && FISH_RECORD_START.test(lines[0])) return "fish";
	if (lines.some((line) => ZSH_METADATA_PREFIX.test(line))) return "zsh-extended";
	if (lines.some((line) => TCSH_TIMESTAMP.test(line.trim()))) return "tcsh";
	if (options?.pathHint && isPowerShellPath(options.pathHint)) return "powershell";

	return "plain";
}
