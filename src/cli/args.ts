import type { FileConfig } from "../config/schema.js";
import type { RankerConfig } from "../histrank.js";
import { DEFAULT_LIMIT } from "../histrank.js";
import { parseHistoryFormat } from "../readers/format-detector.js";
import { UnknownFormatError } from "../utils/errors.js";

export type OutputFormat = "text" | "json" | "csv";

export const DEFAULT_BAR_SIZE = 25;

export const HELP = `histrank: Rank the commands in your shell history

USAGE
  histrank [options] [FILE]

  FILE defaults to $HISTFILE, then the history file of $SHELL, then the
  usual bash, zsh, ash, fish, PowerShell and tcsh locations.

OPTIONS
  -f <FILE>             History file to read ("-" reads stdin)
  -c <COUNT>            Number of commands to show (default: ${DEFAULT_LIMIT})
  -a                    Show all commands
  -m <MORE_THAN>        Only show commands used more than MORE_THAN times
  -i <IGNORE>           Commands to ignore, separated by "|" (e.g. "ls|cd")
  -b <BAR_SIZE>         Width of the bar (default: ${DEFAULT_BAR_SIZE})
  -n                    Do not draw the bar
  -nh                   Input is a plain word list, not a history file;
                        reads stdin when no FILE is given
  -np                   Leave the percentage out of the bar
  -nc                   Leave the inverse cumulative percentage out of the bar
  -o, --output <FMT>    Output format: text (default), json, csv
  -F, --format <NAME>   History format: plain, zsh-extended, fish, tcsh,
                        powershell (aliases: bash, ash, sh, zsh, pwsh, csh)
      --config <PATH>   Config file (default: ~/.config/histrank/config.json)
      --pretty          Pretty-print JSON output
      --raw             JSON without the output envelope (data only)
  -h, --help            Show this help

EXAMPLES
  histrank -c 10
  histrank -a -m 5 -i "ls|cd" ~/.zsh_history
  histrank -o json --raw ~/.local/share/fish/fish_history
  cut -d' ' -f1 access.log | histrank -nh
`;

export interface CliArgs {
	file?: string;
	count?: number;
	all: boolean;
	moreThan?: number;
	ignore?: string[];
	barSize?: number;
	noBar: boolean;
	rawInput: boolean;
	noPercentage: boolean;
	noCumulative: boolean;
	output: OutputFormat;
	format?: string;
	configPath?: string;
	pretty: boolean;
	raw: boolean;
	help: boolean;
}

export class CliError extends Error {
	constructor(
		public code: string,
		message: string,
		public exitCode = 1,
		public details?: Record<string, unknown>,
	) {
		super(message);
	}
}

function requireValue(args: string[], i: number, flag: string): string {
	const value = args[i + 1];
	if (value === undefined) {
		throw new CliError("MISSING_ARGUMENT", `Missing value for ${flag}`, 2);
	}
	return value;
}

function parseInteger(value: string, flag: string, min: number): number {
	const parsed = /^\d+$/.test(value) ? Number.parseInt(value, 10) : Number.NaN;
	if (!Number.isSafeInteger(parsed) || parsed < min) {
		const expected = min > 0 ? "a positive integer" : "a non-negative integer";
		throw new CliError("INVALID_ARGUMENT", `Invalid ${flag} argument, must be ${expected}`, 2);
	}
	return parsed;
}

function parseOutput(value: string): OutputFormat {
	const normalized = value.toLowerCase();
	if (normalized === "text" || normalized === "json" || normalized === "csv") return normalized;
	throw new CliError("INVALID_OUTPUT", `Invalid output format: ${value}. Use: text, json, csv`, 2);
}

export function parseArgs(args: string[]): CliArgs {
	const result: CliArgs = {
		all: false,
		noBar: false,
		rawInput: false,
		noPercentage: false,
		noCumulative: false,
		output: "text",
		pretty: false,
		raw: false,
		help: false,
	};

	const setFile = (file: string) => {
		if (result.file !== undefined) {
			throw new CliError(
				"CONFLICTING_INPUT",
				"Conflicting input file arguments: use either -f <FILE> or positional FILE, not both",
				2,
			);
		}
		result.file = file;
	};

	let i = 0;
	while (i < args.length) {
		const arg = args[i];

		if (arg === "--help" || arg === "-h") {
			result.help = true;
		} else if (arg === "-f") {
			setFile(requireValue(args, i++, arg));
		} else if (arg === "-c") {
			result.count = parseInteger(requireValue(args, i++, arg), arg, 1);
		} else if (arg === "-a") {
			result.all = true;
		} else if (arg === "-m") {
			result.moreThan = parseInteger(requireValue(args, i++, arg), arg, 0);
		} else if (arg === "-i") {
			result.ignore = requireValue(args, i++, arg)
				.split("|")
				.map((name) => name.trim())
				.filter(Boolean);
		} else if (arg === "-b") {
			result.barSize = parseInteger(requireValue(args, i++, arg), arg, 1);
		} else if (arg === "-n") {
			result.noBar = true;
		} else if (arg === "-nh") {
			result.rawInput = true;
		} else if (arg === "-np") {
			result.noPercentage = true;
		} else if (arg === "-nc") {
			result.noCumulative = true;
		} else if (arg === "-o" || arg === "--output") {
			result.output = parseOutput(requireValue(args, i++, arg));
		} else if (arg === "-F" || arg === "--format") {
			result.format = requireValue(args, i++, arg);
		} else if (arg === "--config") {
			result.configPath = requireValue(args, i++, arg);
		} else if (arg === "--pretty") {
			result.pretty = true;
		} else if (arg === "--raw") {
			result.raw = true;
		} else if (arg === "-" || !arg.startsWith("-")) {
			setFile(arg);
		} else {
			throw new CliError("INVALID_OPTION", `Invalid option: ${arg}`, 2);
		}

		i++;
	}

	return result;
}

export interface Settings {
	ranker: RankerConfig;
	barSize: number;
}

/** Merge defaults, the config file and CLI flags, in that order of precedence. */
export function resolveSettings(args: CliArgs, file: FileConfig): Settings {
	const formatName = args.format ?? file.format;
	let format: RankerConfig["format"];
	if (formatName !== undefined) {
		try {
			format = parseHistoryFormat(formatName);
		} catch (err) {
			if (err instanceof UnknownFormatError) {
				throw new CliError("INVALID_FORMAT", err.message, 2);
			}
			throw err;
		}
	}

	return {
		ranker: {
			format,
			ignore: args.ignore ?? file.ignore ?? [],
			moreThan: args.moreThan ?? file.moreThan ?? 0,
			limit: args.count ?? file.count ?? DEFAULT_LIMIT,
			all: args.all,
			wrappers: file.wrappers,
			rawInput: args.rawInput,
		},
		barSize: args.barSize ?? file.barSize ?? DEFAULT_BAR_SIZE,
	};
}
