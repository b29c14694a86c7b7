#!/usr/bin/env node

import { loadConfig } from "../config/loader.js";
import { createHistoryRanker } from "../histrank.js";
import type { HistorySource } from "../readers/line-reader.js";
import { HistrankError } from "../utils/errors.js";
import { createChildLogger } from "../utils/logger.js";
import { resolveHistoryFile } from "../utils/paths.js";
import { type CliArgs, CliError, HELP, parseArgs, resolveSettings } from "./args.js";
import { SCHEMA_VERSION, renderCsv, renderJson, renderText } from "./render.js";

const log = createChildLogger("cli");

function printError(error: CliError, args?: CliArgs): void {
	const payload = {
		schemaVersion: SCHEMA_VERSION,
		error: {
			code: error.code,
			message: error.message,
			details: error.details,
		},
	};
	const text = args?.pretty ? JSON.stringify(payload, null, 2) : JSON.stringify(payload);
	console.error(text);
}

function resolveSource(args: CliArgs): HistorySource {
	if (args.file === "-") return { stream: process.stdin };
	if (args.file !== undefined) return { path: args.file };

	if (args.rawInput) {
		if (process.stdin.isTTY) {
			throw new CliError(
				"MISSING_INPUT",
				"When using -nh without FILE, provide input through stdin (pipe or redirection), or pass FILE with -f/positional argument",
				2,
			);
		}
		return { stream: process.stdin };
	}

	const { path, checked } = resolveHistoryFile();
	if (!path) {
		throw new CliError(
			"HISTORY_NOT_FOUND",
			`Could not determine shell history file. Checked: ${checked.join(", ")}`,
			1,
			{ checked },
		);
	}
	return { path };
}

async function run(args: CliArgs): Promise<void> {
	if (args.help) {
		process.stdout.write(HELP);
		return;
	}

	const settings = resolveSettings(args, loadConfig(args.configPath));
	const source = resolveSource(args);
	log.debug({ source: "path" in source ? source.path : "stdin", ...settings }, "resolved settings");

	const ranker = createHistoryRanker(settings.ranker);
	const ranked = await ranker.rank(source);

	switch (args.output) {
		case "json":
			process.stdout.write(renderJson(ranked, { raw: args.raw, pretty: args.pretty }));
			return;
		case "csv":
			process.stdout.write(renderCsv(ranked));
			return;
		case "text":
			process.stdout.write(
				renderText(ranked, {
					size: args.noBar ? 0 : settings.barSize,
					showPercentage: !args.noPercentage,
					showCumulative: !args.noCumulative,
				}),
			);
			return;
	}
}

async function main() {
	// EPIPE when piped into `head`: stop quietly.
	process.stdout.on("error", (err: NodeJS.ErrnoException) => {
		if (err.code === "EPIPE") process.exit(0);
		throw err;
	});

	let args: CliArgs | undefined;
	try {
		args = parseArgs(process.argv.slice(2));
		await run(args);
	} catch (err) {
		if (err instanceof CliError) {
			printError(err, args);
			process.exit(err.exitCode);
		}
		if (err instanceof HistrankError) {
			printError(new CliError(err.code, err.message), args);
			process.exit(1);
		}
		const fallback = new CliError(
			"INTERNAL_ERROR",
			err instanceof Error ? err.message : "Unknown error",
		);
		log.error({ err }, "unexpected failure");
		printError(fallback, args);
		process.exit(fallback.exitCode);
	}
}

void main();
