import { existsSync, readFileSync } from "node:fs";
import { homedir } from "node:os";
import { join, resolve } from "node:path";
import { ConfigError } from "../utils/errors.js";
import { createChildLogger } from "../utils/logger.js";
import { type FileConfig, FileConfigSchema } from "./schema.js";

const log = createChildLogger("config");

/** `$XDG_CONFIG_HOME/histrank/config.json`, or under `~/.config`. */
export function defaultConfigPath(env: NodeJS.ProcessEnv = process.env): string {
	const base = env.XDG_CONFIG_HOME || join(homedir(), ".config");
	return join(base, "histrank", "config.json");
}

/** Parse and validate config file content. */
export function parseConfig(text: string, source = "config"): FileConfig {
	let raw: unknown;
	try {
		raw = JSON.parse(text);
	} catch (err) {
		throw new ConfigError(`${source}: invalid JSON: ${err instanceof Error ? err.message : String(err)}`, err);
	}

	const parsed = FileConfigSchema.safeParse(raw);
	if (!parsed.success) {
		const issues = parsed.error.issues
			.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
			.join("; ");
		throw new ConfigError(`${source}: ${issues}`, parsed.error);
	}
	return parsed.data;
}

/**
 * Load the config file. An explicit path must exist; the default location
 * is optional and yields an empty config when absent.
 */
export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): FileConfig {
	const explicit = configPath !== undefined;
	const path = resolve(configPath ?? defaultConfigPath(env));

	if (!existsSync(path)) {
		if (explicit) throw new ConfigError(`Config file not found: ${path}`);
		return {};
	}

	let text: string;
	try {
		text = readFileSync(path, "utf-8");
	} catch (err) {
		throw new ConfigError(`Failed to read config file ${path}`, err);
	}

	const config = parseConfig(text, path);
	log.debug({ path, keys: Object.keys(config) }, "config loaded");
	return config;
}
