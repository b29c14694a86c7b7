import { statSync } from "node:fs";
import { homedir } from "node:os";
import { basename, join } from "node:path";

/** History files each shell writes, relative to the home directory. */
const SHELL_HISTORY_FILES: Record<string, string[]> = {
	ash: [".ash_history"],
	bash: [".bash_history"],
	fish: [".local/share/fish/fish_history"],
	zsh: [".config/zsh/.zsh_history", ".zsh_history"],
	pwsh: [".local/share/powershell/PSReadLine/ConsoleHost_history.txt"],
	tcsh: [".history", ".csh_history", ".tcsh_history"],
	csh: [".history", ".csh_history", ".tcsh_history"],
};

/** Checked after the current shell's own files. */
const FALLBACK_HISTORY_FILES = [
	".bash_history",
	".zsh_history",
	".config/zsh/.zsh_history",
	".ash_history",
	".local/share/fish/fish_history",
	".local/share/powershell/PSReadLine/ConsoleHost_history.txt",
	".history",
];

export function isRegularFile(path: string): boolean {
	try {
		return statSync(path).isFile();
	} catch {
		return false;
	}
}

/** Candidate history files in lookup order, without duplicates. */
export function historyCandidates(env: NodeJS.ProcessEnv = process.env): string[] {
	const candidates: string[] = [];
	const push = (path: string) => {
		if (!candidates.includes(path)) candidates.push(path);
	};

	if (env.HISTFILE) push(env.HISTFILE);

	const home = env.HOME || homedir();
	const shell = env.SHELL ? basename(env.SHELL) : undefined;
	for (const file of (shell && SHELL_HISTORY_FILES[shell]) || []) {
		push(join(home, file));
	}
	for (const file of FALLBACK_HISTORY_FILES) {
		push(join(home, file));
	}
	return candidates;
}

/** First candidate that exists, plus everything that was checked. */
export function resolveHistoryFile(
	env: NodeJS.ProcessEnv = process.env,
	exists: (path: string) => boolean = isRegularFile,
): { path?: string; checked: string[] } {
	const checked = historyCandidates(env);
	return { path: checked.find((candidate) => exists(candidate)), checked };
}
