import { describe, expect, it } from "vitest";
import { historyCandidates, resolveHistoryFile } from "../../src/utils/paths.js";

const env = { HISTFILE: "/h/custom", HOME: "/home/u", SHELL: "/usr/bin/fish" };

describe("historyCandidates", () => {
	it("checks HISTFILE, then the current shell, then common locations", () => {
		expect(historyCandidates(env)).toEqual([
			"/h/custom",
			"/home/u/.local/share/fish/fish_history",
			"/home/u/.bash_history",
			"/home/u/.zsh_history",
			"/home/u/.config/zsh/.zsh_history",
			"/home/u/.ash_history",
			"/home/u/.local/share/powershell/PSReadLine/ConsoleHost_history.txt",
			"/home/u/.history",
		]);
	});

	it("prefers zsh's XDG location for zsh users", () => {
		const candidates = historyCandidates({ HOME: "/home/u", SHELL: "/bin/zsh" });
		expect(candidates.slice(0, 3)).toEqual([
			"/home/u/.config/zsh/.zsh_history",
			"/home/u/.zsh_history",
			"/home/u/.bash_history",
		]);
	});
});

describe("resolveHistoryFile", () => {
	it("returns the first candidate that exists", () => {
		const result = resolveHistoryFile(env, (path) => path === "/home/u/.zsh_history");
		expect(result.path).toBe("/home/u/.zsh_history");
		expect(result.checked).toHaveLength(8);
	});

	it("returns no path when nothing exists", () => {
		expect(resolveHistoryFile(env, () => false).path).toBeUndefined();
	});
});
