import { describe, expect, it } from "vitest";
import { firstWord, isAssignment, normalizeEntry, normalizeSegment } from "../../src/parsers/normalizer.js";
import { tokenize } from "../../src/parsers/tokenizer.js";

describe("normalizeEntry", () => {
	it("strips nested wrappers and assignments between them", () => {
		expect(normalizeEntry("sudo doas EXTRA=1 ls -la")).toEqual(["ls"]);
	});

	it("yields nothing for a bare assignment", () => {
		expect(normalizeEntry("FOO=bar")).toEqual([]);
		expect(normalizeEntry("FOO=bar BAR=baz")).toEqual([]);
	});

	it("yields nothing for a bare wrapper", () => {
		expect(normalizeEntry("sudo")).toEqual([]);
		expect(normalizeEntry("sudo --")).toEqual([]);
	});

	it("strips leading assignments, including quoted values", () => {
		expect(normalizeEntry("CC=clang CFLAGS='-O2 -g' make all")).toEqual(["make"]);
	});

	it("does not peel a word whose name part is quoted or escaped", () => {
		expect(normalizeEntry('"FOO=bar" ls')).toEqual(["FOO=bar"]);
		expect(normalizeEntry("'FOO'=x ls")).toEqual(["FOO=x"]);
		expect(normalizeEntry("FOO\\=x ls")).toEqual(["FOO=x"]);
		expect(normalizeEntry('FOO="a b" ls')).toEqual(["ls"]);
	});

	it("alternates assignment and wrapper peeling", () => {
		expect(normalizeEntry("LANG=C sudo FOO=1 doas -- systemctl stop sshd")).toEqual(["systemctl"]);
	});

	it("only peels `--` directly after a wrapper", () => {
		expect(normalizeEntry("-- ls")).toEqual(["--"]);
	});

	it("does not treat words starting with a digit as assignments", () => {
		expect(normalizeEntry("1FOO=bar ls")).toEqual(["1FOO=bar"]);
	});

	it("takes the head command verbatim", () => {
		expect(normalizeEntry(", foo")).toEqual([","]);
		expect(normalizeEntry("$EDITOR notes.md")).toEqual(["$EDITOR"]);
		expect(normalizeEntry("./build.sh --release")).toEqual(["./build.sh"]);
		expect(normalizeEntry("\\ls -la")).toEqual(["ls"]);
	});

	it("normalizes each pipeline segment", () => {
		expect(normalizeEntry("ls | sudo grep x | FOO=1")).toEqual(["ls", "grep"]);
		expect(normalizeEntry('echo "a | b"')).toEqual(["echo"]);
	});

	it("skips a segment whose head is an empty word", () => {
		expect(normalizeEntry('"" ls')).toEqual([]);
	});

	it("accepts a custom wrapper list", () => {
		expect(normalizeEntry("time make", { wrappers: ["time"] })).toEqual(["make"]);
		expect(normalizeEntry("sudo make", { wrappers: ["time"] })).toEqual(["sudo"]);
	});

	it("is a fixed point on an already normalized command", () => {
		for (const entry of ["sudo doas EXTRA=1 ls -la", "FOO=1 git push", "doas -- vim"]) {
			const [head] = normalizeEntry(entry);
			expect(normalizeEntry(head)).toEqual([head]);
		}
	});
});

describe("normalizeSegment", () => {
	it("returns undefined for an empty segment", () => {
		expect(normalizeSegment([])).toBeUndefined();
	});

	it("reads the first remaining token", () => {
		const [segment] = tokenize("sudo apt update");
		expect(normalizeSegment(segment)).toBe("apt");
	});
});

describe("isAssignment", () => {
	it("matches identifier=value words", () => {
		expect(isAssignment({ text: "_A1=", quoted: false })).toBe(true);
		expect(isAssignment({ text: "A-B=1", quoted: false })).toBe(false);
		expect(isAssignment({ text: "=1", quoted: false })).toBe(false);
	});

	it("requires the name and equals sign to be bare", () => {
		expect(isAssignment({ text: "A=x y", quoted: true, quotedFrom: 2 })).toBe(true);
		expect(isAssignment({ text: "A=1", quoted: true, quotedFrom: 0 })).toBe(false);
		expect(isAssignment({ text: "A=1", quoted: false, quotedFrom: 1 })).toBe(false);
	});
});

describe("firstWord", () => {
	it("returns the first whitespace-separated word", () => {
		expect(firstWord("  sudo apt | grep x")).toBe("sudo");
		expect(firstWord("   ")).toBeUndefined();
	});
});
