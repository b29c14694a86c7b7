import { describe, expect, it } from "vitest";
import { renderBar, renderCsv, renderJson, renderText } from "../../src/cli/render.js";
import type { RankedEntry } from "../../src/types/ranking.js";

const ranked: RankedEntry[] = [
	{ command: "ls", count: 2, percentage: 50, inverseCumulativePercentage: 100 },
	{ command: "a", count: 1, percentage: 25, inverseCumulativePercentage: 50 },
	{ command: "grep", count: 1, percentage: 25, inverseCumulativePercentage: 25 },
];

const both = { size: 4, showPercentage: true, showCumulative: true };

describe("renderBar", () => {
	it("draws the command's share and the share below it", () => {
		expect(ranked.map((entry) => renderBar(entry, both))).toEqual(["│▓▓██│", "│░░▓█│", "│░░░█│"]);
	});

	it("draws only the cumulative share when percentages are off", () => {
		expect(renderBar(ranked[0], { ...both, showPercentage: false })).toBe("│▓▓▓▓│");
		expect(renderBar(ranked[1], { ...both, showPercentage: false })).toBe("│░░▓▓│");
	});

	it("draws only the command's share when cumulative is off", () => {
		expect(renderBar(ranked[1], { ...both, showCumulative: false })).toBe("│░░░█│");
	});

	it("draws nothing with no width or nothing to show", () => {
		expect(renderBar(ranked[0], { ...both, size: 0 })).toBe("");
		expect(renderBar(ranked[0], { size: 4, showPercentage: false, showCumulative: false })).toBe("");
	});
});

describe("renderText", () => {
	it("aligns count, bar, percentage and command", () => {
		expect(renderText(ranked, both)).toBe(
			"2   │▓▓██│ 50.00%   ls\n1   │░░▓█│ 25.00%   a\n1   │░░░█│ 25.00%   grep\n",
		);
	});

	it("pads counts and percentages to the widest value", () => {
		const entries: RankedEntry[] = [
			{ command: "git", count: 10, percentage: 100 * (10 / 11), inverseCumulativePercentage: 100 },
			{ command: "ls", count: 1, percentage: 100 * (1 / 11), inverseCumulativePercentage: 100 * (1 / 11) },
		];
		expect(renderText(entries, { ...both, size: 0 })).toBe("10   90.91%   git\n 1    9.09%   ls\n");
	});

	it("renders a report with hundreds of thousands of rows", () => {
		const entries: RankedEntry[] = Array.from({ length: 300000 }, (_, i) => ({
			command: `cmd${i}`,
			count: i === 0 ? 10 : 1,
			percentage: 0,
			inverseCumulativePercentage: 0,
		}));
		const lines = renderText(entries, { ...both, size: 0 }).split("\n");
		expect(lines).toHaveLength(300001);
		expect(lines[0]).toBe("10   0.00%   cmd0");
		expect(lines[299999]).toBe(" 1   0.00%   cmd299999");
	});

	it("renders nothing for an empty ranking", () => {
		expect(renderText([], both)).toBe("");
	});
});

describe("renderCsv", () => {
	it("writes a header and quotes fields when needed", () => {
		const entries: RankedEntry[] = [
			{ command: 'echo "hi", there', count: 1, percentage: 100, inverseCumulativePercentage: 100 },
		];
		expect(renderCsv(entries)).toBe(
			'command,count,percentage,inverse_cumulative_percentage\n"echo ""hi"", there",1,100.00,100.00\n',
		);
	});
});

describe("renderJson", () => {
	it("wraps data in the output envelope", () => {
		expect(renderJson([], { raw: false, pretty: false, generatedAt: "2026-01-01T00:00:00.000Z" })).toBe(
			'{"schemaVersion":"1.0","command":"rank","generatedAt":"2026-01-01T00:00:00.000Z","data":[]}\n',
		);
	});

	it("writes bare data in raw mode", () => {
		expect(renderJson([ranked[0]], { raw: true, pretty: false })).toBe(
			'[{"command":"ls","count":2,"percentage":50,"inverseCumulativePercentage":100}]\n',
		);
	});

	it("indents when pretty", () => {
		expect(renderJson([], { raw: true, pretty: true })).toBe("[]\n");
		expect(renderJson([{ command: "ls", count: 1, percentage: 100, inverseCumulativePercentage: 100 }], { raw: true, pretty: true })).toBe(
			'[\n  {\n    "command": "ls",\n    "count": 1,\n    "percentage": 100,\n    "inverseCumulativePercentage": 100\n  }\n]\n',
		);
	});
});
