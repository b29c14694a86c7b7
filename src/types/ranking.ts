import type { CanonicalCommand } from "./entry.js";

export type FrequencyTable = Map<CanonicalCommand, number>;

export interface FrequencyFilter {
	/** Commands dropped by exact name. */
	ignore?: Iterable<string>;
	/** Keep only commands seen strictly more often than this. Defaults to 0. */
	moreThan?: number;
}

export interface RankOptions {
	/** Maximum entries returned. Ignored when `all` is set. */
	limit?: number;
	all?: boolean;
}

export interface RankedEntry {
	command: CanonicalCommand;
	count: number;
	/** Share of the filtered total, 0–100. */
	percentage: number;
	/** Share of this rank and every rank below it, 0–100. */
	inverseCumulativePercentage: number;
}
