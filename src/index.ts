export { createHistoryRanker, DEFAULT_LIMIT } from "./histrank.js";
export type { HistoryRanker, RankerConfig } from "./histrank.js";

export type { HistoryFormat } from "./types/format.js";
export { SUPPORTED_FORMATS } from "./types/format.js";
export type { CanonicalCommand, PipelineSegment, RawEntry, Token } from "./types/entry.js";
export type { FrequencyFilter, FrequencyTable, RankedEntry, RankOptions } from "./types/ranking.js";

export {
	detectFormat,
	isHistoryFormat,
	parseHistoryFormat,
	DETECTION_SAMPLE_LINES,
} from "./readers/format-detector.js";
export type { DetectOptions } from "./readers/format-detector.js";
export { readLines, peekLines, sampleLines } from "./readers/line-reader.js";
export type { HistorySource } from "./readers/line-reader.js";
export { reconstructEntries } from "./readers/history-reader.js";

export { tokenize } from "./parsers/tokenizer.js";
export type { ScanState } from "./parsers/tokenizer.js";
export { normalizeSegment, normalizeEntry, DEFAULT_WRAPPERS } from "./parsers/normalizer.js";
export type { NormalizeOptions } from "./parsers/normalizer.js";

export { aggregateCommands, filterTable, totalCount } from "./aggregations/frequency.js";
export { rankCommands, compareRanked } from "./aggregations/ranking.js";

export {
	HistrankError,
	UnknownFormatError,
	UnreadableInputError,
	ConfigError,
} from "./utils/errors.js";
