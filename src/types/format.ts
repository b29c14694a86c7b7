export const SUPPORTED_FORMATS = [
	"plain",
	"zsh-extended",
	"fish",
	"tcsh",
	"powershell",
] as const;

/** On-disk history grammar. Bash and ash share "plain". */
export type HistoryFormat = (typeof SUPPORTED_FORMATS)[number];
