export class HistrankError extends Error {
	constructor(
		message: string,
		public readonly code: string,
		public readonly cause?: unknown,
	) {
		super(message);
		this.name = "HistrankError";
	}
}

/** No history grammar fits the input and no override was given. */
export class UnknownFormatError extends HistrankError {
	constructor(message: string, cause?: unknown) {
		super(message, "UNKNOWN_FORMAT", cause);
		this.name = "UnknownFormatError";
	}
}

/** The source cannot be opened or is not UTF-8 text. */
export class UnreadableInputError extends HistrankError {
	constructor(message: string, cause?: unknown) {
		super(message, "UNREADABLE_INPUT", cause);
		this.name = "UnreadableInputError";
	}
}

export class ConfigError extends HistrankError {
	constructor(message: string, cause?: unknown) {
		super(message, "CONFIG_ERROR", cause);
		this.name = "ConfigError";
	}
}
