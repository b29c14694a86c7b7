import pino from "pino";

// stdout carries results, so logs go to stderr.
export const logger = pino(
	{
		name: "histrank",
		level: process.env.HISTRANK_LOG_LEVEL || process.env.LOG_LEVEL || "warn",
	},
	pino.destination({ dest: 2, sync: true }),
);

export type Logger = pino.Logger;

export function createChildLogger(name: string): Logger {
	return logger.child({ component: name });
}
