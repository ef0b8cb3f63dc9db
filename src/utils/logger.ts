import pino from "pino";

function defaultLevel(): string {
	if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;
	return process.env.VITEST ? "silent" : "info";
}

export const logger = pino({
	name: "band-sentinel",
	level: defaultLevel(),
	base: undefined,
	timestamp: pino.stdTimeFunctions.isoTime,
});

export type { Logger } from "pino";
