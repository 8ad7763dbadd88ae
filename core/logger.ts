import pino, { type Logger } from "pino";
import type { QuireConfig } from "./config";

export type { Logger };

export function createLogger(config: Pick<QuireConfig, "logLevel">): Logger {
	return pino({ name: "quire", level: config.logLevel });
}

/** A logger that discards everything. Used as the default for stores and in tests. */
export function silentLogger(): Logger {
	return pino({ level: "silent" });
}
