import type { AlertLogger } from "@local-alert/core";
import type { LogLevel } from "./config.js";

const LEVEL_ORDER: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
};

type ConsoleLike = Pick<Console, "debug" | "info" | "warn" | "error">;

/**
 * Console logger with a minimum level and ISO timestamps.
 * Messages below `level` are dropped.
 */
export function createConsoleLogger(
	level: LogLevel = "info",
	opts?: { sink?: ConsoleLike; now?: () => Date },
): Required<AlertLogger> {
	const sink = opts?.sink ?? console;
	const now = opts?.now ?? (() => new Date());
	const min = LEVEL_ORDER[level];

	const write = (at: LogLevel, msg: string) => {
		if (LEVEL_ORDER[at] < min) return;
		sink[at](`${now().toISOString()} ${at.toUpperCase()} ${msg}`);
	};

	return {
		debug: (msg) => write("debug", msg),
		info: (msg) => write("info", msg),
		warn: (msg) => write("warn", msg),
		error: (msg) => write("error", msg),
	};
}
