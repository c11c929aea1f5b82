import { LOG_LEVEL, type LogLevel } from "~/lib/constants.ts";
import { humanize } from "~/lib/logging/human.ts";

const SEVERITY: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3, silent: 4 };

let threshold: LogLevel = LOG_LEVEL;

export namespace log {
	export function setLevel(level: LogLevel): void {
		threshold = level;
	}

	export function level(): LogLevel {
		return threshold;
	}

	export function debug(message: string, details?: unknown): void {
		if (enabled("debug")) console.debug(message, ...format(details));
	}

	export function info(message: string, details?: unknown): void {
		if (enabled("info")) console.info(message, ...format(details));
	}

	export function warn(message: string, details?: unknown): void {
		if (enabled("warn")) console.warn(message, ...format(details));
	}

	export function error(message: string, details?: unknown): void {
		if (enabled("error")) console.error(message, ...format(details));
	}
}

function enabled(level: LogLevel): boolean {
	return SEVERITY[level] >= SEVERITY[threshold];
}

function format(details: unknown): unknown[] {
	return details === undefined ? [] : [humanize(details)];
}
