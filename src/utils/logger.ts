import type { Logger, LogLevel } from "../types/logger.js";

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
};

export type LogSink = (...args: unknown[]) => void;

/**
 * Level-filtered logger that writes every line to stderr.
 *
 * stdout carries the JSON-RPC stream when the stdio transport is active, so
 * nothing here may ever use `console.log`/`console.info`.
 */
export function createLogger(
    level: LogLevel = "info",
    sink: LogSink = (...args) => console.error(...args)
): Logger {
    const threshold = LEVEL_ORDER[level];
    const emit = (lvl: LogLevel) => (...args: unknown[]): void => {
        if (LEVEL_ORDER[lvl] < threshold) return;
        sink(`[${lvl}]`, ...args);
    };

    return {
        debug: emit("debug"),
        info: emit("info"),
        warn: emit("warn"),
        error: emit("error"),
    };
}

export function truncate(text: string, limit: number): string {
    return text.length > limit ? `${text.slice(0, limit)}...` : text;
}
