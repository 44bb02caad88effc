/**
 * @fileoverview Console Logger
 *
 * Console-backed InferenceLogger with bracketed level prefixes and a
 * minimum level (from LOG_LEVEL).
 *
 * @module logger
 */

import type { InferenceLogger } from "@bayesfair/engine";

const kLOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;

export type LogLevel = (typeof kLOG_LEVELS)[number];

const kLEVEL_RANK: Record<LogLevel, number> = {
    debug : 10,
    info  : 20,
    warn  : 30,
    error : 40,
    silent: 50,
};

/**
 * Parse a LOG_LEVEL value; unknown or missing values mean "info".
 */
export function parseLogLevel(value: string | undefined): LogLevel {
    const normalized = value?.trim().toLowerCase();
    return kLOG_LEVELS.find((level) => level === normalized) ?? "info";
}

/**
 * Create a console logger that drops entries below `level`.
 */
export function createConsoleLogger(level: LogLevel = "info"): InferenceLogger {
    const enabled = (entry: LogLevel) => kLEVEL_RANK[entry] >= kLEVEL_RANK[level];

    return {
        debug: (msg, data) => {
            if (enabled("debug")) console.debug(`[DEBUG] ${msg}`, data ?? "");
        },
        info: (msg, data) => {
            if (enabled("info")) console.info(`[INFO] ${msg}`, data ?? "");
        },
        warn: (msg, data) => {
            if (enabled("warn")) console.warn(`[WARN] ${msg}`, data ?? "");
        },
        error: (msg, data) => {
            if (enabled("error")) console.error(`[ERROR] ${msg}`, data ?? "");
        },
    };
}
