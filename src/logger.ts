/**
 * logger.ts — Structured, level-aware console logger.
 *
 * Every line goes to stderr so the CLI's answers on stdout stay clean.
 * Timestamps every line. Never logs secrets.
 */

import { config } from "./config.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVELS: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
};

const COLORS: Record<LogLevel, string> = {
    debug: "\x1b[90m", // gray
    info: "\x1b[36m",  // cyan
    warn: "\x1b[33m",  // yellow
    error: "\x1b[31m", // red
};

const RESET = "\x1b[0m";

export interface Logger {
    debug(message: string, meta?: unknown): void;
    info(message: string, meta?: unknown): void;
    warn(message: string, meta?: unknown): void;
    error(message: string, meta?: unknown): void;
    /** A logger that tags every line with `[scope]` */
    child(scope: string): Logger;
}

function shouldLog(level: LogLevel): boolean {
    return LEVELS[level] >= LEVELS[config.LOG_LEVEL];
}

function format(level: LogLevel, scope: string, message: string, meta?: unknown): string {
    const ts = new Date().toISOString();
    const color = COLORS[level];
    const label = level.toUpperCase().padEnd(5);
    const tag = scope ? `[${scope}] ` : "";
    const metaStr = meta !== undefined ? ` ${JSON.stringify(meta)}` : "";
    return `${color}[${ts}] ${label}${RESET} ${tag}${message}${metaStr}\n`;
}

function createLogger(scope: string): Logger {
    const write = (level: LogLevel, message: string, meta?: unknown) => {
        if (shouldLog(level)) process.stderr.write(format(level, scope, message, meta));
    };
    return {
        debug: (message, meta) => write("debug", message, meta),
        info: (message, meta) => write("info", message, meta),
        warn: (message, meta) => write("warn", message, meta),
        error: (message, meta) => write("error", message, meta),
        child: (child) => createLogger(scope ? `${scope}:${child}` : child),
    };
}

export const logger: Logger = createLogger("");
