/**
 * Stderr logger.
 *
 * stdout carries the MCP JSON-RPC stream, so every diagnostic line goes to
 * stderr. Levels below the current threshold are dropped.
 */

export const LOG_LEVELS = ['debug', 'info', 'warning', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const LOG_PREFIX = '[docx-model]';

export function isLogLevel(value: unknown): value is LogLevel {
    return LOG_LEVELS.some((level) => level === value);
}

function levelFromEnv(): LogLevel {
    const fromEnv = process.env.DOCX_MODEL_LOG_LEVEL;
    return isLogLevel(fromEnv) ? fromEnv : 'info';
}

let threshold: LogLevel = levelFromEnv();

export function setLogLevel(level: LogLevel): void {
    threshold = level;
}

export function getLogLevel(): LogLevel {
    return threshold;
}

function isEnabled(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(threshold);
}

/**
 * Write a single log line to stderr.
 */
export function logToStderr(level: LogLevel, message: string): void {
    if (!isEnabled(level)) return;
    process.stderr.write(`${LOG_PREFIX} [${level}] ${message}\n`);
}

function formatArg(arg: unknown): string {
    if (arg instanceof Error) return arg.message;
    if (typeof arg === 'string') return arg;
    try {
        return JSON.stringify(arg);
    } catch {
        return String(arg);
    }
}

function format(message: string, args: unknown[]): string {
    return args.length === 0 ? message : [message, ...args.map(formatArg)].join(' ');
}

export const logger = {
    debug: (message: string, ...args: unknown[]) => logToStderr('debug', format(message, args)),
    info: (message: string, ...args: unknown[]) => logToStderr('info', format(message, args)),
    warning: (message: string, ...args: unknown[]) => logToStderr('warning', format(message, args)),
    error: (message: string, ...args: unknown[]) => logToStderr('error', format(message, args)),
};
