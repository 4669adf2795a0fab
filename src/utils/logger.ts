/**
 * Logger - structured stderr logging for the encounter engine
 *
 * stdout belongs to the MCP transport, so every line goes to stderr as
 *   [HH:mm:ss.SSS] [LEVEL] [Prefix] message
 *
 * Usage:
 *   import { createLogger } from '../utils/logger.js';
 *   const log = createLogger('Selection');
 *   log.warn('No floor-eligible archetypes');
 *
 * Environment:
 *   ENCOUNTER_LOG_LEVEL=debug|info|warn|error|silent (default: info)
 *   NODE_ENV=test defaults to silent
 */

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface Logger {
    debug(message: string, ...args: unknown[]): void;
    info(message: string, ...args: unknown[]): void;
    warn(message: string, ...args: unknown[]): void;
    error(message: string, ...args: unknown[]): void;

    /** Logger whose prefix is `parent:prefix` */
    child(prefix: string): Logger;

    isEnabled(level: LogLevel): boolean;
}

/** Where formatted lines end up. Defaults to console.error. */
export type LogSink = (line: string, ...args: unknown[]) => void;

// ═══════════════════════════════════════════════════════════════════════════
// LEVEL CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
    silent: 4
};

function isLogLevel(value: string): value is LogLevel {
    return value in LOG_LEVEL_PRIORITY;
}

function getConfiguredLevel(): LogLevel {
    const envLevel = process.env.ENCOUNTER_LOG_LEVEL?.toLowerCase();

    if (envLevel && isLogLevel(envLevel)) {
        return envLevel;
    }

    if (process.env.NODE_ENV === 'test') {
        return 'silent';
    }

    return 'info';
}

let configuredLevel: LogLevel | null = null;
let sink: LogSink = (line, ...args) => console.error(line, ...args);

function getLevel(): LogLevel {
    if (configuredLevel === null) {
        configuredLevel = getConfiguredLevel();
    }
    return configuredLevel;
}

/**
 * Drop the cached level so the environment is read again
 */
export function resetLogLevel(): void {
    configuredLevel = null;
}

export function setLogLevel(level: LogLevel): void {
    configuredLevel = level;
}

/**
 * Redirect output; pass nothing to restore stderr
 */
export function setLogSink(next?: LogSink): void {
    sink = next ?? ((line, ...args) => console.error(line, ...args));
}

// ═══════════════════════════════════════════════════════════════════════════
// LOGGER IMPLEMENTATION
// ═══════════════════════════════════════════════════════════════════════════

class StderrLogger implements Logger {
    constructor(private readonly prefix: string) {}

    isEnabled(level: LogLevel): boolean {
        if (level === 'silent') return false;
        return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[getLevel()];
    }

    private write(level: Exclude<LogLevel, 'silent'>, message: string, args: unknown[]): void {
        if (!this.isEnabled(level)) return;
        const timestamp = new Date().toISOString().slice(11, 23);
        sink(`[${timestamp}] [${level.toUpperCase().padEnd(5)}] [${this.prefix}] ${message}`, ...args);
    }

    debug(message: string, ...args: unknown[]): void {
        this.write('debug', message, args);
    }

    info(message: string, ...args: unknown[]): void {
        this.write('info', message, args);
    }

    warn(message: string, ...args: unknown[]): void {
        this.write('warn', message, args);
    }

    error(message: string, ...args: unknown[]): void {
        this.write('error', message, args);
    }

    child(prefix: string): Logger {
        return new StderrLogger(`${this.prefix}:${prefix}`);
    }
}

// ═══════════════════════════════════════════════════════════════════════════
// FACTORY
// ═══════════════════════════════════════════════════════════════════════════

/**
 * @example
 * const log = createLogger('Conversion');
 * log.warn('Template "ghost" missing');
 * // [12:34:56.789] [WARN ] [Conversion] Template "ghost" missing
 */
export function createLogger(prefix: string): Logger {
    return new StderrLogger(prefix);
}

// ═══════════════════════════════════════════════════════════════════════════
// UTILITIES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Log a value as pretty-printed JSON under a label
 */
export function logObject(target: Logger, level: Exclude<LogLevel, 'silent'>, label: string, obj: unknown): void {
    if (!target.isEnabled(level)) return;
    target[level](`${label}:\n${JSON.stringify(obj, null, 2)}`);
}

/**
 * @example
 * const timer = createTimer(log);
 * loadContent();
 * timer.done('Content loaded'); // debug line with the elapsed ms
 */
export function createTimer(target: Logger): { done: (message: string) => number } {
    const start = performance.now();
    return {
        done(message: string): number {
            const duration = performance.now() - start;
            target.debug(`${message} (${duration.toFixed(2)}ms)`);
            return duration;
        }
    };
}

export function getErrorMessage(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    if (typeof error === 'string') {
        return error;
    }
    return String(error);
}

/**
 * Log an error; the stack follows at debug level
 */
export function logError(target: Logger, message: string, error: unknown): void {
    target.error(`${message}: ${getErrorMessage(error)}`);

    if (error instanceof Error && error.stack && target.isEnabled('debug')) {
        target.debug(`Stack trace:\n${error.stack}`);
    }
}
