/**
 * Logger Types
 *
 * The logger captures observer events and writes them to a stream
 * with configurable verbosity.
 */

/**
 * Log verbosity levels.
 *
 * - silent: No logging
 * - error: Errors only
 * - warn: Errors + warnings
 * - info: Errors + warnings + info (default)
 * - verbose: All events including debug
 */
export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'verbose';

/**
 * Numeric priority for log levels.
 * Higher numbers = more verbose.
 */
export const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
    silent: 0,
    error: 1,
    warn: 2,
    info: 3,
    verbose: 4,
};

/**
 * Entry level of a single line.
 */
export type EntryLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Numeric priority for entry levels.
 * Lower = more severe.
 */
export const ENTRY_LEVEL_PRIORITY: Record<EntryLevel, number> = {
    error: 1,
    warn: 2,
    info: 3,
    debug: 4,
};

/**
 * A single log entry, as written in JSON format.
 *
 * @example
 * ```json
 * {
 *     "timestamp": "2024-01-15T10:30:00.000Z",
 *     "level": "info",
 *     "event": "job:resolved",
 *     "message": "Resolved job sales_sync: 2 queries (4ms)"
 * }
 * ```
 */
export interface LogEntry {
    /** ISO 8601 timestamp */
    timestamp: string;

    level: EntryLevel;

    /** Observer event name, absent for direct log calls */
    event?: string;

    /** Human-readable summary */
    message: string;

    /** Event payload (included at verbose level) */
    data?: Record<string, unknown>;
}

/**
 * Output format.
 *
 * - line: `[timestamp] [LEVEL] [event] message`
 * - json: one LogEntry per line
 */
export type LogFormat = 'line' | 'json';

/**
 * Logger state for lifecycle management.
 */
export type LoggerState = 'idle' | 'running' | 'stopped';
