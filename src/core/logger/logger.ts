/**
 * Logger
 *
 * Stream-based logger. Subscribes to every observer event, filters by
 * level, masks sensitive fields and writes one line per entry to the
 * console stream (stderr by default, so command output on stdout stays
 * clean for pipes).
 *
 * @example
 * ```typescript
 * const logger = new Logger({ level: 'info' })
 *
 * logger.start()
 * // Logger now captures all observer events
 * // and writes them with appropriate formatting and redaction
 * logger.stop()
 * ```
 */
import type { Writable } from 'node:stream';

import { observer } from '../observer.js';
import { isCi } from '../environment.js';
import { isMapping } from '../shared/index.js';
import { classifyEvent, isLevelEnabled } from './classifier.js';
import { colorLevel } from './color.js';
import { formatEntry, formatLine, generateMessage, serializeEntry } from './formatter.js';
import { filterData } from './redact.js';
import type { EntryLevel, LogEntry, LogFormat, LoggerState, LogLevel } from './types.js';

/**
 * Options for Logger construction.
 */
export interface LoggerOptions {
    /** Minimum level to write (default: info) */
    level?: LogLevel;

    /** Line or JSON output (default: line) */
    format?: LogFormat;

    /** Stream to write to (default: process.stderr) */
    console?: Writable;

    /** Color level labels (default: when not in CI) */
    color?: boolean;
}

/**
 * Logger that captures observer events and writes to a stream.
 */
export class Logger {

    #level: LogLevel;
    #format: LogFormat;
    #console: Writable;
    #color: boolean;
    #state: LoggerState = 'idle';
    #cleanup: (() => void) | null = null;

    constructor(options: LoggerOptions = {}) {

        this.#level = options.level ?? 'info';
        this.#format = options.format ?? 'line';
        this.#console = options.console ?? process.stderr;
        this.#color = options.color ?? !isCi();

    }

    /**
     * Get the current logger state.
     */
    get state(): LoggerState {

        return this.#state;

    }

    /**
     * Get the current log level.
     */
    get level(): LogLevel {

        return this.#level;

    }

    /**
     * Check if logging is enabled.
     */
    get isEnabled(): boolean {

        return this.#level !== 'silent';

    }

    /**
     * Start capturing observer events.
     */
    start(): void {

        if (this.#state !== 'idle') {

            return;

        }

        this.#state = 'running';

        if (!this.isEnabled) {

            return;

        }

        this.#cleanup = observer.on(/./, ({ event, data }) => {

            this.#handleEvent(String(event), isMapping(data) ? data : {});

        });

    }

    /**
     * Stop capturing events.
     */
    stop(): void {

        if (this.#cleanup) {

            this.#cleanup();
            this.#cleanup = null;

        }

        this.#state = 'stopped';

    }

    /**
     * Log an info message directly.
     */
    info(message: string, data?: Record<string, unknown>): void {

        this.#log('info', message, data);

    }

    /**
     * Log a warning message directly.
     */
    warn(message: string, data?: Record<string, unknown>): void {

        this.#log('warn', message, data);

    }

    /**
     * Log an error message directly.
     */
    error(message: string, data?: Record<string, unknown>): void {

        this.#log('error', message, data);

    }

    /**
     * Log a debug message directly.
     */
    debug(message: string, data?: Record<string, unknown>): void {

        this.#log('debug', message, data);

    }

    /**
     * Handle an observer event.
     */
    #handleEvent(event: string, data: Record<string, unknown>): void {

        const level = classifyEvent(event);

        if (!isLevelEnabled(level, this.#level)) {

            return;

        }

        this.#write(formatEntry(
            level,
            generateMessage(event, data),
            event,
            filterData(data, this.#level),
            this.#level === 'verbose',
        ));

    }

    /**
     * Internal log method.
     */
    #log(level: EntryLevel, message: string, data?: Record<string, unknown>): void {

        if (this.#state !== 'running' || !isLevelEnabled(level, this.#level)) {

            return;

        }

        const filtered = data ? filterData(data, this.#level) : undefined;

        this.#write(formatEntry(level, message, undefined, filtered, this.#level === 'verbose'));

    }

    /**
     * Write one entry in the configured format.
     */
    #write(entry: LogEntry): void {

        const line = this.#format === 'json'
            ? serializeEntry(entry)
            : formatLine(entry, this.#color ? colorLevel : undefined);

        this.#console.write(line);

    }

}
