/**
 * Event Classifier
 *
 * Classifies observer events by log level based on naming patterns.
 *
 * Classification rules:
 * - 'error' or '*:error', '*:failed' -> error
 * - '*:warning', '*:inconsistency' -> warn
 * - '*:loaded', '*:resolved', '*:created', etc. -> info
 * - Everything else -> debug
 */
import type { EntryLevel, LogLevel } from './types.js';
import { ENTRY_LEVEL_PRIORITY, LOG_LEVEL_PRIORITY } from './types.js';

/**
 * Patterns that classify an event as error level.
 */
const ERROR_PATTERNS = [/^error$/, /:error$/, /:failed$/];

/**
 * Patterns that classify an event as warn level.
 */
const WARN_PATTERNS = [/:warning$/, /:inconsistency$/];

/**
 * Patterns that classify an event as info level.
 * These are significant lifecycle events worth logging at default verbosity.
 */
const INFO_PATTERNS = [
    /:loaded$/,
    /:validated$/,
    /:resolved$/,
    /:complete$/,
    /:created$/,
    /:updated$/,
];

/**
 * Classify an event name to determine its log level.
 *
 * @example
 * ```typescript
 * classifyEvent('error')                   // 'error'
 * classifyEvent('dry-run:failed')          // 'error'
 * classifyEvent('pipeline:inconsistency')  // 'warn'
 * classifyEvent('job:resolved')            // 'info'
 * classifyEvent('query:rendered')          // 'debug'
 * ```
 */
export function classifyEvent(event: string): EntryLevel {

    if (ERROR_PATTERNS.some((pattern) => pattern.test(event))) {

        return 'error';

    }

    if (WARN_PATTERNS.some((pattern) => pattern.test(event))) {

        return 'warn';

    }

    if (INFO_PATTERNS.some((pattern) => pattern.test(event))) {

        return 'info';

    }

    return 'debug';

}

/**
 * Check if an entry level passes the configured verbosity.
 *
 * @example
 * ```typescript
 * isLevelEnabled('warn', 'error')    // false
 * isLevelEnabled('debug', 'verbose') // true
 * ```
 */
export function isLevelEnabled(level: EntryLevel, configLevel: LogLevel): boolean {

    return ENTRY_LEVEL_PRIORITY[level] <= LOG_LEVEL_PRIORITY[configLevel];

}

/**
 * Check if an event should be logged at the given verbosity level.
 *
 * @example
 * ```typescript
 * shouldLog('error', 'warn')            // true (errors always logged)
 * shouldLog('job:resolved', 'info')     // true (info event at info level)
 * shouldLog('query:rendered', 'info')   // false (debug event at info level)
 * shouldLog('query:rendered', 'verbose') // true (everything at verbose)
 * ```
 */
export function shouldLog(event: string, configLevel: LogLevel): boolean {

    return isLevelEnabled(classifyEvent(event), configLevel);

}
