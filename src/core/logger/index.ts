/**
 * Logger Module
 *
 * Captures observer events and streams them to a console stream.
 *
 * Features:
 * - Level filtering by event name
 * - Redaction of sensitive fields
 * - Line or JSON output
 */

// Types
export type {
    LogLevel,
    EntryLevel,
    LogEntry,
    LogFormat,
    LoggerState,
} from './types.js';

export { LOG_LEVEL_PRIORITY, ENTRY_LEVEL_PRIORITY } from './types.js';

// Classifier
export { classifyEvent, shouldLog, isLevelEnabled } from './classifier.js';

// Formatter
export {
    generateMessage,
    formatEntry,
    formatEventEntry,
    formatLine,
    serializeEntry,
} from './formatter.js';

// Color
export { colorLevel } from './color.js';

// Redaction
export { addMaskedFields, isMaskedField, maskValue, filterData } from './redact.js';

// Logger
export { Logger, type LoggerOptions } from './logger.js';
