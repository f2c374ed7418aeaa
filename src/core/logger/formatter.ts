/**
 * Log Formatter
 *
 * Turns observer events into human-readable messages and log entries.
 */
import type { EntryLevel, LogEntry } from './types.js'
import { classifyEvent } from './classifier.js'


/**
 * Message of an Error payload field, or the value itself.
 */
function errorText(value: unknown): string {

    return value instanceof Error ? value.message : String(value)
}


/**
 * Human-readable message templates for known events.
 * Keys are event names, values build the message from the event payload.
 */
const MESSAGE_TEMPLATES: Record<string, (data: Record<string, unknown>) => string> = {

    // Spec
    'spec:loaded': (d) => `Loaded job ${d['jobName']} from ${d['filepath']} (${d['queryCount']} queries)`,
    'spec:validated': (d) => `Validated ${d['filepath']}: ${d['errors']} errors, ${d['warnings']} warnings`,
    'spec:warning': (d) => `${d['filepath']} ${d['path']}: ${d['message']}`,

    // Template
    'template:render': (d) => `Rendered template ${d['template']} for ${d['queryName']} (${d['durationMs']}ms)`,

    // Query / job
    'query:rendered': (d) => `Rendered ${d['jobName']}.${d['queryName']} from ${d['template']} (${d['bytes']} bytes)`,
    'job:resolved': (d) => `Resolved job ${d['jobName']}: ${d['queryCount']} queries (${d['durationMs']}ms)`,
    'pipeline:inconsistency': (d) => `Query ${d['jobName']}.${d['queryName']} failed after validation passed: ${d['error']}`,

    // Dry-run
    'dry-run:start': (d) => `Dry-running ${d['jobName']}.${d['queryName']} in ${d['location']}`,
    'dry-run:complete': (d) => `Dry-run ${d['jobName']}.${d['queryName']}: ${d['estimatedBytes']} bytes`,
    'dry-run:failed': (d) => `Dry-run ${d['jobName']}.${d['queryName']} failed: ${d['error']}`,

    // Deploy
    'deploy:start': (d) => `Deploying ${d['displayName']} to dataset ${d['dataset']}`,
    'deploy:created': (d) => `Created scheduled query ${d['transferConfigId']} for ${d['jobName']}.${d['queryName']}`,
    'deploy:updated': (d) => `Updated scheduled query ${d['transferConfigId']} for ${d['jobName']}.${d['queryName']}`,
    'deploy:failed': (d) => `Deploy ${d['jobName']}.${d['queryName']} failed: ${d['error']}`,

    // Settings
    'settings:loaded': (d) => d['path']
        ? `Settings loaded from ${d['path']}`
        : 'Settings loaded from defaults and environment',

    // Generic error
    'error': (d) => `Error in ${d['source']}: ${errorText(d['error'])}`,
}


/**
 * Generate a human-readable message for an event.
 *
 * Uses templates for known events, falls back to generic format.
 *
 * @example
 * ```typescript
 * generateMessage('job:resolved', { jobName: 'sales_sync', queryCount: 2, durationMs: 4 })
 * // 'Resolved job sales_sync: 2 queries (4ms)'
 *
 * generateMessage('custom:thing', { id: 7 })
 * // 'custom thing: id=7'
 * ```
 */
export function generateMessage(event: string, data: Record<string, unknown>): string {

    const template = MESSAGE_TEMPLATES[event]

    if (template) {

        return template(data)
    }

    // Generic format: "Event occurred" or "Event: key=value, ..."
    const parts = Object.entries(data)
        .slice(0, 3)
        .map(([k, v]) => `${k}=${summarizeValue(v)}`)

    if (parts.length === 0) {

        return event.replace(/:/g, ' ')
    }

    return `${event.replace(/:/g, ' ')}: ${parts.join(', ')}`
}


/**
 * Summarize a value for log message display.
 * Truncates long strings and formats objects.
 */
function summarizeValue(value: unknown): string {

    if (typeof value === 'string') {

        return value.length > 50 ? `"${value.slice(0, 47)}..."` : `"${value}"`
    }

    if (Array.isArray(value)) {

        return `[${value.length} items]`
    }

    if (value instanceof Error) {

        return value.message
    }

    if (typeof value === 'object' && value !== null) {

        return `{${Object.keys(value).length} keys}`
    }

    return String(value)
}


/**
 * Build a log entry.
 *
 * @param includeData - Whether to include the payload (verbose mode)
 */
export function formatEntry(
    level: EntryLevel,
    message: string,
    event?: string,
    data?: Record<string, unknown>,
    includeData = false,
): LogEntry {

    const entry: LogEntry = {
        timestamp: new Date().toISOString(),
        level,
        message,
    }

    if (event) {

        entry.event = event
    }

    if (includeData && data && Object.keys(data).length > 0) {

        entry.data = data
    }

    return entry
}


/**
 * Build a log entry for an observer event.
 *
 * @example
 * ```typescript
 * const entry = formatEventEntry('spec:loaded', { filepath: 'jobs/a.yml', jobName: 'a', queryCount: 1 })
 * // { timestamp: '...', level: 'info', event: 'spec:loaded',
 * //   message: 'Loaded job a from jobs/a.yml (1 queries)' }
 * ```
 */
export function formatEventEntry(
    event: string,
    data: Record<string, unknown>,
    includeData = false,
): LogEntry {

    return formatEntry(classifyEvent(event), generateMessage(event, data), event, data, includeData)
}


/**
 * Serialize a log entry to a JSON line.
 */
export function serializeEntry(entry: LogEntry): string {

    return JSON.stringify(entry) + '\n'
}


/**
 * Serialize a log entry to a compact text line.
 *
 * @param colorLevel - Styles the level label, e.g. with ANSI colors
 *
 * @example
 * ```typescript
 * formatLine(entry)
 * // '[2024-01-15T10:30:00.000Z] [INFO ] [job:resolved] Resolved job sales_sync: 2 queries (4ms)\n'
 * ```
 */
export function formatLine(
    entry: LogEntry,
    colorLevel: (level: EntryLevel, label: string) => string = (_, label) => label,
): string {

    const label = colorLevel(entry.level, entry.level.toUpperCase().padEnd(5))
    const event = entry.event ? ` [${entry.event}]` : ''

    let line = `[${entry.timestamp}] [${label}]${event} ${entry.message}`

    if (entry.data) {

        line += ` ${JSON.stringify(entry.data)}`
    }

    return line + '\n'
}
