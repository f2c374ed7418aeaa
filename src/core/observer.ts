/**
 * Central event system for sqljob.
 *
 * Core modules emit events, the logger and CLI subscribe. Business logic never
 * writes to the console directly.
 *
 * @example
 * ```typescript
 * // In core module - emit events at key points
 * observer.emit('query:rendered', { jobName, queryName, template, bytes })
 *
 * // In CLI - subscribe to events
 * const cleanup = observer.on('job:resolved', (data) => report(data))
 *
 * // Pattern matching for multiple events
 * observer.on(/^query:/, ({ event, data }) => logQueryEvent(event, data))
 * ```
 */
import {
    ObserverEngine,
    type Events
} from '@logosdx/observer'

import type { ResolvedVariables } from './template/types.js'


/**
 * All events emitted by sqljob core modules.
 *
 * Events are namespaced by module:
 * - `spec:*` - Job spec loading and validation
 * - `template:*` - Template rendering
 * - `query:*` - Per-query pipeline progress
 * - `job:*` - Whole-job resolution
 * - `pipeline:*` - Consistency problems found past validation
 * - `dry-run:*` - Warehouse dry-runs
 * - `deploy:*` - Scheduled query deployment
 * - `settings:*` - Tool settings resolution
 * - `error` - Catch-all errors
 */
export interface SqljobEvents {

    // Spec
    'spec:loaded': { filepath: string; jobName: string; queryCount: number }
    'spec:validated': { filepath: string; errors: number; warnings: number }
    'spec:warning': { filepath: string; path: string; message: string }

    // Template
    'template:render': { queryName: string; template: string; durationMs: number }

    // Query / job
    'query:rendered': {
        jobName: string;
        queryName: string;
        template: string;
        bytes: number;
        variables: ResolvedVariables;
    }
    'job:resolved': { jobName: string; queryCount: number; durationMs: number }

    // Pipeline consistency
    'pipeline:inconsistency': { jobName: string; queryName: string; error: string }

    // Warehouse dry-run
    'dry-run:start': { jobName: string; queryName: string; project: string | undefined; location: string }
    'dry-run:complete': { jobName: string; queryName: string; estimatedBytes: number }
    'dry-run:failed': { jobName: string; queryName: string; error: string }

    // Warehouse deploy
    'deploy:start': { jobName: string; queryName: string; displayName: string; dataset: string }
    'deploy:created': { jobName: string; queryName: string; transferConfigId: string }
    'deploy:updated': { jobName: string; queryName: string; transferConfigId: string }
    'deploy:failed': { jobName: string; queryName: string; error: string }

    // Settings
    'settings:loaded': { path: string | null; project: string | undefined; location: string }

    // Errors
    'error': { source: string; error: Error; context?: Record<string, unknown> }
}

export type SqljobEventNames = Events<SqljobEvents>;

/**
 * Global observer instance for sqljob.
 *
 * Enable debug mode with `SQLJOB_DEBUG=1` to see all events as they occur.
 */
export const observer = new ObserverEngine<SqljobEvents>({
    name: 'sqljob',
    spy: process.env['SQLJOB_DEBUG']
        ? (action) => console.error(`[sqljob:${action.fn}] ${String(action.event)}`)
        : undefined
});
