/**
 * Log formatter tests.
 */
import { describe, it, expect } from 'vitest';

import {
    formatEntry,
    formatEventEntry,
    formatLine,
    generateMessage,
    serializeEntry,
    type LogEntry,
} from '../../../src/core/logger/index.js';

const ENTRY: LogEntry = {
    timestamp: '2026-01-15T10:30:00.000Z',
    level: 'info',
    event: 'job:resolved',
    message: 'Resolved job sales_sync: 2 queries (4ms)',
};

describe('logger: formatter', () => {

    describe('generateMessage', () => {

        it('should use the template for known events', () => {

            expect(generateMessage('job:resolved', { jobName: 'sales_sync', queryCount: 2, durationMs: 4 }))
                .toBe('Resolved job sales_sync: 2 queries (4ms)');

            expect(generateMessage('dry-run:complete', {
                jobName: 'sales_sync',
                queryName: 'daily_totals',
                estimatedBytes: 2048,
            })).toBe('Dry-run sales_sync.daily_totals: 2048 bytes');

        });

        it('should use the error message of an error payload', () => {

            expect(generateMessage('error', { source: 'pipeline', error: new Error('boom') }))
                .toBe('Error in pipeline: boom');

        });

        it('should describe where settings came from', () => {

            expect(generateMessage('settings:loaded', { path: null })).toBe('Settings loaded from defaults and environment');
            expect(generateMessage('settings:loaded', { path: '/w/sqljob.yml' })).toBe('Settings loaded from /w/sqljob.yml');

        });

        it('should fall back to a key=value summary', () => {

            expect(generateMessage('custom:thing', { id: 7, name: 'x', tags: ['a', 'b'], extra: 1 }))
                .toBe('custom thing: id=7, name="x", tags=[2 items]');

            expect(generateMessage('custom:thing', {})).toBe('custom thing');

        });

    });

    describe('entries', () => {

        it('should attach data only when asked', () => {

            expect(formatEntry('info', 'hello', undefined, { a: 1 }).data).toBeUndefined();
            expect(formatEntry('info', 'hello', undefined, { a: 1 }, true).data).toEqual({ a: 1 });
            expect(formatEntry('info', 'hello', undefined, {}, true)).not.toHaveProperty('data');

        });

        it('should classify event entries', () => {

            const entry = formatEventEntry('dry-run:failed', {
                jobName: 'sales_sync',
                queryName: 'daily_totals',
                error: 'bad',
            });

            expect(entry.level).toBe('error');
            expect(entry.event).toBe('dry-run:failed');
            expect(entry.message).toBe('Dry-run sales_sync.daily_totals failed: bad');

        });

        it('should serialize to a JSON line', () => {

            expect(serializeEntry(ENTRY)).toBe(`${JSON.stringify(ENTRY)}\n`);

        });

        it('should format a text line with a padded level', () => {

            expect(formatLine(ENTRY)).toBe(
                '[2026-01-15T10:30:00.000Z] [INFO ] [job:resolved] Resolved job sales_sync: 2 queries (4ms)\n',
            );

        });

        it('should append data and apply the level styler', () => {

            const line = formatLine(
                { ...ENTRY, level: 'error', event: undefined, data: { a: 1 } },
                (_, label) => `<${label}>`,
            );

            expect(line).toBe('[2026-01-15T10:30:00.000Z] [<ERROR>] Resolved job sales_sync: 2 queries (4ms) {"a":1}\n');

        });

    });

});
