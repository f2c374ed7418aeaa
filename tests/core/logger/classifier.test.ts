/**
 * Event classifier tests.
 */
import { describe, it, expect } from 'vitest';

import { classifyEvent, isLevelEnabled, shouldLog } from '../../../src/core/logger/index.js';

describe('logger: classifier', () => {

    it('should classify errors', () => {

        expect(classifyEvent('error')).toBe('error');
        expect(classifyEvent('dry-run:failed')).toBe('error');
        expect(classifyEvent('custom:error')).toBe('error');

    });

    it('should classify warnings', () => {

        expect(classifyEvent('spec:warning')).toBe('warn');
        expect(classifyEvent('pipeline:inconsistency')).toBe('warn');

    });

    it('should classify lifecycle events as info', () => {

        expect(classifyEvent('spec:loaded')).toBe('info');
        expect(classifyEvent('spec:validated')).toBe('info');
        expect(classifyEvent('job:resolved')).toBe('info');
        expect(classifyEvent('dry-run:complete')).toBe('info');
        expect(classifyEvent('deploy:created')).toBe('info');
        expect(classifyEvent('deploy:updated')).toBe('info');

    });

    it('should classify everything else as debug', () => {

        expect(classifyEvent('query:rendered')).toBe('debug');
        expect(classifyEvent('deploy:start')).toBe('debug');

    });

    it('should compare levels against the configured verbosity', () => {

        expect(isLevelEnabled('error', 'error')).toBe(true);
        expect(isLevelEnabled('warn', 'error')).toBe(false);
        expect(isLevelEnabled('debug', 'verbose')).toBe(true);
        expect(isLevelEnabled('error', 'silent')).toBe(false);

    });

    it('should decide per event name', () => {

        expect(shouldLog('job:resolved', 'info')).toBe(true);
        expect(shouldLog('query:rendered', 'info')).toBe(false);
        expect(shouldLog('query:rendered', 'verbose')).toBe(true);
        expect(shouldLog('spec:warning', 'error')).toBe(false);

    });

});
