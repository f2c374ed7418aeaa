/**
 * Environment detection tests.
 */
import { describe, it, expect } from 'vitest';

import { isCi } from '../../src/core/environment.js';

describe('environment: isCi', () => {

    it('should honor SQLJOB_HEADLESS', () => {

        expect(isCi({ SQLJOB_HEADLESS: 'true' })).toBe(true);

    });

    it('should detect common CI variables', () => {

        expect(isCi({ CI: 'true' })).toBe(true);
        expect(isCi({ GITHUB_ACTIONS: 'true' })).toBe(true);

    });

    it('should fall back to the stderr TTY check', () => {

        expect(isCi({})).toBe(!process.stderr.isTTY);

    });

});
