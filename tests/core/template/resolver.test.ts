/**
 * Template resolver tests.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { symlinkSync } from 'node:fs'
import { join } from 'node:path'

import { resolveTemplate, TemplateNotFoundError } from '../../../src/core/template/index.js'
import { createWorkspace, type Workspace } from '../../utils/workspace.js'


describe('template: resolver', () => {

    let ws: Workspace

    beforeEach(() => {

        ws = createWorkspace()
    })

    afterEach(() => {

        ws.cleanup()
    })

    it('should resolve a template under the root', () => {

        const filepath = ws.template('sales/daily.sql', 'SELECT 1')

        expect(resolveTemplate({ name: 'daily_totals', template: 'sales/daily.sql' }, ws.templates)).toEqual({
            queryName: 'daily_totals',
            template: 'sales/daily.sql',
            filepath,
        })
    })

    it('should throw for a missing file', () => {

        expect(() => resolveTemplate({ name: 'q', template: 'missing.sql' }, ws.templates)).toThrow(
            `Template 'missing.sql' for query 'q' not found at ${join(ws.templates, 'missing.sql')}`,
        )
    })

    it('should throw for a directory', () => {

        ws.template('sales/daily.sql', 'SELECT 1')

        expect(() => resolveTemplate({ name: 'q', template: 'sales' }, ws.templates)).toThrow(TemplateNotFoundError)
    })

    it('should refuse paths outside the root', () => {

        ws.write('secret.sql', 'SELECT 1')

        expect(() => resolveTemplate({ name: 'q', template: '../secret.sql' }, ws.templates)).toThrow(
            "Template '../secret.sql' for query 'q' is outside the templates root",
        )
    })

    it('should refuse a symlinked directory that points outside the root', () => {

        ws.write('outside/secret.sql', 'SELECT 1')
        symlinkSync(join(ws.root, 'outside'), join(ws.templates, 'shared'))

        expect(() => resolveTemplate({ name: 'q', template: 'shared/secret.sql' }, ws.templates)).toThrow(
            "Template 'shared/secret.sql' for query 'q' is outside the templates root",
        )
    })

    it('should follow a symlink that stays inside the root', () => {

        ws.template('sales/daily.sql', 'SELECT 1')
        symlinkSync(join(ws.templates, 'sales'), join(ws.templates, 'latest'))

        expect(resolveTemplate({ name: 'q', template: 'latest/daily.sql' }, ws.templates).filepath).toBe(
            join(ws.templates, 'latest', 'daily.sql'),
        )
    })
})
