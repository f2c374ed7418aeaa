/**
 * Job spec loader tests.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { join } from 'node:path'

import {
    loadJobSpec,
    parseJobSpec,
    describeValue,
    ParseError,
    ShapeError,
    SpecReadError,
} from '../../../src/core/jobspec/index.js'
import { observer } from '../../../src/core/observer.js'
import { createWorkspace, SALES_SPEC, type Workspace } from '../../utils/workspace.js'


describe('jobspec: loader', () => {

    describe('parseJobSpec', () => {

        it('should return the parsed mapping', () => {

            const doc = parseJobSpec(SALES_SPEC, 'jobs/sales.yml')

            expect(doc.filepath).toBe('jobs/sales.yml')
            expect(doc.data['job_name']).toBe('sales_sync')
            expect(doc.data['queries']).toEqual([
                { name: 'daily_totals', template: 'sales/daily.sql' },
            ])
            expect(doc.unknownKeys).toEqual([])
        })

        it('should collect unknown keys with their paths', () => {

            const text = [
                'job_name: sales_sync',
                'owner_team: data-eng',
                'queries:',
                '  - name: daily_totals',
                '    template: sales/daily.sql',
                '    varaibles:',
                '      region: EU',
            ].join('\n')

            const doc = parseJobSpec(text, 'jobs/sales.yml')

            expect(doc.unknownKeys).toEqual(['owner_team', 'queries[0].varaibles'])
        })

        it('should throw ParseError with a position for invalid YAML', () => {

            const text = 'job_name: sales_sync\nqueries: [\n  - name: a\n'

            let caught: unknown

            try {

                parseJobSpec(text, 'jobs/broken.yml')
            }
            catch (err) {

                caught = err
            }

            expect(caught).toBeInstanceOf(ParseError)

            if (caught instanceof ParseError) {

                expect(caught.filepath).toBe('jobs/broken.yml')
                expect(typeof caught.line).toBe('number')
                expect(caught.message.startsWith('Malformed job spec jobs/broken.yml:')).toBe(true)
            }
        })

        it('should throw ShapeError when required keys are missing', () => {

            expect(() => parseJobSpec('job_name: sales_sync\n', 'jobs/a.yml')).toThrow(
                "Incomplete job spec jobs/a.yml: missing top-level 'queries'",
            )
        })

        it('should list every missing required key', () => {

            let caught: unknown

            try {

                parseJobSpec('schedule: every 24 hours\n', 'jobs/a.yml')
            }
            catch (err) {

                caught = err
            }

            expect(caught).toBeInstanceOf(ShapeError)

            if (caught instanceof ShapeError) {

                expect(caught.missingKeys).toEqual(['job_name', 'queries'])
            }
        })

        it('should reject a document that is not a mapping', () => {

            expect(() => parseJobSpec('- a\n- b\n', 'jobs/a.yml')).toThrow(
                'Incomplete job spec jobs/a.yml: document must be a mapping, got a list',
            )
        })

        it('should reject an empty document', () => {

            expect(() => parseJobSpec('', 'jobs/a.yml')).toThrow(
                'Incomplete job spec jobs/a.yml: document must be a mapping, got nothing',
            )
        })
    })

    describe('loadJobSpec', () => {

        let ws: Workspace

        beforeEach(() => {

            ws = createWorkspace()
        })

        afterEach(() => {

            ws.cleanup()
        })

        it('should load a spec from disk and emit spec:loaded', () => {

            const specPath = ws.write('jobs/sales.yml', SALES_SPEC)
            const events: Array<{ filepath: string; jobName: string; queryCount: number }> = []
            const cleanup = observer.on('spec:loaded', (data) => events.push(data))

            const doc = loadJobSpec(specPath)

            cleanup()

            expect(doc.data['job_name']).toBe('sales_sync')
            expect(events).toEqual([{ filepath: specPath, jobName: 'sales_sync', queryCount: 1 }])
        })

        it('should throw SpecReadError for a missing file', () => {

            const specPath = join(ws.root, 'jobs', 'missing.yml')

            expect(() => loadJobSpec(specPath)).toThrow(SpecReadError)
            expect(() => loadJobSpec(specPath)).toThrow(`Cannot read job spec '${specPath}'`)
        })

        it('should emit error events for parse and shape failures', () => {

            const brokenPath = ws.write('jobs/broken.yml', 'job_name: sales_sync\nqueries: [\n  - name: a\n')
            const partialPath = ws.write('jobs/partial.yml', 'job_name: sales_sync')
            const seen: Array<[string, unknown, unknown]> = []
            const cleanup = observer.on('error', (data) => {

                seen.push([data.error.name, data.context?.['filepath'], data.context?.['operation']])
            })

            expect(() => loadJobSpec(brokenPath)).toThrow(ParseError)
            expect(() => loadJobSpec(partialPath)).toThrow(ShapeError)

            cleanup()

            expect(seen).toEqual([
                ['ParseError', brokenPath, 'parse'],
                ['ShapeError', partialPath, 'parse'],
            ])
        })
    })

    describe('describeValue', () => {

        it('should name the kind of value', () => {

            expect(describeValue(null)).toBe('nothing')
            expect(describeValue([1])).toBe('a list')
            expect(describeValue({ a: 1 })).toBe('a mapping')
            expect(describeValue(7)).toBe('a number')
            expect(describeValue('x')).toBe('a string')
        })
    })
})
