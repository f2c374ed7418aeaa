/**
 * Pipeline orchestrator tests.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { attemptSync } from '@logosdx/utils'

import { checkJob, resolveJob } from '../../../src/core/pipeline/index.js'
import { ValidationError } from '../../../src/core/jobspec/index.js'
import { TemplateSyntaxError, UndeclaredVariableError } from '../../../src/core/template/index.js'
import { observer } from '../../../src/core/observer.js'
import { createWorkspace, DAILY_TEMPLATE, SALES_SPEC, type Workspace } from '../../utils/workspace.js'


/**
 * Smallest spec the validator accepts, without labels.
 */
const MINIMAL_SPEC = [
    'job_name: sales_sync',
    'defaults:',
    '  region: US',
    'destination: analytics.sales_daily',
    'queries:',
    '  - name: daily_totals',
    '    template: sales/daily.sql',
].join('\n')


describe('pipeline: orchestrator', () => {

    let ws: Workspace

    beforeEach(() => {

        ws = createWorkspace()
        ws.template('sales/daily.sql', DAILY_TEMPLATE)
    })

    afterEach(() => {

        ws.cleanup()
    })

    describe('checkJob', () => {

        it('should return the document and its issues', () => {

            const specPath = ws.write('jobs/sales.yml', MINIMAL_SPEC)

            const { document, issues } = checkJob(specPath, ws.templates)

            expect(document.filepath).toBe(specPath)
            expect(issues).toEqual([{
                severity: 'warning',
                path: 'labels',
                message: 'Missing recommended labels: owner, domain, environment',
            }])
        })
    })

    describe('resolveJob', () => {

        it('should render a minimal spec and keep its warnings', () => {

            const specPath = ws.write('jobs/sales.yml', MINIMAL_SPEC)

            const job = resolveJob(specPath, ws.templates)

            expect(job.jobName).toBe('sales_sync')
            expect(job.queries).toHaveLength(1)
            expect(job.queries[0]?.sql).toBe('SELECT US FROM sales')
            expect(job.queries[0]?.destination).toEqual({ dataset: 'analytics', table: 'sales_daily' })
            expect(job.queries[0]?.writeDisposition).toBe('WRITE_TRUNCATE')
            expect(job.warnings.map((issue) => issue.path)).toEqual(['labels'])
        })

        it('should carry schedule, labels and environment', () => {

            const specPath = ws.write('jobs/sales.yml', SALES_SPEC)

            const job = resolveJob(specPath, ws.templates)

            expect(job.schedule).toBe('every 24 hours')
            expect(job.environment).toBe('prod')
            expect(job.labels).toEqual({ owner: 'data-eng', domain: 'sales', environment: 'prod' })
            expect(job.warnings).toEqual([])
        })

        it('should apply query variables over defaults in query order', () => {

            const specPath = ws.write('jobs/sales.yml', [
                MINIMAL_SPEC,
                '  - name: eu_totals',
                '    template: sales/daily.sql',
                '    variables:',
                '      region: EU',
            ].join('\n'))

            const job = resolveJob(specPath, ws.templates)

            expect(job.queries.map((query) => [query.name, query.sql])).toEqual([
                ['daily_totals', 'SELECT US FROM sales'],
                ['eu_totals', 'SELECT EU FROM sales'],
            ])
            expect(job.queries[1]?.variables['region']).toBe('EU')
        })

        it('should produce the same SQL on every run', () => {

            const specPath = ws.write('jobs/sales.yml', SALES_SPEC)

            const first = resolveJob(specPath, ws.templates)
            const second = resolveJob(specPath, ws.templates)

            expect(second.queries).toEqual(first.queries)
        })

        it('should throw ValidationError for a missing template', () => {

            const specPath = ws.write('jobs/sales.yml', MINIMAL_SPEC.replace('sales/daily.sql', 'sales/weekly.sql'))

            const [, err] = attemptSync(() => resolveJob(specPath, ws.templates))

            expect(err).toBeInstanceOf(ValidationError)

            if (err instanceof ValidationError) {

                expect(err.errors.map((issue) => issue.path)).toEqual(['queries[0].template'])
            }
        })

        it('should throw ValidationError for duplicate query names', () => {

            const specPath = ws.write('jobs/sales.yml', [
                MINIMAL_SPEC,
                '  - name: daily_totals',
                '    template: sales/daily.sql',
            ].join('\n'))

            expect(() => resolveJob(specPath, ws.templates)).toThrow(
                `Invalid job spec ${specPath}: queries[1].name: Query name 'daily_totals' is used more than once (queries[0].name, queries[1].name)`,
            )
        })

        it('should flag undeclared variables as an inconsistency', () => {

            ws.template('sales/daily.sql', 'SELECT {{ country }} FROM sales')

            const specPath = ws.write('jobs/sales.yml', MINIMAL_SPEC)
            const flagged: string[] = []
            const cleanup = observer.on('pipeline:inconsistency', (data) => flagged.push(data.queryName))

            const [, err] = attemptSync(() => resolveJob(specPath, ws.templates))

            cleanup()

            expect(err).toBeInstanceOf(UndeclaredVariableError)
            expect(err?.message).toBe(
                "Query 'daily_totals' template 'sales/daily.sql' line 1 references undeclared variable 'country'",
            )
            expect(flagged).toEqual(['daily_totals'])
        })

        it('should fail on control blocks rather than return them as SQL', () => {

            ws.template('sales/daily.sql', "SELECT * FROM sales {% if region == 'US' %}WHERE us{% endif %}")

            const specPath = ws.write('jobs/sales.yml', MINIMAL_SPEC)

            const [, err] = attemptSync(() => resolveJob(specPath, ws.templates))

            expect(err).toBeInstanceOf(TemplateSyntaxError)
        })

        it('should emit job:resolved with the query count', () => {

            const specPath = ws.write('jobs/sales.yml', SALES_SPEC)
            const counts: number[] = []
            const cleanup = observer.on('job:resolved', (data) => counts.push(data.queryCount))

            resolveJob(specPath, ws.templates)

            cleanup()

            expect(counts).toEqual([1])
        })
    })
})
