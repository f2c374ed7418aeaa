/**
 * Job spec schema tests.
 */
import { describe, it, expect } from 'vitest'
import { ZodError } from 'zod'

import { formatPath, parseJobSpecData } from '../../../src/core/jobspec/index.js'


describe('jobspec: schema', () => {

    describe('formatPath', () => {

        it('should join keys with dots and indices with brackets', () => {

            expect(formatPath(['queries', 2, 'template'])).toBe('queries[2].template')
            expect(formatPath(['labels', 'owner'])).toBe('labels.owner')
        })

        it('should name the root for an empty path', () => {

            expect(formatPath([])).toBe('(root)')
        })
    })

    describe('parseJobSpecData', () => {

        it('should apply defaults and split a dotted destination', () => {

            const spec = parseJobSpecData({
                job_name: 'sales_sync',
                destination: 'analytics.sales_daily',
                queries: [{ name: 'daily_totals', template: 'sales/daily.sql' }],
            })

            expect(spec).toEqual({
                job_name: 'sales_sync',
                defaults: {},
                destination: { dataset: 'analytics', table: 'sales_daily' },
                schedule: undefined,
                write_disposition: 'WRITE_TRUNCATE',
                labels: {},
                environment: undefined,
                limits: undefined,
                queries: [{
                    name: 'daily_totals',
                    template: 'sales/daily.sql',
                    variables: {},
                    write_disposition: 'WRITE_TRUNCATE',
                    destination: undefined,
                }],
            })
        })

        it('should parse a three-part destination and query overrides', () => {

            const spec = parseJobSpecData({
                job_name: 'sales_sync',
                destination: 'acme-data.analytics.sales_daily',
                write_disposition: 'write_append',
                queries: [
                    { name: 'a', template: 'a.sql' },
                    {
                        name: 'b',
                        template: 'b.sql',
                        write_disposition: 'WRITE_EMPTY',
                        destination: { dataset: 'staging', table: 'b' },
                    },
                ],
            })

            expect(spec.destination).toEqual({ project: 'acme-data', dataset: 'analytics', table: 'sales_daily' })
            expect(spec.write_disposition).toBe('WRITE_APPEND')
            expect(spec.queries.map((query) => query.write_disposition)).toEqual(['WRITE_APPEND', 'WRITE_EMPTY'])
            expect(spec.queries[1]?.destination).toEqual({ dataset: 'staging', table: 'b' })
        })

        it('should mirror the environment into the labels', () => {

            const spec = parseJobSpecData({
                job_name: 'sales_sync',
                destination: 'analytics.sales_daily',
                environment: 'prod',
                labels: { owner: 'data-eng' },
                queries: [{ name: 'a', template: 'a.sql' }],
            })

            expect(spec.labels).toEqual({ owner: 'data-eng', environment: 'prod' })
        })

        it('should take the environment from its label when unset', () => {

            const spec = parseJobSpecData({
                job_name: 'sales_sync',
                destination: 'analytics.sales_daily',
                labels: { environment: 'stage' },
                queries: [{ name: 'a', template: 'a.sql' }],
            })

            expect(spec.environment).toBe('stage')
        })

        it('should read an empty schedule key as no schedule', () => {

            const spec = parseJobSpecData({
                job_name: 'sales_sync',
                destination: 'analytics.sales_daily',
                schedule: null,
                queries: [{ name: 'a', template: 'a.sql' }],
            })

            expect(spec.schedule).toBeUndefined()
        })

        it('should treat empty variable blocks as empty mappings', () => {

            const spec = parseJobSpecData({
                job_name: 'sales_sync',
                defaults: null,
                destination: 'analytics.sales_daily',
                queries: [{ name: 'a', template: 'a.sql', variables: null }],
            })

            expect(spec.defaults).toEqual({})
            expect(spec.queries[0]?.variables).toEqual({})
        })

        it('should throw on data that did not pass validation', () => {

            expect(() => parseJobSpecData({ job_name: 'x', queries: [] })).toThrow(ZodError)
        })
    })
})
