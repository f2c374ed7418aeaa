/**
 * Table id tests.
 */
import { describe, it, expect } from 'vitest'

import { formatTableId, parseTableId, TableIdError } from '../../../src/core/warehouse/index.js'


describe('warehouse: table-id', () => {

    it('should fill in the default project for two parts', () => {

        expect(parseTableId('analytics.sales_daily', 'acme-data')).toEqual({
            projectId: 'acme-data',
            datasetId: 'analytics',
            tableId: 'sales_daily',
        })
    })

    it('should keep an explicit project', () => {

        expect(parseTableId('other.analytics.sales_daily', 'acme-data').projectId).toBe('other')
        expect(parseTableId({ project: 'other', dataset: 'a', table: 'b' }, 'acme-data').projectId).toBe('other')
        expect(parseTableId({ dataset: 'a', table: 'b' }, 'acme-data').projectId).toBe('acme-data')
    })

    it('should reject malformed ids', () => {

        expect(() => parseTableId('sales_daily', 'acme-data')).toThrow(TableIdError)
        expect(() => parseTableId('a..b', 'acme-data')).toThrow(
            "Table id must be 'dataset.table' or 'project.dataset.table', got 'a..b'",
        )
        expect(() => parseTableId('a.b.c.d', 'acme-data')).toThrow(TableIdError)
    })

    it('should format a fully qualified id', () => {

        expect(formatTableId({ projectId: 'p', datasetId: 'd', tableId: 't' })).toBe('p.d.t')
    })
})
