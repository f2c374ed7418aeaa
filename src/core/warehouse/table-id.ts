/**
 * Destination table ids.
 */
import type { Destination } from '../jobspec/types.js'
import { TableIdError } from './errors.js'
import type { TableId } from './types.js'


/**
 * Parse a destination into a fully qualified table id.
 *
 * Accepts `dataset.table`, `project.dataset.table` or a destination
 * mapping. The default project fills in when none is given.
 *
 * @throws TableIdError when a string has the wrong number of parts
 *
 * @example
 * ```typescript
 * parseTableId('analytics.sales_daily', 'acme-data')
 * // { projectId: 'acme-data', datasetId: 'analytics', tableId: 'sales_daily' }
 *
 * parseTableId({ project: 'other', dataset: 'analytics', table: 'sales' }, 'acme-data')
 * // { projectId: 'other', datasetId: 'analytics', tableId: 'sales' }
 * ```
 */
export function parseTableId(value: string | Destination, defaultProject: string): TableId {

    if (typeof value !== 'string') {

        return {
            projectId: value.project ?? defaultProject,
            datasetId: value.dataset,
            tableId: value.table,
        }
    }

    const parts = value.trim().split('.')

    if (parts.some((part) => part.length === 0)) {

        throw new TableIdError(value)
    }

    const [first, second, third] = parts

    if (parts.length === 2 && first && second) {

        return { projectId: defaultProject, datasetId: first, tableId: second }
    }

    if (parts.length === 3 && first && second && third) {

        return { projectId: first, datasetId: second, tableId: third }
    }

    throw new TableIdError(value)
}


/**
 * Format a table id as `project.dataset.table`.
 */
export function formatTableId(id: TableId): string {

    return `${id.projectId}.${id.datasetId}.${id.tableId}`
}
