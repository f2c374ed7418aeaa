/**
 * Variable resolver.
 *
 * Merges, in increasing precedence:
 * 1. Built-ins (job name, query name, environment, destination parts)
 * 2. Job `defaults`
 * 3. Query `variables`
 *
 * A key from a later source replaces the earlier value whole; nothing is
 * deep merged.
 */
import type { Destination, JobSpec, QuerySpec, Variables } from '../jobspec/types.js'
import type { ResolvedVariables } from './types.js'


/**
 * Destination a query writes to: its own override, else the job's.
 */
export function resolveDestination(job: JobSpec, query: QuerySpec): Destination {

    return query.destination ?? job.destination
}


/**
 * Built-in variables for a query.
 *
 * @example
 * ```typescript
 * builtinVariables(job, query)
 * // { job_name: 'sales_sync', query_name: 'daily_totals',
 * //   destination_dataset: 'analytics', destination_table: 'sales_daily' }
 * ```
 */
export function builtinVariables(job: JobSpec, query: QuerySpec): Variables {

    const destination = resolveDestination(job, query)

    const builtins: Variables = {
        job_name: job.job_name,
        query_name: query.name,
    }

    if (job.environment) {

        builtins['environment'] = job.environment
    }

    if (destination.project) {

        builtins['destination_project'] = destination.project
    }

    builtins['destination_dataset'] = destination.dataset
    builtins['destination_table'] = destination.table

    return builtins
}


/**
 * Resolve the variable set used to render one query.
 *
 * Pure: no I/O and never throws. Whether the template needs a key it
 * lacks is the renderer's concern.
 *
 * @example
 * ```typescript
 * // defaults: { region: 'US', days: 7 }, query variables: { region: 'EU' }
 * resolveVariables(job, query)
 * // { job_name: 'sales_sync', query_name: 'daily_totals', ..., region: 'EU', days: 7 }
 * ```
 */
export function resolveVariables(job: JobSpec, query: QuerySpec): ResolvedVariables {

    return Object.freeze({
        ...builtinVariables(job, query),
        ...job.defaults,
        ...query.variables,
    })
}
