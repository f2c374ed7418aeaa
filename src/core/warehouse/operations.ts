/**
 * Dry-run and deploy flows.
 *
 * Both walk the resolved job's queries in order, one warehouse call at a
 * time, and stop at the first failure. Deploy dry-runs every query before
 * touching any scheduled query, so a job is never half deployed because one
 * of its queries does not compile.
 *
 * @example
 * ```typescript
 * const job = resolveJob('jobs/sales.yml', './templates')
 *
 * const runs = await dryRunJob(job, execution, { location: 'US' })
 * const deployed = await deployJob(job, { execution, scheduler }, {
 *     project: 'acme-data',
 *     location: 'US',
 * })
 * ```
 */
import { attempt } from '@logosdx/utils'

import { observer } from '../observer.js'
import type { RenderedQuery, ResolvedJob } from '../pipeline/types.js'
import { BytesLimitError, DryRunError, ProjectRequiredError, ScheduleRequiredError } from './errors.js'
import { parseTableId } from './table-id.js'
import type {
    QueryDeployment,
    QueryDryRun,
    QueryExecutionService,
    WarehouseOptions,
    WarehouseServices,
} from './types.js'


/**
 * Bytes limit for a job: its own, else the configured fallback.
 */
export function bytesLimit(job: ResolvedJob, options: WarehouseOptions): number | undefined {

    return job.limits?.max_bytes_billed ?? options.maxBytesBilled
}


/**
 * Display name of the scheduled query for one query of a job.
 *
 * @example
 * ```typescript
 * displayNameFor(job, query)  // 'sales_sync' or 'sales_sync.daily_totals'
 * ```
 */
export function displayNameFor(job: ResolvedJob, query: RenderedQuery): string {

    return job.queries.length === 1 ? job.jobName : `${job.jobName}.${query.name}`
}


/**
 * Dry-run every query of a resolved job.
 *
 * @throws DryRunError when the warehouse rejects a query
 * @throws BytesLimitError when an estimate exceeds the bytes limit
 */
export async function dryRunJob(
    job: ResolvedJob,
    execution: QueryExecutionService,
    options: WarehouseOptions,
): Promise<QueryDryRun[]> {

    const limit = bytesLimit(job, options)
    const runs: QueryDryRun[] = []

    for (const query of job.queries) {

        observer.emit('dry-run:start', {
            jobName: job.jobName,
            queryName: query.name,
            project: options.project,
            location: options.location,
        })

        const [result, err] = await attempt(() => execution.dryRun({
            sql: query.sql,
            project: options.project,
            location: options.location,
            maxBytesBilled: limit,
            labels: job.labels,
        }))

        if (err) {

            throw failDryRun(job, query, new DryRunError(query.name, err.message))
        }

        if (!result.isValid) {

            throw failDryRun(job, query, new DryRunError(query.name, result.error ?? 'query is invalid'))
        }

        if (limit !== undefined && result.estimatedBytesProcessed > limit) {

            throw failDryRun(
                job,
                query,
                new BytesLimitError(query.name, result.estimatedBytesProcessed, limit),
            )
        }

        observer.emit('dry-run:complete', {
            jobName: job.jobName,
            queryName: query.name,
            estimatedBytes: result.estimatedBytesProcessed,
        })

        runs.push({ queryName: query.name, estimatedBytes: result.estimatedBytesProcessed })
    }

    return runs
}


/**
 * Deploy every query of a resolved job as a scheduled query.
 *
 * @throws ScheduleRequiredError when the job has no schedule
 * @throws ProjectRequiredError when no project is configured
 * @throws DryRunError or BytesLimitError when any dry-run fails; nothing is deployed
 */
export async function deployJob(
    job: ResolvedJob,
    services: WarehouseServices,
    options: WarehouseOptions,
): Promise<QueryDeployment[]> {

    const { schedule } = job

    if (!schedule) {

        throw new ScheduleRequiredError(job.jobName)
    }

    const { project } = options

    if (!project) {

        throw new ProjectRequiredError(job.jobName)
    }

    await dryRunJob(job, services.execution, options)

    const deployments: QueryDeployment[] = []

    for (const query of job.queries) {

        const displayName = displayNameFor(job, query)
        const destination = parseTableId(query.destination, project)

        observer.emit('deploy:start', {
            jobName: job.jobName,
            queryName: query.name,
            displayName,
            dataset: destination.datasetId,
        })

        const [result, err] = await attempt(() => services.scheduler.deploy({
            project,
            location: options.location,
            displayName,
            schedule,
            destination,
            writeDisposition: query.writeDisposition,
            sql: query.sql,
        }))

        if (err) {

            observer.emit('deploy:failed', {
                jobName: job.jobName,
                queryName: query.name,
                error: err.message,
            })

            observer.emit('error', {
                source: 'warehouse',
                error: err,
                context: { jobName: job.jobName, queryName: query.name, operation: 'deploy' },
            })

            throw err
        }

        observer.emit(result.created ? 'deploy:created' : 'deploy:updated', {
            jobName: job.jobName,
            queryName: query.name,
            transferConfigId: result.transferConfigId,
        })

        deployments.push({
            queryName: query.name,
            displayName,
            transferConfigId: result.transferConfigId,
            created: result.created,
        })
    }

    return deployments
}


/**
 * Report a dry-run failure and hand back the error to throw.
 */
function failDryRun(job: ResolvedJob, query: RenderedQuery, error: Error): Error {

    observer.emit('dry-run:failed', {
        jobName: job.jobName,
        queryName: query.name,
        error: error.message,
    })

    observer.emit('error', {
        source: 'warehouse',
        error,
        context: { jobName: job.jobName, queryName: query.name, operation: 'dry-run' },
    })

    return error
}
