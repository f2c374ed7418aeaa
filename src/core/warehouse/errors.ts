/**
 * Warehouse errors.
 *
 * Raised by the dry-run and deploy flows. None are retried here; retry
 * policy belongs to the caller.
 */


/**
 * Error when the warehouse rejects a query during dry-run.
 */
export class DryRunError extends Error {

    override readonly name = 'DryRunError' as const

    constructor(
        public readonly queryName: string,
        public readonly reason: string,
    ) {

        super(`Dry-run failed for query '${queryName}': ${reason}`)
    }
}


/**
 * Error when a dry-run estimate exceeds the bytes limit.
 *
 * @example
 * ```typescript
 * const [runs, err] = await attempt(() => dryRunJob(job, execution, options))
 * if (err instanceof BytesLimitError) {
 *     console.error(`${err.queryName} would scan ${err.estimatedBytes} bytes`)
 * }
 * ```
 */
export class BytesLimitError extends Error {

    override readonly name = 'BytesLimitError' as const

    constructor(
        public readonly queryName: string,
        public readonly estimatedBytes: number,
        public readonly maxBytesBilled: number,
    ) {

        super(
            `Query '${queryName}' would process ${estimatedBytes} bytes, above max_bytes_billed=${maxBytesBilled}`
        )
    }
}


/**
 * Error when deploying a job that has no schedule.
 */
export class ScheduleRequiredError extends Error {

    override readonly name = 'ScheduleRequiredError' as const

    constructor(public readonly jobName: string) {

        super(`Job '${jobName}' has no schedule; set 'schedule' before deploying`)
    }
}


/**
 * Error when deploying without a target project.
 */
export class ProjectRequiredError extends Error {

    override readonly name = 'ProjectRequiredError' as const

    constructor(public readonly jobName: string) {

        super(`Deploying '${jobName}' requires a project (--project or SQLJOB_PROJECT)`)
    }
}


/**
 * Error when a table id is not `dataset.table` or `project.dataset.table`.
 */
export class TableIdError extends Error {

    override readonly name = 'TableIdError' as const

    constructor(public readonly value: string) {

        super(`Table id must be 'dataset.table' or 'project.dataset.table', got '${value}'`)
    }
}
