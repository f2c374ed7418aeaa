/**
 * Job spec types.
 *
 * A job spec is a YAML document describing one deployable unit of scheduled
 * SQL work: a job name, job-wide variable defaults, a destination, an
 * optional schedule and an ordered list of queries. Keys keep their
 * snake_case spelling from the document so existing specs load unchanged.
 */


/**
 * Scalar value a template variable may hold.
 */
export type VariableValue = string | number | boolean


/**
 * Flat mapping of variable name to scalar value.
 */
export type Variables = Record<string, VariableValue>


/**
 * How the warehouse writes query results into the destination table.
 */
export type WriteDisposition = 'WRITE_TRUNCATE' | 'WRITE_APPEND' | 'WRITE_EMPTY'


/**
 * Deployment environment a job targets.
 */
export type JobEnvironment = 'dev' | 'stage' | 'prod'


/**
 * Destination table of a query.
 *
 * `project` is optional; the deploy step falls back to the project it
 * deploys into.
 */
export interface Destination {

    project?: string
    dataset: string
    table: string
}


/**
 * Cost limits applied to warehouse dry-runs.
 */
export interface JobLimits {

    max_bytes_billed: number
}


/**
 * One unit of work inside a job.
 */
export interface QuerySpec {

    name: string
    template: string
    variables: Variables
    write_disposition?: WriteDisposition
    destination?: Destination
}


/**
 * Validated job spec.
 *
 * @example
 * ```typescript
 * const spec: JobSpec = {
 *     job_name: 'sales_sync',
 *     defaults: { region: 'US' },
 *     destination: { dataset: 'analytics', table: 'sales_daily' },
 *     write_disposition: 'WRITE_TRUNCATE',
 *     labels: { owner: 'data-eng' },
 *     queries: [
 *         { name: 'daily_totals', template: 'sales/daily.sql', variables: {} },
 *     ],
 * }
 * ```
 */
export interface JobSpec {

    job_name: string
    defaults: Variables
    destination: Destination
    schedule?: string
    write_disposition: WriteDisposition
    labels: Record<string, string>
    environment?: JobEnvironment
    limits?: JobLimits
    queries: QuerySpec[]
}


/**
 * Raw document produced by the loader.
 *
 * Values are untyped until validation; `data` is guaranteed to be a mapping
 * carrying `job_name` and `queries`.
 */
export interface JobSpecDocument {

    /** Path the document was read from */
    filepath: string

    /** Parsed YAML mapping */
    data: Record<string, unknown>

    /** Dotted paths of keys the job spec format does not know */
    unknownKeys: string[]
}


/**
 * Severity of a validation issue. Only `error` blocks rendering.
 */
export type IssueSeverity = 'error' | 'warning'


/**
 * A single problem found by validation.
 *
 * @example
 * ```typescript
 * { severity: 'error', path: 'queries[2].template', message: "Template 'x.sql' does not exist" }
 * ```
 */
export interface ValidationIssue {

    severity: IssueSeverity

    /** Dotted path of the offending field, e.g. `queries[2].template` */
    path: string

    message: string
}


/**
 * Top-level keys of a job spec document.
 */
export const JOB_KEYS = [
    'job_name',
    'defaults',
    'destination',
    'schedule',
    'write_disposition',
    'labels',
    'environment',
    'limits',
    'queries',
] as const


/**
 * Keys of a query entry.
 */
export const QUERY_KEYS = [
    'name',
    'template',
    'variables',
    'write_disposition',
    'destination',
] as const


/**
 * Top-level keys the loader requires before handing off to validation.
 */
export const REQUIRED_JOB_KEYS = ['job_name', 'queries'] as const


/**
 * Labels every job is expected to carry.
 */
export const RECOMMENDED_LABELS = ['owner', 'domain', 'environment'] as const
