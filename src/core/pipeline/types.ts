/**
 * Pipeline types.
 */
import type {
    Destination,
    JobEnvironment,
    JobLimits,
    JobSpecDocument,
    ValidationIssue,
    WriteDisposition,
} from '../jobspec/types.js'
import type { ResolvedVariables, SqlRenderer } from '../template/index.js'


/**
 * One query rendered to final SQL.
 */
export interface RenderedQuery {

    name: string

    /** Final SQL text */
    sql: string

    /** Destination after applying the query override */
    destination: Destination

    writeDisposition: WriteDisposition

    /** Template path relative to the templates root */
    template: string

    /** Exact variables the SQL was rendered with */
    variables: ResolvedVariables
}


/**
 * A job with every query rendered, ready for dry-run or deploy.
 */
export interface ResolvedJob {

    jobName: string
    queries: RenderedQuery[]
    schedule: string | undefined
    labels: Record<string, string>
    environment: JobEnvironment | undefined
    limits: JobLimits | undefined

    /** Warning-severity issues found while validating */
    warnings: ValidationIssue[]
}


/**
 * Result of loading and validating a spec without rendering it.
 */
export interface CheckResult {

    document: JobSpecDocument
    issues: ValidationIssue[]
}


/**
 * Options for resolving a job.
 */
export interface ResolveOptions {

    /** Renderer to use; a default `SqlRenderer` is built when omitted */
    renderer?: SqlRenderer
}
