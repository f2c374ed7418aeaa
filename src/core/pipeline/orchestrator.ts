/**
 * Pipeline orchestrator.
 *
 * Sequences load → validate → (per query) template → variables → render.
 * Every step is synchronous and nothing is kept between calls; the caller
 * owns the returned job.
 *
 * - `checkJob` stops after validation (the `validate` command)
 * - `resolveJob` renders every query (`render`, `dry-run`, `deploy`)
 *
 * @example
 * ```typescript
 * const [job, err] = attemptSync(() => resolveJob('jobs/sales.yml', './templates'))
 *
 * if (err instanceof ValidationError) {
 *     err.errors.forEach((issue) => console.error(`${issue.path}: ${issue.message}`))
 * }
 * ```
 */
import { attemptSync } from '@logosdx/utils'

import { observer } from '../observer.js'
import {
    hasErrors,
    loadJobSpec,
    parseJobSpecData,
    validateJobSpec,
    ValidationError,
} from '../jobspec/index.js'
import type { JobSpec, QuerySpec } from '../jobspec/index.js'
import {
    resolveDestination,
    resolveTemplate,
    resolveVariables,
    SqlRenderer,
    TemplateNotFoundError,
    UndeclaredVariableError,
} from '../template/index.js'
import type { CheckResult, RenderedQuery, ResolvedJob, ResolveOptions } from './types.js'


/**
 * Load and validate a job spec without rendering it.
 *
 * @throws SpecReadError, ParseError or ShapeError when the document cannot be loaded
 */
export function checkJob(specPath: string, templatesRoot: string): CheckResult {

    const document = loadJobSpec(specPath)
    const issues = validateJobSpec(document, templatesRoot)

    return { document, issues }
}


/**
 * Load, validate and render a job spec.
 *
 * @throws ValidationError when validation finds any error-severity issue
 * @throws TemplateNotFoundError when a template vanished after validation
 * @throws UndeclaredVariableError when a template references a missing variable
 */
export function resolveJob(
    specPath: string,
    templatesRoot: string,
    options: ResolveOptions = {},
): ResolvedJob {

    const start = performance.now()
    const { document, issues } = checkJob(specPath, templatesRoot)

    if (hasErrors(issues)) {

        const error = new ValidationError(document.filepath, issues)

        observer.emit('error', {
            source: 'pipeline',
            error,
            context: { filepath: document.filepath, operation: 'validate' },
        })

        throw error
    }

    const spec = parseJobSpecData(document.data)
    const job = renderJobSpec(spec, templatesRoot, options)

    observer.emit('job:resolved', {
        jobName: job.jobName,
        queryCount: job.queries.length,
        durationMs: Math.round(performance.now() - start),
    })

    return {
        ...job,
        warnings: issues.filter((issue) => issue.severity === 'warning'),
    }
}


/**
 * Render every query of an already validated spec, in order.
 */
export function renderJobSpec(
    spec: JobSpec,
    templatesRoot: string,
    options: ResolveOptions = {},
): ResolvedJob {

    const renderer = options.renderer ?? new SqlRenderer()

    const queries = spec.queries.map((query) =>
        renderQuery(spec, query, templatesRoot, renderer),
    )

    return {
        jobName: spec.job_name,
        queries,
        schedule: spec.schedule,
        labels: spec.labels,
        environment: spec.environment,
        limits: spec.limits,
        warnings: [],
    }
}


/**
 * Resolve and render one query.
 *
 * Missing templates and undeclared variables at this point slipped past
 * validation; they are flagged as `pipeline:inconsistency` before
 * propagating.
 */
export function renderQuery(
    spec: JobSpec,
    query: QuerySpec,
    templatesRoot: string,
    renderer: SqlRenderer,
): RenderedQuery {

    const [rendered, err] = attemptSync((): RenderedQuery => {

        const handle = resolveTemplate(query, templatesRoot)
        const variables = resolveVariables(spec, query)
        const sql = renderer.render(handle, variables)

        return {
            name: query.name,
            sql,
            destination: resolveDestination(spec, query),
            writeDisposition: query.write_disposition ?? spec.write_disposition,
            template: query.template,
            variables,
        }
    })

    if (err) {

        if (err instanceof TemplateNotFoundError || err instanceof UndeclaredVariableError) {

            observer.emit('pipeline:inconsistency', {
                jobName: spec.job_name,
                queryName: query.name,
                error: err.message,
            })
        }

        observer.emit('error', {
            source: 'pipeline',
            error: err,
            context: { jobName: spec.job_name, queryName: query.name, operation: 'render' },
        })

        throw err
    }

    observer.emit('query:rendered', {
        jobName: spec.job_name,
        queryName: query.name,
        template: query.template,
        bytes: Buffer.byteLength(rendered.sql, 'utf8'),
        variables: rendered.variables,
    })

    return rendered
}
