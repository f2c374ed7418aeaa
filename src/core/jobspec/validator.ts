/**
 * Job spec validator.
 *
 * Runs every check against a loaded document and returns all issues found,
 * in pass order, instead of stopping at the first. A well-formed document
 * never makes it throw; an empty result means the job is valid.
 *
 * Passes:
 * 1. Required fields and field shapes, then environment against its label
 * 2. Query name uniqueness
 * 3. Template files exist under the templates root
 * 4. Defaults and variables are flat mappings of scalars
 * 5. Schedule grammar (only when a schedule is present)
 * 6. Advisory warnings (unknown keys, labels, job name style)
 *
 * @example
 * ```typescript
 * const issues = validateJobSpec(loadJobSpec('jobs/sales.yml'), './templates')
 *
 * for (const issue of issues) {
 *     console.log(`${issue.severity} ${issue.path}: ${issue.message}`)
 * }
 * ```
 */
import { observer } from '../observer.js'
import { isRegularFile, resolveUnderRoot } from '../shared/index.js'
import { describeValue, isMapping } from './loader.js'
import { checkSchedule } from './schedule.js'
import { formatPath, JobStructureSchema } from './schema.js'
import type { JobSpecDocument, ValidationIssue } from './types.js'
import { RECOMMENDED_LABELS } from './types.js'
import { BUILTIN_VARIABLES } from '../template/types.js'


/**
 * Pattern a variable name must match to be referenced from a template.
 */
export const VARIABLE_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/

const JOB_NAME_PATTERN = /^[A-Za-z0-9_-]+$/


/**
 * Validate a loaded job spec document.
 *
 * @param document - Output of the loader
 * @param templatesRoot - Directory template paths are relative to
 * @returns Every issue found; empty when the job is valid
 */
export function validateJobSpec(
    document: JobSpecDocument,
    templatesRoot: string,
): ValidationIssue[] {

    const { data } = document

    const issues: ValidationIssue[] = [
        ...checkStructure(data),
        ...checkEnvironmentLabel(data),
        ...checkUniqueNames(data),
        ...checkTemplates(data, templatesRoot),
        ...checkVariables(data),
        ...checkScheduleField(data),
        ...checkAdvisories(document),
    ]

    for (const issue of issues) {

        if (issue.severity === 'warning') {

            observer.emit('spec:warning', {
                filepath: document.filepath,
                path: issue.path,
                message: issue.message,
            })
        }
    }

    observer.emit('spec:validated', {
        filepath: document.filepath,
        errors: issues.filter((issue) => issue.severity === 'error').length,
        warnings: issues.filter((issue) => issue.severity === 'warning').length,
    })

    return issues
}


/**
 * Check whether any issue blocks rendering.
 */
export function hasErrors(issues: ValidationIssue[]): boolean {

    return issues.some((issue) => issue.severity === 'error')
}


/**
 * Pass 1: required fields and field shapes.
 */
function checkStructure(data: Record<string, unknown>): ValidationIssue[] {

    const result = JobStructureSchema.safeParse(data)

    if (result.success) {

        return []
    }

    return result.error.issues.map((issue) => ({
        severity: 'error' as const,
        path: formatPath(issue.path),
        message: issue.message,
    }))
}


/**
 * Pass 1, continued: `environment` and `labels.environment` must agree.
 *
 * Reads the raw data so the conflict is reported alongside any shape errors.
 */
function checkEnvironmentLabel(data: Record<string, unknown>): ValidationIssue[] {

    const environment = data['environment']
    const labels = data['labels']
    const labelled = isMapping(labels) ? labels['environment'] : undefined

    if (typeof environment !== 'string' || typeof labelled !== 'string' || labelled === environment) {

        return []
    }

    return [{
        severity: 'error',
        path: 'environment',
        message: `Environment '${environment}' does not match labels.environment '${labelled}'`,
    }]
}


/**
 * Iterate query entries that are mappings, with their index.
 */
function queryEntries(data: Record<string, unknown>): Array<[number, Record<string, unknown>]> {

    const queries = data['queries']

    if (!Array.isArray(queries)) {

        return []
    }

    const entries: Array<[number, Record<string, unknown>]> = []

    queries.forEach((query: unknown, index) => {

        if (isMapping(query)) {

            entries.push([index, query])
        }
    })

    return entries
}


/**
 * Pass 2: query names must be unique.
 *
 * Every occurrence after the first is reported, citing all paths that
 * carry the name.
 */
function checkUniqueNames(data: Record<string, unknown>): ValidationIssue[] {

    const seen = new Map<string, string[]>()

    for (const [index, query] of queryEntries(data)) {

        const name = query['name']

        if (typeof name !== 'string' || name.trim() === '') {

            continue
        }

        const key = name.trim()
        const paths = seen.get(key) ?? []

        paths.push(`queries[${index}].name`)
        seen.set(key, paths)
    }

    const issues: ValidationIssue[] = []

    for (const [name, paths] of seen) {

        if (paths.length < 2) {

            continue
        }

        for (const duplicate of paths.slice(1)) {

            issues.push({
                severity: 'error',
                path: duplicate,
                message: `Query name '${name}' is used more than once (${paths.join(', ')})`,
            })
        }
    }

    return issues
}


/**
 * Pass 3: template files exist under the templates root.
 */
function checkTemplates(data: Record<string, unknown>, templatesRoot: string): ValidationIssue[] {

    const issues: ValidationIssue[] = []

    for (const [index, query] of queryEntries(data)) {

        const template = query['template']

        if (typeof template !== 'string' || template.trim() === '') {

            continue
        }

        const issuePath = `queries[${index}].template`
        const resolved = resolveUnderRoot(templatesRoot, template.trim())

        if (!resolved) {

            issues.push({
                severity: 'error',
                path: issuePath,
                message: `Template '${template}' escapes templates root ${templatesRoot}`,
            })
            continue
        }

        if (!isRegularFile(resolved)) {

            issues.push({
                severity: 'error',
                path: issuePath,
                message: `Template '${template}' does not exist under ${templatesRoot}`,
            })
        }
    }

    return issues
}


/**
 * Check one variables mapping: identifier keys, scalar values.
 */
function checkVariableMap(value: unknown, basePath: string): ValidationIssue[] {

    // An empty YAML key (`variables:`) parses as null
    if (value === undefined || value === null) {

        return []
    }

    if (!isMapping(value)) {

        return [{
            severity: 'error',
            path: basePath,
            message: `Variables must be a mapping, got ${describeValue(value)}`,
        }]
    }

    const issues: ValidationIssue[] = []

    for (const [key, item] of Object.entries(value)) {

        const itemPath = `${basePath}.${key}`

        if (!VARIABLE_NAME_PATTERN.test(key)) {

            issues.push({
                severity: 'error',
                path: itemPath,
                message: `Variable name '${key}' must start with a letter or underscore and contain only letters, digits and underscores`,
            })
            continue
        }

        const isScalar = typeof item === 'string'
            || typeof item === 'boolean'
            || (typeof item === 'number' && Number.isFinite(item))

        if (!isScalar) {

            issues.push({
                severity: 'error',
                path: itemPath,
                message: `Variable '${key}' must be a string, number or boolean, got ${describeValue(item)}`,
            })
            continue
        }

        // YAML integers past 2^53 have already lost digits
        if (typeof item === 'number' && Number.isInteger(item) && !Number.isSafeInteger(item)) {

            issues.push({
                severity: 'error',
                path: itemPath,
                message: `Variable '${key}' is too large to keep every digit; quote it as a string`,
            })
        }
    }

    return issues
}


/**
 * Pass 4: defaults and query variables.
 */
function checkVariables(data: Record<string, unknown>): ValidationIssue[] {

    const issues = checkVariableMap(data['defaults'], 'defaults')

    const defaults = data['defaults']

    if (isMapping(defaults)) {

        for (const key of Object.keys(defaults)) {

            if (BUILTIN_VARIABLES.has(key)) {

                issues.push({
                    severity: 'warning',
                    path: `defaults.${key}`,
                    message: `Default '${key}' overrides the built-in variable of the same name`,
                })
            }
        }
    }

    for (const [index, query] of queryEntries(data)) {

        issues.push(...checkVariableMap(query['variables'], `queries[${index}].variables`))
    }

    return issues
}


/**
 * Pass 5: schedule grammar, only when a schedule is present.
 */
function checkScheduleField(data: Record<string, unknown>): ValidationIssue[] {

    const schedule = data['schedule']

    // An empty `schedule:` key parses as null
    if (schedule === undefined || schedule === null) {

        return []
    }

    if (typeof schedule !== 'string') {

        return [{
            severity: 'error',
            path: 'schedule',
            message: `Schedule must be a string, got ${describeValue(schedule)}`,
        }]
    }

    const reason = checkSchedule(schedule)

    if (!reason) {

        return []
    }

    return [{
        severity: 'error',
        path: 'schedule',
        message: reason.charAt(0).toUpperCase() + reason.slice(1),
    }]
}


/**
 * Pass 6: non-blocking advice.
 */
function checkAdvisories(document: JobSpecDocument): ValidationIssue[] {

    const { data } = document
    const issues: ValidationIssue[] = document.unknownKeys.map((key) => ({
        severity: 'warning' as const,
        path: key,
        message: `Unknown key '${key.split('.').pop() ?? key}' is ignored`,
    }))

    const jobName = data['job_name']

    if (typeof jobName === 'string' && jobName.trim() !== '' && !JOB_NAME_PATTERN.test(jobName.trim())) {

        issues.push({
            severity: 'warning',
            path: 'job_name',
            message: 'Job name should contain only letters, numbers, hyphens and underscores',
        })
    }

    const labels = data['labels']
    const present = isMapping(labels) ? labels : {}
    const hasEnvironment = typeof data['environment'] === 'string'

    const missing = RECOMMENDED_LABELS.filter((label) =>
        !(label in present) && !(label === 'environment' && hasEnvironment),
    )

    if (missing.length > 0) {

        issues.push({
            severity: 'warning',
            path: 'labels',
            message: `Missing recommended labels: ${missing.join(', ')}`,
        })
    }

    return issues
}
