/**
 * Job spec module.
 *
 * Loads YAML job specs and validates them against the job spec format and
 * the templates directory.
 *
 * @example
 * ```typescript
 * import { loadJobSpec, validateJobSpec, hasErrors, parseJobSpecData } from './core/jobspec'
 *
 * const document = loadJobSpec('jobs/sales_sync.yml')
 * const issues = validateJobSpec(document, './templates')
 *
 * if (!hasErrors(issues)) {
 *     const spec = parseJobSpecData(document.data)
 * }
 * ```
 *
 * @module
 */

export { loadJobSpec, parseJobSpec, isMapping, describeValue } from './loader.js'

export {
    validateJobSpec,
    hasErrors,
    VARIABLE_NAME_PATTERN,
} from './validator.js'

export { checkSchedule } from './schedule.js'

export {
    parseJobSpecData,
    formatPath,
    JobStructureSchema,
    DestinationSchema,
    WriteDispositionSchema,
    EnvironmentSchema,
} from './schema.js'

export { SpecReadError, ParseError, ShapeError, ValidationError } from './errors.js'

export type {
    VariableValue,
    Variables,
    WriteDisposition,
    JobEnvironment,
    Destination,
    JobLimits,
    QuerySpec,
    JobSpec,
    JobSpecDocument,
    IssueSeverity,
    ValidationIssue,
} from './types.js'

export { JOB_KEYS, QUERY_KEYS, REQUIRED_JOB_KEYS, RECOMMENDED_LABELS } from './types.js'
