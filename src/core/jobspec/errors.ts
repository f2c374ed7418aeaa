/**
 * Job spec errors.
 *
 * Each pipeline stage fails with its own error type so the command layer can
 * tell a malformed document from an invalid job, and both from a rendering
 * failure.
 */
import type { ValidationIssue } from './types.js'


/**
 * Error when the job spec file cannot be read at all.
 *
 * @example
 * ```typescript
 * const [doc, err] = attemptSync(() => loadJobSpec('jobs/missing.yml'))
 * if (err instanceof SpecReadError) {
 *     console.error(`Cannot read ${err.filepath}`)
 * }
 * ```
 */
export class SpecReadError extends Error {

    override readonly name = 'SpecReadError' as const

    constructor(
        public readonly filepath: string,
        public override readonly cause: Error,
    ) {

        super(`Cannot read job spec '${filepath}': ${cause.message}`)
    }
}


/**
 * Error when the document is not valid YAML.
 *
 * Line and column are 1-based and present when the parser reports them.
 */
export class ParseError extends Error {

    override readonly name = 'ParseError' as const

    constructor(
        public readonly filepath: string,
        public readonly reason: string,
        public readonly line?: number,
        public readonly column?: number,
    ) {

        const location = line !== undefined
            ? `:${line}${column !== undefined ? `:${column}` : ''}`
            : ''

        super(`Malformed job spec ${filepath}${location}: ${reason}`)
    }
}


/**
 * Error when the document parses but lacks the structural minimum
 * (a mapping carrying `job_name` and `queries`).
 */
export class ShapeError extends Error {

    override readonly name = 'ShapeError' as const

    constructor(
        public readonly filepath: string,
        public readonly missingKeys: string[],
        reason?: string,
    ) {

        super(
            reason
                ? `Incomplete job spec ${filepath}: ${reason}`
                : `Incomplete job spec ${filepath}: missing top-level ${missingKeys.map((k) => `'${k}'`).join(', ')}`
        )
    }
}


/**
 * Error carrying every issue found by validation.
 *
 * Thrown by the orchestrator when at least one issue has `error` severity.
 *
 * @example
 * ```typescript
 * const [job, err] = attemptSync(() => resolveJob(specPath, templatesRoot))
 * if (err instanceof ValidationError) {
 *     for (const issue of err.errors) console.error(`${issue.path}: ${issue.message}`)
 * }
 * ```
 */
export class ValidationError extends Error {

    override readonly name = 'ValidationError' as const

    constructor(
        public readonly filepath: string,
        public readonly issues: ValidationIssue[],
    ) {

        const errors = issues.filter((issue) => issue.severity === 'error')
        const first = errors[0]
        const more = errors.length > 1 ? ` (and ${errors.length - 1} more)` : ''

        super(
            first
                ? `Invalid job spec ${filepath}: ${first.path}: ${first.message}${more}`
                : `Invalid job spec ${filepath}`
        )
    }

    /**
     * Issues with `error` severity.
     */
    get errors(): ValidationIssue[] {

        return this.issues.filter((issue) => issue.severity === 'error')
    }
}
