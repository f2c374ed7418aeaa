/**
 * Job spec loader.
 *
 * Reads a YAML job spec into a raw document. Only the structural minimum is
 * checked here (a mapping with `job_name` and `queries`); field-level checks
 * belong to the validator so its messages can point at every problem at once.
 *
 * @example
 * ```typescript
 * import { loadJobSpec } from './loader'
 *
 * const doc = loadJobSpec('jobs/sales_sync.yml')
 * // doc.data.job_name === 'sales_sync'
 * // doc.unknownKeys   === ['queries[0].varaibles']
 * ```
 */
import { readFileSync } from 'node:fs'

import { attemptSync } from '@logosdx/utils'
import { parseDocument, type YAMLError } from 'yaml'

import { observer } from '../observer.js'
import { isMapping } from '../shared/index.js'
import { ParseError, ShapeError, SpecReadError } from './errors.js'
import type { JobSpecDocument } from './types.js'
import { JOB_KEYS, QUERY_KEYS, REQUIRED_JOB_KEYS } from './types.js'


export { isMapping }


/**
 * Parse YAML text into a raw job spec document.
 *
 * @param text - YAML source
 * @param filepath - Path used in error messages
 * @throws ParseError when the text is not valid YAML
 * @throws ShapeError when the document lacks `job_name` or `queries`
 */
export function parseJobSpec(text: string, filepath: string): JobSpecDocument {

    const doc = parseDocument(text)
    const syntaxError = doc.errors[0]

    if (syntaxError) {

        throw toParseError(syntaxError, filepath)
    }

    const [data, convertErr] = attemptSync((): unknown => doc.toJS())

    if (convertErr) {

        throw new ParseError(filepath, convertErr.message)
    }

    if (!isMapping(data)) {

        throw new ShapeError(
            filepath,
            [...REQUIRED_JOB_KEYS],
            `document must be a mapping, got ${describeValue(data)}`,
        )
    }

    const missing = REQUIRED_JOB_KEYS.filter((key) => !(key in data))

    if (missing.length > 0) {

        throw new ShapeError(filepath, missing)
    }

    return {
        filepath,
        data,
        unknownKeys: findUnknownKeys(data),
    }
}


/**
 * Load a job spec document from disk.
 *
 * @param filepath - Path to the YAML job spec
 * @throws SpecReadError when the file cannot be read
 * @throws ParseError when the file is not valid YAML
 * @throws ShapeError when the document lacks `job_name` or `queries`
 */
export function loadJobSpec(filepath: string): JobSpecDocument {

    const [text, readErr] = attemptSync(() => readFileSync(filepath, 'utf8'))

    if (readErr) {

        const error = new SpecReadError(filepath, readErr)

        observer.emit('error', {
            source: 'jobspec',
            error,
            context: { filepath, operation: 'read' },
        })

        throw error
    }

    const [document, parseErr] = attemptSync(() => parseJobSpec(text, filepath))

    if (parseErr) {

        observer.emit('error', {
            source: 'jobspec',
            error: parseErr,
            context: { filepath, operation: 'parse' },
        })

        throw parseErr
    }

    const queries = document.data['queries']

    observer.emit('spec:loaded', {
        filepath,
        jobName: typeof document.data['job_name'] === 'string' ? document.data['job_name'] : '',
        queryCount: Array.isArray(queries) ? queries.length : 0,
    })

    return document
}


/**
 * Collect dotted paths of keys not part of the job spec format.
 */
function findUnknownKeys(data: Record<string, unknown>): string[] {

    const known = new Set<string>(JOB_KEYS)
    const queryKnown = new Set<string>(QUERY_KEYS)
    const unknown = Object.keys(data).filter((key) => !known.has(key))

    const queries = data['queries']

    if (Array.isArray(queries)) {

        queries.forEach((query: unknown, index) => {

            if (!isMapping(query)) {

                return
            }

            for (const key of Object.keys(query)) {

                if (!queryKnown.has(key)) {

                    unknown.push(`queries[${index}].${key}`)
                }
            }
        })
    }

    return unknown
}


/**
 * Convert a YAML parser error into a ParseError with a 1-based position.
 */
function toParseError(error: YAMLError, filepath: string): ParseError {

    const position = error.linePos?.[0]
    const firstLine = error.message.split('\n')[0] ?? error.message
    const reason = firstLine.replace(/ at line \d+, column \d+:?$/, '')

    return new ParseError(filepath, reason, position?.line, position?.col)
}


/**
 * Short description of a parsed value for messages.
 */
export function describeValue(value: unknown): string {

    if (value === null || value === undefined) {

        return 'nothing'
    }

    if (Array.isArray(value)) {

        return 'a list'
    }

    if (isMapping(value)) {

        return 'a mapping'
    }

    return `a ${typeof value}`
}
