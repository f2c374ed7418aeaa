/**
 * SQL renderer.
 *
 * Expands `{{ name }}` markers against a resolved variable set. Markers may
 * pipe the value through filters (`{{ region | quote }}`) and `{# ... #}`
 * comments are dropped.
 *
 * Rules:
 * - A reference to a key the variable set lacks throws UndeclaredVariableError.
 *   Nothing is ever substituted as an empty string.
 * - Substitution is a single pass over the template source. Substituted
 *   text is never scanned again, so a value containing `{{ x }}` is output
 *   literally.
 * - The same template and variables always produce the same output.
 *
 * @example
 * ```typescript
 * const renderer = new SqlRenderer()
 *
 * renderer.renderString(
 *     'SELECT * FROM sales WHERE region = {{ region | quote }}',
 *     { region: 'EU' },
 *     { queryName: 'daily_totals', template: 'inline' },
 * )
 * // "SELECT * FROM sales WHERE region = 'EU'"
 * ```
 */
import { readFileSync } from 'node:fs'

import { attemptSync } from '@logosdx/utils'

import { observer } from '../observer.js'
import { TemplateNotFoundError, TemplateSyntaxError, UndeclaredVariableError } from './errors.js'
import type {
    RendererOptions,
    RenderSource,
    ResolvedVariables,
    TemplateFilter,
    TemplateHandle,
} from './types.js'
import { sqlEscape, sqlIdent, sqlQuote } from './utils.js'


/**
 * Matches a variable marker or a comment. Lazy bodies stop at the first
 * closing delimiter.
 */
const MARKER_PATTERN = /\{\{([\s\S]*?)\}\}|\{#[\s\S]*?#\}/g

const NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/


/**
 * Filters available in every template.
 */
export const BUILTIN_FILTERS: Readonly<Record<string, TemplateFilter>> = {
    quote: sqlQuote,
    escape: sqlEscape,
    ident: sqlIdent,
    upper: (value) => value.toUpperCase(),
    lower: (value) => value.toLowerCase(),
}


/**
 * Renders SQL templates.
 *
 * Holds only its construction options; one instance can render any number
 * of queries and jobs.
 */
export class SqlRenderer {

    readonly #trim: boolean
    readonly #filters: Readonly<Record<string, TemplateFilter>>

    constructor(options: RendererOptions = {}) {

        this.#trim = options.trim ?? true
        this.#filters = { ...BUILTIN_FILTERS, ...options.filters }
    }

    /**
     * Names of the filters this renderer accepts.
     */
    get filterNames(): string[] {

        return Object.keys(this.#filters).sort()
    }

    /**
     * Read a template file and render it.
     *
     * @throws TemplateNotFoundError when the file cannot be read
     * @throws UndeclaredVariableError when a marker names a missing variable
     * @throws TemplateSyntaxError when a marker is malformed
     */
    render(handle: TemplateHandle, variables: ResolvedVariables): string {

        const [source, readErr] = attemptSync(() => readFileSync(handle.filepath, 'utf8'))

        if (readErr) {

            throw new TemplateNotFoundError(handle.queryName, handle.template, handle.filepath)
        }

        const start = performance.now()
        const sql = this.renderString(source, variables, handle)

        observer.emit('template:render', {
            queryName: handle.queryName,
            template: handle.template,
            durationMs: Math.round(performance.now() - start),
        })

        return sql
    }

    /**
     * Render template text.
     *
     * @param source - Template text
     * @param variables - Resolved variables
     * @param from - Query and template names used in error messages
     */
    renderString(source: string, variables: ResolvedVariables, from: RenderSource): string {

        let output = ''
        let cursor = 0

        for (const match of source.matchAll(MARKER_PATTERN)) {

            const index = match.index ?? 0

            output += this.#literal(source, cursor, index, from)
            cursor = index + match[0].length

            const expression = match[1]

            // Comments carry no capture group
            if (expression === undefined) {

                continue
            }

            output += this.#expand(expression, variables, from, lineAt(source, index))
        }

        output += this.#literal(source, cursor, source.length, from)

        return this.#trim ? output.trim() : output
    }

    /**
     * Take literal text between markers, rejecting control blocks and
     * unterminated openers.
     */
    #literal(source: string, from: number, to: number, origin: RenderSource): string {

        const text = source.slice(from, to)
        const block = text.indexOf('{%')

        if (block !== -1) {

            throw new TemplateSyntaxError(
                origin.queryName,
                origin.template,
                lineAt(source, from + block),
                "control blocks '{% %}' are not supported",
            )
        }

        for (const opener of ['{{', '{#']) {

            const at = text.indexOf(opener)

            if (at !== -1) {

                throw new TemplateSyntaxError(
                    origin.queryName,
                    origin.template,
                    lineAt(source, from + at),
                    `unterminated '${opener}'`,
                )
            }
        }

        return text
    }

    /**
     * Expand one `{{ ... }}` expression.
     */
    #expand(
        expression: string,
        variables: ResolvedVariables,
        from: RenderSource,
        line: number,
    ): string {

        const [head = '', ...filters] = expression.split('|').map((part) => part.trim())

        if (head === '') {

            throw new TemplateSyntaxError(from.queryName, from.template, line, 'empty variable marker')
        }

        if (!NAME_PATTERN.test(head)) {

            throw new TemplateSyntaxError(
                from.queryName,
                from.template,
                line,
                `'${head}' is not a variable name`,
            )
        }

        if (!Object.prototype.hasOwnProperty.call(variables, head)) {

            throw new UndeclaredVariableError(head, from.queryName, from.template, line)
        }

        let value = String(variables[head])

        for (const name of filters) {

            const filter = this.#filters[name]

            if (!filter) {

                throw new TemplateSyntaxError(
                    from.queryName,
                    from.template,
                    line,
                    name === '' ? 'empty filter' : `unknown filter '${name}'`,
                )
            }

            value = filter(value)
        }

        return value
    }
}


/**
 * 1-based line number of a source offset.
 */
function lineAt(source: string, offset: number): number {

    let line = 1

    for (let i = 0; i < offset; i++) {

        if (source.charCodeAt(i) === 10) {

            line++
        }
    }

    return line
}
