/**
 * Template errors.
 *
 * These fail fast: the first offending reference is reported. Past a
 * successful validation they point at a spec the validator should have
 * rejected, or at files changing underneath a run.
 */


/**
 * Error when a query's template file is missing at render time.
 *
 * @example
 * ```typescript
 * const [handle, err] = attemptSync(() => resolveTemplate(query, templatesRoot))
 * if (err instanceof TemplateNotFoundError) {
 *     console.error(`${err.queryName}: ${err.filepath} disappeared`)
 * }
 * ```
 */
export class TemplateNotFoundError extends Error {

    override readonly name = 'TemplateNotFoundError' as const

    constructor(
        public readonly queryName: string,
        public readonly template: string,
        public readonly filepath: string | null,
    ) {

        super(
            filepath
                ? `Template '${template}' for query '${queryName}' not found at ${filepath}`
                : `Template '${template}' for query '${queryName}' is outside the templates root`
        )
    }
}


/**
 * Error when a template references a variable the resolved set lacks.
 *
 * @example
 * ```typescript
 * const [sql, err] = attemptSync(() => renderer.render(handle, variables))
 * if (err instanceof UndeclaredVariableError) {
 *     console.error(`Add '${err.variable}' to defaults or ${err.queryName}.variables`)
 * }
 * ```
 */
export class UndeclaredVariableError extends Error {

    override readonly name = 'UndeclaredVariableError' as const

    constructor(
        public readonly variable: string,
        public readonly queryName: string,
        public readonly template: string,
        public readonly line: number,
    ) {

        super(
            `Query '${queryName}' template '${template}' line ${line} references undeclared variable '${variable}'`
        )
    }
}


/**
 * Error when a template marker is malformed.
 */
export class TemplateSyntaxError extends Error {

    override readonly name = 'TemplateSyntaxError' as const

    constructor(
        public readonly queryName: string,
        public readonly template: string,
        public readonly line: number,
        public readonly reason: string,
    ) {

        super(`Query '${queryName}' template '${template}' line ${line}: ${reason}`)
    }
}
