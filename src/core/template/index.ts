/**
 * Template module.
 *
 * Locates query templates, resolves their variables and renders SQL:
 * - `resolveTemplate` maps a query to a file under the templates root
 * - `resolveVariables` merges built-ins, job defaults and query variables
 * - `SqlRenderer` expands `{{ name | filter }}` markers with strict undefined
 *
 * @example
 * ```typescript
 * import { SqlRenderer, resolveTemplate, resolveVariables } from './core/template'
 *
 * const renderer = new SqlRenderer()
 * const handle = resolveTemplate(query, '/project/templates')
 * const sql = renderer.render(handle, resolveVariables(job, query))
 * ```
 *
 * @module
 */

export { SqlRenderer, BUILTIN_FILTERS } from './renderer.js';

export { resolveTemplate } from './resolver.js';

export { resolveVariables, builtinVariables, resolveDestination } from './variables.js';

export { sqlEscape, sqlQuote, sqlIdent } from './utils.js';

export { TemplateNotFoundError, TemplateSyntaxError, UndeclaredVariableError } from './errors.js';

export type {
    ResolvedVariables,
    TemplateHandle,
    RenderSource,
    TemplateFilter,
    RendererOptions,
} from './types.js';

export { BUILTIN_VARIABLES } from './types.js';
