/**
 * Template resolver.
 *
 * Maps a query's template path to a file under the templates root without
 * reading it, so existence can be checked cheaply before rendering.
 *
 * @example
 * ```typescript
 * const handle = resolveTemplate(query, '/project/templates')
 * // { queryName: 'daily_totals', template: 'sales/daily.sql', filepath: '/project/templates/sales/daily.sql' }
 * ```
 */
import type { QuerySpec } from '../jobspec/types.js'
import { isRegularFile, resolveUnderRoot } from '../shared/index.js'
import { TemplateNotFoundError } from './errors.js'
import type { TemplateHandle } from './types.js'


/**
 * Resolve a query's template to an absolute file path.
 *
 * Runs after validation, so a failure here means the file went away
 * between validating and rendering.
 *
 * @throws TemplateNotFoundError when the file is missing or outside the root
 */
export function resolveTemplate(
    query: Pick<QuerySpec, 'name' | 'template'>,
    templatesRoot: string,
): TemplateHandle {

    const filepath = resolveUnderRoot(templatesRoot, query.template)

    if (!filepath || !isRegularFile(filepath)) {

        throw new TemplateNotFoundError(query.name, query.template, filepath)
    }

    return {
        queryName: query.name,
        template: query.template,
        filepath,
    }
}
