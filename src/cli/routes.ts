/**
 * Route parsing for the command line.
 */
import type { RouteParams } from './types.js'


/**
 * Parse route and params from CLI input.
 *
 * The first word is the command. For `help` the next word is the topic;
 * for other commands it is the job spec path.
 *
 * @example
 * ```typescript
 * parseRouteFromInput(['render', 'jobs/sales.yml'])
 * // { route: 'render', params: { spec: 'jobs/sales.yml' } }
 *
 * parseRouteFromInput(['help', 'deploy'])
 * // { route: 'help', params: { topic: 'deploy' } }
 *
 * parseRouteFromInput([])
 * // { route: 'help', params: {} }
 * ```
 */
export function parseRouteFromInput(input: string[]): { route: string; params: RouteParams } {

    const [command, argument] = input

    if (!command) {

        return { route: 'help', params: {} }
    }

    if (command === 'help') {

        return { route: 'help', params: argument ? { topic: argument } : {} }
    }

    return { route: command, params: argument ? { spec: argument } : {} }
}
