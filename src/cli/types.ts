/**
 * CLI type definitions.
 */


/**
 * Positional arguments.
 *
 * - `spec`: Job spec path given without `--spec`
 * - `topic`: Command name for `help <command>`
 */
export interface RouteParams {

    spec?: string
    topic?: string
}


/**
 * Parsed command line flags.
 */
export interface CliFlags {

    /** Job spec file */
    spec?: string

    /** Templates directory (overrides settings) */
    templatesRoot?: string

    /** Warehouse project (overrides settings) */
    project?: string

    /** Warehouse location (overrides settings) */
    location?: string

    /** Write rendered SQL to this file instead of stdout */
    output?: string

    /** Settings file (default: ./sqljob.yml when present) */
    settings?: string

    /** Print results as JSON */
    json: boolean

    /** Log verbosity, checked against the known levels */
    logLevel?: string
}


/**
 * Result of parsing the command line.
 */
export interface ParsedCli {

    route: string
    params: RouteParams
    flags: CliFlags
}
