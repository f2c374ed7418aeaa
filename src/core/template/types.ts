/**
 * Template types.
 *
 * Defines the handle passed from the template resolver to the renderer,
 * the resolved variable set and renderer options.
 */
import type { Variables } from '../jobspec/types.js'


/**
 * Final flattened variable mapping used to render one query.
 */
export type ResolvedVariables = Readonly<Variables>


/**
 * Located template file for one query.
 *
 * Produced by `resolveTemplate`; no content has been read yet.
 */
export interface TemplateHandle {

    /** Query the template belongs to */
    queryName: string

    /** Template path as written in the job spec (relative to the templates root) */
    template: string

    /** Absolute path of the template file */
    filepath: string
}


/**
 * Where a template being rendered comes from. Used in error messages.
 */
export interface RenderSource {

    queryName: string
    template: string
}


/**
 * Filter applied to a substituted value: `{{ name | quote }}`.
 */
export type TemplateFilter = (value: string) => string


/**
 * Options for constructing a renderer.
 */
export interface RendererOptions {

    /** Strip leading and trailing whitespace from the output (default true) */
    trim?: boolean

    /** Extra filters, merged over the built-in ones */
    filters?: Record<string, TemplateFilter>
}


/**
 * Variables every query gets without declaring them.
 *
 * `environment` and `destination_project` are only present when the job spec
 * sets them.
 */
export const BUILTIN_VARIABLES: ReadonlySet<string> = new Set([
    'job_name',
    'query_name',
    'environment',
    'destination_project',
    'destination_dataset',
    'destination_table',
])
