/**
 * Pipeline module.
 *
 * Single entry point for turning a job spec file into rendered SQL.
 *
 * @module
 */

export { checkJob, resolveJob, renderJobSpec, renderQuery } from './orchestrator.js'

export type { RenderedQuery, ResolvedJob, CheckResult, ResolveOptions } from './types.js'
