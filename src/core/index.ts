/**
 * Core module exports.
 *
 * Everything the CLI uses is exported from here, so the pipeline can be
 * embedded in other tools.
 *
 * @example
 * ```typescript
 * import { resolveJob, dryRunJob, BigQueryExecutionService } from 'sqljob'
 *
 * const job = resolveJob('jobs/sales_sync.yml', './templates')
 * await dryRunJob(job, new BigQueryExecutionService(), { location: 'US' })
 * ```
 */

// Observer
export { observer } from './observer.js'
export type { SqljobEvents, SqljobEventNames } from './observer.js'

// Pipeline
export * from './jobspec/index.js'
export * from './template/index.js'
export * from './pipeline/index.js'

// Warehouse
export * from './warehouse/index.js'

// Settings
export * from './config/index.js'

// Logger
export * from './logger/index.js'
