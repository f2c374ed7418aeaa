/**
 * Warehouse module.
 *
 * Dry-runs and deploys resolved jobs through injectable services, with
 * BigQuery adapters for real runs.
 *
 * @module
 */

export { dryRunJob, deployJob, bytesLimit, displayNameFor } from './operations.js'

export { parseTableId, formatTableId } from './table-id.js'

export {
    BigQueryExecutionService,
    BigQueryScheduledQueryService,
    readBytesProcessed,
    SCHEDULED_QUERY_SOURCE,
} from './bigquery.js'

export type { DryRunClient, TransferClient } from './bigquery.js'

export {
    DryRunError,
    BytesLimitError,
    ScheduleRequiredError,
    ProjectRequiredError,
    TableIdError,
} from './errors.js'

export type {
    TableId,
    DryRunRequest,
    DryRunResult,
    QueryExecutionService,
    DeployRequest,
    DeployResult,
    ScheduledQueryService,
    WarehouseServices,
    WarehouseOptions,
    QueryDryRun,
    QueryDeployment,
} from './types.js'
