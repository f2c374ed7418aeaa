/**
 * Warehouse collaborator types.
 *
 * The pipeline hands rendered SQL to two external services: one that
 * dry-runs a query and one that creates or updates a scheduled query.
 * Both are consumed through these interfaces so the command layer can be
 * exercised without a warehouse.
 */
import type { WriteDisposition } from '../jobspec/types.js'


/**
 * Fully qualified destination table.
 */
export interface TableId {

    projectId: string
    datasetId: string
    tableId: string
}


/**
 * Dry-run request for one query.
 */
export interface DryRunRequest {

    sql: string

    /** Project to bill; the client's default project when undefined */
    project: string | undefined

    location: string
    maxBytesBilled?: number
    labels: Record<string, string>
}


/**
 * Outcome of a dry-run.
 */
export interface DryRunResult {

    isValid: boolean
    estimatedBytesProcessed: number

    /** Reason the warehouse rejected the query, when invalid */
    error?: string
}


/**
 * Runs queries in dry-run mode.
 */
export interface QueryExecutionService {

    dryRun(request: DryRunRequest): Promise<DryRunResult>
}


/**
 * Create-or-update request for one scheduled query.
 */
export interface DeployRequest {

    project: string
    location: string
    displayName: string
    schedule: string
    destination: TableId
    writeDisposition: WriteDisposition
    sql: string
}


/**
 * Outcome of a deploy.
 */
export interface DeployResult {

    /** Resource name of the transfer configuration */
    transferConfigId: string

    /** True when a new configuration was created, false when updated */
    created: boolean
}


/**
 * Creates or updates scheduled queries.
 */
export interface ScheduledQueryService {

    deploy(request: DeployRequest): Promise<DeployResult>
}


/**
 * Services used by the deploy flow.
 */
export interface WarehouseServices {

    execution: QueryExecutionService
    scheduler: ScheduledQueryService
}


/**
 * Options shared by dry-run and deploy.
 */
export interface WarehouseOptions {

    /** Project to run in; required for deploy */
    project?: string

    location: string

    /** Fallback bytes limit when the job sets none */
    maxBytesBilled?: number
}


/**
 * Dry-run outcome for one query.
 */
export interface QueryDryRun {

    queryName: string
    estimatedBytes: number
}


/**
 * Deploy outcome for one query.
 */
export interface QueryDeployment {

    queryName: string
    displayName: string
    transferConfigId: string
    created: boolean
}
