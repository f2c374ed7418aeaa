/**
 * BigQuery adapters for the warehouse services.
 *
 * Dry-runs go through `@google-cloud/bigquery`; scheduled queries are
 * BigQuery Data Transfer configurations with the `scheduled_query` data
 * source. Both adapters accept a client so callers can point them at a
 * preconfigured one.
 */
import { BigQuery, type Query } from '@google-cloud/bigquery'
import { DataTransferServiceClient, type protos } from '@google-cloud/bigquery-data-transfer'
import { attempt } from '@logosdx/utils'

import type {
    DeployRequest,
    DeployResult,
    DryRunRequest,
    DryRunResult,
    QueryExecutionService,
    ScheduledQueryService,
} from './types.js'


type TransferConfig = protos.google.cloud.bigquery.datatransfer.v1.ITransferConfig


/**
 * Data source id of scheduled queries.
 */
export const SCHEDULED_QUERY_SOURCE = 'scheduled_query'


/**
 * The part of the BigQuery client used for dry-runs.
 */
export interface DryRunClient {

    createQueryJob(options: Query): Promise<[{ metadata?: unknown }, ...unknown[]]>
}


/**
 * The part of the Data Transfer client used for deploys.
 */
export interface TransferClient {

    listTransferConfigs(
        request: protos.google.cloud.bigquery.datatransfer.v1.IListTransferConfigsRequest,
    ): Promise<[TransferConfig[], ...unknown[]]>

    createTransferConfig(
        request: protos.google.cloud.bigquery.datatransfer.v1.ICreateTransferConfigRequest,
    ): Promise<[TransferConfig, ...unknown[]]>

    updateTransferConfig(
        request: protos.google.cloud.bigquery.datatransfer.v1.IUpdateTransferConfigRequest,
    ): Promise<[TransferConfig, ...unknown[]]>
}


/**
 * Read `statistics.totalBytesProcessed` from job metadata.
 *
 * The API reports it as a decimal string. Returns null when the estimate
 * is missing or not a number.
 */
export function readBytesProcessed(metadata: unknown): number | null {

    if (typeof metadata !== 'object' || metadata === null || !('statistics' in metadata)) {

        return null
    }

    const { statistics } = metadata

    if (typeof statistics !== 'object' || statistics === null || !('totalBytesProcessed' in statistics)) {

        return null
    }

    const { totalBytesProcessed } = statistics

    if (typeof totalBytesProcessed !== 'string' && typeof totalBytesProcessed !== 'number') {

        return null
    }

    const bytes = Number(totalBytesProcessed)

    return Number.isFinite(bytes) ? bytes : null
}


/**
 * Check whether an API error means the query itself is invalid.
 */
function isInvalidQuery(error: Error): boolean {

    return 'code' in error && error.code === 400
}


/**
 * Dry-runs queries with the BigQuery jobs API.
 *
 * @example
 * ```typescript
 * const execution = new BigQueryExecutionService()
 * const result = await execution.dryRun({ sql, project: 'acme-data', location: 'US', labels: {} })
 * ```
 */
export class BigQueryExecutionService implements QueryExecutionService {

    readonly #client: DryRunClient

    constructor(client?: DryRunClient) {

        this.#client = client ?? new BigQuery()
    }

    async dryRun(request: DryRunRequest): Promise<DryRunResult> {

        const options: Query = {
            query: request.sql,
            dryRun: true,
            useQueryCache: false,
            useLegacySql: false,
            location: request.location,
            labels: request.labels,
        }

        if (request.project) {

            options.projectId = request.project
        }

        if (request.maxBytesBilled !== undefined) {

            options.maximumBytesBilled = String(request.maxBytesBilled)
        }

        const [response, err] = await attempt(() => this.#client.createQueryJob(options))

        if (err) {

            if (isInvalidQuery(err)) {

                return { isValid: false, estimatedBytesProcessed: 0, error: err.message }
            }

            throw err
        }

        const [job] = response
        const bytes = readBytesProcessed(job.metadata)

        // Without an estimate the bytes limit cannot be enforced
        if (bytes === null) {

            return { isValid: false, estimatedBytesProcessed: 0, error: 'dry-run response has no bytes estimate' }
        }

        return {
            isValid: true,
            estimatedBytesProcessed: bytes,
        }
    }
}


/**
 * Creates or updates scheduled queries with the Data Transfer API.
 *
 * A configuration is matched by display name, destination dataset and
 * data source; a match is updated in place, otherwise one is created.
 */
export class BigQueryScheduledQueryService implements ScheduledQueryService {

    readonly #client: TransferClient

    constructor(client?: TransferClient) {

        this.#client = client ?? new DataTransferServiceClient()
    }

    async deploy(request: DeployRequest): Promise<DeployResult> {

        const parent = `projects/${request.project}/locations/${request.location.toLowerCase()}`

        const [configs] = await this.#client.listTransferConfigs({
            parent,
            dataSourceIds: [SCHEDULED_QUERY_SOURCE],
        })

        const existing = configs.find((config) =>
            config.displayName === request.displayName
            && config.destinationDatasetId === request.destination.datasetId
            && config.dataSourceId === SCHEDULED_QUERY_SOURCE,
        )

        const transferConfig: TransferConfig = {
            displayName: request.displayName,
            dataSourceId: SCHEDULED_QUERY_SOURCE,
            destinationDatasetId: request.destination.datasetId,
            schedule: request.schedule,
            params: {
                fields: {
                    query: { stringValue: request.sql },
                    destination_table_name_template: { stringValue: request.destination.tableId },
                    write_disposition: { stringValue: request.writeDisposition },
                },
            },
        }

        if (existing?.name) {

            const [updated] = await this.#client.updateTransferConfig({
                transferConfig: { ...transferConfig, name: existing.name },
                updateMask: { paths: ['params', 'schedule', 'display_name'] },
            })

            return { transferConfigId: updated.name ?? existing.name, created: false }
        }

        const [created] = await this.#client.createTransferConfig({ parent, transferConfig })

        return { transferConfigId: created.name ?? '', created: true }
    }
}
