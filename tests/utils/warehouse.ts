/**
 * In-process warehouse services for tests.
 */
import type {
    DeployRequest,
    DeployResult,
    DryRunRequest,
    DryRunResult,
    QueryExecutionService,
    ScheduledQueryService,
    WarehouseServices,
} from '../../src/core/warehouse/index.js';

/**
 * Execution service that answers from a table of results keyed by SQL.
 */
export class FakeExecution implements QueryExecutionService {

    readonly requests: DryRunRequest[] = [];

    constructor(
        private readonly results: Record<string, DryRunResult | Error> = {},
        private readonly fallback: DryRunResult = { isValid: true, estimatedBytesProcessed: 1024 },
    ) {}

    async dryRun(request: DryRunRequest): Promise<DryRunResult> {

        this.requests.push(request);

        const result = this.results[request.sql] ?? this.fallback;

        if (result instanceof Error) {

            throw result;

        }

        return result;

    }

}

/**
 * Scheduler that keeps deployed configs in memory, keyed by display name.
 */
export class FakeScheduler implements ScheduledQueryService {

    readonly requests: DeployRequest[] = [];
    readonly configs = new Map<string, string>();

    failWith: Error | null = null;

    async deploy(request: DeployRequest): Promise<DeployResult> {

        this.requests.push(request);

        if (this.failWith) {

            throw this.failWith;

        }

        const existing = this.configs.get(request.displayName);

        if (existing) {

            return { transferConfigId: existing, created: false };

        }

        const id = `projects/${request.project}/transferConfigs/${this.configs.size + 1}`;

        this.configs.set(request.displayName, id);

        return { transferConfigId: id, created: true };

    }

}

export function createFakeServices(execution = new FakeExecution()): WarehouseServices & {
    execution: FakeExecution;
    scheduler: FakeScheduler;
} {

    return { execution, scheduler: new FakeScheduler() };

}
