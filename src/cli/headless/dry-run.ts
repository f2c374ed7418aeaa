import { attempt } from '@logosdx/utils';

import { dryRunJob } from '../../core/warehouse/index.js';
import { loadJob, reportError, warehouseOptionsOf, writeJson, type HeadlessCommand } from './_helpers.js';

export const help = `
# DRY-RUN

Dry-run a job's queries against the warehouse

## Usage

    sqljob dry-run --spec <file> [--project <id>] [--location <loc>]

## Description

Renders every query and asks the warehouse to validate it without running
it. Prints the estimated bytes each query would process.

Fails when the warehouse rejects a query, or when an estimate exceeds the
bytes limit: the job's \`limits.max_bytes_billed\`, else the
\`max_bytes_billed\` setting.

## Examples

    sqljob dry-run --spec jobs/sales_sync.yml --project acme-data
    SQLJOB_MAX_BYTES_BILLED=10000000000 sqljob dry-run --spec jobs/sales_sync.yml

## JSON Output

\`\`\`json
{
    "jobName": "sales_sync",
    "queries": [
        { "name": "daily_totals", "estimatedBytes": 1048576 }
    ]
}
\`\`\`
`;

export const run: HeadlessCommand = async (ctx) => {

    const job = loadJob(ctx);

    if (!job) return 1;

    const [runs, err] = await attempt(() =>
        dryRunJob(job, ctx.services().execution, warehouseOptionsOf(ctx)),
    );

    if (err) {

        reportError(ctx.logger, err);

        return 1;

    }

    if (ctx.flags.json) {

        writeJson(ctx, {
            jobName: job.jobName,
            queries: runs.map((item) => ({ name: item.queryName, estimatedBytes: item.estimatedBytes })),
        });

    }
    else {

        for (const item of runs) {

            ctx.stdout.write(`${item.queryName}: ${item.estimatedBytes} bytes\n`);

        }

    }

    return 0;

};
