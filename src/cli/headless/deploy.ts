import { attempt } from '@logosdx/utils';

import { deployJob } from '../../core/warehouse/index.js';
import { loadJob, reportError, warehouseOptionsOf, writeJson, type HeadlessCommand } from './_helpers.js';

export const help = `
# DEPLOY

Deploy a job as scheduled queries

## Usage

    sqljob deploy --spec <file> --project <id> [--location <loc>]

## Description

Renders and dry-runs every query, then creates or updates one scheduled
query per query. Nothing is deployed unless every dry-run passes.

The job must have a \`schedule\`. A single-query job deploys under the job
name; otherwise each query deploys as \`<job_name>.<query_name>\`.

## Examples

    sqljob deploy --spec jobs/sales_sync.yml --project acme-data
    sqljob deploy --spec jobs/sales_sync.yml --project acme-data --location EU

## JSON Output

\`\`\`json
{
    "jobName": "sales_sync",
    "deployments": [
        {
            "name": "daily_totals",
            "displayName": "sales_sync",
            "transferConfigId": "projects/123/locations/us/transferConfigs/abc",
            "created": true
        }
    ]
}
\`\`\`
`;

export const run: HeadlessCommand = async (ctx) => {

    const job = loadJob(ctx);

    if (!job) return 1;

    const [deployments, err] = await attempt(() =>
        deployJob(job, ctx.services(), warehouseOptionsOf(ctx)),
    );

    if (err) {

        reportError(ctx.logger, err);

        return 1;

    }

    if (ctx.flags.json) {

        writeJson(ctx, {
            jobName: job.jobName,
            deployments: deployments.map((item) => ({
                name: item.queryName,
                displayName: item.displayName,
                transferConfigId: item.transferConfigId,
                created: item.created,
            })),
        });

    }
    else {

        for (const item of deployments) {

            const action = item.created ? 'created' : 'updated';

            ctx.stdout.write(`${action} ${item.displayName}: ${item.transferConfigId}\n`);

        }

    }

    return 0;

};
