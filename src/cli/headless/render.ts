import { writeFileSync } from 'node:fs';
import { resolve } from 'node:path';

import { attemptSync } from '@logosdx/utils';

import type { ResolvedJob } from '../../core/pipeline/index.js';
import { loadJob, writeJson, type HeadlessCommand } from './_helpers.js';

export const help = `
# RENDER

Render a job's queries to SQL

## Usage

    sqljob render --spec <file> [--output <file>]

## Description

Validates the job spec, then renders every query with its resolved
variables. A single-query job prints just its SQL. With several queries,
each is preceded by a \`-- query: <name>\` line.

With \`--output\`, the SQL is written to that file instead of stdout.

## Examples

    sqljob render --spec jobs/sales_sync.yml
    sqljob render --spec jobs/sales_sync.yml --output build/sales_sync.sql

## JSON Output

\`\`\`json
{
    "jobName": "sales_sync",
    "queries": [
        {
            "name": "daily_totals",
            "destination": { "dataset": "analytics", "table": "sales_daily" },
            "writeDisposition": "WRITE_TRUNCATE",
            "sql": "SELECT ..."
        }
    ]
}
\`\`\`
`;

/**
 * Render a resolved job as SQL text.
 *
 * @example
 * ```typescript
 * renderText(job)
 * // '-- query: daily_totals\nSELECT ...\n\n-- query: weekly\nSELECT ...\n'
 * ```
 */
export function renderText(job: ResolvedJob): string {

    const [only] = job.queries;

    if (job.queries.length === 1 && only) {

        return `${only.sql}\n`;

    }

    return job.queries
        .map((query) => `-- query: ${query.name}\n${query.sql}\n`)
        .join('\n');

}

export const run: HeadlessCommand = async (ctx) => {

    const job = loadJob(ctx);

    if (!job) return 1;

    if (ctx.flags.output) {

        const target = resolve(ctx.cwd, ctx.flags.output);
        const [, err] = attemptSync(() => writeFileSync(target, renderText(job)));

        if (err) {

            ctx.logger.error(`Cannot write ${target}: ${err.message}`);

            return 1;

        }

        ctx.logger.info(`Wrote ${job.queries.length} queries to ${target}`);

        return 0;

    }

    if (ctx.flags.json) {

        writeJson(ctx, {
            jobName: job.jobName,
            queries: job.queries.map((query) => ({
                name: query.name,
                destination: query.destination,
                writeDisposition: query.writeDisposition,
                sql: query.sql,
            })),
        });

    }
    else {

        ctx.stdout.write(renderText(job));

    }

    return 0;

};
