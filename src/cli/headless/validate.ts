import { attemptSync } from '@logosdx/utils';

import { hasErrors } from '../../core/jobspec/index.js';
import { checkJob } from '../../core/pipeline/index.js';
import {
    reportError,
    specPathOf,
    templatesRootOf,
    writeJson,
    type HeadlessCommand,
} from './_helpers.js';

export const help = `
# VALIDATE

Check a job spec without rendering it

## Usage

    sqljob validate --spec <file>

## Description

Loads the job spec and runs every check: required fields, unique query
names, template files under the templates root, variable shapes and the
schedule. Prints every issue found, one per line, as
\`<severity> <path>: <message>\`.

Exits with 1 when any issue has error severity. Warnings alone exit 0.

## Examples

    sqljob validate --spec jobs/sales_sync.yml
    sqljob validate --spec jobs/sales_sync.yml --templates-root ./sql

## JSON Output

\`\`\`json
{
    "valid": false,
    "issues": [
        { "severity": "error", "path": "queries[0].template", "message": "..." }
    ]
}
\`\`\`
`;

export const run: HeadlessCommand = async (ctx) => {

    const specPath = specPathOf(ctx);

    if (!specPath) {

        ctx.logger.error('Missing job spec: pass --spec <file>');

        return 1;

    }

    const [result, err] = attemptSync(() => checkJob(specPath, templatesRootOf(ctx)));

    if (err) {

        reportError(ctx.logger, err);

        return 1;

    }

    const { issues } = result;
    const valid = !hasErrors(issues);

    if (ctx.flags.json) {

        writeJson(ctx, { valid, issues });

    }
    else if (issues.length === 0) {

        ctx.stdout.write(`${specPath}: valid\n`);

    }
    else {

        for (const issue of issues) {

            ctx.stdout.write(`${issue.severity} ${issue.path}: ${issue.message}\n`);

        }

    }

    return valid ? 0 : 1;

};
