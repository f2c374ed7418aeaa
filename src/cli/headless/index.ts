/**
 * Headless command runner.
 *
 * Resolves settings, starts the logger and dispatches to a command
 * handler. Command results go to stdout; log lines go to stderr, as JSON
 * entries when `--json` is set.
 *
 * @example
 * ```bash
 * sqljob validate --spec jobs/sales_sync.yml
 * sqljob --json render --spec jobs/sales_sync.yml | jq '.queries[0].sql'
 * SQLJOB_PROJECT=acme-data sqljob deploy --spec jobs/sales_sync.yml
 * ```
 */
import type { Writable } from 'node:stream';

import { attempt, attemptSync } from '@logosdx/utils';

import {
    LogLevelSchema,
    resolveSettings,
    SettingsValidationError,
    shouldOutputJson,
    type SettingsInput,
} from '../../core/config/index.js';
import { Logger, type LogLevel } from '../../core/logger/index.js';
import {
    BigQueryExecutionService,
    BigQueryScheduledQueryService,
    type WarehouseServices,
} from '../../core/warehouse/index.js';
import type { CliFlags, RouteParams } from '../types.js';

import { type CommandContext, type RouteHandler } from './_helpers.js';

import * as CmdDeploy from './deploy.js';
import * as CmdDryRun from './dry-run.js';
import * as CmdHelp from './help.js';
import * as CmdRender from './render.js';
import * as CmdValidate from './validate.js';

/**
 * Registry of command handlers.
 */
export const HANDLERS: Partial<Record<string, RouteHandler>> = {

    'validate': CmdValidate,
    'render': CmdRender,
    'dry-run': CmdDryRun,
    'deploy': CmdDeploy,
};

HANDLERS['help'] = CmdHelp.factory(HANDLERS);

/**
 * Options for running a command.
 */
export interface RunOptions {
    /** Command output (default: process.stdout) */
    stdout?: Writable;

    /** Log output (default: process.stderr) */
    stderr?: Writable;

    /** Environment to read `SQLJOB_*` from (default: process.env) */
    env?: Record<string, string | undefined>;

    /** Working directory (default: process.cwd()) */
    cwd?: string;

    /** Warehouse services (default: BigQuery adapters) */
    services?: () => WarehouseServices;

    /** Color log levels (default: when not in CI) */
    color?: boolean;
}

/**
 * Build the BigQuery adapters.
 */
function bigQueryServices(): WarehouseServices {

    return {
        execution: new BigQueryExecutionService(),
        scheduler: new BigQueryScheduledQueryService(),
    };

}

/**
 * Settings overrides carried by flags.
 *
 * @throws SettingsValidationError when `--log-level` is not a known level
 */
function flagSettings(flags: CliFlags): SettingsInput {

    let logLevel: LogLevel | undefined;

    if (flags.logLevel !== undefined) {

        const result = LogLevelSchema.safeParse(flags.logLevel);

        if (!result.success) {

            throw new SettingsValidationError(
                `Invalid --log-level '${flags.logLevel}': must be one of ${LogLevelSchema.options.join(', ')}`,
                'logLevel',
                result.error.issues,
            );

        }

        logLevel = result.data;

    }

    return {
        templatesRoot: flags.templatesRoot,
        project: flags.project,
        location: flags.location,
        logLevel,
    };

}

/**
 * Run a command.
 *
 * @returns Exit code (0 for success, 1 for errors)
 */
export async function runHeadless(
    route: string,
    params: RouteParams,
    flags: CliFlags,
    options: RunOptions = {},
): Promise<number> {

    const stdout = options.stdout ?? process.stdout;
    const stderr = options.stderr ?? process.stderr;
    const cwd = options.cwd ?? process.cwd();
    const json = flags.json || shouldOutputJson(options.env);

    const [settings, settingsErr] = attemptSync(() => resolveSettings({
        cwd,
        path: flags.settings,
        env: options.env,
        flags: flagSettings(flags),
    }));

    if (settingsErr) {

        stderr.write(`${settingsErr.message}\n`);

        return 1;

    }

    const logger = new Logger({
        level: settings.logLevel,
        format: json ? 'json' : 'line',
        console: stderr,
        color: json ? false : options.color,
    });

    logger.start();

    const handler = HANDLERS[route];

    if (!handler) {

        logger.error(`Unknown command: ${route}. Run 'sqljob help' for the list of commands.`);
        logger.stop();

        return 1;

    }

    let services: WarehouseServices | null = null;

    const ctx: CommandContext = {
        params,
        flags: { ...flags, json },
        settings,
        logger,
        stdout,
        cwd,
        services: () => {

            services ??= (options.services ?? bigQueryServices)();

            return services;

        },
    };

    const [exitCode, err] = await attempt(() => handler.run(ctx));

    if (err) {

        logger.error(err.message);
        logger.stop();

        return 1;

    }

    logger.stop();

    return exitCode;

}
