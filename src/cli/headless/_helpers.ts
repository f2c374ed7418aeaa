import { resolve } from 'node:path';
import type { Writable } from 'node:stream';

import { attemptSync } from '@logosdx/utils';

import type { Logger } from '../../core/logger/index.js';
import type { Settings } from '../../core/config/index.js';
import { ValidationError } from '../../core/jobspec/index.js';
import { resolveJob, type ResolvedJob } from '../../core/pipeline/index.js';
import type { WarehouseOptions, WarehouseServices } from '../../core/warehouse/index.js';
import type { CliFlags, RouteParams } from '../types.js';

/**
 * Everything a command needs to run.
 */
export interface CommandContext {
    params: RouteParams;
    flags: CliFlags;
    settings: Settings;
    logger: Logger;

    /** Where command results go */
    stdout: Writable;

    /** Directory relative paths are resolved against */
    cwd: string;

    /** Builds the warehouse services on first use */
    services: () => WarehouseServices;
}

export interface HeadlessCommand {
    (ctx: CommandContext): Promise<number>;
}

export type RouteHandler = {
    run: HeadlessCommand;
    help: string;
    factory?: (handlers: Partial<Record<string, RouteHandler>>) => RouteHandler;
};

/**
 * Job spec path from `--spec` or the first positional argument.
 */
export function specPathOf(ctx: CommandContext): string | null {

    const spec = ctx.flags.spec ?? ctx.params.spec;

    return spec ? resolve(ctx.cwd, spec) : null;

}

/**
 * Templates root from settings, resolved against the working directory.
 */
export function templatesRootOf(ctx: CommandContext): string {

    return resolve(ctx.cwd, ctx.settings.templatesRoot);

}

/**
 * Warehouse options from settings.
 */
export function warehouseOptionsOf(ctx: CommandContext): WarehouseOptions {

    return {
        project: ctx.settings.project,
        location: ctx.settings.location,
        maxBytesBilled: ctx.settings.maxBytesBilled,
    };

}

/**
 * Write a JSON document to the command output.
 */
export function writeJson(ctx: CommandContext, value: unknown): void {

    ctx.stdout.write(JSON.stringify(value, null, 2) + '\n');

}

/**
 * Log an error, listing every issue of a ValidationError.
 */
export function reportError(logger: Logger, error: Error): void {

    if (error instanceof ValidationError) {

        for (const issue of error.errors) {

            logger.error(`${issue.path}: ${issue.message}`);

        }

        return;

    }

    logger.error(error.message);

}

/**
 * Resolve the job named on the command line.
 *
 * Errors are logged; null means the command should exit with 1.
 */
export function loadJob(ctx: CommandContext): ResolvedJob | null {

    const specPath = specPathOf(ctx);

    if (!specPath) {

        ctx.logger.error('Missing job spec: pass --spec <file>');

        return null;

    }

    const [job, err] = attemptSync(() => resolveJob(specPath, templatesRootOf(ctx)));

    if (err) {

        reportError(ctx.logger, err);

        return null;

    }

    return job;

}
