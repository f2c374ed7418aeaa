#!/usr/bin/env node
/**
 * CLI entry point for sqljob.
 *
 * Parses command line arguments with meow and runs the command.
 *
 * @example
 * ```bash
 * sqljob validate --spec jobs/sales_sync.yml
 * sqljob render --spec jobs/sales_sync.yml --output build/sales_sync.sql
 * sqljob --json dry-run --spec jobs/sales_sync.yml --project acme-data
 * sqljob deploy --spec jobs/sales_sync.yml --project acme-data --location EU
 * ```
 */
import meow from 'meow'

import type { CliFlags, ParsedCli } from './types.js'
import { runHeadless } from './headless/index.js'
import { parseRouteFromInput } from './routes.js'


/**
 * Help text for the CLI.
 */
const HELP_TEXT = `
  Usage
    $ sqljob <command> --spec <file> [options]

  Commands
    validate            Check a job spec and list every issue
    render              Print the rendered SQL of every query
    dry-run             Dry-run every query and print estimated bytes
    deploy              Create or update the job's scheduled queries
    help [command]      Show help for a command

  Options
    --spec, -s <file>           Job spec file
    --templates-root, -t <dir>  Templates directory (default ./templates)
    --project, -p <id>          Warehouse project
    --location, -l <loc>        Warehouse location (default US)
    --output, -o <file>         Write rendered SQL to a file (render)
    --settings <file>           Settings file (default ./sqljob.yml)
    --json                      Output JSON
    --log-level <level>         silent, error, warn, info or verbose
    --help, -h                  Show this help
    --version                   Show version

  Environment
    SQLJOB_PROJECT, SQLJOB_LOCATION, SQLJOB_TEMPLATES_ROOT,
    SQLJOB_MAX_BYTES_BILLED, SQLJOB_LOG_LEVEL, SQLJOB_SETTINGS, SQLJOB_JSON

  Examples
    $ sqljob validate --spec jobs/sales_sync.yml
    $ sqljob render jobs/sales_sync.yml -t ./sql
    $ sqljob --json dry-run --spec jobs/sales_sync.yml -p acme-data
`


/**
 * Parse CLI arguments with meow.
 */
function parseCli(): ParsedCli {

    const cli = meow(HELP_TEXT, {
        importMeta: import.meta,
        flags: {
            spec: {
                type: 'string',
                shortFlag: 's'
            },
            templatesRoot: {
                type: 'string',
                shortFlag: 't'
            },
            project: {
                type: 'string',
                shortFlag: 'p'
            },
            location: {
                type: 'string',
                shortFlag: 'l'
            },
            output: {
                type: 'string',
                shortFlag: 'o'
            },
            settings: {
                type: 'string'
            },
            json: {
                type: 'boolean',
                default: false
            },
            logLevel: {
                type: 'string'
            }
        }
    })

    const flags: CliFlags = {
        spec: cli.flags.spec,
        templatesRoot: cli.flags.templatesRoot,
        project: cli.flags.project,
        location: cli.flags.location,
        output: cli.flags.output,
        settings: cli.flags.settings,
        json: cli.flags.json,
        logLevel: cli.flags.logLevel
    }

    const { route, params } = parseRouteFromInput(cli.input)

    return { route, params, flags }
}


const { route, params, flags } = parseCli()

process.exitCode = await runHeadless(route, params, flags)
