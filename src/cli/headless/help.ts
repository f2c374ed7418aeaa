import type { HeadlessCommand, RouteHandler } from './_helpers.js';

export const help = `
# HELP

Show help for commands

## Usage

    sqljob help [command]

## Description

Without arguments, lists the available commands. With a command name,
prints that command's help.

## Examples

    sqljob help
    sqljob help deploy
`;

/**
 * Build the help handler over the registered commands.
 */
export function factory(handlers: Partial<Record<string, RouteHandler>>): RouteHandler {

    const topicsList = (): string => {

        const names = Object.keys(handlers)
            .filter((name) => name !== 'help')
            .sort();

        return ['## Available Commands', '', ...names.map((name) => `    ${name}`), ''].join('\n');

    };

    const run: HeadlessCommand = async (ctx) => {

        const { topic } = ctx.params;

        if (!topic) {

            ctx.stdout.write(help.trimStart() + '\n' + topicsList());

            return 0;

        }

        const handler = handlers[topic];

        if (!handler) {

            ctx.logger.error(`Unknown command: ${topic}`);
            ctx.stdout.write(topicsList());

            return 1;

        }

        ctx.stdout.write(handler.help.trimStart());

        return 0;

    };

    return { run, help };

}
