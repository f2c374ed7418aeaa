/**
 * Level colors for console output.
 */
import ansis from 'ansis';

import type { EntryLevel } from './types.js';

/**
 * Color per entry level.
 */
const LEVEL_COLORS: Record<EntryLevel, (text: string) => string> = {
    error: (text) => ansis.red.bold(text),
    warn: (text) => ansis.yellow(text),
    info: (text) => ansis.cyan(text),
    debug: (text) => ansis.gray(text),
};

/**
 * Color a level label.
 *
 * @example
 * ```typescript
 * colorLevel('error', 'ERROR') // '\x1b[31m\x1b[1mERROR...' on a color terminal
 * ```
 */
export function colorLevel(level: EntryLevel, label: string): string {

    return LEVEL_COLORS[level](label);

}
