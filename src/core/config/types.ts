/**
 * Settings types.
 *
 * Settings say where templates live and which warehouse project and
 * location the dry-run and deploy commands talk to. They are resolved
 * from defaults, an optional `sqljob.yml`, `SQLJOB_*` environment
 * variables and CLI flags.
 */
import type { LogLevel } from '../logger/types.js'


/**
 * Fully resolved settings.
 *
 * @example
 * ```typescript
 * const settings: Settings = {
 *     templatesRoot: './templates',
 *     project: 'acme-data',
 *     location: 'US',
 *     maxBytesBilled: 10_000_000_000,
 *     logLevel: 'info',
 * }
 * ```
 */
export interface Settings {

    /** Directory template paths are relative to */
    templatesRoot: string

    /** Warehouse project; required for deploy */
    project?: string

    /** Warehouse location */
    location: string

    /** Fallback dry-run bytes limit for jobs without `limits` */
    maxBytesBilled?: number

    logLevel: LogLevel
}


/**
 * Partial settings from one source.
 */
export type SettingsInput = Partial<Settings>
