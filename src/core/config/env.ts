/**
 * Environment variable settings.
 *
 * Every setting can be overridden through a `SQLJOB_*` variable, which lets
 * CI run the CLI without a settings file.
 *
 * @example
 * ```bash
 * SQLJOB_PROJECT=acme-data
 * SQLJOB_LOCATION=EU
 * SQLJOB_TEMPLATES_ROOT=./sql
 * SQLJOB_MAX_BYTES_BILLED=10000000000
 * SQLJOB_LOG_LEVEL=verbose
 * ```
 */
import { LogLevelSchema, SettingsValidationError } from './schema.js'
import type { SettingsInput } from './types.js'


type Env = Record<string, string | undefined>


/**
 * Variables that map straight onto string settings.
 */
const STRING_VARS = {
    SQLJOB_PROJECT: 'project',
    SQLJOB_LOCATION: 'location',
    SQLJOB_TEMPLATES_ROOT: 'templatesRoot',
} as const


/**
 * Read settings from environment variables.
 *
 * Empty variables count as unset. Apart from the log level, which the
 * logger needs before anything else runs, values are validated by the
 * resolver once merged.
 *
 * @example
 * ```typescript
 * getEnvSettings({ SQLJOB_PROJECT: 'acme-data', SQLJOB_MAX_BYTES_BILLED: '1000' })
 * // { project: 'acme-data', maxBytesBilled: 1000 }
 * ```
 */
export function getEnvSettings(env: Env = process.env): SettingsInput {

    const settings: SettingsInput = {}

    for (const [name, key] of Object.entries(STRING_VARS)) {

        const value = env[name]

        if (value) {

            settings[key] = value
        }
    }

    const maxBytes = env['SQLJOB_MAX_BYTES_BILLED']

    if (maxBytes) {

        settings.maxBytesBilled = Number(maxBytes)
    }

    const logLevel = env['SQLJOB_LOG_LEVEL']

    if (logLevel) {

        const result = LogLevelSchema.safeParse(logLevel)

        if (!result.success) {

            throw new SettingsValidationError(
                `Invalid SQLJOB_LOG_LEVEL: must be one of ${LogLevelSchema.options.join(', ')}`,
                'logLevel',
                result.error.issues,
            )
        }

        settings.logLevel = result.data
    }

    return settings
}


/**
 * Settings file path from `SQLJOB_SETTINGS`, if set.
 */
export function getEnvSettingsPath(env: Env = process.env): string | undefined {

    return env['SQLJOB_SETTINGS'] || undefined
}


/**
 * Check if output should be JSON.
 *
 * Returns true if SQLJOB_JSON is set, enabling parseable output.
 */
export function shouldOutputJson(env: Env = process.env): boolean {

    const json = env['SQLJOB_JSON']

    return json === '1' || json === 'true'
}
