/**
 * Settings resolver - merges settings from multiple sources.
 *
 * Priority order (highest to lowest):
 * 1. CLI flags
 * 2. Environment variables
 * 3. Settings file
 * 4. Defaults
 */
import { existsSync, readFileSync } from 'node:fs'
import { resolve } from 'node:path'

import { attemptSync, clone, merge } from '@logosdx/utils'
import { parse as parseYaml } from 'yaml'

import { observer } from '../observer.js'
import { getEnvSettings, getEnvSettingsPath } from './env.js'
import { parseSettings, parseSettingsFile, SettingsFileError } from './schema.js'
import type { Settings, SettingsInput } from './types.js'


/**
 * Name of the settings file looked up in the working directory.
 */
export const SETTINGS_FILENAME = 'sqljob.yml'


/**
 * Default settings values.
 */
const DEFAULTS: Settings = {
    templatesRoot: './templates',
    location: 'US',
    logLevel: 'info',
}


/**
 * Options for resolving settings.
 */
export interface ResolveSettingsOptions {

    /** Directory to look for `sqljob.yml` in (default: process.cwd()) */
    cwd?: string

    /** Explicit settings file; must exist when given */
    path?: string

    /** CLI flag overrides */
    flags?: SettingsInput

    /** Environment to read `SQLJOB_*` from (default: process.env) */
    env?: Record<string, string | undefined>
}


/**
 * Drop keys whose value is undefined so they never mask a lower source.
 */
function defined(input: SettingsInput): SettingsInput {

    const out: SettingsInput = {}

    for (const [key, value] of Object.entries(input)) {

        if (value !== undefined) {

            Object.assign(out, { [key]: value })
        }
    }

    return out
}


/**
 * Load a settings file.
 *
 * @throws SettingsFileError when the file cannot be read or is not valid YAML
 * @throws SettingsValidationError when its contents are invalid
 */
export function loadSettingsFile(filepath: string): SettingsInput {

    const [text, readErr] = attemptSync(() => readFileSync(filepath, 'utf8'))

    if (readErr) {

        throw new SettingsFileError(filepath, readErr.message)
    }

    const [data, parseErr] = attemptSync((): unknown => parseYaml(text))

    if (parseErr) {

        throw new SettingsFileError(filepath, parseErr.message)
    }

    return parseSettingsFile(data)
}


/**
 * Find the settings file to load, if any.
 */
function findSettingsFile(options: ResolveSettingsOptions): string | null {

    const explicit = options.path ?? getEnvSettingsPath(options.env)

    if (explicit) {

        return resolve(options.cwd ?? process.cwd(), explicit)
    }

    const candidate = resolve(options.cwd ?? process.cwd(), SETTINGS_FILENAME)

    return existsSync(candidate) ? candidate : null
}


/**
 * Resolve settings from all sources.
 *
 * @throws SettingsFileError when an explicit settings file cannot be loaded
 * @throws SettingsValidationError when the merged settings are invalid
 *
 * @example
 * ```typescript
 * const settings = resolveSettings({
 *     flags: { project: 'acme-data', location: 'EU' },
 * })
 * ```
 */
export function resolveSettings(options: ResolveSettingsOptions = {}): Settings {

    const filepath = findSettingsFile(options)
    const fromFile = filepath ? loadSettingsFile(filepath) : {}
    const fromEnv = getEnvSettings(options.env)

    // Clone DEFAULTS to avoid mutation
    const merged = merge(
        merge(
            merge(clone(DEFAULTS), defined(fromFile)),
            defined(fromEnv),
        ),
        defined(options.flags ?? {}),
    )

    const settings = parseSettings(merged)

    observer.emit('settings:loaded', {
        path: filepath,
        project: settings.project,
        location: settings.location,
    })

    return settings
}
